// Decision module: the LLM only ever sees retrieved context. When retrieval
// comes back empty the reply is a configured template, never generated text.
import type { Lexicon } from './lexicon';
import { normalize } from './normalize';
import { resolveProduct } from './product';
import { detectIntent } from './intent';
import { buildQuery } from './query';
import { selectFallback } from './fallback';

export const GREETINGS: ReadonlySet<string> = new Set([
  'hi',
  'hello',
  'hey',
  'salam',
  'assalamualaikum',
  'asalamualaikum',
]);

export const GREETING_REPLY = 'Assalam-o-Alaikum. Welcome to Bank Islami. Mai aap ki madad ke liye hoon.';

export interface Understanding {
  normalizedText: string;
  productName?: string;
  intent?: string;
  query: string;
}

export type ReplyMode = 'greeting' | 'fallback' | 'generated';

export interface Reply {
  text: string;
  mode: ReplyMode;
  understanding?: Understanding;
}

export type Retrieve = (query: string) => string | undefined;
export type Generate = (userText: string, systemPrompt: string, context: string) => Promise<string>;

/** Everything an answer depends on. Built once at startup and never mutated. */
export interface AnswerContext {
  lexicon: Lexicon;
  retrieve: Retrieve;
  generate: Generate;
  formatReply?: (text: string) => string;
}

export function isGreeting(rawText: string): boolean {
  return GREETINGS.has(rawText.trim().toLowerCase());
}

export function understand(rawText: string, lexicon: Lexicon): Understanding {
  const { normalizedText, resolvedProduct } = resolveProduct(
    normalize(rawText),
    lexicon.productSynonyms,
    lexicon.productDisplayNames,
  );
  const intent = detectIntent(normalizedText, lexicon.intentKeywords);
  const query = buildQuery(normalizedText, resolvedProduct, intent, lexicon.intentKeywords);
  return { normalizedText, productName: resolvedProduct, intent, query };
}

export function fallbackFor(understanding: Understanding, lexicon: Lexicon): string {
  return selectFallback(
    understanding.normalizedText,
    understanding.productName,
    understanding.intent,
    lexicon.fallbackTemplates,
  );
}

export async function decideReply(rawText: string, ctx: AnswerContext): Promise<Reply> {
  if (isGreeting(rawText)) {
    return { text: GREETING_REPLY, mode: 'greeting' };
  }

  const understanding = understand(rawText, ctx.lexicon);
  const context = ctx.retrieve(understanding.query);
  if (!context) {
    return { text: fallbackFor(understanding, ctx.lexicon), mode: 'fallback', understanding };
  }

  const generated = await ctx.generate(rawText, ctx.lexicon.systemPrompt, context);
  const text = ctx.formatReply ? ctx.formatReply(generated) : generated;
  return { text, mode: 'generated', understanding };
}
