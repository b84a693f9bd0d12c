import fs from 'node:fs';
import { z } from 'zod';
import { LexiconError } from './errors';

/**
 * Ordered `(key, values)` pairs. Intent and product matching is first-match-wins
 * over this order, so it is kept as a list rather than a map.
 */
export type OrderedGroups = ReadonlyArray<readonly [string, readonly string[]]>;

export interface Lexicon {
  readonly systemPrompt: string;
  readonly intentKeywords: OrderedGroups;
  readonly productSynonyms: OrderedGroups;
  readonly fallbackTemplates: ReadonlyMap<string, string>;
  readonly productDisplayNames: ReadonlyMap<string, string>;
}

const keywordGroups = z.record(z.array(z.string())).default({});

const voiceConfigSchema = z.object({
  system_prompt: z.object({ content: z.string().optional() }).optional(),
  intent_keywords: keywordGroups,
  product_normalization: z.object({ accounts: keywordGroups }).default({}),
  fallback_responses: z.record(z.string()).default({}),
});

const catalogSchema = z.object({
  accounts: z
    .array(z.object({ id: z.unknown().optional(), name: z.unknown().optional() }).passthrough())
    .default([]),
});

function readJson(path: string): unknown {
  return JSON.parse(fs.readFileSync(path, 'utf8'));
}

function freezeGroups(groups: Record<string, string[]>): OrderedGroups {
  // Object.entries keeps JSON key order for non-numeric keys.
  return Object.freeze(
    Object.entries(groups).map(([key, values]) => Object.freeze([key, Object.freeze([...values])] as const)),
  );
}

/**
 * Builds an immutable lexicon from an already-parsed voice config document.
 * Throws {@link LexiconError} when the document is unusable.
 */
export function parseLexicon(
  document: unknown,
  productDisplayNames: ReadonlyMap<string, string> = new Map(),
): Lexicon {
  const result = voiceConfigSchema.safeParse(document);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new LexiconError(`Invalid voice config at ${issue.path.join('.') || '<root>'}: ${issue.message}`);
  }

  const config = result.data;
  const systemPrompt = config.system_prompt?.content;
  if (!systemPrompt) {
    throw new LexiconError('Missing system_prompt.content in voice config.');
  }

  return Object.freeze({
    systemPrompt,
    intentKeywords: freezeGroups(config.intent_keywords),
    productSynonyms: freezeGroups(config.product_normalization.accounts),
    fallbackTemplates: new Map(Object.entries(config.fallback_responses)),
    productDisplayNames: new Map(productDisplayNames),
  });
}

/**
 * Reads `{ accounts: [{ id, name }] }` from a product catalog. Anything other
 * than an existing, well-formed `.json` file gives an empty map.
 */
export function loadProductDisplayNames(catalogPath: string): Map<string, string> {
  const names = new Map<string, string>();
  if (!catalogPath.toLowerCase().endsWith('.json') || !fs.existsSync(catalogPath)) {
    return names;
  }

  let document: unknown;
  try {
    document = readJson(catalogPath);
  } catch (error) {
    if (process.env.NODE_ENV !== 'test') {
      console.warn(`[lexicon] product catalog ${catalogPath} is not valid JSON: ${String(error)}`);
    }
    return names;
  }

  const parsed = catalogSchema.safeParse(document);
  if (!parsed.success) return names;

  for (const item of parsed.data.accounts) {
    if (typeof item.id === 'string' && item.id && typeof item.name === 'string' && item.name) {
      names.set(item.id, item.name);
    }
  }
  return names;
}

export function loadLexicon(configPath: string, catalogPath: string): Lexicon {
  let document: unknown;
  try {
    document = readJson(configPath);
  } catch (error) {
    throw new LexiconError(
      `Unable to read voice config ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
  return parseLexicon(document, loadProductDisplayNames(catalogPath));
}
