export const DEFAULT_FALLBACK = 'Mazrat, main samajh nahi saka.';

const ACCOUNT_INTENTS: ReadonlySet<string> = new Set(['account_benefits', 'account_opening']);

export function concernsAccount(normalizedText: string, intent: string | undefined): boolean {
  return normalizedText.includes('account') || (intent !== undefined && ACCOUNT_INTENTS.has(intent));
}

function firstTemplate(templates: ReadonlyMap<string, string>, ...keys: string[]): string {
  for (const key of keys) {
    const template = templates.get(key);
    if (template) return template;
  }
  return DEFAULT_FALLBACK;
}

/** Canned reply used when retrieval produced no context. */
export function selectFallback(
  normalizedText: string,
  productName: string | undefined,
  intent: string | undefined,
  templates: ReadonlyMap<string, string>,
): string {
  if (concernsAccount(normalizedText, intent) && !productName) {
    return firstTemplate(templates, 'clarify_account', 'handoff');
  }
  if (intent === 'account_opening') {
    return firstTemplate(templates, 'general_opening', 'handoff');
  }
  return firstTemplate(templates, 'handoff');
}
