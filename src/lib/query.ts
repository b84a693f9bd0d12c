import type { OrderedGroups } from './lexicon';

export const GENERIC_EXPANSION: readonly string[] = ['features', 'eligibility', 'documents', 'process'];

export function buildQuery(
  normalizedText: string,
  productName: string | undefined,
  intent: string | undefined,
  intentKeywords: OrderedGroups,
): string {
  const terms: string[] = normalizedText ? [normalizedText] : [];
  if (productName && !normalizedText.includes(productName.toLowerCase())) {
    terms.push(productName);
  }
  if (intent) {
    terms.push(intent.replaceAll('_', ' '));
  }
  terms.push(...GENERIC_EXPANSION);
  if (intent) {
    const group = intentKeywords.find(([name]) => name === intent);
    if (group) terms.push(...group[1]);
  }

  const seen = new Set<string>();
  const ordered: string[] = [];
  for (const term of terms) {
    const token = term.trim();
    const key = token.toLowerCase();
    if (token && !seen.has(key)) {
      seen.add(key);
      ordered.push(token);
    }
  }
  return ordered.join(' ');
}
