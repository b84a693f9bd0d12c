import type { OrderedGroups } from './lexicon';

export interface NormalizationResult {
  normalizedText: string;
  resolvedProduct?: string;
}

/** `current_account` -> `Current Account` */
export function titleCaseKey(key: string): string {
  return key
    .replaceAll('_', ' ')
    .replace(/[A-Za-z]+/g, (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());
}

export function displayNameFor(key: string, displayNames: ReadonlyMap<string, string>): string {
  return displayNames.get(key) || titleCaseKey(key);
}

/**
 * Finds the first product group (in configuration order) with a synonym in the
 * text and rewrites every synonym of that group to the product's display name.
 */
export function resolveProduct(
  normalizedText: string,
  synonymGroups: OrderedGroups,
  displayNames: ReadonlyMap<string, string>,
): NormalizationResult {
  for (const [key, synonyms] of synonymGroups) {
    const hit = synonyms.some((synonym) => normalizedText.includes(synonym.toLowerCase()));
    if (!hit) continue;

    const productName = displayNameFor(key, displayNames);
    const surface = productName.toLowerCase();
    let rewritten = normalizedText;
    for (const synonym of synonyms) {
      rewritten = rewritten.replaceAll(synonym.toLowerCase(), surface);
    }
    return { normalizedText: rewritten, resolvedProduct: productName };
  }
  return { normalizedText };
}
