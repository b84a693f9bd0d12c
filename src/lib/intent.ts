import type { OrderedGroups } from './lexicon';

/** First intent, in configuration order, with a keyword contained in the text. */
export function detectIntent(normalizedText: string, intentKeywords: OrderedGroups): string | undefined {
  for (const [intent, keywords] of intentKeywords) {
    if (keywords.some((keyword) => normalizedText.includes(keyword.toLowerCase()))) {
      return intent;
    }
  }
  return undefined;
}
