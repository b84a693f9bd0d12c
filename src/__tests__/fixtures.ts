import { loadSettings, type Settings } from '../lib/env';
import { parseLexicon, type Lexicon } from '../lib/lexicon';

export const voiceConfig = {
  system_prompt: { content: 'Be helpful.' },
  intent_keywords: {
    account_opening: ['open', 'kholna'],
    documents_required: ['documents', 'kaghzat'],
  },
  product_normalization: {
    accounts: {
      asaan_account: ['asaan account', 'easy account'],
      savings_account: ['savings account', 'bachat account'],
    },
  },
  fallback_responses: {
    clarify_account: 'Kaunsa account?',
    general_opening: 'Branch tashreef layein.',
    handoff: 'Representative se baat karein.',
  },
};

export function testLexicon(): Lexicon {
  return parseLexicon(voiceConfig, new Map([['savings_account', 'Mudarabah Savings Account']]));
}

export function testSettings(overrides: Record<string, string> = {}): Settings {
  return loadSettings({ NODE_ENV: 'test', ...overrides });
}
