import { describe, it, expect } from 'vitest';
import { DEFAULT_FALLBACK, concernsAccount, selectFallback } from '../lib/fallback';

const all = new Map([
  ['clarify_account', 'Which account?'],
  ['general_opening', 'Visit a branch.'],
  ['handoff', 'Connecting you to an agent.'],
]);

describe('selectFallback', () => {
  it('asks which account when an account is mentioned without a product', () => {
    const templates = new Map([['clarify_account', 'Which account?']]);
    expect(selectFallback('i want to open an account', undefined, undefined, templates)).toBe('Which account?');
  });

  it('treats account intents as account questions', () => {
    expect(selectFallback('benefits kya hain', undefined, 'account_benefits', all)).toBe('Which account?');
  });

  it('falls back from clarify_account to handoff, then the default', () => {
    expect(selectFallback('my accounts', undefined, undefined, new Map([['handoff', 'H']]))).toBe('H');
    expect(selectFallback('my accounts', undefined, undefined, new Map())).toBe(DEFAULT_FALLBACK);
  });

  it('uses general_opening for account opening once a product is known', () => {
    expect(selectFallback('asaan account kholna', 'Asaan Account', 'account_opening', all)).toBe('Visit a branch.');
    expect(
      selectFallback('asaan account kholna', 'Asaan Account', 'account_opening', new Map([['handoff', 'H']])),
    ).toBe('H');
    expect(selectFallback('asaan account kholna', 'Asaan Account', 'account_opening', new Map())).toBe(
      DEFAULT_FALLBACK,
    );
  });

  it('hands off everything else', () => {
    expect(selectFallback('branch timing', undefined, 'branch_timing', all)).toBe('Connecting you to an agent.');
    expect(selectFallback('current account fees', 'Current Account', undefined, all)).toBe(
      'Connecting you to an agent.',
    );
    expect(selectFallback('', undefined, undefined, new Map())).toBe('Mazrat, main samajh nahi saka.');
  });

  it('treats an empty template as missing', () => {
    const templates = new Map([
      ['clarify_account', ''],
      ['handoff', 'H'],
    ]);
    expect(selectFallback('account', undefined, undefined, templates)).toBe('H');
  });
});

describe('concernsAccount', () => {
  it('checks the text and the intent', () => {
    expect(concernsAccount('account band hai', undefined)).toBe(true);
    expect(concernsAccount('khulwana hai', 'account_opening')).toBe(true);
    expect(concernsAccount('card', 'debit_card')).toBe(false);
  });
});
