import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterAll, describe, it, expect } from 'vitest';
import { LexiconError } from '../lib/errors';
import { loadLexicon, loadProductDisplayNames, parseLexicon } from '../lib/lexicon';
import { voiceConfig } from './fixtures';

const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'lexicon-'));
function writeFile(name: string, contents: string): string {
  const file = path.join(dir, name);
  fs.writeFileSync(file, contents);
  return file;
}

afterAll(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe('parseLexicon', () => {
  it('keeps intents and product groups in configuration order', () => {
    const lexicon = parseLexicon(voiceConfig);
    expect(lexicon.systemPrompt).toBe('Be helpful.');
    expect(lexicon.intentKeywords.map(([name]) => name)).toEqual(['account_opening', 'documents_required']);
    expect(lexicon.productSynonyms).toEqual([
      ['asaan_account', ['asaan account', 'easy account']],
      ['savings_account', ['savings account', 'bachat account']],
    ]);
    expect(lexicon.fallbackTemplates.get('handoff')).toBe('Representative se baat karein.');
  });

  it('requires a system prompt', () => {
    expect(() => parseLexicon({ intent_keywords: {} })).toThrow(LexiconError);
    expect(() => parseLexicon({ system_prompt: { content: '' } })).toThrow(
      'Missing system_prompt.content in voice config.',
    );
  });

  it('defaults the optional sections to empty', () => {
    const lexicon = parseLexicon({ system_prompt: { content: 'x' } });
    expect(lexicon.intentKeywords).toEqual([]);
    expect(lexicon.productSynonyms).toEqual([]);
    expect(lexicon.fallbackTemplates.size).toBe(0);
    expect(lexicon.productDisplayNames.size).toBe(0);
  });

  it('rejects sections of the wrong shape', () => {
    expect(() => parseLexicon({ system_prompt: { content: 'x' }, intent_keywords: { faq: 'rates' } })).toThrow(
      /Invalid voice config at intent_keywords\.faq/,
    );
  });

  it('is frozen', () => {
    const lexicon = parseLexicon(voiceConfig);
    expect(Object.isFrozen(lexicon)).toBe(true);
    expect(Object.isFrozen(lexicon.intentKeywords)).toBe(true);
    expect(Object.isFrozen(lexicon.intentKeywords[0][1])).toBe(true);
  });
});

describe('loadProductDisplayNames', () => {
  it('maps catalog ids to names and skips incomplete entries', () => {
    const file = writeFile(
      'catalog.json',
      JSON.stringify({ accounts: [{ id: 'asaan_account', name: 'Asaan Account' }, { id: 'b' }, { name: 'C' }] }),
    );
    expect([...loadProductDisplayNames(file)]).toEqual([['asaan_account', 'Asaan Account']]);
  });

  it('accepts an upper-case extension', () => {
    const file = writeFile('UPPER.JSON', JSON.stringify({ accounts: [{ id: 'a', name: 'A' }] }));
    expect(loadProductDisplayNames(file).get('a')).toBe('A');
  });

  it('returns an empty map for missing, non-json or malformed catalogs', () => {
    expect(loadProductDisplayNames(path.join(dir, 'missing.json')).size).toBe(0);
    expect(loadProductDisplayNames(writeFile('catalog.txt', '{"accounts":[{"id":"a","name":"A"}]}')).size).toBe(0);
    expect(loadProductDisplayNames(writeFile('broken.json', '{"accounts": [')).size).toBe(0);
    expect(loadProductDisplayNames(writeFile('wrong.json', '{"accounts": "none"}')).size).toBe(0);
  });
});

describe('loadLexicon', () => {
  it('combines the voice config with catalog display names', () => {
    const config = writeFile('voice.json', JSON.stringify(voiceConfig));
    const catalog = writeFile('bank.json', JSON.stringify({ accounts: [{ id: 'savings_account', name: 'Bachat Plus' }] }));
    expect(loadLexicon(config, catalog).productDisplayNames.get('savings_account')).toBe('Bachat Plus');
  });

  it('fails when the voice config cannot be read', () => {
    expect(() => loadLexicon(path.join(dir, 'nope.json'), '')).toThrow(/Unable to read voice config/);
  });
});
