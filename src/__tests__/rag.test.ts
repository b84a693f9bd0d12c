import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { describe, it, expect } from 'vitest';
import { KnowledgeBase, documentsFromJson, documentsFromText, loadKnowledgeBase, tokenize } from '../lib/rag';

const catalog = {
  accounts: [
    { id: 'asaan_account', name: 'Asaan Account', features: ['Free debit card'] },
    { id: 'current_account', name: 'Current Account', features: ['Cheque book'] },
  ],
  branch: { timing: '9 to 5' },
};

describe('tokenize', () => {
  it('lowercases and drops stop words', () => {
    expect(tokenize('What is the Asaan Account fee?')).toEqual(['asaan', 'account', 'fee']);
  });
});

describe('documentsFromJson', () => {
  it('makes one document per catalog entry', () => {
    const docs = documentsFromJson(catalog);
    expect(docs.map((d) => d.id)).toEqual(['accounts-0', 'accounts-1', 'branch']);
    expect(docs[0].text).toBe('id: asaan_account\nname: Asaan Account\nfeatures: Free debit card');
    expect(docs[2].text).toBe('branch: timing: 9 to 5');
  });
});

describe('KnowledgeBase.buildContext', () => {
  const kb = new KnowledgeBase(documentsFromJson(catalog));

  it('returns documents sharing terms with the query', () => {
    expect(kb.buildContext('cheque book')).toBe('id: current_account\nname: Current Account\nfeatures: Cheque book');
  });

  it('keeps document order for equal overlap', () => {
    expect(kb.buildContext('account')).toBe(
      'id: asaan_account\nname: Asaan Account\nfeatures: Free debit card\n\n' +
        'id: current_account\nname: Current Account\nfeatures: Cheque book',
    );
  });

  it('puts the best overlap first and returns at most three documents', () => {
    const text = new KnowledgeBase(documentsFromText('card fee\n\ndebit card fee waiver\n\nfee one\n\nfee two'));
    expect(text.buildContext('debit card fee')).toBe('debit card fee waiver\n\ncard fee\n\nfee one');
  });

  it('returns an empty context when nothing matches', () => {
    expect(kb.buildContext('')).toBe('');
    expect(kb.buildContext('mortgage')).toBe('');
  });
});

describe('loadKnowledgeBase', () => {
  it('returns undefined for a missing file', () => {
    expect(loadKnowledgeBase(path.join(os.tmpdir(), 'no-such-bank.json'))).toBeUndefined();
  });

  it('reads plain text paragraphs', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'rag-'));
    const file = path.join(dir, 'faq.txt');
    fs.writeFileSync(file, 'Branch timing is 9 to 5.\n\nDebit card is free.\n');
    expect(loadKnowledgeBase(file)?.documents.map((d) => d.text)).toEqual([
      'Branch timing is 9 to 5.',
      'Debit card is free.',
    ]);
    fs.rmSync(dir, { recursive: true, force: true });
  });
});
