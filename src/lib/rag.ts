import fs from 'node:fs';

const MAX_DOCUMENTS = 3;

// Words that carry no product meaning in Roman Urdu / English banking queries.
const STOP_WORDS = new Set([
  'a', 'an', 'the', 'and', 'or', 'of', 'to', 'in', 'on', 'for', 'is', 'are', 'i', 'me', 'my',
  'you', 'your', 'what', 'how', 'do', 'does', 'can', 'please', 'ka', 'ki', 'ke', 'hai', 'hain',
  'main', 'mera', 'meri', 'kya', 'kaise', 'se', 'ko', 'aur',
]);

export interface KnowledgeDocument {
  id: string;
  text: string;
  terms: ReadonlySet<string>;
}

export function tokenize(text: string): string[] {
  return (text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? []).filter((t) => !STOP_WORDS.has(t));
}

function flatten(value: unknown): string[] {
  if (value === null || value === undefined) return [];
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return [String(value)];
  }
  if (Array.isArray(value)) return value.flatMap(flatten);
  if (typeof value === 'object') {
    return Object.entries(value).flatMap(([key, inner]) => {
      const parts = flatten(inner);
      return parts.length ? [`${key.replaceAll('_', ' ')}: ${parts.join(', ')}`] : [];
    });
  }
  return [];
}

function makeDocument(id: string, text: string): KnowledgeDocument {
  return { id, text, terms: new Set(tokenize(text)) };
}

/** One document per catalog entry; top-level arrays of a JSON file are the entries. */
export function documentsFromJson(data: unknown): KnowledgeDocument[] {
  const entries: Array<[string, unknown]> = [];
  if (Array.isArray(data)) {
    data.forEach((item, i) => entries.push([`item-${i}`, item]));
  } else if (data && typeof data === 'object') {
    for (const [section, value] of Object.entries(data)) {
      if (Array.isArray(value)) {
        value.forEach((item, i) => entries.push([`${section}-${i}`, item]));
      } else {
        entries.push([section, { [section]: value }]);
      }
    }
  }
  return entries
    .map(([id, item]) => makeDocument(id, flatten(item).join('\n')))
    .filter((doc) => doc.text.length > 0);
}

export function documentsFromText(text: string): KnowledgeDocument[] {
  return text
    .split(/\r?\n\s*\r?\n/)
    .map((p) => p.trim())
    .filter(Boolean)
    .map((p, i) => makeDocument(`para-${i}`, p));
}

/**
 * In-memory keyword store standing in for the vector store. Documents are
 * selected by how many query terms they share.
 */
export class KnowledgeBase {
  constructor(readonly documents: readonly KnowledgeDocument[]) {}

  static fromFile(path: string): KnowledgeBase {
    const raw = fs.readFileSync(path, 'utf8');
    const documents = path.toLowerCase().endsWith('.json')
      ? documentsFromJson(JSON.parse(raw))
      : documentsFromText(raw);
    return new KnowledgeBase(documents);
  }

  buildContext(query: string): string {
    const terms = new Set(tokenize(query));
    if (terms.size === 0) return '';

    const scored = this.documents
      .map((doc, index) => {
        let score = 0;
        for (const term of terms) if (doc.terms.has(term)) score++;
        return { doc, index, score };
      })
      .filter((s) => s.score > 0)
      .sort((a, b) => b.score - a.score || a.index - b.index)
      .slice(0, MAX_DOCUMENTS);

    return scored.map((s) => s.doc.text).join('\n\n');
  }
}

/** Loads the store when the data file exists; a load failure disables retrieval. */
export function loadKnowledgeBase(path: string): KnowledgeBase | undefined {
  if (!fs.existsSync(path)) return undefined;
  try {
    const kb = KnowledgeBase.fromFile(path);
    if (process.env.NODE_ENV !== 'test') {
      console.log(`[rag] loaded ${kb.documents.length} documents from ${path}`);
    }
    return kb;
  } catch (error) {
    console.error(`[rag] load failed for ${path}: ${error instanceof Error ? error.message : String(error)}`);
    return undefined;
  }
}
