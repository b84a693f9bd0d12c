/**
 * Strips markup and characters the speech service rejects, and flattens
 * typographic punctuation so the voice reads it naturally.
 */
export function sanitizeForSpeech(text: string): string {
  if (!text) return '';

  return text
    .replace(/<[^>]*>/g, '') // tags
    .replace(/[\x00-\x1F\x7F-\x9F\u200B-\u200D\u2028-\u202F\u205F\u2060\u3000\uFEFF]/g, ' ')
    .replace(/[*_#`]+/g, '') // markdown leftovers
    .replace(/[\u2018\u2019]/g, "'")
    .replace(/[\u201C\u201D]/g, '"')
    .replace(/[\u2013\u2014]/g, '-')
    .replace(/\u2026/g, '...')
    .replace(/\s+/g, ' ')
    .trim();
}

export function escapeXml(unsafe: string): string {
  return unsafe
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

/** `ur-PK-UzmaNeural` -> `ur-PK` */
export function voiceLocale(voice: string): string {
  const [language, region] = voice.split('-');
  return region ? `${language}-${region}` : language;
}

export function buildSsml(text: string, voice: string): string {
  const locale = voiceLocale(voice);
  return `<speak version="1.0" xml:lang="${locale}" xmlns="http://www.w3.org/2001/10/synthesis">` +
    `<voice name="${escapeXml(voice)}">${escapeXml(text)}</voice>` +
    `</speak>`;
}
