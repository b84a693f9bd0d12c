import { createHash } from 'crypto';

export function sha1(input: string | Uint8Array): string {
  return createHash('sha1').update(input).digest('hex');
}

/** Cache key for synthesized speech: the same text in the same voice is the same audio. */
export function getCacheKey(text: string, voice: string): string {
  return `${voice}:${sha1(text)}`;
}
