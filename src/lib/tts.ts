import axios from 'axios';
import { LRUCache } from 'lru-cache';
import type { Settings } from './env';
import { toUpstreamError } from './errors';
import { getCacheKey } from './hash';
import { buildSsml, sanitizeForSpeech } from './ssml';

// Cache configuration
const TTS_CACHE_TTL_MS = 10 * 60 * 1000; // 10 minutes
const TTS_CACHE_MAX_ITEMS = 100;

const ttsCache = new LRUCache<string, Uint8Array>({
  max: TTS_CACHE_MAX_ITEMS,
  ttl: TTS_CACHE_TTL_MS,
  updateAgeOnGet: true,
});

function logCacheStatus(cacheKey: string, hit: boolean) {
  if (process.env.NODE_ENV !== 'test') {
    console.log(`[tts] cache ${hit ? 'hit' : 'miss'} for key: ${cacheKey}`);
  }
}

export interface TTSEngine {
  synth(text: string): Promise<Uint8Array>;
  readonly contentType: string;
}

/** MIME type of the audio Azure returns for an `X-Microsoft-OutputFormat`. */
export function contentTypeFor(outputFormat: string): string {
  const format = outputFormat.toLowerCase();
  if (format.includes('mp3')) return 'audio/mpeg';
  if (format.includes('webm')) return 'audio/webm';
  if (format.includes('ogg') || format.includes('opus')) return 'audio/ogg';
  return 'audio/wav';
}

class AzureTTS implements TTSEngine {
  private readonly endpoint: string;
  private readonly key: string;
  private readonly voice: string;
  private readonly outputFormat: string;

  constructor(settings: Settings) {
    const key = settings.AZURE_SPEECH_KEY;
    const region = settings.AZURE_REGION;

    if (!key) throw new Error('AZURE_SPEECH_KEY is required in environment variables');
    if (!region) throw new Error('AZURE_REGION is required in environment variables');

    this.key = key;
    this.voice = settings.TTS_VOICE;
    this.outputFormat = settings.TTS_OUTPUT_FORMAT;
    this.endpoint = `https://${region}.tts.speech.microsoft.com/cognitiveservices/v1`;
  }

  get contentType(): string {
    return contentTypeFor(this.outputFormat);
  }

  async synth(text: string): Promise<Uint8Array> {
    const sanitized = sanitizeForSpeech(text);
    if (!sanitized) return new Uint8Array(0);

    const cacheKey = getCacheKey(sanitized, this.voice);
    const cached = ttsCache.get(cacheKey);
    if (cached) {
      logCacheStatus(cacheKey, true);
      return cached;
    }
    logCacheStatus(cacheKey, false);

    try {
      const response = await axios({
        method: 'post',
        url: this.endpoint,
        headers: {
          'Ocp-Apim-Subscription-Key': this.key,
          'Content-Type': 'application/ssml+xml',
          'X-Microsoft-OutputFormat': this.outputFormat,
          'User-Agent': 'banking-voice-assistant',
        },
        data: buildSsml(sanitized, this.voice),
        responseType: 'arraybuffer',
        timeout: 15000,
      });

      const audio = new Uint8Array(response.data);
      ttsCache.set(cacheKey, audio);
      return audio;
    } catch (error) {
      throw toUpstreamError('azure-tts', error);
    }
  }
}

export function makeTTS(settings: Settings): TTSEngine {
  return new AzureTTS(settings);
}

export default makeTTS;

// For testing
export const __testing__ = {
  AzureTTS,
  clearCache: () => ttsCache.clear(),
};
