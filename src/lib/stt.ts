import axios from 'axios';
import { z } from 'zod';
import type { Settings } from './env';
import { toUpstreamError } from './errors';

export interface STTEngine {
  transcribe(audio: Uint8Array, filename: string, contentType?: string): Promise<string>;
}

const recognitionSchema = z.object({
  RecognitionStatus: z.string(),
  DisplayText: z.string().optional(),
});

const EXTENSION_TYPES: Record<string, string> = {
  wav: 'audio/wav',
  ogg: 'audio/ogg',
  oga: 'audio/ogg',
  opus: 'audio/ogg',
  webm: 'audio/webm',
  mp3: 'audio/mpeg',
};

/**
 * Content-Type to send with an upload. Browsers and WhatsApp add codec
 * parameters (`audio/ogg; codecs=opus`) which the short-audio endpoint
 * rejects, so only the codec the service understands is kept.
 */
export function speechContentType(filename: string, contentType?: string): string {
  const declared = contentType?.split(';')[0].trim().toLowerCase();
  if (declared === 'audio/ogg' || declared === 'audio/opus') return 'audio/ogg; codecs=opus';
  if (declared && declared.startsWith('audio/')) return declared;

  const extension = filename.split('.').pop()?.toLowerCase() ?? '';
  const guessed = EXTENSION_TYPES[extension];
  if (guessed === 'audio/ogg') return 'audio/ogg; codecs=opus';
  return guessed ?? 'audio/wav';
}

class AzureSTT implements STTEngine {
  private readonly endpoint: string;
  private readonly key: string;
  private readonly locale: string;

  constructor(settings: Settings) {
    const key = settings.AZURE_SPEECH_KEY;
    const region = settings.AZURE_REGION;

    if (!key) throw new Error('AZURE_SPEECH_KEY is required in environment variables');
    if (!region) throw new Error('AZURE_REGION is required in environment variables');

    this.key = key;
    this.locale = settings.STT_LOCALE;
    this.endpoint = `https://${region}.stt.speech.microsoft.com/speech/recognition/conversation/cognitiveservices/v1`;
  }

  async transcribe(audio: Uint8Array, filename: string, contentType?: string): Promise<string> {
    let data: unknown;
    try {
      const response = await axios({
        method: 'post',
        url: this.endpoint,
        params: { language: this.locale, format: 'simple' },
        headers: {
          'Ocp-Apim-Subscription-Key': this.key,
          'Content-Type': speechContentType(filename, contentType),
          Accept: 'application/json',
        },
        data: Buffer.from(audio),
        timeout: 30000,
      });
      data = response.data;
    } catch (error) {
      throw toUpstreamError('azure-stt', error);
    }

    const parsed = recognitionSchema.safeParse(data);
    if (!parsed.success || parsed.data.RecognitionStatus !== 'Success') {
      return '';
    }
    return parsed.data.DisplayText?.trim() ?? '';
  }
}

export function makeSTT(settings: Settings): STTEngine {
  return new AzureSTT(settings);
}

export const __testing__ = { AzureSTT };
