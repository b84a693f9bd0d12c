import axios from 'axios';
import { LRUCache } from 'lru-cache';
import { z } from 'zod';
import { graphApiVersion, type Settings } from './env';
import { UpstreamError, toUpstreamError } from './errors';
import { sha1 } from './hash';

const GRAPH_BASE_URL = 'https://graph.facebook.com';

// Audio replies are served back to Meta from /media/:id; they only need to
// live long enough for WhatsApp to fetch them.
const MEDIA_TTL_MS = 30 * 60 * 1000;
const MEDIA_MAX_ITEMS = 200;

export interface StoredMedia {
  buffer: Uint8Array;
  contentType: string;
}

export class MediaStore {
  private readonly cache = new LRUCache<string, StoredMedia>({
    max: MEDIA_MAX_ITEMS,
    ttl: MEDIA_TTL_MS,
  });

  put(buffer: Uint8Array, contentType: string): string {
    const id = sha1(buffer);
    this.cache.set(id, { buffer, contentType });
    return id;
  }

  get(id: string): StoredMedia | undefined {
    return this.cache.get(id);
  }
}

export type InboundMessage =
  | { type: 'text'; from: string; text: string }
  | { type: 'audio'; from: string; mediaId: string; mediaType?: string };

const inboundSchema = z.object({
  entry: z.array(
    z.object({
      changes: z.array(
        z.object({
          value: z.object({
            metadata: z.object({ phone_number_id: z.string().optional() }).passthrough().optional(),
            messages: z
              .array(
                z
                  .object({
                    from: z.string(),
                    type: z.string(),
                    text: z.object({ body: z.string() }).optional(),
                    audio: z.object({ id: z.string(), mime_type: z.string().optional() }).optional(),
                    voice: z.object({ id: z.string(), mime_type: z.string().optional() }).optional(),
                  })
                  .passthrough(),
              )
              .optional(),
          }),
        }),
      ),
    }),
  ),
});

/** First text or audio message in a webhook payload, or null for anything else (statuses, reactions). */
export function parseMessage(payload: unknown): InboundMessage | null {
  const parsed = inboundSchema.safeParse(payload);
  if (!parsed.success) return null;

  const message = parsed.data.entry[0]?.changes[0]?.value.messages?.[0];
  if (!message) return null;

  if (message.type === 'text' && message.text?.body.trim()) {
    return { type: 'text', from: message.from, text: message.text.body };
  }
  const audio = message.type === 'audio' ? message.audio : message.type === 'voice' ? message.voice : undefined;
  if (audio) {
    return { type: 'audio', from: message.from, mediaId: audio.id, mediaType: audio.mime_type };
  }
  return null;
}

export function webhookPhoneNumberId(payload: unknown): string | undefined {
  const parsed = inboundSchema.safeParse(payload);
  return parsed.success ? parsed.data.entry[0]?.changes[0]?.value.metadata?.phone_number_id : undefined;
}

const mediaInfoSchema = z.object({ url: z.string().url(), mime_type: z.string().optional() });

export class WhatsAppClient {
  private readonly version: string;

  constructor(
    private readonly settings: Settings,
    readonly media: MediaStore = new MediaStore(),
  ) {
    this.version = graphApiVersion(settings);
  }

  private get accessToken(): string {
    if (!this.settings.ACCESS_TOKEN) throw new Error('ACCESS_TOKEN is required in environment variables');
    return this.settings.ACCESS_TOKEN;
  }

  private get messagesUrl(): string {
    if (!this.settings.PHONE_NUMBER_ID) throw new Error('PHONE_NUMBER_ID is required in environment variables');
    return `${GRAPH_BASE_URL}/${this.version}/${this.settings.PHONE_NUMBER_ID}/messages`;
  }

  private async send(body: Record<string, unknown>): Promise<void> {
    const url = this.messagesUrl;
    try {
      await axios.post(url, { messaging_product: 'whatsapp', ...body }, {
        headers: { Authorization: `Bearer ${this.accessToken}`, 'Content-Type': 'application/json' },
        timeout: 15000,
      });
    } catch (error) {
      throw toUpstreamError('whatsapp', error);
    }
  }

  async replyText(to: string, text: string): Promise<void> {
    await this.send({ to, type: 'text', text: { preview_url: false, body: text } });
  }

  /** Sends audio as a link to this server's /media route. */
  async replyAudio(to: string, audio: Uint8Array, contentType: string): Promise<void> {
    const baseUrl = this.settings.PUBLIC_BASE_URL;
    if (!baseUrl) {
      if (process.env.NODE_ENV !== 'test') {
        console.warn('[whatsapp] PUBLIC_BASE_URL not set; skipping audio reply');
      }
      return;
    }
    if (audio.length === 0) return;
    const id = this.media.put(audio, contentType);
    await this.send({ to, type: 'audio', audio: { link: `${baseUrl.replace(/\/$/, '')}/media/${id}` } });
  }

  async pushText(text: string, to?: string): Promise<void> {
    const recipient = to || this.settings.RECIPIENT_WAID;
    if (!recipient) throw new Error('No recipient: pass "to" or set RECIPIENT_WAID');
    await this.replyText(recipient, text);
  }

  async downloadMedia(mediaId: string): Promise<Uint8Array> {
    const headers = { Authorization: `Bearer ${this.accessToken}` };
    try {
      const info = await axios.get(`${GRAPH_BASE_URL}/${this.version}/${encodeURIComponent(mediaId)}`, {
        headers,
        timeout: 15000,
      });
      const parsed = mediaInfoSchema.safeParse(info.data);
      if (!parsed.success) throw new UpstreamError('whatsapp', `media ${mediaId} has no download url`);

      const file = await axios.get(parsed.data.url, { headers, responseType: 'arraybuffer', timeout: 30000 });
      return new Uint8Array(file.data);
    } catch (error) {
      throw toUpstreamError('whatsapp', error);
    }
  }

  async debugAccessToken(): Promise<unknown> {
    const { APP_ID, APP_SECRET } = this.settings;
    if (!APP_ID || !APP_SECRET) throw new Error('APP_ID and APP_SECRET are required to debug the access token');
    try {
      const response = await axios.get(`${GRAPH_BASE_URL}/${this.version}/debug_token`, {
        params: { input_token: this.accessToken, access_token: `${APP_ID}|${APP_SECRET}` },
        timeout: 15000,
      });
      return response.data;
    } catch (error) {
      throw toUpstreamError('whatsapp', error);
    }
  }

  /** Where replies go: a fixed test recipient when configured, else the sender. */
  recipientFor(sender: string): string {
    return this.settings.RECIPIENT_WAID || sender;
  }

  diagnose(): Record<string, boolean | string> {
    const s = this.settings;
    return {
      has_access_token: Boolean(s.ACCESS_TOKEN),
      has_phone_number_id: Boolean(s.PHONE_NUMBER_ID),
      has_verify_token: Boolean(s.VERIFY_TOKEN),
      has_public_base_url: Boolean(s.PUBLIC_BASE_URL),
      has_app_id: Boolean(s.APP_ID),
      has_app_secret: Boolean(s.APP_SECRET),
      has_recipient_waid: Boolean(s.RECIPIENT_WAID),
      version: this.version,
    };
  }
}
