import { z } from 'zod';

const optional = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

const settingsSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  HOST: z.string().default('0.0.0.0'),

  VOICE_CONFIG_PATH: z.string().default('config/voice_config.json'),
  RAG_DATA_PATH: z.string().default('data/bank.json'),
  MONGODB_URI: optional,

  // Azure Speech
  AZURE_SPEECH_KEY: optional,
  AZURE_REGION: optional,
  STT_LOCALE: z.string().default('ur-PK'),
  TTS_VOICE: z.string().default('ur-PK-UzmaNeural'),
  TTS_OUTPUT_FORMAT: z.string().default('audio-16khz-32kbitrate-mono-mp3'),

  // Azure OpenAI
  AZURE_OPENAI_ENDPOINT: optional,
  AZURE_OPENAI_KEY: optional,
  AZURE_OPENAI_DEPLOYMENT: optional,
  AZURE_OPENAI_API_VERSION: z.string().default('2024-02-15-preview'),

  // WhatsApp Cloud API
  ACCESS_TOKEN: optional,
  PHONE_NUMBER_ID: optional,
  VERIFY_TOKEN: optional,
  PUBLIC_BASE_URL: optional,
  APP_ID: optional,
  APP_SECRET: optional,
  RECIPIENT_WAID: optional,
  VERSION: optional,
  META_API_VERSION: optional,
});

export type Settings = z.infer<typeof settingsSchema>;

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const result = settingsSchema.safeParse(env);
  if (!result.success) {
    const errors = result.error.flatten().fieldErrors;
    const detail = Object.entries(errors)
      .map(([key, msgs]) => `${key}: ${msgs?.join(', ')}`)
      .join('; ');
    throw new Error(`Invalid environment variables: ${detail}`);
  }
  return result.data;
}

export function graphApiVersion(settings: Settings): string {
  return settings.VERSION ?? settings.META_API_VERSION ?? 'v20.0';
}
