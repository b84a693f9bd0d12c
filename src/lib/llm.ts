import axios from 'axios';
import { z } from 'zod';
import type { Settings } from './env';
import { UpstreamError, toUpstreamError } from './errors';

const completionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }).optional(),
      }),
    )
    .default([]),
});

export interface AnswerGenerator {
  generate(userText: string, systemPrompt: string, context: string): Promise<string>;
}

export function buildMessages(userText: string, systemPrompt: string, context: string) {
  return [
    {
      role: 'system' as const,
      content: `${systemPrompt}\n\nAnswer only from the following bank information:\n${context}`,
    },
    { role: 'user' as const, content: userText },
  ];
}

class AzureOpenAIGenerator implements AnswerGenerator {
  private readonly url: string;
  private readonly key: string;
  private readonly apiVersion: string;

  constructor(settings: Settings) {
    const endpoint = settings.AZURE_OPENAI_ENDPOINT;
    const key = settings.AZURE_OPENAI_KEY;
    const deployment = settings.AZURE_OPENAI_DEPLOYMENT;

    if (!endpoint) throw new Error('AZURE_OPENAI_ENDPOINT is required in environment variables');
    if (!key) throw new Error('AZURE_OPENAI_KEY is required in environment variables');
    if (!deployment) throw new Error('AZURE_OPENAI_DEPLOYMENT is required in environment variables');

    this.key = key;
    this.apiVersion = settings.AZURE_OPENAI_API_VERSION;
    this.url = `${endpoint.replace(/\/$/, '')}/openai/deployments/${encodeURIComponent(deployment)}/chat/completions`;
  }

  async generate(userText: string, systemPrompt: string, context: string): Promise<string> {
    let data: unknown;
    try {
      const response = await axios.post(
        this.url,
        { messages: buildMessages(userText, systemPrompt, context), temperature: 0.2, max_tokens: 400 },
        {
          params: { 'api-version': this.apiVersion },
          headers: { 'api-key': this.key, 'Content-Type': 'application/json' },
          timeout: 30000,
        },
      );
      data = response.data;
    } catch (error) {
      throw toUpstreamError('azure-openai', error);
    }

    const parsed = completionSchema.safeParse(data);
    const content = parsed.success ? parsed.data.choices[0]?.message?.content : undefined;
    if (!content) {
      throw new UpstreamError('azure-openai', 'completion contained no message');
    }
    return content;
  }
}

export function makeGenerator(settings: Settings): AnswerGenerator {
  return new AzureOpenAIGenerator(settings);
}

/**
 * Flattens model output for chat bubbles and speech: no markdown emphasis,
 * headings, list markers or code fences, single spaces between words.
 */
export function formatResponse(text: string): string {
  return text
    .replace(/```[a-z]*\n?/gi, '')
    .replace(/^\s{0,3}#{1,6}\s+/gm, '')
    .replace(/^\s*(?:[-*+•]|\d+[.)])\s+/gm, '')
    .replace(/\*\*([^*]+)\*\*/g, '$1')
    .replace(/__([^_]+)__/g, '$1')
    .replace(/[*`]/g, '')
    .replace(/\s+/g, ' ')
    .trim();
}

export const __testing__ = { AzureOpenAIGenerator };
