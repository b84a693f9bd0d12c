import axios from 'axios';

/** Raised at startup when the voice configuration cannot be used. */
export class LexiconError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LexiconError';
  }
}

/** A call to an external provider (speech, LLM, messaging) failed. */
export class UpstreamError extends Error {
  readonly provider: string;
  readonly status?: number;

  constructor(provider: string, message: string, status?: number) {
    super(`${provider}: ${message}`);
    this.name = 'UpstreamError';
    this.provider = provider;
    this.status = status;
  }
}

export function toUpstreamError(provider: string, error: unknown): UpstreamError {
  if (error instanceof UpstreamError) return error;
  if (axios.isAxiosError(error)) {
    if (process.env.NODE_ENV !== 'test') {
      console.error(`[${provider}] HTTP error:`, {
        status: error.response?.status,
        statusText: error.response?.statusText,
        data: describeBody(error.response?.data),
      });
    }
    return new UpstreamError(provider, error.message, error.response?.status);
  }
  return new UpstreamError(provider, error instanceof Error ? error.message : String(error));
}

function describeBody(data: unknown): unknown {
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8');
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  return data;
}
