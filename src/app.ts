import Fastify, { type FastifyServerOptions } from 'fastify';
import formbody from '@fastify/formbody';
import multipart from '@fastify/multipart';
import type { AnswerContext } from './lib/decide';
import { UpstreamError } from './lib/errors';
import type { InteractionRecorder } from './lib/interactions';
import type { STTEngine } from './lib/stt';
import { TaskQueue } from './lib/tasks';
import type { TTSEngine } from './lib/tts';
import type { WhatsAppClient } from './lib/whatsapp';
import assistantRoutes from './routes/assistant';
import healthRoutes from './routes/health';
import whatsappRoutes from './routes/whatsapp';

const MAX_AUDIO_BYTES = 10 * 1024 * 1024;

export interface AppDeps {
  answer: AnswerContext;
  // Provider adapters are created on first use so the server can start
  // without every credential configured.
  stt: () => STTEngine;
  tts: () => TTSEngine;
  whatsapp: WhatsAppClient;
  recorder: InteractionRecorder;
  verifyToken?: string;
  pingDb?: () => Promise<{ ok: boolean; error?: string }>;
}

declare module 'fastify' {
  interface FastifyInstance {
    deps: AppDeps;
    tasks: TaskQueue;
  }
}

export function lazy<T>(make: () => T): () => T {
  let value: T | undefined;
  return () => {
    if (value === undefined) value = make();
    return value;
  };
}

export async function buildApp(deps: AppDeps, options: FastifyServerOptions = { logger: true }) {
  const app = Fastify(options);
  app.decorate('deps', deps);
  app.decorate('tasks', new TaskQueue(app.log));

  await app.register(formbody);
  await app.register(multipart, { limits: { fileSize: MAX_AUDIO_BYTES, files: 1 } });

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof UpstreamError) {
      request.log.error({ err: error, provider: error.provider, status: error.status }, 'upstream failure');
      return reply.status(502).send({ error: 'Upstream service failed', provider: error.provider });
    }
    const status = error.statusCode ?? 500;
    if (status >= 500) request.log.error({ err: error }, 'request failed');
    return reply.status(status).send({ error: status >= 500 ? 'Internal Server Error' : error.message });
  });

  app.addHook('onClose', async () => {
    await app.tasks.drain();
  });

  await app.register(healthRoutes, { prefix: '/health' });
  await app.register(assistantRoutes);
  await app.register(whatsappRoutes);

  return app;
}
