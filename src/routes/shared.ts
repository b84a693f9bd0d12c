import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { decideReply, type Reply } from '../lib/decide';
import type { Channel } from '../lib/interactions';

const fieldsSchema = z.record(z.unknown());

/** A string field of a JSON or form body, trimmed; '' when missing or not text. */
export function stringField(body: unknown, key: string): string {
  const parsed = fieldsSchema.safeParse(body);
  if (!parsed.success) return '';
  const value = parsed.data[key];
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number') return String(value);
  return '';
}

/** Answers one user turn and records it in the background. */
export async function answerAndRecord(app: FastifyInstance, channel: Channel, userText: string): Promise<Reply> {
  const reply = await decideReply(userText, app.deps.answer);
  app.log.info(
    { channel, mode: reply.mode, product: reply.understanding?.productName, intent: reply.understanding?.intent },
    'answered',
  );
  app.tasks.enqueue('record-interaction', () => app.deps.recorder.record({ channel, userText, reply }));
  return reply;
}
