import fs from 'node:fs';
import type { FastifyInstance, FastifyPluginAsync, FastifyReply } from 'fastify';
import { answerAndRecord, stringField } from './shared';

const UI_HTML = fs.readFileSync(new URL('../ui/index.html', import.meta.url), 'utf8');

function sendAudio(reply: FastifyReply, audio: Uint8Array, contentType: string) {
  reply.header('Content-Type', contentType);
  return reply.send(Buffer.from(audio));
}

const assistantRoutes: FastifyPluginAsync = async (app: FastifyInstance) => {
  app.get('/', async (_req, reply) => {
    reply.header('Content-Type', 'text/html; charset=utf-8');
    return reply.send(UI_HTML);
  });

  app.post('/text', async (req, reply) => {
    const userText = stringField(req.body, 'text');
    if (!userText) {
      return reply.status(400).send({ error: 'Missing text' });
    }
    const answer = await answerAndRecord(app, 'text', userText);
    return { text: answer.text };
  });

  app.post('/audio', async (req, reply) => {
    const file = req.isMultipart() ? await req.file() : undefined;
    const audio = file ? await file.toBuffer() : undefined;
    if (!file || !audio || audio.length === 0) {
      return reply.status(400).send({ error: 'Missing audio file' });
    }

    const transcript = await app.deps.stt().transcribe(audio, file.filename ?? '', file.mimetype);
    req.log.info({ transcript }, 'transcribed');
    const answer = await answerAndRecord(app, 'audio', transcript);

    const tts = app.deps.tts();
    const speech = await tts.synth(answer.text);
    return sendAudio(reply, speech, tts.contentType);
  });

  app.get('/tts', async (req, reply) => {
    const text = stringField(req.query, 'text');
    if (!text) {
      return reply.status(400).send({ error: 'Missing text' });
    }
    const tts = app.deps.tts();
    return sendAudio(reply, await tts.synth(text), tts.contentType);
  });

  app.get<{ Params: { mediaId: string } }>('/media/:mediaId', async (req, reply) => {
    const item = app.deps.whatsapp.media.get(req.params.mediaId);
    if (!item) {
      return reply.status(404).send({ error: 'Not found' });
    }
    return sendAudio(reply, item.buffer, item.contentType);
  });
};

export default assistantRoutes;
