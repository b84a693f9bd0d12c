import type { FastifyInstance, FastifyPluginAsync } from 'fastify';
import { parseMessage, webhookPhoneNumberId, type InboundMessage } from '../lib/whatsapp';
import { answerAndRecord, stringField } from './shared';

async function handleMessage(app: FastifyInstance, msg: InboundMessage): Promise<void> {
  const { whatsapp, stt, tts } = app.deps;

  let userText: string;
  if (msg.type === 'text') {
    userText = msg.text;
  } else {
    const audio = await whatsapp.downloadMedia(msg.mediaId);
    userText = await stt().transcribe(audio, 'audio', msg.mediaType);
  }

  const answer = await answerAndRecord(app, 'whatsapp', userText);
  const recipient = whatsapp.recipientFor(msg.from);
  await whatsapp.replyText(recipient, answer.text);

  const engine = tts();
  const speech = await engine.synth(answer.text);
  await whatsapp.replyAudio(recipient, speech, engine.contentType);
}

const whatsappRoutes: FastifyPluginAsync = async (app: FastifyInstance) => {
  // Meta retries deliveries that do not get a 200, so a body that is not
  // JSON is acknowledged like any other event instead of rejected.
  app.removeContentTypeParser('application/json');
  app.addContentTypeParser('application/json', { parseAs: 'string' }, (_req, body, done) => {
    try {
      done(null, JSON.parse(String(body)));
    } catch {
      done(null, undefined);
    }
  });

  app.get('/webhook', async (req, reply) => {
    const mode = stringField(req.query, 'hub.mode');
    const token = stringField(req.query, 'hub.verify_token');
    const challenge = stringField(req.query, 'hub.challenge');
    const expected = app.deps.verifyToken;

    reply.header('Content-Type', 'text/plain');
    if (mode === 'subscribe' && expected && token === expected && challenge) {
      return reply.send(challenge);
    }
    return reply.status(403).send('Forbidden');
  });

  app.post('/webhook', async (req) => {
    const payload = req.body;
    req.log.info({ payload }, 'webhook payload');

    const msg = parseMessage(payload);
    if (!msg) return { ok: true };

    req.log.info({ from: msg.from, phone_number_id: webhookPhoneNumberId(payload) }, 'webhook meta');
    app.tasks.enqueue(`whatsapp-${msg.type}`, () => handleMessage(app, msg));
    return { ok: true };
  });

  app.get('/whatsapp/diagnose', async (req) => {
    const report: Record<string, unknown> = app.deps.whatsapp.diagnose();
    if (stringField(req.query, 'check_token') === 'true') {
      try {
        report.token_debug = await app.deps.whatsapp.debugAccessToken();
      } catch (error) {
        report.token_debug_error = error instanceof Error ? error.message : String(error);
      }
    }
    return report;
  });

  app.post('/whatsapp/push', async (req, reply) => {
    const text = stringField(req.body, 'text');
    const to = stringField(req.body, 'to') || undefined;
    if (!text) {
      return reply.status(400).send({ error: 'Missing text' });
    }
    await app.deps.whatsapp.pushText(text, to);
    return { ok: true };
  });
};

export default whatsappRoutes;
