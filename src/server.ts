// Process entrypoint: load settings and the lexicon, wire providers, listen.
// Keep routes thin; decision logic lives in src/lib/*.
import 'dotenv/config';
import { buildApp, lazy } from './app';
import { loadSettings } from './lib/env';
import { loadLexicon, type Lexicon } from './lib/lexicon';
import { formatResponse, makeGenerator } from './lib/llm';
import { connectMongo, pingMongo } from './lib/mongo';
import { loadKnowledgeBase } from './lib/rag';
import { makeSTT } from './lib/stt';
import { makeTTS } from './lib/tts';
import { WhatsAppClient } from './lib/whatsapp';
import { MongoInteractionRecorder, noopRecorder } from './lib/interactions';

const settings = loadSettings();

// A voice config without a system prompt is fatal: the process must not start.
function loadLexiconOrExit(): Lexicon {
  try {
    return loadLexicon(settings.VOICE_CONFIG_PATH, settings.RAG_DATA_PATH);
  } catch (err) {
    console.error('[startup] ' + (err instanceof Error ? err.message : String(err)));
    process.exit(1);
  }
}

const lexicon = loadLexiconOrExit();

const knowledgeBase = loadKnowledgeBase(settings.RAG_DATA_PATH);
const generator = lazy(() => makeGenerator(settings));

if (settings.MONGODB_URI) {
  try {
    await connectMongo(settings.MONGODB_URI);
  } catch (err) {
    console.error('[mongo] failed to connect: ' + (err instanceof Error ? err.message : String(err)));
    process.exit(1);
  }
}

const app = await buildApp({
  answer: {
    lexicon,
    retrieve: (query) => knowledgeBase?.buildContext(query) ?? '',
    generate: (userText, systemPrompt, context) => generator().generate(userText, systemPrompt, context),
    formatReply: formatResponse,
  },
  stt: lazy(() => makeSTT(settings)),
  tts: lazy(() => makeTTS(settings)),
  whatsapp: new WhatsAppClient(settings),
  recorder: settings.MONGODB_URI ? new MongoInteractionRecorder() : noopRecorder,
  verifyToken: settings.VERIFY_TOKEN,
  pingDb: settings.MONGODB_URI ? pingMongo : undefined,
});

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    app.log.info({ signal }, 'shutting down');
    app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        app.log.error(err);
        process.exit(1);
      },
    );
  });
}

app.listen({ port: settings.PORT, host: settings.HOST }).catch((err) => {
  app.log.error(err);
  process.exit(1);
});
