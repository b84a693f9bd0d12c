// Runs every user turn of a transcript through the understanding pipeline and
// prints what the assistant would search for, or say without retrieval.
//   tsx scripts/replay-transcript.ts --file calls/sample.txt
import 'dotenv/config';
import fs from 'node:fs';
import { fallbackFor, isGreeting, understand } from '../src/lib/decide';
import { loadSettings } from '../src/lib/env';
import { loadLexicon } from '../src/lib/lexicon';
import { parseTranscript } from '../src/lib/transcript';

function exitWith(code: number, msg?: string): never {
  if (msg) console.error(msg);
  process.exit(code);
}

function parseArgs(): { file: string } {
  const argv = process.argv;
  const fileIdx = argv.indexOf('--file');
  const file = fileIdx !== -1 ? argv[fileIdx + 1] : undefined;
  if (!file) exitWith(2, 'Usage: tsx scripts/replay-transcript.ts --file <path>');
  return { file };
}

function main() {
  const { file } = parseArgs();
  if (!fs.existsSync(file)) exitWith(2, `File not found: ${file}`);

  const settings = loadSettings();
  const lexicon = loadLexicon(settings.VOICE_CONFIG_PATH, settings.RAG_DATA_PATH);
  const turns = parseTranscript(fs.readFileSync(file, 'utf8')).filter((t) => t.speaker === 'USER');

  const rows = turns.map((turn) => {
    if (isGreeting(turn.text)) {
      return { timestamp: turn.timestamp, text: turn.text, greeting: true };
    }
    const understanding = understand(turn.text, lexicon);
    return {
      timestamp: turn.timestamp,
      text: turn.text,
      ...understanding,
      fallback: fallbackFor(understanding, lexicon),
    };
  });

  console.log(JSON.stringify(rows, null, 2));
}

try {
  main();
} catch (err) {
  exitWith(1, `Fatal error: ${err instanceof Error ? err.message : String(err)}`);
}
