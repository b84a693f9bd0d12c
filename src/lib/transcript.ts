export type Speaker = 'USER' | 'ASSISTANT';

export interface Turn {
  speaker: Speaker;
  timestamp: string;
  text: string;
}

function normSpeaker(label: string): Speaker | null {
  const l = label.trim().toLowerCase();
  if (l === 'user' || l === 'caller' || l === 'customer') return 'USER';
  if (l === 'assistant' || l === 'agent' || l === 'bot') return 'ASSISTANT';
  return null;
}

/**
 * Splits a call transcript into turns. Accepts `[USER 00:01] text`,
 * `[USER] text` and `USER: text`; any other line continues the previous turn.
 */
export function parseTranscript(raw: string): Turn[] {
  const turns: Turn[] = [];
  for (const rawLine of raw.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line) continue;

    const match =
      line.match(/^\[(?<sp>[^\]\s:]+)\s+(?<ts>\d{1,2}:\d{2}(?::\d{2})?)\]\s*(?<tx>.*)$/) ??
      line.match(/^\[(?<sp>[^\]\s:]+)\]\s*(?<tx>.*)$/) ??
      line.match(/^(?<sp>[^:]+):\s*(?<tx>.*)$/);
    const speaker = match?.groups ? normSpeaker(match.groups.sp) : null;
    if (match?.groups && speaker) {
      turns.push({ speaker, timestamp: match.groups.ts ?? '', text: match.groups.tx.trim() });
      continue;
    }

    const last = turns[turns.length - 1];
    if (last) {
      last.text = `${last.text} ${line}`.trim();
    } else {
      turns.push({ speaker: 'USER', timestamp: '', text: line });
    }
  }
  return turns;
}
