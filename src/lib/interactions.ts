import Interaction from '../models/Interaction';
import type { Reply } from './decide';

export type Channel = 'text' | 'audio' | 'whatsapp';

export interface InteractionRecord {
  channel: Channel;
  userText: string;
  reply: Reply;
}

export interface InteractionRecorder {
  record(entry: InteractionRecord): Promise<void>;
}

export class MongoInteractionRecorder implements InteractionRecorder {
  async record({ channel, userText, reply }: InteractionRecord): Promise<void> {
    await Interaction.create({
      channel,
      userText,
      normalizedText: reply.understanding?.normalizedText,
      product: reply.understanding?.productName,
      intent: reply.understanding?.intent,
      mode: reply.mode,
      reply: reply.text,
    });
  }
}

export const noopRecorder: InteractionRecorder = {
  record: async () => undefined,
};
