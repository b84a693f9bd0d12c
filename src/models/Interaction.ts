import { Schema, model, type InferSchemaType } from 'mongoose';

const InteractionSchema = new Schema({
  channel: { type: String, enum: ['text', 'audio', 'whatsapp'], required: true },
  userText: String,
  normalizedText: String,
  product: String,
  intent: String,
  mode: { type: String, enum: ['greeting', 'fallback', 'generated'], required: true },
  reply: { type: String, required: true },
}, { timestamps: true });

export type InteractionDoc = InferSchemaType<typeof InteractionSchema>;

export default model('Interaction', InteractionSchema);
