import { Document, Schema, model } from 'mongoose';

export interface IndexCounterDocument extends Document {
  name: string;
  value: number;
}

const indexCounterSchema = new Schema<IndexCounterDocument>({
  name: {
    type: String,
    required: true,
    unique: true,
  },
  value: {
    type: Number,
    default: 0,
  },
});

export const IndexCounter = model<IndexCounterDocument>('IndexCounter', indexCounterSchema);

/** Reserves `count` consecutive values and returns the first one. */
export async function reserveSequence(name: string, count: number): Promise<number> {
  if (count <= 0) {
    return 0;
  }
  const counter = await IndexCounter.findOneAndUpdate(
    { name },
    { $inc: { value: count } },
    { upsert: true, new: true }
  ).lean();
  const value = counter?.value ?? count;
  return value - count;
}
