import { Document, Schema, model } from 'mongoose';

/** Questions asked by one user on one UTC day (`YYYY-MM-DD`). */
export interface UsageRecordDocument extends Document {
  userId: string;
  day: string;
  count: number;
  createdAt: Date;
  updatedAt: Date;
}

const usageRecordSchema = new Schema<UsageRecordDocument>(
  {
    userId: {
      type: String,
      required: true,
      index: true,
    },
    day: {
      type: String,
      required: true,
      match: /^\d{4}-\d{2}-\d{2}$/,
    },
    count: {
      type: Number,
      required: true,
      min: 0,
    },
  },
  {
    timestamps: true,
  }
);

usageRecordSchema.index({ userId: 1, day: 1 }, { unique: true });

export const UsageRecord = model<UsageRecordDocument>('UsageRecord', usageRecordSchema);
