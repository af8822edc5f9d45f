import { Document, Schema, model } from 'mongoose';
import type { ChunkMetadata } from '../services/rag/types';

/**
 * One manifest per ingested source. Only chunks stored under `revision` are
 * visible; publishing a new revision is a single-document write.
 */
export interface IndexedSourceDocument extends Document {
  sourceId: string;
  revision: number;
  chunkCount: number;
  dimension: number;
  metadata: ChunkMetadata;
  createdAt: Date;
  updatedAt: Date;
}

const indexedSourceSchema = new Schema<IndexedSourceDocument>(
  {
    sourceId: {
      type: String,
      required: true,
      unique: true,
      trim: true,
    },
    revision: {
      type: Number,
      required: true,
      min: 1,
    },
    chunkCount: {
      type: Number,
      required: true,
      min: 0,
    },
    dimension: {
      type: Number,
      required: true,
      min: 1,
    },
    metadata: {
      type: Schema.Types.Mixed,
      default: {},
    },
  },
  {
    timestamps: true,
    minimize: false,
  }
);

export const IndexedSource = model<IndexedSourceDocument>('IndexedSource', indexedSourceSchema);
