import { Document, Schema, model } from 'mongoose';
import type { ChunkMetadata } from '../services/rag/types';

export interface IndexedChunkDocument extends Document {
  chunkId: string;
  sourceId: string;
  chunkIndex: number;
  startOffset: number;
  page: number;
  text: string;
  embedding: number[];
  metadata: ChunkMetadata;
  /** Write generation; only the revision published on the source manifest is searchable. */
  revision: number;
  sequence: number;
  createdAt: Date;
  updatedAt: Date;
}

const indexedChunkSchema = new Schema<IndexedChunkDocument>(
  {
    chunkId: {
      type: String,
      required: true,
      trim: true,
    },
    sourceId: {
      type: String,
      required: true,
      trim: true,
    },
    chunkIndex: {
      type: Number,
      required: true,
      min: 0,
    },
    startOffset: {
      type: Number,
      required: true,
      min: 0,
    },
    page: {
      type: Number,
      default: 1,
      min: 1,
    },
    text: {
      type: String,
      required: true,
    },
    embedding: {
      type: [Number],
      default: [],
    },
    metadata: {
      type: Schema.Types.Mixed,
      default: {},
    },
    revision: {
      type: Number,
      required: true,
      min: 1,
    },
    sequence: {
      type: Number,
      required: true,
      min: 0,
    },
  },
  {
    timestamps: true,
    minimize: false,
  }
);

indexedChunkSchema.index({ chunkId: 1, revision: 1 }, { unique: true });
indexedChunkSchema.index({ sourceId: 1, revision: 1 });

export const IndexedChunk = model<IndexedChunkDocument>('IndexedChunk', indexedChunkSchema);
