export type MetadataValue = string | number | boolean | null;
export type ChunkMetadata = Record<string, MetadataValue>;

export interface SourceDocument {
  sourceId: string;
  text: string;
  metadata: ChunkMetadata;
}

export interface Chunk {
  chunkId: string;
  sourceId: string;
  chunkIndex: number;
  /** Offset of the first character of `text` in the source document. */
  startOffset: number;
  /** Number of leading characters shared with the previous chunk. */
  overlapLen: number;
  /** 1-based page, counted from form-feed page breaks before `startOffset`. */
  page: number;
  text: string;
  metadata: ChunkMetadata;
}

export interface IndexEntry {
  chunkId: string;
  sourceId: string;
  chunkIndex: number;
  startOffset: number;
  page: number;
  text: string;
  vector: number[];
  metadata: ChunkMetadata;
}

export interface ScoredChunk {
  chunkId: string;
  sourceId: string;
  chunkIndex: number;
  startOffset: number;
  page: number;
  text: string;
  metadata: ChunkMetadata;
  score: number;
}

export interface SourceSummary {
  sourceId: string;
  chunkCount: number;
  metadata: ChunkMetadata;
  updatedAt: Date;
}

export interface ConversationTurn {
  question: string;
  answer: string;
  timestamp: Date;
}

export function chunkIdFor(sourceId: string, chunkIndex: number): string {
  return `${sourceId}:${chunkIndex}`;
}
