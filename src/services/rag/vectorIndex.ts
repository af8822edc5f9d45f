import { RagError } from './errors';
import { cosineSimilarity } from './textUtils';
import type { IndexEntry, ScoredChunk, SourceSummary } from './types';

/**
 * Persistent map of chunk id to (vector, text, metadata).
 *
 * Writes are serialized per source and become visible all at once: a search
 * sees either none or all of the chunks written by one `upsert` or
 * `replaceSource` call for a given source. Scores are cosine similarities, so
 * they are only comparable between vectors of the same embedding model.
 */
export interface VectorIndex {
  /** Inserts or overwrites entries by chunk id. */
  upsert(entries: readonly IndexEntry[]): Promise<void>;
  /** Swaps every chunk of `sourceId` for `entries` in one visible step. */
  replaceSource(sourceId: string, entries: readonly IndexEntry[]): Promise<void>;
  /** Returns the number of chunks removed. */
  deleteBySource(sourceId: string): Promise<number>;
  /** At most `k` entries with `score >= minScore`, by descending score, ties in insertion order. */
  search(queryVector: readonly number[], k: number, minScore: number): Promise<ScoredChunk[]>;
  count(): Promise<number>;
  listSources(): Promise<SourceSummary[]>;
  /** Drops every entry and all source metadata. Irreversible. */
  reset(): Promise<void>;
}

export interface RankCandidate {
  entry: IndexEntry;
  /** Insertion order of the chunk id; ties are broken by it. */
  sequence: number;
}

export function rankBySimilarity(
  queryVector: readonly number[],
  candidates: Iterable<RankCandidate>,
  k: number,
  minScore: number
): ScoredChunk[] {
  const limit = Number.isFinite(k) ? Math.max(0, Math.floor(k)) : 0;
  if (limit === 0) {
    return [];
  }
  const floor = Number.isNaN(minScore) ? -1 : minScore;

  const scored: Array<{ chunk: ScoredChunk; sequence: number }> = [];
  for (const { entry, sequence } of candidates) {
    const score = cosineSimilarity(queryVector, entry.vector);
    if (score < floor) {
      continue;
    }
    scored.push({
      sequence,
      chunk: {
        chunkId: entry.chunkId,
        sourceId: entry.sourceId,
        chunkIndex: entry.chunkIndex,
        startOffset: entry.startOffset,
        page: entry.page,
        text: entry.text,
        metadata: { ...entry.metadata },
        score,
      },
    });
  }

  scored.sort((a, b) => b.chunk.score - a.chunk.score || a.sequence - b.sequence);
  return scored.slice(0, limit).map((item) => item.chunk);
}

export function groupBySource(entries: readonly IndexEntry[]): Map<string, IndexEntry[]> {
  const groups = new Map<string, IndexEntry[]>();
  for (const entry of entries) {
    const group = groups.get(entry.sourceId);
    if (group) {
      group.push(entry);
    } else {
      groups.set(entry.sourceId, [entry]);
    }
  }
  return groups;
}

export function assertEntriesFor(sourceId: string, entries: readonly IndexEntry[]): void {
  const stray = entries.find((entry) => entry.sourceId !== sourceId);
  if (stray) {
    throw new RagError(
      'InvalidConfig',
      `Entry ${stray.chunkId} belongs to source ${stray.sourceId}, not ${sourceId}`
    );
  }
}

/**
 * Returns the dimension shared by `entries`, checked against `expected` when
 * the index already holds vectors.
 */
export function assertDimension(entries: readonly IndexEntry[], expected: number | null): number | null {
  let dimension = expected;
  for (const entry of entries) {
    if (entry.vector.length === 0) {
      throw new RagError('InvalidConfig', `Entry ${entry.chunkId} has an empty vector`);
    }
    if (dimension === null) {
      dimension = entry.vector.length;
    } else if (entry.vector.length !== dimension) {
      throw new RagError(
        'InvalidConfig',
        `Entry ${entry.chunkId} has ${entry.vector.length} dimensions, index expects ${dimension}; re-ingest after changing the embedding model`
      );
    }
  }
  return dimension;
}

export function assertQueryDimension(queryVector: readonly number[], expected: number | null): void {
  if (expected !== null && queryVector.length !== expected) {
    throw new RagError(
      'InvalidConfig',
      `Query vector has ${queryVector.length} dimensions, index expects ${expected}`
    );
  }
}
