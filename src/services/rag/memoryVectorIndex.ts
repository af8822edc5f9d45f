import {
  assertDimension,
  assertEntriesFor,
  assertQueryDimension,
  groupBySource,
  rankBySimilarity,
  type RankCandidate,
  type VectorIndex,
} from './vectorIndex';
import type { IndexEntry, ScoredChunk, SourceSummary } from './types';

interface StoredEntry {
  entry: IndexEntry;
  sequence: number;
}

interface SourceState {
  chunkIds: Set<string>;
  updatedAt: Date;
}

/**
 * In-process index. Every mutation is applied synchronously between two
 * awaits, so searches never observe a half-written source. Nothing survives
 * the process.
 */
export class MemoryVectorIndex implements VectorIndex {
  private readonly entries = new Map<string, StoredEntry>();
  private readonly sources = new Map<string, SourceState>();
  private dimension: number | null = null;
  private nextSequence = 0;

  async upsert(entries: readonly IndexEntry[]): Promise<void> {
    this.dimension = assertDimension(entries, this.dimension);
    for (const [sourceId, group] of groupBySource(entries)) {
      this.write(sourceId, group);
    }
  }

  async replaceSource(sourceId: string, entries: readonly IndexEntry[]): Promise<void> {
    assertEntriesFor(sourceId, entries);
    this.dimension = assertDimension(entries, this.dimension);
    const keep = new Set(entries.map((entry) => entry.chunkId));
    const state = this.sources.get(sourceId);
    if (state) {
      for (const chunkId of state.chunkIds) {
        if (!keep.has(chunkId)) {
          this.entries.delete(chunkId);
          state.chunkIds.delete(chunkId);
        }
      }
    }
    if (entries.length === 0) {
      this.sources.delete(sourceId);
      return;
    }
    this.write(sourceId, entries);
  }

  async deleteBySource(sourceId: string): Promise<number> {
    const state = this.sources.get(sourceId);
    if (!state) {
      return 0;
    }
    for (const chunkId of state.chunkIds) {
      this.entries.delete(chunkId);
    }
    this.sources.delete(sourceId);
    return state.chunkIds.size;
  }

  async search(queryVector: readonly number[], k: number, minScore: number): Promise<ScoredChunk[]> {
    assertQueryDimension(queryVector, this.dimension);
    const candidates: RankCandidate[] = [...this.entries.values()];
    return rankBySimilarity(queryVector, candidates, k, minScore);
  }

  async count(): Promise<number> {
    return this.entries.size;
  }

  async listSources(): Promise<SourceSummary[]> {
    const summaries: SourceSummary[] = [];
    for (const [sourceId, state] of this.sources) {
      const first = [...state.chunkIds]
        .map((chunkId) => this.entries.get(chunkId)?.entry)
        .filter((entry): entry is IndexEntry => entry !== undefined)
        .sort((a, b) => a.chunkIndex - b.chunkIndex)[0];
      summaries.push({
        sourceId,
        chunkCount: state.chunkIds.size,
        metadata: first ? { ...first.metadata } : {},
        updatedAt: state.updatedAt,
      });
    }
    return summaries.sort((a, b) => a.sourceId.localeCompare(b.sourceId));
  }

  async reset(): Promise<void> {
    this.entries.clear();
    this.sources.clear();
    this.dimension = null;
  }

  private write(sourceId: string, entries: readonly IndexEntry[]): void {
    const state = this.sources.get(sourceId) ?? { chunkIds: new Set<string>(), updatedAt: new Date() };
    for (const entry of entries) {
      const existing = this.entries.get(entry.chunkId);
      if (existing && existing.entry.sourceId !== sourceId) {
        const previousOwner = this.sources.get(existing.entry.sourceId);
        previousOwner?.chunkIds.delete(entry.chunkId);
        if (previousOwner?.chunkIds.size === 0) {
          this.sources.delete(existing.entry.sourceId);
        }
      }
      this.entries.set(entry.chunkId, {
        entry: { ...entry, vector: [...entry.vector], metadata: { ...entry.metadata } },
        sequence: existing?.sequence ?? this.nextSequence++,
      });
      state.chunkIds.add(entry.chunkId);
    }
    state.updatedAt = new Date();
    this.sources.set(sourceId, state);
  }
}
