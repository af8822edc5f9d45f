import { IndexCounter, reserveSequence } from '../../models/IndexCounter';
import { IndexedChunk } from '../../models/IndexedChunk';
import { IndexedSource } from '../../models/IndexedSource';
import { KeyedMutex } from './keyedMutex';
import { RagError, describeError } from './errors';
import { decodeStoredChunks } from './storedChunk';
import type { ChunkMetadata, IndexEntry, ScoredChunk, SourceSummary } from './types';
import {
  assertDimension,
  assertEntriesFor,
  assertQueryDimension,
  groupBySource,
  rankBySimilarity,
  type RankCandidate,
  type VectorIndex,
} from './vectorIndex';

const SEQUENCE_COUNTER = 'indexed-chunk-sequence';
const REVISION_COUNTER = 'indexed-source-revision';

type WriteMode = 'merge' | 'replace';

interface ManifestFields {
  revision: number;
  chunkCount: number;
  dimension: number;
  metadata: ChunkMetadata;
}

const CHUNK_PROJECTION = {
  chunkId: 1,
  sourceId: 1,
  chunkIndex: 1,
  startOffset: 1,
  page: 1,
  text: 1,
  embedding: 1,
  metadata: 1,
  revision: 1,
  sequence: 1,
};

/**
 * MongoDB-backed index. Each write stores the complete chunk set of its source
 * under a fresh revision number, drawn from a counter that never goes back,
 * and is published by a compare-and-set on the source manifest. Readers switch
 * from the old chunks to the new ones in one step. Superseded revisions are
 * removed afterwards; a write that fails or loses the race removes its own.
 */
export class MongoVectorIndex implements VectorIndex {
  private readonly locks = new KeyedMutex();

  async upsert(entries: readonly IndexEntry[]): Promise<void> {
    for (const [sourceId, group] of groupBySource(entries)) {
      await this.locks.runExclusive(sourceId, () => this.writeRevision(sourceId, group, 'merge'));
    }
  }

  async replaceSource(sourceId: string, entries: readonly IndexEntry[]): Promise<void> {
    assertEntriesFor(sourceId, entries);
    await this.locks.runExclusive(sourceId, async () => {
      if (entries.length === 0) {
        await this.removeSource(sourceId);
        return;
      }
      await this.writeRevision(sourceId, entries, 'replace');
    });
  }

  async deleteBySource(sourceId: string): Promise<number> {
    return this.locks.runExclusive(sourceId, () => this.removeSource(sourceId));
  }

  async search(queryVector: readonly number[], k: number, minScore: number): Promise<ScoredChunk[]> {
    const manifests = await IndexedSource.find({}, { sourceId: 1, revision: 1, chunkCount: 1, dimension: 1 }).lean();
    if (manifests.length === 0) {
      return [];
    }

    const dimension = manifests[0].dimension;
    assertQueryDimension(queryVector, dimension);

    const published = new Map(manifests.map((manifest) => [manifest.sourceId, manifest.revision]));
    const expected = new Map(manifests.map((manifest) => [manifest.sourceId, manifest.chunkCount]));
    const records = await IndexedChunk.find(
      { $or: manifests.map((manifest) => ({ sourceId: manifest.sourceId, revision: manifest.revision })) },
      CHUNK_PROJECTION
    ).lean();

    const stored = new Map<string, number>();
    for (const record of records) {
      stored.set(record.sourceId, (stored.get(record.sourceId) ?? 0) + 1);
    }
    // A source superseded between the two reads has lost part of its published revision; leave all of it out.
    const complete = records.filter(
      (record) => (stored.get(record.sourceId) ?? 0) >= (expected.get(record.sourceId) ?? 0)
    );

    const { candidates, corrupt } = decodeStoredChunks(complete, published, dimension);
    for (const error of corrupt) {
      console.warn(`[rag:index] skipping entry: ${error.message}`);
    }

    return rankBySimilarity(queryVector, candidates, k, minScore);
  }

  async count(): Promise<number> {
    const manifests = await IndexedSource.find({}, { chunkCount: 1 }).lean();
    return manifests.reduce((total, manifest) => total + manifest.chunkCount, 0);
  }

  async listSources(): Promise<SourceSummary[]> {
    const manifests = await IndexedSource.find({}).sort({ sourceId: 1 }).lean();
    return manifests.map((manifest) => ({
      sourceId: manifest.sourceId,
      chunkCount: manifest.chunkCount,
      metadata: manifest.metadata ?? {},
      updatedAt: manifest.updatedAt,
    }));
  }

  async reset(): Promise<void> {
    console.warn('[rag:index] resetting index, all chunks will be deleted');
    await IndexedSource.deleteMany({});
    await IndexedChunk.deleteMany({});
    // The revision counter is kept so revision numbers are never reused.
    await IndexCounter.deleteMany({ name: SEQUENCE_COUNTER });
  }

  private async currentDimension(): Promise<number | null> {
    const manifest = await IndexedSource.findOne({}, { dimension: 1 }).lean();
    return manifest?.dimension ?? null;
  }

  private async removeSource(sourceId: string): Promise<number> {
    const manifest = await IndexedSource.findOneAndDelete({ sourceId }).lean();
    await IndexedChunk.deleteMany({ sourceId });
    return manifest?.chunkCount ?? 0;
  }

  private async readPublished(sourceId: string, revision: number, dimension: number): Promise<RankCandidate[]> {
    const records = await IndexedChunk.find({ sourceId, revision }, CHUNK_PROJECTION).lean();
    const { candidates, corrupt } = decodeStoredChunks(records, new Map([[sourceId, revision]]), dimension);
    for (const error of corrupt) {
      console.warn(`[rag:index] dropping entry from ${sourceId}: ${error.message}`);
    }
    return candidates;
  }

  private async readSequences(sourceId: string, revision: number, chunkIds: string[]): Promise<Map<string, number>> {
    const records = await IndexedChunk.find(
      { sourceId, revision, chunkId: { $in: chunkIds } },
      { chunkId: 1, sequence: 1 }
    ).lean();
    return new Map(records.map((record) => [record.chunkId, record.sequence]));
  }

  /**
   * Moves the manifest to `fields.revision` only if it still points at
   * `expected` (or is still absent), so concurrent writers cannot both win.
   */
  private async publish(sourceId: string, expected: number | null, fields: ManifestFields): Promise<boolean> {
    if (expected === null) {
      const result = await IndexedSource.updateOne({ sourceId }, { $setOnInsert: fields }, { upsert: true });
      return result.upsertedCount === 1;
    }
    const result = await IndexedSource.updateOne({ sourceId, revision: expected }, { $set: fields });
    return result.matchedCount === 1;
  }

  private async discardRevision(sourceId: string, revision: number): Promise<void> {
    try {
      await IndexedChunk.deleteMany({ sourceId, revision });
    } catch (error) {
      // What is left is never published, so it stays invisible.
      console.error(`[rag:index] could not discard revision ${revision} of ${sourceId}:`, describeError(error));
    }
  }

  private async writeRevision(sourceId: string, group: readonly IndexEntry[], mode: WriteMode): Promise<void> {
    const dimension = assertDimension(group, await this.currentDimension());
    if (dimension === null) {
      return;
    }

    // Last write wins when a batch repeats a chunk id.
    const incoming = [...new Map(group.map((entry) => [entry.chunkId, entry])).values()];
    const chunkIds = incoming.map((entry) => entry.chunkId);

    const manifest = await IndexedSource.findOne({ sourceId }).lean();
    const current = manifest && mode === 'merge' ? await this.readPublished(sourceId, manifest.revision, dimension) : [];
    const sequences =
      manifest && mode === 'replace'
        ? await this.readSequences(sourceId, manifest.revision, chunkIds)
        : new Map(current.map((candidate) => [candidate.entry.chunkId, candidate.sequence]));

    // Reserved after the manifest read: a write that saw a newer manifest always gets a higher revision.
    const revision = (await reserveSequence(REVISION_COUNTER, 1)) + 1;

    const fresh = chunkIds.filter((chunkId) => !sequences.has(chunkId));
    let nextSequence = await reserveSequence(SEQUENCE_COUNTER, fresh.length);
    for (const chunkId of fresh) {
      sequences.set(chunkId, nextSequence);
      nextSequence += 1;
    }

    const replaced = new Set(chunkIds);
    const staged: RankCandidate[] = [
      ...current.filter((candidate) => !replaced.has(candidate.entry.chunkId)),
      ...incoming.map((entry) => ({ entry, sequence: sequences.get(entry.chunkId) ?? 0 })),
    ];
    const metadata = mode === 'merge' && manifest ? manifest.metadata : incoming[0]?.metadata ?? {};

    try {
      await IndexedChunk.bulkWrite(
        staged.map(({ entry, sequence }) => ({
          updateOne: {
            filter: { chunkId: entry.chunkId, revision },
            update: {
              $set: {
                sourceId,
                chunkIndex: entry.chunkIndex,
                startOffset: entry.startOffset,
                page: entry.page,
                text: entry.text,
                embedding: entry.vector,
                metadata: entry.metadata,
                sequence,
              },
            },
            upsert: true,
          },
        })),
        { ordered: false }
      );

      const published = await this.publish(sourceId, manifest?.revision ?? null, {
        revision,
        chunkCount: staged.length,
        dimension,
        metadata,
      });
      if (!published) {
        throw new RagError('WriteConflict', `Source ${sourceId} was changed by another writer; retry the write`, {
          retryable: true,
        });
      }
    } catch (error) {
      await this.discardRevision(sourceId, revision);
      throw error;
    }

    await IndexedChunk.deleteMany({ sourceId, revision: { $lt: revision } });

    console.log(`[rag:index] ${sourceId} -> revision ${revision}, ${staged.length} chunks`);
  }
}
