import { beforeEach, describe, expect, it } from 'vitest';
import { isRagError } from './errors';
import { MemoryVectorIndex } from './memoryVectorIndex';
import type { IndexEntry } from './types';

function entry(sourceId: string, chunkIndex: number, vector: number[], text = `${sourceId} chunk ${chunkIndex}`): IndexEntry {
  return {
    chunkId: `${sourceId}:${chunkIndex}`,
    sourceId,
    chunkIndex,
    startOffset: chunkIndex * 10,
    page: 1,
    text,
    vector,
    metadata: { title: sourceId },
  };
}

describe('MemoryVectorIndex', () => {
  let index: MemoryVectorIndex;

  beforeEach(() => {
    index = new MemoryVectorIndex();
  });

  it('returns at most k results above the floor, best first', async () => {
    await index.upsert([entry('a', 0, [1, 0]), entry('a', 1, [0.6, 0.8]), entry('a', 2, [0, 1]), entry('a', 3, [-1, 0])]);

    const results = await index.search([1, 0], 2, 0);
    expect(results.map((result) => result.chunkId)).toEqual(['a:0', 'a:1']);
    expect(results[0].score).toBeCloseTo(1, 10);
    expect(results[1].score).toBeCloseTo(0.6, 10);

    const floored = await index.search([1, 0], 10, 0);
    expect(floored.map((result) => result.chunkId)).toEqual(['a:0', 'a:1', 'a:2']);
  });

  it('includes entries scoring exactly the minimum', async () => {
    await index.upsert([entry('a', 0, [0.6, 0.8])]);
    const results = await index.search([1, 0], 5, 0.6);
    expect(results).toHaveLength(1);
  });

  it('returns nothing for k of zero', async () => {
    await index.upsert([entry('a', 0, [1, 0])]);
    expect(await index.search([1, 0], 0, -1)).toEqual([]);
  });

  it('breaks score ties by insertion order', async () => {
    await index.upsert([entry('b', 0, [1, 0])]);
    await index.upsert([entry('a', 0, [2, 0])]);
    await index.upsert([entry('c', 0, [3, 0])]);

    const results = await index.search([1, 0], 3, 0);
    expect(results.map((result) => result.chunkId)).toEqual(['b:0', 'a:0', 'c:0']);
  });

  it('keeps the original position when an entry is overwritten', async () => {
    await index.upsert([entry('a', 0, [1, 0]), entry('b', 0, [1, 0])]);
    await index.upsert([entry('a', 0, [1, 0], 'rewritten')]);

    const results = await index.search([1, 0], 5, 0);
    expect(results.map((result) => result.chunkId)).toEqual(['a:0', 'b:0']);
    expect(results[0].text).toBe('rewritten');
    expect(await index.count()).toBe(2);
  });

  it('is idempotent for repeated upserts of the same entries', async () => {
    const entries = [entry('a', 0, [1, 0]), entry('a', 1, [0, 1])];
    await index.upsert(entries);
    await index.upsert(entries);

    expect(await index.count()).toBe(2);
    expect(await index.listSources()).toEqual([
      expect.objectContaining({ sourceId: 'a', chunkCount: 2, metadata: { title: 'a' } }),
    ]);
  });

  it('replaces every chunk of a source at once', async () => {
    await index.upsert([entry('a', 0, [1, 0]), entry('a', 1, [1, 0]), entry('a', 2, [1, 0]), entry('b', 0, [0, 1])]);
    await index.replaceSource('a', [entry('a', 0, [0, 1], 'new first')]);

    expect(await index.count()).toBe(2);
    const results = await index.search([0, 1], 5, 0.5);
    expect(results.map((result) => result.chunkId)).toEqual(['a:0', 'b:0']);
    expect(results[0].text).toBe('new first');
  });

  it('removes a source replaced with no entries', async () => {
    await index.upsert([entry('a', 0, [1, 0])]);
    await index.replaceSource('a', []);

    expect(await index.count()).toBe(0);
    expect(await index.listSources()).toEqual([]);
  });

  it('rejects replacement entries from another source', async () => {
    await expect(index.replaceSource('a', [entry('b', 0, [1, 0])])).rejects.toSatisfy((error: unknown) =>
      isRagError(error, 'InvalidConfig')
    );
  });

  it('deletes by source and reports the removed count', async () => {
    await index.upsert([entry('a', 0, [1, 0]), entry('a', 1, [1, 0]), entry('b', 0, [1, 0])]);

    expect(await index.deleteBySource('a')).toBe(2);
    expect(await index.deleteBySource('a')).toBe(0);
    expect(await index.count()).toBe(1);
    expect((await index.search([1, 0], 5, 0)).map((result) => result.sourceId)).toEqual(['b']);
  });

  it('lists sources sorted by id', async () => {
    await index.upsert([entry('zeta', 0, [1, 0]), entry('alpha', 1, [1, 0]), entry('alpha', 0, [1, 0])]);

    const sources = await index.listSources();
    expect(sources.map((source) => [source.sourceId, source.chunkCount])).toEqual([
      ['alpha', 2],
      ['zeta', 1],
    ]);
  });

  it('rejects vectors of a different dimension until reset', async () => {
    await index.upsert([entry('a', 0, [1, 0])]);

    await expect(index.upsert([entry('b', 0, [1, 0, 0])])).rejects.toSatisfy((error: unknown) =>
      isRagError(error, 'InvalidConfig')
    );
    await expect(index.search([1, 0, 0], 1, 0)).rejects.toSatisfy((error: unknown) =>
      isRagError(error, 'InvalidConfig')
    );

    await index.reset();
    expect(await index.count()).toBe(0);
    await index.upsert([entry('b', 0, [1, 0, 0])]);
    expect(await index.count()).toBe(1);
  });

  it('does not share vectors with the caller', async () => {
    const vector = [1, 0];
    await index.upsert([entry('a', 0, vector)]);
    vector[0] = -1;

    const [result] = await index.search([1, 0], 1, 0);
    expect(result.score).toBeCloseTo(1, 10);
  });
});
