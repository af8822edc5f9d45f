import { describe, expect, it } from 'vitest';
import { decodeStoredChunks } from './storedChunk';

function record(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    chunkId: 'guide:0',
    sourceId: 'guide',
    chunkIndex: 0,
    startOffset: 0,
    page: 1,
    text: 'Install the package first.',
    embedding: [0.6, 0.8],
    metadata: { title: 'Guide' },
    revision: 1,
    sequence: 0,
    ...overrides,
  };
}

const published = new Map<string, number>([['guide', 1]]);

describe('decodeStoredChunks', () => {
  it('decodes readable records into search candidates', () => {
    const { candidates, corrupt } = decodeStoredChunks([record()], published, 2);

    expect(corrupt).toEqual([]);
    expect(candidates).toEqual([
      {
        sequence: 0,
        entry: {
          chunkId: 'guide:0',
          sourceId: 'guide',
          chunkIndex: 0,
          startOffset: 0,
          page: 1,
          text: 'Install the package first.',
          vector: [0.6, 0.8],
          metadata: { title: 'Guide' },
        },
      },
    ]);
  });

  it('reports unreadable records and keeps the rest', () => {
    const records = [
      record({ chunkId: 'guide:0', embedding: 'not-a-vector' }),
      record({ chunkId: 'guide:1', chunkIndex: 1, sequence: 1 }),
      null,
    ];

    const { candidates, corrupt } = decodeStoredChunks(records, published, 2);

    expect(candidates.map((candidate) => candidate.entry.chunkId)).toEqual(['guide:1']);
    expect(corrupt.map((error) => error.code)).toEqual(['IndexCorruption', 'IndexCorruption']);
    expect(corrupt[0].message).toBe('Stored chunk guide:0 is unreadable (embedding)');
    expect(corrupt[1].message).toBe('Stored chunk unknown is unreadable ()');
  });

  it('reports vectors of the wrong dimension', () => {
    const { candidates, corrupt } = decodeStoredChunks([record({ embedding: [1, 0, 0] })], published, 2);

    expect(candidates).toEqual([]);
    expect(corrupt[0].message).toBe('Stored chunk guide:0 has 3 dimensions, expected 2');
  });

  it('ignores revisions other than the published one', () => {
    const records = [
      record({ chunkId: 'guide:0', revision: 3 }),
      record({ chunkId: 'guide:1', chunkIndex: 1, revision: 2 }),
      record({ chunkId: 'other:0', sourceId: 'other', revision: 2 }),
    ];

    const { candidates } = decodeStoredChunks(records, new Map([['guide', 2]]), 2);

    expect(candidates.map((candidate) => candidate.entry.chunkId)).toEqual(['guide:1']);
  });

  it('keeps the first copy of a repeated chunk id', () => {
    const records = [record({ text: 'First text.' }), record({ text: 'Second text.' })];

    const { candidates } = decodeStoredChunks(records, published, 2);

    expect(candidates).toHaveLength(1);
    expect(candidates[0].entry.text).toBe('First text.');
  });
});
