import { describe, expect, it, vi } from 'vitest';
import { HashingEmbedder } from './embedder';
import { MemoryVectorIndex } from './memoryVectorIndex';
import { Retriever } from './retrieve';

describe('Retriever', () => {
  it('reports an empty index without embedding the query', async () => {
    const embedder = new HashingEmbedder(64);
    const embed = vi.spyOn(embedder, 'embed');
    const retriever = new Retriever({ embedder, index: new MemoryVectorIndex() });

    expect(await retriever.retrieve('anything', { k: 5, minScore: 0 })).toEqual({ status: 'empty-index' });
    expect(embed).not.toHaveBeenCalled();
  });

  it('returns an empty passage list when nothing clears the floor', async () => {
    const embedder = new HashingEmbedder(512);
    const index = new MemoryVectorIndex();
    const [vector] = await embedder.embed(['Bananas are yellow']);
    await index.upsert([
      {
        chunkId: 'fruit:0',
        sourceId: 'fruit',
        chunkIndex: 0,
        startOffset: 0,
        page: 1,
        text: 'Bananas are yellow',
        vector,
        metadata: {},
      },
    ]);
    const retriever = new Retriever({ embedder, index });

    expect(await retriever.retrieve('Bananas', { k: 5, minScore: 0.99 })).toEqual({ status: 'ok', passages: [] });

    const found = await retriever.retrieve('Bananas', { k: 5, minScore: 0.5 });
    expect(found.status).toBe('ok');
    if (found.status === 'ok') {
      expect(found.passages.map((item) => item.chunkId)).toEqual(['fruit:0']);
    }
  });
});
