import { describe, expect, it, vi } from 'vitest';
import { HashingEmbedder, OpenAIEmbedder, embedInBatches } from './embedder';
import { isRagError } from './errors';

describe('embedInBatches', () => {
  it('splits inputs into batches and keeps their order', async () => {
    const embedBatch = vi.fn(async (batch: string[]) => batch.map((text) => (text === 'x' ? [3, 4] : [0, 2])));

    const vectors = await embedInBatches(['x', 'y', 'x', 'y', 'x'], 2, embedBatch);

    expect(embedBatch.mock.calls.map(([batch]) => batch)).toEqual([['x', 'y'], ['x', 'y'], ['x']]);
    expect(vectors).toEqual([[0.6, 0.8], [0, 1], [0.6, 0.8], [0, 1], [0.6, 0.8]]);
  });

  it('makes no request for an empty input', async () => {
    const embedBatch = vi.fn(async (batch: string[]) => batch.map(() => [1]));
    expect(await embedInBatches([], 4, embedBatch)).toEqual([]);
    expect(embedBatch).not.toHaveBeenCalled();
  });

  it('rejects a batch with the wrong number of vectors', async () => {
    await expect(embedInBatches(['a', 'b'], 8, async () => [[1, 0]])).rejects.toSatisfy((error: unknown) =>
      isRagError(error, 'EmbeddingUnavailable')
    );
  });

  it('rejects empty or non-finite vectors', async () => {
    await expect(embedInBatches(['a'], 8, async () => [[]])).rejects.toSatisfy((error: unknown) =>
      isRagError(error, 'EmbeddingUnavailable')
    );
    await expect(embedInBatches(['a'], 8, async () => [[1, Number.NaN]])).rejects.toSatisfy((error: unknown) =>
      isRagError(error, 'EmbeddingUnavailable')
    );
  });
});

describe('OpenAIEmbedder', () => {
  it('sends each batch with the configured model', async () => {
    const request = vi.fn(async (inputs: string[]) => inputs.map(() => [0, 5]));
    const embedder = new OpenAIEmbedder({ model: 'test-embedding', batchSize: 2, request });

    const vectors = await embedder.embed(['one', 'two', 'three']);

    expect(request.mock.calls).toEqual([
      [['one', 'two'], 'test-embedding'],
      [['three'], 'test-embedding'],
    ]);
    expect(vectors).toEqual([[0, 1], [0, 1], [0, 1]]);
  });

  it('reports backend failures as EmbeddingUnavailable without retrying', async () => {
    const request = vi.fn(async () => {
      throw Object.assign(new Error('rate limited'), { status: 429 });
    });
    const embedder = new OpenAIEmbedder({ model: 'test-embedding', batchSize: 8, request });

    const error = await embedder.embed(['one']).catch((caught: unknown) => caught);

    expect(request).toHaveBeenCalledTimes(1);
    expect(isRagError(error, 'EmbeddingUnavailable')).toBe(true);
    expect(error).toMatchObject({
      message: 'Embedding request failed: rate limited',
      retryable: true,
      status: 429,
    });
  });
});

describe('HashingEmbedder', () => {
  it('gives identical vectors for identical text', async () => {
    const embedder = new HashingEmbedder(64);
    const [first, second] = await embedder.embed(['Cats purr softly', 'Cats purr softly']);

    expect(embedder.model).toBe('hashing-64');
    expect(first).toHaveLength(64);
    expect(first).toEqual(second);
  });

  it('spreads distinct tokens over unit-length buckets', async () => {
    const embedder = new HashingEmbedder(512);
    const [vector] = await embedder.embed(['Python is a language created in 1991.']);

    const buckets = vector.flatMap((value, bucket) => (value === 0 ? [] : [bucket]));
    expect(buckets).toEqual([11, 75, 145, 433]);
    expect(buckets.map((bucket) => vector[bucket])).toEqual([0.5, 0.5, 0.5, 0.5]);
  });

  it('returns a zero vector for text without search tokens and warns about it', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    const [, vector] = await new HashingEmbedder(8).embed(['install the package', 'a the of']);

    expect(vector).toEqual([0, 0, 0, 0, 0, 0, 0, 0]);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith('[rag:embed] input 1 has an all-zero vector and cannot match any query');
    warn.mockRestore();
  });

  it('rejects a non-positive dimension', () => {
    expect(() => new HashingEmbedder(0)).toThrow('Embedding dimension must be a positive integer, got 0');
  });
});
