import { createEmbeddings, isRetryableError } from '../llm/openaiClient';
import { RagError, describeError, readErrorStatus } from './errors';
import { l2Normalize, sha256, tokenizeForSearch } from './textUtils';

export interface Embedder {
  /** Identifies the vector space; scores are only comparable within one model. */
  readonly model: string;
  embed(texts: readonly string[]): Promise<number[][]>;
}

export type EmbeddingRequest = (inputs: string[], model: string) => Promise<number[][]>;

/**
 * Embeds `texts` in batches of `batchSize`, keeping input order, and L2-normalizes
 * every vector so chunk and query vectors live on the same scale.
 */
export async function embedInBatches(
  texts: readonly string[],
  batchSize: number,
  embedBatch: (batch: string[]) => Promise<number[][]>
): Promise<number[][]> {
  const result: number[][] = [];

  for (let i = 0; i < texts.length; i += batchSize) {
    const batch = texts.slice(i, i + batchSize);
    const vectors = await embedBatch(batch);
    if (vectors.length !== batch.length) {
      throw new RagError(
        'EmbeddingUnavailable',
        `Embedding backend returned ${vectors.length} vectors for ${batch.length} inputs`
      );
    }
    vectors.forEach((vector, position) => {
      if (vector.length === 0 || vector.some((value) => !Number.isFinite(value))) {
        throw new RagError('EmbeddingUnavailable', 'Embedding backend returned an invalid vector');
      }
      if (vector.every((value) => value === 0)) {
        console.warn(`[rag:embed] input ${i + position} has an all-zero vector and cannot match any query`);
      }
      result.push(l2Normalize(vector));
    });
  }

  return result;
}

export interface OpenAIEmbedderOptions {
  model: string;
  batchSize: number;
  request?: EmbeddingRequest;
}

export class OpenAIEmbedder implements Embedder {
  readonly model: string;
  private readonly batchSize: number;
  private readonly request: EmbeddingRequest;

  constructor(options: OpenAIEmbedderOptions) {
    this.model = options.model;
    this.batchSize = options.batchSize;
    this.request = options.request ?? createEmbeddings;
  }

  async embed(texts: readonly string[]): Promise<number[][]> {
    // No retry here: a half-embedded batch would leave vectors misaligned with their chunks.
    return embedInBatches(texts, this.batchSize, async (batch) => {
      try {
        return await this.request(batch, this.model);
      } catch (error) {
        throw new RagError('EmbeddingUnavailable', `Embedding request failed: ${describeError(error)}`, {
          retryable: isRetryableError(error),
          status: readErrorStatus(error),
          cause: error,
        });
      }
    });
  }
}

/**
 * Local feature-hashing embedder over the search tokens of a text. Needs no
 * model download or network, and gives identical vectors for identical text.
 */
export class HashingEmbedder implements Embedder {
  readonly model: string;
  private readonly dimension: number;
  private readonly batchSize: number;

  constructor(dimension = 512, batchSize = 64) {
    if (!Number.isInteger(dimension) || dimension <= 0) {
      throw new RagError('InvalidConfig', `Embedding dimension must be a positive integer, got ${dimension}`);
    }
    this.dimension = dimension;
    this.batchSize = batchSize;
    this.model = `hashing-${dimension}`;
  }

  async embed(texts: readonly string[]): Promise<number[][]> {
    return embedInBatches(texts, this.batchSize, async (batch) => batch.map((text) => this.vectorize(text)));
  }

  private vectorize(text: string): number[] {
    const vector = new Array<number>(this.dimension).fill(0);
    for (const token of tokenizeForSearch(text)) {
      const bucket = Number.parseInt(sha256(token).slice(0, 8), 16) % this.dimension;
      vector[bucket] += 1;
    }
    return vector;
  }
}
