import type { Embedder } from './embedder';
import { RagError } from './errors';
import type { ScoredChunk } from './types';
import type { VectorIndex } from './vectorIndex';

export type RetrievalResult =
  | { status: 'ok'; passages: ScoredChunk[] }
  | { status: 'empty-index' };

export interface RetrieveOptions {
  k: number;
  minScore: number;
}

export interface RetrieverDeps {
  embedder: Embedder;
  index: VectorIndex;
}

export class Retriever {
  private readonly embedder: Embedder;
  private readonly index: VectorIndex;

  constructor(deps: RetrieverDeps) {
    this.embedder = deps.embedder;
    this.index = deps.index;
  }

  /**
   * Embeds `query` exactly as chunks are embedded and returns the index's
   * ranking unchanged. An index with no chunks yields `empty-index` rather
   * than an empty passage list.
   */
  async retrieve(query: string, options: RetrieveOptions): Promise<RetrievalResult> {
    if ((await this.index.count()) === 0) {
      return { status: 'empty-index' };
    }

    const [queryVector] = await this.embedder.embed([query]);
    if (!queryVector) {
      throw new RagError('EmbeddingUnavailable', 'Embedding backend returned no vector for the query');
    }

    const passages = await this.index.search(queryVector, options.k, options.minScore);
    console.log(`[rag:retrieve] ${passages.length} passages (k=${options.k}, minScore=${options.minScore})`);
    return { status: 'ok', passages };
  }
}
