import { OpenAICompletionBackend } from '../services/llm/completionBackend';
import { HashingEmbedder, OpenAIEmbedder, type Embedder } from '../services/rag/embedder';
import { MemoryVectorIndex } from '../services/rag/memoryVectorIndex';
import { MongoVectorIndex } from '../services/rag/mongoVectorIndex';
import { createRagPipeline, type RagPipeline } from '../services/rag/ragPipeline';
import type { VectorIndex } from '../services/rag/vectorIndex';
import type { Env } from './env';
import { ragConfigFromEnv } from './rag';

function createEmbedder(source: Env): Embedder {
  if (source.EMBEDDING_PROVIDER === 'hashing') {
    return new HashingEmbedder(source.EMBEDDING_DIMENSION, source.EMBEDDING_BATCH_SIZE);
  }
  return new OpenAIEmbedder({ model: source.EMBEDDING_MODEL, batchSize: source.EMBEDDING_BATCH_SIZE });
}

function createIndex(source: Env): VectorIndex {
  return source.VECTOR_INDEX === 'memory' ? new MemoryVectorIndex() : new MongoVectorIndex();
}

export function createPipelineFromEnv(source: Env): RagPipeline {
  const config = ragConfigFromEnv(source);
  const embedder = createEmbedder(source);
  const index = createIndex(source);
  console.log(
    `[rag] index=${source.VECTOR_INDEX} embedder=${embedder.model} chat=${source.LLM_CHAT_MODEL} topK=${config.topK} minScore=${config.minScore}`
  );
  return createRagPipeline({
    config,
    embedder,
    index,
    backend: new OpenAICompletionBackend(source.LLM_CHAT_MODEL),
  });
}
