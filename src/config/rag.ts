import { z } from 'zod';
import { RagError } from '../services/rag/errors';
import type { Env } from './env';

export const ragConfigSchema = z
  .object({
    chunkSize: z.number().int().positive().default(1000),
    chunkOverlap: z.number().int().nonnegative().default(200),
    chunkBoundary: z.enum(['fixed', 'sentence']).default('fixed'),
    embeddingBatchSize: z.number().int().positive().default(32),
    topK: z.number().int().positive().default(5),
    minScore: z.number().min(-1).max(1).default(0.25),
    contextBudget: z.number().int().positive().default(4096),
    dedupOverlap: z.number().gt(0).max(1).default(0.5),
    memoryTurns: z.number().int().positive().default(3),
    maxSessions: z.number().int().positive().default(1000),
    generationRetries: z.number().int().min(0).max(1).default(1),
    retryDelayMs: z.number().int().nonnegative().default(1000),
    temperature: z.number().min(0).max(2).default(0.2),
    maxTokens: z.number().int().positive().default(1200),
  })
  .refine((config) => config.chunkOverlap < config.chunkSize, {
    message: 'chunkOverlap must be smaller than chunkSize',
    path: ['chunkOverlap'],
  });

export type RagConfigInput = z.input<typeof ragConfigSchema>;
export type RagConfig = Readonly<z.output<typeof ragConfigSchema>>;

export function createRagConfig(input: RagConfigInput = {}): RagConfig {
  const parsed = ragConfigSchema.safeParse(input);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
      .join('; ');
    throw new RagError('InvalidConfig', `Invalid RAG configuration: ${details}`);
  }
  return Object.freeze(parsed.data);
}

export function ragConfigFromEnv(source: Env): RagConfig {
  return createRagConfig({
    chunkSize: source.RAG_CHUNK_SIZE,
    chunkOverlap: source.RAG_CHUNK_OVERLAP,
    chunkBoundary: source.RAG_CHUNK_BOUNDARY,
    embeddingBatchSize: source.EMBEDDING_BATCH_SIZE,
    topK: source.RAG_TOP_K,
    minScore: source.RAG_MIN_SCORE,
    contextBudget: source.RAG_CONTEXT_BUDGET,
    dedupOverlap: source.RAG_DEDUP_OVERLAP,
    memoryTurns: source.RAG_MEMORY_TURNS,
    maxSessions: source.RAG_MAX_SESSIONS,
    generationRetries: source.RAG_GENERATION_RETRIES,
    retryDelayMs: source.RAG_RETRY_DELAY_MS,
    temperature: source.LLM_TEMPERATURE,
    maxTokens: source.LLM_MAX_TOKENS,
  });
}
