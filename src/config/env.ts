import { z } from 'zod';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  HOST: z.string().default('0.0.0.0'),
  PORT: z.coerce.number().int().positive().default(8000),
  MONGODB_URI: z.string().min(1, 'MONGODB_URI is required').optional(),
  JWT_SECRET: z.string().min(16, 'JWT_SECRET must be at least 16 chars').optional(),
  JWT_EXPIRES_IN: z.string().default('24h'),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().url().optional(),
  LLM_CHAT_MODEL: z.string().default('gpt-4o-mini'),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.2),
  LLM_MAX_TOKENS: z.coerce.number().int().positive().default(1200),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
  EMBEDDING_PROVIDER: z.enum(['openai', 'hashing']).default('openai'),
  EMBEDDING_MODEL: z.string().default('text-embedding-3-small'),
  EMBEDDING_DIMENSION: z.coerce.number().int().positive().default(512),
  EMBEDDING_BATCH_SIZE: z.coerce.number().int().positive().max(2048).default(32),
  VECTOR_INDEX: z.enum(['mongo', 'memory']).default('mongo'),
  RAG_CHUNK_SIZE: z.coerce.number().int().positive().default(1000),
  RAG_CHUNK_OVERLAP: z.coerce.number().int().nonnegative().default(200),
  RAG_CHUNK_BOUNDARY: z.enum(['fixed', 'sentence']).default('fixed'),
  RAG_TOP_K: z.coerce.number().int().positive().max(50).default(5),
  RAG_MIN_SCORE: z.coerce.number().min(-1).max(1).default(0.25),
  RAG_CONTEXT_BUDGET: z.coerce.number().int().positive().default(4096),
  RAG_DEDUP_OVERLAP: z.coerce.number().gt(0).max(1).default(0.5),
  RAG_MEMORY_TURNS: z.coerce.number().int().positive().max(50).default(3),
  RAG_MAX_SESSIONS: z.coerce.number().int().positive().default(1000),
  RAG_GENERATION_RETRIES: z.coerce.number().int().min(0).max(1).default(1),
  RAG_RETRY_DELAY_MS: z.coerce.number().int().nonnegative().default(1000),
  RAG_INGEST_DIR: z.string().default('data/documents'),
  QUOTA_FREE_DAILY: z.coerce.number().int().nonnegative().default(20),
  QUOTA_PRO_DAILY: z.coerce.number().int().nonnegative().default(500),
  QUOTA_ENTERPRISE_DAILY: z.coerce.number().int().nonnegative().default(0),
});

const parsedEnv = envSchema.safeParse(process.env);

if (!parsedEnv.success) {
  console.error('Invalid environment variables:');
  console.error(parsedEnv.error.flatten().fieldErrors);
  process.exit(1);
}

export const env = parsedEnv.data;

export type Env = typeof env;

function requireConfig(name: string, value: string | undefined): string {
  if (!value) {
    throw new Error(`${name} is required for this operation`);
  }
  return value;
}

export function requireMongoUri(): string {
  return requireConfig('MONGODB_URI', env.MONGODB_URI);
}

export function requireJwtSecret(): string {
  return requireConfig('JWT_SECRET', env.JWT_SECRET);
}

export function requireOpenAiKey(): string {
  return requireConfig('OPENAI_API_KEY', env.OPENAI_API_KEY);
}
