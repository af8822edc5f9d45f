import OpenAI from 'openai';
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
} from 'openai/resources/chat/completions';
import { env, requireOpenAiKey } from '../../config/env';
import { readErrorStatus } from '../rag/errors';

let cachedClient: OpenAI | null = null;

function getClient(): OpenAI {
  if (!cachedClient) {
    cachedClient = new OpenAI({
      apiKey: requireOpenAiKey(),
      baseURL: env.OPENAI_BASE_URL,
      timeout: env.LLM_TIMEOUT_MS,
      // Retries are decided by the caller.
      maxRetries: 0,
    });
  }

  return cachedClient;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function isRetryableError(error: unknown): boolean {
  if (error instanceof OpenAI.APIConnectionError) {
    return true;
  }
  const status = readErrorStatus(error);
  if (status !== undefined) {
    return status === 408 || status === 409 || status === 429 || status >= 500;
  }
  return false;
}

export interface RetryOptions {
  maxRetries: number;
  baseDelayMs: number;
  shouldRetry?: (error: unknown) => boolean;
  wait?: (ms: number) => Promise<void>;
}

export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const shouldRetry = options.shouldRetry ?? isRetryableError;
  const wait = options.wait ?? sleep;
  let attempt = 0;
  while (true) {
    try {
      return await fn();
    } catch (error) {
      attempt += 1;
      if (attempt > options.maxRetries || !shouldRetry(error)) {
        throw error;
      }
      const backoffMs = options.baseDelayMs * Math.pow(2, attempt - 1);
      await wait(backoffMs);
    }
  }
}

export async function createEmbeddings(inputs: string[], model: string): Promise<number[][]> {
  if (inputs.length === 0) {
    return [];
  }

  const response = await getClient().embeddings.create({ model, input: inputs });

  // The API may return items out of order; `index` is authoritative.
  return [...response.data].sort((a, b) => a.index - b.index).map((item) => item.embedding);
}

export async function createChatCompletion(
  messages: ChatCompletionMessageParam[],
  options: Partial<Omit<ChatCompletionCreateParamsNonStreaming, 'messages'>> = {},
  signal?: AbortSignal
): Promise<ChatCompletion> {
  return getClient().chat.completions.create(
    {
      model: env.LLM_CHAT_MODEL,
      messages,
      temperature: env.LLM_TEMPERATURE,
      max_tokens: env.LLM_MAX_TOKENS,
      ...options,
      stream: false,
    },
    { signal }
  );
}

export interface StreamChatOptions {
  model: string;
  temperature: number;
  maxTokens: number;
  signal: AbortSignal;
}

/**
 * Streams the content deltas of a chat completion. Leaving the loop early, or
 * aborting `signal`, closes the underlying HTTP response.
 */
export async function* streamChatCompletion(
  messages: ChatCompletionMessageParam[],
  options: StreamChatOptions
): AsyncGenerator<string> {
  const stream = await getClient().chat.completions.create(
    {
      model: options.model,
      messages,
      temperature: options.temperature,
      max_tokens: options.maxTokens,
      stream: true,
    },
    { signal: options.signal }
  );

  try {
    for await (const chunk of stream) {
      const delta = chunk.choices[0]?.delta?.content;
      if (delta) {
        yield delta;
      }
    }
  } finally {
    if (!options.signal.aborted) {
      stream.controller.abort();
    }
  }
}
