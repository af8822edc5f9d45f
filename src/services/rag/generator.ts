import type { RagConfig } from '../../config/rag';
import type { ChatMessage, CompletionBackend } from '../llm/completionBackend';
import { isRetryableError, sleep, withRetry } from '../llm/openaiClient';
import { AnswerStream } from './answerStream';
import type { PromptContext } from './contextAssembler';
import { RagError, describeError, isRagError, readErrorStatus } from './errors';
import type { ChunkMetadata, ConversationTurn } from './types';

export const NO_ANSWER = 'I cannot find this information in the provided documents.';

export interface Attribution {
  label: string;
  chunkId: string;
  sourceId: string;
  chunkIndex: number;
  page: number;
  score: number;
  excerpt: string;
  metadata: ChunkMetadata;
}

export interface Answer {
  text: string;
  /** The passages that were placed in the prompt, in label order. */
  sources: Attribution[];
  model: string;
}

export type GeneratorSettings = Pick<RagConfig, 'generationRetries' | 'retryDelayMs' | 'temperature' | 'maxTokens'>;

export interface GeneratorDeps {
  backend: CompletionBackend;
  settings: GeneratorSettings;
  wait?: (ms: number) => Promise<void>;
}

export interface GenerateOptions {
  stream?: boolean;
  signal?: AbortSignal;
}

const SYSTEM_PROMPT = [
  'You are a document assistant answering questions about a private document collection.',
  'Answer strictly from the passages provided. Do not use outside knowledge.',
  `If the passages do not contain the answer, reply exactly: "${NO_ANSWER}"`,
  'Cite every passage you rely on with its label, for example [S1] or [S2].',
  'Answer in the language of the question and keep it concise.',
].join('\n');

function sourceTitle(metadata: ChunkMetadata, fallback: string): string {
  const title = metadata.title ?? metadata.filename;
  return typeof title === 'string' && title ? title : fallback;
}

function buildPassageBlock(context: PromptContext): string {
  if (context.passages.length === 0) {
    return 'No passages available.';
  }

  return context.passages
    .map((passage) => {
      const header = `[${passage.label}] ${sourceTitle(passage.metadata, passage.sourceId)} | page ${passage.page} | chunk ${passage.chunkIndex}`;
      return `${header}\n${passage.text}`;
    })
    .join('\n\n---\n\n');
}

function buildHistoryBlock(history: readonly ConversationTurn[]): string {
  return history
    .map((turn, index) => `${index + 1}. User: ${turn.question.trim()}\n   Assistant: ${turn.answer.trim()}`)
    .join('\n');
}

export function buildPromptMessages(context: PromptContext, question: string): ChatMessage[] {
  const parts = ['Passages (cite with [S1], [S2], ...):', buildPassageBlock(context)];

  if (context.history.length > 0) {
    parts.push('', 'Previous conversation (oldest first):', buildHistoryBlock(context.history));
  }

  parts.push('', 'Question:', question.trim());

  return [
    { role: 'system', content: SYSTEM_PROMPT },
    { role: 'user', content: parts.join('\n') },
  ];
}

export function toAttributions(context: PromptContext): Attribution[] {
  return context.passages.map((passage) => ({
    label: passage.label,
    chunkId: passage.chunkId,
    sourceId: passage.sourceId,
    chunkIndex: passage.chunkIndex,
    page: passage.page,
    score: Number(passage.score.toFixed(6)),
    excerpt: passage.text.slice(0, 240),
    metadata: { ...passage.metadata },
  }));
}

function isTransient(error: unknown): boolean {
  return isRagError(error) ? error.retryable : isRetryableError(error);
}

export function toGenerationError(error: unknown): RagError {
  if (isRagError(error)) {
    return error;
  }
  return new RagError('GenerationUnavailable', `Completion backend failed: ${describeError(error)}`, {
    retryable: isRetryableError(error),
    status: readErrorStatus(error),
    cause: error,
  });
}

function finalizeText(text: string): string {
  return text.trim() || NO_ANSWER;
}

export class Generator {
  private readonly backend: CompletionBackend;
  private readonly settings: GeneratorSettings;
  private readonly wait: (ms: number) => Promise<void>;

  constructor(deps: GeneratorDeps) {
    this.backend = deps.backend;
    this.settings = deps.settings;
    this.wait = deps.wait ?? sleep;
  }

  get model(): string {
    return this.backend.model;
  }

  generate(
    context: PromptContext,
    question: string,
    options: GenerateOptions & { stream: true; onComplete?: (answer: Answer) => void }
  ): AnswerStream;
  generate(context: PromptContext, question: string, options?: GenerateOptions & { stream?: false }): Promise<Answer>;
  generate(
    context: PromptContext,
    question: string,
    options: GenerateOptions & { onComplete?: (answer: Answer) => void } = {}
  ): AnswerStream | Promise<Answer> {
    const messages = buildPromptMessages(context, question);
    const sources = toAttributions(context);

    if (options.stream) {
      return this.streamAnswer(messages, sources, options.onComplete);
    }
    return this.completeAnswer(messages, sources, options.signal);
  }

  private async completeAnswer(
    messages: ChatMessage[],
    sources: Attribution[],
    signal: AbortSignal = new AbortController().signal
  ): Promise<Answer> {
    try {
      const text = await withRetry(
        () =>
          this.backend.complete(messages, {
            temperature: this.settings.temperature,
            maxTokens: this.settings.maxTokens,
            signal,
          }),
        {
          maxRetries: this.settings.generationRetries,
          baseDelayMs: this.settings.retryDelayMs,
          shouldRetry: (error) => !signal.aborted && isTransient(error),
          wait: this.wait,
        }
      );
      return { text: finalizeText(text), sources, model: this.backend.model };
    } catch (error) {
      const failure = toGenerationError(error);
      console.error('[rag:generate] completion failed:', failure.message);
      throw failure;
    }
  }

  private streamAnswer(
    messages: ChatMessage[],
    sources: Attribution[],
    onComplete?: (answer: Answer) => void
  ): AnswerStream {
    return new AnswerStream({
      open: (signal) =>
        this.backend.stream(messages, {
          temperature: this.settings.temperature,
          maxTokens: this.settings.maxTokens,
          signal,
        }),
      sources,
      model: this.backend.model,
      maxRetries: this.settings.generationRetries,
      retryDelayMs: this.settings.retryDelayMs,
      wait: this.wait,
      isRetryable: isTransient,
      toError: toGenerationError,
      fallback: NO_ANSWER,
      onComplete,
    });
  }
}
