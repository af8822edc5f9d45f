import type { RagConfig } from '../../config/rag';
import type { CompletionBackend } from '../llm/completionBackend';
import type { AnswerStream } from './answerStream';
import { chunkDocument } from './chunker';
import { assembleContext, type PromptContext } from './contextAssembler';
import { SessionMemoryStore, type ConversationMemory } from './conversationMemory';
import type { Embedder } from './embedder';
import { RagError } from './errors';
import { Generator, type Answer } from './generator';
import { Retriever } from './retrieve';
import { normalizeText, sha256 } from './textUtils';
import type { ChunkMetadata, IndexEntry, SourceSummary } from './types';
import type { VectorIndex } from './vectorIndex';

const SUPPORTED_CONTENT_TYPES = new Set(['text/plain', 'text/markdown', 'text/x-markdown']);

export interface RagPipelineDeps {
  config: RagConfig;
  embedder: Embedder;
  index: VectorIndex;
  backend: CompletionBackend;
  sessions?: SessionMemoryStore;
  wait?: (ms: number) => Promise<void>;
}

export interface IngestResult {
  sourceId: string;
  chunkCount: number;
  charCount: number;
}

export interface ContextStats {
  retrieved: number;
  used: number;
  duplicatesRemoved: number;
  passagesDropped: number;
  historyTurns: number;
}

export type AskResult =
  | { status: 'answered'; answer: Answer; context: ContextStats }
  | { status: 'empty-index' };

export type AskStreamResult =
  | { status: 'streaming'; stream: AnswerStream; context: ContextStats }
  | { status: 'empty-index' };

type PreparedQuestion =
  | { status: 'empty-index' }
  | { status: 'ready'; memory: ConversationMemory; context: PromptContext; query: string; retrieved: number };

export interface PipelineStats {
  sources: number;
  chunks: number;
  sessions: number;
  embeddingModel: string;
  chatModel: string;
  settings: RagConfig;
}

function contentTypeOf(raw: string): string {
  return raw.split(';')[0].trim().toLowerCase();
}

function decodeDocument(documentBytes: Uint8Array | string): string {
  if (typeof documentBytes === 'string') {
    return documentBytes;
  }
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(documentBytes);
  } catch (error) {
    throw new RagError('InvalidInput', 'Document is not valid UTF-8 text', { cause: error });
  }
}

function toContextStats(retrieved: number, context: PromptContext): ContextStats {
  return {
    retrieved,
    used: context.passages.length,
    duplicatesRemoved: context.duplicatesRemoved,
    passagesDropped: context.passagesDropped,
    historyTurns: context.history.length,
  };
}

export class RagPipeline {
  readonly config: RagConfig;
  readonly sessions: SessionMemoryStore;
  private readonly embedder: Embedder;
  private readonly index: VectorIndex;
  private readonly retriever: Retriever;
  private readonly generator: Generator;

  constructor(deps: RagPipelineDeps) {
    this.config = deps.config;
    this.embedder = deps.embedder;
    this.index = deps.index;
    this.sessions = deps.sessions ?? new SessionMemoryStore(deps.config.memoryTurns, deps.config.maxSessions);
    this.retriever = new Retriever({ embedder: deps.embedder, index: deps.index });
    this.generator = new Generator({ backend: deps.backend, settings: deps.config, wait: deps.wait });
  }

  /**
   * Chunks, embeds and indexes one extracted document, replacing any earlier
   * version of the same source. Returns the source id the chunks are stored under.
   */
  async ingest(
    documentBytes: Uint8Array | string,
    contentType: string,
    metadata: ChunkMetadata = {}
  ): Promise<IngestResult> {
    const type = contentTypeOf(contentType);
    if (!SUPPORTED_CONTENT_TYPES.has(type)) {
      throw new RagError('InvalidInput', `Unsupported content type: ${contentType}`);
    }

    const text = normalizeText(decodeDocument(documentBytes));
    if (!text) {
      throw new RagError('InvalidInput', 'Document contains no text');
    }

    const sourceId =
      typeof metadata.sourceId === 'string' && metadata.sourceId.trim()
        ? metadata.sourceId.trim()
        : `doc-${sha256(text).slice(0, 16)}`;

    const chunks = chunkDocument(
      {
        sourceId,
        text,
        metadata: { ...metadata, sourceId, contentType: type, ingestedAt: new Date().toISOString() },
      },
      {
        chunkSize: this.config.chunkSize,
        chunkOverlap: this.config.chunkOverlap,
        boundary: this.config.chunkBoundary,
      }
    );

    const vectors = await this.embedder.embed(chunks.map((chunk) => chunk.text));
    if (vectors.length !== chunks.length) {
      throw new RagError(
        'EmbeddingUnavailable',
        `Embedder returned ${vectors.length} vectors for ${chunks.length} chunks`
      );
    }

    const entries: IndexEntry[] = chunks.map((chunk, i) => ({
      chunkId: chunk.chunkId,
      sourceId: chunk.sourceId,
      chunkIndex: chunk.chunkIndex,
      startOffset: chunk.startOffset,
      page: chunk.page,
      text: chunk.text,
      vector: vectors[i],
      metadata: chunk.metadata,
    }));

    await this.index.replaceSource(sourceId, entries);
    console.log(`[rag:ingest] ${sourceId} -> ${entries.length} chunks (${text.length} chars)`);

    return { sourceId, chunkCount: entries.length, charCount: text.length };
  }

  async ask(sessionId: string, question: string): Promise<AskResult> {
    const prepared = await this.prepare(sessionId, question);
    if (prepared.status === 'empty-index') {
      return prepared;
    }

    const { memory, context, query, retrieved } = prepared;
    const answer = await this.generator.generate(context, query);
    memory.append({ question: query, answer: answer.text, timestamp: new Date() });
    return { status: 'answered', answer, context: toContextStats(retrieved, context) };
  }

  /**
   * Like `ask`, but the answer arrives as an `AnswerStream`. The turn is
   * remembered only when the stream runs to completion.
   */
  async askStream(sessionId: string, question: string): Promise<AskStreamResult> {
    const prepared = await this.prepare(sessionId, question);
    if (prepared.status === 'empty-index') {
      return prepared;
    }

    const { memory, context, query, retrieved } = prepared;
    const stream = this.generator.generate(context, query, {
      stream: true,
      onComplete: (answer) => memory.append({ question: query, answer: answer.text, timestamp: new Date() }),
    });
    return { status: 'streaming', stream, context: toContextStats(retrieved, context) };
  }

  async removeSource(sourceId: string): Promise<number> {
    const removed = await this.index.deleteBySource(sourceId);
    console.log(`[rag:ingest] removed ${sourceId} (${removed} chunks)`);
    return removed;
  }

  listSources(): Promise<SourceSummary[]> {
    return this.index.listSources();
  }

  /** Empties the index and forgets every conversation. */
  async reset(): Promise<void> {
    await this.index.reset();
    this.sessions.clearAll();
  }

  clearSession(sessionId: string): boolean {
    return this.sessions.clear(sessionId);
  }

  async stats(): Promise<PipelineStats> {
    const [chunks, sources] = await Promise.all([this.index.count(), this.index.listSources()]);
    return {
      sources: sources.length,
      chunks,
      sessions: this.sessions.size,
      embeddingModel: this.embedder.model,
      chatModel: this.generator.model,
      settings: this.config,
    };
  }

  private async prepare(sessionId: string, question: string): Promise<PreparedQuestion> {
    const query = question.trim();
    if (!query) {
      throw new RagError('InvalidInput', 'Question is empty');
    }

    const retrieval = await this.retriever.retrieve(query, {
      k: this.config.topK,
      minScore: this.config.minScore,
    });
    if (retrieval.status === 'empty-index') {
      return retrieval;
    }

    const memory = this.sessions.get(sessionId);
    const context = assembleContext(retrieval.passages, memory, {
      budget: this.config.contextBudget,
      dedupOverlap: this.config.dedupOverlap,
      historyTurns: this.config.memoryTurns,
    });

    return { status: 'ready', memory, context, query, retrieved: retrieval.passages.length };
  }
}

export function createRagPipeline(deps: RagPipelineDeps): RagPipeline {
  return new RagPipeline(deps);
}
