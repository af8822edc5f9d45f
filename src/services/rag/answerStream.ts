import { RagError } from './errors';
import type { Answer, Attribution } from './generator';

export type StreamOutcome =
  | { status: 'completed'; answer: Answer }
  | { status: 'cancelled' }
  | { status: 'failed'; error: RagError };

export interface AnswerStreamOptions {
  /** Starts one backend request; called again only for a retry. */
  open: (signal: AbortSignal) => AsyncIterable<string>;
  sources: Attribution[];
  model: string;
  maxRetries: number;
  retryDelayMs: number;
  wait: (ms: number) => Promise<void>;
  isRetryable: (error: unknown) => boolean;
  toError: (error: unknown) => RagError;
  /** Emitted as a last fragment when the backend produced only whitespace. */
  fallback: string;
  /** Runs before `outcome` settles, and only for a completed stream. */
  onComplete?: (answer: Answer) => void;
}

/**
 * A lazy, finite answer: iterate it once to receive text fragments.
 * `cancel()` stops the backend between fragments and settles `outcome` as
 * `cancelled`; breaking out of the loop does the same. A retry happens only
 * before the first fragment has been emitted. The completed answer's text is
 * exactly the emitted fragments joined together.
 */
export class AnswerStream implements AsyncIterable<string> {
  readonly sources: Attribution[];
  readonly outcome: Promise<StreamOutcome>;

  private readonly options: AnswerStreamOptions;
  private readonly controller = new AbortController();
  private active: AsyncIterator<string> | null = null;
  private started = false;
  private settled = false;
  private resolveOutcome: (outcome: StreamOutcome) => void = () => undefined;

  constructor(options: AnswerStreamOptions) {
    this.options = options;
    this.sources = options.sources;
    this.outcome = new Promise<StreamOutcome>((resolve) => {
      this.resolveOutcome = resolve;
    });
  }

  get cancelled(): boolean {
    return this.controller.signal.aborted;
  }

  cancel(): void {
    if (this.settled) {
      return;
    }
    this.controller.abort();
    this.settle({ status: 'cancelled' });
    const iterator = this.active;
    this.active = null;
    if (iterator?.return) {
      iterator.return().catch((error: unknown) => {
        console.warn('[rag:generate] closing cancelled stream failed:', error);
      });
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<string> {
    if (this.started) {
      throw new Error('AnswerStream can only be iterated once');
    }
    this.started = true;
    return this.run();
  }

  private settle(outcome: StreamOutcome): void {
    if (this.settled) {
      return;
    }
    this.settled = true;
    if (outcome.status === 'completed') {
      this.options.onComplete?.(outcome.answer);
    }
    this.resolveOutcome(outcome);
  }

  private async *run(): AsyncGenerator<string> {
    const { signal } = this.controller;
    let text = '';
    let emitted = false;
    let attempt = 0;

    try {
      while (!signal.aborted) {
        const iterator = this.options.open(signal)[Symbol.asyncIterator]();
        this.active = iterator;
        try {
          while (true) {
            const step = await iterator.next();
            if (step.done || signal.aborted) {
              break;
            }
            text += step.value;
            emitted = true;
            yield step.value;
            if (signal.aborted) {
              break;
            }
          }
          break;
        } catch (error) {
          if (signal.aborted) {
            break;
          }
          if (emitted || attempt >= this.options.maxRetries || !this.options.isRetryable(error)) {
            throw this.options.toError(error);
          }
          attempt += 1;
          console.warn(`[rag:generate] stream failed before first fragment, retry ${attempt}`);
          await this.options.wait(this.options.retryDelayMs * Math.pow(2, attempt - 1));
        } finally {
          if (this.active === iterator) {
            this.active = null;
          }
          await iterator.return?.();
        }
      }

      if (!signal.aborted && !text.trim()) {
        text += this.options.fallback;
        yield this.options.fallback;
      }

      if (!signal.aborted) {
        this.settle({
          status: 'completed',
          answer: { text, sources: this.sources, model: this.options.model },
        });
      }
    } catch (error) {
      const failure = error instanceof RagError ? error : this.options.toError(error);
      this.settle({ status: 'failed', error: failure });
      throw failure;
    } finally {
      if (!this.settled) {
        this.controller.abort();
        this.settle({ status: 'cancelled' });
      }
    }
  }
}
