export type RagErrorCode =
  | 'InvalidConfig'
  | 'InvalidInput'
  | 'EmbeddingUnavailable'
  | 'GenerationUnavailable'
  | 'EmptyIndex'
  | 'WriteConflict'
  | 'IndexCorruption';

export interface RagErrorOptions {
  /** True when the same request may succeed later without any change on the caller's side. */
  retryable?: boolean;
  /** Status reported by the backend, when there was one. */
  status?: number;
  cause?: unknown;
}

export class RagError extends Error {
  readonly code: RagErrorCode;
  readonly retryable: boolean;
  readonly status?: number;

  constructor(code: RagErrorCode, message: string, options: RagErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'RagError';
    this.code = code;
    this.retryable = options.retryable ?? false;
    this.status = options.status;
  }
}

export function isRagError(error: unknown, code?: RagErrorCode): error is RagError {
  return error instanceof RagError && (code === undefined || error.code === code);
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/** Reads a numeric HTTP status off an SDK or fetch error, if it carries one. */
export function readErrorStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }
  const status = 'status' in error ? error.status : 'statusCode' in error ? error.statusCode : undefined;
  return typeof status === 'number' ? status : undefined;
}
