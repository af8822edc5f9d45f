import { NextFunction, Request, Response } from 'express';
import { RagError, describeError, isRagError, readErrorStatus } from '../services/rag/errors';

export function statusForRagError(error: RagError): number {
  switch (error.code) {
    case 'InvalidConfig':
    case 'InvalidInput':
      return 400;
    case 'EmbeddingUnavailable':
    case 'GenerationUnavailable':
      return error.retryable ? 503 : 502;
    case 'EmptyIndex':
    case 'WriteConflict':
      return 409;
    case 'IndexCorruption':
      return 500;
  }
}

export function errorHandler(err: unknown, _req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(err);
    return;
  }

  if (isRagError(err)) {
    const status = statusForRagError(err);
    if (status >= 500) {
      console.error(`[error] ${err.code}:`, err.message);
    }
    if (status === 500) {
      res.status(500).json({ message: 'Internal server error' });
      return;
    }
    res.status(status).json({ message: err.message, code: err.code, retryable: err.retryable });
    return;
  }

  // Body parser failures (malformed JSON, oversized payloads) carry their own 4xx status.
  const status = readErrorStatus(err);
  if (status !== undefined && status >= 400 && status < 500) {
    res.status(status).json({ message: describeError(err) });
    return;
  }

  console.error('[error]', err);
  res.status(500).json({ message: 'Internal server error' });
}
