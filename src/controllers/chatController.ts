import { Request, Response } from 'express';
import { z } from 'zod';
import { describeError, isRagError } from '../services/rag/errors';
import type { RagPipeline } from '../services/rag/ragPipeline';

const chatSchema = z.object({
  sessionId: z.string().trim().min(1).max(128).default('default'),
  question: z.string().trim().min(1).max(4000),
});

const NO_DOCUMENTS = { message: 'No documents loaded' };

// Memory is per user, so two users picking the same session id never share history.
function memoryKey(userId: string, sessionId: string): string {
  return `${userId}:${sessionId}`;
}

function writeEvent(res: Response, event: string, data: unknown): void {
  res.write(`event: ${event}\ndata: ${JSON.stringify(data)}\n\n`);
}

export interface ChatController {
  chat(req: Request, res: Response): Promise<void>;
  chatStream(req: Request, res: Response): Promise<void>;
  clearSession(req: Request, res: Response): Promise<void>;
}

export function createChatController(pipeline: RagPipeline): ChatController {
  return {
    async chat(req, res) {
      if (!req.auth?.userId) {
        res.status(401).json({ message: 'Unauthorized' });
        return;
      }

      const parsed = chatSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ message: 'Invalid payload', errors: parsed.error.flatten() });
        return;
      }

      const { sessionId, question } = parsed.data;
      const result = await pipeline.ask(memoryKey(req.auth.userId, sessionId), question);
      if (result.status === 'empty-index') {
        res.status(409).json(NO_DOCUMENTS);
        return;
      }

      res.status(200).json({
        sessionId,
        answer: result.answer.text,
        sources: result.answer.sources,
        model: result.answer.model,
        context: result.context,
      });
    },

    async chatStream(req, res) {
      if (!req.auth?.userId) {
        res.status(401).json({ message: 'Unauthorized' });
        return;
      }

      const parsed = chatSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ message: 'Invalid payload', errors: parsed.error.flatten() });
        return;
      }

      const { sessionId, question } = parsed.data;
      const result = await pipeline.askStream(memoryKey(req.auth.userId, sessionId), question);
      if (result.status === 'empty-index') {
        res.status(409).json(NO_DOCUMENTS);
        return;
      }

      const { stream } = result;
      res.writeHead(200, {
        'Content-Type': 'text/event-stream; charset=utf-8',
        'Cache-Control': 'no-cache, no-transform',
        Connection: 'keep-alive',
        'X-Accel-Buffering': 'no',
      });

      res.on('close', () => {
        if (!res.writableEnded) {
          console.log(`[chat] client left session ${sessionId}, cancelling stream`);
          stream.cancel();
        }
      });

      writeEvent(res, 'sources', { sessionId, sources: stream.sources, context: result.context });

      try {
        for await (const text of stream) {
          writeEvent(res, 'delta', { text });
        }
        const outcome = await stream.outcome;
        if (outcome.status === 'completed') {
          writeEvent(res, 'done', { answer: outcome.answer.text, model: outcome.answer.model });
        }
      } catch (error) {
        console.error('[chat] stream failed:', describeError(error));
        writeEvent(
          res,
          'error',
          isRagError(error)
            ? { message: error.message, code: error.code, retryable: error.retryable }
            : { message: 'An unexpected error occurred' }
        );
      } finally {
        if (!res.writableEnded) {
          res.end();
        }
      }
    },

    async clearSession(req, res) {
      if (!req.auth?.userId) {
        res.status(401).json({ message: 'Unauthorized' });
        return;
      }

      const cleared = pipeline.clearSession(memoryKey(req.auth.userId, req.params.sessionId));
      res.status(200).json({ sessionId: req.params.sessionId, cleared });
    },
  };
}
