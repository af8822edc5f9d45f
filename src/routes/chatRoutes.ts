import { RequestHandler, Router } from 'express';
import { createChatController } from '../controllers/chatController';
import { asyncHandler } from '../middlewares/asyncHandler';
import { requireAuth } from '../middlewares/authMiddleware';
import type { RagPipeline } from '../services/rag/ragPipeline';

export function createChatRouter(pipeline: RagPipeline, requireQuota: RequestHandler): Router {
  const chat = createChatController(pipeline);
  const chatRouter = Router();

  chatRouter.post('/', requireAuth, requireQuota, asyncHandler(chat.chat));
  chatRouter.post('/stream', requireAuth, requireQuota, asyncHandler(chat.chatStream));
  chatRouter.delete('/sessions/:sessionId', requireAuth, asyncHandler(chat.clearSession));

  return chatRouter;
}
