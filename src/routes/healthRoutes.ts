import { Router } from 'express';
import { createHealthController } from '../controllers/healthController';
import { asyncHandler } from '../middlewares/asyncHandler';
import type { RagPipeline } from '../services/rag/ragPipeline';

export function createHealthRouter(pipeline: RagPipeline): Router {
  const health = createHealthController(pipeline);
  const healthRouter = Router();

  healthRouter.get('/', asyncHandler(health.getStatus));

  return healthRouter;
}
