import { Router } from 'express';
import { createDocumentController } from '../controllers/documentController';
import { asyncHandler } from '../middlewares/asyncHandler';
import { requireAuth } from '../middlewares/authMiddleware';
import type { RagPipeline } from '../services/rag/ragPipeline';

export function createDocumentRouter(pipeline: RagPipeline): Router {
  const documents = createDocumentController(pipeline);
  const documentRouter = Router();

  documentRouter.use(requireAuth);
  documentRouter.post('/', asyncHandler(documents.ingestDocument));
  documentRouter.get('/', asyncHandler(documents.listDocuments));
  documentRouter.post('/reset', asyncHandler(documents.resetDocuments));
  documentRouter.delete('/:sourceId', asyncHandler(documents.deleteDocument));

  return documentRouter;
}
