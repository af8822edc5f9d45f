import { Request, Response } from 'express';
import { z } from 'zod';
import type { RagPipeline } from '../services/rag/ragPipeline';

const metadataValueSchema = z.union([z.string().max(500), z.number().finite(), z.boolean(), z.null()]);

const ingestSchema = z.object({
  content: z.string().min(1),
  contentType: z.string().trim().min(1).default('text/plain'),
  metadata: z.record(metadataValueSchema).default({}),
});

const resetSchema = z.object({
  confirm: z.literal(true),
});

export interface DocumentController {
  ingestDocument(req: Request, res: Response): Promise<void>;
  listDocuments(req: Request, res: Response): Promise<void>;
  deleteDocument(req: Request, res: Response): Promise<void>;
  resetDocuments(req: Request, res: Response): Promise<void>;
}

export function createDocumentController(pipeline: RagPipeline): DocumentController {
  return {
    async ingestDocument(req, res) {
      const parsed = ingestSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ message: 'Invalid payload', errors: parsed.error.flatten() });
        return;
      }

      const result = await pipeline.ingest(parsed.data.content, parsed.data.contentType, parsed.data.metadata);
      res.status(201).json({ document: result });
    },

    async listDocuments(_req, res) {
      const documents = await pipeline.listSources();
      res.status(200).json({
        documents,
        total: documents.length,
        chunks: documents.reduce((sum, item) => sum + item.chunkCount, 0),
      });
    },

    async deleteDocument(req, res) {
      const sourceId = req.params.sourceId;
      const removedChunks = await pipeline.removeSource(sourceId);
      if (removedChunks === 0) {
        res.status(404).json({ message: 'Document not found' });
        return;
      }
      res.status(200).json({ sourceId, removedChunks });
    },

    async resetDocuments(req, res) {
      const parsed = resetSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ message: 'Reset requires { "confirm": true }' });
        return;
      }

      await pipeline.reset();
      console.log('[rag:index] index reset and all sessions cleared');
      res.status(200).json({ ok: true });
    },
  };
}
