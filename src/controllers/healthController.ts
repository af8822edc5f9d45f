import { Request, Response } from 'express';
import type { RagPipeline } from '../services/rag/ragPipeline';

export interface HealthController {
  getStatus(req: Request, res: Response): Promise<void>;
}

export function createHealthController(pipeline: RagPipeline): HealthController {
  return {
    async getStatus(_req, res) {
      const stats = await pipeline.stats();
      res.status(200).json({
        ok: true,
        index: { documents: stats.sources, chunks: stats.chunks },
        sessions: stats.sessions,
        models: { embedding: stats.embeddingModel, chat: stats.chatModel },
        settings: {
          topK: stats.settings.topK,
          minScore: stats.settings.minScore,
          contextBudget: stats.settings.contextBudget,
          memoryTurns: stats.settings.memoryTurns,
        },
      });
    },
  };
}
