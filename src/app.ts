import cors from 'cors';
import express, { Express, NextFunction, Request, Response } from 'express';
import helmet from 'helmet';
import morgan from 'morgan';
import { env } from './config/env';
import { errorHandler } from './middlewares/errorHandler';
import { createQuotaGuard } from './middlewares/quotaMiddleware';
import { authRouter } from './routes/authRoutes';
import { createChatRouter } from './routes/chatRoutes';
import { createDocumentRouter } from './routes/documentRoutes';
import { createHealthRouter } from './routes/healthRoutes';
import type { RagPipeline } from './services/rag/ragPipeline';
import { MongoUsageCounter, quotaLimitsFromEnv, type QuotaLimits, type UsageCounter } from './services/usage/usageCounter';

export interface AppDeps {
  pipeline: RagPipeline;
  usage?: UsageCounter;
  quotaLimits?: QuotaLimits;
  /** Access log format for morgan; `false` disables it. */
  accessLog?: string | false;
}

export function createApp(deps: AppDeps): Express {
  const app = express();
  const requireQuota = createQuotaGuard(
    deps.usage ?? new MongoUsageCounter(),
    deps.quotaLimits ?? quotaLimitsFromEnv(env)
  );

  app.use(helmet());
  app.use(cors());
  const accessLog = deps.accessLog ?? 'dev';
  if (accessLog) {
    app.use(morgan(accessLog));
  }
  app.use(express.json({ limit: '2mb' }));

  app.get('/health', (_req: Request, res: Response) => {
    res.status(200).json({ ok: true });
  });

  app.use('/api/health', createHealthRouter(deps.pipeline));
  app.use('/api/auth', authRouter);
  app.use('/api/documents', createDocumentRouter(deps.pipeline));
  app.use('/api/chat', createChatRouter(deps.pipeline, requireQuota));

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ message: 'Route not found' });
  });

  app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
    errorHandler(err, req, res, next);
  });

  return app;
}
