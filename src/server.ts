import 'dotenv/config';
import { createApp } from './app';
import { connectToDatabase, disconnectFromDatabase } from './config/db';
import { env } from './config/env';
import { createPipelineFromEnv } from './config/pipeline';

async function bootstrap(): Promise<void> {
  // Users and quota records always live in MongoDB, whichever vector index is configured.
  await connectToDatabase();

  const pipeline = createPipelineFromEnv(env);
  const app = createApp({ pipeline });

  const server = app.listen(env.PORT, env.HOST, () => {
    console.log(`[server] Running at http://${env.HOST}:${env.PORT}`);
  });

  const shutdown = (signal: string) => {
    console.log(`[server] ${signal} received, shutting down`);
    server.close(() => {
      disconnectFromDatabase()
        .catch((error) => console.error('[db] disconnect failed:', error))
        .finally(() => process.exit(0));
    });
  };

  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

bootstrap().catch((error) => {
  console.error('[server] Startup failed:', error);
  process.exit(1);
});
