import 'dotenv/config';
import fs from 'node:fs/promises';
import path from 'node:path';
import { connectToDatabase, disconnectFromDatabase } from '../config/db';
import { env } from '../config/env';
import { createPipelineFromEnv } from '../config/pipeline';
import { describeError } from '../services/rag/errors';
import { assignSourceIds, stripExt } from '../services/rag/textUtils';

const CONTENT_TYPES = new Map([
  ['.txt', 'text/plain'],
  ['.md', 'text/markdown'],
  ['.markdown', 'text/markdown'],
]);

function parseDirFromArgv(): string | undefined {
  const dirFlagIndex = process.argv.findIndex((arg) => arg === '--dir');
  if (dirFlagIndex >= 0 && process.argv[dirFlagIndex + 1]) {
    return process.argv[dirFlagIndex + 1];
  }
  return undefined;
}

async function collectFiles(rootDir: string): Promise<string[]> {
  const stack = [rootDir];
  const files: string[] = [];

  while (stack.length) {
    const current = stack.pop();
    if (!current) {
      continue;
    }

    const entries = await fs.readdir(current, { withFileTypes: true });
    for (const entry of entries) {
      if (entry.name.startsWith('.')) {
        continue;
      }
      const fullPath = path.join(current, entry.name);
      if (entry.isDirectory()) {
        stack.push(fullPath);
      } else if (CONTENT_TYPES.has(path.extname(entry.name).toLowerCase())) {
        files.push(fullPath);
      }
    }
  }

  return files.sort();
}

async function main(): Promise<void> {
  const dir = parseDirFromArgv() ?? env.RAG_INGEST_DIR;
  const absDir = path.isAbsolute(dir) ? dir : path.resolve(process.cwd(), dir);
  console.log(`[rag:ingest] directory: ${absDir}`);

  if (env.VECTOR_INDEX === 'mongo') {
    await connectToDatabase();
  } else {
    console.warn('[rag:ingest] VECTOR_INDEX=memory: the index is discarded when this script exits');
  }
  const pipeline = createPipelineFromEnv(env);
  const files = await collectFiles(absDir);
  const sourceIds = assignSourceIds(files.map((filePath) => path.relative(absDir, filePath)));

  let ingested = 0;
  let chunks = 0;
  const failures: string[] = [];
  for (const filePath of files) {
    const relativePath = path.relative(absDir, filePath);
    const contentType = CONTENT_TYPES.get(path.extname(filePath).toLowerCase()) ?? 'text/plain';
    try {
      const result = await pipeline.ingest(await fs.readFile(filePath), contentType, {
        sourceId: sourceIds.get(relativePath) ?? relativePath,
        filename: relativePath,
        title: stripExt(path.basename(filePath)),
      });
      ingested += 1;
      chunks += result.chunkCount;
    } catch (error) {
      console.warn(`[rag:ingest] skipped ${relativePath}: ${describeError(error)}`);
      failures.push(relativePath);
    }
  }

  console.log(
    `[rag:ingest] completed: files=${ingested}/${files.length}, chunks=${chunks}, failed=${failures.length}`
  );
  if (failures.length > 0) {
    process.exitCode = 1;
  }
}

main()
  .catch((error) => {
    console.error('[rag:ingest] failed:', error);
    process.exitCode = 1;
  })
  .finally(() =>
    disconnectFromDatabase().catch((error) => {
      console.error('[db] disconnect failed:', error);
    })
  );
