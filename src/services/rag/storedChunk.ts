import { z } from 'zod';
import { RagError } from './errors';
import type { RankCandidate } from './vectorIndex';

const metadataValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const storedChunkSchema = z.object({
  chunkId: z.string().min(1),
  sourceId: z.string().min(1),
  chunkIndex: z.number().int().nonnegative(),
  startOffset: z.number().int().nonnegative(),
  page: z.number().int().positive().default(1),
  text: z.string(),
  embedding: z.array(z.number().finite()).min(1),
  metadata: z.record(metadataValueSchema).default({}),
  revision: z.number().int().positive(),
  sequence: z.number().nonnegative(),
});

export type StoredChunk = z.output<typeof storedChunkSchema>;

export interface DecodedChunks {
  candidates: RankCandidate[];
  corrupt: RagError[];
}

function describeRecord(raw: unknown): string {
  if (typeof raw === 'object' && raw !== null) {
    if ('chunkId' in raw && typeof raw.chunkId === 'string') {
      return raw.chunkId;
    }
    if ('_id' in raw) {
      return String(raw._id);
    }
  }
  return 'unknown';
}

/**
 * Turns raw stored records into search candidates. Records that fail to
 * decode, or whose vector does not match `dimension`, are reported in
 * `corrupt` and left out. Only the revision published for each source counts.
 */
export function decodeStoredChunks(
  records: Iterable<unknown>,
  published: ReadonlyMap<string, number>,
  dimension: number | null
): DecodedChunks {
  const visible = new Map<string, StoredChunk>();
  const corrupt: RagError[] = [];

  for (const raw of records) {
    const parsed = storedChunkSchema.safeParse(raw);
    if (!parsed.success) {
      const fields = parsed.error.issues.map((issue) => issue.path.join('.')).join(', ');
      corrupt.push(new RagError('IndexCorruption', `Stored chunk ${describeRecord(raw)} is unreadable (${fields})`));
      continue;
    }

    const chunk = parsed.data;
    if (dimension !== null && chunk.embedding.length !== dimension) {
      corrupt.push(
        new RagError(
          'IndexCorruption',
          `Stored chunk ${chunk.chunkId} has ${chunk.embedding.length} dimensions, expected ${dimension}`
        )
      );
      continue;
    }

    if (published.get(chunk.sourceId) !== chunk.revision || visible.has(chunk.chunkId)) {
      continue;
    }
    visible.set(chunk.chunkId, chunk);
  }

  const candidates: RankCandidate[] = [...visible.values()].map((chunk) => ({
    sequence: chunk.sequence,
    entry: {
      chunkId: chunk.chunkId,
      sourceId: chunk.sourceId,
      chunkIndex: chunk.chunkIndex,
      startOffset: chunk.startOffset,
      page: chunk.page,
      text: chunk.text,
      vector: chunk.embedding,
      metadata: chunk.metadata,
    },
  }));

  return { candidates, corrupt };
}
