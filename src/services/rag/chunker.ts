import { RagError } from './errors';
import { chunkIdFor, type Chunk, type SourceDocument } from './types';

export type ChunkBoundary = 'fixed' | 'sentence';

export interface ChunkOptions {
  chunkSize: number;
  chunkOverlap: number;
  boundary?: ChunkBoundary;
}

const PAGE_BREAK = '\f';
const SENTENCE_BREAKS = ['. ', '? ', '! ', '\n\n'];

function assertChunkOptions(options: ChunkOptions): void {
  const { chunkSize, chunkOverlap } = options;
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new RagError('InvalidConfig', `chunkSize must be a positive integer, got ${chunkSize}`);
  }
  if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0) {
    throw new RagError('InvalidConfig', `chunkOverlap must be a non-negative integer, got ${chunkOverlap}`);
  }
  if (chunkOverlap >= chunkSize) {
    throw new RagError(
      'InvalidConfig',
      `chunkOverlap (${chunkOverlap}) must be smaller than chunkSize (${chunkSize})`
    );
  }
}

function pageBreakOffsets(text: string): number[] {
  const offsets: number[] = [];
  for (let i = text.indexOf(PAGE_BREAK); i !== -1; i = text.indexOf(PAGE_BREAK, i + 1)) {
    offsets.push(i);
  }
  return offsets;
}

function pageAt(breaks: number[], offset: number): number {
  let page = 1;
  for (const position of breaks) {
    if (position >= offset) {
      break;
    }
    page += 1;
  }
  return page;
}

// Pulls `end` back to the last sentence break in the window, as long as the
// next window would still start after this one.
function snapToSentence(text: string, start: number, end: number, overlap: number): number {
  const window = text.slice(start, end);
  let best = -1;
  for (const marker of SENTENCE_BREAKS) {
    const position = window.lastIndexOf(marker);
    if (position === -1) {
      continue;
    }
    const candidate = start + position + (marker === '\n\n' ? 2 : 1);
    if (candidate > best) {
      best = candidate;
    }
  }
  return best > start + overlap ? best : end;
}

/**
 * Splits a document into windows of at most `chunkSize` characters, each
 * starting `chunkOverlap` characters before the previous one ended.
 * Chunk texts are exact substrings: dropping each chunk's first `overlapLen`
 * characters and concatenating gives back the document.
 */
export function chunkDocument(document: SourceDocument, options: ChunkOptions): Chunk[] {
  assertChunkOptions(options);
  const { chunkSize, chunkOverlap } = options;
  const boundary = options.boundary ?? 'fixed';
  const { text } = document;
  if (text.length === 0) {
    return [];
  }

  const breaks = pageBreakOffsets(text);
  const chunks: Chunk[] = [];
  let start = 0;
  let previousEnd = 0;

  while (start < text.length) {
    let end = Math.min(start + chunkSize, text.length);
    if (boundary === 'sentence' && end < text.length) {
      end = snapToSentence(text, start, end, chunkOverlap);
    }

    const chunkIndex = chunks.length;
    chunks.push({
      chunkId: chunkIdFor(document.sourceId, chunkIndex),
      sourceId: document.sourceId,
      chunkIndex,
      startOffset: start,
      overlapLen: chunkIndex === 0 ? 0 : previousEnd - start,
      page: pageAt(breaks, start),
      text: text.slice(start, end),
      metadata: { ...document.metadata },
    });

    if (end >= text.length) {
      break;
    }
    previousEnd = end;
    start = end - chunkOverlap;
  }

  return chunks;
}

export function reassembleChunks(chunks: readonly Chunk[]): string {
  return [...chunks]
    .sort((a, b) => a.chunkIndex - b.chunkIndex)
    .map((chunk) => chunk.text.slice(chunk.overlapLen))
    .join('');
}
