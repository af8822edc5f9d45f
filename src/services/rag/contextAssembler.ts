import type { ConversationMemory } from './conversationMemory';
import { RagError } from './errors';
import type { ConversationTurn, ScoredChunk } from './types';

export interface ContextPassage extends ScoredChunk {
  /** Citation label shown to the model, e.g. `S1`. */
  label: string;
}

export interface PromptContext {
  passages: ContextPassage[];
  /** Oldest first. */
  history: ConversationTurn[];
  budget: number;
  usedChars: number;
  duplicatesRemoved: number;
  passagesDropped: number;
  turnsDropped: number;
}

export interface AssembleOptions {
  /** Maximum characters of passage text plus conversation turns. */
  budget: number;
  /** Two passages overlapping by more than this fraction of the shorter one are duplicates. */
  dedupOverlap: number;
  historyTurns: number;
}

type MemoryView = Pick<ConversationMemory, 'recent'>;

function assertOptions(options: AssembleOptions): void {
  if (!Number.isInteger(options.budget) || options.budget <= 0) {
    throw new RagError('InvalidConfig', `Context budget must be a positive integer, got ${options.budget}`);
  }
  if (!(options.dedupOverlap > 0 && options.dedupOverlap <= 1)) {
    throw new RagError('InvalidConfig', `dedupOverlap must be in (0, 1], got ${options.dedupOverlap}`);
  }
  if (!Number.isInteger(options.historyTurns) || options.historyTurns < 0) {
    throw new RagError('InvalidConfig', `historyTurns must be a non-negative integer, got ${options.historyTurns}`);
  }
}

/** Fraction of the shorter passage covered by the other one. */
export function overlapRatio(a: ScoredChunk, b: ScoredChunk): number {
  if (a.chunkId === b.chunkId) {
    return 1;
  }
  const shorter = a.text.length <= b.text.length ? a : b;
  const longer = shorter === a ? b : a;
  if (shorter.text.length === 0) {
    return 0;
  }

  if (a.sourceId === b.sourceId) {
    const start = Math.max(a.startOffset, b.startOffset);
    const end = Math.min(a.startOffset + a.text.length, b.startOffset + b.text.length);
    return Math.max(0, end - start) / shorter.text.length;
  }

  return longer.text.includes(shorter.text) ? 1 : 0;
}

function turnSize(turn: ConversationTurn): number {
  return turn.question.length + turn.answer.length;
}

/**
 * Builds the prompt context for one question:
 * near-duplicate passages are removed (the higher score wins), the rest are
 * packed greedily by descending score until the next one would overflow the
 * budget, and the most recent turns that still fit are appended oldest first.
 */
export function assembleContext(
  passages: readonly ScoredChunk[],
  memory: MemoryView,
  options: AssembleOptions
): PromptContext {
  assertOptions(options);

  const ranked = passages
    .map((passage, position) => ({ passage, position }))
    .sort((a, b) => b.passage.score - a.passage.score || a.position - b.position)
    .map((item) => item.passage);

  const unique: ScoredChunk[] = [];
  for (const candidate of ranked) {
    if (!unique.some((kept) => overlapRatio(kept, candidate) > options.dedupOverlap)) {
      unique.push(candidate);
    }
  }

  let usedChars = 0;
  const packed: ContextPassage[] = [];
  for (const passage of unique) {
    if (usedChars + passage.text.length > options.budget) {
      break;
    }
    usedChars += passage.text.length;
    packed.push({ ...passage, metadata: { ...passage.metadata }, label: `S${packed.length + 1}` });
  }

  const recentTurns = options.historyTurns > 0 ? memory.recent(options.historyTurns) : [];
  const history: ConversationTurn[] = [];
  for (let i = recentTurns.length - 1; i >= 0; i -= 1) {
    const size = turnSize(recentTurns[i]);
    if (usedChars + size > options.budget) {
      break;
    }
    usedChars += size;
    history.unshift(recentTurns[i]);
  }

  return {
    passages: packed,
    history,
    budget: options.budget,
    usedChars,
    duplicatesRemoved: ranked.length - unique.length,
    passagesDropped: unique.length - packed.length,
    turnsDropped: recentTurns.length - history.length,
  };
}
