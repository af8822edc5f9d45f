import { describe, expect, it } from 'vitest';
import { assembleContext, overlapRatio } from './contextAssembler';
import { isRagError } from './errors';
import type { ConversationTurn, ScoredChunk } from './types';

function passage(sourceId: string, startOffset: number, text: string, score: number): ScoredChunk {
  return {
    chunkId: `${sourceId}:${startOffset}`,
    sourceId,
    chunkIndex: startOffset,
    startOffset,
    page: 1,
    text,
    metadata: {},
    score,
  };
}

function turn(question: string, answer: string): ConversationTurn {
  return { question, answer, timestamp: new Date('2024-01-01T00:00:00Z') };
}

function memoryOf(turns: ConversationTurn[]) {
  return { recent: (n?: number) => turns.slice(-(n ?? turns.length)) };
}

const noMemory = memoryOf([]);

describe('overlapRatio', () => {
  it('measures offset overlap within a source', () => {
    const a = passage('s', 0, 'a'.repeat(100), 0.9);
    const b = passage('s', 20, 'b'.repeat(100), 0.8);
    expect(overlapRatio(a, b)).toBe(0.8);
  });

  it('treats containment across sources as full overlap', () => {
    const long = passage('s', 0, 'the cat sat on the mat', 0.9);
    const short = passage('t', 0, 'cat sat', 0.8);
    expect(overlapRatio(long, short)).toBe(1);
    expect(overlapRatio(long, passage('t', 0, 'dog', 0.8))).toBe(0);
  });
});

describe('assembleContext', () => {
  it('drops near-duplicates in favour of the higher score', () => {
    const context = assembleContext(
      [
        passage('s', 20, 'b'.repeat(100), 0.8),
        passage('s', 0, 'a'.repeat(100), 0.9),
        passage('s', 60, 'c'.repeat(100), 0.7),
        passage('t', 0, 'a'.repeat(40), 0.6),
      ],
      noMemory,
      { budget: 1000, dedupOverlap: 0.5, historyTurns: 0 }
    );

    expect(context.passages.map((item) => [item.label, item.chunkId])).toEqual([
      ['S1', 's:0'],
      ['S2', 's:60'],
    ]);
    expect(context.duplicatesRemoved).toBe(2);
    expect(context.usedChars).toBe(200);
  });

  it('stops packing at the first passage that does not fit', () => {
    const context = assembleContext(
      [
        passage('s1', 0, 'a'.repeat(100), 0.9),
        passage('s2', 0, 'b'.repeat(100), 0.8),
        passage('s3', 0, 'c'.repeat(10), 0.7),
      ],
      noMemory,
      { budget: 150, dedupOverlap: 0.5, historyTurns: 0 }
    );

    expect(context.passages.map((item) => item.chunkId)).toEqual(['s1:0']);
    expect(context.passagesDropped).toBe(2);
    expect(context.usedChars).toBe(100);
  });

  it('adds the newest turns that fit, oldest first', () => {
    const turns = [turn('q1', 'a1'), turn('q2', 'a2'), turn('q3', 'a3')];
    const context = assembleContext([passage('s', 0, 'a'.repeat(100), 0.9)], memoryOf(turns), {
      budget: 110,
      dedupOverlap: 0.5,
      historyTurns: 3,
    });

    expect(context.history.map((item) => item.question)).toEqual(['q2', 'q3']);
    expect(context.turnsDropped).toBe(1);
    expect(context.usedChars).toBe(108);
  });

  it('asks memory for no more than the configured turns', () => {
    const turns = [turn('q1', 'a1'), turn('q2', 'a2'), turn('q3', 'a3')];
    const context = assembleContext([], memoryOf(turns), { budget: 1000, dedupOverlap: 0.5, historyTurns: 1 });

    expect(context.history.map((item) => item.question)).toEqual(['q3']);
    expect(context.passages).toEqual([]);
  });

  it('is deterministic for equal scores', () => {
    const passages = [passage('x', 0, 'xx', 0.5), passage('y', 0, 'yy', 0.5), passage('z', 0, 'zz', 0.5)];
    const options = { budget: 100, dedupOverlap: 0.5, historyTurns: 0 };

    const first = assembleContext(passages, noMemory, options);
    const second = assembleContext(passages, noMemory, options);

    expect(first.passages.map((item) => item.chunkId)).toEqual(['x:0', 'y:0', 'z:0']);
    expect(second).toEqual(first);
  });

  it.each([
    { budget: 0, dedupOverlap: 0.5, historyTurns: 0 },
    { budget: 100, dedupOverlap: 0, historyTurns: 0 },
    { budget: 100, dedupOverlap: 1.5, historyTurns: 0 },
    { budget: 100, dedupOverlap: 0.5, historyTurns: -1 },
  ])('rejects %o', (options) => {
    let caught: unknown;
    try {
      assembleContext([], noMemory, options);
    } catch (error) {
      caught = error;
    }
    expect(isRagError(caught, 'InvalidConfig')).toBe(true);
  });
});
