import { describe, expect, it } from 'vitest';
import { chunkDocument, reassembleChunks } from './chunker';
import { isRagError } from './errors';

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected the call to throw');
}

describe('chunkDocument', () => {
  it('slides fixed windows with the configured overlap', () => {
    const chunks = chunkDocument(
      { sourceId: 'letters', text: 'abcdefghij', metadata: { title: 'Letters' } },
      { chunkSize: 4, chunkOverlap: 1 }
    );

    expect(chunks.map((chunk) => chunk.text)).toEqual(['abcd', 'defg', 'ghij']);
    expect(chunks.map((chunk) => chunk.startOffset)).toEqual([0, 3, 6]);
    expect(chunks.map((chunk) => chunk.overlapLen)).toEqual([0, 1, 1]);
    expect(chunks.map((chunk) => chunk.chunkId)).toEqual(['letters:0', 'letters:1', 'letters:2']);
    expect(chunks[2].metadata).toEqual({ title: 'Letters' });
  });

  it('reassembles to the original text once overlaps are dropped', () => {
    const text = 'The quick brown fox jumps over the lazy dog. '.repeat(7).trim();
    const chunks = chunkDocument({ sourceId: 'fox', text, metadata: {} }, { chunkSize: 50, chunkOverlap: 12 });

    expect(chunks.length).toBeGreaterThan(1);
    expect(chunks.every((chunk) => chunk.text.length <= 50)).toBe(true);
    expect(reassembleChunks([...chunks].reverse())).toBe(text);
  });

  it('keeps a short document in a single chunk', () => {
    const chunks = chunkDocument(
      { sourceId: 'doc', text: 'Python is a language created in 1991.', metadata: {} },
      { chunkSize: 1000, chunkOverlap: 200 }
    );

    expect(chunks).toHaveLength(1);
    expect(chunks[0]).toMatchObject({ chunkId: 'doc:0', chunkIndex: 0, startOffset: 0, overlapLen: 0, page: 1 });
  });

  it('returns no chunks for empty text', () => {
    expect(chunkDocument({ sourceId: 'empty', text: '', metadata: {} }, { chunkSize: 10, chunkOverlap: 0 })).toEqual(
      []
    );
  });

  it('numbers pages by the form feeds before each chunk start', () => {
    const chunks = chunkDocument(
      { sourceId: 'pages', text: 'one\ftwo\fthree', metadata: {} },
      { chunkSize: 4, chunkOverlap: 0 }
    );

    expect(chunks.map((chunk) => chunk.text)).toEqual(['one\f', 'two\f', 'thre', 'e']);
    expect(chunks.map((chunk) => chunk.page)).toEqual([1, 2, 2, 3]);
  });

  it('ends sentence-mode chunks at the last sentence break in the window', () => {
    const text = 'One two. Three four. Five six.';
    const chunks = chunkDocument(
      { sourceId: 'sentences', text, metadata: {} },
      { chunkSize: 14, chunkOverlap: 0, boundary: 'sentence' }
    );

    expect(chunks.map((chunk) => chunk.text)).toEqual(['One two.', ' Three four.', ' Five six.']);
    expect(reassembleChunks(chunks)).toBe(text);
  });

  it('treats a blank line as a sentence break', () => {
    const chunks = chunkDocument(
      { sourceId: 'paragraphs', text: 'Alpha beta.\n\nGamma delta epsilon', metadata: {} },
      { chunkSize: 16, chunkOverlap: 0, boundary: 'sentence' }
    );

    expect(chunks.map((chunk) => chunk.text)).toEqual(['Alpha beta.\n\n', 'Gamma delta epsi', 'lon']);
  });

  it.each([
    { chunkSize: 0, chunkOverlap: 0 },
    { chunkSize: 10, chunkOverlap: 10 },
    { chunkSize: 10, chunkOverlap: -1 },
    { chunkSize: 2.5, chunkOverlap: 0 },
  ])('rejects chunkSize=$chunkSize chunkOverlap=$chunkOverlap', (options) => {
    const error = captureError(() => chunkDocument({ sourceId: 's', text: 'text', metadata: {} }, options));
    expect(isRagError(error, 'InvalidConfig')).toBe(true);
  });
});
