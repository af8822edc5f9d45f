import { describe, expect, it } from 'vitest';
import { isRagError } from './errors';
import {
  assignSourceIds,
  cosineSimilarity,
  createSourceIdFromPath,
  normalizeText,
  stripExt,
  tokenizeForSearch,
} from './textUtils';

describe('normalizeText', () => {
  it('unifies line endings and collapses whitespace runs', () => {
    expect(normalizeText('  a\r\nb\r\n\r\n\r\nc\t\td\u3000e  ')).toBe('a\nb\n\nc d e');
  });

  it('keeps form feeds used as page breaks', () => {
    expect(normalizeText('page one\fpage two')).toBe('page one\fpage two');
  });
});

describe('tokenizeForSearch', () => {
  it('lowercases words, drops stopwords and duplicates, and adds Han bigrams', () => {
    expect(tokenizeForSearch('The Quick quick fox, 2024! 机器学习')).toEqual(['quick', 'fox', '2024', '机器', '器学', '学习']);
  });
});

describe('cosineSimilarity', () => {
  it('returns 0 for mismatched or zero vectors', () => {
    expect(cosineSimilarity([1, 0], [1, 0, 0])).toBe(0);
    expect(cosineSimilarity([0, 0], [1, 0])).toBe(0);
    expect(cosineSimilarity([2, 0], [3, 0])).toBe(1);
  });
});

describe('source ids from paths', () => {
  it('keeps only path-safe characters', () => {
    expect(createSourceIdFromPath('./Notes/My File (v2).md')).toBe('Notes/My-File-v2.md');
    expect(stripExt('guide.v2.md')).toBe('guide.v2');
  });
});

describe('assignSourceIds', () => {
  it('keeps letters of any script, spaces and case apart', () => {
    const ids = assignSourceIds(['文档.md', '笔记.md', 'My File.md', 'myfile.md']);

    expect([...ids.values()]).toEqual(['文档.md', '笔记.md', 'My-File.md', 'myfile.md']);
  });

  it('rejects two paths that reduce to the same id', () => {
    let caught: unknown;
    try {
      assignSourceIds(['notes/a b.md', 'notes/a-b.md']);
    } catch (error) {
      caught = error;
    }

    expect(isRagError(caught, 'InvalidInput')).toBe(true);
    expect(caught).toHaveProperty(
      'message',
      'notes/a b.md and notes/a-b.md both map to source id "notes/a-b.md"; rename one of them'
    );
  });
});
