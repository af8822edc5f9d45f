import { createHash } from 'node:crypto';
import { RagError } from './errors';

const CHINESE_CHAR_REGEX = /\p{Script=Han}/u;

const STOPWORDS = new Set([
  'a', 'an', 'and', 'are', 'as', 'at', 'be', 'by', 'did', 'do', 'does', 'for', 'from', 'how', 'in', 'is', 'it',
  'of', 'on', 'or', 'that', 'the', 'this', 'to', 'was', 'what', 'when', 'where', 'which', 'who', 'why', 'with',
]);

export function normalizeText(input: string): string {
  return input
    .replace(/\r\n?/g, '\n')
    .replace(/\u3000/g, ' ')
    .replace(/[ \t]+/g, ' ')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

export function tokenizeForSearch(input: string): string[] {
  const normalized = normalizeText(input).toLowerCase();
  const englishTokens = normalized.match(/[a-z0-9]+/g) ?? [];

  const hanChars = [...normalized].filter((char) => CHINESE_CHAR_REGEX.test(char));
  const chineseBigrams: string[] = [];
  for (let i = 0; i < hanChars.length - 1; i += 1) {
    chineseBigrams.push(`${hanChars[i]}${hanChars[i + 1]}`);
  }

  const uniq = new Set<string>();
  for (const token of [...englishTokens, ...chineseBigrams]) {
    if (token.length >= 2 && !STOPWORDS.has(token)) {
      uniq.add(token);
    }
  }
  return [...uniq];
}

export function cosineSimilarity(vectorA: readonly number[], vectorB: readonly number[]): number {
  if (vectorA.length === 0 || vectorB.length === 0 || vectorA.length !== vectorB.length) {
    return 0;
  }

  let dot = 0;
  let magA = 0;
  let magB = 0;

  for (let i = 0; i < vectorA.length; i += 1) {
    const a = vectorA[i];
    const b = vectorB[i];
    dot += a * b;
    magA += a * a;
    magB += b * b;
  }

  if (magA === 0 || magB === 0) {
    return 0;
  }

  return dot / (Math.sqrt(magA) * Math.sqrt(magB));
}

export function l2Normalize(vector: readonly number[]): number[] {
  let sum = 0;
  for (const value of vector) {
    sum += value * value;
  }
  if (sum === 0) {
    return [...vector];
  }
  const norm = Math.sqrt(sum);
  return vector.map((value) => value / norm);
}

export function sha256(input: string): string {
  return createHash('sha256').update(input).digest('hex');
}

export function createSourceIdFromPath(filePath: string): string {
  return filePath
    .normalize('NFC')
    .replace(/[\\/]+/g, '/')
    .replace(/^\.\//, '')
    .replace(/\s+/g, '-')
    .replace(/[^\p{L}\p{M}\p{N}/_.-]/gu, '');
}

/**
 * Maps each relative path to its source id. Two paths that reduce to the same
 * id would overwrite each other on ingest, so that is an error.
 */
export function assignSourceIds(relativePaths: readonly string[]): Map<string, string> {
  const owners = new Map<string, string>();
  const ids = new Map<string, string>();
  for (const relativePath of relativePaths) {
    const sourceId = createSourceIdFromPath(relativePath);
    const owner = owners.get(sourceId);
    if (owner !== undefined) {
      throw new RagError('InvalidInput', `${owner} and ${relativePath} both map to source id "${sourceId}"; rename one of them`);
    }
    owners.set(sourceId, relativePath);
    ids.set(relativePath, sourceId);
  }
  return ids;
}

export function stripExt(fileName: string): string {
  return fileName.replace(/\.[^/.]+$/, '');
}
