import { PatternError } from './errors.js';

/**
 * Ant-style path patterns.
 *
 *   ?    one character
 *   *    zero or more characters inside one segment
 *   **   zero or more whole segments
 *
 * Segments are split on `/` and empty segments are ignored, so `/a//b`
 * and `/a/b` match the same patterns. A trailing `/**` also matches the bare
 * prefix: `/orders/**` matches `/orders`.
 */

const SEPARATOR = '/';
const DOUBLE = '**';

const segmentCache = new Map<string, RegExp | null>();

function tokenize(text: string): string[] {
  return text.split(SEPARATOR).filter((segment) => segment.length > 0);
}

export function isPattern(text: string): boolean {
  return text.includes('*') || text.includes('?');
}

function compileSegment(segment: string): RegExp | null {
  if (!isPattern(segment)) return null;
  let source = '^';
  for (const ch of segment) {
    if (ch === '*') source += '.*';
    else if (ch === '?') source += '.';
    else source += ch.replace(/[.+^${}()|[\]\\]/g, '\\$&');
  }
  return new RegExp(source + '$');
}

function matchSegment(pattern: string, segment: string): boolean {
  let compiled = segmentCache.get(pattern);
  if (compiled === undefined) {
    compiled = compileSegment(pattern);
    segmentCache.set(pattern, compiled);
  }
  return compiled === null ? pattern === segment : compiled.test(segment);
}

function onlyDoubleWildcards(tokens: string[], from: number, to: number): boolean {
  for (let i = from; i <= to; i++) {
    if (tokens[i] !== DOUBLE) return false;
  }
  return true;
}

export function matches(pattern: string, path: string): boolean {
  if (path.startsWith(SEPARATOR) !== pattern.startsWith(SEPARATOR)) return false;

  const patt = tokenize(pattern);
  const segs = tokenize(path);
  let pattStart = 0;
  let pattEnd = patt.length - 1;
  let pathStart = 0;
  let pathEnd = segs.length - 1;

  // Leading segments up to the first `**`.
  while (pattStart <= pattEnd && pathStart <= pathEnd) {
    const p = patt[pattStart];
    if (p === DOUBLE) break;
    if (!matchSegment(p, segs[pathStart])) return false;
    pattStart++;
    pathStart++;
  }

  if (pathStart > pathEnd) {
    if (pattStart > pattEnd) {
      return pattern.endsWith(SEPARATOR) === path.endsWith(SEPARATOR);
    }
    if (pattStart === pattEnd && patt[pattStart] === '*' && path.endsWith(SEPARATOR)) {
      return true;
    }
    return onlyDoubleWildcards(patt, pattStart, pattEnd);
  }
  if (pattStart > pattEnd) return false;

  // Trailing segments back to the last `**`.
  while (pattStart <= pattEnd && pathStart <= pathEnd) {
    const p = patt[pattEnd];
    if (p === DOUBLE) break;
    if (!matchSegment(p, segs[pathEnd])) return false;
    pattEnd--;
    pathEnd--;
  }
  if (pathStart > pathEnd) {
    return onlyDoubleWildcards(patt, pattStart, pattEnd);
  }

  // Literal runs between two `**` markers, leftmost placement first.
  while (pattStart !== pattEnd && pathStart <= pathEnd) {
    let nextDouble = -1;
    for (let i = pattStart + 1; i <= pattEnd; i++) {
      if (patt[i] === DOUBLE) {
        nextDouble = i;
        break;
      }
    }
    if (nextDouble === pattStart + 1) {
      pattStart++;
      continue;
    }
    const runLength = nextDouble - pattStart - 1;
    const available = pathEnd - pathStart + 1;
    let found = -1;
    search: for (let i = 0; i <= available - runLength; i++) {
      for (let j = 0; j < runLength; j++) {
        if (!matchSegment(patt[pattStart + j + 1], segs[pathStart + i + j])) continue search;
      }
      found = pathStart + i;
      break;
    }
    if (found === -1) return false;
    pattStart = nextDouble;
    pathStart = found + runLength;
  }

  return onlyDoubleWildcards(patt, pattStart, pattEnd);
}

export function validatePattern(pattern: string): void {
  if (pattern.length === 0) throw new PatternError(pattern, 'pattern is empty');
  if (!pattern.startsWith(SEPARATOR)) throw new PatternError(pattern, 'pattern must start with "/"');
  if (/[\s\u0000-\u001f\u007f]/.test(pattern)) {
    throw new PatternError(pattern, 'pattern contains whitespace or control characters');
  }
  if (pattern.includes('***')) throw new PatternError(pattern, '"***" is not a wildcard');
  for (const segment of tokenize(pattern)) {
    if (segment !== DOUBLE && segment.includes(DOUBLE)) {
      throw new PatternError(pattern, `"**" must be a whole segment, got "${segment}"`);
    }
  }
}

interface PatternInfo {
  pattern: string;
  catchAll: boolean;
  prefixPattern: boolean;
  singleWildcards: number;
  doubleWildcards: number;
}

function patternInfo(pattern: string): PatternInfo {
  const doubleWildcards = pattern.split(DOUBLE).length - 1;
  const stars = pattern.split('*').length - 1;
  const catchAll = pattern === '/**';
  return {
    pattern,
    catchAll,
    prefixPattern: !catchAll && pattern.endsWith('/**'),
    singleWildcards: stars - doubleWildcards * 2,
    doubleWildcards,
  };
}

/**
 * Orders patterns that match `path` most specific first. Array sort is
 * stable, so equally specific patterns keep their original order.
 */
export function comparator(path: string): (a: string, b: string) => number {
  return (left, right) => {
    const a = patternInfo(left);
    const b = patternInfo(right);

    const aExact = a.pattern === path;
    const bExact = b.pattern === path;
    if (aExact !== bExact) return aExact ? -1 : 1;

    if (a.catchAll !== b.catchAll) return a.catchAll ? 1 : -1;

    if (a.prefixPattern && b.doubleWildcards === 0) return 1;
    if (b.prefixPattern && a.doubleWildcards === 0) return -1;

    const aTotal = a.singleWildcards + a.doubleWildcards * 2;
    const bTotal = b.singleWildcards + b.doubleWildcards * 2;
    if (aTotal !== bTotal) return aTotal - bTotal;

    if (a.pattern.length !== b.pattern.length) return b.pattern.length - a.pattern.length;

    return a.singleWildcards - b.singleWildcards;
  };
}
