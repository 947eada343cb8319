/**
 * Text locator - finds a search block inside file content.
 *
 * Cascade, stopping at the first level that matches:
 *   0. exact substring
 *   1. trailing whitespace ignored on every line
 *   2. leading and trailing whitespace ignored on every line
 *   3. fuzzy block match (only when a threshold is configured)
 *
 * Levels 1 and 2 map the match back onto the original buffer: a match that
 * starts or ends on a line boundary covers the whole original line, including
 * the whitespace the normalization dropped.
 */

import { FuzzyMatcher, trimLines, trimLinesRight } from './fuzzy.js';

/**
 * Cascade level at which a match succeeded. -1 means not found.
 */
export type MatchLevel = -1 | 0 | 1 | 2 | 3;

/**
 * Location of a search block inside a buffer.
 */
export interface MatchResult {
  /** Start offset in the searched buffer */
  start: number;
  /** End offset (exclusive) in the searched buffer */
  end: number;
  level: MatchLevel;
  found: boolean;
}

const NO_MATCH: MatchResult = { start: 0, end: 0, level: -1, found: false };

/**
 * Locate `search` in `content` using the normalization cascade.
 *
 * @param fuzzyThreshold - Minimum block ratio for level 3; 0 disables fuzzy matching
 */
export function locateText(content: string, search: string, fuzzyThreshold: number): MatchResult {
  const exact = content.indexOf(search);
  if (exact >= 0) {
    return { start: exact, end: exact + search.length, level: 0, found: true };
  }

  const rstripped = trimLinesRight(content);
  const rstrippedSearch = trimLinesRight(search);
  const rstripIndex = rstripped.indexOf(rstrippedSearch);
  if (rstripIndex >= 0) {
    return mapToOriginal(content, rstripped, rstripIndex, rstrippedSearch.length, 1);
  }

  const stripped = trimLines(content);
  const strippedSearch = trimLines(search);
  const stripIndex = stripped.indexOf(strippedSearch);
  if (stripIndex >= 0) {
    return mapToOriginal(content, stripped, stripIndex, strippedSearch.length, 2);
  }

  if (fuzzyThreshold > 0) {
    const fuzzy = new FuzzyMatcher(fuzzyThreshold).findBestMatch(content, search);
    if (fuzzy.found) {
      return { start: fuzzy.start, end: fuzzy.end, level: 3, found: true };
    }
  }

  return NO_MATCH;
}

/**
 * Map a match in normalized text back onto the original buffer.
 *
 * Normalization only strips whitespace at line ends, so line `i` of one is
 * line `i` of the other and a column inside a line shifts by that line's
 * stripped indentation. A boundary at the start of a normalized line maps to
 * the start of the original line (indentation included), and one at the end
 * maps to the end of the original line (trailing whitespace included).
 */
function mapToOriginal(
  original: string,
  normalized: string,
  normStart: number,
  normLength: number,
  level: 1 | 2
): MatchResult {
  const origLines = original.split('\n');
  const normLines = normalized.split('\n');

  const toOriginal = (offset: number): number => {
    let normLineStart = 0;
    let origLineStart = 0;
    for (let i = 0; i < normLines.length; i++) {
      const normLine = normLines[i] ?? '';
      const origLine = origLines[i] ?? '';
      if (offset <= normLineStart + normLine.length || i === normLines.length - 1) {
        const column = offset - normLineStart;
        if (column <= 0) return origLineStart;
        if (column >= normLine.length) return origLineStart + origLine.length;
        const indent = level === 2 ? origLine.length - origLine.trimStart().length : 0;
        return origLineStart + indent + column;
      }
      normLineStart += normLine.length + 1;
      origLineStart += origLine.length + 1;
    }
    return original.length;
  };

  const start = toOriginal(normStart);
  const end = Math.min(toOriginal(normStart + normLength), original.length);
  return { start, end, level, found: true };
}

/**
 * Count non-overlapping occurrences of `search`.
 * An empty search matches at every position including the end.
 */
export function countMatches(content: string, search: string): number {
  if (search === '') return content.length + 1;
  return matchOffsets(content, search).length;
}

/**
 * Offsets of every non-overlapping occurrence of `search`.
 */
export function matchOffsets(content: string, search: string): number[] {
  const offsets: number[] = [];
  if (search === '') return offsets;

  let pos = content.indexOf(search);
  while (pos >= 0) {
    offsets.push(pos);
    pos = content.indexOf(search, pos + search.length);
  }
  return offsets;
}

/**
 * 1-based line number of a character offset.
 */
export function lineNumberAt(content: string, offset: number): number {
  let line = 1;
  const limit = Math.min(offset, content.length);
  for (let i = 0; i < limit; i++) {
    if (content.charCodeAt(i) === 10) line++;
  }
  return line;
}
