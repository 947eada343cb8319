/**
 * Fuzzy text matching primitives.
 *
 * Two similarity measures are provided:
 * - Levenshtein edit distance, exposed as a 0..1 similarity ratio. Used for
 *   "did you mean" suggestions on single lines.
 * - A Ratcliff/Obershelp-style block ratio built on recursive longest common
 *   substrings. Used to score multi-line windows during block search.
 *
 * Block search is bounded by a cost estimate; searches estimated above
 * {@link MAX_FUZZY_SEARCH_COST} report not-found instead of running.
 */

// -----------------------------------------------------------------------------
// Constants
// -----------------------------------------------------------------------------

/** Inputs longer than this use the line-indexed longest-common-run heuristic */
export const LCS_DP_MAX_LENGTH = 1000;

/** Window line counts range over ±10% of the search block's line count */
export const WINDOW_SCALE = 0.1;

/**
 * Ceiling on `windowRange * averagePositions * searchLength`.
 * 500 lines, 3 window sizes and ~150 chars per chunk run in under 10ms,
 * so this keeps the worst accepted search around two seconds.
 */
export const MAX_FUZZY_SEARCH_COST = 50_000_000;

// -----------------------------------------------------------------------------
// Types
// -----------------------------------------------------------------------------

/**
 * A common substring located in two strings.
 */
export interface CommonSubstring {
  /** Offset in the first string */
  start1: number;
  /** Offset in the second string */
  start2: number;
  /** Length in characters (0 when nothing is shared) */
  length: number;
}

/**
 * Result of a fuzzy block search.
 */
export interface FuzzyMatch {
  /** Offset of the matched window in the content */
  start: number;
  /** End offset (exclusive) of the matched window */
  end: number;
  /** Block similarity ratio of the window */
  ratio: number;
  /** Text of the matched window */
  matched: string;
  found: boolean;
}

/**
 * Most similar single line, for error suggestions.
 */
export interface SimilarLine {
  /** 1-based line number (0 when nothing scored above zero) */
  lineNumber: number;
  line: string;
  ratio: number;
}

/**
 * Most similar multi-line chunk, optionally widened with surrounding lines.
 */
export interface SimilarChunk {
  /** 1-based line number of the best window */
  startLine: number;
  chunk: string;
  ratio: number;
}

const NOT_FOUND: FuzzyMatch = { start: 0, end: 0, ratio: 0, matched: '', found: false };

// -----------------------------------------------------------------------------
// Edit Distance
// -----------------------------------------------------------------------------

/**
 * Classic dynamic-programming Levenshtein distance.
 */
export function levenshteinDistance(a: string, b: string): number {
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let prev = new Array<number>(b.length + 1);
  let curr = new Array<number>(b.length + 1);
  for (let j = 0; j <= b.length; j++) {
    prev[j] = j;
  }

  for (let i = 1; i <= a.length; i++) {
    curr[0] = i;
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      curr[j] = Math.min(
        (prev[j] ?? 0) + 1,
        (curr[j - 1] ?? 0) + 1,
        (prev[j - 1] ?? 0) + cost
      );
    }
    [prev, curr] = [curr, prev];
  }

  return prev[b.length] ?? 0;
}

/**
 * Similarity in 0..1 derived from edit distance: `1 - distance / max(len)`.
 */
export function similarityRatio(a: string, b: string): number {
  if (a.length === 0 && b.length === 0) return 1;
  const maxLen = Math.max(a.length, b.length);
  return 1 - levenshteinDistance(a, b) / maxLen;
}

// -----------------------------------------------------------------------------
// Longest Common Substring
// -----------------------------------------------------------------------------

/**
 * Longest common substring by rolling-array DP. Quadratic time, linear memory.
 * Ties keep the first run found.
 */
export function longestCommonSubstringDP(s1: string, s2: string): CommonSubstring {
  if (s1.length === 0 || s2.length === 0) {
    return { start1: 0, start2: 0, length: 0 };
  }

  let prev = new Array<number>(s2.length + 1).fill(0);
  let curr = new Array<number>(s2.length + 1).fill(0);
  let maxLen = 0;
  let endPos1 = 0;
  let endPos2 = 0;

  for (let i = 1; i <= s1.length; i++) {
    for (let j = 1; j <= s2.length; j++) {
      if (s1[i - 1] === s2[j - 1]) {
        const run = (prev[j - 1] ?? 0) + 1;
        curr[j] = run;
        if (run > maxLen) {
          maxLen = run;
          endPos1 = i;
          endPos2 = j;
        }
      } else {
        curr[j] = 0;
      }
    }
    [prev, curr] = [curr, prev];
    curr.fill(0);
  }

  if (maxLen === 0) {
    return { start1: 0, start2: 0, length: 0 };
  }
  return { start1: endPos1 - maxLen, start2: endPos2 - maxLen, length: maxLen };
}

/**
 * Longest run of consecutive identical lines, reported in character offsets.
 *
 * Lines of the second string are indexed by content so every candidate start
 * is visited once. Matches smaller than a line are not seen; in exchange the
 * cost stays near-linear for large inputs.
 */
export function longestCommonSubstringLines(s1: string, s2: string): CommonSubstring {
  const lines1 = s1.split('\n');
  const lines2 = s2.split('\n');

  const index = new Map<string, number[]>();
  lines2.forEach((line, j) => {
    const positions = index.get(line);
    if (positions) {
      positions.push(j);
    } else {
      index.set(line, [j]);
    }
  });

  let maxRun = 0;
  let runStart1 = 0;
  let runStart2 = 0;

  lines1.forEach((line, i) => {
    for (const j of index.get(line) ?? []) {
      let run = 0;
      while (
        i + run < lines1.length &&
        j + run < lines2.length &&
        lines1[i + run] === lines2[j + run]
      ) {
        run++;
      }
      if (run > maxRun) {
        maxRun = run;
        runStart1 = i;
        runStart2 = j;
      }
    }
  });

  if (maxRun === 0) {
    return { start1: 0, start2: 0, length: 0 };
  }

  const matchedLines = lines1.slice(runStart1, runStart1 + maxRun);
  return {
    start1: offsetOfLine(lines1, runStart1),
    start2: offsetOfLine(lines2, runStart2),
    length: joinedLength(matchedLines),
  };
}

/**
 * Longest common substring, choosing the DP for short inputs and the
 * line-run heuristic once either input exceeds {@link LCS_DP_MAX_LENGTH}.
 */
export function longestCommonSubstring(s1: string, s2: string): CommonSubstring {
  if (s1.length === 0 || s2.length === 0) {
    return { start1: 0, start2: 0, length: 0 };
  }
  if (s1.length > LCS_DP_MAX_LENGTH || s2.length > LCS_DP_MAX_LENGTH) {
    return longestCommonSubstringLines(s1, s2);
  }
  return longestCommonSubstringDP(s1, s2);
}

// -----------------------------------------------------------------------------
// Block Similarity
// -----------------------------------------------------------------------------

/**
 * Characters matched by recursively taking the longest common substring and
 * recursing into the remainders on either side of it.
 */
export function countMatchingChars(s1: string, s2: string): number {
  const { start1, start2, length } = longestCommonSubstring(s1, s2);
  if (length === 0) return 0;

  let matches = length;

  if (start1 > 0 && start2 > 0) {
    matches += countMatchingChars(s1.slice(0, start1), s2.slice(0, start2));
  }

  const end1 = start1 + length;
  const end2 = start2 + length;
  if (end1 < s1.length && end2 < s2.length) {
    matches += countMatchingChars(s1.slice(end1), s2.slice(end2));
  }

  return matches;
}

/**
 * Block similarity ratio `2 * M / (len1 + len2)`.
 */
export function sequenceMatcherRatio(s1: string, s2: string): number {
  if (s1.length === 0 && s2.length === 0) return 1;
  if (s1.length === 0 || s2.length === 0) return 0;
  return (2 * countMatchingChars(s1, s2)) / (s1.length + s2.length);
}

// -----------------------------------------------------------------------------
// Fuzzy Matcher
// -----------------------------------------------------------------------------

/**
 * Line-windowed block search with a minimum acceptable ratio.
 *
 * @example
 * const matcher = new FuzzyMatcher(0.8);
 * const match = matcher.findBestMatch(fileContent, searchBlock);
 * if (match.found) {
 *   const updated = fileContent.slice(0, match.start) + replacement + fileContent.slice(match.end);
 * }
 */
export class FuzzyMatcher {
  constructor(readonly threshold: number) {}

  /**
   * Estimated work for a block search, in character comparisons.
   * Returns the window bounds alongside so the search reuses them.
   */
  estimateCost(
    contentLineCount: number,
    search: string
  ): { minLen: number; maxLen: number; cost: number } {
    const searchLineCount = search.split('\n').length;
    const minLen = Math.max(1, Math.floor(searchLineCount * (1 - WINDOW_SCALE)));
    const maxLen = Math.min(contentLineCount, Math.floor(searchLineCount * (1 + WINDOW_SCALE)));

    const windowRange = maxLen - minLen + 1;
    const averagePositions = Math.max(1, contentLineCount - Math.floor((minLen + maxLen) / 2));
    return { minLen, maxLen, cost: windowRange * averagePositions * search.length };
  }

  /**
   * Find the window of lines most similar to `search`.
   * Windows scoring below the threshold are never reported.
   */
  findBestMatch(content: string, search: string): FuzzyMatch {
    if (this.threshold <= 0 || search.length === 0) {
      return NOT_FOUND;
    }

    const contentLines = content.split('\n');
    const { minLen, maxLen, cost } = this.estimateCost(contentLines.length, search);
    if (cost > MAX_FUZZY_SEARCH_COST) {
      return NOT_FOUND;
    }

    let bestRatio = 0;
    let bestStartLine = -1;
    let bestEndLine = -1;

    for (let length = minLen; length <= maxLen; length++) {
      for (let i = 0; i <= contentLines.length - length; i++) {
        const chunk = contentLines.slice(i, i + length).join('\n');
        const ratio = sequenceMatcherRatio(chunk, search);
        if (ratio > bestRatio && ratio >= this.threshold) {
          bestRatio = ratio;
          bestStartLine = i;
          bestEndLine = i + length;
        }
      }
    }

    if (bestStartLine < 0) {
      return NOT_FOUND;
    }

    const window = contentLines.slice(bestStartLine, bestEndLine);
    const start = offsetOfLine(contentLines, bestStartLine);
    const end = Math.min(content.length, start + joinedLength(window));
    return { start, end, ratio: bestRatio, matched: window.join('\n'), found: true };
  }
}

// -----------------------------------------------------------------------------
// Suggestions
// -----------------------------------------------------------------------------

/**
 * Line most similar to `search`, scored against both the whole search text
 * and its first line.
 */
export function findMostSimilarLine(content: string, search: string): SimilarLine {
  const newlineIndex = search.indexOf('\n');
  const firstLine = newlineIndex > 0 ? search.slice(0, newlineIndex) : search;
  const trimmedSearch = search.trim();
  const trimmedFirst = firstLine.trim();

  let best: SimilarLine = { lineNumber: 0, line: '', ratio: 0 };
  content.split('\n').forEach((line, i) => {
    const trimmed = line.trim();
    const ratio = Math.max(
      similarityRatio(trimmed, trimmedSearch),
      similarityRatio(trimmed, trimmedFirst)
    );
    if (ratio > best.ratio) {
      best = { lineNumber: i + 1, line, ratio };
    }
  });
  return best;
}

/**
 * Window of `search`'s line count most similar to it once every line is
 * trimmed. A window scoring above 0.5 is widened by `contextLines` each side.
 */
export function findSimilarChunk(
  content: string,
  search: string,
  contextLines: number
): SimilarChunk {
  const contentLines = content.split('\n');
  const searchLineCount = search.split('\n').length;
  const normalizedSearch = trimLines(search);

  let best: SimilarChunk = { startLine: 0, chunk: '', ratio: 0 };
  for (let i = 0; i <= contentLines.length - searchLineCount; i++) {
    const chunk = contentLines.slice(i, i + searchLineCount).join('\n');
    const ratio = similarityRatio(trimLines(chunk), normalizedSearch);
    if (ratio > best.ratio) {
      best = { startLine: i + 1, chunk, ratio };
    }
  }

  if (best.ratio > 0.5 && contextLines > 0) {
    const from = Math.max(0, best.startLine - 1 - contextLines);
    const to = Math.min(contentLines.length, best.startLine - 1 + searchLineCount + contextLines);
    best = { ...best, chunk: contentLines.slice(from, to).join('\n') };
  }
  return best;
}

// -----------------------------------------------------------------------------
// Helpers
// -----------------------------------------------------------------------------

/** Offset of the first character of `lines[index]` in the joined text */
function offsetOfLine(lines: readonly string[], index: number): number {
  let offset = 0;
  for (let i = 0; i < index; i++) {
    offset += (lines[i]?.length ?? 0) + 1;
  }
  return offset;
}

/** Length of `lines.join('\n')` */
function joinedLength(lines: readonly string[]): number {
  if (lines.length === 0) return 0;
  return lines.reduce((sum, line) => sum + line.length, 0) + lines.length - 1;
}

/** Trim each line on both sides */
export function trimLines(text: string): string {
  return text
    .split('\n')
    .map((line) => line.trim())
    .join('\n');
}

/** Strip trailing spaces and tabs from each line */
export function trimLinesRight(text: string): string {
  return text
    .split('\n')
    .map((line) => line.replace(/[ \t]+$/, ''))
    .join('\n');
}
