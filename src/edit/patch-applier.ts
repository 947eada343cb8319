/**
 * Applies parsed patch chunks to file content.
 *
 * Each chunk is positioned independently against the current state of the
 * lines (after earlier chunks have been applied), then its deletions are
 * verified and replaced by its additions.
 */

import { ToolError } from '../errors/index.js';
import type { PatchChunk } from './patch-parser.js';

/**
 * How strictly lines are compared when searching for a block.
 * - `exact`: byte-for-byte
 * - `rstrip`: trailing spaces and tabs ignored
 * - `strip`: leading and trailing whitespace ignored
 */
export type LineFuzz = 'exact' | 'rstrip' | 'strip';

const FUZZ_LEVELS: readonly LineFuzz[] = ['exact', 'rstrip', 'strip'];

/**
 * Content after applying chunks, with the affected line range (1-based,
 * post-image) for context rendering.
 */
export interface AppliedChunks {
  content: string;
  editStartLine: number;
  editEndLine: number;
}

function normalizeLine(line: string, fuzz: LineFuzz): string {
  switch (fuzz) {
    case 'exact':
      return line;
    case 'rstrip':
      return line.replace(/[ \t]+$/, '');
    case 'strip':
      return line.trim();
  }
}

// -----------------------------------------------------------------------------
// Positioning
// -----------------------------------------------------------------------------

/**
 * Index of the first occurrence of `block` as consecutive lines of `lines`,
 * at or after `from`. An empty block matches at `from`; a block longer than
 * the rest of the file never matches.
 */
export function matchLines(
  lines: readonly string[],
  block: readonly string[],
  fuzz: LineFuzz,
  from: number = 0
): number {
  if (block.length === 0) return from;
  if (block.length > lines.length) return -1;

  const wanted = block.map((line) => normalizeLine(line, fuzz));
  for (let i = from; i <= lines.length - block.length; i++) {
    let matched = true;
    for (let j = 0; j < wanted.length; j++) {
      if (normalizeLine(lines[i + j] ?? '', fuzz) !== wanted[j]) {
        matched = false;
        break;
      }
    }
    if (matched) return i;
  }
  return -1;
}

/**
 * Index of the first line containing `scope`, compared case-insensitively
 * with surrounding whitespace ignored.
 */
export function findScopeMarker(lines: readonly string[], scope: string): number {
  const needle = scope.trim().toLowerCase();
  return lines.findIndex((line) => line.trim().toLowerCase().includes(needle));
}

function deletionsMatchAt(lines: readonly string[], chunk: PatchChunk, pos: number): boolean {
  return chunk.deletions.every((deletion, i) => lines[pos + i]?.trim() === deletion.trim());
}

/**
 * 0-based index at which the chunk's deletions start.
 *
 * Tried in order: the context block (exact, then rstrip, then strip), the
 * scope marker, and finally the deletion block itself when there is no
 * context. Every occurrence of the context is considered, and the first one
 * followed by the chunk's deletions wins; when none is, the first occurrence
 * is returned so that applying reports the mismatch.
 *
 * @throws ToolError (semantic) when none of them can be found
 */
export function findChunkPosition(lines: readonly string[], chunk: PatchChunk): number {
  if (chunk.context.length > 0) {
    let firstFound = -1;
    for (const fuzz of FUZZ_LEVELS) {
      let pos = matchLines(lines, chunk.context, fuzz);
      while (pos >= 0) {
        const after = pos + chunk.context.length;
        if (deletionsMatchAt(lines, chunk, after)) {
          return after;
        }
        if (firstFound === -1) firstFound = after;
        pos = matchLines(lines, chunk.context, fuzz, pos + 1);
      }
    }
    if (firstFound >= 0) {
      return firstFound;
    }
  }

  if (chunk.scope !== '') {
    const pos = findScopeMarker(lines, chunk.scope);
    if (pos >= 0) {
      return pos + 1;
    }
  }

  if (chunk.deletions.length > 0 && chunk.context.length === 0) {
    const pos = matchLines(lines, chunk.deletions, 'exact');
    if (pos >= 0) {
      return pos;
    }
  }

  throw ToolError.semantic('could not locate context in file');
}

// -----------------------------------------------------------------------------
// Application
// -----------------------------------------------------------------------------

/**
 * Replace the chunk's deletions at `pos` with its additions.
 * Each deletion must equal its file line once both are trimmed.
 *
 * @throws ToolError (semantic) naming the 1-based line on mismatch
 */
export function applyChunkAt(lines: readonly string[], chunk: PatchChunk, pos: number): string[] {
  chunk.deletions.forEach((deletion, i) => {
    const index = pos + i;
    const actual = lines[index];
    if (actual === undefined) {
      throw ToolError.semantic(`deletion line ${String(index + 1)} beyond end of file`);
    }
    if (actual.trim() !== deletion.trim()) {
      throw ToolError.semantic(
        `deletion mismatch at line ${String(index + 1)}: expected ${JSON.stringify(deletion)}, found ${JSON.stringify(actual)}`
      );
    }
  });

  return [
    ...lines.slice(0, pos),
    ...chunk.additions,
    ...lines.slice(pos + chunk.deletions.length),
  ];
}

/**
 * Options for {@link applyChunks}.
 */
export interface ApplyChunksOptions {
  /** Extra text for the message when a chunk cannot be positioned, e.g. where it was looked for */
  locateContext?: (chunk: PatchChunk) => string;
  /** Number each chunk is reported under (default: its 1-based position) */
  chunkNumbers?: readonly number[];
}

/**
 * Apply every chunk in order.
 *
 * @throws ToolError (semantic) prefixed with the chunk number when a chunk
 *   cannot be positioned or applied, or when the result equals the input
 */
export function applyChunks(
  content: string,
  chunks: readonly PatchChunk[],
  options: ApplyChunksOptions = {}
): AppliedChunks {
  const { locateContext, chunkNumbers } = options;
  let lines = content.split('\n');
  let editStartLine = -1;
  let editEndLine = -1;

  chunks.forEach((chunk, i) => {
    const label = `chunk ${String(chunkNumbers?.[i] ?? i + 1)}`;
    let pos: number;
    try {
      pos = findChunkPosition(lines, chunk);
    } catch (error) {
      const context = locateContext?.(chunk);
      throw ToolError.wrapSemantic(error, context === undefined ? label : `${label}: ${context}`);
    }

    try {
      const chunkStart = pos + 1;
      const chunkEnd = Math.max(chunkStart, pos + chunk.additions.length);
      if (editStartLine === -1 || chunkStart < editStartLine) editStartLine = chunkStart;
      if (chunkEnd > editEndLine) editEndLine = chunkEnd;

      lines = applyChunkAt(lines, chunk, pos);
    } catch (error) {
      throw ToolError.wrapSemantic(error, label);
    }
  });

  const newContent = lines.join('\n');
  if (newContent === content) {
    throw ToolError.semantic(
      'patch resulted in no changes - deletions and additions are identical'
    );
  }

  const start = editStartLine === -1 ? 1 : editStartLine;
  return {
    content: newContent,
    editStartLine: start,
    editEndLine: editEndLine === -1 ? start : editEndLine,
  };
}
