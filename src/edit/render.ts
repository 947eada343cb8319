/**
 * Diff and post-edit excerpt rendering.
 */

import { structuredPatch } from 'diff';

/** Unchanged lines around each diff hunk */
const DIFF_CONTEXT_LINES = 3;

/** Lines shown around the edited region in an after-edit excerpt */
export const POST_EDIT_CONTEXT_LINES = 3;

// -----------------------------------------------------------------------------
// Unified diff
// -----------------------------------------------------------------------------

function formatRange(start: number, count: number): string {
  return count === 1 ? String(start) : `${String(start)},${String(count)}`;
}

/**
 * Unified diff from `oldContent` to `newContent`, both sides labelled
 * `filename`. Identical inputs give an empty string.
 */
export function renderUnifiedDiff(oldContent: string, newContent: string, filename: string): string {
  if (oldContent === newContent) return '';

  const patch = structuredPatch(filename, filename, oldContent, newContent, undefined, undefined, {
    context: DIFF_CONTEXT_LINES,
  });

  const out = [`--- ${filename}`, `+++ ${filename}`];
  for (const hunk of patch.hunks) {
    out.push(
      `@@ -${formatRange(hunk.oldStart, hunk.oldLines)} +${formatRange(hunk.newStart, hunk.newLines)} @@`
    );
    out.push(...hunk.lines);
  }
  return `${out.join('\n')}\n`;
}

/**
 * Diff of a region read out of a large file. The region's line numbers are
 * relative to the region, not the file.
 */
export function renderRegionDiff(oldRegion: string, newRegion: string, filename: string): string {
  const terminate = (text: string): string => (text === '' || text.endsWith('\n') ? text : `${text}\n`);
  return renderUnifiedDiff(terminate(oldRegion), terminate(newRegion), filename);
}

// -----------------------------------------------------------------------------
// After-edit excerpt
// -----------------------------------------------------------------------------

/**
 * Line-numbered excerpt of `newContent` around the 1-based edited range.
 *
 * ```
 *  1│import x
 * ...
 *  8│  const a = 1;
 * >9│  const b = 3;
 * 10│  return a + b;
 * ...
 * 42│}
 * ```
 *
 * Edited lines carry `>`. The first and last lines are always shown; a gap of
 * one line is printed as that line, a longer gap as `...`.
 */
export function renderPostEditContext(
  newContent: string,
  editStartLine: number,
  editEndLine: number,
  contextLines: number = POST_EDIT_CONTEXT_LINES
): string {
  if (newContent === '') return '';

  const lines = newContent.split('\n');
  const totalLines = lines.length;
  const contextStart = Math.max(1, editStartLine - contextLines);
  const contextEnd = Math.min(totalLines, editEndLine + contextLines);
  const width = String(totalLines).length;

  const format = (lineNumber: number, edited: boolean): string => {
    const text = lines[lineNumber - 1] ?? '';
    return `${edited ? '>' : ' '}${String(lineNumber).padStart(width)}│${text}`;
  };

  const out: string[] = [];

  if (contextStart > 1) {
    out.push(format(1, false));
    if (contextStart === 3) {
      out.push(format(2, false));
    } else if (contextStart > 3) {
      out.push('...');
    }
  }

  for (let i = contextStart; i <= contextEnd; i++) {
    out.push(format(i, i >= editStartLine && i <= editEndLine));
  }

  if (contextEnd < totalLines) {
    if (contextEnd === totalLines - 2) {
      out.push(format(totalLines - 1, false));
    } else if (contextEnd < totalLines - 2) {
      out.push('...');
    }
    out.push(format(totalLines, false));
  }

  return out.join('\n');
}
