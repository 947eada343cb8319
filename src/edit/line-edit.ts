/**
 * Line-range edits: replace lines [start, end] or insert before a line.
 */

import { ToolError } from '../errors/index.js';

/**
 * Content after a line edit, with the 1-based edited range in the new content.
 */
export interface LineEditResult {
  content: string;
  editStartLine: number;
  editEndLine: number;
}

/**
 * Number of lines `text` occupies once inserted, counting a final line
 * without a trailing newline. Empty text still occupies one line.
 */
export function countInsertedLines(text: string): number {
  let lines = text.split('\n').length - 1;
  if (text.length > 0 && !text.endsWith('\n')) lines++;
  return Math.max(lines, 1);
}

/**
 * Number of lines in file content as shown to a reader: a trailing newline
 * does not start a new line.
 */
export function countContentLines(content: string): number {
  let lines = content.split('\n').length - 1;
  if (content.length > 0 && !content.endsWith('\n')) lines++;
  return lines;
}

/**
 * Replace lines `[startLine, endLine]` (1-based, inclusive) with `newText`.
 *
 * When `endLine` is 0 the text is inserted before `startLine` instead, which
 * may then be one past the last line to append. A newline is added after
 * a non-empty `newText` when it lacks one and original lines follow, so an
 * empty `newText` deletes the range.
 *
 * Lines are counted by splitting on `\n`, so content ending in a newline has
 * an empty last line.
 *
 * @throws ToolError (semantic) when the range does not fit the content
 */
export function applyLineEdit(
  content: string,
  startLine: number,
  endLine: number,
  newText: string
): LineEditResult {
  if (startLine < 1) {
    throw ToolError.semantic('start_line must be >= 1');
  }
  if (endLine !== 0 && endLine < startLine) {
    throw ToolError.semantic(
      `end_line (${String(endLine)}) must be >= start_line (${String(startLine)})`
    );
  }

  const fileLines = content.split('\n');
  const totalLines = fileLines.length;
  const insertMode = endLine === 0;

  const maxStartLine = insertMode ? totalLines + 1 : totalLines;
  if (startLine > maxStartLine) {
    throw ToolError.semantic(
      `start_line ${String(startLine)} is invalid (file has ${String(totalLines)} lines)`
    );
  }
  if (!insertMode && endLine > totalLines) {
    throw ToolError.semantic(
      `end_line ${String(endLine)} is beyond end of file (file has ${String(totalLines)} lines)`
    );
  }

  const before = fileLines.slice(0, startLine - 1);
  const resumeFrom = insertMode ? startLine - 1 : endLine;
  const after = fileLines.slice(resumeFrom);

  let result = before.map((line) => `${line}\n`).join('') + newText;
  if (after.length > 0 && newText !== '' && !newText.endsWith('\n')) {
    result += '\n';
  }
  result += after.join('\n');

  return {
    content: result,
    editStartLine: startLine,
    editEndLine: startLine + countInsertedLines(newText) - 1,
  };
}

/**
 * 1-based line range of `replaceText` after it was written at offset
 * `replaceStart` of `newContent`.
 */
export function calculateEditLineRange(
  newContent: string,
  replaceStart: number,
  replaceText: string
): { startLine: number; endLine: number } {
  let startLine = 1;
  const limit = Math.min(replaceStart, newContent.length);
  for (let i = 0; i < limit; i++) {
    if (newContent.charCodeAt(i) === 10) startLine++;
  }
  return { startLine, endLine: startLine + countInsertedLines(replaceText) - 1 };
}
