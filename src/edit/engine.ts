/**
 * Edit engine - turns an edit request into a preview or an applied change.
 *
 * Requests come in three kinds (patch, search/replace, line range). Each is
 * computed against the file as it is now and handed to one finalize step:
 * in preview mode the change is held in the session for `edit.confirm`,
 * otherwise it is written at once. Files above the large-file threshold are
 * edited through line windows and never loaded whole.
 */

import * as fs from 'node:fs/promises';
import { ToolError, errorMessage } from '../errors/index.js';
import type { Span } from '@opentelemetry/api';
import { endEditSpan, recordMatchLevel, startEditSpan } from '../telemetry/index.js';
import { fileExists, isLargeFile, readFileForEdit, writeFileAtomic } from './files.js';
import { findMostSimilarLine } from './fuzzy.js';
import {
  applyLineEdit,
  calculateEditLineRange,
  countInsertedLines,
} from './line-edit.js';
import { lineNumberAt, locateText, matchOffsets, type MatchLevel } from './locator.js';
import { applyChunks } from './patch-applier.js';
import { PatchParseError, parsePatch, type FilePatch, type PatchChunk } from './patch-parser.js';
import {
  writeRegions,
  type EditSession,
  type LineWindow,
  type PendingEdit,
  type WindowRegion,
} from './pending.js';
import { renderRegionDiff, renderUnifiedDiff } from './render.js';
import {
  EDIT_PENDING_NEXT_STEP,
  buildAppliedResult,
  buildPreviewResult,
  buildWindowAppliedResult,
  buildWindowPreviewResult,
  isFailure,
  type AppliedResult,
  type EditExtras,
  type EditResult,
  type FailureResult,
  type FileEditResult,
  type MultiFileResult,
  type PreviewResult,
} from './results.js';
import { findLineMatches, readLineRange, type LineMatches, type LineRange } from './streaming.js';

// -----------------------------------------------------------------------------
// Requests
// -----------------------------------------------------------------------------

/**
 * Raw edit arguments as the model sends them.
 */
export interface EditParams {
  path?: string;
  search?: string;
  replace?: string;
  patch?: string;
  start_line?: number;
  end_line?: number;
  new_text?: string;
}

/**
 * A validated edit request.
 *
 * For `searchReplace`, `startLine`/`endLine` narrow the search to a line
 * range. For `lineRange`, an `endLine` of 0 inserts before `startLine`.
 */
export type EditRequest =
  | { kind: 'patch'; patch: string }
  | {
      kind: 'searchReplace';
      path: string;
      search: string;
      replace: string;
      startLine?: number;
      endLine?: number;
    }
  | { kind: 'lineRange'; path: string; startLine: number; endLine: number; newText: string };

export type EditMode = EditRequest['kind'];

/**
 * Work out which edit mode the arguments ask for.
 *
 * `start_line` and `end_line` given with `search` but without `new_text` are
 * a search range, not a second mode.
 *
 * @throws ToolError (semantic) when no mode or several modes are given, or a
 *   mode is missing a required argument
 */
export function parseEditRequest(params: EditParams): EditRequest {
  const hasPatch = params.patch !== undefined && params.patch !== '';
  const hasSearch = params.search !== undefined;
  const hasLineNumbers = params.start_line !== undefined || params.end_line !== undefined;
  const hasLineRange = hasLineNumbers && !(hasSearch && params.new_text === undefined);

  const modeCount = [hasPatch, hasSearch, hasLineRange].filter(Boolean).length;
  if (modeCount === 0) {
    throw ToolError.semantic(
      "no edit mode specified - provide 'patch', 'search'+'replace', or 'start_line'+'new_text'"
    );
  }
  if (modeCount > 1) {
    throw ToolError.semantic(
      'multiple edit modes specified - use only one of: patch, search/replace, or line range'
    );
  }

  if (params.patch !== undefined && hasPatch) {
    return { kind: 'patch', patch: params.patch };
  }

  const path = params.path ?? '';
  if (path === '') {
    throw ToolError.semantic('missing path');
  }

  if (params.search !== undefined) {
    if (params.replace === undefined) {
      throw ToolError.semantic("'replace' is required when using 'search'");
    }
    return {
      kind: 'searchReplace',
      path,
      search: params.search,
      replace: params.replace,
      startLine: params.start_line,
      endLine: params.end_line,
    };
  }

  if (params.start_line === undefined) {
    throw ToolError.semantic('missing start_line');
  }
  return {
    kind: 'lineRange',
    path,
    startLine: params.start_line,
    endLine: params.end_line ?? 0,
    newText: params.new_text ?? '',
  };
}

// -----------------------------------------------------------------------------
// Environment
// -----------------------------------------------------------------------------

/**
 * What the engine needs from its caller.
 */
export interface EditEnvironment {
  session: EditSession;
  /**
   * Absolute path for a path as the model wrote it.
   * @throws ToolError when the path is outside the workspace or unusable
   */
  resolvePath: (path: string) => Promise<string>;
  /** Debug callback for logging */
  onDebug?: (msg: string, data?: Record<string, unknown>) => void;
}

/**
 * Environment of one request, with the span it reports to.
 */
interface EditRun extends EditEnvironment {
  span: Span;
}

// -----------------------------------------------------------------------------
// Dispatcher
// -----------------------------------------------------------------------------

/**
 * Run one edit request inside an `edit` span.
 *
 * Expected failures (no match, ambiguous match, missing file for a search)
 * come back as a {@link FailureResult}; misuse and I/O failures are thrown
 * as ToolErrors.
 */
export async function executeEdit(request: EditRequest, env: EditEnvironment): Promise<EditResult> {
  const span = startEditSpan({
    mode: request.kind,
    path: request.kind === 'patch' ? undefined : request.path,
    preview: env.session.settings.previewMode,
  });

  try {
    const result = await dispatch(request, { ...env, span });
    endEditSpan(span, isFailure(result) ? { success: false, errorType: result.error } : { success: true });
    return result;
  } catch (error) {
    endEditSpan(span, {
      success: false,
      errorType: error instanceof ToolError ? error.code : 'Error',
    });
    throw error;
  }
}

function dispatch(request: EditRequest, env: EditRun): Promise<EditResult> {
  env.onDebug?.('Edit request', { mode: request.kind });
  switch (request.kind) {
    case 'patch':
      return applyPatchRequest(request.patch, env);
    case 'searchReplace':
      return searchReplace(request, env);
    case 'lineRange':
      return lineRange(request, env);
  }
}

// -----------------------------------------------------------------------------
// Finalize
// -----------------------------------------------------------------------------

/**
 * Hold `edit` for confirmation in preview mode, otherwise write it.
 */
async function finalize(env: EditRun, edit: PendingEdit): Promise<PreviewResult | AppliedResult> {
  const { session } = env;

  if (session.settings.previewMode) {
    await session.beginPreview(edit);
    const preview =
      edit.regions === undefined
        ? buildPreviewResult(
            edit.path,
            edit.diff,
            edit.newContent,
            edit.editStartLine,
            edit.editEndLine,
            edit.isNewFile,
            session.settings.contextLines
          )
        : buildWindowPreviewResult(edit.path, edit.diff, edit.editStartLine, edit.editEndLine);
    return { ...preview, ...edit.extras };
  }

  if (edit.regions === undefined) {
    await writeFileAtomic(edit.fullPath, edit.newContent, edit.isNewFile);
    const applied = buildAppliedResult(
      edit.path,
      edit.diff,
      edit.newContent,
      edit.editStartLine,
      edit.editEndLine,
      edit.isNewFile,
      session.settings.contextLines
    );
    return { ...applied, ...edit.extras };
  }

  await writeRegions(edit.fullPath, edit.regions);
  const applied = buildWindowAppliedResult(edit.path, edit.diff, edit.editStartLine, edit.editEndLine);
  return { ...applied, ...edit.extras };
}

/**
 * The whole of `content` as a new file.
 */
function createNewFile(
  env: EditRun,
  path: string,
  fullPath: string,
  content: string,
  extras?: EditExtras
): Promise<PreviewResult | AppliedResult> {
  const endLine = content === '' ? 1 : content.split('\n').length;
  return finalize(env, {
    path,
    fullPath,
    oldContent: '',
    newContent: content,
    diff: renderUnifiedDiff('', content, path),
    isNewFile: true,
    editStartLine: 1,
    editEndLine: endLine,
    extras,
  });
}

// -----------------------------------------------------------------------------
// Search / replace
// -----------------------------------------------------------------------------

const MATCH_NOTES: Partial<Record<MatchLevel, string>> = {
  1: 'Match found using whitespace normalization (trailing spaces ignored)',
  2: 'Match found using whitespace normalization (leading/trailing spaces ignored)',
  3: 'Match found using fuzzy matching (approximate content match)',
};

/** Lines searched after `start_line` when no `end_line` is given */
const DEFAULT_SEARCH_RANGE = 100;

/** Lines read before a large-file match */
const LARGE_FILE_LEAD_LINES = 10;

/** Lines read after a large-file match */
const LARGE_FILE_TRAIL_LINES = 10;

function noOpError(): ToolError {
  return ToolError.semantic('search and replace text are identical - no change would be made');
}

function newFileWithSearch(path: string): FailureResult {
  return {
    success: false,
    error: 'new_file_with_search',
    path,
    message:
      'File does not exist. To create a new file, use empty search: {"search": "", "replace": "content"}',
  };
}

async function searchReplace(
  request: Extract<EditRequest, { kind: 'searchReplace' }>,
  env: EditRun
): Promise<EditResult> {
  const { session } = env;
  const { path, search, replace } = request;

  const fullPath = await env.resolvePath(path);
  const { large } = await isLargeFile(fullPath, session.settings.largeFileThresholdBytes);
  session.checkReadBeforeEdit(path, fullPath, !(await fileExists(fullPath)));
  await session.clearPendingEditForPath(fullPath);

  if (request.startLine !== undefined) {
    return searchInRange(env, path, fullPath, search, replace, request.startLine, request.endLine);
  }
  if (large) {
    return searchLargeFile(env, path, fullPath, search, replace);
  }

  const { content, isNewFile } = await readFileForEdit(fullPath);
  if (isNewFile) {
    if (search !== '') return newFileWithSearch(path);
    return createNewFile(env, path, fullPath, replace);
  }

  if (search === '') {
    return {
      success: false,
      error: 'empty_search',
      path,
      message:
        'Empty search is only valid for creating new files. For existing files, specify the text to replace.',
    };
  }
  if (search === replace) {
    throw noOpError();
  }

  const match = locateText(content, search, session.settings.fuzzyThreshold);
  recordMatchLevel(env.span, match.level);
  if (!match.found) {
    return noMatchResult(content, search, path);
  }

  if (match.level === 0) {
    const offsets = matchOffsets(content, search);
    if (offsets.length > 1) {
      return {
        success: false,
        error: 'multiple_matches',
        path,
        count: offsets.length,
        at_lines: offsets.map((offset) => lineNumberAt(content, offset)),
        message: `Search text matches ${String(offsets.length)} locations - add more surrounding context to make it unique`,
        hint: 'Include more lines before/after the text you want to change to create a unique match',
      };
    }
  }

  const newContent = content.slice(0, match.start) + replace + content.slice(match.end);
  const range = calculateEditLineRange(newContent, match.start, replace);
  const note = MATCH_NOTES[match.level];

  return finalize(env, {
    path,
    fullPath,
    oldContent: content,
    newContent,
    diff: renderUnifiedDiff(content, newContent, path),
    isNewFile: false,
    editStartLine: range.startLine,
    editEndLine: range.endLine,
    extras: note === undefined ? undefined : { note },
  });
}

function noMatchResult(content: string, search: string, path: string): FailureResult {
  const result: FailureResult = {
    success: false,
    error: 'no_match',
    path,
    message: 'Search text not found in file. The search text must exactly match the file content.',
    hint: 'Use read to see the exact file content, then copy the text you want to replace.',
  };

  const similar = findMostSimilarLine(content, search);
  if (similar.ratio > 0.4) {
    result.similar_at_line = similar.lineNumber;
    result.similar_text = similar.line.trim();
    result.similarity = `${String(Math.round(similar.ratio * 100))}%`;
  }
  return result;
}

/**
 * Exact search restricted to lines `[startLine, endLine]`. Works for files
 * of any size; only the range is read.
 */
async function searchInRange(
  env: EditRun,
  path: string,
  fullPath: string,
  search: string,
  replace: string,
  startLine: number,
  requestedEndLine: number | undefined
): Promise<EditResult> {
  const endLine = requestedEndLine ?? startLine + DEFAULT_SEARCH_RANGE;

  if (startLine < 1) {
    return { success: false, error: 'invalid_start_line', message: 'start_line must be >= 1' };
  }
  if (endLine < startLine) {
    return {
      success: false,
      error: 'invalid_line_range',
      message: `end_line (${String(endLine)}) must be >= start_line (${String(startLine)})`,
    };
  }
  if (search === '') {
    return {
      success: false,
      error: 'empty_search',
      path,
      message:
        'Empty search is not allowed with start_line hint. Use without start_line to create new files.',
    };
  }
  if (search === replace) {
    throw noOpError();
  }
  if (!(await fileExists(fullPath))) {
    return newFileWithSearch(path);
  }

  const range = await readRange(fullPath, startLine, endLine);
  if (startLine > range.totalLines) {
    return {
      success: false,
      error: 'start_line_beyond_eof',
      path,
      start_line: startLine,
      total_lines: range.totalLines,
      message: `start_line ${String(startLine)} is beyond end of file (file has ${String(range.totalLines)} lines)`,
    };
  }

  const offsets = matchOffsets(range.content, search);
  const [matchStart] = offsets;
  if (matchStart === undefined) {
    return {
      success: false,
      error: 'no_match_in_range',
      path,
      start_line: startLine,
      end_line: endLine,
      message: `Search text not found in lines ${String(startLine)}-${String(endLine)}. Try adjusting the line range or use read to verify content.`,
      hint: `read {"path": "${path}", "offset": ${String(startLine)}, "limit": ${String(endLine - startLine + 1)}}`,
    };
  }
  if (offsets.length > 1) {
    return {
      success: false,
      error: 'multiple_matches_in_range',
      path,
      count: offsets.length,
      start_line: startLine,
      end_line: endLine,
      message: `Search text matches ${String(offsets.length)} locations in lines ${String(startLine)}-${String(endLine)} - add more context to make unique`,
    };
  }

  recordMatchLevel(env.span, 0);
  const window = { startLine, endLine: Math.min(endLine, range.totalLines) };
  return replaceInWindow(env, path, fullPath, window, range.content, matchStart, search, replace);
}

/**
 * Exact search of a large file: a line search for the first line of the
 * search text picks the window, which is then matched exactly.
 */
async function searchLargeFile(
  env: EditRun,
  path: string,
  fullPath: string,
  search: string,
  replace: string
): Promise<EditResult> {
  if (search === '') {
    return {
      success: false,
      error: 'empty_search_large_file',
      path,
      message: 'Cannot create new file with empty search on large file path. File already exists.',
    };
  }
  if (search === replace) {
    throw noOpError();
  }

  const matches = await findMatches(fullPath, search);
  if (matches.count === 0) {
    return {
      success: false,
      error: 'no_match',
      path,
      message: 'Search text not found in file.',
      hint: 'Use read with offset and limit to examine file content.',
    };
  }
  if (matches.count > 1) {
    return {
      success: false,
      error: 'multiple_matches',
      path,
      count: matches.count,
      message: `Search text matches ${String(matches.count)} locations - add more surrounding context to make it unique`,
    };
  }

  const searchLines = search.split('\n').length;
  const windowStart = Math.max(1, matches.firstLine - LARGE_FILE_LEAD_LINES);
  const windowEnd = matches.firstLine + searchLines + LARGE_FILE_TRAIL_LINES;
  const range = await readRange(fullPath, windowStart, windowEnd);

  const matchStart = range.content.indexOf(search);
  if (matchStart < 0) {
    return {
      success: false,
      error: 'no_match',
      path,
      message: `Search text not found in file. Its first line appears at line ${String(matches.firstLine)}, but the rest of the search text does not follow it.`,
      hint: `read {"path": "${path}", "offset": ${String(windowStart)}, "limit": ${String(windowEnd - windowStart + 1)}}`,
    };
  }

  recordMatchLevel(env.span, 0);
  const window = { startLine: windowStart, endLine: Math.min(windowEnd, range.totalLines) };
  return replaceInWindow(env, path, fullPath, window, range.content, matchStart, search, replace);
}

/**
 * Replace the match at `matchStart` inside a window read from a large file.
 * The whole window is rewritten; the match's own lines are reported.
 */
function replaceInWindow(
  env: EditRun,
  path: string,
  fullPath: string,
  window: LineWindow,
  windowContent: string,
  matchStart: number,
  search: string,
  replace: string
): Promise<PreviewResult | AppliedResult> {
  const matchEnd = matchStart + search.length;
  const newContent = windowContent.slice(0, matchStart) + replace + windowContent.slice(matchEnd);

  return finalize(env, {
    path,
    fullPath,
    oldContent: windowContent,
    newContent,
    diff: renderRegionDiff(windowContent, newContent, path),
    isNewFile: false,
    editStartLine: window.startLine + lineNumberAt(windowContent, matchStart) - 1,
    editEndLine: window.startLine + lineNumberAt(windowContent, matchEnd) - 1,
    regions: [{ ...window, oldContent: windowContent, newContent }],
  });
}

// -----------------------------------------------------------------------------
// Line range
// -----------------------------------------------------------------------------

async function lineRange(
  request: Extract<EditRequest, { kind: 'lineRange' }>,
  env: EditRun
): Promise<EditResult> {
  const { session } = env;
  const { path, startLine, endLine, newText } = request;

  if (startLine < 1) {
    throw ToolError.semantic('start_line must be >= 1');
  }
  if (endLine !== 0 && endLine < startLine) {
    throw ToolError.semantic(
      `end_line (${String(endLine)}) must be >= start_line (${String(startLine)})`
    );
  }

  const fullPath = await env.resolvePath(path);
  const { large } = await isLargeFile(fullPath, session.settings.largeFileThresholdBytes);
  session.checkReadBeforeEdit(path, fullPath, !(await fileExists(fullPath)));
  await session.clearPendingEditForPath(fullPath);

  if (large) {
    return lineRangeLargeFile(env, path, fullPath, startLine, endLine, newText);
  }

  const { content, isNewFile } = await readFileForEdit(fullPath);
  if (isNewFile) {
    const warning =
      startLine !== 1 || endLine !== 1
        ? `Line numbers (${String(startLine)}-${String(endLine)}) are ignored for new files. The entire new_text becomes the file content.`
        : undefined;
    return createNewFile(env, path, fullPath, newText, warning === undefined ? undefined : { warning });
  }

  const edited = applyLineEdit(content, startLine, endLine, newText);
  return finalize(env, {
    path,
    fullPath,
    oldContent: content,
    newContent: edited.content,
    diff: renderUnifiedDiff(content, edited.content, path),
    isNewFile: false,
    editStartLine: edited.editStartLine,
    editEndLine: edited.editEndLine,
  });
}

/**
 * Line edit of a large file. Line counts come from the streamed file, where a
 * trailing newline does not start another line.
 */
async function lineRangeLargeFile(
  env: EditRun,
  path: string,
  fullPath: string,
  startLine: number,
  endLine: number,
  newText: string
): Promise<PreviewResult | AppliedResult> {
  const insertMode = endLine === 0;
  const window: LineWindow = insertMode
    ? { startLine, endLine: startLine - 1 }
    : { startLine, endLine };

  const range = await readRange(fullPath, window.startLine, window.endLine);
  const totalLines = range.totalLines;

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

  return finalize(env, {
    path,
    fullPath,
    oldContent: range.content,
    newContent: newText,
    diff: renderRegionDiff(range.content, newText, path),
    isNewFile: false,
    editStartLine: startLine,
    editEndLine: startLine + countInsertedLines(newText) - 1,
    regions: [{ ...window, oldContent: range.content, newContent: newText }],
  });
}

// -----------------------------------------------------------------------------
// Patch
// -----------------------------------------------------------------------------

/** Lines read either side of a chunk's `:line N` hint */
const LINE_HINT_RADIUS = 50;

/** Lines read after a chunk located by line search */
const CHUNK_TRAIL_LINES = 50;

interface FilePatchOutcome {
  result: FileEditResult;
  diff: string;
}

async function applyPatchRequest(patchText: string, env: EditRun): Promise<EditResult> {
  let patches: FilePatch[];
  try {
    patches = parsePatch(patchText);
  } catch (error) {
    if (error instanceof PatchParseError) {
      throw ToolError.semantic(`invalid patch format: ${error.message}`);
    }
    throw error;
  }

  const [first] = patches;
  if (first === undefined) {
    throw ToolError.semantic('no file operations found in patch');
  }
  if (patches.length === 1) {
    return (await applyFilePatch(first, env)).result;
  }

  const held = patches.filter((patch) => patch.action !== 'delete').length;
  if (env.session.settings.previewMode && held > 1) {
    throw ToolError.semantic(
      `patch adds or updates ${String(held)} files, but only one edit can await confirmation - send one Add File or Update File section per patch`
    );
  }

  const results: FileEditResult[] = [];
  let diff = '';
  for (const patch of patches) {
    let outcome: FilePatchOutcome;
    try {
      outcome = await applyFilePatch(patch, env);
    } catch (error) {
      env.onDebug?.('Patch failed', { path: patch.path, applied: results.length });
      const held = results.find((result): result is PreviewResult => 'status' in result);
      if (held !== undefined) {
        await env.session.clearPendingEditForPath(await env.resolvePath(held.path));
      }
      return {
        success: false,
        error: 'patch_failed',
        failed_file: patch.path,
        message: errorMessage(error),
        applied_so_far: results,
      };
    }
    results.push(outcome.result);
    if (outcome.diff !== '') {
      diff += `${outcome.diff}\n`;
    }
  }

  const combined: MultiFileResult = { success: true, files: patches.length, results, diff };
  const pending = results.find((result): result is PreviewResult => 'status' in result);
  if (pending !== undefined) {
    combined.status = 'pending_confirmation';
    combined.next_step = EDIT_PENDING_NEXT_STEP;
    combined.path = pending.path;
  }
  return combined;
}

async function applyFilePatch(patch: FilePatch, env: EditRun): Promise<FilePatchOutcome> {
  const { path } = patch;
  const fullPath = await env.resolvePath(path);

  switch (patch.action) {
    case 'delete':
      return deleteFile(path, fullPath);
    case 'add':
      return addFile(env, path, fullPath, patch.chunks);
    case 'update': {
      const { large } = await isLargeFile(fullPath, env.session.settings.largeFileThresholdBytes);
      return large
        ? updateLargeFile(env, path, fullPath, patch.chunks)
        : updateFile(env, path, fullPath, patch.chunks);
    }
  }
}

async function deleteFile(path: string, fullPath: string): Promise<FilePatchOutcome> {
  if (!(await fileExists(fullPath))) {
    throw ToolError.semantic(`file does not exist: ${path}`, undefined, 'NOT_FOUND');
  }
  try {
    await fs.unlink(fullPath);
  } catch (error) {
    throw ToolError.wrapRuntime(error, 'delete file');
  }
  return { result: { success: true, action: 'deleted', path }, diff: '' };
}

async function addFile(
  env: EditRun,
  path: string,
  fullPath: string,
  chunks: readonly PatchChunk[]
): Promise<FilePatchOutcome> {
  if (await fileExists(fullPath)) {
    throw ToolError.semantic(`file already exists: ${path} (use Update File instead)`);
  }

  const content = chunks
    .flatMap((chunk) => chunk.additions)
    .map((line) => `${line}\n`)
    .join('');
  const lines = content.split('\n').length - 1;

  const result = await createNewFile(env, path, fullPath, content, { action: 'created', lines });
  return { result, diff: result.diff };
}

async function updateFile(
  env: EditRun,
  path: string,
  fullPath: string,
  chunks: readonly PatchChunk[]
): Promise<FilePatchOutcome> {
  const { content, isNewFile } = await readFileForEdit(fullPath);
  if (isNewFile) {
    throw ToolError.semantic(
      `file does not exist: ${path} (use Add File instead)`,
      undefined,
      'NOT_FOUND'
    );
  }

  const applied = applyChunks(content, chunks);
  const diff = renderUnifiedDiff(content, applied.content, path);
  const result = await finalize(env, {
    path,
    fullPath,
    oldContent: content,
    newContent: applied.content,
    diff,
    isNewFile: false,
    editStartLine: applied.editStartLine,
    editEndLine: applied.editEndLine,
    extras: { action: 'updated', chunks: chunks.length },
  });
  return { result, diff };
}

/**
 * Chunks applied together to one window of a large file.
 */
interface ChunkGroup extends LineWindow {
  chunks: { chunk: PatchChunk; number: number }[];
}

/**
 * Add `next` to `groups`, merging it with every group whose window it
 * overlaps. Merged chunks stay in patch order.
 */
function addChunkGroup(groups: ChunkGroup[], next: ChunkGroup): void {
  let merged = next;
  for (let i = groups.length - 1; i >= 0; i--) {
    const group = groups[i];
    if (group === undefined) continue;
    if (group.startLine <= merged.endLine && merged.startLine <= group.endLine) {
      groups.splice(i, 1);
      merged = {
        startLine: Math.min(group.startLine, merged.startLine),
        endLine: Math.max(group.endLine, merged.endLine),
        chunks: [...group.chunks, ...merged.chunks].sort((a, b) => a.number - b.number),
      };
    }
  }
  groups.push(merged);
}

function regionLineCount(content: string): number {
  return content === '' ? 0 : content.split('\n').length;
}

/**
 * Update of a large file. Each chunk is given a window of lines (around its
 * `:line N` hint, or around the first line of its context or deletions found
 * by line search). Chunks whose windows overlap share one window; each window
 * is read, patched and replaced on its own, so only the windows are held in
 * memory. Reported lines are shifted by the lines gained or lost in the
 * windows above them.
 */
async function updateLargeFile(
  env: EditRun,
  path: string,
  fullPath: string,
  chunks: readonly PatchChunk[]
): Promise<FilePatchOutcome> {
  if (chunks.length === 0) {
    throw ToolError.semantic('patch resulted in no changes - deletions and additions are identical');
  }

  const groups: ChunkGroup[] = [];
  for (let i = 0; i < chunks.length; i++) {
    const chunk = chunks[i];
    if (chunk !== undefined) {
      const window = await chunkWindow(fullPath, chunk, i + 1);
      addChunkGroup(groups, { ...window, chunks: [{ chunk, number: i + 1 }] });
    }
  }
  groups.sort((a, b) => a.startLine - b.startLine);

  const locateContext = (chunk: PatchChunk): string =>
    chunk.lineHint > 0
      ? `could not find context near line ${String(chunk.lineHint)}`
      : 'could not match context';

  const regions: WindowRegion[] = [];
  let diff = '';
  let drift = 0;
  let editStartLine = 0;
  let editEndLine = 0;

  for (const group of groups) {
    const range = await readRange(fullPath, group.startLine, group.endLine);
    const [first] = group.chunks;
    if (group.startLine > range.totalLines) {
      throw ToolError.semantic(
        `chunk ${String(first?.number ?? 1)}: search location beyond end of file (${String(range.totalLines)} lines)`
      );
    }

    const applied = applyChunks(
      range.content,
      group.chunks.map((entry) => entry.chunk),
      { locateContext, chunkNumbers: group.chunks.map((entry) => entry.number) }
    );

    regions.push({
      startLine: group.startLine,
      endLine: Math.min(group.endLine, range.totalLines),
      oldContent: range.content,
      newContent: applied.content,
    });
    diff += renderRegionDiff(range.content, applied.content, path);

    const shift = group.startLine + drift - 1;
    if (regions.length === 1) {
      editStartLine = shift + applied.editStartLine;
    }
    editEndLine = shift + applied.editEndLine;
    drift += regionLineCount(applied.content) - regionLineCount(range.content);
  }

  env.onDebug?.('Large file patch regions', {
    path,
    regions: regions.map((region) => `${String(region.startLine)}-${String(region.endLine)}`),
  });

  const result = await finalize(env, {
    path,
    fullPath,
    oldContent: regions.map((region) => region.oldContent).join('\n'),
    newContent: regions.map((region) => region.newContent).join('\n'),
    diff,
    isNewFile: false,
    editStartLine,
    editEndLine,
    regions,
    extras: { action: 'updated', chunks: chunks.length },
  });
  return { result, diff };
}

async function chunkWindow(fullPath: string, chunk: PatchChunk, chunkNumber: number): Promise<LineWindow> {
  const label = `chunk ${String(chunkNumber)}`;
  const span = chunk.context.length + chunk.deletions.length;

  if (chunk.lineHint > 0) {
    return {
      startLine: Math.max(1, chunk.lineHint - LINE_HINT_RADIUS),
      endLine: chunk.lineHint + LINE_HINT_RADIUS + span,
    };
  }

  if (chunk.context.length > 0) {
    const matches = await findMatches(fullPath, chunk.context.join('\n'));
    if (matches.count === 0) {
      throw ToolError.semantic(`${label}: context not found in file`);
    }
    return {
      startLine: Math.max(1, matches.firstLine - LARGE_FILE_LEAD_LINES),
      endLine: matches.firstLine + span + CHUNK_TRAIL_LINES,
    };
  }

  if (chunk.deletions.length > 0) {
    const matches = await findMatches(fullPath, chunk.deletions.join('\n'));
    if (matches.count === 0) {
      throw ToolError.semantic(`${label}: deletion text not found in file`);
    }
    return {
      startLine: Math.max(1, matches.firstLine - LARGE_FILE_LEAD_LINES),
      endLine: matches.firstLine + chunk.deletions.length + CHUNK_TRAIL_LINES,
    };
  }

  throw ToolError.semantic(
    `${label}: no context, deletions, or line hint - cannot locate where to apply`
  );
}

// -----------------------------------------------------------------------------
// Streaming reads
// -----------------------------------------------------------------------------

async function readRange(
  fullPath: string,
  startLine: number,
  endLine: number
): Promise<LineRange> {
  try {
    return await readLineRange(fullPath, startLine, endLine);
  } catch (error) {
    throw ToolError.wrapRuntime(error, 'read line range');
  }
}

async function findMatches(fullPath: string, needle: string): Promise<LineMatches> {
  try {
    return await findLineMatches(fullPath, needle);
  } catch (error) {
    throw ToolError.wrapRuntime(error, 'search');
  }
}
