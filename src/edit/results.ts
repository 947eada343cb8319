/**
 * Result payloads returned by edit and write operations.
 *
 * Results are plain objects serialized to JSON for the caller. A result with
 * `status: 'pending_confirmation'` holds a change until `edit.confirm` or
 * `edit.cancel`; the tool-call history recognizes it by that field.
 */

import { renderPostEditContext } from './render.js';

/** Instruction attached to every edit preview */
export const EDIT_PENDING_NEXT_STEP =
  'STOP. You MUST call edit.confirm or edit.cancel next. ALL other tools are BLOCKED until you confirm or cancel this edit.';

/** Instruction attached to a pending overwrite */
export const WRITE_PENDING_NEXT_STEP =
  'File exists. Call write.confirm to overwrite or write.cancel to abort.';

/**
 * Mode-specific fields added to a preview or applied edit.
 */
export interface EditExtras {
  /** How the search text was matched, when not exactly */
  note?: string;
  warning?: string;
  /** Patch mode: what happened to the file */
  action?: 'created' | 'updated';
  /** Patch add: lines in the created file */
  lines?: number;
  /** Patch update: chunks applied */
  chunks?: number;
}

/**
 * An edit held for confirmation.
 */
export interface PreviewResult extends EditExtras {
  status: 'pending_confirmation';
  next_step: string;
  path: string;
  diff: string;
  /** Edited region with surrounding context; absent for windowed edits */
  after_edit?: string;
  is_new_file?: true;
  message?: string;
  /** Windowed edits of large files */
  streaming_edit?: true;
  match_start_line?: number;
  match_end_line?: number;
}

/**
 * An edit written to disk.
 */
export interface AppliedResult extends EditExtras {
  success: true;
  path: string;
  diff: string;
  after_edit?: string;
  message?: string;
  created?: true;
  /** Windowed edits of large files */
  streaming_edit?: true;
  /** `start-end` range replaced by a windowed edit */
  lines_affected?: string;
}

/**
 * A file removed by a patch.
 */
export interface DeletedResult {
  success: true;
  action: 'deleted';
  path: string;
}

/**
 * Outcome of one file section of a patch, or of any single-file edit.
 */
export type FileEditResult = PreviewResult | AppliedResult | DeletedResult;

/**
 * A patch that touched several files. When one of them is held for
 * confirmation its path and `status` are repeated at the top level.
 */
export interface MultiFileResult {
  success: true;
  files: number;
  results: FileEditResult[];
  diff: string;
  status?: 'pending_confirmation';
  next_step?: string;
  path?: string;
}

/**
 * Expected failure reported as a result rather than an error: the request
 * was well-formed but did not fit the file.
 */
export interface FailureResult {
  success: false;
  /** Machine-readable reason, e.g. `no_match` */
  error: string;
  message: string;
  path?: string;
  hint?: string;
  next_step?: string;
  count?: number;
  at_lines?: number[];
  similar_at_line?: number;
  similar_text?: string;
  similarity?: string;
  start_line?: number;
  end_line?: number;
  total_lines?: number;
  failed_file?: string;
  applied_so_far?: FileEditResult[];
  did_you_mean?: string;
  usage_hint?: string;
}

/**
 * Result of any edit operation.
 */
export type EditResult = FileEditResult | MultiFileResult | FailureResult;

/**
 * An overwrite held for confirmation.
 */
export interface WritePendingResult {
  status: 'pending_confirmation';
  path: string;
  next_step: string;
  old_size: number;
  old_lines: number;
  new_size: number;
  new_lines: number;
}

/**
 * A whole-file write that reached the disk.
 */
export interface WrittenResult {
  success: true;
  path: string;
  action: 'created' | 'overwritten';
  lines: number;
  bytes: number;
}

export type WriteResult = WritePendingResult | WrittenResult;

/**
 * A pending edit or write that was discarded.
 */
export interface CancelledResult {
  success: true;
  path: string;
  message: string;
  next_step?: string;
}

/**
 * True when the result leaves a change awaiting confirmation.
 */
export function isPending(result: EditResult | WriteResult): boolean {
  return 'status' in result && result.status === 'pending_confirmation';
}

/**
 * True for expected failures.
 */
export function isFailure(result: EditResult | WriteResult | CancelledResult): result is FailureResult {
  return 'success' in result && !result.success;
}

// -----------------------------------------------------------------------------
// Builders
// -----------------------------------------------------------------------------

/**
 * Result of an edit held for confirmation, for whole-file edits.
 */
export function buildPreviewResult(
  path: string,
  diff: string,
  newContent: string,
  editStartLine: number,
  editEndLine: number,
  isNewFile: boolean,
  contextLines?: number
): PreviewResult {
  const result: PreviewResult = {
    status: 'pending_confirmation',
    next_step: EDIT_PENDING_NEXT_STEP,
    path,
    diff,
    after_edit: renderPostEditContext(newContent, editStartLine, editEndLine, contextLines),
  };
  if (isNewFile) {
    result.is_new_file = true;
    result.message = 'NEW FILE will be created';
  }
  return result;
}

/**
 * Result of a whole-file edit written to disk.
 */
export function buildAppliedResult(
  path: string,
  diff: string,
  newContent: string,
  editStartLine: number,
  editEndLine: number,
  isNewFile: boolean,
  contextLines?: number
): AppliedResult {
  const result: AppliedResult = {
    success: true,
    path,
    diff,
    after_edit: renderPostEditContext(newContent, editStartLine, editEndLine, contextLines),
    message: isNewFile ? 'New file created' : 'Edit applied successfully',
  };
  if (isNewFile) {
    result.created = true;
  }
  return result;
}

/**
 * Result of a windowed large-file edit held for confirmation.
 */
export function buildWindowPreviewResult(
  path: string,
  diff: string,
  startLine: number,
  endLine: number
): PreviewResult {
  return {
    status: 'pending_confirmation',
    next_step: EDIT_PENDING_NEXT_STEP,
    path,
    diff,
    streaming_edit: true,
    match_start_line: startLine,
    match_end_line: endLine,
  };
}

/**
 * Result of a windowed large-file edit written to disk.
 */
export function buildWindowAppliedResult(
  path: string,
  diff: string,
  startLine: number,
  endLine: number
): AppliedResult {
  return {
    success: true,
    path,
    diff,
    streaming_edit: true,
    lines_affected: `${String(startLine)}-${String(endLine)}`,
  };
}
