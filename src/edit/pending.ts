/**
 * Edit session - the pending edit and pending write of one conversation,
 * together with the read tracker and tool-call history that gate them.
 *
 * Tools receive the session through their execution context. Whether an edit
 * is pending is decided by the history ({@link ToolCallHistory.pendingState});
 * the in-memory pending edit supplies the content to write and the diff shown
 * in blocked-call messages.
 */

import { ToolError } from '../errors/index.js';
import { EditConfigSchema, type EditConfig } from '../config/schema.js';
import { fileExists, readFileForEdit, writeFileAtomic } from './files.js';
import {
  AUTO_CANCEL_PREFIX,
  BLOCKED_PREFIX,
  RESOLVING_TOOLS,
  ToolCallHistory,
} from './history.js';
import { countContentLines } from './line-edit.js';
import { Mutex } from './mutex.js';
import { ReadTracker } from './read-tracker.js';
import {
  buildAppliedResult,
  buildWindowAppliedResult,
  type AppliedResult,
  type CancelledResult,
  type EditExtras,
  type FailureResult,
  type WrittenResult,
} from './results.js';
import { readLineRange, streamingReplace } from './streaming.js';

// -----------------------------------------------------------------------------
// Types
// -----------------------------------------------------------------------------

/**
 * 1-based inclusive line range of a large file replaced in place.
 */
export interface LineWindow {
  startLine: number;
  endLine: number;
}

/**
 * Lines of a large file replaced in place: the text read from them and the
 * text written over them, both joined by `\n` without a trailing newline.
 */
export interface WindowRegion extends LineWindow {
  oldContent: string;
  newContent: string;
}

/**
 * A computed edit awaiting confirmation.
 *
 * For a windowed edit `oldContent` and `newContent` hold only the regions'
 * lines; the regions themselves carry what is checked and written.
 */
export interface PendingEdit {
  /** Path as the caller gave it */
  path: string;
  fullPath: string;
  oldContent: string;
  newContent: string;
  diff: string;
  isNewFile: boolean;
  /** Edited range in the new content (1-based) */
  editStartLine: number;
  editEndLine: number;
  /**
   * Regions replaced in place instead of rewriting the whole file. Disjoint,
   * in ascending line order, with line numbers of the file before the edit.
   */
  regions?: readonly WindowRegion[];
  /** Mode-specific fields repeated in the applied result */
  extras?: EditExtras;
}

/**
 * An overwrite of an existing file awaiting confirmation.
 */
export interface PendingWrite {
  path: string;
  fullPath: string;
  content: string;
  oldSize: number;
  oldLines: number;
}

/**
 * Which pending operation a confirm or cancel call looks at first.
 */
export type PendingKind = 'edit' | 'write';

/**
 * Outcome of the pending-edit gate for one tool call.
 * - `allow`: run the tool
 * - `autoCancelled`: the pending edit was discarded; run the tool and prepend `notice`
 * - `block`: refuse the call with `error`
 */
export type GateDecision =
  | { action: 'allow' }
  | { action: 'autoCancelled'; notice: string }
  | { action: 'block'; error: ToolError };

/**
 * Options for EditSession constructor.
 */
export interface EditSessionOptions {
  /** Edit settings; omitted fields take their defaults */
  settings?: Partial<EditConfig>;
  /** Root that relative paths resolve against (default: cwd) */
  workspaceRoot?: string;
  readTracker?: ReadTracker;
  history?: ToolCallHistory;
  /** Debug callback for logging */
  onDebug?: (msg: string, data?: Record<string, unknown>) => void;
}

/** Block count from which blocked-call messages escalate */
export const BLOCK_ESCALATION_THRESHOLD = 3;

const NO_PENDING_OPERATION: FailureResult = {
  success: false,
  error: 'no_pending_operation',
  message: 'Nothing to confirm. You must call edit or write first, then confirm to apply it.',
  usage_hint:
    'Workflow: 1) read to see content, 2) edit/write to create change, 3) confirm to apply',
};

// -----------------------------------------------------------------------------
// EditSession
// -----------------------------------------------------------------------------

/**
 * Session-scoped edit state. Every read and write of the pending operations
 * runs under one mutex, so a confirm never interleaves with a new preview.
 *
 * @example
 * const session = new EditSession({ settings: { previewMode: true } });
 * await session.beginPreview(pendingEdit);
 * const result = await session.confirmPending();
 */
export class EditSession {
  readonly settings: EditConfig;
  readonly workspaceRoot: string;
  readonly readTracker: ReadTracker;
  readonly history: ToolCallHistory;

  private readonly mutex = new Mutex();
  private readonly onDebug?: (msg: string, data?: Record<string, unknown>) => void;
  private pendingEdit: PendingEdit | undefined;
  private pendingWrite: PendingWrite | undefined;

  constructor(options: EditSessionOptions = {}) {
    this.settings = EditConfigSchema.parse(options.settings ?? {});
    this.workspaceRoot = options.workspaceRoot ?? process.cwd();
    this.readTracker = options.readTracker ?? new ReadTracker();
    this.history = options.history ?? new ToolCallHistory({ onDebug: options.onDebug });
    this.onDebug = options.onDebug;
  }

  // ---------------------------------------------------------------------------
  // Pending edit
  // ---------------------------------------------------------------------------

  /**
   * Hold `edit` for confirmation, replacing any earlier pending edit.
   */
  beginPreview(edit: PendingEdit): Promise<PendingEdit> {
    return this.mutex.withLock(() => {
      if (this.pendingEdit !== undefined) {
        this.onDebug?.('Replacing pending edit', {
          previous: this.pendingEdit.path,
          path: edit.path,
        });
      }
      this.pendingEdit = edit;
      this.onDebug?.('Edit pending confirmation', {
        path: edit.path,
        regions: edit.regions?.length,
      });
      return edit;
    });
  }

  /**
   * Drop the pending edit when it targets `fullPath`. Returns whether one
   * was dropped.
   */
  clearPendingEditForPath(fullPath: string): Promise<boolean> {
    return this.mutex.withLock(() => {
      if (this.pendingEdit?.fullPath !== fullPath) return false;
      this.pendingEdit = undefined;
      this.onDebug?.('Cleared pending edit before new edit', { fullPath });
      return true;
    });
  }

  /** Absolute path of the pending edit in memory, if any */
  pendingEditPath(): string | undefined {
    return this.pendingEdit?.fullPath;
  }

  /** Whether an edit or write is held in memory */
  hasPending(): boolean {
    return this.pendingEdit !== undefined || this.pendingWrite !== undefined;
  }

  // ---------------------------------------------------------------------------
  // Pending write
  // ---------------------------------------------------------------------------

  /**
   * Hold an overwrite for confirmation, replacing any earlier one.
   */
  storePendingWrite(write: PendingWrite): Promise<void> {
    return this.mutex.withLock(() => {
      this.pendingWrite = write;
      this.onDebug?.('Write pending confirmation', { path: write.path });
    });
  }

  // ---------------------------------------------------------------------------
  // Confirm / cancel
  // ---------------------------------------------------------------------------

  /**
   * Apply the pending operation, looking at `first` before the other kind.
   *
   * An edit is applied only while the file still holds what the preview was
   * computed from; otherwise a `file_changed` or `file_deleted` result is
   * returned and nothing is written.
   *
   * @throws ToolError (runtime) when the file cannot be read or written
   */
  confirmPending(
    first: PendingKind = 'edit'
  ): Promise<AppliedResult | WrittenResult | FailureResult> {
    return this.mutex.withLock<AppliedResult | WrittenResult | FailureResult>(async () => {
      const edit = this.pendingEdit;
      const write = this.pendingWrite;

      if (first === 'write' && write !== undefined) {
        this.pendingWrite = undefined;
        return applyWrite(write);
      }
      if (edit !== undefined) {
        this.pendingEdit = undefined;
        const result = await applyEdit(edit, this.settings.contextLines);
        this.onDebug?.('Pending edit confirmed', { path: edit.path, success: result.success });
        return result;
      }
      if (write !== undefined) {
        this.pendingWrite = undefined;
        return applyWrite(write);
      }
      return { ...NO_PENDING_OPERATION };
    });
  }

  /**
   * Discard the pending operation, looking at `first` before the other kind.
   * The filesystem is not touched.
   */
  cancelPending(first: PendingKind = 'edit'): Promise<CancelledResult | FailureResult> {
    return this.mutex.withLock<CancelledResult | FailureResult>(() => {
      const edit = this.pendingEdit;
      const write = this.pendingWrite;

      if (first === 'write' && write !== undefined) {
        this.pendingWrite = undefined;
        return writeCancelled(write);
      }
      if (edit !== undefined) {
        this.pendingEdit = undefined;
        this.onDebug?.('Pending edit cancelled', { path: edit.path });
        return {
          success: true,
          path: edit.path,
          message: 'Edit cancelled. File was not modified.',
          next_step: `MODIFY your edit to correct for the issues you observed, then retry. Read {"path": "${edit.path}"} if needed.`,
        };
      }
      if (write !== undefined) {
        this.pendingWrite = undefined;
        return writeCancelled(write);
      }
      return {
        success: false,
        error: 'no_pending_operation',
        message: 'No pending operation to cancel.',
      };
    });
  }

  // ---------------------------------------------------------------------------
  // Gating
  // ---------------------------------------------------------------------------

  /**
   * Decide whether `toolId` may run while the history shows a pending edit.
   *
   * Confirm and cancel tools always run. Other calls are blocked with a
   * message naming the pending path and repeating its diff; from the third
   * block the message escalates. Once `pendingConfirmRetries` calls have been
   * blocked the pending edit is discarded, an entry recording that is added
   * to the history, and the call runs. The decision is taken under the
   * session mutex, so it never interleaves with a confirm or a new preview.
   */
  checkBlock(toolId: string): Promise<GateDecision> {
    return this.mutex.withLock(() => this.decideBlock(toolId));
  }

  private decideBlock(toolId: string): GateDecision {
    const state = this.history.pendingState();
    if (!state.hasPending || RESOLVING_TOOLS.has(toolId)) {
      return { action: 'allow' };
    }

    const pendingPath = state.pendingPath;
    const blockCount = state.blockCountSincePending;

    if (blockCount >= this.settings.pendingConfirmRetries) {
      this.pendingEdit = undefined;
      this.pendingWrite = undefined;
      const notice = `${AUTO_CANCEL_PREFIX} Pending edit on '${pendingPath}' was automatically cancelled after ${String(blockCount)} ignored responses. You may now proceed with your intended action.`;
      this.history.add({ tool: toolId, status: 'resolved' });
      this.onDebug?.('Pending edit auto-cancelled', { path: pendingPath, blockCount });
      return { action: 'autoCancelled', notice };
    }

    let extra = '';
    if (blockCount >= BLOCK_ESCALATION_THRESHOLD) {
      extra =
        toolId === 'edit'
          ? `You have tried ${String(blockCount)} times - Edit will NOT work until you resolve the pending edit first!`
          : `You've been blocked ${String(blockCount)} times!`;
    }

    let message = `${BLOCKED_PREFIX} Your ${toolId} call was blocked due to a pending edit on '${pendingPath}'.`;
    if (extra !== '') {
      message += ` ${extra}`;
    }
    const diff = this.pendingEdit?.diff ?? '';
    if (diff !== '') {
      message += `\n\nPending diff:\n\`\`\`diff\n${diff}\n\`\`\``;
    }
    message += '\n\nCall edit.confirm to apply this edit, or edit.cancel to discard it.';

    return {
      action: 'block',
      error: ToolError.semantic(message, undefined, 'BLOCKED'),
    };
  }

  // ---------------------------------------------------------------------------
  // Read-before-edit
  // ---------------------------------------------------------------------------

  /**
   * Require a recent read of an existing file before editing it.
   *
   * Skipped when `readBeforeEditMessages` is 0, for new files, and for the
   * file that already has a pending edit.
   *
   * @throws ToolError (semantic) with `error: 'file_not_read'`
   */
  checkReadBeforeEdit(path: string, fullPath: string, isNewFile: boolean): void {
    const within = this.settings.readBeforeEditMessages;
    if (within <= 0 || isNewFile || this.pendingEdit?.fullPath === fullPath) {
      return;
    }

    const current = this.readTracker.currentMessageId();
    if (this.readTracker.wasReadRecently(fullPath, current, within)) {
      return;
    }

    const message = `file not read recently: you must use read on '${path}' before editing it (within last ${String(within)} tool calls)`;
    throw ToolError.semantic(message, {
      error: 'file_not_read',
      message,
      path,
      next_step: `read {"path": "${path}"}`,
    });
  }
}

// -----------------------------------------------------------------------------
// Application
// -----------------------------------------------------------------------------

const FILE_DELETED: FailureResult = {
  success: false,
  error: 'file_deleted',
  message: 'File was deleted since the preview. Please call edit again.',
};

const FILE_CHANGED: FailureResult = {
  success: false,
  error: 'file_changed',
  message: 'File has been modified since the preview. Please call edit again to get a new preview.',
};

async function applyEdit(
  edit: PendingEdit,
  contextLines: number
): Promise<AppliedResult | FailureResult> {
  if (edit.regions !== undefined) {
    return applyWindowEdit(edit, edit.regions);
  }

  const current = await readFileForEdit(edit.fullPath);
  if (current.isNewFile && !edit.isNewFile) {
    return { ...FILE_DELETED, path: edit.path };
  }
  if (current.isNewFile !== edit.isNewFile || current.content !== edit.oldContent) {
    return { ...FILE_CHANGED, path: edit.path };
  }

  await writeFileAtomic(edit.fullPath, edit.newContent, edit.isNewFile);
  return {
    ...buildAppliedResult(
      edit.path,
      edit.diff,
      edit.newContent,
      edit.editStartLine,
      edit.editEndLine,
      edit.isNewFile,
      contextLines
    ),
    ...edit.extras,
  };
}

/**
 * Write each region over its lines, last region first, so that the line
 * numbers of the regions not yet written still hold.
 */
export async function writeRegions(
  fullPath: string,
  regions: readonly WindowRegion[]
): Promise<void> {
  const descending = [...regions].sort((a, b) => b.startLine - a.startLine);
  for (const region of descending) {
    await streamingReplace(fullPath, region.startLine, region.endLine, region.newContent);
  }
}

async function applyWindowEdit(
  edit: PendingEdit,
  regions: readonly WindowRegion[]
): Promise<AppliedResult | FailureResult> {
  if (!(await fileExists(edit.fullPath))) {
    return { ...FILE_DELETED, path: edit.path };
  }

  for (const region of regions) {
    let current: string;
    try {
      current = (await readLineRange(edit.fullPath, region.startLine, region.endLine)).content;
    } catch (error) {
      throw ToolError.wrapRuntime(error, 'read file');
    }
    if (current !== region.oldContent) {
      return { ...FILE_CHANGED, path: edit.path };
    }
  }

  await writeRegions(edit.fullPath, regions);
  return {
    ...buildWindowAppliedResult(edit.path, edit.diff, edit.editStartLine, edit.editEndLine),
    ...edit.extras,
  };
}

async function applyWrite(write: PendingWrite): Promise<WrittenResult> {
  await writeFileAtomic(write.fullPath, write.content, false);
  return {
    success: true,
    path: write.path,
    action: 'overwritten',
    lines: countContentLines(write.content),
    bytes: Buffer.byteLength(write.content, 'utf-8'),
  };
}

function writeCancelled(write: PendingWrite): CancelledResult {
  return {
    success: true,
    path: write.path,
    message: 'Write cancelled. File was not modified.',
  };
}
