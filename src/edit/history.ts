/**
 * Tool-call history and the pending-edit state derived from it.
 *
 * Whether an edit is awaiting confirmation is decided by replaying the
 * history, not by what the session holds in memory: the history survives
 * truncation and rollback of the conversation, the in-memory pending edit
 * does not.
 */

import { z } from 'zod';

// -----------------------------------------------------------------------------
// Types
// -----------------------------------------------------------------------------

/** Tool ids that resolve a pending edit or write */
export const RESOLVING_TOOLS: ReadonlySet<string> = new Set([
  'edit.confirm',
  'edit.cancel',
  'write.confirm',
  'write.cancel',
]);

/** Prefix of every blocked-call message */
export const BLOCKED_PREFIX = 'BLOCKED:';

/** Prefix of the notice given when a pending edit is discarded automatically */
export const AUTO_CANCEL_PREFIX = 'AUTO-CANCELLED:';

/**
 * What a tool call did, as far as the pending-edit protocol cares.
 * - `pending_confirmation`: the call left an edit or write awaiting confirmation
 * - `blocked`: the call was refused because of a pending edit
 * - `resolved`: the pending edit was discarded without a confirm or cancel call
 * - `other`: anything else
 */
export type ToolCallStatus = 'pending_confirmation' | 'blocked' | 'resolved' | 'other';

/**
 * One tool call in the history.
 */
export interface ToolCallRecord {
  readonly tool: string;
  readonly status: ToolCallStatus;
  /** Path the pending edit targets, for `pending_confirmation` */
  readonly path?: string;
}

/**
 * Pending-edit state reconstructed from history.
 */
export interface PendingEditState {
  hasPending: boolean;
  /** Path of the pending edit, empty when none */
  pendingPath: string;
  /** Index of the record that created the pending edit, -1 when none */
  lastPendingIndex: number;
  /** Blocked calls since the pending edit was created */
  blockCountSincePending: number;
}

const PendingOutputSchema = z.object({
  status: z.string().optional(),
  path: z.string().optional(),
});

// -----------------------------------------------------------------------------
// Derivation
// -----------------------------------------------------------------------------

/**
 * Classify a tool's output text. Edit and write results are JSON objects;
 * a `status` of `pending_confirmation` marks a pending edit. Blocked calls
 * are plain text starting with {@link BLOCKED_PREFIX}, automatic discards
 * with {@link AUTO_CANCEL_PREFIX}.
 */
export function recordFromOutput(tool: string, output: string): ToolCallRecord {
  if (output.startsWith(BLOCKED_PREFIX)) {
    return { tool, status: 'blocked' };
  }
  if (output.startsWith(AUTO_CANCEL_PREFIX)) {
    return { tool, status: 'resolved' };
  }

  const trimmed = output.trimStart();
  if (!trimmed.startsWith('{') || !output.includes('pending_confirmation')) {
    return { tool, status: 'other' };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch {
    return { tool, status: 'other' };
  }

  const result = PendingOutputSchema.safeParse(parsed);
  if (!result.success || result.data.status !== 'pending_confirmation') {
    return { tool, status: 'other' };
  }
  return { tool, status: 'pending_confirmation', path: result.data.path ?? '' };
}

/**
 * Fold the history into the current pending-edit state.
 *
 * A `pending_confirmation` record starts a pending edit (replacing any
 * earlier one and resetting the block count); a confirm or cancel call or a
 * `resolved` record ends it; blocked calls while pending are counted.
 */
export function analyzePendingEditState(records: readonly ToolCallRecord[]): PendingEditState {
  const initial: PendingEditState = {
    hasPending: false,
    pendingPath: '',
    lastPendingIndex: -1,
    blockCountSincePending: 0,
  };

  return records.reduce<PendingEditState>((state, record, index) => {
    if (RESOLVING_TOOLS.has(record.tool) || record.status === 'resolved') {
      return initial;
    }
    if (record.status === 'pending_confirmation') {
      return {
        hasPending: true,
        pendingPath: record.path ?? '',
        lastPendingIndex: index,
        blockCountSincePending: 0,
      };
    }
    if (record.status === 'blocked' && state.hasPending) {
      return { ...state, blockCountSincePending: state.blockCountSincePending + 1 };
    }
    return state;
  }, initial);
}

// -----------------------------------------------------------------------------
// ToolCallHistory
// -----------------------------------------------------------------------------

/**
 * Options for ToolCallHistory constructor.
 */
export interface ToolCallHistoryOptions {
  /** Maximum records to keep (default: 1000) */
  historyLimit?: number;
  /** Debug callback for logging */
  onDebug?: (msg: string, data?: Record<string, unknown>) => void;
}

const DEFAULT_HISTORY_LIMIT = 1000;

/**
 * Append-only list of tool-call records with rollback for history rewrites.
 * Every mutation replaces the list, so a snapshot from {@link getAll} never
 * changes afterwards.
 *
 * @example
 * const history = new ToolCallHistory();
 * history.add(recordFromOutput('edit', output));
 * const state = analyzePendingEditState(history.getAll());
 */
export class ToolCallHistory {
  private records: readonly ToolCallRecord[] = [];
  private readonly historyLimit: number;
  private readonly onDebug?: (msg: string, data?: Record<string, unknown>) => void;

  constructor(options: ToolCallHistoryOptions = {}) {
    this.historyLimit = options.historyLimit ?? DEFAULT_HISTORY_LIMIT;
    this.onDebug = options.onDebug;
  }

  add(record: ToolCallRecord): void {
    const next = [...this.records, record];
    this.records = next.length > this.historyLimit ? next.slice(next.length - this.historyLimit) : next;
    this.onDebug?.('Tool call recorded', { tool: record.tool, status: record.status });
  }

  /** Current records, oldest first */
  getAll(): readonly ToolCallRecord[] {
    return this.records;
  }

  /**
   * Drop every record from `length` on, as when the conversation is rolled
   * back to an earlier point.
   */
  truncate(length: number): void {
    if (length >= this.records.length) return;
    this.records = this.records.slice(0, Math.max(0, length));
    this.onDebug?.('Tool call history truncated', { length: this.records.length });
  }

  clear(): void {
    this.records = [];
  }

  get size(): number {
    return this.records.length;
  }

  /** Pending-edit state of the current records */
  pendingState(): PendingEditState {
    return analyzePendingEditState(this.records);
  }
}
