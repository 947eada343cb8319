/**
 * Structured errors for the edit engine and its tools.
 *
 * Every failure is one of two kinds:
 * - semantic: the caller misused the interface (ambiguous match, no edit mode,
 *   no-op edit, unread file, blocked by a pending edit). Retrying with a
 *   corrected request can succeed.
 * - runtime: the environment failed (I/O error, file vanished, permission).
 *
 * Tools convert a ToolError into a result payload with {@link ToolError.toJSON}
 * or {@link formatToolError}; they never let it escape the tool boundary.
 */

import type { ToolErrorCode } from '../tools/types.js';

// -----------------------------------------------------------------------------
// Types
// -----------------------------------------------------------------------------

/**
 * Whether the caller or the environment is at fault.
 */
export type ToolErrorKind = 'semantic' | 'runtime';

/**
 * Structured fields merged into the error payload.
 */
export type ToolErrorDetails = Record<string, unknown>;

/**
 * JSON payload returned to the caller for a failed operation.
 */
export interface ToolErrorPayload extends ToolErrorDetails {
  success: false;
  error: string;
}

// -----------------------------------------------------------------------------
// ToolError
// -----------------------------------------------------------------------------

/**
 * Error raised by engine operations.
 *
 * @example
 * throw ToolError.semantic('search and replace text are identical - no change would be made');
 *
 * @example
 * throw ToolError.semantic(`file not read recently: ...`, {
 *   error: 'file_not_read',
 *   path,
 * });
 */
export class ToolError extends Error {
  public readonly kind: ToolErrorKind;
  public readonly details?: ToolErrorDetails;
  public readonly code: ToolErrorCode;

  constructor(kind: ToolErrorKind, message: string, details?: ToolErrorDetails, code?: ToolErrorCode) {
    super(message);
    this.name = 'ToolError';
    this.kind = kind;
    this.details = details;
    this.code = code ?? (kind === 'semantic' ? 'VALIDATION_ERROR' : 'IO_ERROR');

    // Maintain proper stack trace in V8
    if (typeof Error.captureStackTrace === 'function') {
      Error.captureStackTrace(this, ToolError);
    }
  }

  static semantic(message: string, details?: ToolErrorDetails, code?: ToolErrorCode): ToolError {
    return new ToolError('semantic', message, details, code);
  }

  static runtime(message: string, details?: ToolErrorDetails, code?: ToolErrorCode): ToolError {
    return new ToolError('runtime', message, details, code);
  }

  /**
   * Prefix an error's message with `context`, keeping kind, details and code
   * when it is already a ToolError. Anything else becomes a semantic error.
   */
  static wrapSemantic(error: unknown, context?: string): ToolError {
    return wrap(error, 'semantic', context);
  }

  /**
   * As {@link wrapSemantic}, but anything that is not a ToolError becomes a
   * runtime error.
   */
  static wrapRuntime(error: unknown, context?: string): ToolError {
    return wrap(error, 'runtime', context);
  }

  /** Semantic errors can be retried after the caller corrects its request */
  get backtrackable(): boolean {
    return this.kind === 'semantic';
  }

  /** Details are merged last, so a detail named `error` replaces the message */
  toJSON(): ToolErrorPayload {
    const payload: ToolErrorPayload = { success: false, error: this.message };
    return Object.assign(payload, this.details);
  }
}

function wrap(error: unknown, fallbackKind: ToolErrorKind, context?: string): ToolError {
  const prefix = context === undefined || context === '' ? '' : `${context}: `;
  if (error instanceof ToolError) {
    if (prefix === '') return error;
    return new ToolError(error.kind, `${prefix}${error.message}`, error.details, error.code);
  }
  return new ToolError(fallbackKind, `${prefix}${errorMessage(error)}`);
}

// -----------------------------------------------------------------------------
// Helpers
// -----------------------------------------------------------------------------

/**
 * Message of anything thrown. Errors are recognized by shape: those raised by
 * Node's own modules can come from another realm than the caller's `Error`.
 */
export function errorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error) {
    if (typeof error.message === 'string') return error.message;
  }
  return String(error);
}

/**
 * The `code` of a Node.js system error (`ENOENT`, `EACCES`, ...), if any.
 */
export function systemErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined;
  }
  return undefined;
}

/**
 * Type guard for ToolError.
 */
export function isToolError(error: unknown): error is ToolError {
  return error instanceof ToolError;
}

/**
 * True only for semantic ToolErrors.
 */
export function isBacktrackable(error: unknown): boolean {
  return error instanceof ToolError && error.backtrackable;
}

/**
 * Render an error for the caller: pretty JSON when the error carries
 * structured details, otherwise `Error: <message>`.
 */
export function formatToolError(error: unknown): string {
  if (error instanceof ToolError) {
    if (error.details !== undefined && Object.keys(error.details).length > 0) {
      return JSON.stringify(error.toJSON(), null, 2);
    }
    return `Error: ${error.message}`;
  }
  return `Error: ${errorMessage(error)}`;
}

/**
 * Short description of an error code for titles and logs.
 */
export function describeErrorCode(code: ToolErrorCode): string {
  switch (code) {
    case 'VALIDATION_ERROR':
      return 'Invalid request';
    case 'NOT_FOUND':
      return 'Not found';
    case 'AMBIGUOUS_MATCH':
      return 'Ambiguous match';
    case 'BLOCKED':
      return 'Blocked by pending edit';
    case 'STALE':
      return 'File changed since preview';
    case 'PERMISSION_DENIED':
      return 'Permission denied';
    case 'IO_ERROR':
      return 'I/O error';
    case 'CONFIG_ERROR':
      return 'Configuration error';
    default:
      return 'Unexpected error';
  }
}
