/**
 * Output helpers shared by the file tools.
 *
 * Edit and write results are serialized as pretty JSON so the tool-call
 * history can recognize a pending confirmation in the output text.
 */

import { ToolError } from '../errors/index.js';
import type { Tool } from './tool.js';
import type { ToolErrorCode } from './types.js';
import { mapSystemErrorToToolError, resolveWorkspacePathSafe } from './workspace.js';

/**
 * Metadata reported by every file tool.
 */
export interface FileToolMetadata extends Tool.Metadata {
  /** Path as the caller gave it; empty for calls without one */
  path: string;
  /** Error code if operation failed */
  error?: ToolErrorCode;
}

export function formatPayload(payload: object): string {
  return JSON.stringify(payload, null, 2);
}

/**
 * Map the `error` field of a failure result to a tool error code.
 */
export function failureCode(error: string): ToolErrorCode {
  switch (error) {
    case 'no_match':
    case 'no_match_in_range':
    case 'no_pending_operation':
      return 'NOT_FOUND';
    case 'multiple_matches':
    case 'multiple_matches_in_range':
      return 'AMBIGUOUS_MATCH';
    case 'file_changed':
    case 'file_deleted':
      return 'STALE';
    case 'patch_failed':
      return 'IO_ERROR';
    default:
      return 'VALIDATION_ERROR';
  }
}

/**
 * Error code for a thrown error: its own code for a ToolError, the mapped
 * system error code otherwise.
 */
export function errorCodeOf(error: unknown): ToolErrorCode {
  if (error instanceof ToolError) return error.code;
  return mapSystemErrorToToolError(error).code;
}

/**
 * Resolve `filePath` inside `workspaceRoot`.
 *
 * @throws ToolError (semantic) carrying the resolver's error code when the
 * path escapes the workspace or, with `requireExists`, does not exist
 */
export async function resolveToolPath(
  filePath: string,
  workspaceRoot: string,
  requireExists = false
): Promise<string> {
  const resolved = await resolveWorkspacePathSafe(filePath, workspaceRoot, requireExists);
  if (typeof resolved !== 'string') {
    throw ToolError.semantic(resolved.message, undefined, resolved.error);
  }
  return resolved;
}

/**
 * The error returned by writing tools while filesystem writes are disabled.
 */
export function writesDisabledError(): ToolError {
  return ToolError.semantic(
    'Filesystem writes are disabled. Set AGENT_FILESYSTEM_WRITES_ENABLED=true or update config.',
    undefined,
    'PERMISSION_DENIED'
  );
}
