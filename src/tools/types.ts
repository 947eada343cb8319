/**
 * Error codes for tool failures, reported in result metadata.
 */
export type ToolErrorCode =
  | 'VALIDATION_ERROR' // Invalid input parameters or edit request
  | 'NOT_FOUND' // File or search text not found
  | 'AMBIGUOUS_MATCH' // Search text matches more than one location
  | 'BLOCKED' // Another call is blocked by a pending edit
  | 'STALE' // File changed between preview and confirm
  | 'IO_ERROR' // File system errors
  | 'CONFIG_ERROR' // Configuration issues
  | 'PERMISSION_DENIED' // Access denied
  | 'UNKNOWN'; // Unexpected errors
