/**
 * Tools module - the file tools and their registry.
 *
 * Tools:
 * - read: numbered lines, records the read for read-before-edit
 * - write / write.confirm / write.cancel: whole-file writes
 * - edit / edit.confirm / edit.cancel: patch, search/replace and line edits
 */

import { ToolRegistry } from './registry.js';
import { readTool } from './read.js';
import { writeTool } from './write.js';
import { editTool } from './edit.js';
import { editConfirmTool, editCancelTool, writeConfirmTool, writeCancelTool } from './confirm.js';

export type { ToolErrorCode } from './types.js';

export { Tool } from './tool.js';
export { ToolRegistry } from './registry.js';
export type { ToolPermission, ToolPermissions, ToolExecutionResult } from './registry.js';

export { readTool, writeTool, editTool, editConfirmTool, editCancelTool, writeConfirmTool, writeCancelTool };

export {
  getWorkspaceRoot,
  resolveWorkspacePath,
  resolveWorkspacePathSafe,
  isFilesystemWritesEnabled,
  mapSystemErrorToToolError,
} from './workspace.js';

/**
 * Register the file tools. `read` needs the read permission, the rest write.
 */
export function registerFileTools(): void {
  ToolRegistry.register(readTool, { permissions: { required: ['read'] } });
  for (const tool of [
    writeTool,
    writeConfirmTool,
    writeCancelTool,
    editTool,
    editConfirmTool,
    editCancelTool,
  ]) {
    ToolRegistry.register(tool, { permissions: { required: ['write'] } });
  }
}
