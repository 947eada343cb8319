/**
 * Write tool - whole-file creation and overwriting.
 *
 * Features:
 * - New files are written at once (parent directories created)
 * - Overwriting an existing file waits for write.confirm / write.cancel
 * - Atomic writes via temp file + rename
 * - Workspace path validation
 */

import * as fs from 'node:fs/promises';
import { z } from 'zod';
import { ToolError, formatToolError } from '../errors/index.js';
import { fileExists, writeFileAtomic } from '../edit/files.js';
import { countContentLines } from '../edit/line-edit.js';
import {
  WRITE_PENDING_NEXT_STEP,
  type WritePendingResult,
  type WrittenResult,
} from '../edit/results.js';
import {
  errorCodeOf,
  formatPayload,
  resolveToolPath,
  writesDisabledError,
  type FileToolMetadata,
} from './format.js';
import { Tool } from './tool.js';
import { DEFAULT_MAX_WRITE_BYTES, isFilesystemWritesEnabled } from './workspace.js';

/**
 * Write tool metadata type.
 */
interface WriteMetadata extends FileToolMetadata {
  /** Bytes in the content to write */
  bytes: number;
  /** Whether the overwrite awaits confirmation */
  pending: boolean;
}

function createWriteError(filePath: string, error: unknown): Tool.Result<WriteMetadata> {
  return {
    title: `Error: ${filePath}`,
    metadata: { path: filePath, bytes: 0, pending: false, error: errorCodeOf(error) },
    output: formatToolError(error),
  };
}

const writeParameters = z.object({
  path: z.string().describe('Absolute or workspace-relative file path'),
  content: z.string().describe('Full file content'),
});

/**
 * Write tool - write content to a file.
 */
export const writeTool = Tool.define<typeof writeParameters, WriteMetadata>('write', {
  description:
    'Write a whole file. New files are created at once; overwrites wait for write.confirm.',
  parameters: writeParameters,
  execute: async (args, ctx) => {
    const { path: filePath, content } = args;
    const { session } = ctx;

    if (!isFilesystemWritesEnabled()) {
      return createWriteError(filePath, writesDisabledError());
    }

    const bytes = Buffer.byteLength(content, 'utf-8');
    if (bytes > DEFAULT_MAX_WRITE_BYTES) {
      return createWriteError(
        filePath,
        ToolError.semantic(
          `Content size (${String(bytes)} bytes) exceeds max write limit (${String(DEFAULT_MAX_WRITE_BYTES)} bytes)`
        )
      );
    }

    ctx.metadata({ title: `Writing ${filePath}...` });

    try {
      const fullPath = await resolveToolPath(filePath, session.workspaceRoot);

      if (!(await fileExists(fullPath))) {
        await writeFileAtomic(fullPath, content, true);
        const result: WrittenResult = {
          success: true,
          path: filePath,
          action: 'created',
          lines: countContentLines(content),
          bytes,
        };
        return {
          title: `Created ${filePath}`,
          metadata: { path: filePath, bytes, pending: false },
          output: formatPayload(result),
        };
      }

      let oldContent: string;
      try {
        oldContent = await fs.readFile(fullPath, 'utf-8');
      } catch (error) {
        throw ToolError.wrapRuntime(error, 'read file');
      }

      const oldSize = Buffer.byteLength(oldContent, 'utf-8');
      const oldLines = countContentLines(oldContent);
      await session.storePendingWrite({ path: filePath, fullPath, content, oldSize, oldLines });

      const result: WritePendingResult = {
        status: 'pending_confirmation',
        path: filePath,
        next_step: WRITE_PENDING_NEXT_STEP,
        old_size: oldSize,
        old_lines: oldLines,
        new_size: bytes,
        new_lines: countContentLines(content),
      };
      return {
        title: `Overwrite ${filePath}?`,
        metadata: { path: filePath, bytes, pending: true },
        output: formatPayload(result),
      };
    } catch (error) {
      return createWriteError(filePath, error);
    }
  },
});
