/**
 * Read tool - file reading with line-numbered output.
 *
 * Features:
 * - Line-numbered output format
 * - Offset and limit support for large files (lines are streamed)
 * - Binary file detection
 * - Workspace path validation
 * - Records the read for read-before-edit enforcement
 */

import * as fs from 'node:fs/promises';
import { z } from 'zod';
import { ToolError, formatToolError } from '../errors/index.js';
import { readLineRange } from '../edit/streaming.js';
import { errorCodeOf, resolveToolPath, type FileToolMetadata } from './format.js';
import { Tool } from './tool.js';
import { BINARY_CHECK_SIZE } from './workspace.js';

/** Default max lines to read */
const DEFAULT_MAX_LINES = 2000;

/** Maximum lines cap */
const MAX_LINES_CAP = 5000;

/**
 * Read tool metadata type.
 */
interface ReadMetadata extends FileToolMetadata {
  /** Starting line number (1-based) */
  startLine: number;
  /** Ending line number (1-based) */
  endLine: number;
  /** Total lines in file */
  totalLines: number;
  /** Whether output was truncated */
  truncated: boolean;
}

function createReadError(
  filePath: string,
  startLine: number,
  error: unknown
): Tool.Result<ReadMetadata> {
  return {
    title: `Error: ${filePath}`,
    metadata: {
      path: filePath,
      startLine,
      endLine: 0,
      totalLines: 0,
      truncated: false,
      error: errorCodeOf(error),
    },
    output: formatToolError(error),
  };
}

/**
 * Check if file is binary by looking for null bytes in first 8KB.
 */
async function isBinaryFile(fullPath: string): Promise<boolean> {
  const fd = await fs.open(fullPath, 'r');
  try {
    const buffer = Buffer.alloc(BINARY_CHECK_SIZE);
    const { bytesRead } = await fd.read(buffer, 0, BINARY_CHECK_SIZE, 0);
    return buffer.subarray(0, bytesRead).includes(0);
  } finally {
    await fd.close();
  }
}

const readParameters = z.object({
  path: z.string().describe('Absolute or workspace-relative file path'),
  offset: z.coerce.number().int().optional().describe('Starting line number (1-based, default: 1)'),
  limit: z.coerce
    .number()
    .int()
    .positive()
    .optional()
    .describe(`Max lines to read (default: ${String(DEFAULT_MAX_LINES)})`),
});

/**
 * Read tool - read file contents with line numbers.
 */
export const readTool = Tool.define<typeof readParameters, ReadMetadata>('read', {
  description: 'Read file with line numbers. Supports offset/limit for large files.',
  parameters: readParameters,
  execute: async (args, ctx) => {
    const filePath = args.path;
    const startLine = Math.max(1, args.offset ?? 1);
    const maxLines = Math.min(args.limit ?? DEFAULT_MAX_LINES, MAX_LINES_CAP);
    const { session } = ctx;

    ctx.metadata({ title: `Reading ${filePath}...` });

    try {
      const fullPath = await resolveToolPath(filePath, session.workspaceRoot, true);

      const stats = await fs.stat(fullPath);
      if (!stats.isFile()) {
        throw ToolError.semantic(`Path is not a file: ${filePath}`);
      }

      const maxBytes = session.settings.maxFileSizeKB * 1024;
      if (stats.size > maxBytes && args.offset === undefined && args.limit === undefined) {
        throw ToolError.semantic(
          `File size (${String(stats.size)} bytes) exceeds ${String(session.settings.maxFileSizeKB)} KB - read it in parts with offset and limit`
        );
      }

      if (await isBinaryFile(fullPath)) {
        throw ToolError.semantic(`File appears to be binary (contains null bytes): ${filePath}`);
      }

      const range = await readLineRange(fullPath, startLine, startLine + maxLines - 1);
      const totalLines = range.totalLines;

      if (startLine > totalLines && totalLines > 0) {
        throw ToolError.semantic(
          `offset (${String(startLine)}) exceeds file length (${String(totalLines)} lines)`
        );
      }

      session.readTracker.recordRead(fullPath);

      if (totalLines === 0) {
        return {
          title: `Read ${filePath} (empty)`,
          metadata: { path: filePath, startLine: 0, endLine: 0, totalLines: 0, truncated: false },
          output: '(empty file)',
        };
      }

      const endLine = Math.min(startLine + maxLines - 1, totalLines);
      const lineWidth = String(endLine).length;
      const formattedLines = range.content.split('\n').map((line, i) => {
        const lineNum = String(startLine + i).padStart(lineWidth, ' ');
        return `${lineNum}\t${line}`;
      });

      const truncated = endLine < totalLines;
      const truncationNote = truncated
        ? `\n\n[Truncated: showing lines ${String(startLine)}-${String(endLine)} of ${String(totalLines)}. Use offset=${String(endLine + 1)} to continue.]`
        : '';

      return {
        title: `Read ${filePath} (lines ${String(startLine)}-${String(endLine)})`,
        metadata: { path: filePath, startLine, endLine, totalLines, truncated },
        output: formattedLines.join('\n') + truncationNote,
      };
    } catch (error) {
      return createReadError(filePath, startLine, error);
    }
  },
});
