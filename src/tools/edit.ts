/**
 * Edit tool - one entry point for patch, search/replace and line-range edits.
 *
 * In preview mode (the default) the edit is computed and held until
 * `edit.confirm` or `edit.cancel`; every other tool is blocked meanwhile.
 */

import { z } from 'zod';
import { errorMessage, formatToolError } from '../errors/index.js';
import { executeEdit, parseEditRequest, type EditMode } from '../edit/engine.js';
import { isFailure, isPending, type EditResult } from '../edit/results.js';
import {
  errorCodeOf,
  failureCode,
  formatPayload,
  resolveToolPath,
  writesDisabledError,
  type FileToolMetadata,
} from './format.js';
import { Tool } from './tool.js';
import { isFilesystemWritesEnabled } from './workspace.js';

/**
 * Edit tool metadata type.
 */
interface EditMetadata extends FileToolMetadata {
  /** Which edit mode ran; absent when the arguments were rejected */
  mode?: EditMode;
  /** Whether the edit awaits confirmation */
  pending: boolean;
}

function createEditError(label: string, error: unknown): Tool.Result<EditMetadata> {
  return {
    title: `Error: ${label}`,
    metadata: { path: label, pending: false, error: errorCodeOf(error) },
    output: formatToolError(error),
  };
}

function titleFor(label: string, result: EditResult): string {
  if (isFailure(result)) return `Edit failed: ${label}`;
  if (isPending(result)) return `Preview ${label}`;
  return `Edited ${label}`;
}

const editParameters = z.object({
  path: z.string().optional().describe('File path (search/replace and line modes)'),
  search: z.string().optional().describe('Text to find; must match one location'),
  replace: z.string().optional().describe('Replacement for the search text'),
  patch: z
    .string()
    .optional()
    .describe('Patch from *** Begin Patch to *** End Patch; may touch several files'),
  start_line: z.coerce
    .number()
    .int()
    .optional()
    .describe('First line to replace (1-based); with search, start of the search range'),
  end_line: z.coerce
    .number()
    .int()
    .optional()
    .describe('Last line to replace; 0 inserts before start_line'),
  new_text: z.string().optional().describe('Text for the line range'),
});

/**
 * Edit tool - apply a patch, a search/replace, or a line-range replacement.
 */
export const editTool = Tool.define<typeof editParameters, EditMetadata>('edit', (initCtx) => ({
  description:
    'Edit files: patch (*** Begin Patch), search+replace, or start_line+new_text. Edits preview until edit.confirm.',
  parameters: editParameters,
  execute: async (args, ctx) => {
    const label = args.path ?? 'patch';

    if (!isFilesystemWritesEnabled()) {
      return createEditError(label, writesDisabledError());
    }

    const { session } = ctx;
    try {
      const request = parseEditRequest(args);
      ctx.metadata({ title: `Editing ${label}...` });

      const result = await executeEdit(request, {
        session,
        resolvePath: (filePath) => resolveToolPath(filePath, session.workspaceRoot),
        onDebug: initCtx?.onDebug,
      });

      return {
        title: titleFor(label, result),
        metadata: {
          path: label,
          mode: request.kind,
          pending: isPending(result),
          error: isFailure(result) ? failureCode(result.error) : undefined,
        },
        output: formatPayload(result),
      };
    } catch (error) {
      initCtx?.onDebug?.('Edit failed', {
        path: label,
        error: errorMessage(error),
      });
      return createEditError(label, error);
    }
  },
}));
