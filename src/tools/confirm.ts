/**
 * Confirm and cancel tools for pending edits and overwrites.
 *
 * `edit.*` looks at the pending edit first, `write.*` at the pending
 * overwrite first; each falls back to the other kind. These tools are never
 * blocked by a pending edit.
 */

import { z } from 'zod';
import { formatToolError } from '../errors/index.js';
import type { PendingKind } from '../edit/pending.js';
import { isFailure } from '../edit/results.js';
import { errorCodeOf, failureCode, formatPayload, type FileToolMetadata } from './format.js';
import { Tool } from './tool.js';

const noParameters = z.object({});

function resolveError(id: string, error: unknown): Tool.Result<FileToolMetadata> {
  return {
    title: `Error: ${id}`,
    metadata: { path: '', error: errorCodeOf(error) },
    output: formatToolError(error),
  };
}

function defineConfirm(id: string, first: PendingKind, description: string) {
  return Tool.define<typeof noParameters, FileToolMetadata>(id, {
    description,
    parameters: noParameters,
    execute: async (_args, ctx) => {
      try {
        const result = await ctx.session.confirmPending(first);
        if (isFailure(result)) {
          return {
            title: `Nothing applied (${result.error})`,
            metadata: { path: result.path ?? '', error: failureCode(result.error) },
            output: formatPayload(result),
          };
        }
        return {
          title: `Applied ${result.path}`,
          metadata: { path: result.path },
          output: formatPayload(result),
        };
      } catch (error) {
        return resolveError(id, error);
      }
    },
  });
}

function defineCancel(id: string, first: PendingKind, description: string) {
  return Tool.define<typeof noParameters, FileToolMetadata>(id, {
    description,
    parameters: noParameters,
    execute: async (_args, ctx) => {
      const result = await ctx.session.cancelPending(first);
      if (isFailure(result)) {
        return {
          title: 'Nothing to cancel',
          metadata: { path: '', error: failureCode(result.error) },
          output: formatPayload(result),
        };
      }
      return {
        title: `Cancelled ${result.path}`,
        metadata: { path: result.path },
        output: formatPayload(result),
      };
    },
  });
}

export const editConfirmTool = defineConfirm(
  'edit.confirm',
  'edit',
  'Apply the pending edit shown in the last preview.'
);

export const editCancelTool = defineCancel(
  'edit.cancel',
  'edit',
  'Discard the pending edit. The file is left unchanged.'
);

export const writeConfirmTool = defineConfirm(
  'write.confirm',
  'write',
  'Overwrite the existing file with the pending write.'
);

export const writeCancelTool = defineCancel(
  'write.cancel',
  'write',
  'Discard the pending write. The file is left unchanged.'
);
