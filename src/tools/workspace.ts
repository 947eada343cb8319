/**
 * Workspace path resolution and system error mapping for the file tools.
 *
 * Every path a tool touches must resolve inside the workspace root, also
 * after following symlinks.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as os from 'node:os';
import { errorMessage, systemErrorCode } from '../errors/index.js';
import type { ToolErrorCode } from './types.js';

// =============================================================================
// Constants
// =============================================================================

/** Largest content the write tool accepts (1MB) */
export const DEFAULT_MAX_WRITE_BYTES = 1024 * 1024;

/** Binary detection sample size */
export const BINARY_CHECK_SIZE = 8192;

/**
 * Path resolution failure.
 */
export interface PathError {
  error: ToolErrorCode;
  message: string;
}

// =============================================================================
// Workspace root
// =============================================================================

function expandHome(inputPath: string): string {
  return inputPath.startsWith('~') ? path.join(os.homedir(), inputPath.slice(1)) : inputPath;
}

function isWithin(child: string, parent: string): boolean {
  const relative = path.relative(parent, child);
  return relative === '' || (!relative.startsWith('..') && !path.isAbsolute(relative));
}

/**
 * Real path of `target`, or of its nearest existing ancestor joined with the
 * rest of the path when `target` does not exist yet.
 */
async function realpathOfNearest(target: string): Promise<string> {
  let existing = target;
  for (;;) {
    try {
      const real = await fs.realpath(existing);
      return path.join(real, path.relative(existing, target));
    } catch (error) {
      const parent = path.dirname(existing);
      if (parent === existing) {
        throw error;
      }
      existing = parent;
    }
  }
}

/**
 * Workspace root from AGENT_WORKSPACE_ROOT, else the current directory.
 */
export function getWorkspaceRoot(): string {
  const envRoot = process.env['AGENT_WORKSPACE_ROOT'];
  if (envRoot !== undefined && envRoot !== '') {
    return path.resolve(expandHome(envRoot));
  }
  return process.cwd();
}

/**
 * Effective workspace root for a session.
 *
 * AGENT_WORKSPACE_ROOT is a hard cap: a configured root applies only when it
 * resolves (symlinks followed) inside it. Without the environment variable the
 * configured root applies as is; without either, the current directory.
 */
export async function resolveWorkspaceRoot(
  configWorkspaceRoot?: string,
  onDebug?: (msg: string, data?: Record<string, unknown>) => void
): Promise<{ workspaceRoot: string; source: 'env' | 'config' | 'cwd'; warning?: string }> {
  const envRoot = process.env['AGENT_WORKSPACE_ROOT'];
  const hasEnvRoot = envRoot !== undefined && envRoot !== '';
  const hasConfigRoot = configWorkspaceRoot !== undefined && configWorkspaceRoot !== '';

  if (!hasConfigRoot) {
    const workspaceRoot = getWorkspaceRoot();
    return { workspaceRoot, source: hasEnvRoot ? 'env' : 'cwd' };
  }

  const configRoot = path.resolve(expandHome(configWorkspaceRoot));
  if (!hasEnvRoot) {
    onDebug?.('Workspace root from config', { workspaceRoot: configRoot });
    return { workspaceRoot: configRoot, source: 'config' };
  }

  const capRoot = getWorkspaceRoot();
  const [realCap, realConfig] = await Promise.all([
    realpathOfNearest(capRoot),
    realpathOfNearest(configRoot),
  ]);
  if (isWithin(realConfig, realCap)) {
    onDebug?.('Workspace root narrowed by config', { envRoot: capRoot, workspaceRoot: realConfig });
    return { workspaceRoot: realConfig, source: 'config' };
  }

  const warning = `config.agent.workspaceRoot (${configRoot}) resolves outside AGENT_WORKSPACE_ROOT (${capRoot}). Config ignored.`;
  onDebug?.('Workspace config ignored', { envRoot: capRoot, configRoot: realConfig });
  return { workspaceRoot: capRoot, source: 'env', warning };
}

/**
 * Whether filesystem writes are enabled. AGENT_FILESYSTEM_WRITES_ENABLED set
 * to `false` or `0` disables them.
 */
export function isFilesystemWritesEnabled(): boolean {
  const envValue = process.env['AGENT_FILESYSTEM_WRITES_ENABLED'];
  if (envValue === undefined || envValue === '') {
    return true;
  }
  return envValue.toLowerCase() !== 'false' && envValue !== '0';
}

// =============================================================================
// Path resolution
// =============================================================================

/**
 * Resolve `relativePath` against the workspace without touching the
 * filesystem. Rejects `..` components and paths outside the workspace.
 */
export function resolveWorkspacePath(
  relativePath: string,
  workspaceRoot: string = getWorkspaceRoot()
): string | PathError {
  if (relativePath.split(/[/\\]/).includes('..')) {
    return {
      error: 'PERMISSION_DENIED',
      message: `Path contains '..' component: ${relativePath}. Path traversal is not allowed.`,
    };
  }

  const workspace = path.resolve(workspaceRoot);
  const resolved = path.resolve(workspace, relativePath);
  if (!isWithin(resolved, workspace)) {
    return {
      error: 'PERMISSION_DENIED',
      message: `Path resolves outside workspace: ${relativePath}`,
    };
  }
  return resolved;
}

/**
 * As {@link resolveWorkspacePath}, then follow symlinks: the real path (or,
 * for a path that does not exist yet, the real path of its nearest existing
 * ancestor) must stay inside the real workspace.
 *
 * @param requireExists - Fail with NOT_FOUND when the path does not exist
 */
export async function resolveWorkspacePathSafe(
  relativePath: string,
  workspaceRoot: string = getWorkspaceRoot(),
  requireExists: boolean = false
): Promise<string | PathError> {
  const resolved = resolveWorkspacePath(relativePath, workspaceRoot);
  if (typeof resolved !== 'string') {
    return resolved;
  }

  let realWorkspace: string;
  let realTarget: string;
  try {
    realWorkspace = await realpathOfNearest(path.resolve(workspaceRoot));
    realTarget = await realpathOfNearest(resolved);
  } catch (error) {
    const mapped = mapSystemErrorToToolError(error);
    return { error: mapped.code, message: `Cannot resolve ${relativePath}: ${mapped.message}` };
  }

  if (!isWithin(realTarget, realWorkspace)) {
    return {
      error: 'PERMISSION_DENIED',
      message: `Symlink resolves outside workspace: ${relativePath}`,
    };
  }

  if (requireExists) {
    try {
      await fs.access(resolved);
    } catch (error) {
      return {
        error: mapSystemErrorToToolError(error).code,
        message: `Path does not exist: ${relativePath}`,
      };
    }
  }

  return resolved;
}

// =============================================================================
// Errors
// =============================================================================

const SYSTEM_ERROR_CODES: Record<string, ToolErrorCode> = {
  ENOENT: 'NOT_FOUND',
  EACCES: 'PERMISSION_DENIED',
  EPERM: 'PERMISSION_DENIED',
  EISDIR: 'VALIDATION_ERROR',
  ENOTDIR: 'VALIDATION_ERROR',
  EMFILE: 'IO_ERROR',
  ENFILE: 'IO_ERROR',
  ENOSPC: 'IO_ERROR',
};

/**
 * Map Node.js system errors to tool error codes. The code is taken from the
 * error's `code` property, or from an `ENOENT:`-style prefix in its message.
 */
export function mapSystemErrorToToolError(error: unknown): {
  code: ToolErrorCode;
  message: string;
} {
  if (typeof error !== 'object' || error === null) {
    return { code: 'UNKNOWN', message: String(error) };
  }

  const message = errorMessage(error);
  const systemCode = systemErrorCode(error) ?? /(E[A-Z]+):/.exec(message)?.[1];
  const code = systemCode !== undefined ? SYSTEM_ERROR_CODES[systemCode] : undefined;
  return { code: code ?? 'IO_ERROR', message };
}
