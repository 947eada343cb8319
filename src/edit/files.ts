/**
 * Whole-file reads and atomic writes for the edit engine.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { ToolError, systemErrorCode } from '../errors/index.js';
import { tempPathFor } from './streaming.js';

/** Files above this size are edited through line windows */
export const LARGE_FILE_THRESHOLD = 1024 * 1024;

/** Mode given to files the engine creates */
const NEW_FILE_MODE = 0o644;

function isNotFound(error: unknown): boolean {
  return systemErrorCode(error) === 'ENOENT';
}

/**
 * Current content of a file about to be edited. A missing file reads as
 * empty with `isNewFile` set.
 *
 * @throws ToolError (runtime) on any other read failure
 */
export async function readFileForEdit(
  fullPath: string
): Promise<{ content: string; isNewFile: boolean }> {
  try {
    return { content: await fs.readFile(fullPath, 'utf-8'), isNewFile: false };
  } catch (error) {
    if (isNotFound(error)) {
      return { content: '', isNewFile: true };
    }
    throw ToolError.wrapRuntime(error, 'read file');
  }
}

/**
 * Whether a file exists. Errors other than "not found" propagate.
 */
export async function fileExists(fullPath: string): Promise<boolean> {
  try {
    await fs.stat(fullPath);
    return true;
  } catch (error) {
    if (isNotFound(error)) return false;
    throw ToolError.wrapRuntime(error, 'stat file');
  }
}

/**
 * Size check against `threshold`. Missing files are never large.
 */
export async function isLargeFile(
  fullPath: string,
  threshold: number = LARGE_FILE_THRESHOLD
): Promise<{ large: boolean; size: number }> {
  try {
    const stats = await fs.stat(fullPath);
    return { large: stats.size > threshold, size: stats.size };
  } catch (error) {
    if (isNotFound(error)) return { large: false, size: 0 };
    throw ToolError.wrapRuntime(error, 'stat file');
  }
}

/**
 * Write `content` through a sibling temp file renamed over the target.
 *
 * A new file gets its parent directories created and mode 0644; an existing
 * one keeps its mode.
 *
 * @throws ToolError (runtime) when any step fails; the temp file is removed
 */
export async function writeFileAtomic(
  fullPath: string,
  content: string,
  isNewFile: boolean
): Promise<void> {
  if (isNewFile) {
    try {
      await fs.mkdir(path.dirname(fullPath), { recursive: true });
    } catch (error) {
      throw ToolError.wrapRuntime(error, 'create parent directory');
    }
  }

  const tempPath = tempPathFor(fullPath);
  try {
    await fs.writeFile(tempPath, content, { encoding: 'utf-8', flag: 'wx' });

    let mode = NEW_FILE_MODE;
    try {
      mode = (await fs.stat(fullPath)).mode & 0o7777;
    } catch (error) {
      if (!isNotFound(error)) throw error;
    }
    await fs.chmod(tempPath, mode);

    await fs.rename(tempPath, fullPath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw ToolError.wrapRuntime(error, 'atomic write');
  }
}
