/**
 * Line-oriented file access for files too large to load whole.
 *
 * Lines are read through a stream in fixed-size chunks; only the requested
 * range (or nothing at all) is kept in memory.
 */

import { createReadStream } from 'node:fs';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { randomBytes } from 'node:crypto';
import { ToolError } from '../errors/index.js';

/** Read and write buffer size for streaming operations */
export const STREAMING_BUFFER_SIZE = 64 * 1024;

const NEWLINE = 0x0a;

/**
 * Raw lines of `filePath` in order, each still carrying its `\n` terminator.
 * The last line has none when the file does not end in a newline. An empty
 * file yields nothing. Bytes are never decoded.
 */
export async function* readLineBuffers(filePath: string): AsyncGenerator<Buffer> {
  const stream = createReadStream(filePath, { highWaterMark: STREAMING_BUFFER_SIZE });

  let pending: Buffer = Buffer.alloc(0);
  for await (const chunk of stream) {
    const data = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    pending = pending.length === 0 ? data : Buffer.concat([pending, data]);
    let start = 0;
    let newline = pending.indexOf(NEWLINE, start);
    while (newline >= 0) {
      yield pending.subarray(start, newline + 1);
      start = newline + 1;
      newline = pending.indexOf(NEWLINE, start);
    }
    pending = pending.subarray(start);
  }
  if (pending.length > 0) {
    yield pending;
  }
}

/**
 * As {@link readLineBuffers}, decoded as UTF-8. A line never splits a
 * multi-byte character, since `\n` cannot occur inside one.
 */
export async function* readLines(filePath: string): AsyncGenerator<string> {
  for await (const line of readLineBuffers(filePath)) {
    yield line.toString('utf8');
  }
}

function endsWithNewline(line: Buffer): boolean {
  return line.length > 0 && line[line.length - 1] === NEWLINE;
}

/**
 * A line range read from a file.
 */
export interface LineRange {
  /** Lines `[start, end]` joined by `\n`, without a trailing newline */
  content: string;
  /** Lines in the whole file; a trailing newline does not add one */
  totalLines: number;
}

/**
 * Read lines `[startLine, endLine]` (1-based, inclusive). The whole file is
 * scanned to count its lines, but only the range is retained.
 */
export async function readLineRange(
  filePath: string,
  startLine: number,
  endLine: number
): Promise<LineRange> {
  const lines: string[] = [];
  let lineNumber = 0;
  for await (const line of readLines(filePath)) {
    lineNumber++;
    if (lineNumber >= startLine && lineNumber <= endLine) {
      lines.push(line.endsWith('\n') ? line.slice(0, -1) : line);
    }
  }
  return { content: lines.join('\n'), totalLines: lineNumber };
}

/**
 * Where a needle first appears in a file.
 */
export interface LineMatches {
  /** 1-based number of the first matching line, 0 when none match */
  firstLine: number;
  /** Number of lines containing the needle */
  count: number;
}

/**
 * Literal line search for the first non-empty line of `needle`.
 *
 * Multi-line needles are located by their first line only, so the count can
 * include lines where the rest of the needle does not follow.
 */
export async function findLineMatches(filePath: string, needle: string): Promise<LineMatches> {
  const pattern = needle.split('\n').find((line) => line !== '');
  if (pattern === undefined) {
    return { firstLine: 0, count: 0 };
  }

  let firstLine = 0;
  let count = 0;
  let lineNumber = 0;
  for await (const line of readLines(filePath)) {
    lineNumber++;
    if (line.includes(pattern)) {
      count++;
      if (firstLine === 0) firstLine = lineNumber;
    }
  }
  return { firstLine, count };
}

/**
 * Sibling temp file for an atomic replace of `filePath`.
 */
export function tempPathFor(filePath: string): string {
  return path.join(path.dirname(filePath), `.edit-${randomBytes(6).toString('hex')}.tmp`);
}

/**
 * Replace lines `[startLine, endLine]` of `filePath` with `newText`, without
 * reading the whole file into memory.
 *
 * Lines before the range are copied byte for byte to a sibling temp file, followed
 * by `newText`; the range itself is skipped and the rest copied. When
 * `newText` is non-empty and lacks a trailing newline, one is added if more
 * content follows or the replaced range ended in one. With
 * `endLine < startLine` nothing is skipped and the text is inserted before
 * `startLine`; past the last line it is appended, after a newline when the
 * file lacks one. The temp file takes the original's mode and is renamed over it.
 *
 * @throws ToolError (runtime) when the file cannot be read or replaced
 */
export async function streamingReplace(
  filePath: string,
  startLine: number,
  endLine: number,
  newText: string
): Promise<void> {
  const tempPath = tempPathFor(filePath);
  const replacement = Buffer.from(newText, 'utf8');
  const lineBreak = Buffer.from('\n');
  const needsNewline = newText !== '' && !newText.endsWith('\n');

  try {
    const stats = await fs.stat(filePath);
    const out = await fs.open(tempPath, 'wx', 0o600);

    try {
      let buffered: Buffer[] = [];
      let bufferedLength = 0;
      const emit = async (bytes: Buffer): Promise<void> => {
        buffered.push(bytes);
        bufferedLength += bytes.length;
        if (bufferedLength >= STREAMING_BUFFER_SIZE) {
          await out.write(Buffer.concat(buffered));
          buffered = [];
          bufferedLength = 0;
        }
      };

      let lineNumber = 0;
      let replacementWritten = false;
      let restStarted = false;
      let skippedTerminated = false;
      let lastTerminated = true;

      for await (const line of readLineBuffers(filePath)) {
        lineNumber++;
        lastTerminated = endsWithNewline(line);
        if (lineNumber < startLine) {
          await emit(line);
          continue;
        }
        if (!replacementWritten) {
          await emit(replacement);
          replacementWritten = true;
        }
        if (lineNumber <= endLine) {
          skippedTerminated = lastTerminated;
          continue;
        }
        if (!restStarted) {
          restStarted = true;
          if (needsNewline) await emit(lineBreak);
        }
        await emit(line);
      }

      if (!replacementWritten) {
        if (!lastTerminated && newText !== '') await emit(lineBreak);
        await emit(replacement);
      } else if (!restStarted && skippedTerminated && needsNewline) {
        await emit(lineBreak);
      }

      if (buffered.length > 0) {
        await out.write(Buffer.concat(buffered));
      }
    } finally {
      await out.close();
    }

    await fs.chmod(tempPath, stats.mode & 0o7777);
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw ToolError.wrapRuntime(error, 'streaming replace');
  }
}
