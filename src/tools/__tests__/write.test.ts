/**
 * Tests for Write tool and its confirm/cancel tools.
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as path from 'node:path';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import { EditSession } from '../../edit/pending.js';
import { WRITE_PENDING_NEXT_STEP } from '../../edit/results.js';
import { writeCancelTool, writeConfirmTool } from '../confirm.js';
import { Tool } from '../tool.js';
import { writeTool } from '../write.js';

describe('Write Tool', () => {
  let tempDir: string;
  let ctx: Tool.Context;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'write-test-'));
    ctx = Tool.createNoopContext({ session: new EditSession({ workspaceRoot: tempDir }) });
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  async function write(filePath: string, content: string) {
    const initialized = await writeTool.init();
    return initialized.execute({ path: filePath, content }, ctx);
  }

  it('should create a new file at once', async () => {
    const result = await write('dir/new.txt', 'a\nb\n');

    expect(result.title).toBe('Created dir/new.txt');
    expect(result.metadata).toEqual({ path: 'dir/new.txt', bytes: 4, pending: false });
    expect(JSON.parse(result.output)).toEqual({
      success: true,
      path: 'dir/new.txt',
      action: 'created',
      lines: 2,
      bytes: 4,
    });
    expect(await fs.readFile(path.join(tempDir, 'dir/new.txt'), 'utf-8')).toBe('a\nb\n');
  });

  it('should hold an overwrite until write.confirm', async () => {
    const target = path.join(tempDir, 'a.txt');
    await fs.writeFile(target, 'old\n');

    const result = await write('a.txt', 'new content\n');

    expect(result.title).toBe('Overwrite a.txt?');
    expect(result.metadata.pending).toBe(true);
    expect(JSON.parse(result.output)).toEqual({
      status: 'pending_confirmation',
      path: 'a.txt',
      next_step: WRITE_PENDING_NEXT_STEP,
      old_size: 4,
      old_lines: 1,
      new_size: 12,
      new_lines: 1,
    });
    expect(await fs.readFile(target, 'utf-8')).toBe('old\n');

    const confirmed = await (await writeConfirmTool.init()).execute({}, ctx);

    expect(confirmed.title).toBe('Applied a.txt');
    expect(await fs.readFile(target, 'utf-8')).toBe('new content\n');
  });

  it('should leave the file alone on write.cancel', async () => {
    const target = path.join(tempDir, 'a.txt');
    await fs.writeFile(target, 'old\n');
    await write('a.txt', 'new\n');

    const cancelled = await (await writeCancelTool.init()).execute({}, ctx);

    expect(cancelled.title).toBe('Cancelled a.txt');
    expect(JSON.parse(cancelled.output)).toEqual({
      success: true,
      path: 'a.txt',
      message: 'Write cancelled. File was not modified.',
    });
    expect(await fs.readFile(target, 'utf-8')).toBe('old\n');
  });

  it('should refuse while filesystem writes are disabled', async () => {
    process.env['AGENT_FILESYSTEM_WRITES_ENABLED'] = 'false';

    const result = await write('a.txt', 'x');

    expect(result.metadata.error).toBe('PERMISSION_DENIED');
    expect(result.output).toBe(
      'Error: Filesystem writes are disabled. Set AGENT_FILESYSTEM_WRITES_ENABLED=true or update config.'
    );
  });

  it('should refuse content above the write limit', async () => {
    const result = await write('a.txt', 'x'.repeat(1024 * 1024 + 1));

    expect(result.output).toBe(
      'Error: Content size (1048577 bytes) exceeds max write limit (1048576 bytes)'
    );
  });

  it('should refuse paths outside the workspace', async () => {
    const result = await write('/etc/passwd-copy', 'x');

    expect(result.output).toBe('Error: Path resolves outside workspace: /etc/passwd-copy');
    expect(result.metadata.error).toBe('PERMISSION_DENIED');
  });
});
