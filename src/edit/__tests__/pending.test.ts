/**
 * Tests for EditSession: confirm, cancel, gating and read-before-edit.
 */

import { afterEach, beforeEach, describe, expect, it } from '@jest/globals';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';

import { ToolError } from '../../errors/index.js';
import { EditSession, type PendingEdit } from '../pending.js';

describe('EditSession', () => {
  let tempDir: string;
  let file: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'session-test-'));
    file = path.join(tempDir, 'a.txt');
    await fs.writeFile(file, 'old\n');
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  function pendingEdit(overrides: Partial<PendingEdit> = {}): PendingEdit {
    return {
      path: 'a.txt',
      fullPath: file,
      oldContent: 'old\n',
      newContent: 'new\n',
      diff: 'DIFF',
      isNewFile: false,
      editStartLine: 1,
      editEndLine: 1,
      ...overrides,
    };
  }

  describe('confirmPending', () => {
    it('should report that nothing is pending', async () => {
      const session = new EditSession({ workspaceRoot: tempDir });

      expect(await session.confirmPending()).toEqual({
        success: false,
        error: 'no_pending_operation',
        message: 'Nothing to confirm. You must call edit or write first, then confirm to apply it.',
        usage_hint:
          'Workflow: 1) read to see content, 2) edit/write to create change, 3) confirm to apply',
      });
    });

    it('should write the pending edit', async () => {
      const session = new EditSession({ workspaceRoot: tempDir });
      await session.beginPreview(pendingEdit({ extras: { note: 'fuzzy' } }));

      const result = await session.confirmPending();

      expect(result).toEqual({
        success: true,
        path: 'a.txt',
        diff: 'DIFF',
        after_edit: '>1│new\n 2│',
        message: 'Edit applied successfully',
        note: 'fuzzy',
      });
      expect(await fs.readFile(file, 'utf-8')).toBe('new\n');
      expect(session.hasPending()).toBe(false);
    });

    it('should refuse when the file changed since the preview', async () => {
      const session = new EditSession({ workspaceRoot: tempDir });
      await session.beginPreview(pendingEdit());
      await fs.writeFile(file, 'changed\n');

      expect(await session.confirmPending()).toEqual({
        success: false,
        error: 'file_changed',
        message:
          'File has been modified since the preview. Please call edit again to get a new preview.',
        path: 'a.txt',
      });
      expect(await fs.readFile(file, 'utf-8')).toBe('changed\n');
    });

    it('should refuse when the file was deleted since the preview', async () => {
      const session = new EditSession({ workspaceRoot: tempDir });
      await session.beginPreview(pendingEdit());
      await fs.rm(file);

      expect(await session.confirmPending()).toMatchObject({
        success: false,
        error: 'file_deleted',
        path: 'a.txt',
      });
    });

    it('should refuse a new file that appeared since the preview', async () => {
      const session = new EditSession({ workspaceRoot: tempDir });
      const target = path.join(tempDir, 'b.txt');
      await session.beginPreview(
        pendingEdit({ path: 'b.txt', fullPath: target, oldContent: '', isNewFile: true })
      );
      await fs.writeFile(target, 'someone else\n');

      expect(await session.confirmPending()).toMatchObject({ error: 'file_changed' });
    });

    it('should replace a window of lines in place', async () => {
      await fs.writeFile(file, 'a\nb\nc\n');
      const session = new EditSession({ workspaceRoot: tempDir });
      await session.beginPreview(
        pendingEdit({
          oldContent: 'b',
          newContent: 'B',
          editStartLine: 2,
          editEndLine: 2,
          regions: [{ startLine: 2, endLine: 2, oldContent: 'b', newContent: 'B' }],
        })
      );

      expect(await session.confirmPending()).toEqual({
        success: true,
        path: 'a.txt',
        diff: 'DIFF',
        streaming_edit: true,
        lines_affected: '2-2',
      });
      expect(await fs.readFile(file, 'utf-8')).toBe('a\nB\nc\n');
    });

    it('should write several regions against the line numbers they were read at', async () => {
      await fs.writeFile(file, 'a\nb\nc\nd\ne\n');
      const session = new EditSession({ workspaceRoot: tempDir });
      await session.beginPreview(
        pendingEdit({
          oldContent: 'b\nd',
          newContent: 'B1\nB2\n',
          editStartLine: 2,
          editEndLine: 3,
          regions: [
            { startLine: 2, endLine: 2, oldContent: 'b', newContent: 'B1\nB2' },
            { startLine: 4, endLine: 4, oldContent: 'd', newContent: '' },
          ],
        })
      );

      expect(await session.confirmPending()).toMatchObject({ success: true });
      expect(await fs.readFile(file, 'utf-8')).toBe('a\nB1\nB2\nc\ne\n');
    });

    it('should refuse regions whose lines changed since the preview', async () => {
      await fs.writeFile(file, 'a\nb\nc\nd\n');
      const session = new EditSession({ workspaceRoot: tempDir });
      await session.beginPreview(
        pendingEdit({
          regions: [
            { startLine: 1, endLine: 1, oldContent: 'a', newContent: 'A' },
            { startLine: 4, endLine: 4, oldContent: 'd', newContent: 'D' },
          ],
        })
      );
      await fs.writeFile(file, 'a\nb\nc\nchanged\n');

      expect(await session.confirmPending()).toMatchObject({ error: 'file_changed' });
      expect(await fs.readFile(file, 'utf-8')).toBe('a\nb\nc\nchanged\n');
    });

    it('should overwrite a pending write', async () => {
      const session = new EditSession({ workspaceRoot: tempDir });
      await session.storePendingWrite({
        path: 'a.txt',
        fullPath: file,
        content: 'x\ny\n',
        oldSize: 4,
        oldLines: 1,
      });

      expect(await session.confirmPending('write')).toEqual({
        success: true,
        path: 'a.txt',
        action: 'overwritten',
        lines: 2,
        bytes: 4,
      });
      expect(await fs.readFile(file, 'utf-8')).toBe('x\ny\n');
    });

    it('should look at the requested kind first', async () => {
      const session = new EditSession({ workspaceRoot: tempDir });
      await session.beginPreview(pendingEdit());
      await session.storePendingWrite({
        path: 'a.txt',
        fullPath: file,
        content: 'written\n',
        oldSize: 4,
        oldLines: 1,
      });

      expect(await session.confirmPending('edit')).toMatchObject({ success: true, diff: 'DIFF' });
      expect(session.hasPending()).toBe(true);
      expect(await session.confirmPending('edit')).toMatchObject({ action: 'overwritten' });
      expect(await fs.readFile(file, 'utf-8')).toBe('written\n');
    });
  });

  describe('cancelPending', () => {
    it('should drop the pending edit without touching the file', async () => {
      const session = new EditSession({ workspaceRoot: tempDir });
      await session.beginPreview(pendingEdit());

      expect(await session.cancelPending()).toEqual({
        success: true,
        path: 'a.txt',
        message: 'Edit cancelled. File was not modified.',
        next_step:
          'MODIFY your edit to correct for the issues you observed, then retry. Read {"path": "a.txt"} if needed.',
      });
      expect(await fs.readFile(file, 'utf-8')).toBe('old\n');
      expect(await session.cancelPending()).toEqual({
        success: false,
        error: 'no_pending_operation',
        message: 'No pending operation to cancel.',
      });
    });

    it('should drop a pending write', async () => {
      const session = new EditSession({ workspaceRoot: tempDir });
      await session.storePendingWrite({
        path: 'a.txt',
        fullPath: file,
        content: 'x',
        oldSize: 4,
        oldLines: 1,
      });

      expect(await session.cancelPending('write')).toEqual({
        success: true,
        path: 'a.txt',
        message: 'Write cancelled. File was not modified.',
      });
    });
  });

  describe('checkBlock', () => {
    const pendingRecord = { tool: 'edit', status: 'pending_confirmation', path: 'a.txt' } as const;

    it('should allow everything without a pending edit', async () => {
      const session = new EditSession({ workspaceRoot: tempDir });
      expect(await session.checkBlock('read')).toEqual({ action: 'allow' });
    });

    it('should block other tools while an edit is pending', async () => {
      const session = new EditSession({ workspaceRoot: tempDir });
      session.history.add(pendingRecord);

      const decision = await session.checkBlock('read');

      expect(decision.action).toBe('block');
      if (decision.action !== 'block') return;
      expect(decision.error.code).toBe('BLOCKED');
      expect(decision.error.message).toBe(
        "BLOCKED: Your read call was blocked due to a pending edit on 'a.txt'.\n\nCall edit.confirm to apply this edit, or edit.cancel to discard it."
      );
    });

    it('should always allow confirm and cancel', async () => {
      const session = new EditSession({ workspaceRoot: tempDir });
      session.history.add(pendingRecord);

      expect(await session.checkBlock('edit.confirm')).toEqual({ action: 'allow' });
      expect(await session.checkBlock('write.cancel')).toEqual({ action: 'allow' });
    });

    it('should repeat the pending diff and escalate after three blocks', async () => {
      const session = new EditSession({ workspaceRoot: tempDir });
      await session.beginPreview(pendingEdit());
      session.history.add(pendingRecord);
      for (let i = 0; i < 3; i++) {
        session.history.add({ tool: 'read', status: 'blocked' });
      }

      const decision = await session.checkBlock('edit');

      expect(decision.action).toBe('block');
      if (decision.action !== 'block') return;
      expect(decision.error.message).toBe(
        "BLOCKED: Your edit call was blocked due to a pending edit on 'a.txt'. You have tried 3 times - Edit will NOT work until you resolve the pending edit first!" +
          '\n\nPending diff:\n```diff\nDIFF\n```' +
          '\n\nCall edit.confirm to apply this edit, or edit.cancel to discard it.'
      );
    });

    it('should discard the pending edit after the configured number of blocks', async () => {
      const session = new EditSession({
        workspaceRoot: tempDir,
        settings: { pendingConfirmRetries: 2 },
      });
      await session.beginPreview(pendingEdit());
      session.history.add(pendingRecord);
      session.history.add({ tool: 'read', status: 'blocked' });
      session.history.add({ tool: 'read', status: 'blocked' });

      expect(await session.checkBlock('read')).toEqual({
        action: 'autoCancelled',
        notice:
          "AUTO-CANCELLED: Pending edit on 'a.txt' was automatically cancelled after 2 ignored responses. You may now proceed with your intended action.",
      });
      expect(session.hasPending()).toBe(false);
      expect(session.history.pendingState().hasPending).toBe(false);
      expect(await session.checkBlock('read')).toEqual({ action: 'allow' });
    });

    it('should wait for a running confirm before deciding', async () => {
      await fs.writeFile(file, 'old\n');
      const session = new EditSession({
        workspaceRoot: tempDir,
        settings: { pendingConfirmRetries: 1 },
      });
      await session.beginPreview(pendingEdit());
      session.history.add(pendingRecord);
      session.history.add({ tool: 'read', status: 'blocked' });

      const confirmed = session.confirmPending();
      const decision = session.checkBlock('read');

      expect(await confirmed).toMatchObject({ success: true, path: 'a.txt' });
      expect(await decision).toMatchObject({ action: 'autoCancelled' });
      expect(await fs.readFile(file, 'utf-8')).toBe('new\n');
    });
  });

  describe('checkReadBeforeEdit', () => {
    it('should be disabled by default', () => {
      const session = new EditSession({ workspaceRoot: tempDir });
      expect(() => session.checkReadBeforeEdit('a.txt', file, false)).not.toThrow();
    });

    it('should require a recent read of an existing file', () => {
      const session = new EditSession({
        workspaceRoot: tempDir,
        settings: { readBeforeEditMessages: 2 },
      });

      let thrown: unknown;
      try {
        session.checkReadBeforeEdit('a.txt', file, false);
      } catch (error) {
        thrown = error;
      }

      expect(thrown).toBeInstanceOf(ToolError);
      if (!(thrown instanceof ToolError)) return;
      expect(thrown.toJSON()).toEqual({
        success: false,
        error: 'file_not_read',
        message:
          "file not read recently: you must use read on 'a.txt' before editing it (within last 2 tool calls)",
        path: 'a.txt',
        next_step: 'read {"path": "a.txt"}',
      });
    });

    it('should accept a read within the window and skip new files', () => {
      const session = new EditSession({
        workspaceRoot: tempDir,
        settings: { readBeforeEditMessages: 2 },
      });
      session.readTracker.recordRead(file);
      session.readTracker.nextMessage();
      session.readTracker.nextMessage();

      expect(() => session.checkReadBeforeEdit('a.txt', file, false)).not.toThrow();
      expect(() =>
        session.checkReadBeforeEdit('new.txt', path.join(tempDir, 'new.txt'), true)
      ).not.toThrow();

      session.readTracker.nextMessage();
      expect(() => session.checkReadBeforeEdit('a.txt', file, false)).toThrow(ToolError);
    });
  });
});
