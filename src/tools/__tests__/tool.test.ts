/**
 * Tests for Tool namespace (tool definition and context).
 */

import { describe, it, expect, jest } from '@jest/globals';
import { z } from 'zod';
import { EditSession } from '../../edit/pending.js';
import { Tool } from '../tool.js';

describe('Tool namespace', () => {
  describe('define', () => {
    it('should create tool with static definition', async () => {
      const tool = Tool.define('test', {
        description: 'A test tool',
        parameters: z.object({ name: z.string() }),
        execute: (args) => ({
          title: 'Test',
          metadata: {},
          output: `Hello, ${args.name}`,
        }),
      });

      expect(tool.id).toBe('test');
      const initialized = await tool.init();
      expect(initialized.description).toBe('A test tool');
    });

    it('should create tool with async init function', async () => {
      const tool = Tool.define('async-test', async () => {
        await Promise.resolve();
        return {
          description: 'Async test tool',
          parameters: z.object({ value: z.number() }),
          execute: (args: { value: number }) => ({
            title: 'Async',
            metadata: {},
            output: `Value: ${String(args.value)}`,
          }),
        };
      });

      const initialized = await tool.init();
      expect(initialized.description).toBe('Async test tool');
    });

    it('should support init context', async () => {
      const onDebug = jest.fn();
      const tool = Tool.define('ctx-test', (ctx) => ({
        description: `Tool in ${ctx?.workingDir ?? 'default'}`,
        parameters: z.object({}),
        execute: () => ({
          title: 'Context',
          metadata: {},
          output: 'Done',
        }),
      }));

      const initialized = await tool.init({ workingDir: '/test/dir', onDebug });
      expect(initialized.description).toBe('Tool in /test/dir');
    });
  });

  describe('createNoopContext', () => {
    it('should create default noop context with a fresh session', () => {
      const ctx = Tool.createNoopContext();

      expect(ctx.sessionID).toBe('test-session');
      expect(ctx.messageID).toBe('test-message');
      expect(ctx.abort).toBeInstanceOf(AbortSignal);
      expect(ctx.session).toBeInstanceOf(EditSession);
      expect(Tool.createNoopContext().session).not.toBe(ctx.session);
    });

    it('should allow overrides', () => {
      const session = new EditSession();
      const ctx = Tool.createNoopContext({ sessionID: 'custom-session', callID: 'call-123', session });

      expect(ctx.sessionID).toBe('custom-session');
      expect(ctx.callID).toBe('call-123');
      expect(ctx.session).toBe(session);
      expect(ctx.messageID).toBe('test-message');
    });
  });

  describe('isInfo', () => {
    it('should return true for a defined tool', () => {
      const tool = Tool.define('test', {
        description: 'Test',
        parameters: z.object({}),
        execute: () => ({ title: '', metadata: {}, output: '' }),
      });

      expect(Tool.isInfo(tool)).toBe(true);
    });

    it('should return false for anything else', () => {
      expect(Tool.isInfo(null)).toBe(false);
      expect(Tool.isInfo('string')).toBe(false);
      expect(Tool.isInfo({ init: () => undefined })).toBe(false);
      expect(Tool.isInfo({ id: 'test' })).toBe(false);
      expect(Tool.isInfo({ id: 123, init: () => undefined })).toBe(false);
      expect(Tool.isInfo({ id: 'test', init: 'not a function' })).toBe(false);
    });
  });

  describe('Tool.Initialized', () => {
    it('should provide the context to execute', async () => {
      const received: string[] = [];
      const tool = Tool.define('ctx-test', {
        description: 'Context test',
        parameters: z.object({}),
        execute: (_, ctx) => {
          received.push(ctx.sessionID, ctx.session.workspaceRoot);
          return { title: '', metadata: {}, output: '' };
        },
      });

      const initialized = await tool.init();
      const session = new EditSession({ workspaceRoot: '/work' });
      await initialized.execute({}, Tool.createNoopContext({ sessionID: 'my-session', session }));

      expect(received).toEqual(['my-session', '/work']);
    });

    it('should allow metadata streaming in execute', async () => {
      const metadataUpdates: Array<{ title?: string }> = [];
      const tool = Tool.define('stream', {
        description: 'Stream test',
        parameters: z.object({}),
        execute: (_, ctx) => {
          ctx.metadata({ title: 'Progress 1' });
          ctx.metadata({ title: 'Progress 2' });
          return { title: 'Done', metadata: {}, output: '' };
        },
      });

      const initialized = await tool.init();
      await initialized.execute(
        {},
        Tool.createNoopContext({
          metadata: (update) => {
            metadataUpdates.push(update);
          },
        })
      );

      expect(metadataUpdates.map((update) => update.title)).toEqual(['Progress 1', 'Progress 2']);
    });
  });
});
