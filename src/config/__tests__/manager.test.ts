/**
 * Tests for ConfigManager.
 */

import { afterEach, beforeEach, describe, expect, it, jest } from '@jest/globals';

import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';

import { ConfigManager, deepMerge, FileSettingsReader } from '../manager.js';
import { getDefaultConfig } from '../schema.js';
import type { ConfigCallbacks, SettingsReader } from '../types.js';
import type { IEnvReader } from '../env.js';

// Settings files served from memory
class MemorySettingsReader implements SettingsReader {
  private files: Map<string, string> = new Map();

  read(filePath: string): Promise<string | undefined> {
    return Promise.resolve(this.files.get(filePath));
  }

  setFile(filePath: string, content: string): void {
    this.files.set(filePath, content);
  }
}

// Mock environment reader
class MockEnvReader implements IEnvReader {
  private env: Map<string, string> = new Map();

  get(name: string): string | undefined {
    return this.env.get(name);
  }

  getBoolean(name: string): boolean | undefined {
    const value = this.get(name);
    if (value === undefined) return undefined;
    const lower = value.toLowerCase();
    if (lower === 'true' || lower === '1' || lower === 'yes') return true;
    if (lower === 'false' || lower === '0' || lower === 'no') return false;
    return undefined;
  }

  getNumber(name: string): number | undefined {
    const value = this.get(name);
    if (value === undefined) return undefined;
    const num = Number(value);
    return Number.isNaN(num) ? undefined : num;
  }

  set(name: string, value: string): void {
    this.env.set(name, value);
  }

  clear(): void {
    this.env.clear();
  }
}

describe('deepMerge', () => {
  it('should merge simple objects', () => {
    const target = { a: 1, b: 2 };
    const source = { b: 3, c: 4 };
    const result = deepMerge(target, source);
    expect(result).toEqual({ a: 1, b: 3, c: 4 });
  });

  it('should deep merge nested objects', () => {
    const target = { nested: { a: 1, b: 2 }, top: 'value' };
    const source = { nested: { b: 3, c: 4 } };
    const result = deepMerge(target, source);
    expect(result).toEqual({ nested: { a: 1, b: 3, c: 4 }, top: 'value' });
  });

  it('should replace arrays (not concat)', () => {
    const target = { items: [1, 2, 3] };
    const source = { items: [4, 5] };
    const result = deepMerge(target, source);
    expect(result).toEqual({ items: [4, 5] });
  });

  it('should not modify original objects', () => {
    const target = { a: { b: 1 } };
    const source = { a: { c: 2 } };
    const result = deepMerge(target, source);
    expect(target).toEqual({ a: { b: 1 } });
    expect(result).toEqual({ a: { b: 1, c: 2 } });
  });

  it('should ignore undefined values in source', () => {
    const target = { a: 1, b: 2 };
    const source = { a: undefined, c: 3 };
    const result = deepMerge(target, source);
    expect(result).toEqual({ a: 1, b: 2, c: 3 });
  });
});


describe('ConfigManager', () => {
  let mockFiles: MemorySettingsReader;
  let mockEnv: MockEnvReader;
  let manager: ConfigManager;

  function createManager(callbacks?: ConfigCallbacks): ConfigManager {
    return new ConfigManager({
      reader: mockFiles,
      envReader: mockEnv,
      callbacks,
      userConfigDir: '/home/user/.agent',
      cwd: '/project',
    });
  }

  beforeEach(() => {
    mockFiles = new MemorySettingsReader();
    mockEnv = new MockEnvReader();
    manager = createManager();
  });

  describe('config paths', () => {
    it('should put the user settings file in the user config directory', () => {
      expect(manager.getUserConfigPath()).toBe('/home/user/.agent/settings.json');
    });

    it('should default the project to the working directory', () => {
      expect(manager.getProjectConfigPath()).toBe('/project/.agent/settings.json');
      expect(manager.getProjectConfigPath('/custom/project')).toBe(
        '/custom/project/.agent/settings.json'
      );
    });
  });

  describe('load', () => {
    it('should return defaults when no config files exist', async () => {
      const result = await manager.load();
      expect(result).toEqual({
        success: true,
        result: getDefaultConfig(),
        message: 'Configuration loaded successfully',
      });
    });

    it('should merge project config over user config', async () => {
      mockFiles.setFile(
        '/home/user/.agent/settings.json',
        JSON.stringify({ edit: { fuzzyThreshold: 0.7, readBeforeEditMessages: 4 } })
      );
      mockFiles.setFile(
        '/project/.agent/settings.json',
        JSON.stringify({ edit: { fuzzyThreshold: 0.95 } })
      );

      const result = await manager.load();
      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.result.edit.fuzzyThreshold).toBe(0.95);
      expect(result.result.edit.readBeforeEditMessages).toBe(4);
      expect(result.result.edit.previewMode).toBe(true);
    });

    it('should apply environment variable overrides last', async () => {
      mockFiles.setFile(
        '/project/.agent/settings.json',
        JSON.stringify({ edit: { previewMode: true, pendingConfirmRetries: 2 } })
      );
      mockEnv.set('EDIT_PREVIEW_MODE', 'false');

      const result = await manager.load();
      expect(result.success && result.result.edit.previewMode).toBe(false);
      expect(result.success && result.result.edit.pendingConfirmRetries).toBe(2);
    });

    it('should report each applied layer and the loaded config', async () => {
      const onLayerApplied = jest.fn<NonNullable<ConfigCallbacks['onLayerApplied']>>();
      const onConfigLoad = jest.fn<NonNullable<ConfigCallbacks['onConfigLoad']>>();
      manager = createManager({ onLayerApplied, onConfigLoad });
      mockFiles.setFile('/home/user/.agent/settings.json', JSON.stringify({ agent: {} }));
      mockEnv.set('AGENT_LOG_LEVEL', 'debug');

      await manager.load();

      expect(onLayerApplied.mock.calls).toEqual([
        ['user', '/home/user/.agent/settings.json'],
        ['environment'],
      ]);
      expect(onConfigLoad).toHaveBeenCalledTimes(1);
      expect(onConfigLoad.mock.calls[0]?.[0].agent.logLevel).toBe('debug');
    });

    it('should report invalid JSON as PARSE_ERROR', async () => {
      mockFiles.setFile('/project/.agent/settings.json', '{ not json');

      expect(await manager.load()).toEqual({
        success: false,
        error: 'PARSE_ERROR',
        message: 'Invalid JSON in config file: /project/.agent/settings.json',
      });
    });

    it('should reject a settings file that is not an object', async () => {
      mockFiles.setFile('/project/.agent/settings.json', '[1, 2]');

      expect(await manager.load()).toEqual({
        success: false,
        error: 'PARSE_ERROR',
        message: 'Config file must hold a JSON object: /project/.agent/settings.json',
      });
    });

    it('should report a failing reader as FILE_READ_ERROR', async () => {
      manager = new ConfigManager({
        reader: { read: () => Promise.reject(new Error('EACCES: permission denied')) },
        envReader: mockEnv,
      });

      expect(await manager.load()).toEqual({
        success: false,
        error: 'FILE_READ_ERROR',
        message: 'EACCES: permission denied',
      });
    });

    it('should reject an out-of-range fuzzy threshold', async () => {
      const onValidationError = jest.fn<NonNullable<ConfigCallbacks['onValidationError']>>();
      manager = createManager({ onValidationError });
      mockFiles.setFile('/project/.agent/settings.json', JSON.stringify({ edit: { fuzzyThreshold: 2 } }));

      const result = await manager.load();
      expect(result.success).toBe(false);
      expect(!result.success && result.error).toBe('VALIDATION_FAILED');
      expect(onValidationError).toHaveBeenCalledTimes(1);
      expect(onValidationError.mock.calls[0]?.[0][0]?.path).toBe('edit.fuzzyThreshold');
    });
  });

  describe('validate', () => {
    it('should return success for valid config', () => {
      expect(manager.validate(getDefaultConfig()).success).toBe(true);
    });

    it('should return error for invalid config', () => {
      const result = manager.validate({ version: '1.0', agent: { logLevel: 'loud' } });
      expect(result.success).toBe(false);
      expect(!result.success && result.error).toBe('VALIDATION_FAILED');
    });
  });
});

describe('FileSettingsReader', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'settings-test-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should read an existing file', async () => {
    const filePath = path.join(tempDir, 'settings.json');
    await fs.writeFile(filePath, '{"version":"1.0"}');

    expect(await new FileSettingsReader().read(filePath)).toBe('{"version":"1.0"}');
  });

  it('should return undefined for a missing file', async () => {
    expect(await new FileSettingsReader().read(path.join(tempDir, 'missing.json'))).toBeUndefined();
  });

  it('should fail on a directory', async () => {
    await expect(new FileSettingsReader().read(tempDir)).rejects.toMatchObject({ code: 'EISDIR' });
  });
});
