/**
 * Tests for Zod schema validation.
 */

import { describe, expect, it } from '@jest/globals';

import {
  AgentConfigSchema,
  TelemetryConfigSchema,
  EditConfigSchema,
  AppConfigSchema,
  getDefaultConfig,
  parseConfig,
} from '../schema.js';

import { DEFAULT_EDIT_CONFIG, DEFAULT_LOG_LEVEL } from '../constants.js';

describe('AgentConfigSchema', () => {
  it('should apply default values when parsing empty object', () => {
    const result = AgentConfigSchema.parse({});
    expect(result.logLevel).toBe(DEFAULT_LOG_LEVEL);
    expect(result.workspaceRoot).toBeUndefined();
    expect(result.filesystemWritesEnabled).toBe(true);
  });

  it('should reject an unknown log level', () => {
    expect(AgentConfigSchema.safeParse({ logLevel: 'trace' }).success).toBe(false);
  });
});

describe('TelemetryConfigSchema', () => {
  it('should be disabled by default', () => {
    const result = TelemetryConfigSchema.parse({});
    expect(result.enabled).toBe(false);
    expect(result.enableSensitiveData).toBe(false);
  });

  it('should reject invalid endpoint URL', () => {
    expect(TelemetryConfigSchema.safeParse({ otlpEndpoint: 'nope' }).success).toBe(false);
  });
});

describe('EditConfigSchema', () => {
  it('should match the documented defaults', () => {
    expect(EditConfigSchema.parse({})).toEqual(DEFAULT_EDIT_CONFIG);
  });

  it.each([
    ['fuzzyThreshold', 1.2],
    ['fuzzyThreshold', -0.5],
    ['readBeforeEditMessages', -1],
    ['readBeforeEditMessages', 1.5],
    ['pendingConfirmRetries', 0],
    ['largeFileThresholdBytes', 0],
  ])('should reject %s = %s', (key, value) => {
    expect(EditConfigSchema.safeParse({ [key]: value }).success).toBe(false);
  });

  it('should accept the threshold boundaries', () => {
    expect(EditConfigSchema.parse({ fuzzyThreshold: 0 }).fuzzyThreshold).toBe(0);
    expect(EditConfigSchema.parse({ fuzzyThreshold: 1 }).fuzzyThreshold).toBe(1);
  });
});

describe('AppConfigSchema', () => {
  it('should fill every section from defaults', () => {
    const config = AppConfigSchema.parse({});
    expect(config.version).toBe('1.0');
    expect(config.agent).toEqual(AgentConfigSchema.parse({}));
    expect(config.telemetry).toEqual(TelemetryConfigSchema.parse({}));
    expect(config.edit).toEqual(EditConfigSchema.parse({}));
  });

  it('should merge partial sections with defaults', () => {
    const config = AppConfigSchema.parse({ edit: { previewMode: false } });
    expect(config.edit.previewMode).toBe(false);
    expect(config.edit.fuzzyThreshold).toBe(0.8);
  });
});

describe('getDefaultConfig', () => {
  it('should return a fresh object each call', () => {
    const first = getDefaultConfig();
    first.edit.previewMode = false;
    expect(getDefaultConfig().edit.previewMode).toBe(true);
  });
});

describe('parseConfig', () => {
  it('should strip unknown fields', () => {
    const result = parseConfig({ version: '1.0', providers: { default: 'openai' } });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data).not.toHaveProperty('providers');
    }
  });

  it('should report validation failures', () => {
    const result = parseConfig({ edit: { contextLines: -2 } });
    expect(result.success).toBe(false);
  });
});
