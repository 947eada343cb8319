/**
 * Zod schemas for configuration validation.
 * Types are inferred from schemas using z.infer<> - no manual type definitions.
 */

import { z } from 'zod';
import {
  CONFIG_VERSION,
  DEFAULT_LOG_LEVEL,
  DEFAULT_FILESYSTEM_WRITES_ENABLED,
  DEFAULT_TELEMETRY_ENABLED,
  DEFAULT_ENABLE_SENSITIVE_DATA,
  DEFAULT_PREVIEW_MODE,
  DEFAULT_FUZZY_THRESHOLD,
  DEFAULT_READ_BEFORE_EDIT_MESSAGES,
  DEFAULT_PENDING_CONFIRM_RETRIES,
  DEFAULT_LARGE_FILE_THRESHOLD_BYTES,
  DEFAULT_MAX_FILE_SIZE_KB,
  DEFAULT_CONTEXT_LINES,
  LOG_LEVELS,
} from './constants.js';

// -----------------------------------------------------------------------------
// Agent Schema
// -----------------------------------------------------------------------------

/**
 * Agent configuration.
 */
export const AgentConfigSchema = z.object({
  logLevel: z.enum(LOG_LEVELS).default(DEFAULT_LOG_LEVEL).describe('Logging level'),
  workspaceRoot: z.string().optional().describe('Root directory for workspace operations'),
  filesystemWritesEnabled: z
    .boolean()
    .default(DEFAULT_FILESYSTEM_WRITES_ENABLED)
    .describe('Allow filesystem write operations'),
});

export type AgentConfig = z.infer<typeof AgentConfigSchema>;

// -----------------------------------------------------------------------------
// Telemetry Schema
// -----------------------------------------------------------------------------

/**
 * Telemetry configuration.
 */
export const TelemetryConfigSchema = z.object({
  enabled: z.boolean().default(DEFAULT_TELEMETRY_ENABLED).describe('Enable telemetry collection'),
  enableSensitiveData: z
    .boolean()
    .default(DEFAULT_ENABLE_SENSITIVE_DATA)
    .describe('Include sensitive data (diffs, file content) in telemetry'),
  otlpEndpoint: z.url().optional().describe('OpenTelemetry Protocol endpoint'),
});

export type TelemetryConfig = z.infer<typeof TelemetryConfigSchema>;

// -----------------------------------------------------------------------------
// Edit Schema
// -----------------------------------------------------------------------------

/**
 * File editing configuration.
 */
export const EditConfigSchema = z.object({
  previewMode: z
    .boolean()
    .default(DEFAULT_PREVIEW_MODE)
    .describe('Hold edits as pending until confirmed'),
  fuzzyThreshold: z
    .number()
    .min(0)
    .max(1)
    .default(DEFAULT_FUZZY_THRESHOLD)
    .describe('Minimum similarity for a fuzzy match'),
  readBeforeEditMessages: z
    .number()
    .int()
    .min(0)
    .default(DEFAULT_READ_BEFORE_EDIT_MESSAGES)
    .describe('Require a read within this many tool calls before editing (0 disables)'),
  pendingConfirmRetries: z
    .number()
    .int()
    .positive()
    .default(DEFAULT_PENDING_CONFIRM_RETRIES)
    .describe('Blocked calls before a pending edit is cancelled automatically'),
  largeFileThresholdBytes: z
    .number()
    .int()
    .positive()
    .default(DEFAULT_LARGE_FILE_THRESHOLD_BYTES)
    .describe('Files above this size are edited through line windows'),
  maxFileSizeKB: z
    .number()
    .int()
    .positive()
    .default(DEFAULT_MAX_FILE_SIZE_KB)
    .describe('Largest file the read tool returns whole'),
  contextLines: z
    .number()
    .int()
    .min(0)
    .default(DEFAULT_CONTEXT_LINES)
    .describe('Unchanged lines shown around edits'),
});

export type EditConfig = z.infer<typeof EditConfigSchema>;

// -----------------------------------------------------------------------------
// Root Application Config Schema
// -----------------------------------------------------------------------------

/**
 * Root application configuration schema.
 */
export const AppConfigSchema = z.object({
  version: z.string().default(CONFIG_VERSION).describe('Configuration schema version'),
  agent: AgentConfigSchema.default(() => AgentConfigSchema.parse({})).describe(
    'Agent behavior configuration'
  ),
  telemetry: TelemetryConfigSchema.default(() => TelemetryConfigSchema.parse({})).describe(
    'Telemetry configuration'
  ),
  edit: EditConfigSchema.default(() => EditConfigSchema.parse({})).describe(
    'File editing configuration'
  ),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

// -----------------------------------------------------------------------------
// Utility Functions
// -----------------------------------------------------------------------------

/**
 * Get the default configuration with all defaults applied.
 */
export function getDefaultConfig(): AppConfig {
  return AppConfigSchema.parse({});
}

/**
 * Parse and validate a configuration object.
 * Applies schema defaults and returns the parsed config.
 * Unknown fields are stripped by Zod.
 */
export function parseConfig(input: unknown): z.ZodSafeParseResult<AppConfig> {
  return AppConfigSchema.safeParse(input);
}
