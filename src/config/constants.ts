/**
 * Default configuration values.
 * These constants provide the defaults for every configuration section.
 */

// Config file and directory names
export const CONFIG_DIR_NAME = '.agent' as const;
export const CONFIG_FILE_NAME = 'settings.json' as const;
export const CONFIG_VERSION = '1.0' as const;

// Agent defaults
export const DEFAULT_LOG_LEVEL = 'info' as const;
export const DEFAULT_FILESYSTEM_WRITES_ENABLED = true;

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

/** Whether a message at `level` is logged when `configured` is the threshold */
export function isLogLevelEnabled(configured: LogLevel, level: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(configured);
}

// Telemetry defaults
export const DEFAULT_TELEMETRY_ENABLED = false;
export const DEFAULT_ENABLE_SENSITIVE_DATA = false;

// Edit defaults
export const DEFAULT_PREVIEW_MODE = true;
export const DEFAULT_FUZZY_THRESHOLD = 0.8;
export const DEFAULT_READ_BEFORE_EDIT_MESSAGES = 0; // disabled
export const DEFAULT_PENDING_CONFIRM_RETRIES = 5;
export const DEFAULT_LARGE_FILE_THRESHOLD_BYTES = 1024 * 1024; // 1 MiB
export const DEFAULT_MAX_FILE_SIZE_KB = 128;
export const DEFAULT_CONTEXT_LINES = 3;

/**
 * Default agent configuration.
 */
export const DEFAULT_AGENT_CONFIG = {
  logLevel: DEFAULT_LOG_LEVEL,
  workspaceRoot: undefined,
  filesystemWritesEnabled: DEFAULT_FILESYSTEM_WRITES_ENABLED,
} as const;

/**
 * Default telemetry configuration.
 */
export const DEFAULT_TELEMETRY_CONFIG = {
  enabled: DEFAULT_TELEMETRY_ENABLED,
  enableSensitiveData: DEFAULT_ENABLE_SENSITIVE_DATA,
  otlpEndpoint: undefined,
} as const;

/**
 * Default edit configuration.
 */
export const DEFAULT_EDIT_CONFIG = {
  previewMode: DEFAULT_PREVIEW_MODE,
  fuzzyThreshold: DEFAULT_FUZZY_THRESHOLD,
  readBeforeEditMessages: DEFAULT_READ_BEFORE_EDIT_MESSAGES,
  pendingConfirmRetries: DEFAULT_PENDING_CONFIRM_RETRIES,
  largeFileThresholdBytes: DEFAULT_LARGE_FILE_THRESHOLD_BYTES,
  maxFileSizeKB: DEFAULT_MAX_FILE_SIZE_KB,
  contextLines: DEFAULT_CONTEXT_LINES,
} as const;
