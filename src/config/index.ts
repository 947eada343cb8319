/**
 * Configuration module public API.
 *
 * @module config
 *
 * @example
 * import { ConfigManager, AppConfig, loadConfig } from './config';
 *
 * // Quick load with defaults
 * const result = await loadConfig();
 * if (result.success) {
 *   console.log('Preview mode:', result.result.edit.previewMode);
 * }
 *
 * // Full control with ConfigManager
 * const manager = new ConfigManager({ callbacks: { onLayerApplied: console.log } });
 * const config = await manager.load('./my-project');
 */

// -----------------------------------------------------------------------------
// Constants
// -----------------------------------------------------------------------------
export {
  // Directory/file names
  CONFIG_DIR_NAME,
  CONFIG_FILE_NAME,
  CONFIG_VERSION,
  // Agent defaults
  DEFAULT_LOG_LEVEL,
  DEFAULT_FILESYSTEM_WRITES_ENABLED,
  LOG_LEVELS,
  isLogLevelEnabled,
  // Telemetry defaults
  DEFAULT_TELEMETRY_ENABLED,
  DEFAULT_ENABLE_SENSITIVE_DATA,
  // Edit defaults
  DEFAULT_PREVIEW_MODE,
  DEFAULT_FUZZY_THRESHOLD,
  DEFAULT_READ_BEFORE_EDIT_MESSAGES,
  DEFAULT_PENDING_CONFIRM_RETRIES,
  DEFAULT_LARGE_FILE_THRESHOLD_BYTES,
  DEFAULT_MAX_FILE_SIZE_KB,
  DEFAULT_CONTEXT_LINES,
  // Default config objects
  DEFAULT_AGENT_CONFIG,
  DEFAULT_TELEMETRY_CONFIG,
  DEFAULT_EDIT_CONFIG,
} from './constants.js';

export type { LogLevel } from './constants.js';

// -----------------------------------------------------------------------------
// Schemas
// -----------------------------------------------------------------------------
export {
  AgentConfigSchema,
  TelemetryConfigSchema,
  EditConfigSchema,
  AppConfigSchema,
  getDefaultConfig,
  parseConfig,
} from './schema.js';

export type { AgentConfig, TelemetryConfig, EditConfig, AppConfig } from './schema.js';

// -----------------------------------------------------------------------------
// Environment Variable Utilities
// -----------------------------------------------------------------------------
export { ProcessEnvReader, readEnvConfig } from './env.js';

export type { IEnvReader } from './env.js';

// -----------------------------------------------------------------------------
// Types and Interfaces
// -----------------------------------------------------------------------------
export { ConfigError } from './types.js';

export type {
  SettingsReader,
  ConfigCallbacks,
  ConfigLayer,
  ConfigValidationError,
  ConfigErrorCode,
  ConfigResponse,
  ConfigManagerOptions,
} from './types.js';

// -----------------------------------------------------------------------------
// Config Manager
// -----------------------------------------------------------------------------
export { ConfigManager, FileSettingsReader, deepMerge, loadConfig } from './manager.js';
