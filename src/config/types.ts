/**
 * Types shared by the configuration loader.
 */

import type { IEnvReader } from './env.js';
import type { AppConfig } from './schema.js';

/**
 * Reads settings files. Injected so tests can serve files from memory.
 */
export interface SettingsReader {
  /**
   * Text of the file, or `undefined` when there is no such file.
   * @throws on any other read failure
   */
  read(filePath: string): Promise<string | undefined>;
}

/**
 * Layer merged over the schema defaults.
 */
export type ConfigLayer = 'user' | 'project' | 'environment';

/**
 * Notifications from {@link ConfigManager.load}.
 */
export interface ConfigCallbacks {
  /** A layer was found and merged */
  onLayerApplied?: (layer: ConfigLayer, filePath?: string) => void;
  /** The merged configuration passed validation */
  onConfigLoad?: (config: AppConfig) => void;
  onValidationError?: (errors: ConfigValidationError[]) => void;
}

/**
 * One schema violation, with the dotted path of the offending field.
 */
export interface ConfigValidationError {
  path: string;
  message: string;
  code: string;
}

export type ConfigErrorCode = 'VALIDATION_FAILED' | 'PARSE_ERROR' | 'FILE_READ_ERROR';

/**
 * Configuration that could not be read or did not validate.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    readonly code: ConfigErrorCode,
    readonly filePath?: string
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Outcome of loading or validating configuration.
 */
export type ConfigResponse<T> =
  | { success: true; result: T; message: string }
  | { success: false; error: ConfigErrorCode; message: string };

/**
 * Options for ConfigManager constructor.
 */
export interface ConfigManagerOptions {
  /** Settings file reader (default: reads from disk) */
  reader?: SettingsReader;
  /** Environment reader (default: process.env) */
  envReader?: IEnvReader;
  callbacks?: ConfigCallbacks;
  /** Directory holding the user settings file (default: ~/.agent) */
  userConfigDir?: string;
  /** Project root used when load() is given none (default: process.cwd()) */
  cwd?: string;
}
