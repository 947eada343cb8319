/**
 * Layered configuration loading.
 *
 * Layers, lowest priority first: schema defaults, `~/.agent/settings.json`,
 * `<project>/.agent/settings.json`, environment variables. The merged result
 * is validated once, against {@link AppConfigSchema}.
 */

import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import type { ZodError } from 'zod';

import { errorMessage, systemErrorCode } from '../errors/index.js';
import { CONFIG_DIR_NAME, CONFIG_FILE_NAME } from './constants.js';
import { ProcessEnvReader, readEnvConfig, type IEnvReader } from './env.js';
import { AppConfigSchema, getDefaultConfig, type AppConfig } from './schema.js';
import {
  ConfigError,
  type ConfigCallbacks,
  type ConfigLayer,
  type ConfigManagerOptions,
  type ConfigResponse,
  type ConfigValidationError,
  type SettingsReader,
} from './types.js';

// -----------------------------------------------------------------------------
// Merging
// -----------------------------------------------------------------------------

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

/**
 * `override` laid over `base`: nested objects merge key by key, anything
 * else (arrays included) replaces. Undefined values in `override` are
 * skipped. Neither input is modified.
 */
export function deepMerge(
  base: Record<string, unknown>,
  override: Record<string, unknown>
): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) continue;
    const current = merged[key];
    merged[key] = isPlainObject(value) && isPlainObject(current) ? deepMerge(current, value) : value;
  }
  return merged;
}

// -----------------------------------------------------------------------------
// Settings files
// -----------------------------------------------------------------------------

/**
 * Reads settings files from disk.
 */
export class FileSettingsReader implements SettingsReader {
  async read(filePath: string): Promise<string | undefined> {
    try {
      return await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if (systemErrorCode(error) === 'ENOENT') return undefined;
      throw error;
    }
  }
}

function formatZodErrors(error: ZodError): ConfigValidationError[] {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
    code: issue.code,
  }));
}

// -----------------------------------------------------------------------------
// Config Manager
// -----------------------------------------------------------------------------

/**
 * Loads and validates configuration.
 *
 * @example
 * const manager = new ConfigManager({ callbacks: { onLayerApplied: (layer) => log(layer) } });
 * const loaded = await manager.load('/path/to/project');
 * if (loaded.success) console.log(loaded.result.edit.previewMode);
 */
export class ConfigManager {
  private readonly reader: SettingsReader;
  private readonly envReader: IEnvReader;
  private readonly callbacks: ConfigCallbacks;
  private readonly userConfigDir: string;
  private readonly cwd: string;

  constructor(options: ConfigManagerOptions = {}) {
    this.reader = options.reader ?? new FileSettingsReader();
    this.envReader = options.envReader ?? new ProcessEnvReader();
    this.callbacks = options.callbacks ?? {};
    this.userConfigDir = options.userConfigDir ?? path.join(os.homedir(), CONFIG_DIR_NAME);
    this.cwd = options.cwd ?? process.cwd();
  }

  /** Path of the user settings file */
  getUserConfigPath(): string {
    return path.join(this.userConfigDir, CONFIG_FILE_NAME);
  }

  /** Path of the settings file of `projectPath` (default: the working directory) */
  getProjectConfigPath(projectPath?: string): string {
    return path.join(projectPath ?? this.cwd, CONFIG_DIR_NAME, CONFIG_FILE_NAME);
  }

  /**
   * Merge every layer over the defaults and validate the result.
   * Failures come back as a response, never as a rejection.
   */
  async load(projectPath?: string): Promise<ConfigResponse<AppConfig>> {
    let merged: Record<string, unknown> = getDefaultConfig();
    try {
      const files: [ConfigLayer, string][] = [
        ['user', this.getUserConfigPath()],
        ['project', this.getProjectConfigPath(projectPath)],
      ];
      for (const [layer, filePath] of files) {
        const settings = await this.readSettings(filePath);
        if (settings !== undefined) {
          merged = deepMerge(merged, settings);
          this.callbacks.onLayerApplied?.(layer, filePath);
        }
      }
    } catch (error) {
      if (error instanceof ConfigError) {
        return { success: false, error: error.code, message: error.message };
      }
      return { success: false, error: 'FILE_READ_ERROR', message: errorMessage(error) };
    }

    const fromEnv = readEnvConfig(this.envReader);
    if (Object.keys(fromEnv).length > 0) {
      merged = deepMerge(merged, fromEnv);
      this.callbacks.onLayerApplied?.('environment');
    }

    const validated = this.validate(merged);
    if (validated.success) {
      this.callbacks.onConfigLoad?.(validated.result);
      return { ...validated, message: 'Configuration loaded successfully' };
    }
    return validated;
  }

  /**
   * Check `config` against the schema, filling in defaults.
   */
  validate(config: unknown): ConfigResponse<AppConfig> {
    const parsed = AppConfigSchema.safeParse(config);
    if (parsed.success) {
      return { success: true, result: parsed.data, message: 'Configuration is valid' };
    }

    const errors = formatZodErrors(parsed.error);
    this.callbacks.onValidationError?.(errors);
    return {
      success: false,
      error: 'VALIDATION_FAILED',
      message: `Config validation failed: ${errors[0]?.message ?? 'Unknown error'}`,
    };
  }

  private async readSettings(filePath: string): Promise<Record<string, unknown> | undefined> {
    const text = await this.reader.read(filePath);
    if (text === undefined) return undefined;

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch {
      throw new ConfigError(`Invalid JSON in config file: ${filePath}`, 'PARSE_ERROR', filePath);
    }
    if (!isPlainObject(parsed)) {
      throw new ConfigError(`Config file must hold a JSON object: ${filePath}`, 'PARSE_ERROR', filePath);
    }
    return parsed;
  }
}

/**
 * Load configuration with the default readers.
 */
export function loadConfig(projectPath?: string): Promise<ConfigResponse<AppConfig>> {
  return new ConfigManager().load(projectPath);
}
