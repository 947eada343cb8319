/**
 * Environment variable parsing utilities for configuration.
 * Maps environment variables to config paths with type coercion.
 */

import { LOG_LEVELS } from './constants.js';

/**
 * Interface for reading environment variables.
 * Enables dependency injection for testing.
 */
export interface IEnvReader {
  /**
   * Get a string environment variable.
   */
  get(name: string): string | undefined;

  /**
   * Get a boolean environment variable with coercion.
   * Recognizes 'true', '1', 'yes' as true; 'false', '0', 'no' as false.
   */
  getBoolean(name: string): boolean | undefined;

  /**
   * Get a number environment variable with coercion.
   */
  getNumber(name: string): number | undefined;
}

/**
 * Default implementation using process.env.
 */
export class ProcessEnvReader implements IEnvReader {
  get(name: string): string | undefined {
    return process.env[name];
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
}

/**
 * Validator function type for env values.
 */
type EnvValidator = (value: string) => boolean;

/**
 * Environment variable to config path mappings.
 * Each mapping specifies: envVar, configPath, optional type coercion, and optional validator.
 */
interface EnvMapping {
  envVar: string;
  path: string[];
  type: 'string' | 'boolean' | 'number';
  /** Optional validator - if provided and returns false, the value is dropped */
  validate?: EnvValidator;
}

/**
 * URL validator for env values.
 */
function isValidUrl(value: string): boolean {
  try {
    new URL(value);
    return true;
  } catch {
    return false;
  }
}

/**
 * Log level validator.
 */
function isValidLogLevel(value: string): boolean {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Positive integer validator (for pendingConfirmRetries, etc.).
 * Validates raw string value before number coercion.
 */
function isPositiveInteger(value: string): boolean {
  const num = Number(value);
  return !Number.isNaN(num) && Number.isInteger(num) && num > 0;
}

/**
 * Non-negative integer validator, where 0 disables a feature.
 */
function isNonNegativeInteger(value: string): boolean {
  const num = Number(value);
  return !Number.isNaN(num) && Number.isInteger(num) && num >= 0;
}

/**
 * Ratio validator for values in [0, 1].
 */
function isRatio(value: string): boolean {
  const num = Number(value);
  return value.trim() !== '' && !Number.isNaN(num) && num >= 0 && num <= 1;
}

/**
 * Static environment variable mappings.
 * Invalid values for validated fields are silently dropped (fall back to defaults).
 */
const ENV_MAPPINGS: EnvMapping[] = [
  // Agent
  {
    envVar: 'AGENT_LOG_LEVEL',
    path: ['agent', 'logLevel'],
    type: 'string',
    validate: isValidLogLevel,
  },
  { envVar: 'AGENT_WORKSPACE_ROOT', path: ['agent', 'workspaceRoot'], type: 'string' },
  {
    envVar: 'AGENT_FILESYSTEM_WRITES_ENABLED',
    path: ['agent', 'filesystemWritesEnabled'],
    type: 'boolean',
  },

  // Telemetry
  { envVar: 'ENABLE_OTEL', path: ['telemetry', 'enabled'], type: 'boolean' },
  {
    envVar: 'OTLP_ENDPOINT',
    path: ['telemetry', 'otlpEndpoint'],
    type: 'string',
    validate: isValidUrl,
  },

  // Edit
  { envVar: 'EDIT_PREVIEW_MODE', path: ['edit', 'previewMode'], type: 'boolean' },
  {
    envVar: 'EDIT_FUZZY_THRESHOLD',
    path: ['edit', 'fuzzyThreshold'],
    type: 'number',
    validate: isRatio,
  },
  {
    envVar: 'EDIT_READ_BEFORE_EDIT',
    path: ['edit', 'readBeforeEditMessages'],
    type: 'number',
    validate: isNonNegativeInteger,
  },
  {
    envVar: 'EDIT_PENDING_RETRIES',
    path: ['edit', 'pendingConfirmRetries'],
    type: 'number',
    validate: isPositiveInteger,
  },
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Set `value` at `keys` under `target`, creating the objects on the way.
 */
function setNestedValue(target: Record<string, unknown>, keys: readonly string[], value: unknown): void {
  const [key, ...rest] = keys;
  if (key === undefined) return;
  if (rest.length === 0) {
    target[key] = value;
    return;
  }
  const existing = target[key];
  const child: Record<string, unknown> = isRecord(existing) ? existing : {};
  target[key] = child;
  setNestedValue(child, rest, value);
}

/**
 * Read environment variables and return a partial config object.
 * Only includes values that are present in environment variables.
 */
export function readEnvConfig(
  envReader: IEnvReader = new ProcessEnvReader()
): Record<string, unknown> {
  const config: Record<string, unknown> = {};

  // Process static mappings
  for (const mapping of ENV_MAPPINGS) {
    let value: string | boolean | number | undefined;
    const rawValue = envReader.get(mapping.envVar);

    // Skip if no value set
    if (rawValue === undefined) {
      continue;
    }

    // Validate string values if validator is provided (before type coercion for booleans/numbers)
    if (mapping.validate !== undefined && !mapping.validate(rawValue)) {
      // Invalid value - silently skip to fall back to defaults
      continue;
    }

    switch (mapping.type) {
      case 'boolean':
        value = envReader.getBoolean(mapping.envVar);
        break;
      case 'number':
        value = envReader.getNumber(mapping.envVar);
        break;
      default:
        value = rawValue;
    }

    if (value !== undefined) {
      setNestedValue(config, mapping.path, value);
    }
  }

  return config;
}
