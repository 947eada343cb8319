/**
 * patchwright - file-mutation engine for LLM coding agents.
 *
 * @example
 * ```typescript
 * import { ToolRegistry, createEditSession, registerFileTools } from 'patchwright';
 *
 * registerFileTools();
 * const session = await createEditSession();
 * const tools = await ToolRegistry.tools({ session });
 * ```
 */

import { ConfigError, isLogLevelEnabled, loadConfig, type AppConfig } from './config/index.js';
import { EditSession } from './edit/pending.js';
import { initializeTelemetry, isEnabled as isTelemetryEnabled } from './telemetry/index.js';
import { resolveWorkspaceRoot } from './tools/workspace.js';

export * from './edit/index.js';
export * from './errors/index.js';
export * from './tools/index.js';
export {
  initializeTelemetry,
  shutdown as shutdownTelemetry,
  isEnabled as isTelemetryEnabled,
} from './telemetry/index.js';
export type { TelemetryOptions, TelemetryInitResult } from './telemetry/index.js';
export { ConfigManager, ConfigError, loadConfig } from './config/index.js';
export type { AppConfig, EditConfig } from './config/index.js';

/**
 * Options for {@link createEditSession}.
 */
export interface CreateEditSessionOptions {
  /** Use this configuration instead of loading it */
  config?: AppConfig;
  /** Project root whose `.agent/settings.json` is loaded */
  projectPath?: string;
  /**
   * Receives warnings always and debug messages when `agent.logLevel` is
   * `debug`
   */
  onDebug?: (msg: string, data?: Record<string, unknown>) => void;
}

/**
 * Build an edit session from the layered configuration.
 *
 * Applies the workspace root (AGENT_WORKSPACE_ROOT caps the configured one),
 * publishes `agent.filesystemWritesEnabled` to the write tools and, when
 * `telemetry.enabled` is set and no provider is registered yet, starts
 * exporting spans.
 *
 * @throws ConfigError when the configuration cannot be loaded
 */
export async function createEditSession(
  options: CreateEditSessionOptions = {}
): Promise<EditSession> {
  let config = options.config;
  if (config === undefined) {
    const loaded = await loadConfig(options.projectPath);
    if (!loaded.success) {
      throw new ConfigError(loaded.message, loaded.error);
    }
    config = loaded.result;
  }

  const { logLevel } = config.agent;
  const onDebug = isLogLevelEnabled(logLevel, 'debug') ? options.onDebug : undefined;
  const onWarning = isLogLevelEnabled(logLevel, 'warn') ? options.onDebug : undefined;

  if (config.telemetry.enabled && !isTelemetryEnabled()) {
    const started = await initializeTelemetry({ config: config.telemetry, onDebug });
    if (!started.success) {
      onWarning?.(started.message);
    }
  }

  const workspace = await resolveWorkspaceRoot(config.agent.workspaceRoot, onDebug);
  if (workspace.warning !== undefined) {
    onWarning?.(workspace.warning);
  }
  process.env['AGENT_FILESYSTEM_WRITES_ENABLED'] = String(config.agent.filesystemWritesEnabled);

  return new EditSession({
    settings: config.edit,
    workspaceRoot: workspace.workspaceRoot,
    onDebug,
  });
}
