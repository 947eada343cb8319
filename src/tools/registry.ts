/**
 * Tool Registry - centralized tool management with lazy initialization.
 *
 * Provides:
 * - Registration of Tool.Info definitions
 * - Lazy initialization with caching
 * - Permission-based tool filtering
 * - The pending-edit gate and tool-call history around every execution
 * - Conversion to LangChain StructuredToolInterface
 *
 * @example
 * ```typescript
 * import { ToolRegistry } from './registry.js';
 * import { readTool } from './read.js';
 * import { editTool } from './edit.js';
 *
 * ToolRegistry.register(readTool);
 * ToolRegistry.register(editTool, { permissions: { required: ['write'] } });
 *
 * const session = new EditSession();
 * const tools = await ToolRegistry.tools({ session });
 * ```
 */

import { DynamicStructuredTool } from '@langchain/core/tools';
import type { StructuredToolInterface } from '@langchain/core/tools';
import type { z } from 'zod';
import { errorMessage } from '../errors/index.js';
import { recordFromOutput } from '../edit/history.js';
import { EditSession } from '../edit/pending.js';
import {
  endToolSpan,
  isSensitiveDataEnabled,
  startToolSpan,
  withSpanAsync,
} from '../telemetry/index.js';
import { Tool } from './tool.js';

/**
 * Tool permission levels.
 */
export type ToolPermission = 'read' | 'write';

/**
 * Tool permission configuration.
 */
export interface ToolPermissions {
  /** Required permissions for this tool */
  required: ToolPermission[];
}

/**
 * Last execution result for a tool.
 */
export interface ToolExecutionResult<M extends Tool.Metadata = Tool.Metadata> {
  /** Tool ID that was executed */
  toolId: string;
  /** Full structured result */
  result: Tool.Result<M>;
  /** Execution timestamp */
  timestamp: number;
  /** Whether execution succeeded */
  success: boolean;
  /** Error message if failed */
  error?: string;
}

/**
 * Registered tool entry with metadata.
 */
interface RegisteredTool {
  info: Tool.Info;
  permissions: ToolPermissions;
  /** Cached initialized tool (lazy loading) */
  initialized?: Tool.Initialized;
}

/**
 * Tool Registry namespace for centralized tool management.
 */
// eslint-disable-next-line @typescript-eslint/no-namespace
export namespace ToolRegistry {
  /** Internal registry state */
  const registry = new Map<string, RegisteredTool>();

  /** Last execution results by tool ID */
  const lastResults = new Map<string, ToolExecutionResult>();

  /**
   * Get last execution result for a tool.
   */
  export function getLastResult(toolId: string): ToolExecutionResult | undefined {
    return lastResults.get(toolId);
  }

  /**
   * Store a tool execution result.
   * Used by the LangChain wrappers to update lastResults from outside the namespace.
   */
  export function storeResult(toolId: string, result: ToolExecutionResult): void {
    lastResults.set(toolId, result);
  }

  /**
   * Register a tool definition. Re-registering an id replaces the entry and
   * drops its cached initialization.
   */
  export function register(info: Tool.Info, options?: { permissions?: ToolPermissions }): void {
    registry.set(info.id, {
      info,
      permissions: options?.permissions ?? { required: ['read'] },
    });
  }

  /**
   * Unregister a tool by ID.
   *
   * @returns true if tool was removed, false if not found
   */
  export function unregister(id: string): boolean {
    lastResults.delete(id);
    return registry.delete(id);
  }

  /**
   * Get all registered tool IDs.
   */
  export function ids(): string[] {
    return Array.from(registry.keys());
  }

  /**
   * Get a specific tool by ID.
   */
  export function get(id: string): Tool.Info | undefined {
    return registry.get(id)?.info;
  }

  export function has(id: string): boolean {
    return registry.has(id);
  }

  export function permissions(id: string): ToolPermissions | undefined {
    return registry.get(id)?.permissions;
  }

  /**
   * Filter tools by enabled permissions.
   *
   * @returns Tool IDs that have their required permissions satisfied
   */
  export function enabled(enabledPermissions: Set<ToolPermission>): string[] {
    const result: string[] = [];

    for (const [id, entry] of registry) {
      const hasRequired = entry.permissions.required.every((p) => enabledPermissions.has(p));
      if (hasRequired) {
        result.push(id);
      }
    }

    return result;
  }

  /**
   * Initialize a specific tool by ID.
   *
   * @returns Initialized tool or undefined if not found
   */
  export async function initialize(
    id: string,
    initCtx?: Tool.InitContext
  ): Promise<Tool.Initialized | undefined> {
    const entry = registry.get(id);
    if (!entry) {
      return undefined;
    }

    entry.initialized ??= await entry.info.init(initCtx);
    return entry.initialized;
  }

  /**
   * Execute a tool directly by ID, through the pending-edit gate.
   * Errors are returned as a failed result, never thrown.
   */
  export async function execute<M extends Tool.Metadata = Tool.Metadata>(
    id: string,
    args: Record<string, unknown>,
    ctx: Tool.Context<M>,
    initCtx?: Tool.InitContext
  ): Promise<ToolExecutionResult> {
    const initialized = await initialize(id, initCtx);
    if (!initialized) {
      const result: ToolExecutionResult = {
        toolId: id,
        result: {
          title: `Tool not found: ${id}`,
          metadata: { error: 'NOT_FOUND' },
          output: `Tool '${id}' is not registered`,
        },
        timestamp: Date.now(),
        success: false,
        error: `Tool '${id}' not found`,
      };
      lastResults.set(id, result);
      return result;
    }

    const startTime = Date.now();
    let execResult: ToolExecutionResult;
    try {
      const result = await runGated(id, initialized, args, ctx);
      const error = metadataError(result.metadata);
      execResult = { toolId: id, result, timestamp: startTime, success: error === undefined, error };
    } catch (error) {
      const message = errorMessage(error);
      execResult = {
        toolId: id,
        result: {
          title: `Error executing ${id}`,
          metadata: { error: 'UNKNOWN' },
          output: `Error: ${message}`,
        },
        timestamp: startTime,
        success: false,
        error: message,
      };
    }

    lastResults.set(id, execResult);
    return execResult;
  }

  /**
   * Get initialized tools as LangChain StructuredToolInterface array.
   *
   * Every wrapper returned by one call shares a session: `createContext`
   * when given, otherwise `session` (or a new one).
   */
  export async function tools(options?: {
    /** Filter to specific tool IDs */
    ids?: string[];
    /** Only include tools with these permissions satisfied */
    enabledPermissions?: Set<ToolPermission>;
    initCtx?: Tool.InitContext;
    /** Session shared by the tools when no context factory is given */
    session?: EditSession;
    /** Context factory for tool execution */
    createContext?: (toolId: string, callId: string) => Tool.Context;
    /** Callback receiving every structured tool result */
    onToolResult?: (result: ToolExecutionResult) => void;
  }): Promise<StructuredToolInterface[]> {
    const { ids: filterIds, enabledPermissions, initCtx, onToolResult } = options ?? {};

    let toolIds: string[];
    if (filterIds) {
      toolIds = filterIds.filter((id) => registry.has(id));
    } else if (enabledPermissions) {
      toolIds = enabled(enabledPermissions);
    } else {
      toolIds = Array.from(registry.keys());
    }

    const session = options?.session ?? new EditSession({ onDebug: initCtx?.onDebug });
    const createContext =
      options?.createContext ??
      ((_toolId: string, callId: string) => Tool.createNoopContext({ callID: callId, session }));

    const result: StructuredToolInterface[] = [];
    for (const id of toolIds) {
      const initialized = await initialize(id, initCtx);
      if (!initialized) continue;
      result.push(createLangChainTool(id, initialized, createContext, onToolResult));
    }
    return result;
  }

  /**
   * Clear all registered tools.
   * Useful for testing.
   */
  export function clear(): void {
    registry.clear();
    lastResults.clear();
  }

  export function size(): number {
    return registry.size;
  }
}

/**
 * The metadata `error` field as a string; `false`, `null`, `undefined` and
 * `''` are not errors.
 */
function metadataError(metadata: Tool.Metadata): string | undefined {
  const error = metadata['error'];
  return Boolean(error) ? String(error) : undefined;
}

/**
 * Generate a unique call ID for tool execution.
 */
function generateCallId(): string {
  return `call-${String(Date.now())}-${Math.random().toString(36).slice(2, 8)}`;
}

/**
 * Run one tool call under the session's pending-edit gate.
 *
 * The read tracker advances one message per call. A blocked call returns the
 * blocking message without running the tool. After an automatic cancel the
 * tool runs and the notice is prepended to its output. The tool's own output
 * is added to the history either way.
 *
 * @throws whatever the tool's execute throws, after recording the call
 */
async function runGated<M extends Tool.Metadata>(
  id: string,
  initialized: Tool.Initialized,
  args: unknown,
  ctx: Tool.Context<M>
): Promise<Tool.Result> {
  const { session } = ctx;
  session.readTracker.nextMessage();

  const gate = await session.checkBlock(id);
  if (gate.action === 'block') {
    const output = gate.error.message;
    session.history.add(recordFromOutput(id, output));
    return { title: `Blocked: ${id}`, metadata: { error: gate.error.code }, output };
  }

  const parsed = initialized.parameters.safeParse(args);
  if (!parsed.success) {
    const output = `Error: invalid arguments for ${id}: ${parsed.error.message}`;
    session.history.add({ tool: id, status: 'other' });
    return { title: `Error: ${id}`, metadata: { error: 'VALIDATION_ERROR' }, output };
  }

  const enableSensitiveData = isSensitiveDataEnabled();
  const span = startToolSpan({
    toolName: id,
    toolCallId: ctx.callID,
    enableSensitiveData,
    arguments: typeof args === 'object' && args !== null ? { ...args } : undefined,
  });

  let result: Tool.Result;
  try {
    result = await withSpanAsync(span, async () => initialized.execute(parsed.data, ctx));
  } catch (error) {
    session.history.add({ tool: id, status: 'other' });
    endToolSpan(span, { success: false, errorType: error instanceof Error ? error.name : 'Error' });
    throw error;
  }

  session.history.add(recordFromOutput(id, result.output));
  const error = metadataError(result.metadata);
  endToolSpan(span, {
    success: error === undefined,
    errorType: error,
    enableSensitiveData,
    result: result.output,
  });

  if (gate.action === 'autoCancelled') {
    return { ...result, output: `${gate.notice}\n\n${result.output}` };
  }
  return result;
}

/**
 * Create a LangChain DynamicStructuredTool from an initialized Tool.
 * The wrapper goes through the same gate as ToolRegistry.execute().
 */
function createLangChainTool(
  id: string,
  initialized: Tool.Initialized,
  createContext: (toolId: string, callId: string) => Tool.Context,
  resultCallback?: (result: ToolExecutionResult) => void
): StructuredToolInterface {
  return new DynamicStructuredTool({
    name: id,
    description: initialized.description,
    schema: initialized.parameters as z.ZodObject<z.ZodRawShape>,
    func: async (input: unknown) => {
      const callId = generateCallId();
      const ctx = createContext(id, callId);

      let execResult: ToolExecutionResult;
      try {
        const result = await runGated(id, initialized, input, ctx);
        const error = metadataError(result.metadata);
        execResult = { toolId: id, result, timestamp: Date.now(), success: error === undefined, error };
      } catch (error) {
        const message = errorMessage(error);
        execResult = {
          toolId: id,
          result: { title: `Error: ${id}`, metadata: { error: 'UNKNOWN' }, output: `Error: ${message}` },
          timestamp: Date.now(),
          success: false,
          error: message,
        };
      }

      ToolRegistry.storeResult(id, execResult);
      resultCallback?.(execResult);

      // Title as a header for context
      return `${execResult.result.title}\n\n${execResult.result.output}`;
    },
  });
}
