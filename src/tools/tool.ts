/**
 * Tool namespace - definition pattern shared by the file tools.
 *
 * Provides:
 * - Tool.Context<M> carrying the edit session, abort signal, and metadata callback
 * - Tool.Info<P, M> for tool definition with optional async initialization
 * - Tool.Result for standardized tool responses
 * - Tool.define() factory for creating tools
 *
 * @example
 * ```typescript
 * import { Tool } from './tool.js';
 * import { z } from 'zod';
 *
 * const confirmTool = Tool.define('edit.confirm', {
 *   description: 'Apply the pending edit',
 *   parameters: z.object({}),
 *   execute: async (_args, ctx) => {
 *     const result = await ctx.session.confirmPending('edit');
 *     return { title: 'Confirmed edit', metadata: {}, output: JSON.stringify(result) };
 *   },
 * });
 * ```
 */

import type { z } from 'zod';
import { EditSession } from '../edit/pending.js';

/**
 * Tool namespace containing all type definitions and the define() factory.
 */
// eslint-disable-next-line @typescript-eslint/no-namespace
export namespace Tool {
  /**
   * Base metadata type - tools can extend with specific metadata.
   * Uses index signature for TypeScript compatibility.
   */
  export interface Metadata {
    [key: string]: unknown;
  }

  /**
   * Tool execution context provided to execute() function.
   */
  export interface Context<M extends Metadata = Metadata> {
    /** Session ID for the current conversation */
    sessionID: string;
    /** Message ID for the current turn */
    messageID: string;
    /** Abort signal for cancellation support */
    abort: AbortSignal;
    /** Optional tool call ID (for parallel tool execution tracking) */
    callID?: string;
    /** Pending edits, read tracking and tool-call history of the conversation */
    session: EditSession;
    /**
     * Stream metadata updates during execution.
     * Use this for progress updates, status changes, etc.
     */
    metadata(input: { title?: string; metadata?: Partial<M> }): void;
  }

  /**
   * Context for tool initialization.
   * Passed to init() function for setup tasks.
   */
  export interface InitContext {
    /** Working directory for the tool */
    workingDir?: string;
    /** Optional debug callback */
    onDebug?: (message: string, data?: Record<string, unknown>) => void;
  }

  /**
   * Tool execution result.
   * Standardized response format for all tools.
   */
  export interface Result<M extends Metadata = Metadata> {
    /** Short title describing what was done */
    title: string;
    /** Tool-specific metadata */
    metadata: M;
    /** Text output (consumed by LLM) */
    output: string;
  }

  /**
   * Initialized tool ready for execution.
   * Returned by init() function.
   */
  export interface Initialized<P extends z.ZodType = z.ZodType, M extends Metadata = Metadata> {
    /** Tool description (for LLM consumption) */
    description: string;
    /** Zod schema for input parameters */
    parameters: P;
    /** Execute the tool with validated parameters */
    execute(args: z.infer<P>, ctx: Context<M>): Result<M> | Promise<Result<M>>;
  }

  /**
   * Tool definition containing id and init function.
   */
  export interface Info<P extends z.ZodType = z.ZodType, M extends Metadata = Metadata> {
    /** Unique tool identifier */
    id: string;
    init: (ctx?: InitContext) => Initialized<P, M> | Promise<Initialized<P, M>>;
  }

  /**
   * Shorthand definition for tools that don't need async initialization.
   * Allows passing the Initialized object directly instead of an init function.
   */
  export type Definition<P extends z.ZodType = z.ZodType, M extends Metadata = Metadata> =
    | Info<P, M>['init']
    | Initialized<P, M>;

  /**
   * Create a tool definition with the given id and initialization.
   *
   * @param id - Unique tool identifier (e.g., 'read', 'edit', 'edit.confirm')
   * @param definition - Either an init function or a static Initialized object
   *
   * @example Init function (the description depends on the init context):
   * ```typescript
   * const readTool = Tool.define('read', (initCtx) => ({
   *   description: `Read a file under ${initCtx?.workingDir ?? 'the workspace'}`,
   *   parameters: readSchema,
   *   execute: async (args, ctx) => { ... },
   * }));
   * ```
   */
  export function define<P extends z.ZodType, M extends Metadata = Metadata>(
    id: string,
    definition: Definition<P, M>
  ): Info<P, M> {
    const init: Info<P, M>['init'] =
      typeof definition === 'function' ? definition : () => definition;

    return {
      id,
      init,
    };
  }

  /**
   * Create a context with a fresh session for tests or one-off calls.
   * Callbacks do nothing and abort is never signaled.
   */
  export function createNoopContext<M extends Metadata = Metadata>(
    overrides?: Partial<Context<M>>
  ): Context<M> {
    return {
      sessionID: 'test-session',
      messageID: 'test-message',
      abort: new AbortController().signal,
      session: new EditSession(),
      metadata: () => undefined,
      ...overrides,
    };
  }

  /**
   * Check if a value is a Tool.Info object.
   */
  export function isInfo(value: unknown): value is Info {
    return (
      typeof value === 'object' &&
      value !== null &&
      'id' in value &&
      'init' in value &&
      typeof value.id === 'string' &&
      typeof value.init === 'function'
    );
  }
}
