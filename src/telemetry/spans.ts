/**
 * Span helpers for tool calls and edit operations.
 *
 * Tool spans follow the OpenTelemetry GenAI semantic conventions:
 * https://opentelemetry.io/docs/specs/semconv/gen-ai/gen-ai-spans/
 */

import { SpanKind, SpanStatusCode, context, trace } from '@opentelemetry/api';
import type { Span } from '@opentelemetry/api';
import { getTracer } from './setup.js';
import {
  ATTR_EDIT_MATCH_LEVEL,
  ATTR_EDIT_MODE,
  ATTR_EDIT_PATH,
  ATTR_EDIT_PREVIEW,
  ATTR_ERROR_TYPE,
  ATTR_GEN_AI_OPERATION_NAME,
  ATTR_GEN_AI_TOOL_CALL_ARGUMENTS,
  ATTR_GEN_AI_TOOL_CALL_ID,
  ATTR_GEN_AI_TOOL_CALL_RESULT,
  ATTR_GEN_AI_TOOL_NAME,
  GEN_AI_OPERATION,
} from './conventions.js';
import type {
  EditSpanEndOptions,
  EditSpanOptions,
  ToolSpanEndOptions,
  ToolSpanOptions,
} from './types.js';

const TRACER_NAME = 'patchwright.edit';

// -----------------------------------------------------------------------------
// Tool Span Helpers
// -----------------------------------------------------------------------------

/**
 * Start a tool execution span.
 *
 * @example
 * ```typescript
 * const span = startToolSpan({ toolName: 'edit', toolCallId: 'call_123' });
 * try {
 *   const result = await tool.execute(args, ctx);
 *   endToolSpan(span, { success: true, result });
 * } catch (error) {
 *   endToolSpan(span, { success: false, errorType: 'IO_ERROR' });
 * }
 * ```
 */
export function startToolSpan(options: ToolSpanOptions): Span {
  const tracer = getTracer(TRACER_NAME);

  const span = tracer.startSpan(`${GEN_AI_OPERATION.EXECUTE_TOOL} ${options.toolName}`, {
    kind: SpanKind.INTERNAL,
    attributes: {
      [ATTR_GEN_AI_OPERATION_NAME]: GEN_AI_OPERATION.EXECUTE_TOOL,
      [ATTR_GEN_AI_TOOL_NAME]: options.toolName,
    },
  });

  if (options.toolCallId !== undefined) {
    span.setAttribute(ATTR_GEN_AI_TOOL_CALL_ID, options.toolCallId);
  }

  if (options.enableSensitiveData === true && options.arguments !== undefined) {
    span.setAttribute(ATTR_GEN_AI_TOOL_CALL_ARGUMENTS, JSON.stringify(options.arguments));
  }

  return span;
}

/**
 * End a tool execution span.
 */
export function endToolSpan(span: Span, options: ToolSpanEndOptions): void {
  if (options.enableSensitiveData === true && options.result !== undefined) {
    span.setAttribute(ATTR_GEN_AI_TOOL_CALL_RESULT, JSON.stringify(options.result));
  }

  if (options.success) {
    span.setStatus({ code: SpanStatusCode.OK });
  } else {
    if (options.errorType !== undefined) {
      span.setAttribute(ATTR_ERROR_TYPE, options.errorType);
    }
    span.setStatus({
      code: SpanStatusCode.ERROR,
      message: options.errorType ?? 'Tool execution failed',
    });
  }

  span.end();
}

// -----------------------------------------------------------------------------
// Edit Span Helpers
// -----------------------------------------------------------------------------

/**
 * Start a span around one edit request.
 */
export function startEditSpan(options: EditSpanOptions): Span {
  const tracer = getTracer(TRACER_NAME);

  const span = tracer.startSpan(`edit ${options.mode}`, {
    kind: SpanKind.INTERNAL,
    attributes: {
      [ATTR_EDIT_MODE]: options.mode,
      [ATTR_EDIT_PREVIEW]: options.preview,
    },
  });

  if (options.path !== undefined) {
    span.setAttribute(ATTR_EDIT_PATH, options.path);
  }
  return span;
}

/**
 * Record the locator cascade level an edit matched at.
 */
export function recordMatchLevel(span: Span, level: number): void {
  span.setAttribute(ATTR_EDIT_MATCH_LEVEL, level);
}

/**
 * End an edit span. Failure results set `error.type` to their code.
 */
export function endEditSpan(span: Span, options: EditSpanEndOptions): void {
  if (options.success) {
    span.setStatus({ code: SpanStatusCode.OK });
  } else {
    const errorType = options.errorType ?? 'edit_failed';
    span.setAttribute(ATTR_ERROR_TYPE, errorType);
    span.setStatus({ code: SpanStatusCode.ERROR, message: errorType });
  }
  span.end();
}

// -----------------------------------------------------------------------------
// Span Context Utilities
// -----------------------------------------------------------------------------

/**
 * Execute an async function with `span` as the active span.
 */
export async function withSpanAsync<T>(span: Span, fn: () => Promise<T>): Promise<T> {
  const ctx = trace.setSpan(context.active(), span);
  return context.with(ctx, fn);
}
