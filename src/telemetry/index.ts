/**
 * Telemetry module - OpenTelemetry setup and span helpers.
 *
 * Spans are no-ops until initializeTelemetry() registers an exporter.
 */

// ─── Types ───────────────────────────────────────────────────────────────────
export type {
  TelemetryErrorCode,
  TelemetrySuccessResponse,
  TelemetryErrorResponse,
  TelemetryResponse,
  ExporterType,
  TelemetryOptions,
  TelemetryInitResult,
  ToolSpanOptions,
  ToolSpanEndOptions,
  EditSpanOptions,
  EditSpanEndOptions,
} from './types.js';

// ─── Setup Functions ─────────────────────────────────────────────────────────
export {
  initializeTelemetry,
  getTracer,
  isEnabled,
  isSensitiveDataEnabled,
  shutdown,
} from './setup.js';

// ─── Attribute Names ─────────────────────────────────────────────────────────
export {
  ATTR_GEN_AI_OPERATION_NAME,
  ATTR_GEN_AI_TOOL_NAME,
  ATTR_GEN_AI_TOOL_CALL_ID,
  ATTR_GEN_AI_TOOL_CALL_ARGUMENTS,
  ATTR_GEN_AI_TOOL_CALL_RESULT,
  ATTR_EDIT_MODE,
  ATTR_EDIT_PATH,
  ATTR_EDIT_MATCH_LEVEL,
  ATTR_EDIT_PREVIEW,
  ATTR_ERROR_TYPE,
  GEN_AI_OPERATION,
} from './conventions.js';

export type { GenAIOperationName } from './conventions.js';

// ─── Span Helpers ────────────────────────────────────────────────────────────
export {
  startToolSpan,
  endToolSpan,
  startEditSpan,
  endEditSpan,
  recordMatchLevel,
  withSpanAsync,
} from './spans.js';
