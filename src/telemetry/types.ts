/**
 * Telemetry type definitions.
 */

import type { SpanExporter } from '@opentelemetry/sdk-trace-base';
import type { TelemetryConfig } from '../config/schema.js';

// -----------------------------------------------------------------------------
// Error Types
// -----------------------------------------------------------------------------

/**
 * Telemetry-specific error codes.
 */
export type TelemetryErrorCode = 'ALREADY_INITIALIZED' | 'NOT_INITIALIZED' | 'UNKNOWN';

/**
 * Success response for telemetry operations.
 */
export interface TelemetrySuccessResponse<T = void> {
  success: true;
  result: T;
  message: string;
}

/**
 * Error response for telemetry operations.
 */
export interface TelemetryErrorResponse {
  success: false;
  error: TelemetryErrorCode;
  message: string;
}

export type TelemetryResponse<T = void> = TelemetrySuccessResponse<T> | TelemetryErrorResponse;

// -----------------------------------------------------------------------------
// Configuration Types
// -----------------------------------------------------------------------------

/**
 * Where spans go: the OTLP/HTTP collector, an exporter passed in, or nowhere.
 */
export type ExporterType = 'otlp' | 'custom' | 'none';

/**
 * Options for telemetry initialization.
 */
export interface TelemetryOptions {
  /** Telemetry section of the configuration */
  config: TelemetryConfig;
  /** Debug logging callback */
  onDebug?: (msg: string, data?: Record<string, unknown>) => void;
  /** Exporter to use instead of OTLP, e.g. an in-memory one in tests */
  customExporter?: SpanExporter;
}

/**
 * Telemetry initialization result.
 */
export interface TelemetryInitResult {
  /** Whether spans are exported */
  enabled: boolean;
  exporterType: ExporterType;
  /** Collector URL when exporting over OTLP */
  endpoint?: string;
  /** Whether tool arguments and results are recorded on spans */
  enableSensitiveData: boolean;
}

// -----------------------------------------------------------------------------
// Span Types
// -----------------------------------------------------------------------------

/**
 * Options for starting a tool span.
 */
export interface ToolSpanOptions {
  toolName: string;
  toolCallId?: string;
  /** Include arguments in span */
  enableSensitiveData?: boolean;
  /** Tool arguments (only recorded if enableSensitiveData is true) */
  arguments?: Record<string, unknown>;
}

/**
 * Options for ending a tool span.
 */
export interface ToolSpanEndOptions {
  success: boolean;
  /** Error type if execution failed */
  errorType?: string;
  /** Include result in span */
  enableSensitiveData?: boolean;
  /** Tool result (only recorded if enableSensitiveData is true) */
  result?: unknown;
}

/**
 * Options for starting an edit span.
 */
export interface EditSpanOptions {
  mode: string;
  path?: string;
  preview: boolean;
}

/**
 * Options for ending an edit span.
 */
export interface EditSpanEndOptions {
  success: boolean;
  /** Failure result code or ToolError code */
  errorType?: string;
}
