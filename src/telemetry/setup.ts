/**
 * OpenTelemetry setup.
 *
 * Spans are created by hand around tool calls and edits; until
 * {@link initializeTelemetry} registers a provider the API hands out no-op
 * spans.
 */

import { trace } from '@opentelemetry/api';
import type { Tracer } from '@opentelemetry/api';
import { resourceFromAttributes } from '@opentelemetry/resources';
import { ATTR_SERVICE_NAME, ATTR_SERVICE_VERSION } from '@opentelemetry/semantic-conventions';
import { BasicTracerProvider, SimpleSpanProcessor } from '@opentelemetry/sdk-trace-base';
import type { SpanExporter } from '@opentelemetry/sdk-trace-base';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-http';

import { errorMessage } from '../errors/index.js';
import type {
  ExporterType,
  TelemetryInitResult,
  TelemetryOptions,
  TelemetryResponse,
} from './types.js';

// -----------------------------------------------------------------------------
// Constants
// -----------------------------------------------------------------------------

const SERVICE_NAME = 'patchwright';
const SERVICE_VERSION = '0.1.0';
const DEFAULT_OTLP_HTTP_ENDPOINT = 'http://localhost:4318/v1/traces';

// -----------------------------------------------------------------------------
// Module State
// -----------------------------------------------------------------------------

let tracerProvider: BasicTracerProvider | null = null;
let initResult: TelemetryInitResult | null = null;

function succeed<T>(result: T, message: string): TelemetryResponse<T> {
  return { success: true, result, message };
}

// -----------------------------------------------------------------------------
// Setup
// -----------------------------------------------------------------------------

/**
 * Register a tracer provider for the process.
 *
 * With `config.enabled` false nothing is registered and spans stay no-ops.
 * Otherwise spans go to `customExporter` when given, else to the OTLP/HTTP
 * collector at `config.otlpEndpoint` (default `http://localhost:4318/v1/traces`).
 *
 * @example
 * await initializeTelemetry({ config: { enabled: true, enableSensitiveData: false } });
 */
export function initializeTelemetry(
  options: TelemetryOptions
): Promise<TelemetryResponse<TelemetryInitResult>> {
  const { config, onDebug } = options;

  if (initResult !== null) {
    return Promise.resolve({
      success: false,
      error: 'ALREADY_INITIALIZED',
      message: 'Telemetry has already been initialized. Call shutdown() first to reinitialize.',
    });
  }

  if (!config.enabled) {
    onDebug?.('Telemetry disabled via configuration');
    initResult = {
      enabled: false,
      exporterType: 'none',
      enableSensitiveData: config.enableSensitiveData,
    };
    return Promise.resolve(succeed(initResult, 'Telemetry disabled'));
  }

  let exporter: SpanExporter;
  let exporterType: ExporterType;
  let endpoint: string | undefined;
  if (options.customExporter !== undefined) {
    exporter = options.customExporter;
    exporterType = 'custom';
  } else {
    endpoint = config.otlpEndpoint ?? DEFAULT_OTLP_HTTP_ENDPOINT;
    exporter = new OTLPTraceExporter({ url: endpoint });
    exporterType = 'otlp';
  }

  tracerProvider = new BasicTracerProvider({
    resource: resourceFromAttributes({
      [ATTR_SERVICE_NAME]: SERVICE_NAME,
      [ATTR_SERVICE_VERSION]: SERVICE_VERSION,
    }),
    spanProcessors: [new SimpleSpanProcessor(exporter)],
  });
  trace.setGlobalTracerProvider(tracerProvider);

  initResult = {
    enabled: true,
    exporterType,
    endpoint,
    enableSensitiveData: config.enableSensitiveData,
  };
  onDebug?.('Telemetry initialized', { exporterType, endpoint });

  return Promise.resolve(succeed(initResult, `Telemetry initialized with ${exporterType} exporter`));
}

// -----------------------------------------------------------------------------
// Accessors
// -----------------------------------------------------------------------------

/**
 * Tracer for the span helpers; a no-op tracer until telemetry is enabled.
 *
 * @param name - Instrumentation scope (defaults to the service name)
 */
export function getTracer(name: string = SERVICE_NAME): Tracer {
  return trace.getTracer(name, SERVICE_VERSION);
}

/** Whether spans are being exported */
export function isEnabled(): boolean {
  return initResult?.enabled ?? false;
}

/**
 * Whether spans may carry tool arguments and results.
 */
export function isSensitiveDataEnabled(): boolean {
  return isEnabled() && (initResult?.enableSensitiveData ?? false);
}

/**
 * Flush pending spans and unregister the provider. Must be called before
 * initializing again.
 */
export async function shutdown(): Promise<TelemetryResponse> {
  if (initResult === null) {
    return {
      success: false,
      error: 'NOT_INITIALIZED',
      message: 'Telemetry is not initialized',
    };
  }

  try {
    if (tracerProvider) {
      await tracerProvider.shutdown();
      tracerProvider = null;
    }
    // Drop the global provider so the next initialization can register one
    trace.disable();
    initResult = null;
    return succeed(undefined, 'Telemetry shutdown complete');
  } catch (error) {
    return { success: false, error: 'UNKNOWN', message: errorMessage(error) };
  }
}
