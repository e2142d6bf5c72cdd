/**
 * @fileoverview Tracing configuration
 *
 * Options are plain objects with defaults, like the rest of the package's
 * options. They can also be read from environment variables:
 *
 * | variable                        | option               | default            |
 * |---------------------------------|----------------------|--------------------|
 * | `SPANLINK_ENABLED`              | `enabled`            | `true`             |
 * | `SPANLINK_TRACER_NAME`          | `tracerName`         | `OTEL_SERVICE_NAME`, then `@spanlink/core` |
 * | `SPANLINK_TRACER_VERSION`       | `tracerVersion`      | none               |
 * | `SPANLINK_RECORD_CODE_METADATA` | `recordCodeMetadata` | `true`             |
 * | `SPANLINK_LINK_MESSAGES`        | `linkMessages`       | `true`             |
 * | `SPANLINK_LOG_LEVEL`            | `logger` level       | `warn`             |
 *
 * @module infrastructure/config/TracingOptions
 */

import {
  consoleLogger,
  createLeveledLogger,
  isLogLevel,
  type ILogger,
  type LogLevel,
} from '../logging/ILogger';
import type { ITracer } from '../tracing/ITracer';

export const DEFAULT_TRACER_NAME = '@spanlink/core';
export const DEFAULT_LOG_LEVEL: LogLevel = 'warn';

/**
 * Tracing configuration options
 */
export interface TracingOptions {
  /**
   * Tracer port implementation. Defaults to an adapter over the globally
   * registered OpenTelemetry tracer provider.
   */
  tracer?: ITracer;

  /** Instrumentation scope name used for the default tracer */
  tracerName?: string;

  /** Instrumentation scope version used for the default tracer */
  tracerVersion?: string;

  /** Logger for telemetry warnings */
  logger?: ILogger;

  /** When false, traced operations run without creating spans */
  enabled?: boolean;

  /** Write `code.function` and `code.namespace` on every span */
  recordCodeMetadata?: boolean;

  /** Link consumer spans to producer coordinates carried by arguments */
  linkMessages?: boolean;
}

/**
 * Options with every default applied (except the tracer, which is built
 * lazily by the global wiring).
 */
export interface ResolvedTracingOptions {
  tracer?: ITracer;
  tracerName: string;
  tracerVersion?: string;
  logger: ILogger;
  enabled: boolean;
  recordCodeMetadata: boolean;
  linkMessages: boolean;
}

/**
 * Apply defaults to tracing options.
 */
export function resolveTracingOptions(
  options: TracingOptions = {},
): ResolvedTracingOptions {
  return {
    tracer: options.tracer,
    tracerName: options.tracerName ?? options.tracer?.name ?? DEFAULT_TRACER_NAME,
    tracerVersion: options.tracerVersion ?? options.tracer?.version,
    logger: options.logger ?? createLeveledLogger(consoleLogger, DEFAULT_LOG_LEVEL),
    enabled: options.enabled ?? true,
    recordCodeMetadata: options.recordCodeMetadata ?? true,
    linkMessages: options.linkMessages ?? true,
  };
}

const TRUE_VALUES = new Set(['true', '1', 'yes']);
const FALSE_VALUES = new Set(['false', '0', 'no']);

/**
 * Parse a boolean environment variable. Unrecognised values yield
 * `undefined` so that the default applies.
 */
export function parseBooleanFlag(value: string | undefined): boolean | undefined {
  if (value === undefined) {
    return undefined;
  }
  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) return true;
  if (FALSE_VALUES.has(normalized)) return false;
  return undefined;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Read tracing options from environment variables.
 *
 * @param env - Environment to read, `process.env` by default
 * @param baseLogger - Logger wrapped with the configured level
 *
 * @example
 * ```typescript
 * configureTracing({
 *   ...loadTracingOptionsFromEnv(),
 *   tracer: new OpenTelemetryTracer(provider.getTracer('order-service')),
 * });
 * ```
 */
export function loadTracingOptionsFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  baseLogger: ILogger = consoleLogger,
): TracingOptions {
  const options: TracingOptions = {};

  const tracerName =
    nonEmpty(env.SPANLINK_TRACER_NAME) ?? nonEmpty(env.OTEL_SERVICE_NAME);
  if (tracerName) options.tracerName = tracerName;

  const tracerVersion = nonEmpty(env.SPANLINK_TRACER_VERSION);
  if (tracerVersion) options.tracerVersion = tracerVersion;

  const enabled = parseBooleanFlag(env.SPANLINK_ENABLED);
  if (enabled !== undefined) options.enabled = enabled;

  const recordCodeMetadata = parseBooleanFlag(env.SPANLINK_RECORD_CODE_METADATA);
  if (recordCodeMetadata !== undefined) options.recordCodeMetadata = recordCodeMetadata;

  const linkMessages = parseBooleanFlag(env.SPANLINK_LINK_MESSAGES);
  if (linkMessages !== undefined) options.linkMessages = linkMessages;

  const level = nonEmpty(env.SPANLINK_LOG_LEVEL)?.toLowerCase();
  options.logger = createLeveledLogger(
    baseLogger,
    level && isLogLevel(level) ? level : DEFAULT_LOG_LEVEL,
  );

  return options;
}
