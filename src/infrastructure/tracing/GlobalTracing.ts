/**
 * @fileoverview Global tracing wiring
 * @description
 * Decorated methods cannot receive constructor arguments, so they resolve
 * the interceptor through this module when they are called. Configure it
 * once at startup; until then the getters fall back to the globally
 * registered OpenTelemetry tracer and a console logger at `warn`.
 *
 * @module infrastructure/tracing/GlobalTracing
 *
 * @example
 * ```typescript
 * import { trace } from '@opentelemetry/api';
 *
 * configureTracing({
 *   ...loadTracingOptionsFromEnv(),
 *   tracer: new OpenTelemetryTracer(trace.getTracer('order-service')),
 * });
 *
 * class OrderService {
 *   @TraceSpan('order.get')
 *   async getOrder(@SpanAttribute('order.id') orderId: string) {
 *     const order = await this.repository.findById(orderId);
 *     addSpanAttributes(order);
 *     return order;
 *   }
 * }
 * ```
 */

import type { AttributeInput } from '../../domain/contracts/IAttributeSource';
import type { ITelemetryMessage } from '../../domain/messaging/ITelemetryMessage';
import { resolveTracingOptions, type TracingOptions } from '../config/TracingOptions';
import type { ITracer } from './ITracer';
import { OpenTelemetryTracer } from './OpenTelemetryTracer';
import { SpanEnricher } from './SpanEnricher';
import type { SpanLinkBuilder } from './SpanLinkBuilder';
import { TracingInterceptor } from './TracingInterceptor';

interface TracingRuntime {
  readonly tracer: ITracer;
  readonly interceptor: TracingInterceptor;
  readonly enricher: SpanEnricher;
  readonly links: SpanLinkBuilder;
}

let runtime: TracingRuntime | undefined;

function createRuntime(options: TracingOptions): TracingRuntime {
  const resolved = resolveTracingOptions(options);
  const tracer =
    resolved.tracer ??
    OpenTelemetryTracer.fromGlobal(resolved.tracerName, resolved.tracerVersion);

  const interceptor = new TracingInterceptor(tracer, {
    ...options,
    tracer,
    logger: resolved.logger,
  });

  return {
    tracer,
    interceptor,
    enricher: new SpanEnricher(tracer, resolved.logger),
    links: interceptor.links,
  };
}

function currentRuntime(): TracingRuntime {
  runtime ??= createRuntime({});
  return runtime;
}

/**
 * Replace the global tracing setup.
 *
 * Decorated methods pick up the new interceptor on their next call.
 */
export function configureTracing(options: TracingOptions = {}): TracingInterceptor {
  runtime = createRuntime(options);
  return runtime.interceptor;
}

/**
 * Drop the global tracing setup. The next getter call rebuilds the
 * defaults.
 */
export function resetTracing(): void {
  runtime = undefined;
}

export function getTracer(): ITracer {
  return currentRuntime().tracer;
}

export function getTracingInterceptor(): TracingInterceptor {
  return currentRuntime().interceptor;
}

export function getSpanEnricher(): SpanEnricher {
  return currentRuntime().enricher;
}

export function getSpanLinkBuilder(): SpanLinkBuilder {
  return currentRuntime().links;
}

// ==================== Shortcuts ====================

/**
 * Add attributes to the active span. See {@link SpanEnricher.addAttributes}.
 */
export function addSpanAttributes(input: AttributeInput | null | undefined): void {
  getSpanEnricher().addAttributes(input);
}

/**
 * Record an event on the active span. See {@link SpanEnricher.addEvent}.
 */
export function addSpanEvent(
  name: string | null | undefined,
  input?: AttributeInput | null,
): void {
  getSpanEnricher().addEvent(name, input);
}

/**
 * Trace id of the active span, if any.
 */
export function currentTraceId(): string | undefined {
  return getSpanEnricher().currentTraceId();
}

/**
 * Copy a message with the active span's coordinates stamped on it.
 */
export function attachTraceContext<T extends object>(message: T): T & ITelemetryMessage {
  return getSpanLinkBuilder().attach(message);
}
