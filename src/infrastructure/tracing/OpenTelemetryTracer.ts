/**
 * @fileoverview OpenTelemetry adapter for the tracer port
 * @description
 * Binds {@link ITracer} and {@link ISpan} to `@opentelemetry/api`. The
 * "current span" is the span stored in the OpenTelemetry context, so it
 * follows whatever context manager the host registered (the
 * AsyncLocalStorage manager from `@opentelemetry/context-async-hooks` in
 * Node.js services).
 *
 * @module infrastructure/tracing/OpenTelemetryTracer
 *
 * @example
 * ```typescript
 * import { trace } from '@opentelemetry/api';
 *
 * const tracer = new OpenTelemetryTracer(trace.getTracer('order-service', '1.4.0'));
 * configureTracing({ tracer });
 * ```
 */

import {
  context,
  trace,
  SpanKind as OtelSpanKind,
  SpanStatusCode,
  type Attributes,
  type Link,
  type Span,
  type SpanContext,
  type Tracer,
} from '@opentelemetry/api';
import {
  SpanKind,
  SpanStatus,
  type ISpan,
  type ITracer,
  type SpanAttributes,
  type SpanAttributeValue,
  type SpanLink,
  type SpanOptions,
  type TraceContext,
} from './ITracer';

const KIND_MAPPING: Record<SpanKind, OtelSpanKind> = {
  [SpanKind.Internal]: OtelSpanKind.INTERNAL,
  [SpanKind.Server]: OtelSpanKind.SERVER,
  [SpanKind.Client]: OtelSpanKind.CLIENT,
  [SpanKind.Producer]: OtelSpanKind.PRODUCER,
  [SpanKind.Consumer]: OtelSpanKind.CONSUMER,
};

const STATUS_MAPPING: Record<SpanStatus, SpanStatusCode> = {
  [SpanStatus.Unset]: SpanStatusCode.UNSET,
  [SpanStatus.Ok]: SpanStatusCode.OK,
  [SpanStatus.Error]: SpanStatusCode.ERROR,
};

function toSpanContext(traceContext: TraceContext): SpanContext {
  return {
    traceId: traceContext.traceId,
    spanId: traceContext.spanId,
    traceFlags: traceContext.traceFlags,
    isRemote: traceContext.isRemote,
  };
}

function toTraceContext(spanContext: SpanContext): TraceContext {
  return {
    traceId: spanContext.traceId,
    spanId: spanContext.spanId,
    traceFlags: spanContext.traceFlags,
    isRemote: spanContext.isRemote,
  };
}

function toAttributes(attributes: SpanAttributes | undefined): Attributes | undefined {
  if (!attributes) {
    return undefined;
  }
  const result: Attributes = {};
  for (const [key, value] of Object.entries(attributes)) {
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

function toLink(link: SpanLink): Link {
  return {
    context: toSpanContext(link.context),
    attributes: toAttributes(link.attributes),
  };
}

/**
 * {@link ISpan} backed by an OpenTelemetry span
 */
export class OpenTelemetrySpan implements ISpan {
  constructor(readonly span: Span) {}

  getContext(): TraceContext {
    return toTraceContext(this.span.spanContext());
  }

  isRecording(): boolean {
    return this.span.isRecording();
  }

  setAttribute(key: string, value: SpanAttributeValue): ISpan {
    this.span.setAttribute(key, value);
    return this;
  }

  setAttributes(attributes: SpanAttributes): ISpan {
    this.span.setAttributes(toAttributes(attributes) ?? {});
    return this;
  }

  addEvent(name: string, attributes?: SpanAttributes): ISpan {
    this.span.addEvent(name, toAttributes(attributes));
    return this;
  }

  recordException(error: unknown): ISpan {
    if (error instanceof Error) {
      this.span.recordException(error);
    } else {
      this.span.recordException(String(error));
    }
    return this;
  }

  setStatus(status: SpanStatus, message?: string): ISpan {
    this.span.setStatus({ code: STATUS_MAPPING[status], message });
    return this;
  }

  end(): void {
    this.span.end();
  }
}

/**
 * {@link ITracer} backed by an OpenTelemetry tracer
 */
export class OpenTelemetryTracer implements ITracer {
  readonly name: string;
  readonly version?: string;

  /**
   * @param tracer - Tracer obtained from a provider, e.g.
   *   `trace.getTracer(name, version)` or `provider.getTracer(name)`
   * @param name - Scope name reported by {@link ITracer.name}
   * @param version - Scope version reported by {@link ITracer.version}
   */
  constructor(
    private readonly tracer: Tracer,
    name = '@spanlink/core',
    version?: string,
  ) {
    this.name = name;
    this.version = version;
  }

  /**
   * Create an adapter over the globally registered tracer provider.
   */
  static fromGlobal(name: string, version?: string): OpenTelemetryTracer {
    return new OpenTelemetryTracer(trace.getTracer(name, version), name, version);
  }

  startSpan(name: string, options: SpanOptions = {}): ISpan {
    const span = this.tracer.startSpan(
      name,
      {
        kind: KIND_MAPPING[options.kind ?? SpanKind.Internal],
        attributes: toAttributes(options.attributes),
        links: options.links?.map(toLink),
      },
      context.active(),
    );
    return new OpenTelemetrySpan(span);
  }

  withActiveSpan<T>(span: ISpan, fn: () => T): T {
    const otelSpan =
      span instanceof OpenTelemetrySpan
        ? span.span
        : trace.wrapSpanContext(toSpanContext(span.getContext()));
    return context.with(trace.setSpan(context.active(), otelSpan), fn);
  }

  getCurrentSpan(): ISpan | undefined {
    const active = trace.getActiveSpan();
    return active ? new OpenTelemetrySpan(active) : undefined;
  }
}
