/**
 * @fileoverview Tracing Exports
 * @description
 * Everything needed to declare traced operations, enrich the active span
 * and link spans across asynchronous message boundaries.
 *
 * Features:
 * - `@TraceSpan` / `@SpanAttribute` decorators and a decorator-free `wrap`
 * - Span enrichment from domain objects implementing `IAttributeSource`
 * - Producer coordinates stamped on messages, consumer spans linked back
 * - An OpenTelemetry adapter for the tracer port
 *
 * @packageDocumentation
 * @module @spanlink/core/infrastructure/tracing
 *
 * @see {@link https://opentelemetry.io/docs/specs/otel/ | OpenTelemetry Specification}
 * @see {@link https://www.w3.org/TR/trace-context/ | W3C Trace Context}
 */

export { SpanStatus, SpanKind } from './ITracer';

export type {
  ITracer,
  ISpan,
  TraceContext,
  SpanOptions,
  SpanAttributes,
  SpanAttributeValue,
  SpanLink,
} from './ITracer';

export { OpenTelemetrySpan, OpenTelemetryTracer } from './OpenTelemetryTracer';

export {
  INVALID_TRACE_CONTEXT,
  decodeTraceContext,
  encodeTraceContext,
  isValidTraceContext,
} from './SpanContextCodec';
export type { EncodedTraceContext } from './SpanContextCodec';

export { AttributeNames, STATIC_ATTRIBUTE_SEPARATOR } from './constants';

export { applyBoundAttribute, bindAttribute } from './BoundAttribute';
export type { BoundAttribute } from './BoundAttribute';

export {
  describeOperation,
  parseStaticAttributes,
  resolveSpanName,
} from './OperationDescriptor';
export type {
  OperationDescriptor,
  OperationSite,
  ParameterBinding,
  TraceSpanOptions,
} from './OperationDescriptor';

export { SpanEnricher } from './SpanEnricher';
export { SpanLinkBuilder } from './SpanLinkBuilder';
export { TracingInterceptor } from './TracingInterceptor';
export { TraceSpan, SpanAttribute, getParameterBindings } from './decorators';

export {
  configureTracing,
  resetTracing,
  getTracer,
  getTracingInterceptor,
  getSpanEnricher,
  getSpanLinkBuilder,
  addSpanAttributes,
  addSpanEvent,
  currentTraceId,
  attachTraceContext,
} from './GlobalTracing';
