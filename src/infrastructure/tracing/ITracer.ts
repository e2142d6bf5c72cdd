/**
 * @spanlink/core - Tracer Port
 *
 * The instrumentation layer never talks to a tracing SDK directly. It
 * starts, mutates and ends spans through the interfaces in this file, and an
 * adapter (see {@link OpenTelemetryTracer}) binds them to a real tracer.
 * The port is deliberately small: span batching, export and sampling are
 * owned by whatever SDK sits behind the adapter.
 *
 * @module infrastructure/tracing/ITracer
 * @see {@link https://opentelemetry.io/docs/concepts/signals/traces/ | OpenTelemetry Traces}
 */

/**
 * Span status codes following OpenTelemetry conventions.
 *
 * Indicates the outcome of the operation represented by the span.
 */
export enum SpanStatus {
  /** The operation completed without any issues */
  Ok = 'OK',
  /** An error occurred during the operation */
  Error = 'ERROR',
  /** The status is not set (default) */
  Unset = 'UNSET',
}

/**
 * Span kind indicating the role of the span in the trace.
 *
 * @remarks
 * - **Server**: The span covers server-side handling of a request
 * - **Client**: The span covers the client-side of a request to a server
 * - **Producer**: The span covers the creation of a message to a queue
 * - **Consumer**: The span covers the processing of a message from a queue
 * - **Internal**: The span represents an internal operation
 */
export enum SpanKind {
  /** Server-side handling of an RPC or HTTP request */
  Server = 'SERVER',
  /** Client-side of an RPC or HTTP request */
  Client = 'CLIENT',
  /** Producer side of a message queue operation */
  Producer = 'PRODUCER',
  /** Consumer side of a message queue operation */
  Consumer = 'CONSUMER',
  /** Internal operation within the same process */
  Internal = 'INTERNAL',
}

/**
 * Scalar value a span attribute may hold.
 */
export type SpanAttributeValue = string | number | boolean;

/**
 * Span attributes for adding contextual information.
 *
 * Follows OpenTelemetry semantic conventions for attribute naming.
 *
 * @example
 * ```typescript
 * const attributes: SpanAttributes = {
 *   'order.id': 'ord-42',
 *   'order.items_count': 3,
 *   'payment.confirmed': true,
 * };
 * ```
 */
export interface SpanAttributes {
  [key: string]: SpanAttributeValue | undefined;
}

/**
 * Coordinates identifying one span for propagation purposes.
 *
 * @remarks
 * A context is only usable when both ids are well-formed lowercase hex of
 * the expected length and not all zeros; see `isValidTraceContext`. A
 * partially populated or malformed context is treated as absent.
 */
export interface TraceContext {
  /**
   * Identifier of the whole trace.
   * 32 character hex string (128 bits).
   */
  traceId: string;

  /**
   * Identifier of the span.
   * 16 character hex string (64 bits).
   */
  spanId: string;

  /**
   * Trace flags (8-bit field).
   * Bit 0 = sampled flag (1 = sampled, 0 = not sampled).
   */
  traceFlags: number;

  /**
   * True when the context was received from another process rather than
   * created by the local tracer.
   */
  isRemote?: boolean;
}

/**
 * Span link connecting this span to a related span.
 *
 * Links connect causally-related spans that don't have a parent-child
 * relationship, typically a consumer span pointing back at the producer
 * span of the message it handles.
 *
 * @example
 * ```typescript
 * const link: SpanLink = {
 *   context: decodeTraceContext(message.traceId, message.spanId, message.traceFlags),
 * };
 * ```
 */
export interface SpanLink {
  /**
   * Context of the linked span.
   */
  context: TraceContext;

  /**
   * Attributes describing the relationship.
   */
  attributes?: SpanAttributes;
}

/**
 * Options for creating a new span.
 *
 * @example
 * ```typescript
 * const span = tracer.startSpan('order.event.consume', {
 *   kind: SpanKind.Consumer,
 *   links: [{ context: producerContext }],
 * });
 * ```
 */
export interface SpanOptions {
  /**
   * Kind of span (Server, Client, Internal, etc.).
   * @defaultValue SpanKind.Internal
   */
  kind?: SpanKind;

  /**
   * Initial attributes for the span.
   */
  attributes?: SpanAttributes;

  /**
   * Links to related spans. Links never change the parent of the span.
   */
  links?: SpanLink[];
}

/**
 * ISpan - Interface for individual trace spans.
 *
 * A span represents a single operation within a trace. The interception
 * engine owns its lifecycle; application code only ever reaches the
 * currently active span through the enrichment utility.
 *
 * @remarks
 * Always end spans to ensure they are recorded. Use try/finally blocks
 * so that the span is ended on both the success and the failure path.
 *
 * @example
 * ```typescript
 * const span = tracer.startSpan('order.process');
 * try {
 *   span.setAttribute('order.id', orderId);
 *   const result = await processOrder(orderId);
 *   span.setStatus(SpanStatus.Ok);
 *   return result;
 * } catch (error) {
 *   span.recordException(error);
 *   span.setStatus(SpanStatus.Error, 'Order processing failed');
 *   throw error;
 * } finally {
 *   span.end();
 * }
 * ```
 */
export interface ISpan {
  /**
   * Get the propagation coordinates of this span.
   */
  getContext(): TraceContext;

  /**
   * Whether the span still records data (false once ended, or when the
   * span was not sampled).
   */
  isRecording(): boolean;

  /**
   * Set a single attribute on the span.
   *
   * @example
   * ```typescript
   * span.setAttribute('order.id', 'ord-1')
   *     .setAttribute('order.items_count', 2);
   * ```
   */
  setAttribute(key: string, value: SpanAttributeValue): ISpan;

  /**
   * Set multiple attributes on the span.
   */
  setAttributes(attributes: SpanAttributes): ISpan;

  /**
   * Add a point-in-time event to the span.
   *
   * @example
   * ```typescript
   * span.addEvent('payment.authorized', { 'payment.method': 'card' });
   * ```
   */
  addEvent(name: string, attributes?: SpanAttributes): ISpan;

  /**
   * Record an exception that occurred during the span.
   */
  recordException(error: unknown): ISpan;

  /**
   * Set the status of the span.
   *
   * @param status - Status code (Ok, Error, or Unset)
   * @param message - Optional status message (for errors)
   */
  setStatus(status: SpanStatus, message?: string): ISpan;

  /**
   * End the span. Must be called exactly once for the span to be recorded.
   */
  end(): void;
}

/**
 * ITracer - The injected tracer primitive.
 *
 * @remarks
 * The "current span" is ambient but call-scoped: `withActiveSpan` makes a
 * span current for one callback and everything it awaits, and concurrent
 * callbacks never observe each other's span.
 *
 * @example
 * ```typescript
 * const span = tracer.startSpan('order.create', { kind: SpanKind.Internal });
 * try {
 *   return await tracer.withActiveSpan(span, () => createOrder(request));
 * } finally {
 *   span.end();
 * }
 * ```
 */
export interface ITracer {
  /**
   * Instrumentation scope name of this tracer.
   */
  readonly name: string;

  /**
   * Version of the instrumentation scope.
   */
  readonly version?: string;

  /**
   * Start a new span as a child of the currently active span, or as a new
   * trace root when no span is active.
   */
  startSpan(name: string, options?: SpanOptions): ISpan;

  /**
   * Run `fn` with `span` as the current span.
   *
   * Spans started inside `fn` (including after `await`) become children of
   * `span`. The previous current span is restored when `fn` returns.
   */
  withActiveSpan<T>(span: ISpan, fn: () => T): T;

  /**
   * Get the currently active span.
   *
   * @returns Current span or undefined if none active
   */
  getCurrentSpan(): ISpan | undefined;
}
