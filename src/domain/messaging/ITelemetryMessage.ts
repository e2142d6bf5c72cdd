/**
 * @fileoverview Telemetry-bearing message shape
 *
 * @module @spanlink/core/domain/messaging
 *
 * Messages that cross an asynchronous boundary (a broker, a job queue, an
 * outbox table) can carry the coordinates of the span that produced them
 * as three optional passenger fields. The transport does not have to know
 * about them: they are ordinary payload fields.
 *
 * Their absence is the normal case (synchronous callers, producers that do
 * not participate), and consumers then simply start an unlinked span.
 */

/**
 * Optional trace coordinates carried by a message payload.
 *
 * @example
 * ```typescript
 * interface OrderEventPayload extends ITelemetryMessage {
 *   orderId: string;
 *   eventType: OrderEventType;
 * }
 *
 * const payload: OrderEventPayload = {
 *   orderId: 'ord-1',
 *   eventType: 'ORDER_CREATED',
 *   traceId: '4bf92f3577b34da6a3ce929d0e0e4736',
 *   spanId: '00f067aa0ba902b7',
 *   traceFlags: '01',
 * };
 * ```
 */
export interface ITelemetryMessage {
  /** Trace id of the producer span, 32 hex chars */
  traceId?: string | null;

  /** Span id of the producer span, 16 hex chars */
  spanId?: string | null;

  /** Trace flags of the producer span, 2 hex chars */
  traceFlags?: string | null;
}

/**
 * Check whether a value is an object that carries at least one of the
 * trace coordinate fields.
 *
 * @remarks
 * A message with only some of the fields still matches; whether the
 * coordinates are usable is decided later by the codec.
 */
export function hasTraceCoordinates(value: unknown): value is ITelemetryMessage {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const traceId = 'traceId' in value ? value.traceId : undefined;
  const spanId = 'spanId' in value ? value.spanId : undefined;
  return typeof traceId === 'string' || typeof spanId === 'string';
}
