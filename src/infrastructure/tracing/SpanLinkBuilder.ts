/**
 * @fileoverview Cross-Boundary Link Builder
 * @description
 * Connects a consumer-side span to the producer-side span that caused the
 * message to exist, when the transport carries no trace context itself.
 *
 * ```
 * producer process                        consumer process
 * ────────────────                        ────────────────
 * trace A                                 trace B
 *  └─ order.event.publish  ── message ──▶  └─ order.event.consume
 *       (traceId, spanId stamped)               link → (A, publish span)
 * ```
 *
 * The consumer span keeps its own parent (whatever is active on the
 * consumer side, usually nothing, so it becomes a root). The producer
 * span is attached as a **link**, not a parent: the two traces are
 * separate timelines that merely reference each other.
 *
 * @module infrastructure/tracing/SpanLinkBuilder
 */

import {
  hasTraceCoordinates,
  type ITelemetryMessage,
} from '../../domain/messaging/ITelemetryMessage';
import { consoleLogger, type ILogger } from '../logging/ILogger';
import type { ISpan, ITracer, SpanKind, SpanLink } from './ITracer';
import {
  decodeTraceContext,
  encodeTraceContext,
  isValidTraceContext,
  type EncodedTraceContext,
} from './SpanContextCodec';

export class SpanLinkBuilder {
  constructor(
    private readonly tracer: ITracer,
    private readonly logger: ILogger = consoleLogger,
  ) {}

  // ==================== Consumer side ====================

  /**
   * Find the first argument that carries trace coordinates.
   */
  findCoordinates(args: readonly unknown[]): ITelemetryMessage | undefined {
    return args.find(hasTraceCoordinates);
  }

  /**
   * Turn a message's coordinates into a link.
   *
   * @returns The link, or `undefined` when the coordinates are missing or
   *   malformed
   */
  resolveLink(message: ITelemetryMessage): SpanLink | undefined {
    const linked = decodeTraceContext(
      message.traceId,
      message.spanId,
      message.traceFlags,
    );

    if (!isValidTraceContext(linked)) {
      return undefined;
    }
    return { context: linked };
  }

  /**
   * Start a span, linked to the producer span when `message` carries valid
   * coordinates and plain otherwise.
   */
  startSpan(
    name: string,
    kind: SpanKind,
    message?: ITelemetryMessage,
  ): ISpan {
    if (!message) {
      return this.tracer.startSpan(name, { kind });
    }

    const link = this.resolveLink(message);
    if (!link) {
      this.logger.warn(
        `Creating span '${name}' without link due to invalid trace context`,
        { traceId: message.traceId, spanId: message.spanId },
      );
      return this.tracer.startSpan(name, { kind });
    }

    this.logger.debug(
      `Creating span '${name}' with link to traceId: ${link.context.traceId}, spanId: ${link.context.spanId}`,
    );
    return this.tracer.startSpan(name, { kind, links: [link] });
  }

  // ==================== Producer side ====================

  /**
   * Encode the coordinates of the currently active span.
   *
   * @returns The coordinates, or `undefined` when no valid span is active
   */
  capture(): EncodedTraceContext | undefined {
    const current = this.tracer.getCurrentSpan();
    if (!current) {
      return undefined;
    }

    const traceContext = current.getContext();
    if (!isValidTraceContext(traceContext)) {
      return undefined;
    }
    return encodeTraceContext(traceContext);
  }

  /**
   * Copy `message` with the active span's coordinates stamped on it.
   *
   * @remarks
   * When no valid span is active the copy carries no coordinates, and the
   * consumer will start an unlinked span.
   *
   * @example
   * ```typescript
   * const outgoing = links.attach({ orderId: order.id, eventType: 'ORDER_CREATED' });
   * broker.publish('order.created', outgoing);
   * ```
   */
  attach<T extends object>(message: T): T & ITelemetryMessage {
    const coordinates: ITelemetryMessage = this.capture() ?? {};
    return { ...message, ...coordinates };
  }
}
