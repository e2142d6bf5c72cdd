/**
 * @fileoverview Producer side of the order flow
 *
 * Each publish runs in a producer span, and the payload leaves with the
 * coordinates of that span stamped on it.
 */

import {
  SpanAttribute,
  SpanKind,
  TraceSpan,
  addSpanAttributes,
  attachTraceContext,
  consoleLogger,
  type ILogger,
} from '../../src';
import type { InMemoryBroker } from './InMemoryBroker';
import type { EmailNotification, OrderEvent } from './OrderEvent';
import { RoutingKeys, SpanNames, routingKeyFor } from './telemetry';

export class MessagePublisher {
  constructor(
    private readonly broker: InMemoryBroker,
    private readonly logger: ILogger = consoleLogger,
  ) {}

  @TraceSpan({
    name: SpanNames.ORDER_EVENT_PUBLISH,
    kind: SpanKind.Producer,
    attributes: ['messaging.system:in-memory', 'messaging.operation:publish'],
  })
  publishOrderEvent(@SpanAttribute('order.event') event: OrderEvent): void {
    const routingKey = routingKeyFor(event.eventType);
    addSpanAttributes({ 'messaging.destination.name': routingKey });

    this.logger.info(
      `Publishing event ${event.eventType} for order ${event.orderId} with routing key ${routingKey}`,
    );
    this.broker.publish(routingKey, attachTraceContext(event));
  }

  @TraceSpan({
    name: SpanNames.NOTIFICATION_PUBLISH,
    kind: SpanKind.Producer,
    attributes: ['messaging.system:in-memory', 'messaging.operation:publish'],
  })
  publishNotification(
    email: string,
    @SpanAttribute('notification.subject') subject: string,
    message: string,
  ): void {
    const notification: EmailNotification = { email, subject, message };
    this.broker.publish(RoutingKeys.NOTIFICATION_EMAIL, attachTraceContext(notification));
  }
}
