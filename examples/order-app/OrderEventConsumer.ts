/**
 * @fileoverview Consumer side of the order flow
 *
 * Handlers receive events rebuilt from broker payloads. Because the
 * payloads carry the producer's coordinates, each consumer span is linked
 * to the publish span that caused it, while starting a trace of its own.
 */

import {
  SpanAttribute,
  SpanKind,
  TraceSpan,
  addSpanAttributes,
  consoleLogger,
  type ILogger,
} from '../../src';
import type { MessagePublisher } from './MessagePublisher';
import { OrderEventType, type EmailNotification, type OrderEvent } from './OrderEvent';
import { SpanNames } from './telemetry';

/**
 * Decides whether a payment goes through.
 */
export type PaymentAuthorizer = (event: OrderEvent) => boolean;

/**
 * Notification as handed to the mail gateway.
 */
export interface SentEmail {
  readonly email: string;
  readonly subject: string;
  readonly message: string;
}

export class OrderEventConsumer {
  /** Notifications delivered so far */
  readonly sentEmails: SentEmail[] = [];

  private shipments = 0;

  constructor(
    private readonly publisher: MessagePublisher,
    private readonly logger: ILogger = consoleLogger,
    private readonly authorizePayment: PaymentAuthorizer = () => true,
  ) {}

  @TraceSpan({ name: SpanNames.ORDER_CREATED_CONSUME, kind: SpanKind.Consumer })
  handleOrderCreated(@SpanAttribute('order.event') event: OrderEvent): void {
    this.logger.info(`Processing ${event.eventType} event for order: ${event.orderId}`);

    this.publisher.publishNotification(
      event.customerEmail,
      'Order Confirmation',
      `Your order ${event.orderId} has been received! Total: $${event.totalAmount.toFixed(2)}`,
    );
  }

  @TraceSpan({ name: SpanNames.PAYMENT_EVENT_CONSUME, kind: SpanKind.Consumer })
  handlePaymentEvent(@SpanAttribute('order.event') event: OrderEvent): void {
    addSpanAttributes({ 'payment.amount': event.totalAmount.toFixed(2) });

    if (event.eventType !== OrderEventType.PaymentProcessing) {
      return;
    }

    const confirmed = this.authorizePayment(event);
    addSpanAttributes({ 'payment.status': confirmed ? 'confirmed' : 'failed' });
    if (confirmed) {
      this.logger.info(`Payment confirmed for order: ${event.orderId}`);
    } else {
      this.logger.warn(`Payment failed for order: ${event.orderId}`);
    }
  }

  @TraceSpan({ name: SpanNames.SHIPPING_EVENT_CONSUME, kind: SpanKind.Consumer })
  handleShippingEvent(@SpanAttribute('order.event') event: OrderEvent): void {
    this.shipments++;
    const trackingNumber = `TRK${String(this.shipments).padStart(8, '0')}`;
    addSpanAttributes({ 'shipping.tracking_number': trackingNumber });

    this.publisher.publishNotification(
      event.customerEmail,
      'Order Shipped',
      `Your order ${event.orderId} has been shipped! Tracking number: ${trackingNumber}`,
    );
  }

  @TraceSpan({ name: SpanNames.NOTIFICATION_CONSUME, kind: SpanKind.Consumer })
  handleNotification(notification: EmailNotification): void {
    addSpanAttributes({ 'notification.subject': notification.subject });

    this.sentEmails.push({
      email: notification.email,
      subject: notification.subject,
      message: notification.message,
    });
  }
}
