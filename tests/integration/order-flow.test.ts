/**
 * @fileoverview Integration tests for the example order flow
 * @description
 * Runs the order service, publisher, broker and consumers against a real
 * OpenTelemetry SDK tracer and checks the resulting spans: the producer
 * side forms one trace per request, and every consumer span starts a trace
 * of its own, linked to the publish span of the message it handles.
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { SpanKind as OtelSpanKind, SpanStatusCode } from '@opentelemetry/api';
import type { ReadableSpan } from '@opentelemetry/sdk-trace-base';
import { configureTracing, resetTracing } from '../../src';
import { createOrderApp, type OrderApp, type OrderAppOptions } from '../../examples/order-app/app';
import { OrderNotFoundException, OrderStatus, type CreateOrderRequest } from '../../examples/order-app/Order';
import {
  createMockLogger,
  createTracingHarness,
  type MockLogger,
  type TracingHarness,
} from '../helpers/tracing-harness';

const NOW = new Date('2026-01-01T00:00:00.000Z');

const REQUEST: CreateOrderRequest = {
  customerName: 'Test Customer',
  customerEmail: 'customer@example.com',
  items: [
    { productId: 'sku-1', productName: 'Notebook', quantity: 2, unitPrice: 12.5 },
    { productId: 'sku-2', productName: 'Pen', quantity: 1, unitPrice: 5 },
  ],
  paymentMethod: 'card',
};

function orderCreatedPayload(coordinates: Record<string, string | null>): object {
  return {
    orderId: 'ord-9',
    customerId: 'customer-9',
    customerEmail: 'customer9@example.com',
    totalAmount: 12.5,
    status: 'PENDING',
    eventType: 'ORDER_CREATED',
    timestamp: NOW.toISOString(),
    ...coordinates,
  };
}

describe('Order flow', () => {
  let harness: TracingHarness;
  let logger: MockLogger;
  let app: OrderApp;

  function buildApp(options: OrderAppOptions = {}): OrderApp {
    let sequence = 0;
    return createOrderApp({
      logger,
      generateId: () => `ord-${++sequence}`,
      clock: () => NOW,
      ...options,
    });
  }

  function spansNamed(name: string): ReadableSpan[] {
    return harness.spans().filter((span) => span.name === name);
  }

  beforeEach(() => {
    harness = createTracingHarness();
    logger = createMockLogger();
    configureTracing({ tracer: harness.tracer, logger });
    app = buildApp();
  });

  afterEach(() => {
    resetTracing();
  });

  // ============================================================================
  // TEST GROUP 1: Producer side
  // ============================================================================

  describe('producer side', () => {
    it('should trace order creation with bound and enriched attributes', async () => {
      const order = await app.service.createOrder('customer-1', REQUEST);

      expect(order.id).toBe('ord-1');
      expect(order.totalAmount).toBe(30);

      const span = harness.span('order.create');
      expect(span.status.code).toBe(SpanStatusCode.OK);
      expect(span.attributes).toEqual({
        operation: 'create',
        entity: 'order',
        'customer.id': 'customer-1',
        'code.function': 'createOrder',
        'code.namespace': 'OrderService',
        'order.id': 'ord-1',
        'customer.name': 'Test Customer',
        'order.status': 'PENDING',
        'order.total_amount': '30.00',
        'order.items_count': '2',
        'order.payment_method': 'card',
      });
    });

    it('should publish inside the request trace and stamp the publish span on the message', async () => {
      await app.service.createOrder('customer-1', REQUEST);

      const create = harness.span('order.create');
      const publish = harness.span('order.event.publish');
      expect(publish.kind).toBe(OtelSpanKind.PRODUCER);
      expect(publish.parentSpanId).toBe(create.spanContext().spanId);
      expect(publish.spanContext().traceId).toBe(create.spanContext().traceId);
      expect(publish.attributes).toEqual({
        'messaging.system': 'in-memory',
        'messaging.operation': 'publish',
        'order.id': 'ord-1',
        'event.type': 'ORDER_CREATED',
        'customer.id': 'customer-1',
        'order.total_amount': '30.00',
        'code.function': 'publishOrderEvent',
        'code.namespace': 'MessagePublisher',
        'messaging.destination.name': 'order.created',
      });

      expect(app.broker.published).toHaveLength(1);
      expect(app.broker.published[0].routingKey).toBe('order.created');
      expect(JSON.parse(app.broker.published[0].body)).toEqual({
        orderId: 'ord-1',
        customerId: 'customer-1',
        customerEmail: 'customer@example.com',
        totalAmount: 30,
        status: 'PENDING',
        eventType: 'ORDER_CREATED',
        timestamp: NOW.toISOString(),
        traceId: publish.spanContext().traceId,
        spanId: publish.spanContext().spanId,
        traceFlags: '01',
      });
    });

    it('should record a status change as a span event and nest the lookup', async () => {
      await app.service.createOrder('customer-1', REQUEST);

      await app.service.updateOrderStatus('ord-1', OrderStatus.PaymentProcessing);

      const update = harness.span('order.update.status');
      expect(update.attributes).toMatchObject({
        operation: 'update',
        'order.id': 'ord-1',
        'order.new_status': 'PAYMENT_PROCESSING',
      });
      expect(update.events.map((event) => event.name)).toEqual(['order.status_changed']);
      expect(update.events[0].attributes).toEqual({
        'order.previous_status': 'PENDING',
        'order.status': 'PAYMENT_PROCESSING',
      });
      expect(harness.span('order.get').parentSpanId).toBe(update.spanContext().spanId);
    });

    it('should count listed orders', async () => {
      await app.service.createOrder('customer-1', REQUEST);
      await app.service.createOrder('customer-2', REQUEST);

      const all = await app.service.getAllOrders();
      const mine = await app.service.getOrdersByCustomerId('customer-2');

      expect(all.map((order) => order.id)).toEqual(['ord-1', 'ord-2']);
      expect(mine.map((order) => order.id)).toEqual(['ord-2']);
      expect(harness.span('order.list').attributes['order.count']).toBe('2');
      expect(harness.span('order.list.by_customer').attributes).toMatchObject({
        'customer.id': 'customer-2',
        'order.count': '1',
      });
    });

    it('should mirror a missing order on the span and rethrow it unchanged', async () => {
      const lookup = app.service.getOrder('missing');

      await expect(lookup).rejects.toBeInstanceOf(OrderNotFoundException);
      await expect(lookup).rejects.toThrow('Order not found: missing');

      const span = harness.span('order.get');
      expect(span.status.code).toBe(SpanStatusCode.ERROR);
      expect(span.status.message).toBe('Order not found: missing');
      expect(span.events[0].name).toBe('exception');
      expect(span.events[0].attributes?.['exception.message']).toBe('Order not found: missing');
    });
  });

  // ============================================================================
  // TEST GROUP 2: Consumer side
  // ============================================================================

  describe('consumer side', () => {
    it('should start consumer spans in their own trace, linked to the publish span', async () => {
      await app.service.createOrder('customer-1', REQUEST);

      const deliveries = await app.broker.drain();

      expect(deliveries).toBe(2);
      const publish = harness.span('order.event.publish');
      const consume = harness.span('order.event.consume.created');
      expect(consume.kind).toBe(OtelSpanKind.CONSUMER);
      expect(consume.parentSpanId).toBeUndefined();
      expect(consume.spanContext().traceId).not.toBe(publish.spanContext().traceId);
      expect(consume.links).toHaveLength(1);
      expect(consume.links[0].context.traceId).toBe(publish.spanContext().traceId);
      expect(consume.links[0].context.spanId).toBe(publish.spanContext().spanId);
      expect(consume.attributes).toEqual({
        'order.id': 'ord-1',
        'event.type': 'ORDER_CREATED',
        'customer.id': 'customer-1',
        'order.total_amount': '30.00',
        'code.function': 'handleOrderCreated',
        'code.namespace': 'OrderEventConsumer',
      });
    });

    it('should chain notifications through a second linked hop', async () => {
      await app.service.createOrder('customer-1', REQUEST);
      await app.broker.drain();

      const consume = harness.span('order.event.consume.created');
      const publish = harness.span('notification.publish');
      const notify = harness.span('notification.consume');

      expect(publish.parentSpanId).toBe(consume.spanContext().spanId);
      expect(publish.attributes['notification.subject']).toBe('Order Confirmation');
      expect(notify.links[0].context.spanId).toBe(publish.spanContext().spanId);
      expect(notify.attributes['notification.subject']).toBe('Order Confirmation');
      expect(Object.keys(notify.attributes)).not.toContain('notification.email');

      expect(app.consumer.sentEmails).toEqual([
        {
          email: 'customer@example.com',
          subject: 'Order Confirmation',
          message: 'Your order ord-1 has been received! Total: $30.00',
        },
      ]);
    });

    it('should run the whole lifecycle and end every span once', async () => {
      await app.service.createOrder('customer-1', REQUEST);
      await app.service.updateOrderStatus('ord-1', OrderStatus.PaymentProcessing);
      await app.service.updateOrderStatus('ord-1', OrderStatus.Shipped);

      const deliveries = await app.broker.drain();

      expect(deliveries).toBe(5);
      expect(spansNamed('order.event.publish')).toHaveLength(3);
      expect(spansNamed('notification.consume')).toHaveLength(2);
      expect(harness.span('order.event.consume.payment').attributes).toMatchObject({
        'payment.amount': '30.00',
        'payment.status': 'confirmed',
      });
      expect(harness.span('order.event.consume.shipping').attributes).toMatchObject({
        'shipping.tracking_number': 'TRK00000001',
      });
      expect(app.consumer.sentEmails.map((email) => email.message)).toEqual([
        'Your order ord-1 has been received! Total: $30.00',
        'Your order ord-1 has been shipped! Tracking number: TRK00000001',
      ]);

      const spanIds = harness.spans().map((span) => span.spanContext().spanId);
      expect(new Set(spanIds).size).toBe(spanIds.length);
    });

    it('should record a declined payment', async () => {
      app = buildApp({ authorizePayment: () => false });
      await app.service.createOrder('customer-1', REQUEST);
      await app.service.updateOrderStatus('ord-1', OrderStatus.PaymentProcessing);

      await app.broker.drain();

      expect(harness.span('order.event.consume.payment').attributes['payment.status']).toBe('failed');
      expect(logger.warn).toHaveBeenCalledWith('Payment failed for order: ord-1');
    });

    it('should drop events that no queue is bound to', async () => {
      await app.service.createOrder('customer-1', REQUEST);
      await app.broker.drain();

      await app.service.cancelOrder('ord-1');
      const deliveries = await app.broker.drain();

      expect(deliveries).toBe(0);
      expect(app.broker.published[app.broker.published.length - 1].routingKey).toBe('order.updated');
      expect(logger.debug).toHaveBeenCalledWith(
        'No queue bound to routing key order.updated, message dropped',
      );
      const cancel = harness.span('order.cancel');
      expect(harness.span('order.update.status').parentSpanId).toBe(cancel.spanContext().spanId);
    });
  });

  // ============================================================================
  // TEST GROUP 3: Coordinates arriving from elsewhere
  // ============================================================================

  describe('incoming coordinates', () => {
    it('should link to the exact context carried by the message', async () => {
      app.broker.publish(
        'order.created',
        orderCreatedPayload({
          traceId: '4bf92f3577b34da6a3ce929d0e0e4736',
          spanId: '00f067aa0ba902b7',
          traceFlags: '01',
        }),
      );

      await app.broker.drain();

      const consume = harness.span('order.event.consume.created');
      expect(consume.links).toHaveLength(1);
      expect(consume.links[0].context.traceId).toBe('4bf92f3577b34da6a3ce929d0e0e4736');
      expect(consume.links[0].context.spanId).toBe('00f067aa0ba902b7');
      expect(consume.links[0].context.traceFlags).toBe(1);
      expect(consume.links[0].context.isRemote).toBe(true);
      expect(app.consumer.sentEmails[0].message).toBe(
        'Your order ord-9 has been received! Total: $12.50',
      );
    });

    it('should start an unlinked span when the span id is missing', async () => {
      app.broker.publish(
        'order.created',
        orderCreatedPayload({ traceId: '4bf92f3577b34da6a3ce929d0e0e4736', spanId: null }),
      );

      await app.broker.drain();

      const consume = harness.span('order.event.consume.created');
      expect(consume.links).toHaveLength(0);
      expect(consume.parentSpanId).toBeUndefined();
      expect(consume.status.code).toBe(SpanStatusCode.OK);
      expect(logger.warn).toHaveBeenCalledWith(
        "Creating span 'order.event.consume.created' without link due to invalid trace context",
        { traceId: '4bf92f3577b34da6a3ce929d0e0e4736', spanId: undefined },
      );
    });

    it('should start an unlinked span without a warning when no coordinates are carried', async () => {
      app.broker.publish('order.created', orderCreatedPayload({}));

      await app.broker.drain();

      expect(harness.span('order.event.consume.created').links).toHaveLength(0);
      expect(logger.warn).not.toHaveBeenCalled();
    });

    it('should log a payload that cannot be read and keep delivering', async () => {
      app.broker.publish('order.created', { orderId: 'ord-9' });
      app.broker.publish('order.created', orderCreatedPayload({}));

      const deliveries = await app.broker.drain();

      expect(deliveries).toBe(3);
      expect(logger.error).toHaveBeenCalledWith(
        'Handler for queue order.queue failed on order.created',
        expect.any(Error),
      );
      expect(app.consumer.sentEmails).toHaveLength(1);
    });
  });
});
