/**
 * Span names and routing keys of the example order flow.
 *
 * Naming convention for span names: `namespace.operation.detail`. Order
 * ids, customer ids and the like go into attributes, never into names.
 */

import { OrderEventType } from './OrderEvent';

export const SpanNames = {
  ORDER_CREATE: 'order.create',
  ORDER_GET: 'order.get',
  ORDER_LIST: 'order.list',
  ORDER_LIST_BY_CUSTOMER: 'order.list.by_customer',
  ORDER_UPDATE_STATUS: 'order.update.status',
  ORDER_CANCEL: 'order.cancel',
  ORDER_EVENT_PUBLISH: 'order.event.publish',
  NOTIFICATION_PUBLISH: 'notification.publish',
  ORDER_CREATED_CONSUME: 'order.event.consume.created',
  PAYMENT_EVENT_CONSUME: 'order.event.consume.payment',
  SHIPPING_EVENT_CONSUME: 'order.event.consume.shipping',
  NOTIFICATION_CONSUME: 'notification.consume',
} as const;

export const RoutingKeys = {
  ORDER_CREATED: 'order.created',
  PAYMENT_PROCESSING: 'payment.processing',
  PAYMENT_CONFIRMED: 'payment.confirmed',
  ORDER_SHIPPED: 'order.shipped',
  ORDER_UPDATED: 'order.updated',
  NOTIFICATION_EMAIL: 'notification.email',
} as const;

export type RoutingKey = (typeof RoutingKeys)[keyof typeof RoutingKeys];

/**
 * Routing key an order event is published under. Events without a
 * dedicated consumer go to `order.updated`, which nothing is bound to.
 */
export function routingKeyFor(eventType: OrderEventType): RoutingKey {
  switch (eventType) {
    case OrderEventType.OrderCreated:
      return RoutingKeys.ORDER_CREATED;
    case OrderEventType.PaymentProcessing:
      return RoutingKeys.PAYMENT_PROCESSING;
    case OrderEventType.PaymentConfirmed:
      return RoutingKeys.PAYMENT_CONFIRMED;
    case OrderEventType.OrderShipped:
      return RoutingKeys.ORDER_SHIPPED;
    default:
      return RoutingKeys.ORDER_UPDATED;
  }
}
