/**
 * @fileoverview Order events crossing the broker
 *
 * An order event is both an attribute source (for the consumer span) and a
 * telemetry-bearing message: the producer stamps the coordinates of its
 * publish span on it, and the consumer links back to that span.
 */

import type { AttributeRecord, IAttributeSource, ITelemetryMessage } from '../../src';
import { OrderStatus, parseOrderStatus, type Order } from './Order';

export enum OrderEventType {
  OrderCreated = 'ORDER_CREATED',
  PaymentProcessing = 'PAYMENT_PROCESSING',
  PaymentConfirmed = 'PAYMENT_CONFIRMED',
  OrderPreparing = 'ORDER_PREPARING',
  OrderShipped = 'ORDER_SHIPPED',
  OrderDelivered = 'ORDER_DELIVERED',
  OrderCancelled = 'ORDER_CANCELLED',
}

const EVENT_TYPE_BY_STATUS: Record<OrderStatus, OrderEventType> = {
  [OrderStatus.Pending]: OrderEventType.OrderCreated,
  [OrderStatus.PaymentProcessing]: OrderEventType.PaymentProcessing,
  [OrderStatus.PaymentConfirmed]: OrderEventType.PaymentConfirmed,
  [OrderStatus.Preparing]: OrderEventType.OrderPreparing,
  [OrderStatus.Shipped]: OrderEventType.OrderShipped,
  [OrderStatus.Delivered]: OrderEventType.OrderDelivered,
  [OrderStatus.Cancelled]: OrderEventType.OrderCancelled,
};

/**
 * Event published when an order enters `status`.
 */
export function eventTypeForStatus(status: OrderStatus): OrderEventType {
  return EVENT_TYPE_BY_STATUS[status];
}

export function parseOrderEventType(value: unknown): OrderEventType | undefined {
  return Object.values(OrderEventType).find((eventType) => eventType === value);
}

export class InvalidOrderEventException extends Error {
  constructor(reason: string) {
    super(`Invalid order event: ${reason}`);
    this.name = 'InvalidOrderEventException';
    Error.captureStackTrace(this, this.constructor);
  }
}

function readString(payload: Record<string, unknown>, key: string): string {
  const value = payload[key];
  if (typeof value !== 'string') {
    throw new InvalidOrderEventException(`'${key}' must be a string`);
  }
  return value;
}

function readOptionalString(payload: Record<string, unknown>, key: string): string | undefined {
  const value = payload[key];
  return typeof value === 'string' ? value : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class OrderEvent implements IAttributeSource, ITelemetryMessage {
  traceId?: string;
  spanId?: string;
  traceFlags?: string;

  constructor(
    readonly orderId: string,
    readonly customerId: string,
    readonly customerEmail: string,
    readonly totalAmount: number,
    readonly status: OrderStatus,
    readonly eventType: OrderEventType,
    readonly timestamp: string,
  ) {}

  static forOrder(order: Order, eventType: OrderEventType, timestamp: string): OrderEvent {
    return new OrderEvent(
      order.id,
      order.customerId,
      order.customerEmail,
      order.totalAmount,
      order.status,
      eventType,
      timestamp,
    );
  }

  /**
   * Rebuild an event from a decoded broker payload.
   *
   * @throws {InvalidOrderEventException} When a business field is missing
   *   or has the wrong type
   */
  static fromPayload(payload: unknown): OrderEvent {
    if (!isRecord(payload)) {
      throw new InvalidOrderEventException('payload must be an object');
    }

    const status = parseOrderStatus(payload.status);
    const eventType = parseOrderEventType(payload.eventType);
    if (!status || !eventType) {
      throw new InvalidOrderEventException('unknown status or event type');
    }
    const totalAmount = payload.totalAmount;
    if (typeof totalAmount !== 'number') {
      throw new InvalidOrderEventException(`'totalAmount' must be a number`);
    }

    const event = new OrderEvent(
      readString(payload, 'orderId'),
      readString(payload, 'customerId'),
      readString(payload, 'customerEmail'),
      totalAmount,
      status,
      eventType,
      readString(payload, 'timestamp'),
    );
    event.traceId = readOptionalString(payload, 'traceId');
    event.spanId = readOptionalString(payload, 'spanId');
    event.traceFlags = readOptionalString(payload, 'traceFlags');
    return event;
  }

  attributes(): AttributeRecord {
    return {
      'order.id': this.orderId,
      'event.type': this.eventType,
      'customer.id': this.customerId,
      'order.total_amount': this.totalAmount.toFixed(2),
    };
  }
}

/**
 * Notification sent to a customer, routed through the broker.
 */
export interface EmailNotification extends ITelemetryMessage {
  email: string;
  subject: string;
  message: string;
}

export function parseEmailNotification(payload: unknown): EmailNotification {
  if (!isRecord(payload)) {
    throw new InvalidOrderEventException('notification payload must be an object');
  }
  return {
    email: readString(payload, 'email'),
    subject: readString(payload, 'subject'),
    message: readString(payload, 'message'),
    traceId: readOptionalString(payload, 'traceId'),
    spanId: readOptionalString(payload, 'spanId'),
    traceFlags: readOptionalString(payload, 'traceFlags'),
  };
}
