/**
 * @fileoverview Order aggregate of the example order flow
 *
 * Orders project their telemetry-relevant state through
 * {@link IAttributeSource}. The customer e-mail is stored but never
 * projected.
 */

import type { AttributeRecord, IAttributeSource } from '../../src';

export enum OrderStatus {
  Pending = 'PENDING',
  PaymentProcessing = 'PAYMENT_PROCESSING',
  PaymentConfirmed = 'PAYMENT_CONFIRMED',
  Preparing = 'PREPARING',
  Shipped = 'SHIPPED',
  Delivered = 'DELIVERED',
  Cancelled = 'CANCELLED',
}

/**
 * Parse an order status from its wire value.
 */
export function parseOrderStatus(value: unknown): OrderStatus | undefined {
  return Object.values(OrderStatus).find((status) => status === value);
}

export interface OrderItemRequest {
  productId: string;
  productName: string;
  quantity: number;
  unitPrice: number;
}

export interface CreateOrderRequest {
  customerName: string;
  customerEmail: string;
  items: OrderItemRequest[];
  shippingAddress?: string;
  paymentMethod?: string;
}

export interface OrderItem extends OrderItemRequest {
  subtotal: number;
}

export interface OrderProps {
  id: string;
  customerId: string;
  customerName: string;
  customerEmail: string;
  items: OrderItem[];
  totalAmount: number;
  status: OrderStatus;
  createdAt: string;
  updatedAt: string;
  shippingAddress?: string;
  paymentMethod?: string;
}

export class Order implements IAttributeSource {
  readonly id: string;
  readonly customerId: string;
  readonly customerName: string;
  readonly customerEmail: string;
  readonly items: readonly OrderItem[];
  readonly totalAmount: number;
  readonly createdAt: string;
  readonly shippingAddress?: string;
  readonly paymentMethod?: string;
  status: OrderStatus;
  updatedAt: string;

  constructor(props: OrderProps) {
    this.id = props.id;
    this.customerId = props.customerId;
    this.customerName = props.customerName;
    this.customerEmail = props.customerEmail;
    this.items = props.items;
    this.totalAmount = props.totalAmount;
    this.status = props.status;
    this.createdAt = props.createdAt;
    this.updatedAt = props.updatedAt;
    this.shippingAddress = props.shippingAddress;
    this.paymentMethod = props.paymentMethod;
  }

  /**
   * Build a pending order, pricing every line.
   */
  static place(
    id: string,
    customerId: string,
    request: CreateOrderRequest,
    now: string,
  ): Order {
    const items = request.items.map((item) => ({
      ...item,
      subtotal: item.unitPrice * item.quantity,
    }));

    return new Order({
      id,
      customerId,
      customerName: request.customerName,
      customerEmail: request.customerEmail,
      items,
      totalAmount: items.reduce((total, item) => total + item.subtotal, 0),
      status: OrderStatus.Pending,
      createdAt: now,
      updatedAt: now,
      shippingAddress: request.shippingAddress,
      paymentMethod: request.paymentMethod,
    });
  }

  attributes(): AttributeRecord {
    return {
      'order.id': this.id,
      'customer.id': this.customerId,
      'customer.name': this.customerName,
      'order.status': this.status,
      'order.total_amount': this.totalAmount.toFixed(2),
      'order.items_count': String(this.items.length),
      'order.payment_method': this.paymentMethod,
    };
  }
}

export class OrderNotFoundException extends Error {
  constructor(public readonly orderId: string) {
    super(`Order not found: ${orderId}`);
    this.name = 'OrderNotFoundException';
    Error.captureStackTrace(this, this.constructor);
  }
}
