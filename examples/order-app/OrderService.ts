/**
 * @fileoverview Order use cases
 *
 * Every public operation is a traced span. Identifiers reach the span as
 * attributes through `@SpanAttribute`, and the persisted order adds its
 * own attributes through the enrichment shortcut.
 */

import {
  SpanAttribute,
  TraceSpan,
  addSpanAttributes,
  addSpanEvent,
  consoleLogger,
  type ILogger,
} from '../../src';
import type { MessagePublisher } from './MessagePublisher';
import {
  Order,
  OrderNotFoundException,
  OrderStatus,
  type CreateOrderRequest,
} from './Order';
import { OrderEvent, OrderEventType, eventTypeForStatus } from './OrderEvent';
import type { IOrderRepository } from './OrderRepository';
import { SpanNames } from './telemetry';

export class OrderService {
  constructor(
    private readonly repository: IOrderRepository,
    private readonly publisher: MessagePublisher,
    private readonly logger: ILogger = consoleLogger,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  @TraceSpan({ name: SpanNames.ORDER_CREATE, attributes: ['operation:create', 'entity:order'] })
  async createOrder(
    @SpanAttribute('customer.id') customerId: string,
    request: CreateOrderRequest,
  ): Promise<Order> {
    this.logger.info(`Creating new order for customer: ${customerId}`);

    const draft = Order.place(
      this.repository.nextId(),
      customerId,
      request,
      this.clock().toISOString(),
    );
    const order = await this.repository.save(draft);
    addSpanAttributes(order);

    this.publishOrderEvent(order, OrderEventType.OrderCreated);
    return order;
  }

  @TraceSpan(SpanNames.ORDER_GET)
  async getOrder(@SpanAttribute('order.id') orderId: string): Promise<Order> {
    const order = await this.repository.findById(orderId);
    if (!order) {
      throw new OrderNotFoundException(orderId);
    }
    return order;
  }

  @TraceSpan(SpanNames.ORDER_LIST)
  async getAllOrders(): Promise<Order[]> {
    const orders = await this.repository.findAll();
    addSpanAttributes({ 'order.count': String(orders.length) });
    return orders;
  }

  @TraceSpan(SpanNames.ORDER_LIST_BY_CUSTOMER)
  async getOrdersByCustomerId(
    @SpanAttribute('customer.id') customerId: string,
  ): Promise<Order[]> {
    const orders = await this.repository.findByCustomerId(customerId);
    addSpanAttributes({ 'order.count': String(orders.length) });
    return orders;
  }

  @TraceSpan({ name: SpanNames.ORDER_UPDATE_STATUS, attributes: ['operation:update'] })
  async updateOrderStatus(
    @SpanAttribute('order.id') orderId: string,
    @SpanAttribute('order.new_status') status: OrderStatus,
  ): Promise<Order> {
    const order = await this.getOrder(orderId);
    const previous = order.status;

    order.status = status;
    order.updatedAt = this.clock().toISOString();
    const saved = await this.repository.save(order);

    addSpanEvent('order.status_changed', {
      'order.previous_status': previous,
      'order.status': status,
    });
    this.logger.info(`Order ${orderId} status updated from ${previous} to ${status}`);

    this.publishOrderEvent(saved, eventTypeForStatus(status));
    return saved;
  }

  @TraceSpan(SpanNames.ORDER_CANCEL)
  async cancelOrder(@SpanAttribute('order.id') orderId: string): Promise<Order> {
    return this.updateOrderStatus(orderId, OrderStatus.Cancelled);
  }

  private publishOrderEvent(order: Order, eventType: OrderEventType): void {
    this.publisher.publishOrderEvent(
      OrderEvent.forOrder(order, eventType, this.clock().toISOString()),
    );
  }
}
