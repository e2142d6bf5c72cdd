/**
 * @fileoverview Wiring of the example order flow
 */

import { consoleLogger, type ILogger } from '../../src';
import { InMemoryBroker } from './InMemoryBroker';
import { MessagePublisher } from './MessagePublisher';
import { OrderEvent, parseEmailNotification } from './OrderEvent';
import { OrderEventConsumer, type PaymentAuthorizer } from './OrderEventConsumer';
import { InMemoryOrderRepository } from './OrderRepository';
import { OrderService } from './OrderService';
import { RoutingKeys } from './telemetry';

export interface OrderAppOptions {
  logger?: ILogger;
  generateId?: () => string;
  authorizePayment?: PaymentAuthorizer;
  clock?: () => Date;
}

export interface OrderApp {
  readonly broker: InMemoryBroker;
  readonly repository: InMemoryOrderRepository;
  readonly publisher: MessagePublisher;
  readonly service: OrderService;
  readonly consumer: OrderEventConsumer;
}

/**
 * Build the order flow and bind its queues.
 *
 * | queue                | routing keys                               |
 * |----------------------|--------------------------------------------|
 * | `order.queue`        | `order.created`                            |
 * | `payment.queue`      | `payment.processing`, `payment.confirmed`  |
 * | `shipping.queue`     | `order.shipped`                            |
 * | `notification.queue` | `notification.email`                       |
 */
export function createOrderApp(options: OrderAppOptions = {}): OrderApp {
  const logger = options.logger ?? consoleLogger;
  const broker = new InMemoryBroker(logger);
  const repository = new InMemoryOrderRepository(options.generateId);
  const publisher = new MessagePublisher(broker, logger);
  const service = new OrderService(repository, publisher, logger, options.clock);
  const consumer = new OrderEventConsumer(publisher, logger, options.authorizePayment);

  broker.subscribe('order.queue', [RoutingKeys.ORDER_CREATED], (payload) =>
    consumer.handleOrderCreated(OrderEvent.fromPayload(payload)),
  );
  broker.subscribe(
    'payment.queue',
    [RoutingKeys.PAYMENT_PROCESSING, RoutingKeys.PAYMENT_CONFIRMED],
    (payload) => consumer.handlePaymentEvent(OrderEvent.fromPayload(payload)),
  );
  broker.subscribe('shipping.queue', [RoutingKeys.ORDER_SHIPPED], (payload) =>
    consumer.handleShippingEvent(OrderEvent.fromPayload(payload)),
  );
  broker.subscribe('notification.queue', [RoutingKeys.NOTIFICATION_EMAIL], (payload) =>
    consumer.handleNotification(parseEmailNotification(payload)),
  );

  return { broker, repository, publisher, service, consumer };
}
