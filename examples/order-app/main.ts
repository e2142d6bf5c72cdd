/**
 * Example order flow, printing finished spans to the console.
 *
 * Demonstrates:
 * - `@TraceSpan` / `@SpanAttribute` on services
 * - enrichment from domain objects
 * - consumer spans linked to the producer spans of their messages
 *
 * Environment variables (`SPANLINK_LOG_LEVEL`, `SPANLINK_ENABLED`, ...)
 * are honoured through `loadTracingOptionsFromEnv`.
 */

import { AsyncLocalStorageContextManager } from '@opentelemetry/context-async-hooks';
import {
  BasicTracerProvider,
  ConsoleSpanExporter,
  SimpleSpanProcessor,
} from '@opentelemetry/sdk-trace-base';
import { configureTracing, consoleLogger, loadTracingOptionsFromEnv } from '../../src';
import { createOrderApp } from './app';
import { OrderStatus } from './Order';

async function main(): Promise<void> {
  const provider = new BasicTracerProvider();
  provider.addSpanProcessor(new SimpleSpanProcessor(new ConsoleSpanExporter()));
  provider.register({ contextManager: new AsyncLocalStorageContextManager() });

  configureTracing({ tracerName: 'order-app', ...loadTracingOptionsFromEnv() });

  const app = createOrderApp();

  const order = await app.service.createOrder('customer-1', {
    customerName: 'Test Customer',
    customerEmail: 'customer@example.com',
    items: [
      { productId: 'sku-1', productName: 'Notebook', quantity: 2, unitPrice: 12.5 },
      { productId: 'sku-2', productName: 'Pen', quantity: 1, unitPrice: 5 },
    ],
    shippingAddress: '1 Example Street',
    paymentMethod: 'card',
  });

  await app.service.updateOrderStatus(order.id, OrderStatus.PaymentProcessing);
  await app.service.updateOrderStatus(order.id, OrderStatus.Shipped);

  try {
    await app.service.getOrder('missing');
  } catch (error) {
    consoleLogger.info('Lookup failed as expected', error instanceof Error ? error.message : error);
  }

  const deliveries = await app.broker.drain();
  consoleLogger.info(`Delivered ${deliveries} messages`);
  for (const email of app.consumer.sentEmails) {
    consoleLogger.info(`Sent "${email.subject}": ${email.message}`);
  }

  await provider.shutdown();
}

if (require.main === module) {
  main().catch((error: unknown) => {
    consoleLogger.error('Example failed', error);
    process.exitCode = 1;
  });
}
