/**
 * @fileoverview In-process message broker
 *
 * Stands in for a topic-exchange broker. Messages are serialised to JSON on
 * publish, so nothing but payload fields reaches the consumer, and they are
 * delivered from the root OpenTelemetry context, so no span of the
 * publishing side is active in the handler. Together this reproduces a hop
 * across a process boundary: the only way for the consumer span to
 * reference the producer span is the coordinates carried in the payload.
 */

import { context, ROOT_CONTEXT } from '@opentelemetry/api';
import { consoleLogger, type ILogger } from '../../src';

export type MessageHandler = (payload: unknown, routingKey: string) => unknown;

export interface PublishedMessage {
  readonly routingKey: string;
  readonly body: string;
}

interface Subscription {
  readonly queue: string;
  readonly routingKeys: ReadonlySet<string>;
  readonly handler: MessageHandler;
}

export class InMemoryBroker {
  /** Every message ever published, in order */
  readonly published: PublishedMessage[] = [];

  private readonly pending: PublishedMessage[] = [];
  private readonly subscriptions: Subscription[] = [];

  constructor(private readonly logger: ILogger = consoleLogger) {}

  /**
   * Bind a queue to routing keys and consume it with `handler`.
   */
  subscribe(queue: string, routingKeys: readonly string[], handler: MessageHandler): void {
    this.subscriptions.push({ queue, routingKeys: new Set(routingKeys), handler });
  }

  publish(routingKey: string, message: object): void {
    const published = { routingKey, body: JSON.stringify(message) };
    this.published.push(published);
    this.pending.push(published);
  }

  /**
   * Deliver pending messages, including the ones published by handlers
   * while draining, until none are left.
   *
   * A failing handler is logged and does not stop delivery.
   *
   * @returns Number of deliveries made
   */
  async drain(): Promise<number> {
    let deliveries = 0;

    for (let message = this.pending.shift(); message; message = this.pending.shift()) {
      const { routingKey, body } = message;
      const targets = this.subscriptions.filter((s) => s.routingKeys.has(routingKey));

      if (targets.length === 0) {
        this.logger.debug(`No queue bound to routing key ${routingKey}, message dropped`);
        continue;
      }

      for (const subscription of targets) {
        deliveries++;
        try {
          const payload: unknown = JSON.parse(body);
          await context.with(ROOT_CONTEXT, () => subscription.handler(payload, routingKey));
        } catch (error) {
          this.logger.error(
            `Handler for queue ${subscription.queue} failed on ${routingKey}`,
            error,
          );
        }
      }
    }

    return deliveries;
  }
}
