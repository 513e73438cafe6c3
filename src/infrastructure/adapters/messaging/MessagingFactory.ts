/**
 * Builds the MessagingPort for the configured driver and wires the handlers
 * that consume from it.
 *
 * `memory`: in-process bounded worker queue (default).
 * `rabbitmq`: confirm-channel publisher plus a consumer whose prefetch equals
 * the dispatch concurrency.
 */

import { EventHandler, MessagingPort, OutboundEvent } from "../../../ports/MessagingPort";
import { logger } from "../../logger";
import { InMemoryMessagingAdapter } from "./InMemoryMessagingAdapter";
import { RabbitMQConsumer } from "./RabbitMQConsumer";
import { QUEUES, RabbitMQMessagingAdapter } from "./RabbitMQMessagingAdapter";

export interface MessagingConfig {
  driver: "memory" | "rabbitmq";
  rabbitmqUri?: string;
  concurrency: number;
  maxQueueSize: number;
}

// Event type -> queue it is consumed from on RabbitMQ
const QUEUE_FOR_EVENT: Record<string, string> = {
  "webhook.dispatch": QUEUES.WEBHOOK_DISPATCH,
};

class RabbitMQMessaging implements MessagingPort {
  constructor(
    private readonly publisher: RabbitMQMessagingAdapter,
    private readonly consumer: RabbitMQConsumer
  ) {}

  publish(event: OutboundEvent): Promise<void> {
    return this.publisher.publish(event);
  }

  // Unacked messages go back to the broker, so there is nothing to drain locally
  async close(): Promise<void> {
    await this.consumer.stop();
    await this.publisher.close();
  }
}

export class MessagingFactory {
  static async create(config: MessagingConfig, handlers: Record<string, EventHandler>): Promise<MessagingPort> {
    if (config.driver === "rabbitmq") {
      if (!config.rabbitmqUri) {
        throw new Error("RABBITMQ_URI is required for the rabbitmq messaging driver");
      }

      const publisher = new RabbitMQMessagingAdapter(config.rabbitmqUri);
      await publisher.initialize();

      const bindings = Object.keys(handlers).map((eventType) => ({
        eventType,
        queueName: QUEUE_FOR_EVENT[eventType] ?? eventType,
      }));
      const consumer = new RabbitMQConsumer(config.rabbitmqUri, bindings, config.concurrency);
      for (const [eventType, handler] of Object.entries(handlers)) {
        consumer.registerHandler(eventType, handler);
      }
      await consumer.start();

      return new RabbitMQMessaging(publisher, consumer);
    }

    const adapter = new InMemoryMessagingAdapter({
      concurrency: config.concurrency,
      maxQueueSize: config.maxQueueSize,
    });
    for (const [eventType, handler] of Object.entries(handlers)) {
      adapter.registerHandler(eventType, handler);
    }

    logger.info({
      type: "MESSAGING_IN_MEMORY",
      message: "Using in-memory messaging",
      payload: { concurrency: config.concurrency, maxQueueSize: config.maxQueueSize },
    });

    return adapter;
  }
}
