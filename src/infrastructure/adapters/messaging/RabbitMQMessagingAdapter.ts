/**
 * RabbitMQ Messaging Adapter
 *
 * Publishes webhook work on a durable topic exchange through a confirm
 * channel; the dispatch queue dead-letters into its own DLQ.
 */

import { connect } from "amqplib";
import { MessagingPort, OutboundEvent } from "../../../ports/MessagingPort";
import { logger } from "../../logger";

type AmqpConnection = Awaited<ReturnType<typeof connect>>;
type AmqpConfirmChannel = Awaited<ReturnType<AmqpConnection["createConfirmChannel"]>>;

export const WEBHOOKS_EXCHANGE = "status.webhooks";

export const QUEUES = {
  WEBHOOK_DISPATCH: "status.webhooks.dispatch",
} as const;

const DISPATCH_BINDING_KEY = "webhooks.#";

export class RabbitMQMessagingAdapter implements MessagingPort {
  private connection: AmqpConnection | null = null;
  private channel: AmqpConfirmChannel | null = null;
  private isInitialized = false;

  // Connection is established lazily on first publish
  constructor(private readonly uri: string) {}

  public async initialize(): Promise<void> {
    if (this.connection && this.channel && this.isInitialized) {
      return;
    }

    try {
      const connection = await connect(this.uri);
      const channel = await connection.createConfirmChannel();

      this.connection = connection;
      this.channel = channel;

      await channel.assertExchange(WEBHOOKS_EXCHANGE, "topic", { durable: true });
      await this.setupQueueWithDLQ(QUEUES.WEBHOOK_DISPATCH, WEBHOOKS_EXCHANGE, DISPATCH_BINDING_KEY);

      connection.on("error", (err: Error) => {
        logger.error({ type: "RABBITMQ_CONNECTION_ERROR", message: "RabbitMQ connection error", error: err });
        this.isInitialized = false;
      });

      connection.on("close", () => {
        logger.warn({ type: "RABBITMQ_CONNECTION_CLOSED", message: "RabbitMQ connection closed" });
        this.isInitialized = false;
      });

      this.isInitialized = true;
      logger.info({ type: "RABBITMQ_READY", message: "RabbitMQ connection established and queues configured" });
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : "Unknown error";
      logger.error({
        type: "RABBITMQ_CONNECT_FAILED",
        message: "Failed to establish RabbitMQ connection",
        payload: { error: errorMessage },
      });
      throw new Error(`RabbitMQ connection failed: ${errorMessage}`);
    }
  }

  private async setupQueueWithDLQ(queueName: string, exchange: string, routingKey: string): Promise<void> {
    const channel = this.channel;
    if (!channel) {
      throw new Error("Channel not initialized");
    }

    const dlqName = `${queueName}.dlq`;
    const dlxName = `${exchange}.dlx`;

    await channel.assertExchange(dlxName, "direct", { durable: true });

    await channel.assertQueue(dlqName, {
      durable: true,
      arguments: {
        "x-message-ttl": 86_400_000, // 24h
      },
    });
    await channel.bindQueue(dlqName, dlxName, queueName);

    await channel.assertQueue(queueName, {
      durable: true,
      arguments: {
        "x-dead-letter-exchange": dlxName,
        "x-dead-letter-routing-key": queueName,
        "x-message-ttl": 3_600_000, // 1h
      },
    });

    await channel.bindQueue(queueName, exchange, routingKey);
  }

  async publish(event: OutboundEvent): Promise<void> {
    await this.initialize();

    const channel = this.channel;
    if (!channel) {
      throw new Error("RabbitMQ channel not available");
    }

    const routingKey = event.routingKey ?? event.type;

    try {
      const published = channel.publish(WEBHOOKS_EXCHANGE, routingKey, Buffer.from(JSON.stringify(event)), {
        persistent: true,
        messageId: event.id,
        timestamp: Date.now(),
        headers: {
          "x-event-type": event.type,
          "x-idempotency-key": event.idempotencyKey ?? event.id,
          "x-trace-id": event.traceId ?? event.id,
        },
      });

      if (!published) {
        throw new Error("Failed to publish message - channel buffer full");
      }

      await channel.waitForConfirms();

      logger.debug({
        type: "RABBITMQ_PUBLISHED",
        message: "Event published to RabbitMQ",
        payload: { eventType: event.type, routingKey, eventId: event.id },
      });
    } catch (error) {
      logger.error({
        type: "RABBITMQ_PUBLISH_FAILED",
        message: "Failed to publish event to RabbitMQ",
        error,
        payload: { eventType: event.type, eventId: event.id },
      });
      throw error;
    }
  }

  async close(): Promise<void> {
    if (this.channel) {
      await this.channel.close();
      this.channel = null;
    }
    if (this.connection) {
      await this.connection.close();
      this.connection = null;
    }
    this.isInitialized = false;
  }
}
