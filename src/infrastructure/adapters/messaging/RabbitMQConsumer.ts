/**
 * RabbitMQ Consumer
 *
 * Feeds queue messages to registered handlers with manual acks. A handler
 * failure nacks without requeue, which dead-letters the message.
 */

import { connect, type ConsumeMessage } from "amqplib";
import { EventHandler } from "../../../ports/MessagingPort";
import { logger } from "../../logger";

export type { EventHandler };

export interface QueueBinding {
  eventType: string;
  queueName: string;
}

type AmqpConnection = Awaited<ReturnType<typeof connect>>;
type AmqpChannel = Awaited<ReturnType<AmqpConnection["createChannel"]>>;

export class RabbitMQConsumer {
  private connection: AmqpConnection | null = null;
  private channel: AmqpChannel | null = null;
  private handlers: Map<string, EventHandler> = new Map();

  constructor(
    private readonly uri: string,
    private readonly queueBindings: QueueBinding[],
    private readonly prefetch: number
  ) {}

  registerHandler(eventType: string, handler: EventHandler): void {
    this.handlers.set(eventType, handler);
  }

  async start(): Promise<void> {
    try {
      const connection = await connect(this.uri);
      const channel = await connection.createChannel();

      this.connection = connection;
      this.channel = channel;

      await channel.prefetch(this.prefetch);

      for (const binding of this.queueBindings) {
        await this.consumeQueue(binding);
      }

      logger.info({
        type: "RABBITMQ_CONSUMERS_STARTED",
        message: "RabbitMQ consumers started",
        payload: { queues: this.queueBindings.map((b) => b.queueName), prefetch: this.prefetch },
      });
    } catch (error) {
      logger.error({
        type: "RABBITMQ_CONSUMERS_FAILED",
        message: "Failed to start RabbitMQ consumers",
        error,
      });
      throw error;
    }
  }

  private async consumeQueue(binding: QueueBinding): Promise<void> {
    const channel = this.channel;
    if (!channel) {
      throw new Error("Channel not initialized");
    }

    await channel.consume(
      binding.queueName,
      (msg) => {
        if (!msg) {
          return;
        }
        void this.process(channel, msg, binding);
      },
      { noAck: false }
    );
  }

  private async process(channel: AmqpChannel, msg: ConsumeMessage, binding: QueueBinding): Promise<void> {
    try {
      await this.handleMessage(msg, binding.eventType);
      channel.ack(msg);
    } catch (error) {
      logger.error({
        type: "RABBITMQ_MESSAGE_DEAD_LETTERED",
        message: "Failed to process message, sending to DLQ",
        error,
        payload: { queue: binding.queueName, messageId: msg.properties.messageId },
      });
      channel.nack(msg, false, false);
    }
  }

  private async handleMessage(msg: ConsumeMessage, eventType: string): Promise<void> {
    const handler = this.handlers.get(eventType);
    if (!handler) {
      logger.warn({
        type: "RABBITMQ_NO_HANDLER",
        message: "No handler registered for event type",
        payload: { eventType },
      });
      return;
    }

    const content: unknown = JSON.parse(msg.content.toString());
    await handler.handle(content);
  }

  async stop(): Promise<void> {
    if (this.channel) {
      await this.channel.close();
      this.channel = null;
    }
    if (this.connection) {
      await this.connection.close();
      this.connection = null;
    }
    logger.info({ type: "RABBITMQ_CONSUMERS_STOPPED", message: "RabbitMQ consumers stopped" });
  }
}
