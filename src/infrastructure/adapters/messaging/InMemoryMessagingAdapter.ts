/**
 * In-process MessagingPort: a bounded worker queue.
 *
 * At most `concurrency` handlers run at once and at most `maxQueueSize`
 * events wait behind them. Publishing into a full queue fails fast with
 * MessagingBackpressureError instead of growing without bound.
 */

import { EventHandler, MessagingBackpressureError, MessagingPort, OutboundEvent } from "../../../ports/MessagingPort";
import { logger } from "../../logger";

export interface InMemoryMessagingOptions {
  concurrency: number;
  maxQueueSize: number;
}

export class MessagingClosedError extends Error {
  constructor() {
    super("Messaging adapter is closed");
    this.name = "MessagingClosedError";
  }
}

export class InMemoryMessagingAdapter implements MessagingPort {
  private readonly handlers = new Map<string, EventHandler>();
  private readonly queue: OutboundEvent[] = [];
  private readonly idleWaiters: Array<() => void> = [];
  private running = 0;
  private closed = false;

  constructor(private readonly options: InMemoryMessagingOptions) {}

  registerHandler(eventType: string, handler: EventHandler): void {
    this.handlers.set(eventType, handler);
  }

  async publish(event: OutboundEvent): Promise<void> {
    if (this.closed) {
      throw new MessagingClosedError();
    }
    if (this.queue.length >= this.options.maxQueueSize) {
      throw new MessagingBackpressureError(this.options.maxQueueSize);
    }

    this.queue.push(event);
    this.pump();
  }

  /**
   * Resolves when nothing is queued or running.
   */
  onIdle(): Promise<void> {
    if (this.isIdle()) {
      return Promise.resolve();
    }
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  async close(graceMs: number = 0): Promise<void> {
    this.closed = true;
    if (this.isIdle()) {
      return;
    }

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<void>((resolve) => {
      timer = setTimeout(resolve, graceMs);
    });
    await Promise.race([this.onIdle(), timeout]);
    clearTimeout(timer);

    if (!this.isIdle()) {
      logger.warn({
        type: "MESSAGING_CLOSE_TIMEOUT",
        message: "Closed with work still pending",
        payload: { queued: this.queue.length, running: this.running },
      });
    }
  }

  private isIdle(): boolean {
    return this.queue.length === 0 && this.running === 0;
  }

  private pump(): void {
    while (this.running < this.options.concurrency) {
      const event = this.queue.shift();
      if (!event) break;
      this.running++;
      void this.run(event);
    }
  }

  private async run(event: OutboundEvent): Promise<void> {
    try {
      const handler = this.handlers.get(event.type);
      if (!handler) {
        logger.warn({
          type: "MESSAGING_NO_HANDLER",
          message: "No handler registered for event type",
          payload: { eventType: event.type, eventId: event.id },
        });
        return;
      }
      await handler.handle(event);
    } catch (error) {
      logger.error({
        type: "MESSAGING_HANDLER_FAILED",
        message: "Event handler failed",
        error,
        payload: { eventType: event.type, eventId: event.id },
      });
    } finally {
      this.running--;
      this.pump();
      if (this.isIdle()) {
        this.idleWaiters.splice(0).forEach((resolve) => resolve());
      }
    }
  }
}
