/**
 * Consumer: WebhookDispatcherConsumer
 *
 * Takes `webhook.dispatch` messages off the messaging layer, decodes the
 * envelope and fans the event out to the owner's matching subscriptions.
 */

import { z } from "zod";
import { webhookEventEnvelopeSchema } from "../../application/useCases/DispatchWebhooks";
import { FanOutWebhookEvent } from "../../application/useCases/FanOutWebhookEvent";
import { EventHandler } from "../../ports/MessagingPort";
import { logger } from "../logger";

const dispatchMessageSchema = z.object({
  id: z.string(),
  payload: webhookEventEnvelopeSchema,
});

export class WebhookDispatcherConsumer implements EventHandler {
  constructor(private readonly fanOut: FanOutWebhookEvent) {}

  async handle(event: unknown): Promise<void> {
    const parsed = dispatchMessageSchema.safeParse(event);
    if (!parsed.success) {
      // Redelivering a malformed message cannot fix it; drop it
      logger.warn({
        type: "WEBHOOK_DISPATCHER_INVALID_EVENT",
        message: "Invalid webhook dispatch message",
        payload: { issues: parsed.error.issues },
      });
      return;
    }

    try {
      await this.fanOut.execute(parsed.data.payload);
    } catch (error) {
      logger.error({
        type: "WEBHOOK_DISPATCHER_ERROR",
        message: "Failed to fan out webhook event",
        error,
        payload: { messageId: parsed.data.id },
      });
      throw error;
    }
  }
}
