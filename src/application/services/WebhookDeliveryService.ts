/**
 * Single signed delivery to one subscription, recorded in the ledger.
 *
 * The ledger row is written PENDING before the network call and completed
 * exactly once afterwards. `deliver` never throws: transport failures and
 * ledger write failures end up in the log and, where possible, in the row.
 */

import { DeliveryAttempt } from "../../domain/entities/DeliveryAttempt";
import { WebhookSubscription } from "../../domain/entities/WebhookSubscription";
import { WebhookEventPayload, serializeWebhookEvent } from "../../domain/events/WebhookEvent";
import { generateSignature } from "../../domain/services/WebhookSignature";
import { webhookDeliveriesCounter } from "../../infrastructure/metrics/metrics";
import { logger } from "../../infrastructure/logger";
import { WebhookDeliveryPort } from "../../ports/WebhookDeliveryPort";
import { WebhookDeliveryRepository } from "../../ports/repositories/WebhookDeliveryRepository";
import { WebhookSubscriptionRepository } from "../../ports/repositories/WebhookSubscriptionRepository";

export const WEBHOOK_USER_AGENT = "status-webhooks/1.0";

export const WEBHOOK_HEADERS = {
  TIMESTAMP: "X-Status-Timestamp",
  EVENT_ID: "X-Status-Event-Id",
  IDEMPOTENCY_KEY: "Idempotency-Key",
  SIGNATURE: "X-Signature",
} as const;

export interface WebhookDeliveryServiceOptions {
  timeoutMs: number;
  clock?: () => Date;
}

export class WebhookDeliveryService {
  private readonly clock: () => Date;

  constructor(
    private readonly deliveryPort: WebhookDeliveryPort,
    private readonly deliveryRepository: WebhookDeliveryRepository,
    private readonly subscriptionRepository: WebhookSubscriptionRepository,
    private readonly options: WebhookDeliveryServiceOptions
  ) {
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * @returns the completed attempt, or null when the ledger row could not be created
   */
  async deliver(subscription: WebhookSubscription, event: WebhookEventPayload): Promise<DeliveryAttempt | null> {
    const body = serializeWebhookEvent(event);

    let attempt: DeliveryAttempt;
    try {
      attempt = await this.deliveryRepository.create(
        DeliveryAttempt.pending({
          subscriptionId: subscription.id,
          eventId: event.event_id,
          eventType: event.type,
          payload: body,
        })
      );
    } catch (error) {
      logger.error({
        type: "WEBHOOK_LEDGER_CREATE_FAILED",
        message: "Could not record delivery attempt, skipping delivery",
        error,
        payload: { subscriptionId: subscription.id, eventId: event.event_id },
      });
      return null;
    }

    const timestamp = Math.floor(this.clock().getTime() / 1000);
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
      "User-Agent": WEBHOOK_USER_AGENT,
      [WEBHOOK_HEADERS.TIMESTAMP]: String(timestamp),
      [WEBHOOK_HEADERS.EVENT_ID]: event.event_id,
      [WEBHOOK_HEADERS.IDEMPOTENCY_KEY]: event.event_id,
      [WEBHOOK_HEADERS.SIGNATURE]: generateSignature(subscription.secret, timestamp, body),
    };

    const startedAt = Date.now();
    let completed: DeliveryAttempt;
    try {
      const response = await this.deliveryPort.post({
        url: subscription.url,
        headers,
        body,
        timeoutMs: this.options.timeoutMs,
      });
      completed = attempt.complete({
        responseStatus: response.status,
        responseBody: response.responseBody,
        errorMessage: response.status >= 200 && response.status < 300 ? null : `HTTP ${response.status}`,
      });
    } catch (error) {
      completed = attempt.complete({
        responseStatus: null,
        responseBody: null,
        errorMessage: describeTransportError(error, this.options.timeoutMs),
      });
    }

    webhookDeliveriesCounter.inc({ status: completed.status.toLowerCase() });
    logger.info({
      type: completed.success ? "WEBHOOK_DELIVERED" : "WEBHOOK_DELIVERY_FAILED",
      message: completed.success ? "Webhook delivered" : "Webhook delivery failed",
      payload: {
        subscriptionId: subscription.id,
        eventId: event.event_id,
        eventType: event.type,
        responseStatus: completed.responseStatus,
        errorMessage: completed.errorMessage,
        durationMs: Date.now() - startedAt,
      },
    });

    try {
      completed = await this.deliveryRepository.complete(completed);
    } catch (error) {
      logger.error({
        type: "WEBHOOK_LEDGER_COMPLETE_FAILED",
        message: "Could not record delivery outcome",
        error,
        payload: { deliveryId: attempt.id },
      });
    }

    try {
      await this.subscriptionRepository.markDelivered(subscription.id, this.clock());
    } catch (error) {
      logger.warn({
        type: "WEBHOOK_MARK_DELIVERED_FAILED",
        message: "Could not update last delivery time",
        error,
        payload: { subscriptionId: subscription.id },
      });
    }

    return completed;
  }
}

function describeTransportError(error: unknown, timeoutMs: number): string {
  if (error instanceof Error) {
    if (error.name === "AbortError" || error.name === "TimeoutError") {
      return `Timed out after ${timeoutMs}ms`;
    }
    return error.message;
  }
  return "Unknown delivery error";
}
