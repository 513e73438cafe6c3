/**
 * Use case: TestWebhook
 *
 * Sends one `webhook.test` event to an owned subscription, bypassing its
 * filter and active flag, and waits for the outcome so the caller can show it.
 */

import { DeliveryAttempt } from "../../domain/entities/DeliveryAttempt";
import { WebhookNotFoundError } from "../../domain/entities/WebhookSubscription";
import { WEBHOOK_TEST_EVENT, buildWebhookEvent } from "../../domain/events/WebhookEvent";
import { WebhookSubscriptionRepository } from "../../ports/repositories/WebhookSubscriptionRepository";
import { WebhookDeliveryService } from "../services/WebhookDeliveryService";

export interface TestWebhookInput {
  ownerDid: string;
  webhookId: string;
}

export class WebhookTestDeliveryError extends Error {
  constructor(webhookId: string) {
    super(`Test delivery to ${webhookId} could not be recorded`);
    this.name = "WebhookTestDeliveryError";
  }
}

export class TestWebhook {
  constructor(
    private readonly subscriptionRepository: WebhookSubscriptionRepository,
    private readonly deliveryService: WebhookDeliveryService
  ) {}

  async execute(input: TestWebhookInput): Promise<DeliveryAttempt> {
    const subscription = await this.subscriptionRepository.findById(input.webhookId);
    if (!subscription || !subscription.isOwnedBy(input.ownerDid)) {
      throw new WebhookNotFoundError(input.webhookId);
    }

    const event = buildWebhookEvent(WEBHOOK_TEST_EVENT, {
      uri: `at://${input.ownerDid}/webhook.test/${subscription.id}`,
      authorDid: input.ownerDid,
      emoji: null,
      text: "test delivery",
      expiresAt: null,
    });

    const attempt = await this.deliveryService.deliver(subscription, event);
    if (!attempt) {
      throw new WebhookTestDeliveryError(subscription.id);
    }
    return attempt;
  }
}
