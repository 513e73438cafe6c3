/**
 * Use case: RotateWebhookSecret
 *
 * Replaces the signing secret of an owned subscription. The old secret stops
 * verifying immediately; the new one is returned exactly once.
 */

import { WebhookNotFoundError, generateWebhookSecret } from "../../domain/entities/WebhookSubscription";
import { WebhookSubscriptionRepository } from "../../ports/repositories/WebhookSubscriptionRepository";

export interface RotateWebhookSecretInput {
  ownerDid: string;
  webhookId: string;
}

export interface RotateWebhookSecretOutput {
  webhookId: string;
  secret: string;
  rotatedAt: string;
}

export class RotateWebhookSecret {
  constructor(private readonly subscriptionRepository: WebhookSubscriptionRepository) {}

  async execute(input: RotateWebhookSecretInput): Promise<RotateWebhookSecretOutput> {
    const secret = generateWebhookSecret();
    const saved = await this.subscriptionRepository.replaceSecret(
      input.webhookId,
      input.ownerDid,
      secret,
      new Date()
    );

    if (!saved) {
      throw new WebhookNotFoundError(input.webhookId);
    }

    return {
      webhookId: saved.id,
      secret,
      rotatedAt: saved.updatedAt.toISOString(),
    };
  }
}
