import { WebhookSubscriptionRepository } from "../../ports/repositories/WebhookSubscriptionRepository";

interface DeleteWebhookRequest {
  ownerDid: string;
  webhookId: string;
}

/**
 * Idempotent: an absent id and an id owned by someone else both succeed
 * without touching anything.
 */
export class DeleteWebhook {
  constructor(private readonly subscriptionRepository: WebhookSubscriptionRepository) {}

  async execute(request: DeleteWebhookRequest): Promise<void> {
    await this.subscriptionRepository.deleteOwned(request.webhookId, request.ownerDid);
  }
}
