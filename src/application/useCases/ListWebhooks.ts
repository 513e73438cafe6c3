import { WebhookSubscriptionView } from "../../domain/entities/WebhookSubscription";
import { WebhookSubscriptionRepository } from "../../ports/repositories/WebhookSubscriptionRepository";

interface ListWebhooksRequest {
  ownerDid: string;
}

interface ListWebhooksResponse {
  webhooks: WebhookSubscriptionView[];
  total: number;
}

export class ListWebhooks {
  constructor(private readonly subscriptionRepository: WebhookSubscriptionRepository) {}

  async execute(request: ListWebhooksRequest): Promise<ListWebhooksResponse> {
    const subscriptions = await this.subscriptionRepository.findByOwner(request.ownerDid);

    return {
      webhooks: subscriptions.map((subscription) => subscription.toView()),
      total: subscriptions.length,
    };
  }
}
