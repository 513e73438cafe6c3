import {
  WebhookNotFoundError,
  WebhookSubscription,
  WebhookSubscriptionView,
} from "../../domain/entities/WebhookSubscription";
import { WebhookSubscriptionRepository } from "../../ports/repositories/WebhookSubscriptionRepository";

interface UpdateWebhookRequest {
  ownerDid: string;
  webhookId: string;
  url?: string;
  events?: string;
  active?: boolean;
}

export class UpdateWebhook {
  constructor(
    private readonly subscriptionRepository: WebhookSubscriptionRepository,
    private readonly devMode: boolean = false
  ) {}

  async execute(request: UpdateWebhookRequest): Promise<WebhookSubscriptionView> {
    const { ownerDid, webhookId, url, events, active } = request;

    const changes = WebhookSubscription.validateChanges({ url, events, active }, this.devMode);

    // Only the supplied columns are written, so a concurrent rotation keeps its secret
    const saved =
      Object.keys(changes).length === 0
        ? await this.findOwned(webhookId, ownerDid)
        : await this.subscriptionRepository.updateOwned(webhookId, ownerDid, changes, new Date());

    // Foreign and absent ids are indistinguishable to the caller
    if (!saved) {
      throw new WebhookNotFoundError(webhookId);
    }

    return saved.toView();
  }

  private async findOwned(webhookId: string, ownerDid: string): Promise<WebhookSubscription | null> {
    const subscription = await this.subscriptionRepository.findById(webhookId);
    return subscription && subscription.isOwnedBy(ownerDid) ? subscription : null;
  }
}

export { WebhookNotFoundError };
