import {
  WebhookLimitExceededError,
  WebhookSubscription,
  WebhookSubscriptionView,
} from "../../domain/entities/WebhookSubscription";
import { WebhookSubscriptionRepository } from "../../ports/repositories/WebhookSubscriptionRepository";

export const MAX_WEBHOOKS_PER_OWNER = 10;

interface CreateWebhookRequest {
  ownerDid: string;
  url: string;
  secret?: string;
  events?: string;
}

interface CreateWebhookResponse {
  webhook: WebhookSubscriptionView;
  secret: string; // only returned here and on rotation
}

export class CreateWebhook {
  constructor(
    private readonly subscriptionRepository: WebhookSubscriptionRepository,
    private readonly devMode: boolean = false
  ) {}

  async execute(request: CreateWebhookRequest): Promise<CreateWebhookResponse> {
    const { ownerDid, url, secret, events } = request;

    // URL, filter and secret checks live in the entity
    const created = WebhookSubscription.create({
      ownerDid,
      url,
      secret,
      events,
      devMode: this.devMode,
    });

    const inserted = await this.subscriptionRepository.save(created.subscription, MAX_WEBHOOKS_PER_OWNER);
    if (!inserted) {
      throw new WebhookLimitExceededError(MAX_WEBHOOKS_PER_OWNER);
    }

    return {
      webhook: created.subscription.toView(),
      secret: created.secret,
    };
  }
}

export { WebhookLimitExceededError };
