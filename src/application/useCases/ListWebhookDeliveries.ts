import { DeliveryAttempt } from "../../domain/entities/DeliveryAttempt";
import { WebhookNotFoundError } from "../../domain/entities/WebhookSubscription";
import { WebhookDeliveryRepository } from "../../ports/repositories/WebhookDeliveryRepository";
import { WebhookSubscriptionRepository } from "../../ports/repositories/WebhookSubscriptionRepository";

export const DEFAULT_DELIVERY_PAGE = 20;
export const MAX_DELIVERY_PAGE = 100;

interface ListWebhookDeliveriesRequest {
  ownerDid: string;
  webhookId: string;
  limit?: number;
}

export class ListWebhookDeliveries {
  constructor(
    private readonly subscriptionRepository: WebhookSubscriptionRepository,
    private readonly deliveryRepository: WebhookDeliveryRepository
  ) {}

  async execute(request: ListWebhookDeliveriesRequest): Promise<DeliveryAttempt[]> {
    const subscription = await this.subscriptionRepository.findById(request.webhookId);
    if (!subscription || !subscription.isOwnedBy(request.ownerDid)) {
      throw new WebhookNotFoundError(request.webhookId);
    }

    const limit = Math.min(Math.max(request.limit ?? DEFAULT_DELIVERY_PAGE, 1), MAX_DELIVERY_PAGE);
    return this.deliveryRepository.listRecentBySubscription(subscription.id, limit);
  }
}
