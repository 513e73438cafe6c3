import { WebhookDeliveryService } from "../services/WebhookDeliveryService";
import { logger } from "../../infrastructure/logger";
import { WebhookSubscriptionRepository } from "../../ports/repositories/WebhookSubscriptionRepository";
import { WebhookEventEnvelope } from "./DispatchWebhooks";

interface FanOutWebhookEventOutput {
  matched: number;
  delivered: number;
  failed: number;
}

/**
 * Delivers one event to every active, matching subscription of its owner.
 * Deliveries run concurrently and one target's failure or slowness never
 * affects another's outcome.
 */
export class FanOutWebhookEvent {
  constructor(
    private readonly subscriptionRepository: WebhookSubscriptionRepository,
    private readonly deliveryService: WebhookDeliveryService
  ) {}

  async execute(envelope: WebhookEventEnvelope): Promise<FanOutWebhookEventOutput> {
    const { ownerDid, event } = envelope;

    const subscriptions = await this.subscriptionRepository.findByOwner(ownerDid);
    const targets = subscriptions.filter((subscription) => subscription.shouldReceive(event.type));

    if (targets.length === 0) {
      logger.debug({
        type: "WEBHOOK_FANOUT_NO_TARGETS",
        message: "No active subscription matches this event",
        payload: { ownerDid, eventId: event.event_id, eventType: event.type },
      });
      return { matched: 0, delivered: 0, failed: 0 };
    }

    const results = await Promise.allSettled(
      targets.map((subscription) => this.deliveryService.deliver(subscription, event))
    );

    let delivered = 0;
    let failed = 0;
    results.forEach((result, index) => {
      if (result.status === "fulfilled" && result.value?.success) {
        delivered++;
        return;
      }
      failed++;
      if (result.status === "rejected") {
        logger.error({
          type: "WEBHOOK_FANOUT_DELIVERY_REJECTED",
          message: "Delivery task rejected",
          error: result.reason,
          payload: { subscriptionId: targets[index].id, eventId: event.event_id },
        });
      }
    });

    logger.info({
      type: "WEBHOOK_FANOUT_DONE",
      message: `Fanned out to ${targets.length} subscriptions`,
      payload: { ownerDid, eventId: event.event_id, eventType: event.type, delivered, failed },
    });

    return { matched: targets.length, delivered, failed };
  }
}
