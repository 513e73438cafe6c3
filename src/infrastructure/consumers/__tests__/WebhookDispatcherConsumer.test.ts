import { describe, it, expect, beforeEach } from "@jest/globals";
import { WebhookDispatcherConsumer } from "../WebhookDispatcherConsumer";
import { DispatchWebhooks } from "../../../application/useCases/DispatchWebhooks";
import { FanOutWebhookEvent } from "../../../application/useCases/FanOutWebhookEvent";
import { WebhookDeliveryService } from "../../../application/services/WebhookDeliveryService";
import { RecordingDeliveryPort } from "../../../application/__tests__/support/fakes";
import { WebhookSubscription } from "../../../domain/entities/WebhookSubscription";
import { MessagingPort, OutboundEvent } from "../../../ports/MessagingPort";
import { InMemoryWebhookDeliveryRepository } from "../../adapters/repositories/InMemoryWebhookDeliveryRepository";
import { InMemoryWebhookSubscriptionRepository } from "../../adapters/repositories/InMemoryWebhookSubscriptionRepository";

const OWNER = "did:plc:owner";

class UnavailableSubscriptions extends InMemoryWebhookSubscriptionRepository {
  async findByOwner(_ownerDid: string): Promise<WebhookSubscription[]> {
    throw new Error("database unavailable");
  }
}

/**
 * Captures what DispatchWebhooks publishes so the consumer sees a real message.
 */
const publishedMessage = async (): Promise<OutboundEvent> => {
  const published: OutboundEvent[] = [];
  const messaging: MessagingPort = {
    publish: async (event) => {
      published.push(event);
    },
    close: async () => undefined,
  };
  await new DispatchWebhooks(messaging).execute({
    ownerDid: OWNER,
    type: "status.created",
    status: {
      uri: `at://${OWNER}/io.zzstoatzz.status.record/3k2x9`,
      authorDid: OWNER,
      emoji: "🚀",
      text: null,
      expiresAt: null,
    },
  });
  return published[0];
};

describe("WebhookDispatcherConsumer", () => {
  let port: RecordingDeliveryPort;
  let subscriptions: InMemoryWebhookSubscriptionRepository;
  let consumer: WebhookDispatcherConsumer;

  beforeEach(async () => {
    port = new RecordingDeliveryPort();
    const deliveries = new InMemoryWebhookDeliveryRepository();
    subscriptions = new InMemoryWebhookSubscriptionRepository(deliveries);
    await subscriptions.save(
      WebhookSubscription.create({ ownerDid: OWNER, url: "https://example.com/hook" }).subscription,
      10
    );
    const service = new WebhookDeliveryService(port, deliveries, subscriptions, { timeoutMs: 5000 });
    consumer = new WebhookDispatcherConsumer(new FanOutWebhookEvent(subscriptions, service));
  });

  it("should fan out a valid dispatch message", async () => {
    const message = await publishedMessage();

    await consumer.handle(message);

    expect(port.requests).toHaveLength(1);
    expect(JSON.parse(port.requests[0].body).event_id).toBe(message.id);
  });

  it("should drop messages that do not decode", async () => {
    await expect(consumer.handle({ id: "msg-1", payload: { ownerDid: OWNER } })).resolves.toBeUndefined();
    await expect(consumer.handle("not an event")).resolves.toBeUndefined();

    expect(port.requests).toHaveLength(0);
  });

  it("should rethrow fan-out failures so the transport can dead-letter", async () => {
    const service = new WebhookDeliveryService(port, new InMemoryWebhookDeliveryRepository(), subscriptions, {
      timeoutMs: 5000,
    });
    const failing = new WebhookDispatcherConsumer(new FanOutWebhookEvent(new UnavailableSubscriptions(), service));

    await expect(failing.handle(await publishedMessage())).rejects.toThrow("database unavailable");
  });
});
