/**
 * Unit tests: WebhookDeliveryService
 *
 * Signed POST, delivery ledger and last-delivery bookkeeping
 */

import { describe, it, expect, beforeEach } from "@jest/globals";
import { WEBHOOK_USER_AGENT, WebhookDeliveryService } from "../WebhookDeliveryService";
import { DeliveryAttempt } from "../../../domain/entities/DeliveryAttempt";
import { WebhookSubscription } from "../../../domain/entities/WebhookSubscription";
import { buildWebhookEvent, serializeWebhookEvent } from "../../../domain/events/WebhookEvent";
import { generateSignature } from "../../../domain/services/WebhookSignature";
import { InMemoryWebhookDeliveryRepository } from "../../../infrastructure/adapters/repositories/InMemoryWebhookDeliveryRepository";
import { InMemoryWebhookSubscriptionRepository } from "../../../infrastructure/adapters/repositories/InMemoryWebhookSubscriptionRepository";
import { RecordingDeliveryPort } from "../../__tests__/support/fakes";

const NOW = new Date("2025-01-01T00:00:00.500Z");
const NOW_SECONDS = 1735689600;
const TARGET_URL = "https://example.com/hook";

class BrokenLedger extends InMemoryWebhookDeliveryRepository {
  async create(_attempt: DeliveryAttempt): Promise<DeliveryAttempt> {
    throw new Error("disk full");
  }
}

const statusEvent = () =>
  buildWebhookEvent("status.created", {
    uri: "at://did:plc:owner/io.zzstoatzz.status.record/3k2x9",
    authorDid: "did:plc:owner",
    emoji: "🚀",
    text: "shipping",
    expiresAt: null,
  });

describe("WebhookDeliveryService", () => {
  let port: RecordingDeliveryPort;
  let deliveries: InMemoryWebhookDeliveryRepository;
  let subscriptions: InMemoryWebhookSubscriptionRepository;
  let subscription: WebhookSubscription;
  let service: WebhookDeliveryService;

  beforeEach(async () => {
    port = new RecordingDeliveryPort();
    deliveries = new InMemoryWebhookDeliveryRepository();
    subscriptions = new InMemoryWebhookSubscriptionRepository(deliveries);
    subscription = WebhookSubscription.create({
      ownerDid: "did:plc:owner",
      url: TARGET_URL,
      secret: "test-secret-0123456789",
    }).subscription;
    await subscriptions.save(subscription, 10);
    service = new WebhookDeliveryService(port, deliveries, subscriptions, { timeoutMs: 5000, clock: () => NOW });
  });

  it("should POST the serialized event with signed headers", async () => {
    // Arrange
    const event = statusEvent();
    const body = serializeWebhookEvent(event);

    // Act
    await service.deliver(subscription, event);

    // Assert
    expect(port.requests).toHaveLength(1);
    const [request] = port.requests;
    expect(request.url).toBe(TARGET_URL);
    expect(request.body).toBe(body);
    expect(request.timeoutMs).toBe(5000);
    expect(request.headers).toEqual({
      "Content-Type": "application/json",
      "User-Agent": WEBHOOK_USER_AGENT,
      "X-Status-Timestamp": String(NOW_SECONDS),
      "X-Status-Event-Id": event.event_id,
      "Idempotency-Key": event.event_id,
      "X-Signature": generateSignature("test-secret-0123456789", NOW_SECONDS, body),
    });
  });

  it("should record a 2xx as delivered and stamp the subscription", async () => {
    // Arrange
    port.respond(TARGET_URL, async () => ({ status: 202, responseBody: "accepted" }));
    const event = statusEvent();

    // Act
    const attempt = await service.deliver(subscription, event);

    // Assert
    expect(attempt?.status).toBe("DELIVERED");
    expect(attempt?.responseStatus).toBe(202);
    expect(attempt?.errorMessage).toBeNull();

    const stored = await deliveries.findById(attempt?.id ?? "");
    expect(stored?.status).toBe("DELIVERED");
    expect(stored?.eventId).toBe(event.event_id);
    expect(stored?.payload).toBe(serializeWebhookEvent(event));

    const refreshed = await subscriptions.findById(subscription.id);
    expect(refreshed?.lastDeliveryAt).toEqual(NOW);
  });

  it("should record a non-2xx response as failed with its body", async () => {
    port.respond(TARGET_URL, async () => ({ status: 500, responseBody: "boom" }));

    const attempt = await service.deliver(subscription, statusEvent());

    expect(attempt?.status).toBe("FAILED");
    expect(attempt?.responseStatus).toBe(500);
    expect(attempt?.responseBody).toBe("boom");
    expect(attempt?.errorMessage).toBe("HTTP 500");
  });

  it("should record a timeout without a response status", async () => {
    // Arrange
    port.respond(TARGET_URL, async () => {
      const error = new Error("This operation was aborted");
      error.name = "AbortError";
      throw error;
    });

    // Act
    const attempt = await service.deliver(subscription, statusEvent());

    // Assert
    expect(attempt?.status).toBe("FAILED");
    expect(attempt?.responseStatus).toBeNull();
    expect(attempt?.errorMessage).toBe("Timed out after 5000ms");
  });

  it("should record transport errors by message", async () => {
    port.respond(TARGET_URL, async () => {
      throw new Error("connect ECONNREFUSED 203.0.113.7:443");
    });

    const attempt = await service.deliver(subscription, statusEvent());

    expect(attempt?.errorMessage).toBe("connect ECONNREFUSED 203.0.113.7:443");
    expect((await subscriptions.findById(subscription.id))?.lastDeliveryAt).toEqual(NOW);
  });

  it("should skip the POST when the ledger row cannot be written", async () => {
    // Arrange
    const broken = new WebhookDeliveryService(port, new BrokenLedger(), subscriptions, { timeoutMs: 5000 });

    // Act
    const attempt = await broken.deliver(subscription, statusEvent());

    // Assert
    expect(attempt).toBeNull();
    expect(port.requests).toHaveLength(0);
  });
});
