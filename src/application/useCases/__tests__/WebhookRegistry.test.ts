/**
 * Unit tests: webhook registry use cases
 *
 * Update, rotate, delete and list only ever see the caller's own subscriptions
 */

import { describe, it, expect, beforeEach } from "@jest/globals";
import { CreateWebhook } from "../CreateWebhook";
import { DeleteWebhook } from "../DeleteWebhook";
import { ListWebhookDeliveries } from "../ListWebhookDeliveries";
import { ListWebhooks } from "../ListWebhooks";
import { RotateWebhookSecret } from "../RotateWebhookSecret";
import { UpdateWebhook, WebhookNotFoundError } from "../UpdateWebhook";
import { DeliveryAttempt } from "../../../domain/entities/DeliveryAttempt";
import { InMemoryWebhookDeliveryRepository } from "../../../infrastructure/adapters/repositories/InMemoryWebhookDeliveryRepository";
import { InMemoryWebhookSubscriptionRepository } from "../../../infrastructure/adapters/repositories/InMemoryWebhookSubscriptionRepository";

const OWNER = "did:plc:owner";
const INTRUDER = "did:plc:intruder";

describe("webhook registry", () => {
  let deliveries: InMemoryWebhookDeliveryRepository;
  let subscriptions: InMemoryWebhookSubscriptionRepository;
  let webhookId: string;
  let originalSecret: string;

  beforeEach(async () => {
    deliveries = new InMemoryWebhookDeliveryRepository();
    subscriptions = new InMemoryWebhookSubscriptionRepository(deliveries);
    const created = await new CreateWebhook(subscriptions).execute({
      ownerDid: OWNER,
      url: "https://example.com/hook",
    });
    webhookId = created.webhook.id;
    originalSecret = created.secret;
  });

  describe("UpdateWebhook", () => {
    it("should apply the supplied fields", async () => {
      const view = await new UpdateWebhook(subscriptions).execute({
        ownerDid: OWNER,
        webhookId,
        events: "status.created",
        active: false,
      });

      expect(view.events).toBe("status.created");
      expect(view.active).toBe(false);
      expect(view.url).toBe("https://example.com/hook");
    });

    it("should return the current view when nothing is supplied", async () => {
      const view = await new UpdateWebhook(subscriptions).execute({ ownerDid: OWNER, webhookId });

      expect(view.id).toBe(webhookId);
      expect(view.events).toBe("*");
    });

    it("should treat someone else's webhook as missing", async () => {
      await expect(
        new UpdateWebhook(subscriptions).execute({ ownerDid: INTRUDER, webhookId, active: false })
      ).rejects.toThrow(WebhookNotFoundError);

      const stored = await subscriptions.findById(webhookId);
      expect(stored?.active).toBe(true);
    });

    it("should report an unknown id as missing", async () => {
      await expect(
        new UpdateWebhook(subscriptions).execute({ ownerDid: OWNER, webhookId: "nope", active: false })
      ).rejects.toThrow("Webhook not found: nope");
    });
  });

  describe("RotateWebhookSecret", () => {
    it("should replace the stored secret", async () => {
      const result = await new RotateWebhookSecret(subscriptions).execute({ ownerDid: OWNER, webhookId });

      expect(result.webhookId).toBe(webhookId);
      expect(result.secret).not.toBe(originalSecret);
      const stored = await subscriptions.findById(webhookId);
      expect(stored?.secret).toBe(result.secret);
      expect(result.rotatedAt).toBe(stored?.updatedAt.toISOString());
    });

    it("should not rotate someone else's secret", async () => {
      await expect(
        new RotateWebhookSecret(subscriptions).execute({ ownerDid: INTRUDER, webhookId })
      ).rejects.toThrow(WebhookNotFoundError);

      const stored = await subscriptions.findById(webhookId);
      expect(stored?.secret).toBe(originalSecret);
    });

    it("should keep the new secret when an update runs at the same time", async () => {
      // Act
      const [rotated, updated] = await Promise.all([
        new RotateWebhookSecret(subscriptions).execute({ ownerDid: OWNER, webhookId }),
        new UpdateWebhook(subscriptions).execute({ ownerDid: OWNER, webhookId, active: false }),
      ]);

      // Assert
      const stored = await subscriptions.findById(webhookId);
      expect(stored?.secret).toBe(rotated.secret);
      expect(stored?.secret).not.toBe(originalSecret);
      expect(stored?.active).toBe(false);
      expect(updated.maskedSecret).toBe(`****${rotated.secret.slice(-4)}`);
    });
  });

  describe("DeleteWebhook", () => {
    it("should remove the webhook and its delivery history", async () => {
      // Arrange
      await deliveries.create(
        DeliveryAttempt.pending({ subscriptionId: webhookId, eventId: "evt-1", eventType: "status.created", payload: "{}" })
      );

      // Act
      await new DeleteWebhook(subscriptions).execute({ ownerDid: OWNER, webhookId });

      // Assert
      expect(await subscriptions.findById(webhookId)).toBeNull();
      expect(deliveries.all()).toHaveLength(0);
    });

    it("should silently ignore someone else's webhook", async () => {
      await new DeleteWebhook(subscriptions).execute({ ownerDid: INTRUDER, webhookId });

      expect(await subscriptions.findById(webhookId)).not.toBeNull();
    });

    it("should succeed for an unknown id", async () => {
      await expect(
        new DeleteWebhook(subscriptions).execute({ ownerDid: OWNER, webhookId: "nope" })
      ).resolves.toBeUndefined();
    });
  });

  describe("ListWebhooks", () => {
    it("should list only the caller's webhooks, newest first", async () => {
      // Arrange
      const second = await new CreateWebhook(subscriptions).execute({
        ownerDid: OWNER,
        url: "https://example.com/second",
      });
      await new CreateWebhook(subscriptions).execute({ ownerDid: INTRUDER, url: "https://example.com/other" });

      // Act
      const result = await new ListWebhooks(subscriptions).execute({ ownerDid: OWNER });

      // Assert
      expect(result.total).toBe(2);
      expect(result.webhooks.map((w) => w.id)).toEqual([second.webhook.id, webhookId]);
    });
  });

  describe("ListWebhookDeliveries", () => {
    it("should clamp the page size and hide foreign ledgers", async () => {
      // Arrange
      for (let i = 0; i < 3; i++) {
        await deliveries.create(
          DeliveryAttempt.pending({
            subscriptionId: webhookId,
            eventId: `evt-${i}`,
            eventType: "status.created",
            payload: "{}",
          })
        );
      }
      const useCase = new ListWebhookDeliveries(subscriptions, deliveries);

      // Act
      const page = await useCase.execute({ ownerDid: OWNER, webhookId, limit: 0 });
      const all = await useCase.execute({ ownerDid: OWNER, webhookId });

      // Assert
      expect(page.map((d) => d.eventId)).toEqual(["evt-2"]);
      expect(all.map((d) => d.eventId)).toEqual(["evt-2", "evt-1", "evt-0"]);
      await expect(useCase.execute({ ownerDid: INTRUDER, webhookId })).rejects.toThrow(WebhookNotFoundError);
    });
  });
});
