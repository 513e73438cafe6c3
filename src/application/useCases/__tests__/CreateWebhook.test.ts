/**
 * Unit tests: CreateWebhook
 */

import { describe, it, expect, beforeEach } from "@jest/globals";
import { CreateWebhook, MAX_WEBHOOKS_PER_OWNER, WebhookLimitExceededError } from "../CreateWebhook";
import { WebhookValidationError } from "../../../domain/entities/WebhookSubscription";
import { InMemoryWebhookSubscriptionRepository } from "../../../infrastructure/adapters/repositories/InMemoryWebhookSubscriptionRepository";

const OWNER = "did:plc:owner";

describe("CreateWebhook", () => {
  let repository: InMemoryWebhookSubscriptionRepository;
  let useCase: CreateWebhook;

  beforeEach(() => {
    repository = new InMemoryWebhookSubscriptionRepository();
    useCase = new CreateWebhook(repository);
  });

  it("should create a webhook and return the secret once", async () => {
    // Act
    const result = await useCase.execute({ ownerDid: OWNER, url: "https://example.com/hook" });

    // Assert
    expect(result.secret).toMatch(/^[0-9a-f]{64}$/);
    expect(result.webhook.maskedSecret).toBe(`****${result.secret.slice(-4)}`);
    expect(result.webhook.events).toBe("*");
    expect(result.webhook.active).toBe(true);

    const stored = await repository.findById(result.webhook.id);
    expect(stored?.secret).toBe(result.secret);
  });

  it("should reject a private target outside dev mode", async () => {
    await expect(
      useCase.execute({ ownerDid: OWNER, url: "https://192.168.1.5/hook" })
    ).rejects.toThrow(WebhookValidationError);
    expect(await repository.findByOwner(OWNER)).toHaveLength(0);
  });

  it("should accept local HTTP targets in dev mode", async () => {
    const devUseCase = new CreateWebhook(repository, true);

    const result = await devUseCase.execute({ ownerDid: OWNER, url: "http://localhost:3000/hook" });

    expect(result.webhook.url).toBe("http://localhost:3000/hook");
  });

  it("should enforce the per-owner limit", async () => {
    // Arrange
    for (let i = 0; i < MAX_WEBHOOKS_PER_OWNER; i++) {
      await useCase.execute({ ownerDid: OWNER, url: `https://example.com/hook/${i}` });
    }

    // Act & Assert
    await expect(useCase.execute({ ownerDid: OWNER, url: "https://example.com/one-more" })).rejects.toThrow(
      WebhookLimitExceededError
    );
    expect(await repository.findByOwner(OWNER)).toHaveLength(MAX_WEBHOOKS_PER_OWNER);

    // Other owners are unaffected
    await expect(
      useCase.execute({ ownerDid: "did:plc:someone-else", url: "https://example.com/hook" })
    ).resolves.toBeDefined();
  });

  it("should hold the limit when creates race each other", async () => {
    // Act
    const results = await Promise.allSettled(
      Array.from({ length: MAX_WEBHOOKS_PER_OWNER + 2 }, (_, i) =>
        useCase.execute({ ownerDid: OWNER, url: `https://example.com/race/${i}` })
      )
    );

    // Assert
    const rejected = results.filter((r): r is PromiseRejectedResult => r.status === "rejected");
    expect(results.filter((r) => r.status === "fulfilled")).toHaveLength(MAX_WEBHOOKS_PER_OWNER);
    expect(rejected).toHaveLength(2);
    for (const result of rejected) {
      expect(result.reason).toBeInstanceOf(WebhookLimitExceededError);
    }
    expect(await repository.findByOwner(OWNER)).toHaveLength(MAX_WEBHOOKS_PER_OWNER);
  });
});
