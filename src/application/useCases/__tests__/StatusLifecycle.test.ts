/**
 * Integration tests: local status writes through to webhook delivery
 *
 * SetStatus / DeleteStatus -> messaging -> WebhookDispatcherConsumer -> FanOutWebhookEvent
 */

import { describe, it, expect, beforeEach, afterEach } from "@jest/globals";
import { DeleteStatus, StatusNotFoundError } from "../DeleteStatus";
import { DispatchWebhooks } from "../DispatchWebhooks";
import { SetStatus } from "../SetStatus";
import { env } from "../../../config/env";
import { Container, buildContainer } from "../../../container";
import { verifySignature } from "../../../domain/services/WebhookSignature";
import { InMemoryMessagingAdapter } from "../../../infrastructure/adapters/messaging/InMemoryMessagingAdapter";
import { InMemoryStatusRepository } from "../../../infrastructure/adapters/repositories/InMemoryStatusRepository";
import { MessagingBackpressureError, MessagingPort } from "../../../ports/MessagingPort";
import { RecordingDeliveryPort } from "../../__tests__/support/fakes";

const OWNER = "did:plc:owner";

const inMemoryMessaging = (container: Container): InMemoryMessagingAdapter => {
  if (!(container.messaging instanceof InMemoryMessagingAdapter)) {
    throw new Error("expected the in-memory messaging driver");
  }
  return container.messaging;
};

describe("status lifecycle", () => {
  let port: RecordingDeliveryPort;
  let container: Container;

  beforeEach(async () => {
    port = new RecordingDeliveryPort();
    container = await buildContainer(env, { deliveryPort: port });
  });

  afterEach(async () => {
    await container.messaging.close(1000);
    await container.close();
  });

  it("should deliver status.created to a subscriber after a local write", async () => {
    // Arrange
    const { secret } = await container.app.createWebhook.execute({
      ownerDid: OWNER,
      url: "https://example.com/hook",
      events: "status.created",
    });

    // Act
    const status = await container.app.setStatus.execute({ ownerDid: OWNER, emoji: "🚀", text: "shipping" });
    await inMemoryMessaging(container).onIdle();

    // Assert
    expect(status.uri).toMatch(/^at:\/\/did:plc:owner\/io\.zzstoatzz\.status\.record\/[234567a-z]{13}$/);
    expect(port.requests).toHaveLength(1);

    const [request] = port.requests;
    const body = JSON.parse(request.body);
    expect(body.type).toBe("status.created");
    expect(body.emoji).toBe("🚀");
    expect(body.text).toBe("shipping");
    expect(body.status_uri).toBe(status.uri);
    expect(
      verifySignature(secret, Number(request.headers["X-Status-Timestamp"]), request.body, request.headers["X-Signature"])
    ).toBe(true);
  });

  it("should deliver status.deleted when the owner deletes", async () => {
    // Arrange
    await container.app.createWebhook.execute({
      ownerDid: OWNER,
      url: "https://example.com/hook",
      events: "status.deleted",
    });
    const status = await container.app.setStatus.execute({ ownerDid: OWNER, emoji: "🌙" });
    await inMemoryMessaging(container).onIdle();

    // Act
    await container.app.deleteStatus.execute({ ownerDid: OWNER, uri: status.uri });
    await inMemoryMessaging(container).onIdle();

    // Assert
    expect(port.requests).toHaveLength(1);
    expect(JSON.parse(port.requests[0].body).type).toBe("status.deleted");
    expect(await container.repositories.statuses.findByUri(status.uri)).toBeNull();
  });

  it("should not let another account delete a status", async () => {
    const status = await container.app.setStatus.execute({ ownerDid: OWNER, emoji: "🌙" });

    await expect(
      container.app.deleteStatus.execute({ ownerDid: "did:plc:intruder", uri: status.uri })
    ).rejects.toThrow(StatusNotFoundError);
    expect(await container.repositories.statuses.findByUri(status.uri)).not.toBeNull();
  });
});

describe("status writes under messaging backpressure", () => {
  const fullQueue: MessagingPort = {
    publish: async () => {
      throw new MessagingBackpressureError(1);
    },
    close: async () => undefined,
  };

  it("should keep the status and drop the event", async () => {
    // Arrange
    const statuses = new InMemoryStatusRepository();
    const setStatus = new SetStatus(statuses, new DispatchWebhooks(fullQueue));

    // Act
    const status = await setStatus.execute({ ownerDid: OWNER, emoji: "🚀" });

    // Assert
    expect(await statuses.findByUri(status.uri)).not.toBeNull();
  });

  it("should still delete when the event cannot be queued", async () => {
    const statuses = new InMemoryStatusRepository();
    const dispatch = new DispatchWebhooks(fullQueue);
    const status = await new SetStatus(statuses, dispatch).execute({ ownerDid: OWNER, emoji: "🚀" });

    await new DeleteStatus(statuses, dispatch).execute({ ownerDid: OWNER, uri: status.uri });

    expect(await statuses.findByUri(status.uri)).toBeNull();
  });
});
