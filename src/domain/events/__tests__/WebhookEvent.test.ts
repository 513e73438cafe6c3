import { describe, it, expect } from "@jest/globals";
import { StatusRecord } from "../../entities/StatusRecord";
import { buildWebhookEvent, isWebhookEventType, serializeWebhookEvent, subjectFromStatus } from "../WebhookEvent";

describe("WebhookEvent", () => {
  const status = StatusRecord.create({
    uri: "at://did:plc:abc/io.zzstoatzz.status.record/3k2x9",
    authorDid: "did:plc:abc",
    emoji: "🚀",
    text: "shipping",
    startedAt: new Date("2025-01-01T00:00:00.000Z"),
    expiresAt: null,
    indexedAt: new Date("2025-01-01T00:00:00.000Z"),
  });

  it("should build the payload from a status", () => {
    const event = buildWebhookEvent("status.created", subjectFromStatus(status), new Date("2025-01-01T00:00:05.000Z"));

    expect(event).toEqual({
      type: "status.created",
      user_did: "did:plc:abc",
      handle: null,
      emoji: "🚀",
      text: "shipping",
      expires_at: null,
      status_uri: "at://did:plc:abc/io.zzstoatzz.status.record/3k2x9",
      timestamp: "2025-01-01T00:00:05.000Z",
      event_id: event.event_id,
      schema: "status-webhook.v1",
    });
    expect(event.event_id).toMatch(/^[0-9a-f-]{36}$/);
  });

  it("should serialize keys in a fixed order", () => {
    const event = buildWebhookEvent("status.deleted", subjectFromStatus(status), new Date("2025-01-01T00:00:05.000Z"));

    expect(Object.keys(JSON.parse(serializeWebhookEvent(event)))).toEqual([
      "type",
      "user_did",
      "handle",
      "emoji",
      "text",
      "expires_at",
      "status_uri",
      "timestamp",
      "event_id",
      "schema",
    ]);
  });

  it("should only recognise filterable event types", () => {
    expect(isWebhookEventType("status.created")).toBe(true);
    expect(isWebhookEventType("webhook.test")).toBe(false);
  });
});
