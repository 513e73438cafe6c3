import { randomUUID } from "crypto";
import { StatusRecord } from "../entities/StatusRecord";

/**
 * Event types a subscription can filter on.
 */
export const WEBHOOK_EVENT_TYPES = ["status.created", "status.deleted"] as const;

export type WebhookEventType = (typeof WEBHOOK_EVENT_TYPES)[number];

/** Sent by TestWebhook only; not a filterable token. */
export const WEBHOOK_TEST_EVENT = "webhook.test";

export type DeliverableEventType = WebhookEventType | typeof WEBHOOK_TEST_EVENT;

export const WEBHOOK_SCHEMA_VERSION = "status-webhook.v1";

export function isWebhookEventType(value: string): value is WebhookEventType {
  return (WEBHOOK_EVENT_TYPES as readonly string[]).includes(value);
}

/**
 * Wire payload, serialized with snake_case keys in this exact order.
 */
export interface WebhookEventPayload {
  type: DeliverableEventType;
  user_did: string;
  handle: string | null;
  emoji: string | null;
  text: string | null;
  expires_at: string | null;
  status_uri: string;
  timestamp: string;
  event_id: string;
  schema: typeof WEBHOOK_SCHEMA_VERSION;
}

export interface StatusEventSubject {
  uri: string;
  authorDid: string;
  emoji: string | null;
  text: string | null;
  expiresAt: Date | null;
  handle?: string | null;
}

export function subjectFromStatus(status: StatusRecord): StatusEventSubject {
  return {
    uri: status.uri,
    authorDid: status.authorDid,
    emoji: status.emoji,
    text: status.text,
    expiresAt: status.expiresAt,
  };
}

export function buildWebhookEvent(
  type: DeliverableEventType,
  subject: StatusEventSubject,
  now: Date = new Date()
): WebhookEventPayload {
  return {
    type,
    user_did: subject.authorDid,
    handle: subject.handle ?? null,
    emoji: subject.emoji,
    text: subject.text,
    expires_at: subject.expiresAt ? subject.expiresAt.toISOString() : null,
    status_uri: subject.uri,
    timestamp: now.toISOString(),
    event_id: randomUUID(),
    schema: WEBHOOK_SCHEMA_VERSION,
  };
}

/**
 * Stable JSON form: the object literal above fixes key order, and the same
 * string is both signed and sent, so receivers verify exactly these bytes.
 */
export function serializeWebhookEvent(event: WebhookEventPayload): string {
  return JSON.stringify({
    type: event.type,
    user_did: event.user_did,
    handle: event.handle,
    emoji: event.emoji,
    text: event.text,
    expires_at: event.expires_at,
    status_uri: event.status_uri,
    timestamp: event.timestamp,
    event_id: event.event_id,
    schema: event.schema,
  });
}
