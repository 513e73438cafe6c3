/**
 * Use case: DispatchWebhooks
 *
 * Builds the wire event for a local status change and hands it to the
 * messaging layer. Resolves once the event is queued; delivery happens in
 * WebhookDispatcherConsumer -> FanOutWebhookEvent.
 */

import { z } from "zod";
import {
  StatusEventSubject,
  WEBHOOK_EVENT_TYPES,
  WEBHOOK_SCHEMA_VERSION,
  WEBHOOK_TEST_EVENT,
  WebhookEventPayload,
  WebhookEventType,
  buildWebhookEvent,
} from "../../domain/events/WebhookEvent";
import { MessagingPort } from "../../ports/MessagingPort";

export const WEBHOOK_DISPATCH_EVENT = "webhook.dispatch";

interface DispatchWebhooksInput {
  ownerDid: string;
  type: WebhookEventType;
  status: StatusEventSubject;
  traceId?: string;
}

interface DispatchWebhooksOutput {
  published: boolean;
  eventId: string;
}

export interface WebhookEventEnvelope {
  ownerDid: string;
  event: WebhookEventPayload;
}

const webhookEventPayloadSchema = z.object({
  type: z.union([z.enum(WEBHOOK_EVENT_TYPES), z.literal(WEBHOOK_TEST_EVENT)]),
  user_did: z.string().min(1),
  handle: z.string().nullable(),
  emoji: z.string().nullable(),
  text: z.string().nullable(),
  expires_at: z.string().nullable(),
  status_uri: z.string().min(1),
  timestamp: z.string(),
  event_id: z.string().min(1),
  schema: z.literal(WEBHOOK_SCHEMA_VERSION),
});

/**
 * Decodes the `payload` of a `webhook.dispatch` message coming back off the queue.
 */
export const webhookEventEnvelopeSchema = z.object({
  ownerDid: z.string().min(1),
  event: webhookEventPayloadSchema,
});

export class DispatchWebhooks {
  constructor(private readonly messaging: MessagingPort) {}

  async execute(input: DispatchWebhooksInput): Promise<DispatchWebhooksOutput> {
    const event = buildWebhookEvent(input.type, input.status);
    const envelope: WebhookEventEnvelope = { ownerDid: input.ownerDid, event };

    await this.messaging.publish({
      id: event.event_id,
      type: WEBHOOK_DISPATCH_EVENT,
      timestamp: event.timestamp,
      version: "v1",
      traceId: input.traceId,
      routingKey: `webhooks.${input.type}`,
      idempotencyKey: event.event_id,
      payload: envelope,
    });

    return {
      published: true,
      eventId: event.event_id,
    };
  }
}
