import {
  STATUS_COLLECTION,
  StatusRecord,
  buildStatusUri,
  generateRecordKey,
} from "../../domain/entities/StatusRecord";
import { subjectFromStatus } from "../../domain/events/WebhookEvent";
import { logger } from "../../infrastructure/logger";
import { webhookDispatchDroppedCounter } from "../../infrastructure/metrics/metrics";
import { MessagingBackpressureError } from "../../ports/MessagingPort";
import { StatusRepository } from "../../ports/repositories/StatusRepository";
import { DispatchWebhooks } from "./DispatchWebhooks";

interface SetStatusRequest {
  ownerDid: string;
  emoji: string;
  text?: string | null;
  expiresAt?: Date | null;
}

export class SetStatus {
  constructor(
    private readonly statusRepository: StatusRepository,
    private readonly dispatchWebhooks: DispatchWebhooks
  ) {}

  async execute(request: SetStatusRequest): Promise<StatusRecord> {
    const now = new Date();
    const rkey = generateRecordKey(now);

    const status = StatusRecord.create({
      uri: buildStatusUri(request.ownerDid, STATUS_COLLECTION, rkey),
      authorDid: request.ownerDid,
      emoji: request.emoji,
      text: request.text ?? null,
      startedAt: now,
      expiresAt: request.expiresAt ?? null,
      indexedAt: now,
    });

    const saved = await this.statusRepository.upsert(status);

    await dispatchQuietly(this.dispatchWebhooks, {
      ownerDid: request.ownerDid,
      type: "status.created",
      status: subjectFromStatus(saved),
    });

    return saved;
  }
}

/**
 * The status write has already succeeded; a failed hand-off is logged and
 * the event dropped.
 */
export async function dispatchQuietly(
  dispatchWebhooks: DispatchWebhooks,
  input: Parameters<DispatchWebhooks["execute"]>[0]
): Promise<void> {
  try {
    await dispatchWebhooks.execute(input);
  } catch (error) {
    webhookDispatchDroppedCounter.inc();
    logger.warn({
      type: error instanceof MessagingBackpressureError ? "WEBHOOK_DISPATCH_BACKPRESSURE" : "WEBHOOK_DISPATCH_FAILED",
      message: "Webhook event dropped",
      error,
      payload: { ownerDid: input.ownerDid, eventType: input.type, statusUri: input.status.uri },
    });
  }
}
