import {
  DeliveryAlreadyCompletedError,
  DeliveryAttempt,
  DeliveryStatus,
} from "../../../domain/entities/DeliveryAttempt";
import { WebhookDeliveryRepository } from "../../../ports/repositories/WebhookDeliveryRepository";
import { DbClient } from "../knexClient";

interface WebhookDeliveryRow {
  id: string;
  subscription_id: string;
  event_id: string;
  event_type: string;
  payload: string;
  attempted_at: Date;
  status: DeliveryStatus;
  response_status: number | null;
  response_body: string | null;
  error_message: string | null;
  success: boolean;
  retry_count: number;
  next_retry_at: Date | null;
}

const TABLE = "webhook_delivery";

export class KnexWebhookDeliveryRepository implements WebhookDeliveryRepository {
  constructor(private readonly db: DbClient) {}

  async create(attempt: DeliveryAttempt): Promise<DeliveryAttempt> {
    await this.db<WebhookDeliveryRow>(TABLE).insert(this.toRow(attempt));
    return attempt;
  }

  async complete(attempt: DeliveryAttempt): Promise<DeliveryAttempt> {
    const updated = await this.db<WebhookDeliveryRow>(TABLE)
      .where({ id: attempt.id, status: "PENDING" })
      .update({
        status: attempt.status,
        response_status: attempt.responseStatus,
        response_body: attempt.responseBody,
        error_message: attempt.errorMessage,
        success: attempt.success,
      });

    if (updated === 0) {
      const stored = await this.findById(attempt.id);
      if (!stored) throw new Error(`Delivery ${attempt.id} not found`);
      throw new DeliveryAlreadyCompletedError(stored.id, stored.status);
    }

    return attempt;
  }

  async findById(id: string): Promise<DeliveryAttempt | null> {
    const row = await this.db<WebhookDeliveryRow>(TABLE).where({ id }).first();
    return row ? this.mapToEntity(row) : null;
  }

  async listRecentBySubscription(subscriptionId: string, limit: number): Promise<DeliveryAttempt[]> {
    const rows = await this.db<WebhookDeliveryRow>(TABLE)
      .where({ subscription_id: subscriptionId })
      .orderBy([
        { column: "attempted_at", order: "desc" },
        { column: "id", order: "desc" },
      ])
      .limit(limit);
    return rows.map((row) => this.mapToEntity(row));
  }

  private toRow(attempt: DeliveryAttempt): WebhookDeliveryRow {
    return {
      id: attempt.id,
      subscription_id: attempt.subscriptionId,
      event_id: attempt.eventId,
      event_type: attempt.eventType,
      payload: attempt.payload,
      attempted_at: attempt.attemptedAt,
      status: attempt.status,
      response_status: attempt.responseStatus,
      response_body: attempt.responseBody,
      error_message: attempt.errorMessage,
      success: attempt.success,
      retry_count: attempt.retryCount,
      next_retry_at: attempt.nextRetryAt,
    };
  }

  private mapToEntity(row: WebhookDeliveryRow): DeliveryAttempt {
    return DeliveryAttempt.fromPersistence({
      id: row.id,
      subscriptionId: row.subscription_id,
      eventId: row.event_id,
      eventType: row.event_type,
      payload: row.payload,
      attemptedAt: row.attempted_at,
      status: row.status,
      responseStatus: row.response_status,
      responseBody: row.response_body,
      errorMessage: row.error_message,
      retryCount: row.retry_count,
      nextRetryAt: row.next_retry_at,
    });
  }
}
