import { DeliveryAttempt } from "../../domain/entities/DeliveryAttempt";

export interface WebhookDeliveryRepository {
  /**
   * Persists a PENDING attempt before the network call.
   */
  create(attempt: DeliveryAttempt): Promise<DeliveryAttempt>;

  /**
   * The single outcome write for an attempt.
   * @throws {DeliveryAlreadyCompletedError} when the stored row is no longer PENDING
   */
  complete(attempt: DeliveryAttempt): Promise<DeliveryAttempt>;

  findById(id: string): Promise<DeliveryAttempt | null>;

  /**
   * Most recent first.
   */
  listRecentBySubscription(subscriptionId: string, limit: number): Promise<DeliveryAttempt[]>;
}
