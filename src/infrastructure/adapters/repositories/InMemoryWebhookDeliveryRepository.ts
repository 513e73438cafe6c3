import { DeliveryAlreadyCompletedError, DeliveryAttempt } from "../../../domain/entities/DeliveryAttempt";
import { WebhookDeliveryRepository } from "../../../ports/repositories/WebhookDeliveryRepository";

export class InMemoryWebhookDeliveryRepository implements WebhookDeliveryRepository {
  // insertion order breaks ties between attempts made in the same millisecond
  private attempts: DeliveryAttempt[] = [];

  async create(attempt: DeliveryAttempt): Promise<DeliveryAttempt> {
    this.attempts.push(attempt);
    return attempt;
  }

  async complete(attempt: DeliveryAttempt): Promise<DeliveryAttempt> {
    const index = this.attempts.findIndex((a) => a.id === attempt.id);
    if (index === -1) throw new Error(`Delivery ${attempt.id} not found`);

    const stored = this.attempts[index];
    if (!stored.isPending()) {
      throw new DeliveryAlreadyCompletedError(stored.id, stored.status);
    }
    this.attempts[index] = attempt;
    return attempt;
  }

  async findById(id: string): Promise<DeliveryAttempt | null> {
    return this.attempts.find((a) => a.id === id) ?? null;
  }

  async listRecentBySubscription(subscriptionId: string, limit: number): Promise<DeliveryAttempt[]> {
    return this.attempts
      .map((attempt, seq) => ({ attempt, seq }))
      .filter(({ attempt }) => attempt.subscriptionId === subscriptionId)
      .sort((a, b) => b.attempt.attemptedAt.getTime() - a.attempt.attemptedAt.getTime() || b.seq - a.seq)
      .slice(0, limit)
      .map(({ attempt }) => attempt);
  }

  removeBySubscription(subscriptionId: string): void {
    this.attempts = this.attempts.filter((a) => a.subscriptionId !== subscriptionId);
  }

  all(): DeliveryAttempt[] {
    return [...this.attempts];
  }
}
