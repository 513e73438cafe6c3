import {
  WebhookSubscription,
  WebhookSubscriptionChanges,
} from "../../../domain/entities/WebhookSubscription";
import { WebhookSubscriptionRepository } from "../../../ports/repositories/WebhookSubscriptionRepository";
import { InMemoryWebhookDeliveryRepository } from "./InMemoryWebhookDeliveryRepository";

// Every method reads and writes without an await in between, so each call is atomic.
export class InMemoryWebhookSubscriptionRepository implements WebhookSubscriptionRepository {
  private subscriptions: WebhookSubscription[] = [];

  /**
   * @param deliveries - ledger to cascade deletes into, mirroring the foreign key
   */
  constructor(private readonly deliveries?: InMemoryWebhookDeliveryRepository) {}

  async save(subscription: WebhookSubscription, maxPerOwner: number): Promise<boolean> {
    const owned = this.subscriptions.filter((s) => s.ownerDid === subscription.ownerDid).length;
    if (owned >= maxPerOwner) {
      return false;
    }
    this.subscriptions.push(subscription);
    return true;
  }

  async findById(id: string): Promise<WebhookSubscription | null> {
    return this.subscriptions.find((s) => s.id === id) ?? null;
  }

  async findByOwner(ownerDid: string): Promise<WebhookSubscription[]> {
    return this.subscriptions
      .map((subscription, seq) => ({ subscription, seq }))
      .filter(({ subscription }) => subscription.ownerDid === ownerDid)
      .sort(
        (a, b) => b.subscription.createdAt.getTime() - a.subscription.createdAt.getTime() || b.seq - a.seq
      )
      .map(({ subscription }) => subscription);
  }

  async updateOwned(
    id: string,
    ownerDid: string,
    changes: WebhookSubscriptionChanges,
    at: Date
  ): Promise<WebhookSubscription | null> {
    return this.replaceOwned(id, ownerDid, (current) => current.withChanges(changes, at));
  }

  async replaceSecret(id: string, ownerDid: string, secret: string, at: Date): Promise<WebhookSubscription | null> {
    return this.replaceOwned(id, ownerDid, (current) => current.withSecret(secret, at));
  }

  async deleteOwned(id: string, ownerDid: string): Promise<void> {
    const before = this.subscriptions.length;
    this.subscriptions = this.subscriptions.filter((s) => !(s.id === id && s.ownerDid === ownerDid));
    if (this.subscriptions.length !== before) {
      this.deliveries?.removeBySubscription(id);
    }
  }

  async markDelivered(id: string, at: Date): Promise<void> {
    const index = this.subscriptions.findIndex((s) => s.id === id);
    if (index === -1) return;
    this.subscriptions[index] = WebhookSubscription.fromPersistence({
      ...this.subscriptions[index].toProps(),
      lastDeliveryAt: at,
    });
  }

  private replaceOwned(
    id: string,
    ownerDid: string,
    change: (current: WebhookSubscription) => WebhookSubscription
  ): WebhookSubscription | null {
    const index = this.subscriptions.findIndex((s) => s.id === id && s.ownerDid === ownerDid);
    if (index === -1) return null;
    const next = change(this.subscriptions[index]);
    this.subscriptions[index] = next;
    return next;
  }
}
