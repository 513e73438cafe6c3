import {
  WebhookSubscription,
  WebhookSubscriptionChanges,
} from "../../domain/entities/WebhookSubscription";

export interface WebhookSubscriptionRepository {
  /**
   * Inserts the subscription unless its owner already holds `maxPerOwner`.
   * The count and the insert are one atomic step.
   * @returns whether the row was inserted
   */
  save(subscription: WebhookSubscription, maxPerOwner: number): Promise<boolean>;

  findById(id: string): Promise<WebhookSubscription | null>;

  /**
   * Newest first.
   */
  findByOwner(ownerDid: string): Promise<WebhookSubscription[]>;

  /**
   * Writes only the given columns of a row owned by `ownerDid`.
   * @returns the stored row after the write, or null when absent or foreign
   */
  updateOwned(
    id: string,
    ownerDid: string,
    changes: WebhookSubscriptionChanges,
    at: Date
  ): Promise<WebhookSubscription | null>;

  /**
   * Writes only the secret of a row owned by `ownerDid`.
   * @returns the stored row after the write, or null when absent or foreign
   */
  replaceSecret(id: string, ownerDid: string, secret: string, at: Date): Promise<WebhookSubscription | null>;

  /**
   * Removes the row only when it belongs to `ownerDid`; a no-op otherwise.
   */
  deleteOwned(id: string, ownerDid: string): Promise<void>;

  markDelivered(id: string, at: Date): Promise<void>;
}
