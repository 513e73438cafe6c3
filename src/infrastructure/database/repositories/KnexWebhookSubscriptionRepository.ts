import {
  WebhookSubscription,
  WebhookSubscriptionChanges,
} from "../../../domain/entities/WebhookSubscription";
import { WebhookSubscriptionRepository } from "../../../ports/repositories/WebhookSubscriptionRepository";
import { DbClient } from "../knexClient";

interface WebhookSubscriptionRow {
  id: string;
  owner_did: string;
  url: string;
  secret: string;
  events: string;
  active: boolean;
  last_delivery_at: Date | null;
  created_at: Date;
  updated_at: Date;
}

const TABLE = "webhook_subscription";

export class KnexWebhookSubscriptionRepository implements WebhookSubscriptionRepository {
  constructor(private readonly db: DbClient) {}

  /**
   * Serializes inserts per owner with a transaction-scoped advisory lock, so
   * concurrent creates cannot both pass the count.
   */
  async save(subscription: WebhookSubscription, maxPerOwner: number): Promise<boolean> {
    return this.db.transaction(async (trx) => {
      await trx.raw("select pg_advisory_xact_lock(hashtext(?))", [subscription.ownerDid]);

      const result = await trx(TABLE).where({ owner_did: subscription.ownerDid }).count({ total: "*" }).first();
      if (Number(result?.total ?? 0) >= maxPerOwner) {
        return false;
      }

      await trx<WebhookSubscriptionRow>(TABLE).insert(this.toRow(subscription));
      return true;
    });
  }

  async findById(id: string): Promise<WebhookSubscription | null> {
    const row = await this.db<WebhookSubscriptionRow>(TABLE).where({ id }).first();
    return row ? this.mapToEntity(row) : null;
  }

  async findByOwner(ownerDid: string): Promise<WebhookSubscription[]> {
    const rows = await this.db<WebhookSubscriptionRow>(TABLE)
      .where({ owner_did: ownerDid })
      .orderBy([
        { column: "created_at", order: "desc" },
        { column: "id", order: "desc" },
      ]);
    return rows.map((row) => this.mapToEntity(row));
  }

  async updateOwned(
    id: string,
    ownerDid: string,
    changes: WebhookSubscriptionChanges,
    at: Date
  ): Promise<WebhookSubscription | null> {
    const patch: Partial<WebhookSubscriptionRow> = {};
    if (changes.url !== undefined) patch.url = changes.url;
    if (changes.events !== undefined) patch.events = changes.events;
    if (changes.active !== undefined) patch.active = changes.active;
    patch.updated_at = at;

    return this.patchOwned(id, ownerDid, patch);
  }

  async replaceSecret(id: string, ownerDid: string, secret: string, at: Date): Promise<WebhookSubscription | null> {
    return this.patchOwned(id, ownerDid, { secret, updated_at: at });
  }

  async deleteOwned(id: string, ownerDid: string): Promise<void> {
    await this.db<WebhookSubscriptionRow>(TABLE).where({ id, owner_did: ownerDid }).delete();
  }

  async markDelivered(id: string, at: Date): Promise<void> {
    await this.db<WebhookSubscriptionRow>(TABLE).where({ id }).update({ last_delivery_at: at });
  }

  private async patchOwned(
    id: string,
    ownerDid: string,
    patch: Partial<WebhookSubscriptionRow>
  ): Promise<WebhookSubscription | null> {
    const [row] = await this.db<WebhookSubscriptionRow>(TABLE)
      .where({ id, owner_did: ownerDid })
      .update(patch)
      .returning("*");
    return row ? this.mapToEntity(row) : null;
  }

  private toRow(subscription: WebhookSubscription): WebhookSubscriptionRow {
    return {
      id: subscription.id,
      owner_did: subscription.ownerDid,
      url: subscription.url,
      secret: subscription.secret,
      events: subscription.events,
      active: subscription.active,
      last_delivery_at: subscription.lastDeliveryAt,
      created_at: subscription.createdAt,
      updated_at: subscription.updatedAt,
    };
  }

  private mapToEntity(row: WebhookSubscriptionRow): WebhookSubscription {
    return WebhookSubscription.fromPersistence({
      id: row.id,
      ownerDid: row.owner_did,
      url: row.url,
      secret: row.secret,
      events: row.events,
      active: row.active,
      lastDeliveryAt: row.last_delivery_at,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    });
  }
}
