import { StatusRecord } from "../../../domain/entities/StatusRecord";
import { StatusRepository } from "../../../ports/repositories/StatusRepository";
import { DbClient } from "../knexClient";

interface StatusRow {
  uri: string;
  author_did: string;
  emoji: string;
  text: string | null;
  started_at: Date;
  expires_at: Date | null;
  indexed_at: Date;
  hidden: boolean;
}

const TABLE = "status";

// Everything a firehose record carries; `hidden` is local and survives upserts
const RECORD_COLUMNS: (keyof StatusRow)[] = ["author_did", "emoji", "text", "started_at", "expires_at", "indexed_at"];

export class KnexStatusRepository implements StatusRepository {
  constructor(private readonly db: DbClient) {}

  async upsert(status: StatusRecord): Promise<StatusRecord> {
    const [row] = await this.db<StatusRow>(TABLE)
      .insert(this.toRow(status))
      .onConflict("uri")
      .merge(RECORD_COLUMNS)
      .returning("*");

    return row ? this.mapToEntity(row) : status;
  }

  async findByUri(uri: string): Promise<StatusRecord | null> {
    const row = await this.db<StatusRow>(TABLE).where({ uri }).first();
    return row ? this.mapToEntity(row) : null;
  }

  async deleteByUri(uri: string): Promise<boolean> {
    const removed = await this.db<StatusRow>(TABLE).where({ uri }).delete();
    return removed > 0;
  }

  private toRow(status: StatusRecord): StatusRow {
    return {
      uri: status.uri,
      author_did: status.authorDid,
      emoji: status.emoji,
      text: status.text,
      started_at: status.startedAt,
      expires_at: status.expiresAt,
      indexed_at: status.indexedAt,
      hidden: status.hidden,
    };
  }

  private mapToEntity(row: StatusRow): StatusRecord {
    return StatusRecord.fromPersistence({
      uri: row.uri,
      authorDid: row.author_did,
      emoji: row.emoji,
      text: row.text,
      startedAt: row.started_at,
      expiresAt: row.expires_at,
      indexedAt: row.indexed_at,
      hidden: row.hidden,
    });
  }
}
