import { StatusRecord } from "../../../domain/entities/StatusRecord";
import { StatusRepository } from "../../../ports/repositories/StatusRepository";

export class InMemoryStatusRepository implements StatusRepository {
  private statuses = new Map<string, StatusRecord>();

  async upsert(status: StatusRecord): Promise<StatusRecord> {
    const existing = this.statuses.get(status.uri);
    const stored = StatusRecord.fromPersistence({
      ...status.toProps(),
      hidden: existing ? existing.hidden : status.hidden,
    });
    this.statuses.set(stored.uri, stored);
    return stored;
  }

  async findByUri(uri: string): Promise<StatusRecord | null> {
    return this.statuses.get(uri) ?? null;
  }

  async deleteByUri(uri: string): Promise<boolean> {
    return this.statuses.delete(uri);
  }
}
