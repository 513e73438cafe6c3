import { StatusRecord } from "../../domain/entities/StatusRecord";

export interface StatusRepository {
  /**
   * Inserts or fully replaces the record-derived fields of the row with the
   * same URI. Local moderation state (`hidden`) survives the replace.
   */
  upsert(status: StatusRecord): Promise<StatusRecord>;

  findByUri(uri: string): Promise<StatusRecord | null>;

  /**
   * @returns whether a row was removed
   */
  deleteByUri(uri: string): Promise<boolean>;
}
