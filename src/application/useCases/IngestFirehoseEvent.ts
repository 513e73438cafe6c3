/**
 * Use case: IngestFirehoseEvent
 *
 * Applies one firehose commit to the local status store. Idempotent: the
 * stream is at-least-once and may reorder, so create/update is an upsert by
 * URI and deleting an absent row succeeds.
 *
 * Does not dispatch webhooks; remote echoes of local writes would otherwise
 * notify subscribers twice.
 */

import { StatusRecord, buildStatusUri } from "../../domain/entities/StatusRecord";
import { FirehoseCommit } from "../../domain/events/FirehoseCommit";
import { RecordDecodeError, decodeStatusRecordBody, resolveExpiry } from "../../domain/validators/StatusRecordSchema";
import { StatusRepository } from "../../ports/repositories/StatusRepository";

export type IngestOutcome = "upserted" | "deleted" | "skipped";

export interface IngestFirehoseEventOutput {
  uri: string;
  outcome: IngestOutcome;
}

export class IngestFirehoseEvent {
  constructor(
    private readonly statusRepository: StatusRepository,
    private readonly clock: () => Date = () => new Date()
  ) {}

  /**
   * @throws {RecordDecodeError} when a create/update carries no usable record
   */
  async execute(commit: FirehoseCommit): Promise<IngestFirehoseEventOutput> {
    const uri = buildStatusUri(commit.did, commit.collection, commit.rkey);

    if (commit.operation === "delete") {
      const removed = await this.statusRepository.deleteByUri(uri);
      return { uri, outcome: removed ? "deleted" : "skipped" };
    }

    if (commit.record === undefined || commit.record === null) {
      throw new RecordDecodeError(uri, `${commit.operation} without a record body`);
    }
    if (!commit.cid) {
      throw new RecordDecodeError(uri, `${commit.operation} without a cid`);
    }

    const body = decodeStatusRecordBody(uri, commit.record);
    const now = this.clock();

    const status = StatusRecord.create({
      uri,
      authorDid: commit.did,
      emoji: body.emoji,
      text: body.text ?? null,
      startedAt: new Date(body.createdAt),
      expiresAt: resolveExpiry(body.expires, now),
      indexedAt: now,
    });

    await this.statusRepository.upsert(status);
    return { uri, outcome: "upserted" };
  }
}
