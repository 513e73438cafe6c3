/**
 * Consumer: FirehoseConsumer
 *
 * Tails the firehose and applies status commits one at a time, in arrival
 * order, through IngestFirehoseEvent. Frames that fail to decode are logged
 * and skipped; the cursor still moves past them.
 */

import { IngestFirehoseEvent } from "../../application/useCases/IngestFirehoseEvent";
import { RecordDecodeError } from "../../domain/validators/StatusRecordSchema";
import { FirehoseConnectError, FirehoseConnectionPort } from "../../ports/FirehoseConnectionPort";
import { FirehoseCursor } from "../firehose/FirehoseCursor";
import { jetstreamEventSchema, readTimeUs, toFirehoseCommit } from "../firehose/JetstreamSchema";
import { logger } from "../logger";
import { firehoseMessagesCounter } from "../metrics/metrics";

export type FirehoseMessageOutcome = "upserted" | "deleted" | "skipped" | "ignored" | "malformed" | "failed";

export interface FirehoseConsumerOptions {
  wantedCollections: string[];
}

export class FirehoseConsumer {
  private readonly queue: string[] = [];
  private readonly wanted: Set<string>;
  private draining: Promise<void> | null = null;
  private settle: { resolve: () => void; reject: (error: Error) => void } | null = null;

  constructor(
    private readonly connection: FirehoseConnectionPort,
    private readonly ingest: IngestFirehoseEvent,
    options: FirehoseConsumerOptions,
    readonly cursor: FirehoseCursor = new FirehoseCursor()
  ) {
    this.wanted = new Set(options.wantedCollections);
  }

  /**
   * Resolves after `stop`; rejects with FirehoseConnectError once the
   * connection gives up.
   */
  run(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this.settle = { resolve, reject };
      this.connection.open(
        {
          onMessage: (data) => this.enqueue(data),
          onFatal: (error) => this.fail(error),
        },
        () => this.cursor.get()
      );
    });
  }

  async stop(graceMs: number): Promise<void> {
    await this.connection.close();

    if (this.draining) {
      let timer: NodeJS.Timeout | undefined;
      const timeout = new Promise<void>((resolve) => {
        timer = setTimeout(resolve, graceMs);
      });
      await Promise.race([this.draining, timeout]);
      clearTimeout(timer);
    }

    if (this.queue.length > 0) {
      logger.warn({
        type: "FIREHOSE_STOP_DROPPED",
        message: "Stopped with unprocessed firehose messages",
        payload: { dropped: this.queue.length, cursor: this.cursor.get() },
      });
      this.queue.length = 0;
    }

    this.settle?.resolve();
    this.settle = null;
  }

  /**
   * Resolves when every message received so far has been processed.
   */
  async idle(): Promise<void> {
    while (this.draining) {
      await this.draining;
    }
  }

  private enqueue(data: string): void {
    this.queue.push(data);
    if (!this.draining) {
      this.draining = this.drain().finally(() => {
        this.draining = null;
      });
    }
  }

  private async drain(): Promise<void> {
    let data = this.queue.shift();
    while (data !== undefined) {
      const outcome = await this.process(data);
      firehoseMessagesCounter.inc({ outcome });
      data = this.queue.shift();
    }
  }

  async process(data: string): Promise<FirehoseMessageOutcome> {
    let frame: unknown;
    try {
      frame = JSON.parse(data);
    } catch {
      logger.warn({
        type: "FIREHOSE_MALFORMED_JSON",
        message: "Skipping firehose message that is not JSON",
        payload: { length: data.length },
      });
      return "malformed";
    }

    const timeUs = readTimeUs(frame);
    try {
      return await this.apply(frame);
    } finally {
      if (timeUs !== null) {
        this.cursor.advance(timeUs);
      }
    }
  }

  private async apply(frame: unknown): Promise<FirehoseMessageOutcome> {
    const parsed = jetstreamEventSchema.safeParse(frame);
    if (!parsed.success) {
      logger.warn({
        type: "FIREHOSE_MALFORMED_EVENT",
        message: "Skipping firehose message with an unexpected shape",
        payload: { issues: parsed.error.issues },
      });
      return "malformed";
    }

    const commit = toFirehoseCommit(parsed.data);
    if (!commit) {
      if (parsed.data.kind === "commit") {
        logger.warn({
          type: "FIREHOSE_MALFORMED_EVENT",
          message: "Skipping commit message without a commit body",
          payload: { did: parsed.data.did, timeUs: parsed.data.time_us },
        });
        return "malformed";
      }
      return "ignored";
    }

    if (!this.wanted.has(commit.collection)) {
      return "ignored";
    }

    try {
      const result = await this.ingest.execute(commit);
      logger.debug({
        type: "FIREHOSE_INGESTED",
        message: `Status ${result.outcome}`,
        payload: { uri: result.uri, operation: commit.operation, timeUs: commit.timeUs },
      });
      return result.outcome;
    } catch (error) {
      if (error instanceof RecordDecodeError) {
        logger.warn({
          type: "FIREHOSE_RECORD_DECODE_FAILED",
          message: error.message,
          payload: { uri: error.uri, timeUs: commit.timeUs },
        });
        return "malformed";
      }
      logger.error({
        type: "FIREHOSE_INGEST_FAILED",
        message: "Failed to apply firehose commit",
        error,
        payload: { did: commit.did, rkey: commit.rkey, timeUs: commit.timeUs },
      });
      return "failed";
    }
  }

  private fail(error: FirehoseConnectError): void {
    logger.error({
      type: "FIREHOSE_CONNECT_FAILED",
      message: error.message,
      error,
    });
    this.settle?.reject(error);
    this.settle = null;
  }
}
