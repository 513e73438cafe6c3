/**
 * Unit tests: FirehoseConsumer
 *
 * Decoding, filtering, cursor tracking and fatal connection handling
 */

import { describe, it, expect, beforeEach } from "@jest/globals";
import { FirehoseConsumer } from "../FirehoseConsumer";
import { IngestFirehoseEvent } from "../../../application/useCases/IngestFirehoseEvent";
import { InMemoryStatusRepository } from "../../adapters/repositories/InMemoryStatusRepository";
import {
  FirehoseConnectError,
  FirehoseConnectionHandlers,
  FirehoseConnectionPort,
} from "../../../ports/FirehoseConnectionPort";

const COLLECTION = "io.zzstoatzz.status.record";
const DID = "did:plc:abc";

class FakeConnection implements FirehoseConnectionPort {
  handlers: FirehoseConnectionHandlers | null = null;
  cursor: () => number | null = () => null;
  closed = false;

  open(handlers: FirehoseConnectionHandlers, cursor: () => number | null): void {
    this.handlers = handlers;
    this.cursor = cursor;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  emit(frame: unknown): void {
    this.send(JSON.stringify(frame));
  }

  send(data: string): void {
    if (!this.handlers) throw new Error("connection not open");
    this.handlers.onMessage(data);
  }

  fail(error: FirehoseConnectError): void {
    if (!this.handlers) throw new Error("connection not open");
    this.handlers.onFatal(error);
  }
}

const createFrame = (rkey: string, timeUs: number, record: unknown = { emoji: "🚀", createdAt: "2025-01-01T00:00:00Z" }) => ({
  did: DID,
  time_us: timeUs,
  kind: "commit",
  commit: { rev: "rev1", operation: "create", collection: COLLECTION, rkey, cid: "bafyreitest", record },
});

const deleteFrame = (rkey: string, timeUs: number) => ({
  did: DID,
  time_us: timeUs,
  kind: "commit",
  commit: { rev: "rev2", operation: "delete", collection: COLLECTION, rkey },
});

const uriFor = (rkey: string) => `at://${DID}/${COLLECTION}/${rkey}`;

describe("FirehoseConsumer", () => {
  let connection: FakeConnection;
  let statuses: InMemoryStatusRepository;
  let consumer: FirehoseConsumer;

  beforeEach(() => {
    connection = new FakeConnection();
    statuses = new InMemoryStatusRepository();
    consumer = new FirehoseConsumer(connection, new IngestFirehoseEvent(statuses), {
      wantedCollections: [COLLECTION],
    });
  });

  describe("process", () => {
    it("should upsert a status commit and advance the cursor", async () => {
      const outcome = await consumer.process(JSON.stringify(createFrame("a", 100)));

      expect(outcome).toBe("upserted");
      expect(consumer.cursor.get()).toBe(100);
      expect(await statuses.findByUri(uriFor("a"))).not.toBeNull();
    });

    it("should skip non-JSON without moving the cursor", async () => {
      expect(await consumer.process("{not json")).toBe("malformed");
      expect(consumer.cursor.get()).toBeNull();
    });

    it("should skip an undecodable record but still advance the cursor", async () => {
      const outcome = await consumer.process(JSON.stringify(createFrame("bad", 200, { text: "no emoji" })));

      expect(outcome).toBe("malformed");
      expect(consumer.cursor.get()).toBe(200);
      expect(await statuses.findByUri(uriFor("bad"))).toBeNull();
    });

    it("should treat a commit frame without a commit body as malformed", async () => {
      expect(await consumer.process(JSON.stringify({ did: DID, time_us: 300, kind: "commit" }))).toBe("malformed");
      expect(consumer.cursor.get()).toBe(300);
    });

    it("should ignore identity and account frames", async () => {
      expect(await consumer.process(JSON.stringify({ did: DID, time_us: 400, kind: "identity" }))).toBe("ignored");
      expect(await consumer.process(JSON.stringify({ did: DID, time_us: 401, kind: "account" }))).toBe("ignored");
      expect(consumer.cursor.get()).toBe(401);
    });

    it("should ignore collections it did not ask for", async () => {
      const frame = createFrame("a", 500);
      frame.commit.collection = "app.bsky.feed.post";

      expect(await consumer.process(JSON.stringify(frame))).toBe("ignored");
      expect(await statuses.findByUri(`at://${DID}/app.bsky.feed.post/a`)).toBeNull();
    });

    it("should report deletes of unknown records as skipped", async () => {
      expect(await consumer.process(JSON.stringify(deleteFrame("ghost", 600)))).toBe("skipped");
    });

    it("should never move the cursor backwards", async () => {
      await consumer.process(JSON.stringify(createFrame("a", 900)));
      await consumer.process(JSON.stringify(createFrame("b", 700)));

      expect(consumer.cursor.get()).toBe(900);
      expect(await statuses.findByUri(uriFor("b"))).not.toBeNull();
    });
  });

  describe("run", () => {
    it("should apply messages in arrival order and expose the cursor to the connection", async () => {
      // Arrange
      const running = consumer.run();

      // Act
      connection.emit(createFrame("a", 1));
      connection.send("garbage");
      connection.emit(createFrame("b", 2));
      connection.emit(deleteFrame("a", 3));
      connection.emit({ did: DID, time_us: 4, kind: "identity" });
      await consumer.idle();

      // Assert
      expect(await statuses.findByUri(uriFor("a"))).toBeNull();
      expect(await statuses.findByUri(uriFor("b"))).not.toBeNull();
      expect(connection.cursor()).toBe(4);

      await consumer.stop(100);
      await expect(running).resolves.toBeUndefined();
      expect(connection.closed).toBe(true);
    });

    it("should reject once the connection gives up", async () => {
      const running = consumer.run();

      connection.fail(new FirehoseConnectError(3, new Error("ECONNREFUSED")));

      await expect(running).rejects.toThrow("Firehose unreachable after 3 consecutive attempts: ECONNREFUSED");
    });
  });
});
