import { z } from "zod";
import { FirehoseCommit } from "../../domain/events/FirehoseCommit";

/**
 * Jetstream JSON frames. Only `commit` frames carry record mutations;
 * `identity` and `account` frames are accepted and ignored.
 */
export const jetstreamCommitSchema = z.object({
  rev: z.string(),
  operation: z.enum(["create", "update", "delete"]),
  collection: z.string().min(1),
  rkey: z.string().min(1),
  record: z.unknown().optional(),
  cid: z.string().optional(),
});

export const jetstreamEventSchema = z.object({
  did: z.string().min(1),
  time_us: z.number().int().nonnegative(),
  kind: z.string(),
  commit: jetstreamCommitSchema.optional(),
});

export type JetstreamEvent = z.infer<typeof jetstreamEventSchema>;

const cursorOnlySchema = z.object({ time_us: z.number().int().nonnegative() });

/**
 * `time_us` of a frame that may not pass full validation.
 */
export function readTimeUs(frame: unknown): number | null {
  const parsed = cursorOnlySchema.safeParse(frame);
  return parsed.success ? parsed.data.time_us : null;
}

export function toFirehoseCommit(event: JetstreamEvent): FirehoseCommit | null {
  if (event.kind !== "commit" || !event.commit) {
    return null;
  }
  return {
    did: event.did,
    timeUs: event.time_us,
    rev: event.commit.rev,
    operation: event.commit.operation,
    collection: event.commit.collection,
    rkey: event.commit.rkey,
    record: event.commit.record,
    cid: event.commit.cid,
  };
}

export function buildJetstreamUrl(base: string, wantedCollections: string[], cursor: number | null): string {
  const url = new URL(base);
  for (const collection of wantedCollections) {
    url.searchParams.append("wantedCollections", collection);
  }
  if (cursor !== null) {
    url.searchParams.set("cursor", String(cursor));
  }
  return url.toString();
}
