export type CommitOperation = "create" | "update" | "delete";

/**
 * A single record mutation taken off the firehose, already unwrapped from
 * the transport envelope.
 */
export interface FirehoseCommit {
  did: string;
  timeUs: number;
  rev: string;
  operation: CommitOperation;
  collection: string;
  rkey: string;
  record?: unknown;
  cid?: string;
}
