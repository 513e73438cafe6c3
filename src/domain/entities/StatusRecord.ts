export const STATUS_COLLECTION = "io.zzstoatzz.status.record";

const URI_SCHEME = "at";

export interface StatusRecordProps {
  uri: string;
  authorDid: string;
  emoji: string;
  text: string | null;
  startedAt: Date;
  expiresAt: Date | null;
  indexedAt: Date;
  hidden: boolean;
}

/**
 * Rebuilds a record URI from its parts: `at://<did>/<collection>/<rkey>`.
 * The firehose never sends the URI itself, so every consumer must agree on this.
 */
export function buildStatusUri(authorDid: string, collection: string, rkey: string): string {
  return `${URI_SCHEME}://${authorDid}/${collection}/${rkey}`;
}

const TID_ALPHABET = "234567abcdefghijklmnopqrstuvwxyz";
let lastTidMicros = 0;

/**
 * Timestamp-ordered record key (base32-sortable, 13 chars), the same shape
 * the network uses for record keys it generates itself.
 */
export function generateRecordKey(now: Date = new Date()): string {
  let micros = now.getTime() * 1000;
  if (micros <= lastTidMicros) {
    micros = lastTidMicros + 1;
  }
  lastTidMicros = micros;

  const clockId = Math.floor(Math.random() * 1024);
  let value = (BigInt(micros) << 10n) | BigInt(clockId);
  let key = "";
  for (let i = 0; i < 13; i++) {
    key = TID_ALPHABET[Number(value & 31n)] + key;
    value >>= 5n;
  }
  return key;
}

export class StatusRecord {
  readonly uri: string;
  readonly authorDid: string;
  readonly emoji: string;
  readonly text: string | null;
  readonly startedAt: Date;
  readonly expiresAt: Date | null;
  readonly indexedAt: Date;
  readonly hidden: boolean;

  private constructor(props: StatusRecordProps) {
    this.uri = props.uri;
    this.authorDid = props.authorDid;
    this.emoji = props.emoji;
    this.text = props.text;
    this.startedAt = props.startedAt;
    this.expiresAt = props.expiresAt;
    this.indexedAt = props.indexedAt;
    this.hidden = props.hidden;
  }

  static create(input: Omit<StatusRecordProps, "hidden"> & { hidden?: boolean }): StatusRecord {
    if (input.emoji.trim().length === 0) {
      throw new StatusValidationError("Status emoji must not be empty");
    }

    return new StatusRecord({ ...input, hidden: input.hidden ?? false });
  }

  static fromPersistence(props: StatusRecordProps): StatusRecord {
    return new StatusRecord(props);
  }

  toProps(): StatusRecordProps {
    return {
      uri: this.uri,
      authorDid: this.authorDid,
      emoji: this.emoji,
      text: this.text,
      startedAt: this.startedAt,
      expiresAt: this.expiresAt,
      indexedAt: this.indexedAt,
      hidden: this.hidden,
    };
  }
}

export class StatusValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "StatusValidationError";
  }
}

export class StatusNotFoundError extends Error {
  constructor(uri: string) {
    super(`Status not found: ${uri}`);
    this.name = "StatusNotFoundError";
  }
}
