/**
 * Raw message source behind the firehose consumer. Implementations own the
 * socket and the reconnect policy; the consumer owns decoding and the cursor.
 */
export interface FirehoseConnectionHandlers {
  onMessage(data: string): void;
  /** Called once the reconnect policy is exhausted. */
  onFatal(error: FirehoseConnectError): void;
}

export interface FirehoseConnectionPort {
  /**
   * @param cursor - resume point (`time_us`); read again on every reconnect
   */
  open(handlers: FirehoseConnectionHandlers, cursor: () => number | null): void;
  close(): Promise<void>;
}

export class FirehoseConnectError extends Error {
  constructor(
    readonly attempts: number,
    readonly lastError?: Error
  ) {
    super(
      `Firehose unreachable after ${attempts} consecutive attempts${lastError ? `: ${lastError.message}` : ""}`
    );
    this.name = "FirehoseConnectError";
  }
}
