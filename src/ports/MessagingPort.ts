/**
 * Envelope for anything handed to the messaging layer.
 */
export interface OutboundEvent<TPayload = unknown> {
  id: string;
  type: string;
  timestamp: string;
  version: "v1";
  traceId?: string;
  routingKey?: string;
  idempotencyKey?: string;
  payload: TPayload;
}

export interface MessagingPort {
  /**
   * Resolves once the event is accepted for processing, not once it is handled.
   * @throws {MessagingBackpressureError} when the adapter cannot take more work
   */
  publish(event: OutboundEvent): Promise<void>;

  /**
   * Stops accepting events and waits up to `graceMs` for accepted ones to finish.
   */
  close(graceMs?: number): Promise<void>;
}

export class MessagingBackpressureError extends Error {
  constructor(capacity: number) {
    super(`Messaging queue is full (capacity ${capacity})`);
    this.name = "MessagingBackpressureError";
  }
}

/**
 * Receives events of the type it was registered for. `event` is the
 * OutboundEvent as it came off the transport and must be decoded.
 */
export interface EventHandler {
  handle(event: unknown): Promise<void>;
}
