import { randomUUID } from "crypto";

export type DeliveryStatus = "PENDING" | "DELIVERED" | "FAILED";

export const MAX_RESPONSE_BODY_LENGTH = 1000;

export interface DeliveryAttemptProps {
  id: string;
  subscriptionId: string;
  eventId: string;
  eventType: string;
  payload: string;
  attemptedAt: Date;
  status: DeliveryStatus;
  responseStatus: number | null;
  responseBody: string | null;
  errorMessage: string | null;
  retryCount: number;
  nextRetryAt: Date | null;
}

export interface DeliveryOutcome {
  responseStatus: number | null;
  responseBody: string | null;
  errorMessage: string | null;
}

export function truncateResponseBody(body: string | null): string | null {
  if (body === null) {
    return null;
  }
  return body.length > MAX_RESPONSE_BODY_LENGTH ? body.slice(0, MAX_RESPONSE_BODY_LENGTH) : body;
}

/**
 * One row of the delivery ledger. PENDING -> DELIVERED | FAILED, terminal.
 */
export class DeliveryAttempt {
  readonly id: string;
  readonly subscriptionId: string;
  readonly eventId: string;
  readonly eventType: string;
  readonly payload: string;
  readonly attemptedAt: Date;
  readonly status: DeliveryStatus;
  readonly responseStatus: number | null;
  readonly responseBody: string | null;
  readonly errorMessage: string | null;
  readonly retryCount: number;
  readonly nextRetryAt: Date | null;

  private constructor(props: DeliveryAttemptProps) {
    this.id = props.id;
    this.subscriptionId = props.subscriptionId;
    this.eventId = props.eventId;
    this.eventType = props.eventType;
    this.payload = props.payload;
    this.attemptedAt = props.attemptedAt;
    this.status = props.status;
    this.responseStatus = props.responseStatus;
    this.responseBody = props.responseBody;
    this.errorMessage = props.errorMessage;
    this.retryCount = props.retryCount;
    this.nextRetryAt = props.nextRetryAt;
  }

  static pending(input: {
    subscriptionId: string;
    eventId: string;
    eventType: string;
    payload: string;
  }): DeliveryAttempt {
    return new DeliveryAttempt({
      ...input,
      id: randomUUID(),
      attemptedAt: new Date(),
      status: "PENDING",
      responseStatus: null,
      responseBody: null,
      errorMessage: null,
      retryCount: 0,
      nextRetryAt: null,
    });
  }

  static fromPersistence(props: DeliveryAttemptProps): DeliveryAttempt {
    return new DeliveryAttempt(props);
  }

  get success(): boolean {
    return this.status === "DELIVERED";
  }

  isPending(): boolean {
    return this.status === "PENDING";
  }

  /**
   * 2xx -> DELIVERED, anything else (including no response at all) -> FAILED.
   */
  complete(outcome: DeliveryOutcome): DeliveryAttempt {
    if (!this.isPending()) {
      throw new DeliveryAlreadyCompletedError(this.id, this.status);
    }

    const delivered =
      outcome.responseStatus !== null && outcome.responseStatus >= 200 && outcome.responseStatus < 300;

    return new DeliveryAttempt({
      ...this.toProps(),
      status: delivered ? "DELIVERED" : "FAILED",
      responseStatus: outcome.responseStatus,
      responseBody: truncateResponseBody(outcome.responseBody),
      errorMessage: outcome.errorMessage,
    });
  }

  toProps(): DeliveryAttemptProps {
    return {
      id: this.id,
      subscriptionId: this.subscriptionId,
      eventId: this.eventId,
      eventType: this.eventType,
      payload: this.payload,
      attemptedAt: this.attemptedAt,
      status: this.status,
      responseStatus: this.responseStatus,
      responseBody: this.responseBody,
      errorMessage: this.errorMessage,
      retryCount: this.retryCount,
      nextRetryAt: this.nextRetryAt,
    };
  }
}

export class DeliveryAlreadyCompletedError extends Error {
  constructor(id: string, status: DeliveryStatus) {
    super(`Delivery ${id} is already ${status}`);
    this.name = "DeliveryAlreadyCompletedError";
  }
}
