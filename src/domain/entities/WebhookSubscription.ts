import { randomBytes, randomUUID } from "crypto";
import { eventFilterMatches, normalizeEventFilter } from "../validators/EventFilter";
import { UrlValidator } from "../validators/UrlValidator";
import { WebhookValidationError } from "../validators/WebhookValidationError";

export interface WebhookSubscriptionProps {
  id: string;
  ownerDid: string;
  url: string;
  secret: string;
  events: string;
  active: boolean;
  lastDeliveryAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface CreateWebhookSubscriptionInput {
  ownerDid: string;
  url: string;
  secret?: string;
  events?: string;
  devMode?: boolean;
}

export interface WebhookSubscriptionChanges {
  url?: string;
  events?: string;
  active?: boolean;
}

export interface CreateWebhookSubscriptionResult {
  subscription: WebhookSubscription;
  secret: string; // plaintext, shown once
}

/**
 * Read model for everything except create and rotate: the secret is masked.
 */
export interface WebhookSubscriptionView {
  id: string;
  ownerDid: string;
  url: string;
  maskedSecret: string;
  events: string;
  active: boolean;
  lastDeliveryAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

const SECRET_BYTES = 32;
const MIN_SUPPLIED_SECRET_LENGTH = 16;
const VISIBLE_SECRET_CHARS = 4;

export function generateWebhookSecret(): string {
  return randomBytes(SECRET_BYTES).toString("hex");
}

export function maskSecret(secret: string): string {
  if (secret.length <= VISIBLE_SECRET_CHARS) {
    return "****";
  }
  return `****${secret.slice(-VISIBLE_SECRET_CHARS)}`;
}

export class WebhookSubscription {
  readonly id: string;
  readonly ownerDid: string;
  readonly url: string;
  readonly secret: string;
  readonly events: string;
  readonly active: boolean;
  readonly lastDeliveryAt: Date | null;
  readonly createdAt: Date;
  readonly updatedAt: Date;

  private constructor(props: WebhookSubscriptionProps) {
    this.id = props.id;
    this.ownerDid = props.ownerDid;
    this.url = props.url;
    this.secret = props.secret;
    this.events = props.events;
    this.active = props.active;
    this.lastDeliveryAt = props.lastDeliveryAt;
    this.createdAt = props.createdAt;
    this.updatedAt = props.updatedAt;
  }

  static create(input: CreateWebhookSubscriptionInput): CreateWebhookSubscriptionResult {
    const devMode = input.devMode ?? false;

    UrlValidator.validate(input.url, devMode);
    const events = normalizeEventFilter(input.events);

    if (input.secret !== undefined && input.secret.length < MIN_SUPPLIED_SECRET_LENGTH) {
      throw new WebhookValidationError(
        "invalid_secret",
        `Secret must be at least ${MIN_SUPPLIED_SECRET_LENGTH} characters`
      );
    }
    const secret = input.secret ?? generateWebhookSecret();

    const now = new Date();
    const subscription = new WebhookSubscription({
      id: randomUUID(),
      ownerDid: input.ownerDid,
      url: input.url,
      secret,
      events,
      active: true,
      lastDeliveryAt: null,
      createdAt: now,
      updatedAt: now,
    });

    return { subscription, secret };
  }

  static fromPersistence(props: WebhookSubscriptionProps): WebhookSubscription {
    return new WebhookSubscription(props);
  }

  isOwnedBy(ownerDid: string): boolean {
    return this.ownerDid === ownerDid;
  }

  /**
   * Active and listening for this event type.
   */
  shouldReceive(eventType: string): boolean {
    return this.active && eventFilterMatches(this.events, eventType);
  }

  /**
   * Validates and normalizes a partial update; only supplied fields appear
   * in the result.
   */
  static validateChanges(
    data: { url?: string; events?: string; active?: boolean },
    devMode: boolean = false
  ): WebhookSubscriptionChanges {
    const changes: WebhookSubscriptionChanges = {};
    if (data.url !== undefined) {
      UrlValidator.validate(data.url, devMode);
      changes.url = data.url;
    }
    if (data.events !== undefined) {
      changes.events = normalizeEventFilter(data.events);
    }
    if (data.active !== undefined) {
      changes.active = data.active;
    }
    return changes;
  }

  withChanges(changes: WebhookSubscriptionChanges, at: Date = new Date()): WebhookSubscription {
    return new WebhookSubscription({ ...this.toProps(), ...changes, updatedAt: at });
  }

  withSecret(secret: string, at: Date = new Date()): WebhookSubscription {
    return new WebhookSubscription({ ...this.toProps(), secret, updatedAt: at });
  }

  toView(): WebhookSubscriptionView {
    return {
      id: this.id,
      ownerDid: this.ownerDid,
      url: this.url,
      maskedSecret: maskSecret(this.secret),
      events: this.events,
      active: this.active,
      lastDeliveryAt: this.lastDeliveryAt,
      createdAt: this.createdAt,
      updatedAt: this.updatedAt,
    };
  }

  toProps(): WebhookSubscriptionProps {
    return {
      id: this.id,
      ownerDid: this.ownerDid,
      url: this.url,
      secret: this.secret,
      events: this.events,
      active: this.active,
      lastDeliveryAt: this.lastDeliveryAt,
      createdAt: this.createdAt,
      updatedAt: this.updatedAt,
    };
  }
}

export { WebhookValidationError };

/**
 * Raised for absent ids and for ids owned by someone else alike, so callers
 * cannot tell which subscriptions exist.
 */
export class WebhookNotFoundError extends Error {
  constructor(id: string) {
    super(`Webhook not found: ${id}`);
    this.name = "WebhookNotFoundError";
  }
}

export class WebhookLimitExceededError extends Error {
  constructor(limit: number) {
    super(`Limit of ${limit} webhooks per account reached`);
    this.name = "WebhookLimitExceededError";
  }
}
