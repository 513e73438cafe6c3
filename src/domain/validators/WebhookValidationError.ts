/**
 * Stable, machine-checkable reasons a webhook configuration is rejected.
 */
export type WebhookValidationReason =
  | "invalid_url"
  | "unsupported_scheme"
  | "https_required"
  | "blocked_host"
  | "private_address"
  | "empty_event_filter"
  | "unknown_event"
  | "invalid_secret";

export class WebhookValidationError extends Error {
  constructor(
    readonly reason: WebhookValidationReason,
    message: string
  ) {
    super(message);
    this.name = "WebhookValidationError";
  }
}
