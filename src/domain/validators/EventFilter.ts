import { WEBHOOK_EVENT_TYPES, isWebhookEventType } from "../events/WebhookEvent";
import { WebhookValidationError } from "./WebhookValidationError";

export const WILDCARD_FILTER = "*";

/**
 * Normalizes a subscription filter: `*`, or a comma list of known event types.
 *
 * Tokens are trimmed and lower-cased, duplicates dropped. A list containing
 * `*` collapses to `*`. Undefined means wildcard; an explicitly blank filter
 * is rejected.
 */
export function normalizeEventFilter(filter: string | undefined): string {
  if (filter === undefined) {
    return WILDCARD_FILTER;
  }

  const tokens = filter
    .split(",")
    .map((t) => t.trim().toLowerCase())
    .filter((t) => t.length > 0);

  if (tokens.length === 0) {
    throw new WebhookValidationError("empty_event_filter", "Event filter must not be empty");
  }

  if (tokens.includes(WILDCARD_FILTER)) {
    return WILDCARD_FILTER;
  }

  const unknown = tokens.filter((t) => !isWebhookEventType(t));
  if (unknown.length > 0) {
    throw new WebhookValidationError(
      "unknown_event",
      `Unsupported event types: ${unknown.join(", ")}. Supported: ${WEBHOOK_EVENT_TYPES.join(", ")}`
    );
  }

  return Array.from(new Set(tokens)).join(",");
}

export function eventFilterMatches(filter: string, eventType: string): boolean {
  const trimmed = filter.trim();
  if (trimmed === WILDCARD_FILTER || trimmed.length === 0) {
    return true;
  }

  const wanted = eventType.toLowerCase();
  return trimmed
    .split(",")
    .map((t) => t.trim().toLowerCase())
    .some((t) => t === wanted);
}
