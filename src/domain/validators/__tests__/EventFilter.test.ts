import { describe, it, expect } from "@jest/globals";
import { eventFilterMatches, normalizeEventFilter } from "../EventFilter";
import { WebhookValidationError } from "../WebhookValidationError";

const rejection = (filter: string): WebhookValidationError => {
  try {
    normalizeEventFilter(filter);
  } catch (err) {
    if (err instanceof WebhookValidationError) {
      return err;
    }
    throw err;
  }
  throw new Error(`expected "${filter}" to be rejected`);
};

describe("normalizeEventFilter", () => {
  it("should treat an unset filter as wildcard", () => {
    expect(normalizeEventFilter(undefined)).toBe("*");
  });

  it("should trim, lower-case and de-duplicate tokens", () => {
    expect(normalizeEventFilter(" Status.Created , status.deleted,status.created ")).toBe(
      "status.created,status.deleted"
    );
  });

  it("should collapse any list containing * to *", () => {
    expect(normalizeEventFilter("status.created,*")).toBe("*");
  });

  it("should reject an explicitly empty filter", () => {
    expect(rejection(" , ").reason).toBe("empty_event_filter");
    expect(rejection("").reason).toBe("empty_event_filter");
  });

  it("should reject unknown event types", () => {
    const error = rejection("status.created,status.updated");

    expect(error.reason).toBe("unknown_event");
    expect(error.message).toBe(
      "Unsupported event types: status.updated. Supported: status.created, status.deleted"
    );
  });

  it("should not accept the test event as a filter token", () => {
    expect(rejection("webhook.test").reason).toBe("unknown_event");
  });
});

describe("eventFilterMatches", () => {
  it("should match everything with * or an empty filter", () => {
    expect(eventFilterMatches("*", "status.created")).toBe(true);
    expect(eventFilterMatches("", "status.deleted")).toBe(true);
  });

  it("should match listed types case-insensitively", () => {
    expect(eventFilterMatches("status.created,status.deleted", "status.deleted")).toBe(true);
    expect(eventFilterMatches("STATUS.CREATED", "status.created")).toBe(true);
  });

  it("should not match unlisted types", () => {
    expect(eventFilterMatches("status.created", "status.deleted")).toBe(false);
  });
});
