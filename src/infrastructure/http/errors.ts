import { Response } from "express";
import { ZodError } from "zod";
import { StatusNotFoundError, StatusValidationError } from "../../domain/entities/StatusRecord";
import {
  WebhookLimitExceededError,
  WebhookNotFoundError,
  WebhookValidationError,
} from "../../domain/entities/WebhookSubscription";
import { logger } from "../logger";

export function sendUnauthorized(res: Response): Response {
  return res.status(401).json({
    error: { code: "UNAUTHORIZED", message: "Not signed in" },
  });
}

/**
 * Maps domain failures onto the HTTP error envelope; anything unknown is a 500.
 */
export function sendRouteError(res: Response, err: unknown, context: string): Response {
  if (err instanceof ZodError) {
    return res.status(400).json({
      error: { code: "VALIDATION_ERROR", message: "Invalid request", details: err.flatten() },
    });
  }
  if (err instanceof WebhookValidationError) {
    return res.status(400).json({
      error: { code: "VALIDATION_ERROR", message: err.message, reason: err.reason },
    });
  }
  if (err instanceof StatusValidationError) {
    return res.status(400).json({
      error: { code: "VALIDATION_ERROR", message: err.message },
    });
  }
  if (err instanceof WebhookLimitExceededError) {
    return res.status(400).json({
      error: { code: "LIMIT_EXCEEDED", message: err.message },
    });
  }
  if (err instanceof WebhookNotFoundError || err instanceof StatusNotFoundError) {
    return res.status(404).json({
      error: { code: "NOT_FOUND", message: err.message },
    });
  }

  logger.error({ type: "HTTP_UNHANDLED_ERROR", message: context, error: err });
  return res.status(500).json({ error: { code: "INTERNAL_ERROR", message: "Internal error" } });
}
