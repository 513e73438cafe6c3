import { MAX_RESPONSE_BODY_LENGTH } from "../../../domain/entities/DeliveryAttempt";
import { WebhookDeliveryPort, WebhookDeliveryRequest, WebhookDeliveryResponse } from "../../../ports/WebhookDeliveryPort";
import { logger } from "../../logger";

/**
 * Reads at most `maxLength` characters, then cancels the rest of the stream.
 * A body that errors or is aborted part way keeps what arrived before.
 */
async function readBodyPrefix(body: Response["body"], maxLength: number): Promise<string> {
  if (!body) {
    return "";
  }

  const reader = body.getReader();
  const decoder = new TextDecoder();
  let text = "";

  try {
    while (text.length < maxLength) {
      const { done, value } = await reader.read();
      if (done) {
        text += decoder.decode();
        break;
      }
      text += decoder.decode(value, { stream: true });
    }
  } catch (error) {
    logger.debug({
      type: "WEBHOOK_RESPONSE_BODY_INTERRUPTED",
      message: "Response body cut short; keeping the status",
      error,
      payload: { received: text.length },
    });
  }

  await reader.cancel().catch((error: unknown) => {
    logger.debug({ type: "WEBHOOK_RESPONSE_BODY_CANCEL_FAILED", message: "Could not cancel response body", error });
  });

  return text.slice(0, maxLength);
}

/**
 * POSTs with Node's global fetch. Redirects are not followed: a validated
 * public target must not be able to bounce the request to an internal one.
 *
 * The timeout bounds the wait for response headers and the body prefix
 * together; once headers arrive the status is final.
 */
export class FetchWebhookDeliveryAdapter implements WebhookDeliveryPort {
  async post(request: WebhookDeliveryRequest): Promise<WebhookDeliveryResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), request.timeoutMs);

    try {
      const res = await fetch(request.url, {
        method: "POST",
        headers: request.headers,
        body: request.body,
        redirect: "manual",
        signal: controller.signal,
      });

      const status = res.status;
      const responseBody = await readBodyPrefix(res.body, MAX_RESPONSE_BODY_LENGTH);
      return { status, responseBody };
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
