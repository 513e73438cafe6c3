import { createHmac, timingSafeEqual } from "crypto";

export const SIGNATURE_VERSION = "v1";

/**
 * Canonical string covered by the signature: `v0:<unix-seconds>:<payload>`.
 * Binding the timestamp lets receivers reject replays outside their window.
 */
export function signingString(timestamp: number, payload: string): string {
  return `v0:${timestamp}:${payload}`;
}

/**
 * HMAC-SHA256 over the canonical string, rendered as `v1=<hex>`.
 */
export function generateSignature(secret: string, timestamp: number, payload: string): string {
  const digest = createHmac("sha256", secret).update(signingString(timestamp, payload)).digest("hex");
  return `${SIGNATURE_VERSION}=${digest}`;
}

export function verifySignature(
  secret: string,
  timestamp: number,
  payload: string,
  signature: string
): boolean {
  if (!signature.startsWith(`${SIGNATURE_VERSION}=`)) {
    return false;
  }

  const expected = Buffer.from(generateSignature(secret, timestamp, payload));
  const received = Buffer.from(signature);
  return expected.length === received.length && timingSafeEqual(expected, received);
}
