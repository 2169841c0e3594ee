/**
 * Webhook signatures: hex HMAC-SHA256 of the raw request body with the
 * shared secret.
 */

import { createHmac, timingSafeEqual } from "crypto";

export function computeSignature(rawBody: string, secret: string): string {
  return createHmac("sha256", secret).update(rawBody, "utf-8").digest("hex");
}

/**
 * Constant-time comparison of a received signature against the expected one.
 * Malformed or missing signatures never match.
 */
export function verifySignature(rawBody: string, signature: string | undefined, secret: string): boolean {
  if (!signature) return false;

  const expected = Buffer.from(computeSignature(rawBody, secret), "hex");
  const received = Buffer.from(signature.trim().toLowerCase(), "hex");
  if (received.length !== expected.length) return false;
  return timingSafeEqual(received, expected);
}
