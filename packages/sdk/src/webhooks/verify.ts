/**
 * Webhook signature verification
 *
 * The provider signs each delivery with HMAC-SHA256 over the raw body,
 * keyed with the shared webhook secret, and sends the lowercase hex digest.
 *
 * Verifies: hex(HMAC-SHA256(rawBody, webhookSecret)) === signature
 */

import { createHmac, timingSafeEqual } from 'node:crypto'

/** Raw payload or secret, as text or bytes */
export type SignatureInput = string | Buffer

/**
 * Compute the hex-encoded HMAC-SHA256 signature of a webhook payload
 *
 * @param payload - Raw webhook body, exactly as received
 * @param secret - Shared webhook secret
 */
export function computeWebhookSignature(
  payload: SignatureInput,
  secret: SignatureInput
): string {
  return createHmac('sha256', secret).update(payload).digest('hex')
}

/**
 * Check a received signature against the payload using timing-safe comparison.
 *
 * Comparison is case-sensitive: the provider sends lowercase hex, so an
 * upper-case signature never matches. Empty payloads and secrets are
 * hashed like any other input.
 *
 * @param payload - Raw webhook body, exactly as received
 * @param secret - Shared webhook secret
 * @param signature - Signature value extracted from the delivery
 * @returns True only if the signature matches
 */
export function verifyWebhookSignature(
  payload: SignatureInput,
  secret: SignatureInput,
  signature: string
): boolean {
  const expected = computeWebhookSignature(payload, secret)
  const expectedBuf = Buffer.from(expected, 'utf8')
  const signatureBuf = Buffer.from(signature, 'utf8')

  // timingSafeEqual throws on unequal lengths
  if (expectedBuf.length !== signatureBuf.length) {
    return false
  }

  return timingSafeEqual(expectedBuf, signatureBuf)
}
