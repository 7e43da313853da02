/**
 * Webhook verification module
 *
 * HMAC-SHA256 signature checks for inbound webhook deliveries.
 * Needs no client config: pass the raw body, the shared secret and the
 * signature taken from the request.
 *
 * @example
 * ```typescript
 * import { verifyWebhookSignature } from '@simplemsg/sdk/webhooks'
 *
 * if (!verifyWebhookSignature(rawBody, webhookSecret, signature)) {
 *   return new Response(JSON.stringify({ error: 'Invalid signature' }), { status: 403 })
 * }
 * ```
 */

export type { SignatureInput } from './verify'

export { computeWebhookSignature, verifyWebhookSignature } from './verify'
