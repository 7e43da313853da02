import type { JsonValue } from './types'
import { verifyWebhookSignature } from './webhooks/verify'

/**
 * Configuration for createWebhookHandler
 */
export interface WebhookHandlerConfig {
  /** Shared secret the provider signs deliveries with */
  webhookSecret: string
  /** Called with the parsed event once the signature checks out */
  onEvent: (event: JsonValue) => void | Promise<void>
  /**
   * Header carrying the signature (default: authorization).
   * A leading `Bearer ` is stripped.
   */
  signatureHeader?: string
}

/**
 * Creates a web-standard route handler for provider webhooks.
 * Verifies the HMAC-SHA256 signature of the raw body bytes before parsing
 * them as UTF-8 JSON (a leading BOM is skipped).
 *
 * Responses:
 * - 403 `{ error: 'Invalid signature' }` for a missing or forged signature
 * - 400 `{ error: 'Invalid JSON body' }` when the body is not JSON
 * - 200 `{ status: 'Received' }` after onEvent resolves
 *
 * @example
 * ```typescript
 * import { createWebhookHandler } from '@simplemsg/sdk/handler'
 *
 * export const POST = createWebhookHandler({
 *   webhookSecret: process.env.SIMPLEMSG_WEBHOOK_SECRET ?? '',
 *   onEvent: async (event) => {
 *     await queue.push(event)
 *   },
 * })
 * ```
 */
export function createWebhookHandler(
  config: WebhookHandlerConfig
): (request: Request) => Promise<Response> {
  const { webhookSecret, onEvent } = config
  const headerName = config.signatureHeader ?? 'authorization'

  return async function handler(request: Request): Promise<Response> {
    try {
      const signature = (request.headers.get(headerName) ?? '').replace(
        /^Bearer /,
        ''
      )
      // Signed over the bytes as delivered, before any text decoding
      const rawBody = Buffer.from(await request.arrayBuffer())

      if (!verifyWebhookSignature(rawBody, webhookSecret, signature)) {
        return jsonResponse({ error: 'Invalid signature' }, 403)
      }

      let event: JsonValue
      try {
        event = JSON.parse(new TextDecoder().decode(rawBody))
      } catch {
        return jsonResponse({ error: 'Invalid JSON body' }, 400)
      }

      await onEvent(event)
      return jsonResponse({ status: 'Received' }, 200)
    } catch (err) {
      const message = err instanceof Error ? err.message : 'Unknown error'
      return jsonResponse({ error: `Internal error: ${message}` }, 500)
    }
  }
}

/**
 * Helper to create JSON responses
 */
function jsonResponse(data: JsonValue, status: number): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: {
      'content-type': 'application/json',
    },
  })
}
