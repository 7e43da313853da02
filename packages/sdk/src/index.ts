/**
 * @simplemsg/sdk
 * Typed client for the messaging API, plus webhook signature verification
 */

/** SDK version */
export const SDK_VERSION = '0.1.0'

export type {
  Contact,
  DeleteContactResult,
  JsonObject,
  JsonValue,
  ListContactsParams,
  ListMessagesParams,
  Message,
  MessagingClientConfig,
  SendMessageParams,
  UpdateContactParams,
} from './types'
export { MessagingClientConfigSchema } from './types'

// Errors
export {
  MessagingApiError,
  MessagingConfigError,
  MessagingDecodeError,
  MessagingError,
} from './client/errors'

// Base client utilities
export {
  buildUrl,
  createBaseClient,
  decodeResponse,
  resolveClientConfig,
  toApiError,
  type BaseClient,
  type BaseClientOptions,
  type HttpMethod,
  type QueryParams,
  type RequestOptions,
} from './client/base'

// Individual resource factories (for instrumented clients)
export {
  CONTACT_DELETED_MESSAGE,
  createContactsClient,
  type ContactsClient,
} from './client/contacts'
export { createMessagesClient, type MessagesClient } from './client/messages'

// Webhooks
export {
  computeWebhookSignature,
  verifyWebhookSignature,
  type SignatureInput,
} from './webhooks'
export { createWebhookHandler, type WebhookHandlerConfig } from './handler'

import { type BaseClientOptions, createBaseClient } from './client/base'
import { createContactsClient } from './client/contacts'
import { createMessagesClient } from './client/messages'
import type { MessagingClientConfig } from './types'

/**
 * Create a messaging API client.
 * Throws MessagingConfigError when baseUrl or apiKey is empty.
 *
 * @example
 * ```ts
 * const client = createMessagingClient({
 *   baseUrl: 'https://api.example.com',
 *   apiKey: 'test-api-key',
 * })
 *
 * const contact = await client.contacts.create('John Doe', '1234567890')
 * await client.messages.send({
 *   from: '5550001111',
 *   toContactId: contact.id ?? '',
 *   content: 'Hello!',
 * })
 * ```
 */
export function createMessagingClient(
  config: MessagingClientConfig,
  options: BaseClientOptions = {}
) {
  const baseClient = createBaseClient(config, options)

  return {
    /** Raw HTTP methods for custom requests */
    raw: baseClient,

    /** Contact operations */
    contacts: createContactsClient(baseClient),

    /** Message operations */
    messages: createMessagesClient(baseClient),
  }
}

/** Type for the full messaging client instance */
export type MessagingClient = ReturnType<typeof createMessagingClient>
