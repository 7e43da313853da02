import type {
  JsonValue,
  ListMessagesParams,
  Message,
  SendMessageParams,
} from '../types'
import type { BaseClient } from './base'

/**
 * Create a messages client
 * Provides methods for sending and fetching messages
 */
export function createMessagesClient(client: BaseClient) {
  return {
    /**
     * Send a message from a phone number to an existing contact
     */
    send: ({ from, toContactId, content }: SendMessageParams) =>
      client.post<Message>('/messages', {
        from,
        to: { id: toContactId },
        content,
      }),

    /**
     * Get a single message by ID
     */
    get: (id: string) =>
      client.get<Message>(`/messages/${encodeURIComponent(id)}`),

    /**
     * List messages, one page at a time
     */
    list: ({ page = 1, limit = 100 }: ListMessagesParams = {}) =>
      client.get<JsonValue>('/messages', { query: { page, limit } }),
  }
}

/**
 * Type for the messages client instance
 */
export type MessagesClient = ReturnType<typeof createMessagesClient>
