import { z } from 'zod'

/**
 * Any value that survives a JSON round trip.
 * Contacts and messages are owned by the remote API, so the SDK passes
 * them through as open records of these.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue }

export type JsonObject = { [key: string]: JsonValue }

/**
 * Client configuration. Both fields are required and non-empty.
 */
export const MessagingClientConfigSchema = z.object({
  baseUrl: z.string().min(1, 'baseUrl is required').url(),
  apiKey: z.string().min(1, 'apiKey is required'),
})

export type MessagingClientConfig = z.infer<typeof MessagingClientConfigSchema>

/**
 * Contact record as returned by the API.
 * Only the fields the SDK sends are named; everything else passes through.
 */
export interface Contact {
  id?: string
  name?: string
  phone?: string
  [key: string]: JsonValue | undefined
}

/**
 * Message record as returned by the API.
 */
export interface Message {
  id?: string
  from?: string
  to?: JsonValue
  content?: string
  status?: string
  [key: string]: JsonValue | undefined
}

export interface UpdateContactParams {
  name?: string
  phone?: string
}

export interface SendMessageParams {
  /** Sender phone number */
  from: string
  /** Recipient contact ID */
  toContactId: string
  content: string
}

/**
 * Contacts pagination. Defaults: pageIndex 1, max 10.
 */
export interface ListContactsParams {
  pageIndex?: number
  max?: number
}

/**
 * Messages pagination. Defaults: page 1, limit 100.
 */
export interface ListMessagesParams {
  page?: number
  limit?: number
}

export interface DeleteContactResult {
  message: string
}
