import type {
  Contact,
  DeleteContactResult,
  JsonValue,
  ListContactsParams,
  UpdateContactParams,
} from '../types'
import type { BaseClient } from './base'

export const CONTACT_DELETED_MESSAGE = 'Contact deleted successfully'

export function createContactsClient(client: BaseClient) {
  return {
    create: (name: string, phone: string) =>
      client.post<Contact>('/contacts', { name, phone }),

    get: (id: string) =>
      client.get<Contact>(`/contacts/${encodeURIComponent(id)}`),

    /**
     * List contacts. The response is returned exactly as the API sent it.
     */
    list: ({ pageIndex = 1, max = 10 }: ListContactsParams = {}) =>
      client.get<JsonValue>('/contacts', { query: { pageIndex, max } }),

    /**
     * Partial update; fields left undefined are not sent
     */
    update: (id: string, data: UpdateContactParams) =>
      client.patch<Contact>(`/contacts/${encodeURIComponent(id)}`, data),

    delete: async (id: string): Promise<DeleteContactResult> => {
      await client.delete(`/contacts/${encodeURIComponent(id)}`)
      return { message: CONTACT_DELETED_MESSAGE }
    },
  }
}

export type ContactsClient = ReturnType<typeof createContactsClient>
