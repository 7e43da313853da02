import { z } from 'zod'
import {
  type MessagingClientConfig,
  MessagingClientConfigSchema,
} from '../types'
import {
  MessagingApiError,
  MessagingConfigError,
  MessagingDecodeError,
  MessagingError,
} from './errors'

export type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'PUT' | 'DELETE'

export type QueryParams = Record<string, string | number | undefined>

/**
 * Shape of the error bodies the API returns on 4xx/5xx.
 * Both `{ error }` and `{ message }` are seen in the wild.
 */
const ErrorBodySchema = z.union([
  z.object({ error: z.string() }),
  z.object({ message: z.string() }),
])

/**
 * Validate and normalize client config.
 * Strips a trailing slash so paths can always start with `/`.
 */
export function resolveClientConfig(config: MessagingClientConfig): {
  baseUrl: string
  apiKey: string
} {
  const parsed = MessagingClientConfigSchema.safeParse(config)
  if (!parsed.success) {
    throw new MessagingConfigError(parsed.error.issues)
  }
  return {
    baseUrl: parsed.data.baseUrl.replace(/\/$/, ''),
    apiKey: parsed.data.apiKey,
  }
}

/**
 * Build a request URL from base, path and optional query params.
 * Undefined params are left out. Paths must start with `/` so requests,
 * and the API key sent with them, never leave `baseUrl`.
 */
export function buildUrl(
  baseUrl: string,
  path: string,
  query?: QueryParams
): string {
  if (!path.startsWith('/')) {
    throw new MessagingError(
      `Request path must start with "/" and stay under baseUrl: ${path}`
    )
  }
  const url = `${baseUrl}${path}`
  if (!query) return url

  const search = new URLSearchParams()
  for (const [key, value] of Object.entries(query)) {
    if (value !== undefined) search.set(key, String(value))
  }
  const qs = search.toString()
  return qs ? `${url}?${qs}` : url
}

type JsonParseResult =
  | { ok: true; value: unknown }
  | { ok: false; error: unknown }

function parseJson(text: string): JsonParseResult {
  try {
    return { ok: true, value: JSON.parse(text) }
  } catch (error) {
    return { ok: false, error }
  }
}

/**
 * Turn a non-2xx response into a MessagingApiError carrying status and body
 */
export async function toApiError(
  response: Response
): Promise<MessagingApiError> {
  const body = await response.text()
  const decoded = body ? parseJson(body) : undefined
  const data = decoded?.ok ? decoded.value : undefined

  const parsed = ErrorBodySchema.safeParse(data)
  const message = parsed.success
    ? 'error' in parsed.data
      ? parsed.data.error
      : parsed.data.message
    : `Request failed: ${response.status} ${response.statusText}`.trim()

  return new MessagingApiError(
    response.status,
    response.statusText,
    body,
    data,
    message
  )
}

/**
 * Decode a 2xx response body.
 * An empty body (204 included) is not JSON and throws like any other.
 */
export async function decodeResponse(response: Response): Promise<unknown> {
  const body = await response.text()
  const decoded = parseJson(body)
  if (!decoded.ok) {
    throw new MessagingDecodeError(response.status, body, decoded.error)
  }
  return decoded.value
}

/**
 * Transport overrides. `fetch` replaces the global fetch for every request,
 * e.g. to add logging around each call.
 */
export interface BaseClientOptions {
  fetch?: typeof fetch
}

export interface RequestOptions<T> {
  query?: QueryParams
  body?: unknown
  schema?: z.ZodType<T>
}

/**
 * Create a base HTTP client with authentication and error handling.
 * One fetch per call: no retries, no caching.
 */
export function createBaseClient(
  config: MessagingClientConfig,
  clientOptions: BaseClientOptions = {}
) {
  const { baseUrl, apiKey } = resolveClientConfig(config)
  const headers = {
    Authorization: `Bearer ${apiKey}`,
    'Content-Type': 'application/json',
  }

  async function request<T>(
    method: HttpMethod,
    path: string,
    options: RequestOptions<T> = {}
  ): Promise<T> {
    const { query, body, schema } = options

    const doFetch = clientOptions.fetch ?? fetch
    const response = await doFetch(buildUrl(baseUrl, path, query), {
      method,
      headers,
      body: body === undefined ? undefined : JSON.stringify(body),
    })

    if (!response.ok) {
      throw await toApiError(response)
    }

    // The API's DELETE bodies carry nothing the caller needs
    if (method === 'DELETE') {
      return undefined as T
    }

    const data = await decodeResponse(response)
    if (schema) {
      return schema.parse(data)
    }
    return data as T
  }

  return {
    /** Base URL with any trailing slash removed */
    baseUrl,

    get: <T>(path: string, options?: Omit<RequestOptions<T>, 'body'>) =>
      request<T>('GET', path, options),

    post: <T>(path: string, body: unknown, schema?: z.ZodType<T>) =>
      request<T>('POST', path, { body, schema }),

    patch: <T>(path: string, body: unknown, schema?: z.ZodType<T>) =>
      request<T>('PATCH', path, { body, schema }),

    put: <T>(path: string, body: unknown, schema?: z.ZodType<T>) =>
      request<T>('PUT', path, { body, schema }),

    delete: (path: string) => request<void>('DELETE', path),
  }
}

/**
 * Transport used by the resource clients
 */
export type BaseClient = Pick<
  ReturnType<typeof createBaseClient>,
  'get' | 'post' | 'patch' | 'put' | 'delete'
>
