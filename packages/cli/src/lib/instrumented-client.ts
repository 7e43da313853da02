import {
  type MessagingClientConfig,
  createMessagingClient,
} from '@simplemsg/sdk'
import { log } from './axiom'

const REQUEST_ID_HEADERS = [
  'x-request-id',
  'x-amzn-requestid',
  'x-amz-request-id',
]

function extractRequestId(headers: Headers): string | undefined {
  for (const header of REQUEST_ID_HEADERS) {
    const value = headers.get(header)
    if (value) return value
  }
  return undefined
}

function requestUrl(input: string | URL | Request): URL {
  if (typeof input === 'string') return new URL(input)
  if (input instanceof URL) return input
  return new URL(input.url)
}

async function logApiRequest(options: {
  level: 'info' | 'error'
  method: string
  endpoint: string
  statusCode: number
  durationMs: number
  requestId?: string
  errorMessage?: string
}) {
  await log(options.level, 'Messaging API request', {
    endpoint: options.endpoint,
    method: options.method,
    httpStatus: options.statusCode,
    durationMs: options.durationMs,
    requestId: options.requestId,
    errorMessage: options.errorMessage,
  })
}

/**
 * fetch wrapper that logs one Axiom event per request.
 * Responses and transport errors pass through untouched.
 */
export const instrumentedFetch: typeof fetch = async (input, init) => {
  const method = init?.method ?? 'GET'
  const endpoint = requestUrl(input).pathname
  const startTime = Date.now()

  let response: Response
  try {
    response = await fetch(input, init)
  } catch (error) {
    await logApiRequest({
      level: 'error',
      method,
      endpoint,
      statusCode: 0,
      durationMs: Date.now() - startTime,
      errorMessage: error instanceof Error ? error.message : String(error),
    })
    throw error
  }

  await logApiRequest({
    level: response.ok ? 'info' : 'error',
    method,
    endpoint,
    statusCode: response.status,
    durationMs: Date.now() - startTime,
    requestId: extractRequestId(response.headers),
    errorMessage: response.ok ? undefined : response.statusText,
  })

  return response
}

/**
 * Messaging client whose requests are logged to Axiom
 */
export function createInstrumentedMessagingClient(
  config: MessagingClientConfig
) {
  return createMessagingClient(config, { fetch: instrumentedFetch })
}

export type InstrumentedMessagingClient = ReturnType<
  typeof createInstrumentedMessagingClient
>
