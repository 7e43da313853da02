import type { z } from 'zod'

/**
 * Base class for every error the SDK raises itself.
 * Transport failures from `fetch` are not wrapped and never extend this.
 */
export class MessagingError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'MessagingError'
  }
}

/**
 * The client was constructed with an invalid base URL or API key
 */
export class MessagingConfigError extends MessagingError {
  constructor(public readonly issues: z.ZodIssue[]) {
    super(
      `Invalid messaging client config: ${issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ')}`
    )
    this.name = 'MessagingConfigError'
  }
}

/**
 * Non-2xx response from the messaging API.
 * `body` is the raw response text, `data` the same body decoded as JSON
 * (undefined when it is not JSON).
 */
export class MessagingApiError extends MessagingError {
  constructor(
    public readonly status: number,
    public readonly statusText: string,
    public readonly body: string,
    public readonly data: unknown,
    message: string
  ) {
    super(message)
    this.name = 'MessagingApiError'
  }
}

/**
 * 2xx response whose body could not be decoded as JSON
 */
export class MessagingDecodeError extends MessagingError {
  constructor(
    public readonly status: number,
    public readonly body: string,
    cause: unknown
  ) {
    super(`Failed to decode JSON response (status ${status})`, { cause })
    this.name = 'MessagingDecodeError'
  }
}
