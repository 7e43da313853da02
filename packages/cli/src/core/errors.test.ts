import {
  MessagingApiError,
  MessagingConfigError,
  MessagingDecodeError,
} from '@simplemsg/sdk'
import { describe, expect, it } from 'vitest'
import {
  AuthError,
  CLIError,
  EXIT_CODES,
  NetworkError,
  formatError,
  toCLIError,
} from './errors'

const apiError = (status: number, message: string) =>
  new MessagingApiError(
    status,
    '',
    JSON.stringify({ error: message }),
    { error: message },
    message
  )

describe('toCLIError', () => {
  it('returns CLI errors unchanged', () => {
    const error = new CLIError({ userMessage: 'Already mapped.' })
    expect(toCLIError(error, { userMessage: 'ignored' })).toBe(error)
  })

  it('maps API errors to the error exit code with the status', () => {
    const error = toCLIError(apiError(404, 'not found'), {
      userMessage: 'Failed to fetch contact.',
      suggestion: 'Verify the contact ID.',
    })

    expect(error).toBeInstanceOf(CLIError)
    expect(error.exitCode).toBe(EXIT_CODES.error)
    expect(error.userMessage).toBe(
      'Failed to fetch contact. HTTP 404: not found'
    )
    expect(error.suggestion).toBe('Verify the contact ID.')
  })

  it.each([401, 403])('maps HTTP %i to an auth error', (status) => {
    const error = toCLIError(apiError(status, 'denied'), {
      userMessage: 'Failed to list contacts.',
    })

    expect(error).toBeInstanceOf(AuthError)
    expect(error.exitCode).toBe(EXIT_CODES.auth)
    expect(error.userMessage).toBe(
      `Failed to list contacts. HTTP ${status}: denied`
    )
    expect(error.suggestion).toBe('Check SIMPLEMSG_API_KEY or pass --api-key.')
  })

  it('maps decode errors and keeps the body for debugging', () => {
    const cause = new SyntaxError('Unexpected token')
    const error = toCLIError(new MessagingDecodeError(200, '<html>', cause), {
      userMessage: 'Failed to fetch message.',
    })

    expect(error.exitCode).toBe(EXIT_CODES.error)
    expect(error.userMessage).toBe(
      'Failed to fetch message. The API returned a body that is not JSON.'
    )
    expect(error.debugMessage).toBe('<html>')
  })

  it('maps config errors to the usage exit code', () => {
    const error = toCLIError(new MessagingConfigError([]), {
      userMessage: 'Failed to list contacts.',
    })

    expect(error.exitCode).toBe(EXIT_CODES.usage)
    expect(error.userMessage).toBe('Invalid messaging client config: ')
  })

  it('maps fetch TypeErrors to a network error', () => {
    const error = toCLIError(new TypeError('fetch failed'), {
      userMessage: 'Failed to send message.',
    })

    expect(error).toBeInstanceOf(NetworkError)
    expect(error.exitCode).toBe(EXIT_CODES.network)
    expect(error.userMessage).toBe('Failed to send message. fetch failed')
  })

  it('wraps anything else with the command message', () => {
    const cause = new Error('boom')
    const error = toCLIError(cause, {
      userMessage: 'Failed to create contact.',
      suggestion: 'Try again.',
    })

    expect(error.exitCode).toBe(EXIT_CODES.error)
    expect(error.userMessage).toBe('Failed to create contact.')
    expect(error.cause).toBe(cause)
  })
})

describe('formatError', () => {
  it('appends the suggestion on its own line', () => {
    const error = new CLIError({
      userMessage: 'Nothing to update.',
      suggestion: 'Pass --name and/or --phone.',
    })

    expect(formatError(error)).toBe(
      'Nothing to update.\nSuggestion: Pass --name and/or --phone.'
    )
  })

  it('prints the message alone without a suggestion', () => {
    expect(formatError(new CLIError({ userMessage: 'Failed.' }))).toBe(
      'Failed.'
    )
  })

  it('falls back for plain errors and non-errors', () => {
    expect(formatError(new Error('plain'))).toBe('plain')
    expect(formatError('nope')).toBe('An unexpected error occurred.')
  })
})
