import {
  MessagingApiError,
  MessagingConfigError,
  MessagingDecodeError,
} from '@simplemsg/sdk'

export const EXIT_CODES = {
  success: 0,
  error: 1,
  usage: 2,
  auth: 10,
  network: 11,
} as const

export interface CLIErrorOptions {
  userMessage: string
  exitCode?: number
  suggestion?: string
  debugMessage?: string
  cause?: unknown
}

export class CLIError extends Error {
  userMessage: string
  exitCode: number
  suggestion?: string
  debugMessage?: string

  constructor({
    userMessage,
    exitCode = EXIT_CODES.error,
    suggestion,
    debugMessage,
    cause,
  }: CLIErrorOptions) {
    super(debugMessage ?? userMessage)

    if (cause !== undefined) {
      this.cause = cause
    }

    this.name = 'CLIError'
    this.userMessage = userMessage
    this.exitCode = exitCode
    this.suggestion = suggestion
    this.debugMessage = debugMessage
  }
}

export class AuthError extends CLIError {
  constructor(options: Omit<CLIErrorOptions, 'exitCode'>) {
    super({ ...options, exitCode: EXIT_CODES.auth })
    this.name = 'AuthError'
  }
}

export class NetworkError extends CLIError {
  constructor(options: Omit<CLIErrorOptions, 'exitCode'>) {
    super({ ...options, exitCode: EXIT_CODES.network })
    this.name = 'NetworkError'
  }
}

/**
 * Map SDK and transport failures onto CLI errors with exit codes.
 * `userMessage` describes what the command was doing.
 */
export function toCLIError(
  error: unknown,
  context: { userMessage: string; suggestion?: string }
): CLIError {
  if (error instanceof CLIError) return error

  if (error instanceof MessagingApiError) {
    const userMessage = `${context.userMessage} HTTP ${error.status}: ${error.message}`
    if (error.status === 401 || error.status === 403) {
      return new AuthError({
        userMessage,
        suggestion: 'Check SIMPLEMSG_API_KEY or pass --api-key.',
        cause: error,
      })
    }
    return new CLIError({
      userMessage,
      suggestion: context.suggestion,
      cause: error,
    })
  }

  if (error instanceof MessagingDecodeError) {
    return new CLIError({
      userMessage: `${context.userMessage} The API returned a body that is not JSON.`,
      debugMessage: error.body,
      cause: error,
    })
  }

  if (error instanceof MessagingConfigError) {
    return new CLIError({
      userMessage: error.message,
      exitCode: EXIT_CODES.usage,
      suggestion: 'Check SIMPLEMSG_BASE_URL and SIMPLEMSG_API_KEY.',
      cause: error,
    })
  }

  // fetch rejects with a TypeError when the connection fails
  if (error instanceof TypeError) {
    return new NetworkError({
      userMessage: `${context.userMessage} ${error.message}`,
      suggestion: 'Check SIMPLEMSG_BASE_URL and your network connection.',
      cause: error,
    })
  }

  return new CLIError({
    userMessage: context.userMessage,
    suggestion: context.suggestion,
    cause: error,
  })
}

export function formatError(error: unknown): string {
  if (error instanceof CLIError) {
    if (error.suggestion) {
      return `${error.userMessage}\nSuggestion: ${error.suggestion}`
    }

    return error.userMessage
  }

  if (error instanceof Error) {
    return error.message || 'An unexpected error occurred.'
  }

  return 'An unexpected error occurred.'
}
