import { InvalidArgumentError } from 'commander'
import type { CommandContext } from '../core/context'
import { ENV_KEYS } from '../core/config-loader'
import { AuthError, CLIError, EXIT_CODES, formatError } from '../core/errors'
import {
  type InstrumentedMessagingClient,
  createInstrumentedMessagingClient,
} from '../lib/instrumented-client'

/**
 * Build the messaging client for a command from its resolved config
 */
export function getMessagingClient(
  ctx: Pick<CommandContext, 'config'>
): InstrumentedMessagingClient {
  const { baseUrl, apiKey } = ctx.config

  if (!baseUrl) {
    throw new CLIError({
      userMessage: `${ENV_KEYS.baseUrl} environment variable is required.`,
      exitCode: EXIT_CODES.usage,
      suggestion: `Set ${ENV_KEYS.baseUrl} in your shell or .env.local, or pass --base-url.`,
    })
  }

  if (!apiKey) {
    throw new AuthError({
      userMessage: `${ENV_KEYS.apiKey} environment variable is required.`,
      suggestion: `Set ${ENV_KEYS.apiKey} in your shell or .env.local, or pass --api-key.`,
    })
  }

  return createInstrumentedMessagingClient({ baseUrl, apiKey })
}

/**
 * Print a CLI error and set the process exit code
 */
export function reportError(ctx: CommandContext, error: CLIError): void {
  ctx.output.error(formatError(error))
  process.exitCode = error.exitCode
}

/**
 * Integer option parser. Range checks are left to the API.
 */
export function parseInteger(value: string): number {
  const parsed = Number(value)
  if (value.trim() === '' || !Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.')
  }
  return parsed
}
