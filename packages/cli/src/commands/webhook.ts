/**
 * Webhook signature commands
 *
 * simplemsg webhook sign|verify
 */

import {
  computeWebhookSignature,
  verifyWebhookSignature,
} from '@simplemsg/sdk/webhooks'
import type { Command } from 'commander'
import { ENV_KEYS } from '../core/config-loader'
import { type CommandContext, contextFromCommand } from '../core/context'
import { CLIError, EXIT_CODES, toCLIError } from '../core/errors'
import { reportError } from './client'

function requireSecret(ctx: Pick<CommandContext, 'config'>): string {
  const secret = ctx.config.webhookSecret
  if (secret === undefined) {
    throw new CLIError({
      userMessage: 'A webhook secret is required.',
      exitCode: EXIT_CODES.usage,
      suggestion: `Pass --secret or set ${ENV_KEYS.webhookSecret}.`,
    })
  }
  return secret
}

/**
 * Command: simplemsg webhook sign <payload>
 */
export function signPayload(ctx: CommandContext, payload: string): void {
  try {
    const signature = computeWebhookSignature(payload, requireSecret(ctx))
    ctx.output.data({ signature })
  } catch (error) {
    reportError(
      ctx,
      toCLIError(error, { userMessage: 'Failed to sign payload.' })
    )
  }
}

/**
 * Command: simplemsg webhook verify <payload> <signature>
 *
 * Prints `{ valid }`; a mismatch also sets exit code 1.
 */
export function verifyPayload(
  ctx: CommandContext,
  payload: string,
  signature: string
): void {
  try {
    const valid = verifyWebhookSignature(payload, requireSecret(ctx), signature)
    ctx.output.data({ valid })
    if (!valid) {
      ctx.output.error('Signature does not match payload.')
      process.exitCode = EXIT_CODES.error
    }
  } catch (error) {
    reportError(
      ctx,
      toCLIError(error, { userMessage: 'Failed to verify signature.' })
    )
  }
}

export function registerWebhookCommands(program: Command): void {
  const webhook = program
    .command('webhook')
    .description('Sign and verify webhook payloads')

  webhook
    .command('sign')
    .description('Compute the signature for a payload')
    .argument('<payload>', 'Raw request body')
    .option('--secret <secret>', `Webhook secret (or ${ENV_KEYS.webhookSecret})`)
    .action((payload: string, _options, command: Command) => {
      signPayload(contextFromCommand(command), payload)
    })

  webhook
    .command('verify')
    .description('Check a signature against a payload')
    .argument('<payload>', 'Raw request body')
    .argument('<signature>', 'Signature to check')
    .option('--secret <secret>', `Webhook secret (or ${ENV_KEYS.webhookSecret})`)
    .action(
      (payload: string, signature: string, _options, command: Command) => {
        verifyPayload(contextFromCommand(command), payload, signature)
      }
    )
}
