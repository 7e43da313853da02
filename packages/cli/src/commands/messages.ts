/**
 * Message commands
 *
 * simplemsg messages send|get|list
 */

import type { Command } from 'commander'
import { type CommandContext, contextFromCommand } from '../core/context'
import { toCLIError } from '../core/errors'
import { getMessagingClient, parseInteger, reportError } from './client'

/**
 * Command: simplemsg messages send <from> <toContactId> <content>
 */
export async function sendMessage(
  ctx: CommandContext,
  from: string,
  toContactId: string,
  content: string
): Promise<void> {
  try {
    const client = getMessagingClient(ctx)
    ctx.output.progress(`Sending message to contact ${toContactId}...`)
    const message = await client.messages.send({ from, toContactId, content })
    ctx.output.data(message)
  } catch (error) {
    reportError(
      ctx,
      toCLIError(error, {
        userMessage: 'Failed to send message.',
        suggestion: 'Verify the sender number and the recipient contact ID.',
      })
    )
  }
}

/**
 * Command: simplemsg messages get <id>
 */
export async function getMessage(
  ctx: CommandContext,
  id: string
): Promise<void> {
  try {
    const client = getMessagingClient(ctx)
    const message = await client.messages.get(id)
    ctx.output.data(message)
  } catch (error) {
    reportError(
      ctx,
      toCLIError(error, {
        userMessage: 'Failed to fetch message.',
        suggestion: 'Verify the message ID.',
      })
    )
  }
}

/**
 * Command: simplemsg messages list [--page n] [--limit n]
 */
export async function listMessages(
  ctx: CommandContext,
  options: { page?: number; limit?: number }
): Promise<void> {
  try {
    const client = getMessagingClient(ctx)
    const page = await client.messages.list({
      page: options.page,
      limit: options.limit,
    })
    ctx.output.data(page)
  } catch (error) {
    reportError(
      ctx,
      toCLIError(error, { userMessage: 'Failed to list messages.' })
    )
  }
}

export function registerMessageCommands(program: Command): void {
  const messages = program
    .command('messages')
    .description('Send and read messages')

  messages
    .command('send')
    .description('Send a message to a contact')
    .argument('<from>', 'Sender phone number')
    .argument('<toContactId>', 'Recipient contact ID')
    .argument('<content>', 'Message text')
    .action(
      async (
        from: string,
        toContactId: string,
        content: string,
        _options,
        command: Command
      ) => {
        await sendMessage(
          contextFromCommand(command),
          from,
          toContactId,
          content
        )
      }
    )

  messages
    .command('get')
    .description('Fetch a message by ID')
    .argument('<id>', 'Message ID')
    .action(async (id: string, _options, command: Command) => {
      await getMessage(contextFromCommand(command), id)
    })

  messages
    .command('list')
    .description('List messages, one page at a time')
    .option('--page <n>', 'Page number (default 1)', parseInteger)
    .option('--limit <n>', 'Messages per page (default 100)', parseInteger)
    .action(
      async (options: { page?: number; limit?: number }, command: Command) => {
        await listMessages(contextFromCommand(command), options)
      }
    )
}
