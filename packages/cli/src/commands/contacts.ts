/**
 * Contact commands
 *
 * simplemsg contacts create|get|list|update|delete
 */

import type { Command } from 'commander'
import { type CommandContext, contextFromCommand } from '../core/context'
import { CLIError, EXIT_CODES, toCLIError } from '../core/errors'
import { getMessagingClient, parseInteger, reportError } from './client'

/**
 * Command: simplemsg contacts create <name> <phone>
 */
export async function createContact(
  ctx: CommandContext,
  name: string,
  phone: string
): Promise<void> {
  try {
    const client = getMessagingClient(ctx)
    const contact = await client.contacts.create(name, phone)
    ctx.output.data(contact)
  } catch (error) {
    reportError(
      ctx,
      toCLIError(error, { userMessage: 'Failed to create contact.' })
    )
  }
}

/**
 * Command: simplemsg contacts get <id>
 */
export async function getContact(
  ctx: CommandContext,
  id: string
): Promise<void> {
  try {
    const client = getMessagingClient(ctx)
    const contact = await client.contacts.get(id)
    ctx.output.data(contact)
  } catch (error) {
    reportError(
      ctx,
      toCLIError(error, {
        userMessage: 'Failed to fetch contact.',
        suggestion: 'Verify the contact ID.',
      })
    )
  }
}

/**
 * Command: simplemsg contacts list [--page-index n] [--max n]
 */
export async function listContacts(
  ctx: CommandContext,
  options: { pageIndex?: number; max?: number }
): Promise<void> {
  try {
    const client = getMessagingClient(ctx)
    const page = await client.contacts.list({
      pageIndex: options.pageIndex,
      max: options.max,
    })
    ctx.output.data(page)
  } catch (error) {
    reportError(
      ctx,
      toCLIError(error, { userMessage: 'Failed to list contacts.' })
    )
  }
}

/**
 * Command: simplemsg contacts update <id> [--name] [--phone]
 */
export async function updateContact(
  ctx: CommandContext,
  id: string,
  options: { name?: string; phone?: string }
): Promise<void> {
  try {
    if (options.name === undefined && options.phone === undefined) {
      throw new CLIError({
        userMessage: 'Nothing to update.',
        exitCode: EXIT_CODES.usage,
        suggestion: 'Pass --name and/or --phone.',
      })
    }

    const client = getMessagingClient(ctx)
    const contact = await client.contacts.update(id, {
      name: options.name,
      phone: options.phone,
    })
    ctx.output.data(contact)
  } catch (error) {
    reportError(
      ctx,
      toCLIError(error, {
        userMessage: 'Failed to update contact.',
        suggestion: 'Verify the contact ID.',
      })
    )
  }
}

/**
 * Command: simplemsg contacts delete <id>
 */
export async function deleteContact(
  ctx: CommandContext,
  id: string
): Promise<void> {
  try {
    const client = getMessagingClient(ctx)
    const result = await client.contacts.delete(id)
    ctx.output.success(result.message)
  } catch (error) {
    reportError(
      ctx,
      toCLIError(error, {
        userMessage: 'Failed to delete contact.',
        suggestion: 'Verify the contact ID.',
      })
    )
  }
}

export function registerContactCommands(program: Command): void {
  const contacts = program.command('contacts').description('Manage contacts')

  contacts
    .command('create')
    .description('Create a contact')
    .argument('<name>', 'Contact name')
    .argument('<phone>', 'Contact phone number')
    .action(async (name: string, phone: string, _options, command: Command) => {
      await createContact(contextFromCommand(command), name, phone)
    })

  contacts
    .command('get')
    .description('Fetch a contact by ID')
    .argument('<id>', 'Contact ID')
    .action(async (id: string, _options, command: Command) => {
      await getContact(contextFromCommand(command), id)
    })

  contacts
    .command('list')
    .description('List contacts, one page at a time')
    .option('--page-index <n>', 'Page index (default 1)', parseInteger)
    .option('--max <n>', 'Contacts per page (default 10)', parseInteger)
    .action(
      async (
        options: { pageIndex?: number; max?: number },
        command: Command
      ) => {
        await listContacts(contextFromCommand(command), options)
      }
    )

  contacts
    .command('update')
    .description('Update a contact')
    .argument('<id>', 'Contact ID')
    .option('--name <name>', 'New name')
    .option('--phone <phone>', 'New phone number')
    .action(
      async (
        id: string,
        options: { name?: string; phone?: string },
        command: Command
      ) => {
        await updateContact(contextFromCommand(command), id, options)
      }
    )

  contacts
    .command('delete')
    .description('Delete a contact')
    .argument('<id>', 'Contact ID')
    .action(async (id: string, _options, command: Command) => {
      await deleteContact(contextFromCommand(command), id)
    })
}
