import { Command, Option } from 'commander'
import { registerContactCommands } from './commands/contacts'
import { registerMessageCommands } from './commands/messages'
import { registerWebhookCommands } from './commands/webhook'
import { OUTPUT_FORMATS } from './core/output'

export const CLI_VERSION = '0.1.0'

/**
 * Build the simplemsg command tree
 */
export function createProgram(): Command {
  const program = new Command()

  program
    .name('simplemsg')
    .description('Command line client for the messaging API')
    .version(CLI_VERSION)
    .option('--base-url <url>', 'API base URL (or SIMPLEMSG_BASE_URL)')
    .option('--api-key <key>', 'API key (or SIMPLEMSG_API_KEY)')
    .addOption(
      new Option('--format <format>', 'Output format').choices(OUTPUT_FORMATS)
    )
    .option('-v, --verbose', 'Show progress output')
    .option('-q, --quiet', 'Only print data and errors')

  registerContactCommands(program)
  registerMessageCommands(program)
  registerWebhookCommands(program)

  return program
}
