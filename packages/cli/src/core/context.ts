import type { Command } from 'commander'
import { type CliConfig, resolveCliConfig } from './config-loader'
import {
  type OutputFormat,
  type OutputFormatter,
  type OutputStream,
  createOutputFormatter,
  isOutputFormat,
} from './output'

export interface CommandContext {
  stdout: OutputStream
  stderr: OutputStream
  config: CliConfig
  format: OutputFormat
  output: OutputFormatter
  verbose: boolean
  quiet: boolean
}

export function createContext(
  overrides: Partial<CommandContext> = {}
): CommandContext {
  const stdout = overrides.stdout ?? process.stdout
  const stderr = overrides.stderr ?? process.stderr
  const verbose = overrides.verbose ?? false
  const quiet = overrides.quiet ?? false
  const format = overrides.format ?? (stdout.isTTY ? 'text' : 'json')
  const config = overrides.config ?? resolveCliConfig()
  const output =
    overrides.output ??
    createOutputFormatter({
      format,
      stdout,
      stderr,
      verbose,
      quiet,
    })

  return {
    stdout,
    stderr,
    config,
    format,
    output,
    verbose,
    quiet,
  }
}

/**
 * Extract global CLI options from a Commander command and create a CommandContext.
 * Use this in .action() handlers to avoid repeating the same boilerplate.
 */
export function contextFromCommand(command: Command): CommandContext {
  const opts = command.optsWithGlobals<{
    format?: string
    verbose?: boolean
    quiet?: boolean
    baseUrl?: string
    apiKey?: string
    secret?: string
  }>()

  return createContext({
    format: isOutputFormat(opts.format) ? opts.format : undefined,
    verbose: opts.verbose,
    quiet: opts.quiet,
    config: resolveCliConfig({
      baseUrl: opts.baseUrl,
      apiKey: opts.apiKey,
      secret: opts.secret,
    }),
  })
}
