/**
 * CLI configuration loading
 *
 * Priority (highest first):
 * 1. Command line flags (--base-url, --api-key, --secret)
 * 2. Process environment
 * 3. .env.local, then .env, in the working directory
 */

import { readFileSync } from 'node:fs'
import { resolve } from 'node:path'
import { z } from 'zod'

export const ENV_KEYS = {
  baseUrl: 'SIMPLEMSG_BASE_URL',
  apiKey: 'SIMPLEMSG_API_KEY',
  webhookSecret: 'SIMPLEMSG_WEBHOOK_SECRET',
} as const

/**
 * Resolved CLI config. Every field is optional here; commands that need
 * one fail with a CLIError naming the variable.
 */
export const CliConfigSchema = z.object({
  baseUrl: z.string().min(1).optional(),
  apiKey: z.string().min(1).optional(),
  webhookSecret: z.string().optional(),
})

export type CliConfig = z.infer<typeof CliConfigSchema>

/**
 * Parse KEY=value lines. Blank lines and `#` comments are skipped,
 * surrounding quotes are stripped.
 */
export function parseEnvContent(content: string): Record<string, string> {
  const env: Record<string, string> = {}
  for (const line of content.split('\n')) {
    const trimmed = line.trim()
    if (!trimmed || trimmed.startsWith('#')) continue
    const eqIdx = trimmed.indexOf('=')
    if (eqIdx === -1) continue
    const key = trimmed.slice(0, eqIdx).trim()
    const raw = trimmed.slice(eqIdx + 1).trim()
    env[key] = raw.replace(/^["'](.*)["']$/, '$1')
  }
  return env
}

/**
 * Load the first of .env.local / .env found in `dir`
 */
export function loadPlaintextEnv(dir: string): Record<string, string> {
  for (const envFile of ['.env.local', '.env']) {
    let content: string
    try {
      content = readFileSync(resolve(dir, envFile), 'utf8')
    } catch (error) {
      if (isNotFound(error)) continue
      throw error
    }
    return parseEnvContent(content)
  }
  return {}
}

function isNotFound(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    (error.code === 'ENOENT' || error.code === 'EISDIR')
  )
}

/**
 * Copy file values into `env` without overriding anything already set.
 * Returns the keys that were applied.
 */
export function applyEnv(
  values: Record<string, string>,
  env: NodeJS.ProcessEnv = process.env
): string[] {
  const applied: string[] = []
  for (const [key, value] of Object.entries(values)) {
    if (env[key] === undefined) {
      env[key] = value
      applied.push(key)
    }
  }
  return applied
}

/**
 * Build CLI config from flags and environment. Empty strings count as
 * unset, except for the webhook secret, where an empty key is valid.
 */
export function resolveCliConfig(
  flags: { baseUrl?: string; apiKey?: string; secret?: string } = {},
  env: NodeJS.ProcessEnv = process.env
): CliConfig {
  const pick = (...values: Array<string | undefined>) =>
    values.find((value) => value !== undefined && value !== '')

  return CliConfigSchema.parse({
    baseUrl: pick(flags.baseUrl, env[ENV_KEYS.baseUrl]),
    apiKey: pick(flags.apiKey, env[ENV_KEYS.apiKey]),
    webhookSecret: flags.secret ?? env[ENV_KEYS.webhookSecret],
  })
}
