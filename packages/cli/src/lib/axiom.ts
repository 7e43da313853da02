/**
 * Axiom request logging for the CLI
 *
 * Every API call the CLI makes is logged as one event. Logging is off
 * until initializeAxiom() finds AXIOM_TOKEN.
 */

import { Axiom } from '@axiomhq/js'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

const DEFAULT_DATASET = 'simplemsg-requests'

let axiomClient: Axiom | null = null
let dataset = DEFAULT_DATASET

/**
 * Initialize Axiom client (call once at startup).
 * Returns whether logging is enabled.
 */
export function initializeAxiom(
  env: NodeJS.ProcessEnv = process.env
): boolean {
  const token = env.AXIOM_TOKEN
  dataset = env.AXIOM_DATASET || DEFAULT_DATASET

  if (!token) {
    axiomClient = null
    return false
  }

  axiomClient = new Axiom({ token })
  return true
}

export function isAxiomEnabled(): boolean {
  return axiomClient !== null
}

/**
 * Send buffered events before the process exits
 */
export async function flushAxiom(): Promise<void> {
  await axiomClient?.flush()
}

/**
 * Log a message to Axiom with optional metadata.
 *
 * Levels map to success/status for error-rate queries:
 * - debug/info/warn => success=true, status='success'
 * - error           => success=false, status='error'
 *
 * Ingest failures are written to stderr, never thrown.
 */
export async function log(
  level: LogLevel,
  message: string,
  metadata?: Record<string, unknown>
): Promise<void> {
  if (!axiomClient) return

  const isError = level === 'error'

  try {
    await axiomClient.ingest(dataset, {
      _time: new Date().toISOString(),
      ...metadata,
      level,
      message,
      status: isError ? 'error' : 'success',
      success: !isError,
    })
  } catch (error) {
    console.error('[Axiom] Failed to send log:', error)
  }
}
