#!/usr/bin/env node

import { applyEnv, loadPlaintextEnv } from './core/config-loader'
import { flushAxiom, initializeAxiom } from './lib/axiom'
import { createProgram } from './program'

// Plaintext .env.local / .env from the working directory; never overrides the shell
applyEnv(loadPlaintextEnv(process.cwd()))

const program = createProgram()

const verbose = process.argv.some((arg) => arg === '--verbose' || arg === '-v')
if (!initializeAxiom() && verbose) {
  console.warn('AXIOM_TOKEN not set; request logging is disabled.')
}

try {
  await program.parseAsync(process.argv)
} finally {
  await flushAxiom()
}
