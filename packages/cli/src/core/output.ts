import { inspect } from 'node:util'

export type OutputFormat = 'json' | 'text' | 'table'

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'text', 'table']

export type TableRow = Record<string, unknown>

/** The part of a stream the formatters write to */
export interface OutputStream {
  write(chunk: string): unknown
  isTTY?: boolean
}

export interface OutputFormatter {
  data(value: unknown): void
  message(text: string): void
  success(text: string): void
  warn(text: string): void
  error(text: string): void
  progress(label: string): void
}

export interface OutputFormatterConfig {
  format?: OutputFormat
  stdout: OutputStream
  stderr: OutputStream
  verbose?: boolean
  quiet?: boolean
}

export const isOutputFormat = (value: unknown): value is OutputFormat =>
  typeof value === 'string' && OUTPUT_FORMATS.some((f) => f === value)

const cell = (value: unknown): string => {
  if (value === null || value === undefined) return ''
  if (typeof value === 'string') return value
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value)
  }
  return JSON.stringify(value)
}

const isRow = (value: unknown): value is TableRow =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

/**
 * Render rows as aligned columns.
 * Columns are the union of keys across rows, in first-seen order.
 */
export const renderTable = (rows: TableRow[]): string[] => {
  const keys: string[] = []
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      if (!keys.includes(key)) keys.push(key)
    }
  }
  if (keys.length === 0) return []

  const widths = keys.map((key) =>
    Math.max(key.length, ...rows.map((row) => cell(row[key]).length))
  )
  const line = (values: string[]) =>
    values
      .map((value, i) => value.padEnd(widths[i] ?? 0, ' '))
      .join('  ')
      .trimEnd()

  return [line(keys), ...rows.map((row) => line(keys.map((k) => cell(row[k]))))]
}

const humanReadable = (value: unknown): string => {
  if (typeof value === 'string') return value
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value)
  }
  return inspect(value, { depth: null, colors: false })
}

/**
 * Pick json for pipes and text for terminals unless a format was asked for
 */
export const resolveOutputFormat = (
  format: OutputFormat | undefined,
  stdout: OutputStream
): OutputFormat => format ?? (stdout.isTTY ? 'text' : 'json')

class Formatter implements OutputFormatter {
  private readonly format: OutputFormat
  private readonly stdout: OutputStream
  private readonly stderr: OutputStream
  private readonly verbose: boolean
  private readonly quiet: boolean

  constructor(config: OutputFormatterConfig) {
    this.format = resolveOutputFormat(config.format, config.stdout)
    this.stdout = config.stdout
    this.stderr = config.stderr
    this.verbose = config.verbose ?? false
    this.quiet = config.quiet ?? false
  }

  data(value: unknown): void {
    if (this.format === 'json') {
      this.stdout.write(`${JSON.stringify(value)}\n`)
      return
    }

    if (this.format === 'table') {
      const rows = Array.isArray(value) ? value : isRow(value) ? [value] : null
      if (rows && rows.every(isRow)) {
        for (const line of renderTable(rows)) this.stdout.write(`${line}\n`)
        return
      }
    }

    this.stdout.write(`${humanReadable(value)}\n`)
  }

  message(text: string): void {
    if (!this.quiet) this.stderr.write(`${text}\n`)
  }

  success(text: string): void {
    if (!this.quiet) this.stderr.write(`SUCCESS: ${text}\n`)
  }

  warn(text: string): void {
    if (!this.quiet) this.stderr.write(`WARN: ${text}\n`)
  }

  error(text: string): void {
    this.stderr.write(`ERROR: ${text}\n`)
  }

  progress(label: string): void {
    if (this.verbose && !this.quiet) this.stderr.write(`${label}\n`)
  }
}

export const createOutputFormatter = (
  config: OutputFormatterConfig
): OutputFormatter => new Formatter(config)
