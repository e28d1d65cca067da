/**
 * CLI argument parser: `<command> --flag value --switch`.
 */

import path from 'node:path'
import type { ListOptions, SyncOptions } from '../types.js'
import type { ToolConfig } from '../config/config.js'
import { DEFAULT_TIMEOUT_MS } from '../source/archon/client.js'

export type CliCommand =
  | { command: 'sync'; options: SyncOptions }
  | { command: 'list'; options: ListOptions }
  | { command: 'help' }

type ParsedOk = { ok: true; data: CliCommand & { helpText: string } }
type ParsedErr = { ok: false; error: string }

export const DEFAULT_CONCURRENCY = 5
export const DEFAULT_REQUESTS_PER_SECOND = 4

const BOOLEAN_FLAGS = new Set(['clear'])

function getHelpText(): string {
  return [
    'build-sync',
    '',
    'Usage:',
    '  build-sync sync --selection <file> [options]',
    '  build-sync list --output <file>',
    '',
    'Options:',
    '  --selection <path>       sync: selection JSON (characters, content, outputPath)',
    '  --output <path>          SavedVariables file (sync: overrides outputPath)',
    '  --clear                  sync: remove all managed builds before adding new ones',
    `  --concurrency <n>        sync: requests in flight (default from config or ${DEFAULT_CONCURRENCY})`,
    `  --rps <n>                sync: requests started per second (default from config or ${DEFAULT_REQUESTS_PER_SECOND})`,
    `  --timeout-ms <n>         sync: per-request timeout (default from config or ${DEFAULT_TIMEOUT_MS})`,
    '  -h, --help               show help',
    ''
  ].join('\n')
}

function positiveInt(raw: string | undefined, fallback: number): number | null {
  if (raw === undefined) return fallback
  const n = Number.parseInt(raw, 10)
  return Number.isFinite(n) && n >= 1 ? n : null
}

function positiveNumber(raw: string | undefined, fallback: number): number | null {
  if (raw === undefined) return fallback
  const n = Number(raw)
  return Number.isFinite(n) && n > 0 ? n : null
}

/**
 * Parse process.argv into a command + strongly-typed options.
 */
export function parseCliArgs(argv: string[], config?: ToolConfig): ParsedOk | ParsedErr {
  const helpText = getHelpText()
  const help: ParsedOk = { ok: true, data: { command: 'help', helpText } }
  const args = argv.slice(2)
  const command = args.shift() || 'help'

  if (command === '-h' || command === '--help' || command === 'help') return help
  if (command !== 'sync' && command !== 'list') {
    return { ok: false, error: `Unknown command: ${command}\n\n${helpText}` }
  }

  const values = new Map<string, string>()
  const flags = new Set<string>()
  for (let i = 0; i < args.length; i++) {
    const a = args[i] ?? ''
    if (a === '-h' || a === '--help') return help
    if (!a.startsWith('--')) {
      return { ok: false, error: `Unexpected arg: ${a}\n\n${helpText}` }
    }
    const key = a.slice(2)
    if (BOOLEAN_FLAGS.has(key)) {
      flags.add(key)
      continue
    }
    const next = args[i + 1]
    if (!next || next.startsWith('--')) {
      return { ok: false, error: `Missing value for --${key}\n\n${helpText}` }
    }
    values.set(key, next)
    i++
  }

  const output = values.get('output')

  if (command === 'list') {
    if (!output) return { ok: false, error: `list: --output is required\n\n${helpText}` }
    return { ok: true, data: { command, options: { outputPath: path.normalize(output) }, helpText } }
  }

  const selection = values.get('selection')
  if (!selection) return { ok: false, error: `sync: --selection is required\n\n${helpText}` }

  const fetchCfg = config?.fetch
  const concurrency = positiveInt(values.get('concurrency'), fetchCfg?.concurrency ?? DEFAULT_CONCURRENCY)
  if (concurrency === null) return { ok: false, error: `Invalid --concurrency value\n\n${helpText}` }
  const requestsPerSecond = positiveNumber(values.get('rps'), fetchCfg?.requestsPerSecond ?? DEFAULT_REQUESTS_PER_SECOND)
  if (requestsPerSecond === null) return { ok: false, error: `Invalid --rps value\n\n${helpText}` }
  const timeoutMs = positiveInt(values.get('timeout-ms'), fetchCfg?.timeoutMs ?? DEFAULT_TIMEOUT_MS)
  if (timeoutMs === null) return { ok: false, error: `Invalid --timeout-ms value\n\n${helpText}` }

  return {
    ok: true,
    data: {
      command,
      options: {
        selectionPath: path.normalize(selection),
        outputPath: output ? path.normalize(output) : undefined,
        clear: flags.has('clear'),
        concurrency,
        requestsPerSecond,
        timeoutMs
      },
      helpText
    }
  }
}
