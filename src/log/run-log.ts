/**
 * Run log writer.
 *
 * Every target outcome of a sync run is appended to
 * `<projectRoot>/logs/<stamp>-<command>.log`, so failed lookups can be checked
 * after the console output is gone.
 *
 * Notes:
 * - Append-only and synchronous; safe to call from concurrent fetch workers.
 * - A log that cannot be written is silently disabled; the run itself goes on.
 */

import fs from 'node:fs'
import path from 'node:path'
import type { FetchOutcome } from '../types.js'

let logFilePath: string | undefined

function safeStamp(iso: string): string {
  return iso.replace(/[:.]/g, '-')
}

export function initRunLog(opts: { projectRoot: string; now: Date; command: string }): string | undefined {
  const dir = path.join(opts.projectRoot, 'logs')
  const stamp = safeStamp(opts.now.toISOString())
  logFilePath = path.join(dir, `${stamp}-${opts.command}.log`)

  try {
    fs.mkdirSync(dir, { recursive: true })
    fs.appendFileSync(logFilePath, `# build-sync ${opts.command} ${opts.now.toISOString()}\n`, 'utf8')
  } catch {
    // No run log for this run.
    logFilePath = undefined
  }
  return logFilePath
}

export function closeRunLog(): void {
  logFilePath = undefined
}

export function appendRunLog(line: string): void {
  if (!logFilePath) return
  try {
    fs.appendFileSync(logFilePath, `[${new Date().toISOString()}] ${line}\n`, 'utf8')
  } catch {
    // Run log lines are best-effort.
  }
}

export function formatTargetLine(opts: { label: string; url: string; outcome: FetchOutcome; fellBack: boolean }): string {
  const parts: string[] = [`target status=${opts.outcome.status}`]
  parts.push(`label=${JSON.stringify(opts.label)}`)
  if (opts.fellBack) parts.push('period=last-week')
  parts.push(`url=${opts.url}`)
  if (opts.outcome.status === 'found') parts.push(`code=${opts.outcome.buildCode}`)
  if (opts.outcome.status === 'transport-error') parts.push(`error=${JSON.stringify(opts.outcome.reason)}`)
  return parts.join(' ')
}

export function logTargetResult(opts: { label: string; url: string; outcome: FetchOutcome; fellBack: boolean }): void {
  appendRunLog(formatTargetLine(opts))
}
