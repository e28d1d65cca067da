import type { CategoryCounts, ContentKind, RunReport, TargetFailure } from '../types.js'
import type { TargetResult } from './orchestrator.js'

function emptyCounts(): CategoryCounts {
  return { found: 0, notAvailable: 0, errors: 0 }
}

function notAvailableReason(r: TargetResult): string {
  if (r.target.content.kind === 'dungeon') {
    return r.fellBack ? 'no build for this week or last week' : 'no build for this week'
  }
  return 'no build published'
}

function formatCounts(kind: ContentKind, c: CategoryCounts): string {
  return `  ${`${kind}:`.padEnd(9)}found ${c.found}, not available ${c.notAvailable}, errors ${c.errors}`
}

/**
 * Aggregate per-target results into the run report and its status text.
 *
 * A run that got this far is successful even when some targets failed; only
 * document-level errors (thrown earlier) make a run fail.
 */
export function buildRunReport(opts: {
  outputPath: string
  written: number
  cleared: number
  results: TargetResult[]
}): RunReport {
  const counts: Record<ContentKind, CategoryCounts> = { raid: emptyCounts(), dungeon: emptyCounts() }
  const failures: TargetFailure[] = []
  let fallbacks = 0

  for (const r of opts.results) {
    const c = counts[r.target.content.kind]
    if (r.fellBack) fallbacks++
    switch (r.outcome.status) {
      case 'found':
        c.found++
        break
      case 'not-available':
        c.notAvailable++
        failures.push({ label: r.label, url: r.url, status: 'not-available', reason: notAvailableReason(r) })
        break
      case 'transport-error':
        c.errors++
        failures.push({ label: r.label, url: r.url, status: 'transport-error', reason: r.outcome.reason })
        break
    }
  }

  const found = counts.raid.found + counts.dungeon.found
  const notAvailable = counts.raid.notAvailable + counts.dungeon.notAvailable
  const errors = counts.raid.errors + counts.dungeon.errors

  const lines: string[] = []
  lines.push(`Updated ${opts.outputPath}: ${found} found, ${notAvailable} not available, ${errors} errors`)
  if (opts.cleared > 0) lines.push(`  cleared ${opts.cleared} previous builds`)
  lines.push(formatCounts('raid', counts.raid))
  lines.push(formatCounts('dungeon', counts.dungeon))
  if (fallbacks > 0) lines.push(`  last-week lookups: ${fallbacks}`)

  const missing = failures.filter((f) => f.status === 'not-available')
  const broken = failures.filter((f) => f.status === 'transport-error')
  if (missing.length) {
    lines.push('Not available:')
    for (const f of missing) lines.push(`  - ${f.label}: ${f.reason}`)
  }
  if (broken.length) {
    lines.push('Errors:')
    for (const f of broken) lines.push(`  - ${f.label}: ${f.reason} (${f.url})`)
  }

  return {
    ok: true,
    outputPath: opts.outputPath,
    written: opts.written,
    cleared: opts.cleared,
    counts,
    fallbacks,
    failures,
    message: lines.join('\n')
  }
}
