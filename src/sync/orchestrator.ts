/**
 * Selection -> fetched builds -> one SavedVariables write.
 *
 * Failure model:
 * - document-level problems (validation, parse, schema, write) abort the run and
 *   are rethrown as-is; the file is not touched
 * - target-level problems (not available, transport errors) are recorded in the
 *   report and never abort the run
 *
 * Fetch workers only return outcomes. The document is mutated in one pass after
 * every outcome is known, so no locking is needed around it.
 */

import type { FetchOutcome, FetchTarget, RunReport, Selection } from '../types.js'
import { validateSelection } from '../source/archon/identifiers.js'
import { clearManaged, upsert, type PersistedDocument } from '../store/document.js'
import { buildManagedEntry, managedLabel } from '../store/labels.js'
import { loadDocument, saveDocument, type LoadOptions } from '../store/store.js'
import { mapPromisePool } from '../utils/promise-pool.js'
import { expandSelection } from './expand.js'
import { buildRunReport } from './report.js'

/** The fetcher as seen by the orchestrator. */
export interface BuildFetcher {
  fetch(target: FetchTarget): Promise<FetchOutcome>
  urlFor(target: FetchTarget): string
}

export interface DocumentStore {
  load(filePath: string): PersistedDocument
  /** Persist the document; returns bytes written. */
  save(doc: PersistedDocument): number
}

export interface TargetResult {
  target: FetchTarget
  label: string
  /** URL of the lookup that produced `outcome`. */
  url: string
  outcome: FetchOutcome
  /** True when the previous-period lookup was issued. */
  fellBack: boolean
}

export interface SyncDeps {
  fetcher: BuildFetcher
  store?: DocumentStore
  /** Targets worked on at once. The fetcher applies its own request limits. */
  concurrency?: number
  log?: Pick<Console, 'info' | 'warn'>
  /** Called once per target with its final outcome. */
  onResult?: (result: TargetResult) => void
}

/** SavedVariables files on disk, with the configured table path and marker. */
export function fileDocumentStore(opts: LoadOptions = {}): DocumentStore {
  return {
    load: (filePath) => loadDocument(filePath, opts),
    save: saveDocument
  }
}

/**
 * Fetch one target. Dungeon targets that come back `not-available` for the
 * current period are retried once against the previous period; the fallback is
 * only issued after the primary outcome is known.
 */
export async function resolveTarget(fetcher: BuildFetcher, target: FetchTarget, marker?: string): Promise<TargetResult> {
  const label = managedLabel(target, marker)
  const primary = await fetcher.fetch(target)
  const isCurrentDungeon = target.content.kind === 'dungeon' && (target.period ?? 'this-week') === 'this-week'

  if (primary.status !== 'not-available' || !isCurrentDungeon) {
    return { target, label, url: fetcher.urlFor(target), outcome: primary, fellBack: false }
  }

  const previous: FetchTarget = { ...target, period: 'last-week' }
  const outcome = await fetcher.fetch(previous)
  return { target: previous, label, url: fetcher.urlFor(previous), outcome, fellBack: true }
}

export async function runSync(selection: Selection, deps: SyncDeps): Promise<RunReport> {
  const store = deps.store ?? fileDocumentStore()
  const log = deps.log

  validateSelection(selection)

  const doc = store.load(selection.outputPath)
  const cleared = selection.clearPreviousBuilds ? clearManaged(doc) : 0
  if (cleared > 0) log?.info?.(`[build-sync] cleared ${cleared} managed entries`)

  const targets = expandSelection(selection)
  log?.info?.(`[build-sync] ${targets.length} targets to fetch`)

  const results = await mapPromisePool(targets, deps.concurrency ?? 5, async (target) => {
    const result = await resolveTarget(deps.fetcher, target, doc.marker)
    deps.onResult?.(result)
    return result
  })

  let added = 0
  let replaced = 0
  for (const r of results) {
    if (r.outcome.status !== 'found') continue
    const action = upsert(doc, buildManagedEntry(r.target, r.outcome.buildCode, doc.marker))
    if (action === 'added') added++
    else replaced++
  }

  const written = store.save(doc)
  log?.info?.(`[build-sync] wrote ${selection.outputPath} (${added} added, ${replaced} replaced)`)

  return buildRunReport({ outputPath: selection.outputPath, written, cleared, results })
}
