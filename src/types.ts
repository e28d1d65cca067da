/**
 * Shared types used across the build-sync tool.
 */

export type RaidDifficulty = 'normal' | 'heroic' | 'mythic'

/** The remote site's "current" and "previous" snapshot for Mythic+ data. */
export type RotationPeriod = 'this-week' | 'last-week'

export type ContentKind = 'raid' | 'dungeon'

export interface Character {
  /** User-facing label, used in managed entry labels. */
  name: string
  /** Class display name, e.g. "Death Knight". */
  className: string
  specializations: string[]
}

export type ContentItem =
  | { kind: 'raid'; boss: string; difficulty: RaidDifficulty }
  | { kind: 'dungeon'; dungeon: string }

export interface Selection {
  characters: Character[]
  raidDifficulties: string[]
  raidBosses: string[]
  dungeons: string[]
  clearPreviousBuilds: boolean
  outputPath: string
}

export interface FetchTarget {
  character: Character
  specialization: string
  content: ContentItem
  /** Only set for dungeon targets. */
  period?: RotationPeriod
}

export type FetchOutcome =
  | { status: 'found'; buildCode: string }
  | { status: 'not-available' }
  | { status: 'transport-error'; reason: string }

export interface CommandContext {
  /** Absolute path of the tool (config/ and logs/ live here). */
  projectRoot: string
  /** process.cwd() at runtime */
  cwd: string
  /** Timestamp for this run */
  now: Date
  /** Logger interface (console-like) */
  log: Pick<Console, 'log' | 'info' | 'warn' | 'error'>
}

export interface SyncOptions {
  selectionPath: string
  /** Overrides `outputPath` from the selection file. */
  outputPath?: string
  /** Forces `clearPreviousBuilds` on. */
  clear: boolean
  concurrency: number
  requestsPerSecond: number
  timeoutMs: number
}

export interface ListOptions {
  outputPath: string
}

export interface CategoryCounts {
  found: number
  notAvailable: number
  errors: number
}

export interface TargetFailure {
  label: string
  url: string
  status: 'not-available' | 'transport-error'
  reason: string
}

export interface RunReport {
  ok: boolean
  outputPath: string
  /** Bytes written to `outputPath`. */
  written: number
  /** Managed entries removed by `clearPreviousBuilds`. */
  cleared: number
  counts: Record<ContentKind, CategoryCounts>
  /** Number of previous-period lookups issued. */
  fallbacks: number
  failures: TargetFailure[]
  /** Human-readable status text. */
  message: string
}
