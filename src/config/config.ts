/**
 * Runtime configuration loader.
 *
 * - config file is optional
 * - CLI flags always override config defaults
 * - config.json is gitignored; only config.example.json is committed
 */

import fs from 'node:fs'
import path from 'node:path'

export interface ToolConfig {
  network?: {
    /** Prefix put in front of every archon.gg URL, e.g. "https://mirror.example/". */
    mirror?: string
    /** HTTP proxy URL (CONNECT for HTTPS), e.g. http://127.0.0.1:10809 */
    httpProxy?: string
    /** Custom User-Agent header (default: "archon-build-sync"). */
    userAgent?: string
  }
  fetch?: {
    /** Default: https://www.archon.gg/wow/builds */
    baseUrl?: string
    /** Keystone bracket segment of Mythic+ pages. Default: "10" */
    mythicPlusBracket?: string
    /** Maximum requests in flight. Default: 5 */
    concurrency?: number
    /** Maximum requests started per second, across all workers. Default: 4 */
    requestsPerSecond?: number
    /** Per-request timeout in ms. Default: 180000 */
    timeoutMs?: number
    /**
     * HTTP statuses that mean "no data for this build" rather than a failure.
     *
     * archon.gg answers 500 for builds with too few logged runs; add 500 here to
     * let dungeon lookups fall back to last week in that case. Default: []
     */
    noDataStatuses?: number[]
  }
  store?: {
    /** Dotted path of the builds table in the SavedVariables file. Default: "ArchonBuildsDB" */
    tablePath?: string
    /** Label suffix marking entries owned by this tool. Default: " [Archon]" */
    marker?: string
  }
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v)
}

export function loadToolConfig(projectRoot: string): ToolConfig | null {
  const configPath = path.join(projectRoot, 'config', 'config.json')
  if (!fs.existsSync(configPath)) return null

  let parsed: unknown
  try {
    parsed = JSON.parse(fs.readFileSync(configPath, 'utf8'))
  } catch {
    // config is optional; on parse failure we ignore it and rely on CLI.
    return null
  }
  if (!isRecord(parsed)) return null
  return toToolConfig(parsed)
}

function optString(v: unknown): string | undefined {
  return typeof v === 'string' && v.trim() ? v.trim() : undefined
}

function optPositive(v: unknown): number | undefined {
  return typeof v === 'number' && Number.isFinite(v) && v > 0 ? v : undefined
}

function section(root: Record<string, unknown>, key: string): Record<string, unknown> {
  const v = root[key]
  return isRecord(v) ? v : {}
}

/** Keep only well-typed keys; unknown or mistyped values fall back to defaults. */
export function toToolConfig(raw: Record<string, unknown>): ToolConfig {
  const network = section(raw, 'network')
  const fetch = section(raw, 'fetch')
  const store = section(raw, 'store')
  const noData = Array.isArray(fetch.noDataStatuses)
    ? fetch.noDataStatuses.filter((s): s is number => typeof s === 'number' && Number.isInteger(s))
    : undefined

  return {
    network: {
      mirror: optString(network.mirror),
      httpProxy: optString(network.httpProxy),
      userAgent: optString(network.userAgent)
    },
    fetch: {
      baseUrl: optString(fetch.baseUrl),
      mythicPlusBracket: optString(fetch.mythicPlusBracket),
      concurrency: optPositive(fetch.concurrency),
      requestsPerSecond: optPositive(fetch.requestsPerSecond),
      timeoutMs: optPositive(fetch.timeoutMs),
      noDataStatuses: noData
    },
    store: {
      tablePath: optString(store.tablePath),
      marker: typeof store.marker === 'string' && store.marker ? store.marker : undefined
    }
  }
}
