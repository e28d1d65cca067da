/**
 * archon.gg build fetcher.
 *
 * Turns one `FetchTarget` into one `FetchOutcome`. Every failure mode becomes a
 * value; nothing is thrown past `fetch()`.
 *
 * Throttling:
 * - `queue` bounds requests in flight
 * - `limiter` bounds requests started per second, shared across all workers
 */

import type { FetchOutcome, FetchTarget } from '../../types.js'
import { createTextRequest, type TextRequest } from '../../http/fetch.js'
import { networkOptions } from '../../http/network.js'
import type { RateLimiter } from '../../http/rate-limiter.js'
import { AsyncQueue } from '../../utils/async-queue.js'
import { errorMessage } from '../../utils/errors.js'
import { archonTargetUrl, type ArchonEndpointOptions } from './endpoints.js'
import { locateBuildCode } from './extract.js'
import { classToken, specToken } from './identifiers.js'

export const DEFAULT_TIMEOUT_MS = 180_000

export interface ArchonClientOptions {
  limiter: RateLimiter
  queue: AsyncQueue
  /** Per-request timeout. Default: 180s */
  timeoutMs?: number
  /** HTTP statuses treated as "no data" instead of a transport error. */
  noDataStatuses?: readonly number[]
  endpoints?: ArchonEndpointOptions
  /** Transport. Default: `createTextRequest()` with the default network options. */
  request?: TextRequest
  log?: Pick<Console, 'info' | 'warn'>
}

export class ArchonClient {
  private readonly limiter: RateLimiter
  private readonly queue: AsyncQueue
  private readonly timeoutMs: number
  private readonly noDataStatuses: ReadonlySet<number>
  private readonly endpoints?: ArchonEndpointOptions
  private readonly request: TextRequest
  private readonly log?: Pick<Console, 'info' | 'warn'>

  constructor(opts: ArchonClientOptions) {
    this.limiter = opts.limiter
    this.queue = opts.queue
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS
    this.noDataStatuses = new Set(opts.noDataStatuses ?? [])
    this.endpoints = opts.endpoints
    this.request = opts.request ?? createTextRequest(networkOptions())
    this.log = opts.log
  }

  urlFor(target: FetchTarget): string {
    return archonTargetUrl(target, this.endpoints)
  }

  async fetch(target: FetchTarget): Promise<FetchOutcome> {
    let url = ''
    try {
      url = this.urlFor(target)
      const cls = classToken(target.character.className)
      const spec = specToken(target.character.className, target.specialization)

      const res = await this.queue.run(async () => {
        await this.limiter.acquire()
        return this.request(url, this.timeoutMs)
      })

      if (!res.ok) {
        if (this.noDataStatuses.has(res.status)) return { status: 'not-available' }
        const reason = `HTTP ${res.status}${res.statusText ? ` ${res.statusText}` : ''}`
        this.log?.warn?.(`[build-sync] ${reason} for ${url}`)
        return { status: 'transport-error', reason }
      }

      const buildCode = locateBuildCode(res.body, cls, spec)
      if (!buildCode) return { status: 'not-available' }
      return { status: 'found', buildCode }
    } catch (err) {
      const reason = errorMessage(err)
      this.log?.warn?.(`[build-sync] failed to fetch ${url || '(no url)'}: ${reason}`)
      return { status: 'transport-error', reason }
    }
  }
}
