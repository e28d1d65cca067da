/**
 * Shared request-rate limiter.
 *
 * One instance is created per run and handed to every fetch worker, so all
 * in-flight requests draw from the same budget. The check-and-record step is
 * synchronous, which makes concurrent `acquire()` calls safe on the event loop.
 */

export interface TimeSource {
  nowMs(): number
  sleepMs(ms: number): Promise<void>
}

export class RealTimeSource implements TimeSource {
  nowMs(): number {
    return Date.now()
  }

  async sleepMs(ms: number): Promise<void> {
    await new Promise((resolve) => setTimeout(resolve, ms))
  }
}

export interface RateLimiter {
  acquire(): Promise<void>
}

/**
 * Sliding-window limiter: at most `maxPerWindow` admissions in any rolling
 * `windowMs` interval.
 */
export class SlidingWindowRateLimiter implements RateLimiter {
  private readonly timestamps: number[] = []

  constructor(
    private readonly maxPerWindow: number,
    private readonly windowMs = 1000,
    private readonly timeSource: TimeSource = new RealTimeSource()
  ) {
    if (maxPerWindow !== Infinity && !(maxPerWindow >= 1)) {
      throw new Error(`[build-sync] rate limit must be >= 1 or Infinity (got ${maxPerWindow})`)
    }
  }

  private prune(now: number): void {
    const cutoff = now - this.windowMs
    let i = 0
    while (i < this.timestamps.length && (this.timestamps[i] ?? 0) <= cutoff) i++
    if (i > 0) this.timestamps.splice(0, i)
  }

  /** Number of admissions inside the current window. */
  inFlightWindow(): number {
    this.prune(this.timeSource.nowMs())
    return this.timestamps.length
  }

  async acquire(): Promise<void> {
    if (this.maxPerWindow === Infinity) return

    while (true) {
      const now = this.timeSource.nowMs()
      this.prune(now)
      if (this.timestamps.length < this.maxPerWindow) {
        this.timestamps.push(now)
        return
      }
      const oldest = this.timestamps[0] ?? now
      const waitMs = Math.max(1, oldest + this.windowMs - now)
      await this.timeSource.sleepMs(waitMs)
    }
  }
}

/** Smallest whole number of seconds over which `rate` admits a whole number of requests. */
function windowSeconds(rate: number): number {
  for (let k = 1; k < 1000; k++) {
    if (Math.abs(rate * k - Math.round(rate * k)) < 1e-9) return k
  }
  return 1000
}

/**
 * Limiter for a requests-per-second budget. Fractional rates widen the window
 * instead of rounding: 1.5/s admits 3 per 2 s, 0.5/s admits 1 per 2 s.
 */
export function createRateLimiter(requestsPerSecond: number, timeSource?: TimeSource): SlidingWindowRateLimiter {
  if (requestsPerSecond === Infinity) return new SlidingWindowRateLimiter(Infinity, 1000, timeSource)
  if (!(requestsPerSecond > 0)) {
    throw new Error(`[build-sync] requests per second must be > 0 (got ${requestsPerSecond})`)
  }
  const k = windowSeconds(requestsPerSecond)
  const admissions = Math.max(1, Math.round(requestsPerSecond * k))
  return new SlidingWindowRateLimiter(admissions, 1000 * k, timeSource)
}
