/**
 * Simple async concurrency limiter.
 *
 * Bounds the number of requests in flight against the remote site, independent
 * of the request-rate budget.
 */

export class AsyncQueue {
  private active = 0
  private readonly waiters: Array<() => void> = []

  constructor(private readonly maxConcurrency: number) {
    if (!Number.isFinite(maxConcurrency) || maxConcurrency < 1) {
      throw new Error(`[build-sync] AsyncQueue maxConcurrency must be >= 1 (got ${maxConcurrency})`)
    }
  }

  get running(): number {
    return this.active
  }

  private async acquire(): Promise<void> {
    if (this.active < this.maxConcurrency) {
      this.active++
      return
    }
    // The releasing task hands its slot over; `active` is not touched here.
    await new Promise<void>((resolve) => this.waiters.push(resolve))
  }

  private release(): void {
    const next = this.waiters.shift()
    if (next) {
      next()
      return
    }
    this.active = Math.max(0, this.active - 1)
  }

  async run<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire()
    try {
      return await fn()
    } finally {
      this.release()
    }
  }
}
