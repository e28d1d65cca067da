import { describe, expect, it } from 'vitest'
import { AsyncQueue } from './async-queue.js'
import { mapPromisePool } from './promise-pool.js'

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

describe('AsyncQueue', () => {
  it('never runs more than maxConcurrency tasks at once', async () => {
    const queue = new AsyncQueue(2)
    let active = 0
    let peak = 0
    const results = await Promise.all(
      [5, 1, 3, 2, 4].map((ms, i) =>
        queue.run(async () => {
          active++
          peak = Math.max(peak, active)
          await delay(ms)
          active--
          return i
        })
      )
    )
    expect(results).toEqual([0, 1, 2, 3, 4])
    expect(peak).toBe(2)
    expect(queue.running).toBe(0)
  })

  it('releases the slot when a task throws', async () => {
    const queue = new AsyncQueue(1)
    await expect(queue.run(async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom')
    await expect(queue.run(async () => 'ok')).resolves.toBe('ok')
  })

  it('rejects a zero limit', () => {
    expect(() => new AsyncQueue(0)).toThrow('maxConcurrency must be >= 1')
  })
})

describe('mapPromisePool', () => {
  it('returns results in input order', async () => {
    const out = await mapPromisePool([30, 5, 15], 2, async (ms, i) => {
      await delay(ms)
      return `${i}:${ms}`
    })
    expect(out).toEqual(['0:30', '1:5', '2:15'])
  })

  it('handles an empty list', async () => {
    await expect(mapPromisePool([], 3, async () => 1)).resolves.toEqual([])
  })
})
