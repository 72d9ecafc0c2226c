import { describe, it, expect } from 'vitest'
import { Backoff } from './backoff.js'

describe('Backoff', () => {
  it('should double from the initial delay up to the cap', () => {
    const backoff = new Backoff({ random: () => 0.5 })
    const delays = Array.from({ length: 8 }, () => backoff.next())

    expect(delays).toEqual([500, 1000, 2000, 4000, 8000, 16000, 30000, 30000])
    expect(backoff.failures).toBe(8)
  })

  it('should spread delays by the jitter fraction', () => {
    expect(new Backoff({ random: () => 1 }).next()).toBe(600)
    expect(new Backoff({ random: () => 0 }).next()).toBe(400)
  })

  it('should reset after a connection stayed open for the stable window', () => {
    let now = 0
    const backoff = new Backoff({ random: () => 0.5, now: () => now })
    backoff.next()
    backoff.next()

    backoff.markOpen()
    now = 60_000
    backoff.markClosed()

    expect(backoff.failures).toBe(0)
    expect(backoff.next()).toBe(500)
  })

  it('should keep counting after a short-lived connection', () => {
    let now = 0
    const backoff = new Backoff({ random: () => 0.5, now: () => now })
    backoff.next()

    backoff.markOpen()
    now = 59_999
    backoff.markClosed()

    expect(backoff.nominal).toBe(1000)
  })

  it('should ignore a close without an open', () => {
    const backoff = new Backoff({ random: () => 0.5 })
    backoff.next()
    backoff.markClosed()
    expect(backoff.failures).toBe(1)
  })
})
