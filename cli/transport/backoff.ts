export interface BackoffOptions {
  initialMs?: number
  factor?: number
  maxMs?: number
  /** Relative jitter, 0.2 means ±20% of the nominal delay */
  jitter?: number
  /** A connection that stayed open this long resets the sequence */
  stableMs?: number
  random?: () => number
  now?: () => number
}

/**
 * Reconnect delays: exponential from `initialMs`, capped at `maxMs`, with
 * symmetric jitter around the nominal value.
 */
export class Backoff {
  private initialMs: number
  private factor: number
  private maxMs: number
  private jitter: number
  private stableMs: number
  private random: () => number
  private now: () => number

  private attempts = 0
  private openedAt?: number

  constructor(options: BackoffOptions = {}) {
    this.initialMs = options.initialMs ?? 500
    this.factor = options.factor ?? 2
    this.maxMs = options.maxMs ?? 30_000
    this.jitter = options.jitter ?? 0.2
    this.stableMs = options.stableMs ?? 60_000
    this.random = options.random ?? Math.random
    this.now = options.now ?? Date.now
  }

  /** Consecutive delays handed out since the last reset */
  get failures(): number {
    return this.attempts
  }

  /** Nominal (un-jittered) delay the next call to `next()` is based on */
  get nominal(): number {
    return Math.min(this.initialMs * Math.pow(this.factor, this.attempts), this.maxMs)
  }

  next(): number {
    const nominal = this.nominal
    this.attempts++
    const spread = nominal * this.jitter * (2 * this.random() - 1)
    return Math.max(0, Math.round(nominal + spread))
  }

  reset(): void {
    this.attempts = 0
    this.openedAt = undefined
  }

  markOpen(): void {
    this.openedAt = this.now()
  }

  markClosed(): void {
    if (this.openedAt !== undefined && this.now() - this.openedAt >= this.stableMs) {
      this.reset()
    }
    this.openedAt = undefined
  }
}
