import type { InboundAttempt } from '../../shared/types.js'
import type { Fragment } from './protocol.js'

interface PendingAttempt {
  parts: Array<InboundAttempt | undefined>
  received: number
  firstSeen: number
}

/**
 * Joins attempts split across several frames. Each fragment carries the full
 * request metadata and a slice of the body; slices are concatenated in
 * index order once all of them have arrived.
 */
export class FragmentReassembler {
  private pending = new Map<string, PendingAttempt>()
  private maxAgeMs: number

  constructor(maxAgeMs = 60_000) {
    this.maxAgeMs = maxAgeMs
  }

  get pendingCount(): number {
    return this.pending.size
  }

  /**
   * Returns the complete attempt once every fragment is in, undefined while
   * pieces are still missing.
   */
  accept(attempt: InboundAttempt, fragment?: Fragment, now = Date.now()): InboundAttempt | undefined {
    if (!fragment || fragment.total === 1) {
      return attempt
    }
    if (fragment.index >= fragment.total) {
      throw new RangeError(`Fragment ${fragment.index} of attempt ${attempt.attemptId} is out of range (total ${fragment.total})`)
    }

    let entry = this.pending.get(attempt.attemptId)
    if (!entry || entry.parts.length !== fragment.total) {
      entry = { parts: new Array<InboundAttempt | undefined>(fragment.total).fill(undefined), received: 0, firstSeen: now }
      this.pending.set(attempt.attemptId, entry)
    }

    if (entry.parts[fragment.index] === undefined) {
      entry.received++
    }
    entry.parts[fragment.index] = attempt

    if (entry.received < fragment.total) {
      return undefined
    }

    this.pending.delete(attempt.attemptId)
    const parts = entry.parts.filter((part): part is InboundAttempt => part !== undefined)
    const [first] = parts
    return { ...first, body: Buffer.concat(parts.map(part => part.body)) }
  }

  /** Drop partial attempts older than the max age; returns their ids. */
  prune(now = Date.now()): string[] {
    const dropped: string[] = []
    for (const [attemptId, entry] of this.pending) {
      if (now - entry.firstSeen >= this.maxAgeMs) {
        this.pending.delete(attemptId)
        dropped.push(attemptId)
      }
    }
    return dropped
  }

  clear(): void {
    this.pending.clear()
  }
}
