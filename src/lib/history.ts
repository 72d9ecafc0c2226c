import type { Delivery, HistoryEntry, StatusBucket } from '../../shared/types.js'
import { SnapshotStore } from './store.js'

export const HISTORY_LIMIT = 200

export interface HistorySnapshot {
  entries: HistoryEntry[]
  selectedIndex: number
  /** The user moved away from the latest entry; new entries no longer steal the selection */
  userNavigated: boolean
}

export function statusBucket(status: number | undefined, failed: boolean): StatusBucket {
  if (failed || status === undefined) return 'err'
  if (status < 300) return '2xx'
  if (status < 400) return '3xx'
  if (status < 500) return '4xx'
  return '5xx'
}

export function dashboardLink(dashboardBase: string, eventId: string | undefined): string | undefined {
  if (!eventId) return undefined
  return `${dashboardBase.replace(/\/+$/, '')}/events/${encodeURIComponent(eventId)}`
}

export function toHistoryEntry(delivery: Delivery, dashboardBase: string): HistoryEntry {
  const { attempt, result, route, url } = delivery
  return {
    attemptId: attempt.attemptId,
    eventId: attempt.eventId,
    sourceName: route?.sourceName ?? 'unknown',
    method: attempt.method,
    url: url?.href ?? `${attempt.path}${attempt.query ? `?${attempt.query}` : ''}`,
    localPath: url ? url.pathname + url.search : attempt.path,
    status: result.status,
    bucket: statusBucket(result.status, result.errorClass !== undefined),
    durationMs: result.durationMs,
    timestamp: result.finishedAt,
    dashboardUrl: dashboardLink(dashboardBase, attempt.eventId),
    errorClass: result.errorClass,
    errorMessage: result.errorMessage,
    responseHeaders: result.headers,
    responseBody: result.body,
    truncated: result.truncated,
  }
}

/**
 * Most recent deliveries in finalization order, oldest evicted first. The
 * selection follows the newest entry until the user navigates away, and
 * follows again once they return to it.
 */
export class HistoryStore extends SnapshotStore<HistorySnapshot> {
  private entries: HistoryEntry[] = []
  private selected = -1
  private navigated = false
  private limit: number

  constructor(limit = HISTORY_LIMIT) {
    super()
    this.limit = limit
  }

  get size(): number {
    return this.entries.length
  }

  get selectedEntry(): HistoryEntry | undefined {
    return this.entries[this.selected]
  }

  add(entry: HistoryEntry): void {
    this.entries.push(entry)

    if (this.entries.length > this.limit) {
      const removed = this.entries.length - this.limit
      this.entries = this.entries.slice(removed)
      if (this.selected < removed) {
        this.selected = 0
        this.navigated = false
      } else {
        this.selected -= removed
      }
    }

    if (!this.navigated) {
      this.selected = this.entries.length - 1
    }
    this.notify()
  }

  /** Move the selection; returns false when it did not change. */
  navigate(direction: number): boolean {
    if (this.entries.length === 0) return false

    const next = Math.min(Math.max(this.selected + direction, 0), this.entries.length - 1)
    if (next === this.selected) return false

    this.selected = next
    this.navigated = next !== this.entries.length - 1
    this.notify()
    return true
  }

  markUnreported(attemptIds: string[]): void {
    const ids = new Set(attemptIds)
    let changed = false
    this.entries = this.entries.map(entry => {
      if (!ids.has(entry.attemptId) || entry.unreported) return entry
      changed = true
      return { ...entry, unreported: true }
    })
    if (changed) this.notify()
  }

  snapshot(): HistorySnapshot {
    return {
      entries: [...this.entries],
      selectedIndex: this.selected,
      userNavigated: this.navigated,
    }
  }
}
