import type { Route, TransportStatus } from '../../shared/types.js'
import type { ListenEventBus } from '../../cli/events.js'
import { SnapshotStore } from './store.js'
import { HistoryStore, toHistoryEntry } from './history.js'

export interface LiveSnapshot {
  transport: TransportStatus
  routes: Route[]
  inFlight: number
  notice?: string
  /** Feedback from the last key action */
  message?: string
}

/**
 * Latest-wins state for the header and status line.
 */
export class LiveStateStore extends SnapshotStore<LiveSnapshot> {
  private state: LiveSnapshot

  constructor(routes: Route[] = []) {
    super()
    this.state = { transport: { state: 'connecting', consecutiveFailures: 0 }, routes, inFlight: 0 }
  }

  update(patch: Partial<LiveSnapshot>): void {
    this.state = { ...this.state, ...patch }
    this.notify()
  }

  snapshot(): LiveSnapshot {
    return this.state
  }
}

/**
 * Feed the view stores from the event bus. Returns the unsubscribe function.
 */
export function bindStores(
  bus: ListenEventBus,
  history: HistoryStore,
  live: LiveStateStore,
  dashboardBase: string,
): () => void {
  const started = new Set<string>()
  const subscriptions = [
    bus.on('transport:status', transport => live.update({ transport })),
    bus.on('routes:changed', routes => live.update({ routes })),
    bus.on('notice', notice => live.update({ notice })),
    bus.on('attempt:start', ({ attempt }) => {
      started.add(attempt.attemptId)
      live.update({ inFlight: started.size })
    }),
    bus.on('attempt:finish', delivery => {
      if (started.delete(delivery.attempt.attemptId)) {
        live.update({ inFlight: started.size })
      }
      history.add(toHistoryEntry(delivery, dashboardBase))
    }),
    bus.on('attempt:unreported', ids => history.markUnreported(ids)),
  ]
  return () => {
    for (const unsubscribe of subscriptions) unsubscribe()
  }
}
