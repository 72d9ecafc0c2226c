import { useEffect, useState } from 'react'
import type { SnapshotStore } from '../lib/store.js'

/** ~15 redraws per second at most */
export const FRAME_INTERVAL_MS = 66

/**
 * Subscribe to a store, re-rendering with its latest snapshot no more often
 * than once per `intervalMs`. Intermediate snapshots are skipped.
 */
export function useThrottledStore<T>(store: SnapshotStore<T>, intervalMs = FRAME_INTERVAL_MS): T {
  const [snapshot, setSnapshot] = useState(() => store.snapshot())

  useEffect(() => {
    let timer: NodeJS.Timeout | undefined
    let lastFlush = 0

    const flush = () => {
      timer = undefined
      lastFlush = Date.now()
      setSnapshot(store.snapshot())
    }

    // Catch up with anything that changed before the subscription
    setSnapshot(store.snapshot())

    const unsubscribe = store.subscribe(() => {
      if (timer) return
      const wait = Math.max(0, intervalMs - (Date.now() - lastFlush))
      timer = setTimeout(flush, wait)
    })

    return () => {
      unsubscribe()
      clearTimeout(timer)
    }
  }, [store, intervalMs])

  return snapshot
}
