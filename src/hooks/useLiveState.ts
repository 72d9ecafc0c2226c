import type { LiveSnapshot, LiveStateStore } from '../lib/live-state.js'
import { useThrottledStore } from './useThrottledStore.js'

export function useLiveState(store: LiveStateStore, intervalMs?: number): LiveSnapshot {
  return useThrottledStore(store, intervalMs)
}
