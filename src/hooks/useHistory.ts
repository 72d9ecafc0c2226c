import { useCallback, useState } from 'react'
import type { HistoryEntry } from '../../shared/types.js'
import type { HistorySnapshot, HistoryStore } from '../lib/history.js'
import { useThrottledStore } from './useThrottledStore.js'

export interface UseHistoryResult extends HistorySnapshot {
  selected: HistoryEntry | undefined
  showDetails: boolean
  navigate: (direction: number) => void
  toggleDetails: () => void
}

export function useHistory(store: HistoryStore, intervalMs?: number): UseHistoryResult {
  const snapshot = useThrottledStore(store, intervalMs)
  const [showDetails, setShowDetails] = useState(false)

  const navigate = useCallback((direction: number) => {
    store.navigate(direction)
  }, [store])

  const toggleDetails = useCallback(() => {
    setShowDetails(prev => !prev)
  }, [])

  return {
    ...snapshot,
    selected: snapshot.entries[snapshot.selectedIndex],
    showDetails,
    navigate,
    toggleDetails,
  }
}
