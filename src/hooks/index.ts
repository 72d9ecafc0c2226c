export { useThrottledStore, FRAME_INTERVAL_MS } from './useThrottledStore.js'

export { useHistory } from './useHistory.js'
export type { UseHistoryResult } from './useHistory.js'

export { useLiveState } from './useLiveState.js'
