import type { Route } from '../../shared/types.js'
import type { ListenEventBus } from '../../cli/events.js'
import type { HeaderInfo } from '../components/layout/Header.js'
import type { ListenActions } from '../lib/actions.js'

export type OutputMode = 'interactive' | 'compact' | 'quiet'

export const OUTPUT_MODES: readonly OutputMode[] = ['interactive', 'compact', 'quiet']

/** A subscriber to the listen event bus that renders it somewhere. */
export interface StatusView {
  start(): void
  stop(): void
}

export interface ViewContext {
  bus: ListenEventBus
  routes: Route[]
  dashboardBase: string
  info: HeaderInfo
  actions: ListenActions
  /** Called when the user asks to quit from inside the view */
  onQuit: () => void
  /** Printer for log output, including the interactive view's fallback */
  write?: (line: string) => void
}
