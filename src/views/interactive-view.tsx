import { render, type Instance } from 'ink'
import App from '../App.js'
import { ErrorBoundary } from '../components/layout/ErrorBoundary.js'
import { HistoryStore } from '../lib/history.js'
import { LiveStateStore, bindStores } from '../lib/live-state.js'
import { LogView } from './log-view.js'
import type { StatusView, ViewContext } from './types.js'

/**
 * Full-screen Ink dashboard. A render error tears it down once and
 * continues in compact log mode.
 */
export class InteractiveView implements StatusView {
  private context: ViewContext
  private history = new HistoryStore()
  private live: LiveStateStore
  private instance?: Instance
  private unbind?: () => void
  private fallback?: LogView

  constructor(context: ViewContext) {
    this.context = context
    this.live = new LiveStateStore(context.routes)
  }

  get usingFallback(): boolean {
    return this.fallback !== undefined
  }

  start(): void {
    const { bus, dashboardBase, info, actions, onQuit } = this.context
    this.unbind = bindStores(bus, this.history, this.live, dashboardBase)

    try {
      this.instance = render(
        <ErrorBoundary onError={err => setImmediate(() => this.fallBack(err))}>
          <App history={this.history} live={this.live} info={info} actions={actions} onQuit={onQuit} />
        </ErrorBoundary>,
        { exitOnCtrlC: false },
      )
    } catch (err) {
      this.fallBack(err instanceof Error ? err : new Error(String(err)))
    }
  }

  stop(): void {
    this.teardown()
    this.fallback?.stop()
  }

  private teardown(): void {
    this.unbind?.()
    this.unbind = undefined
    this.instance?.unmount()
    this.instance = undefined
  }

  private fallBack(error: Error): void {
    if (this.fallback) return
    this.teardown()
    console.warn(`[UI] Interactive view failed, switching to log output: ${error.message}`)

    const { bus, dashboardBase, write } = this.context
    this.fallback = new LogView(bus, { mode: 'compact', dashboardBase, routes: this.live.snapshot().routes, write })
    this.fallback.start()
  }
}
