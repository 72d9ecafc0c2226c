import kleur from 'kleur'
import type { HistoryEntry, Route, StatusBucket, TransportStatus } from '../../shared/types.js'
import type { ListenEventBus } from '../../cli/events.js'
import { toHistoryEntry } from '../lib/history.js'
import { describeTransport, formatEntryLine, statusLabel } from '../lib/format.js'
import type { StatusView } from './types.js'

export interface LogViewOptions {
  mode: 'compact' | 'quiet'
  dashboardBase: string
  routes?: Route[]
  write?: (line: string) => void
}

function paint(bucket: StatusBucket, text: string): string {
  switch (bucket) {
    case '2xx': return kleur.green(text)
    case '3xx': return kleur.cyan(text)
    case '4xx': return kleur.yellow(text)
    case '5xx':
    case 'err': return kleur.red(text)
  }
}

export function isFailure(entry: HistoryEntry): boolean {
  return entry.bucket === 'err' || entry.bucket === '4xx' || entry.bucket === '5xx'
}

/**
 * One line per delivery for non-interactive terminals and CI. `quiet`
 * prints failed deliveries and notices only.
 */
export class LogView implements StatusView {
  private bus: ListenEventBus
  private options: LogViewOptions
  private write: (line: string) => void
  private subscriptions: Array<() => void> = []
  private lastStatus?: string

  constructor(bus: ListenEventBus, options: LogViewOptions) {
    this.bus = bus
    this.options = options
    this.write = options.write ?? (line => console.log(line))
  }

  start(): void {
    if (this.options.mode === 'compact') {
      this.printRoutes(this.options.routes ?? [])
    }

    this.subscriptions.push(
      this.bus.on('transport:status', status => this.onStatus(status)),
      this.bus.on('routes:changed', routes => {
        if (this.options.mode === 'compact') this.printRoutes(routes)
      }),
      this.bus.on('notice', notice => this.write(kleur.yellow(`● ${notice}`))),
      this.bus.on('attempt:finish', delivery => {
        const entry = toHistoryEntry(delivery, this.options.dashboardBase)
        if (this.options.mode === 'quiet' && !isFailure(entry)) return
        this.write(this.formatEntry(entry))
      }),
    )
  }

  stop(): void {
    for (const unsubscribe of this.subscriptions) unsubscribe()
    this.subscriptions = []
  }

  formatEntry(entry: HistoryEntry): string {
    const label = `[${statusLabel(entry)}]`
    return formatEntryLine(entry).replace(label, paint(entry.bucket, label))
  }

  private onStatus(status: TransportStatus): void {
    const text = describeTransport(status)
    if (text === this.lastStatus) return
    this.lastStatus = text

    if (status.reauthenticating) {
      this.write(kleur.yellow(`● ${text}`))
    } else if (this.options.mode === 'compact') {
      this.write(status.state === 'open' ? kleur.green(`● ${text}`) : kleur.dim(`● ${text}`))
    }
  }

  private printRoutes(routes: Route[]): void {
    for (const route of routes) {
      const ingest = route.sourceUrl ? ` (${route.sourceUrl})` : ''
      this.write(`${kleur.bold(route.sourceName)}${ingest} → ${route.localBase.href}`)
    }
  }
}
