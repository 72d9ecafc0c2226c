import type { HistoryEntry, TransportStatus } from '../../shared/types.js'

export function formatTime(timestamp: string): string {
  const date = new Date(timestamp)
  const time = date.toLocaleTimeString('en-US', {
    hourCycle: 'h23',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
  })
  return time
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`
  return `${(ms / 1000).toFixed(1)}s`
}

/** Plain-English transport condition for the status line. */
export function describeTransport(status: TransportStatus): string {
  if (status.reauthenticating) return 'Session expired, re-authenticating'
  switch (status.state) {
    case 'open':
      return 'Connected'
    case 'connecting':
      return 'Connecting…'
    case 'draining':
      return 'Draining…'
    case 'closed':
      if (status.reconnectInMs !== undefined) {
        return `Reconnecting in ${Math.max(1, Math.ceil(status.reconnectInMs / 1000))}s…`
      }
      return 'Disconnected'
  }
}

export function statusLabel(entry: HistoryEntry): string {
  return entry.status === undefined ? 'ERR' : String(entry.status)
}

/**
 * One line per delivery:
 * `12:00:01 [200] POST http://localhost:3000/webhook (12ms) → https://…/events/evt_1`
 */
export function formatEntryLine(entry: HistoryEntry): string {
  let line = `${formatTime(entry.timestamp)} [${statusLabel(entry)}] ${entry.method} ${entry.url} (${formatDuration(entry.durationMs)})`
  if (entry.errorClass) {
    line += ` ${entry.errorClass}: ${entry.errorMessage ?? 'failed'}`
  }
  if (entry.dashboardUrl) {
    line += ` → ${entry.dashboardUrl}`
  }
  if (entry.unreported) {
    line += ' (unreported)'
  }
  return line
}

export function formatUnreportedSummary(attemptIds: string[]): string {
  return `${attemptIds.length} delivery result(s) were not reported: ${attemptIds.join(', ')}`
}

/** Header value by case-insensitive name, first occurrence. */
export function findHeader(headers: Array<[string, string]>, name: string): string | undefined {
  const lower = name.toLowerCase()
  return headers.find(([key]) => key.toLowerCase() === lower)?.[1]
}
