/** Header list with original casing and order; duplicate names appear more than once. */
export type HeaderList = Array<[name: string, value: string]>

export interface Route {
  connectionId: string
  connectionName: string
  sourceId: string
  sourceName: string
  /** Public ingest URL of the source */
  sourceUrl?: string
  /** Local base URL; inbound paths are appended to its pathname */
  localBase: URL
}

export interface InboundAttempt {
  attemptId: string
  connectionId: string
  eventId?: string
  method: string
  path: string
  query: string
  headers: HeaderList
  body: Buffer
  requestedAt?: string
  attemptNumber?: number
  /** Per-attempt timeout requested by the remote, in ms */
  timeoutMs?: number
}

export type ErrorClass = 'connect' | 'timeout' | 'read' | 'local-nonhttp'

export interface AttemptResult {
  attemptId: string
  connectionId: string
  status?: number
  headers: HeaderList
  body: Buffer
  truncated: boolean
  errorClass?: ErrorClass
  errorMessage?: string
  durationMs: number
  finishedAt: string
}

export type StatusBucket = '2xx' | '3xx' | '4xx' | '5xx' | 'err'

export interface HistoryEntry {
  attemptId: string
  eventId?: string
  sourceName: string
  method: string
  url: string
  localPath: string
  status?: number
  bucket: StatusBucket
  durationMs: number
  timestamp: string
  dashboardUrl?: string
  errorClass?: ErrorClass
  errorMessage?: string
  responseHeaders: HeaderList
  responseBody: Buffer
  truncated: boolean
  unreported?: boolean
}

export type TransportState = 'connecting' | 'open' | 'draining' | 'closed'

export interface TransportStatus {
  state: TransportState
  /** Milliseconds until the next reconnect attempt, when one is scheduled */
  reconnectInMs?: number
  /** Set while a fresh session is being negotiated after expiry */
  reauthenticating?: boolean
  consecutiveFailures: number
  lastHeartbeatSent?: number
  lastHeartbeatAcked?: number
  notice?: string
}

export interface AttemptStarted {
  attempt: InboundAttempt
  route: Route
  url: URL
  startedAt: number
}

/** A finalized attempt as the status views see it */
export interface Delivery {
  attempt: InboundAttempt
  result: AttemptResult
  /** Missing when the attempt named an unknown connection */
  route?: Route
  url?: URL
}
