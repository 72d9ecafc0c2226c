import type { AttemptResult, Delivery, HistoryEntry, InboundAttempt, Route } from '../../shared/types.js'

/** Local-time timestamp, so formatted times are predictable in any zone */
export function localTimestamp(hours: number, minutes: number, seconds: number): string {
  return new Date(2026, 0, 15, hours, minutes, seconds).toISOString()
}

export function makeRoute(overrides: Partial<Route> = {}): Route {
  return {
    connectionId: 'web_1',
    connectionName: 'cli-shop',
    sourceId: 'src_1',
    sourceName: 'shop',
    sourceUrl: 'https://events.example.test/src_1',
    localBase: new URL('http://localhost:3000/'),
    ...overrides,
  }
}

export function makeAttempt(overrides: Partial<InboundAttempt> = {}): InboundAttempt {
  return {
    attemptId: 'att_1',
    connectionId: 'web_1',
    eventId: 'evt_1',
    method: 'POST',
    path: '/hooks',
    query: '',
    headers: [['content-type', 'application/json']],
    body: Buffer.from('{}'),
    ...overrides,
  }
}

export function makeResult(overrides: Partial<AttemptResult> = {}): AttemptResult {
  return {
    attemptId: 'att_1',
    connectionId: 'web_1',
    status: 200,
    headers: [['content-type', 'text/plain']],
    body: Buffer.from('ok'),
    truncated: false,
    durationMs: 12,
    finishedAt: localTimestamp(12, 0, 1),
    ...overrides,
  }
}

export function makeDelivery(
  attempt: Partial<InboundAttempt> = {},
  result: Partial<AttemptResult> = {},
  route: Route | undefined = makeRoute(),
): Delivery {
  const inbound = makeAttempt(attempt)
  return {
    attempt: inbound,
    result: makeResult({ attemptId: inbound.attemptId, connectionId: inbound.connectionId, ...result }),
    route,
    url: route ? new URL(`${inbound.path}${inbound.query ? `?${inbound.query}` : ''}`, route.localBase) : undefined,
  }
}

export function makeEntry(overrides: Partial<HistoryEntry> = {}): HistoryEntry {
  return {
    attemptId: 'att_1',
    eventId: 'evt_1',
    sourceName: 'shop',
    method: 'POST',
    url: 'http://localhost:3000/hooks',
    localPath: '/hooks',
    status: 200,
    bucket: '2xx',
    durationMs: 12,
    timestamp: localTimestamp(12, 0, 1),
    dashboardUrl: 'https://dash.example.test/events/evt_1',
    responseHeaders: [['content-type', 'text/plain']],
    responseBody: Buffer.from('ok'),
    truncated: false,
    ...overrides,
  }
}
