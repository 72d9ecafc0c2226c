import type { HeaderList } from '../../shared/types.js'

// Fixed list; the inbound Connection header is not trusted to name more.
const HOP_BY_HOP = new Set([
  'connection',
  'keep-alive',
  'te',
  'trailer',
  'trailers',
  'transfer-encoding',
  'upgrade',
  'host',
])

export const FORWARDED_SOURCE_HEADER = 'X-Forwarded-Source'
export const FORWARDED_ATTEMPT_HEADER = 'X-Forwarded-Attempt-Id'
export const FORWARDED_HOST_HEADER = 'X-Forwarded-Host'

export function isHopByHop(name: string): boolean {
  const lower = name.toLowerCase()
  return HOP_BY_HOP.has(lower) || lower.startsWith('proxy-')
}

export interface ForwardContext {
  /** Host (and port) of the local target */
  host: string
  sourceName: string
  attemptId: string
  /** Actual length of the body being sent */
  bodyLength: number
}

/**
 * Headers for the local request: inbound order and casing kept, hop-by-hop
 * names removed, Host rewritten, Content-Length set to the body sent,
 * attribution appended.
 */
export function buildForwardHeaders(inbound: HeaderList, context: ForwardContext): HeaderList {
  const headers: HeaderList = [['Host', context.host]]
  let originalHost: string | undefined
  let hasForwardedHost = false
  let hasContentLength = false

  for (const [name, value] of inbound) {
    const lower = name.toLowerCase()
    if (lower === 'host') {
      originalHost ??= value
    }
    if (isHopByHop(name)) continue
    if (lower === 'x-forwarded-host') hasForwardedHost = true

    if (lower === 'content-length') {
      if (hasContentLength) continue
      hasContentLength = true
      headers.push([name, String(context.bodyLength)])
    } else {
      headers.push([name, value])
    }
  }

  if (!hasContentLength && context.bodyLength > 0) {
    headers.push(['Content-Length', String(context.bodyLength)])
  }
  if (originalHost && !hasForwardedHost) {
    headers.push([FORWARDED_HOST_HEADER, originalHost])
  }
  headers.push([FORWARDED_SOURCE_HEADER, context.sourceName])
  headers.push([FORWARDED_ATTEMPT_HEADER, context.attemptId])
  return headers
}

/**
 * Flatten a header list into the alternating name, value array that
 * http.request takes as raw headers, so repeated names keep their place.
 */
export function toRawHeaders(list: HeaderList): string[] {
  return list.flatMap(([name, value]) => [name, value])
}

/**
 * Response headers from `rawHeaders` (alternating name, value) without the
 * hop-by-hop ones.
 */
export function responseHeaderList(rawHeaders: string[]): HeaderList {
  const list: HeaderList = []
  for (let i = 0; i + 1 < rawHeaders.length; i += 2) {
    const name = rawHeaders[i]
    if (!isHopByHop(name) || name.toLowerCase() === 'host') {
      list.push([name, rawHeaders[i + 1]])
    }
  }
  return list
}
