import { isUtf8 } from 'buffer'
import { z } from 'zod'
import type { AttemptResult, HeaderList, InboundAttempt } from '../../shared/types.js'
import type { AttemptResultInput } from '../api/types.js'

// Wire frames are JSON text: { "event": <type>, "body": { ... } }.
// Unknown keys pass through; unknown events decode to { type: 'unknown' }.

export const CAPABILITIES = ['fragments', 'flow-control', 'base64-body']

const envelopeSchema = z.object({
  event: z.string(),
  body: z.unknown().optional(),
})

const headersSchema = z.union([
  z.array(z.tuple([z.string(), z.string()])),
  z.record(z.union([z.string(), z.number(), z.array(z.string())])),
])

const welcomeSchema = z.object({
  session_id: z.string().optional(),
  heartbeat_interval_ms: z.number().int().positive().optional(),
  notice: z.string().optional(),
  error: z.string().optional(),
}).passthrough()

const tokenSchema = z.object({
  token: z.number().int(),
}).passthrough()

const attemptSchema = z.object({
  attempt_id: z.string().min(1),
  webhook_id: z.string().min(1),
  event_id: z.string().optional(),
  attempt_number: z.number().int().optional(),
  requested_at: z.string().optional(),
  source_name: z.string().optional(),
  cli_path: z.string().optional(),
  request: z.object({
    method: z.string().min(1),
    path: z.string().optional(),
    query: z.string().optional(),
    headers: headersSchema.optional(),
    body_base64: z.string().optional(),
    data: z.unknown().optional(),
    timeout: z.number().int().positive().optional(),
  }).passthrough(),
  fragment: z.object({
    index: z.number().int().min(0),
    total: z.number().int().min(1),
  }).optional(),
}).passthrough()

const controlSchema = z.object({
  type: z.string(),
  message: z.string().optional(),
}).passthrough()

const byeSchema = z.object({
  reason: z.string().optional(),
}).passthrough()

export interface Fragment {
  index: number
  total: number
}

export type IncomingFrame =
  | { type: 'welcome'; sessionId?: string; heartbeatIntervalMs?: number; notice?: string; error?: string }
  | { type: 'ping'; token: number }
  | { type: 'pong'; token: number }
  | { type: 'attempt'; attempt: InboundAttempt; sourceName?: string; fragment?: Fragment }
  | { type: 'control'; control: string; message?: string }
  | { type: 'bye'; reason?: string }
  | { type: 'unknown'; event: string }

export class ProtocolError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ProtocolError'
  }
}

function parseBody<T extends z.ZodTypeAny>(event: string, schema: T, body: unknown): z.infer<T> {
  const parsed = schema.safeParse(body ?? {})
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    throw new ProtocolError(`Malformed ${event} frame: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'invalid'}`)
  }
  return parsed.data
}

export function decodeFrame(text: string): IncomingFrame {
  let json: unknown
  try {
    json = JSON.parse(text)
  } catch {
    throw new ProtocolError('Frame is not valid JSON')
  }

  const envelope = envelopeSchema.safeParse(json)
  if (!envelope.success) {
    throw new ProtocolError('Frame has no event')
  }
  const { event, body } = envelope.data

  switch (event) {
    case 'connect_response': {
      const welcome = parseBody(event, welcomeSchema, body)
      return {
        type: 'welcome',
        sessionId: welcome.session_id,
        heartbeatIntervalMs: welcome.heartbeat_interval_ms,
        notice: welcome.notice,
        error: welcome.error,
      }
    }
    case 'ping':
    case 'pong':
      return { type: event, token: parseBody(event, tokenSchema, body).token }
    case 'attempt':
      return decodeAttempt(parseBody(event, attemptSchema, body))
    case 'control': {
      const control = parseBody(event, controlSchema, body)
      return { type: 'control', control: control.type, message: control.message }
    }
    case 'bye':
      return { type: 'bye', reason: parseBody(event, byeSchema, body).reason }
    default:
      return { type: 'unknown', event }
  }
}

function decodeAttempt(frame: z.infer<typeof attemptSchema>): IncomingFrame {
  const { request } = frame
  let path = request.path ?? frame.cli_path ?? '/'
  let query = request.query ?? ''

  const queryStart = path.indexOf('?')
  if (queryStart !== -1) {
    if (!query) query = path.slice(queryStart + 1)
    path = path.slice(0, queryStart)
  }

  return {
    type: 'attempt',
    sourceName: frame.source_name,
    fragment: frame.fragment,
    attempt: {
      attemptId: frame.attempt_id,
      connectionId: frame.webhook_id,
      eventId: frame.event_id,
      method: request.method.toUpperCase(),
      path: path || '/',
      query: query.startsWith('?') ? query.slice(1) : query,
      headers: toHeaderList(request.headers),
      body: decodeBody(request.body_base64, request.data),
      requestedAt: frame.requested_at,
      attemptNumber: frame.attempt_number,
      timeoutMs: request.timeout,
    },
  }
}

function toHeaderList(headers: z.infer<typeof headersSchema> | undefined): HeaderList {
  if (!headers) return []
  if (Array.isArray(headers)) return headers.map(([name, value]): [string, string] => [name, value])

  const list: HeaderList = []
  for (const [name, value] of Object.entries(headers)) {
    if (Array.isArray(value)) {
      for (const item of value) list.push([name, item])
    } else {
      list.push([name, String(value)])
    }
  }
  return list
}

function decodeBody(base64: string | undefined, data: unknown): Buffer {
  if (base64 !== undefined) return Buffer.from(base64, 'base64')
  if (data === undefined || data === null) return Buffer.alloc(0)
  if (typeof data === 'string') return Buffer.from(data, 'utf-8')
  return Buffer.from(JSON.stringify(data), 'utf-8')
}

// ============ Outgoing ============

function encode(event: string, body: object): string {
  return JSON.stringify({ event, body })
}

export function encodeHello(sessionId: string, token: string, clientVersion: string): string {
  return encode('hello', {
    session_id: sessionId,
    token,
    client_version: clientVersion,
    capabilities: CAPABILITIES,
  })
}

export function encodePing(token: number): string {
  return encode('ping', { token })
}

export function encodePong(token: number): string {
  return encode('pong', { token })
}

export function encodeBye(reason?: string): string {
  return encode('bye', reason === undefined ? {} : { reason })
}

/**
 * Result body shared by the websocket frame and the control-plane fallback.
 * Bodies that are valid UTF-8 travel as text, anything else as base64.
 */
export function toResultInput(result: AttemptResult): AttemptResultInput {
  const text = result.body.length === 0 || isUtf8(result.body)
  return {
    webhook_id: result.connectionId,
    status: result.status,
    headers: result.headers.map(([name, value]): [string, string] => [name, value]),
    data: text ? result.body.toString('utf-8') : result.body.toString('base64'),
    encoding: text ? 'utf8' : 'base64',
    truncated: result.truncated,
    error: result.errorClass !== undefined,
    error_class: result.errorClass,
    error_message: result.errorMessage,
    duration_ms: Math.ceil(result.durationMs),
    finished_at: result.finishedAt,
  }
}

export function encodeResult(result: AttemptResult): string {
  return encode('attempt_response', { attempt_id: result.attemptId, ...toResultInput(result) })
}
