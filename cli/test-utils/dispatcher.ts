/**
 * In-process websocket dispatcher speaking the listen frame protocol.
 * Answers HELLO with a WELCOME (overridable), records every frame and
 * lets tests push attempts, pings, control frames and closes.
 */
import type http from 'http'
import { WebSocket, WebSocketServer, type RawData } from 'ws'
import { z } from 'zod'

const frameSchema = z.object({
  event: z.string(),
  body: z.record(z.unknown()).default({}),
})

export type WireFrame = z.infer<typeof frameSchema>

export interface DispatcherConnection {
  ws: WebSocket
  /** Handshake headers, lowercased */
  headers: http.IncomingHttpHeaders
  frames: WireFrame[]
  hello?: Record<string, unknown>
}

export interface WelcomeReply {
  session_id?: string
  heartbeat_interval_ms?: number
  notice?: string
  error?: string
}

export interface FakeDispatcherOptions {
  /** Body of the WELCOME sent for a HELLO; undefined sends nothing */
  welcome?: (hello: Record<string, unknown>, connectionIndex: number) => WelcomeReply | undefined
  /** Answer client pings (default true) */
  answerPings?: boolean
}

export interface AttemptSpec {
  attemptId: string
  connectionId: string
  eventId?: string
  method?: string
  path?: string
  headers?: Record<string, string> | Array<[string, string]>
  body?: string
  timeoutMs?: number
  fragment?: { index: number; total: number }
}

export function attemptFrame(spec: AttemptSpec): string {
  return JSON.stringify({
    event: 'attempt',
    body: {
      attempt_id: spec.attemptId,
      webhook_id: spec.connectionId,
      event_id: spec.eventId,
      request: {
        method: spec.method ?? 'POST',
        path: spec.path ?? '/',
        headers: spec.headers ?? { 'content-type': 'application/json' },
        data: spec.body ?? '',
        timeout: spec.timeoutMs,
      },
      fragment: spec.fragment,
    },
  })
}

function rawToString(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf-8')
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf-8')
  return Buffer.from(data).toString('utf-8')
}

export class FakeDispatcher {
  readonly connections: DispatcherConnection[] = []
  /** Handshakes are refused with this HTTP status while set */
  rejectStatus?: number
  answerPings: boolean
  port = 0

  private wss?: WebSocketServer
  private welcome: (hello: Record<string, unknown>, connectionIndex: number) => WelcomeReply | undefined

  constructor(options: FakeDispatcherOptions = {}) {
    this.welcome = options.welcome ?? (hello => ({ session_id: typeof hello.session_id === 'string' ? hello.session_id : undefined }))
    this.answerPings = options.answerPings ?? true
  }

  get url(): string {
    return `ws://127.0.0.1:${this.port}/listen`
  }

  /** Latest connection */
  get current(): DispatcherConnection | undefined {
    return this.connections[this.connections.length - 1]
  }

  /** Every attempt_response body, in arrival order across connections */
  get results(): Array<Record<string, unknown>> {
    return this.connections.flatMap(connection =>
      connection.frames.filter(frame => frame.event === 'attempt_response').map(frame => frame.body))
  }

  setWelcome(welcome: (hello: Record<string, unknown>, connectionIndex: number) => WelcomeReply | undefined): void {
    this.welcome = welcome
  }

  start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const wss = new WebSocketServer({
        host: '127.0.0.1',
        port: 0,
        verifyClient: (_info, done) => {
          if (this.rejectStatus !== undefined) {
            done(false, this.rejectStatus)
          } else {
            done(true)
          }
        },
      })
      wss.on('listening', () => {
        const address = wss.address()
        if (typeof address === 'string') {
          reject(new Error('Dispatcher has no port'))
          return
        }
        this.port = address.port
        resolve()
      })
      wss.on('error', reject)
      wss.on('connection', (ws, req) => this.accept(ws, req))
      this.wss = wss
    })
  }

  async close(): Promise<void> {
    const wss = this.wss
    if (!wss) return
    this.wss = undefined
    for (const client of wss.clients) client.terminate()
    await new Promise<void>(resolve => wss.close(() => resolve()))
  }

  send(frame: { event: string; body?: Record<string, unknown> }, connection = this.current): void {
    connection?.ws.send(JSON.stringify(frame))
  }

  sendRaw(text: string, connection = this.current): void {
    connection?.ws.send(text)
  }

  sendAttempt(spec: AttemptSpec, connection = this.current): void {
    connection?.ws.send(attemptFrame(spec))
  }

  private accept(ws: WebSocket, req: http.IncomingMessage): void {
    const connection: DispatcherConnection = { ws, headers: req.headers, frames: [] }
    const index = this.connections.length
    this.connections.push(connection)

    ws.on('error', () => ws.terminate())
    ws.on('message', data => {
      let json: unknown
      try {
        json = JSON.parse(rawToString(data))
      } catch {
        return
      }
      const parsed = frameSchema.safeParse(json)
      if (!parsed.success) return
      const frame = parsed.data
      connection.frames.push(frame)

      if (frame.event === 'hello') {
        connection.hello = frame.body
        const reply = this.welcome(frame.body, index)
        if (reply) ws.send(JSON.stringify({ event: 'connect_response', body: reply }))
      } else if (frame.event === 'ping' && this.answerPings) {
        ws.send(JSON.stringify({ event: 'pong', body: { token: frame.body.token } }))
      }
    })
  }
}
