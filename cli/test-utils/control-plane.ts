/**
 * In-process control plane built on express. Keeps sources, destinations,
 * connections and sessions in memory and records every call.
 */
import express, { type NextFunction, type Request, type Response } from 'express'
import type http from 'http'
import { z } from 'zod'
import { API_PATH_PREFIX } from '../api/client.js'
import type { Connection, Destination, Source } from '../api/types.js'

const sessionInputSchema = z.object({
  source_ids: z.array(z.string()),
  webhook_ids: z.array(z.string()),
  device_name: z.string(),
})

const resultInputSchema = z.object({
  webhook_id: z.string(),
  status: z.number().optional(),
  data: z.string(),
  encoding: z.enum(['utf8', 'base64']),
  truncated: z.boolean(),
  error: z.boolean(),
  error_class: z.string().optional(),
  error_message: z.string().optional(),
  duration_ms: z.number(),
}).passthrough()

const namedSchema = z.object({
  name: z.string().optional(),
  source_id: z.string().optional(),
  destination_id: z.string().optional(),
  config: z.object({ path: z.string().optional() }).optional(),
})

type SessionInput = z.infer<typeof sessionInputSchema>
type ResultInput = z.infer<typeof resultInputSchema>

export interface FakeControlPlaneOptions {
  apiKey?: string
  /** Returned as websocket_url on new sessions */
  websocketUrl?: string
  heartbeatIntervalMs?: number
}

export interface SubmittedResult {
  sessionId: string
  attemptId: string
  body: ResultInput
}

interface InjectedFailure {
  status: number
  message: string
}

function queryString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined
}

export class FakeControlPlane {
  readonly apiKey: string
  websocketUrl?: string
  heartbeatIntervalMs?: number

  sources: Source[] = []
  destinations: Destination[] = []
  connections: Connection[] = []
  sessions: Array<{ id: string; token: string; input: SessionInput }> = []
  submitted: SubmittedResult[] = []
  retried: string[] = []
  /** "METHOD /path" of every request, in arrival order */
  calls: string[] = []

  private failures = new Map<string, InjectedFailure[]>()
  private server?: http.Server
  private nextId = 1
  port = 0

  constructor(options: FakeControlPlaneOptions = {}) {
    this.apiKey = options.apiKey ?? 'test-secret'
    this.websocketUrl = options.websocketUrl
    this.heartbeatIntervalMs = options.heartbeatIntervalMs
  }

  get url(): string {
    return `http://127.0.0.1:${this.port}`
  }

  /** Answer the next matching request(s) with an error status, in order. */
  failNext(method: string, path: string, status: number, message = `injected ${status}`): void {
    const key = `${method} ${path}`
    const queue = this.failures.get(key) ?? []
    queue.push({ status, message })
    this.failures.set(key, queue)
  }

  addSource(name: string): Source {
    const id = `src_${this.nextId++}`
    const source: Source = { id, name, url: `https://events.example.test/${id}` }
    this.sources.push(source)
    return source
  }

  addDestination(name: string, cliPath = '/'): Destination {
    const destination: Destination = { id: `des_${this.nextId++}`, name, type: 'CLI', cli_path: cliPath }
    this.destinations.push(destination)
    return destination
  }

  addConnection(source: Source, destination: Destination, name: string): Connection {
    const connection: Connection = { id: `web_${this.nextId++}`, name, source, destination }
    this.connections.push(connection)
    return connection
  }

  async start(): Promise<void> {
    const app = express()
    app.use(express.json())
    app.use((req, res, next) => this.intercept(req, res, next))

    const api = express.Router()

    api.get('/sources', (req, res) => {
      const name = queryString(req.query.name)
      const limit = parseInt(queryString(req.query.limit) ?? '0', 10)
      let models = name === undefined
        ? this.sources
        : this.sources.filter(source => source.name.toLowerCase() === name.toLowerCase())
      if (limit > 0) models = models.slice(0, limit)
      res.json({ models, count: models.length })
    })

    api.post('/sources', (req, res) => {
      res.json(this.addSource(namedSchema.parse(req.body).name ?? 'unnamed'))
    })

    api.get('/destinations', (req, res) => {
      const name = queryString(req.query.name)
      const type = queryString(req.query.type)
      const models = this.destinations.filter(destination =>
        (name === undefined || destination.name === name) && (type === undefined || destination.type === type))
      res.json({ models, count: models.length })
    })

    api.post('/destinations', (req, res) => {
      const body = namedSchema.parse(req.body)
      res.json(this.addDestination(body.name ?? 'device', body.config?.path ?? '/'))
    })

    api.get('/connections', (req, res) => {
      const sourceId = queryString(req.query.source_id)
      const destinationId = queryString(req.query.destination_id)
      const models = this.connections.filter(connection =>
        (sourceId === undefined || connection.source.id === sourceId) &&
        (destinationId === undefined || connection.destination.id === destinationId))
      res.json({ models, count: models.length })
    })

    api.post('/connections', (req, res) => {
      const body = namedSchema.parse(req.body)
      const source = this.sources.find(s => s.id === body.source_id)
      const destination = this.destinations.find(d => d.id === body.destination_id)
      if (!source || !destination) {
        res.status(404).json({ message: 'source or destination not found' })
        return
      }
      res.json(this.addConnection(source, destination, body.name ?? 'connection'))
    })

    api.post('/events/:id/retry', (req, res) => {
      this.retried.push(req.params.id)
      res.json({})
    })

    app.use(API_PATH_PREFIX, api)

    app.post('/cli-sessions', (req, res) => {
      const id = `ses_${this.nextId++}`
      const token = `token-${id}`
      this.sessions.push({ id, token, input: sessionInputSchema.parse(req.body) })
      res.json({
        id,
        token,
        websocket_url: this.websocketUrl,
        heartbeat_interval_ms: this.heartbeatIntervalMs,
      })
    })

    app.post('/cli-sessions/:sessionId/attempts/:attemptId/result', (req, res) => {
      this.submitted.push({
        sessionId: req.params.sessionId,
        attemptId: req.params.attemptId,
        body: resultInputSchema.parse(req.body),
      })
      res.json({})
    })

    await new Promise<void>((resolve, reject) => {
      const server = app.listen(0, '127.0.0.1', () => {
        const address = server.address()
        if (address === null || typeof address === 'string') {
          reject(new Error('Control plane has no port'))
          return
        }
        this.port = address.port
        resolve()
      })
      server.on('error', reject)
      this.server = server
    })
  }

  async close(): Promise<void> {
    const server = this.server
    if (!server) return
    this.server = undefined
    server.closeAllConnections()
    await new Promise<void>(resolve => server.close(() => resolve()))
  }

  private intercept(req: Request, res: Response, next: NextFunction): void {
    const key = `${req.method} ${req.path}`
    this.calls.push(key)

    const failure = this.failures.get(key)?.shift()
    if (failure) {
      res.status(failure.status).json({ message: failure.message })
      return
    }
    if (req.get('authorization') !== `Bearer ${this.apiKey}`) {
      res.status(401).json({ message: 'invalid api key' })
      return
    }
    next()
  }
}
