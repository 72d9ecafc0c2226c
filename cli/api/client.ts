import type { z } from 'zod'
import {
  ApiError,
  ConflictError,
  RemoteUnavailableError,
  UnauthenticatedError,
  describeError,
} from '../errors.js'
import { CLIENT_VERSION } from '../config.js'
import {
  connectionSchema,
  destinationSchema,
  listSchema,
  sessionSchema,
  sourceSchema,
  type AttemptResultInput,
  type Connection,
  type CreateConnectionInput,
  type CreateSessionInput,
  type Destination,
  type SessionDescriptor,
  type Source,
} from './types.js'

export const API_PATH_PREFIX = '/2025-01-01'

export interface ControlPlaneOptions {
  baseUrl: string
  apiKey: string
  projectId?: string
  /** Per-request timeout in ms */
  timeoutMs?: number
  verbose?: boolean
}

type Query = Record<string, string | undefined>

interface RequestOptions {
  query?: Query
  body?: unknown
  prefixed?: boolean
  /** Cancels the call on top of the per-request timeout */
  signal?: AbortSignal
}

/**
 * Short-lived REST calls to the control plane. Every call is JSON over
 * HTTP(S) with bearer-key auth; failures are mapped onto the listen error
 * taxonomy so callers can decide between retrying and exiting.
 */
export class ControlPlaneClient {
  private baseUrl: string
  private apiKey: string
  private projectId?: string
  private timeoutMs: number
  private verbose: boolean

  constructor(options: ControlPlaneOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '')
    this.apiKey = options.apiKey
    this.projectId = options.projectId
    this.timeoutMs = options.timeoutMs ?? 15_000
    this.verbose = options.verbose ?? false
  }

  // ============ Sources ============

  async listSources(query: { name?: string; limit?: number } = {}): Promise<Source[]> {
    const res = await this.request('GET', '/sources', listSchema(sourceSchema), {
      query: { name: query.name, limit: query.limit?.toString() },
    })
    return res.models
  }

  async createSource(name: string): Promise<Source> {
    return this.request('POST', '/sources', sourceSchema, { body: { name } })
  }

  // ============ Destinations ============

  async listDestinations(query: { name?: string; type?: string } = {}): Promise<Destination[]> {
    const res = await this.request('GET', '/destinations', listSchema(destinationSchema), { query })
    return res.models
  }

  async createCliDestination(name: string, cliPath: string): Promise<Destination> {
    return this.request('POST', '/destinations', destinationSchema, {
      body: { name, type: 'CLI', config: { path: cliPath } },
    })
  }

  // ============ Connections ============

  async listConnections(query: { source_id?: string; destination_id?: string } = {}): Promise<Connection[]> {
    const res = await this.request('GET', '/connections', listSchema(connectionSchema), { query })
    return res.models
  }

  async createConnection(input: CreateConnectionInput): Promise<Connection> {
    return this.request('POST', '/connections', connectionSchema, { body: input })
  }

  // ============ Sessions & attempts ============

  async createSession(input: CreateSessionInput): Promise<SessionDescriptor> {
    return this.request('POST', '/cli-sessions', sessionSchema, { body: input, prefixed: false })
  }

  async submitAttemptResult(
    sessionId: string,
    attemptId: string,
    input: AttemptResultInput,
    signal?: AbortSignal,
  ): Promise<void> {
    await this.request(
      'POST',
      `/cli-sessions/${encodeURIComponent(sessionId)}/attempts/${encodeURIComponent(attemptId)}/result`,
      null,
      { body: input, prefixed: false, signal },
    )
  }

  async retryEvent(eventId: string): Promise<void> {
    await this.request('POST', `/events/${encodeURIComponent(eventId)}/retry`, null, { body: {} })
  }

  // ============ Transport ============

  private async request<T extends z.ZodTypeAny>(
    method: string,
    path: string,
    schema: T,
    options?: RequestOptions,
  ): Promise<z.infer<T>>
  private async request(
    method: string,
    path: string,
    schema: null,
    options?: RequestOptions,
  ): Promise<void>
  private async request<T extends z.ZodTypeAny>(
    method: string,
    path: string,
    schema: T | null,
    options: RequestOptions = {},
  ): Promise<z.infer<T> | void> {
    const prefix = options.prefixed === false ? '' : API_PATH_PREFIX
    const url = new URL(this.baseUrl + prefix + path)
    for (const [key, value] of Object.entries(options.query ?? {})) {
      if (value !== undefined) url.searchParams.set(key, value)
    }

    const headers: Record<string, string> = {
      'Accept': 'application/json',
      'Authorization': `Bearer ${this.apiKey}`,
      'User-Agent': `hookrelay/${CLIENT_VERSION} node/${process.versions.node}`,
    }
    if (this.projectId) headers['X-Project-Id'] = this.projectId
    if (options.body !== undefined) headers['Content-Type'] = 'application/json'

    if (this.verbose) {
      console.log(`[API] ${method} ${url.pathname}${url.search}`)
    }

    let res: Response
    try {
      res = await fetch(url, {
        method,
        headers,
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        signal: options.signal
          ? AbortSignal.any([options.signal, AbortSignal.timeout(this.timeoutMs)])
          : AbortSignal.timeout(this.timeoutMs),
      })
    } catch (err) {
      throw new RemoteUnavailableError(`${method} ${url.pathname} failed: ${describeError(err)}`)
    }

    const text = await res.text()

    if (!res.ok) {
      throw mapStatusError(res.status, text)
    }

    if (schema === null) return

    let json: unknown
    try {
      json = JSON.parse(text)
    } catch {
      throw new ApiError(res.status, `${method} ${url.pathname} returned a non-JSON body`)
    }

    const parsed = schema.safeParse(json)
    if (!parsed.success) {
      throw new ApiError(res.status, `${method} ${url.pathname} returned an unexpected shape: ${parsed.error.issues[0]?.message ?? 'invalid'}`)
    }
    return parsed.data
  }
}

/**
 * Translate a non-2xx response into a listen error. The server's
 * `{ message }` is used when present.
 */
export function mapStatusError(status: number, body: string): Error {
  let message = `unexpected http status code: ${status}`
  try {
    const json: unknown = JSON.parse(body)
    if (json && typeof json === 'object' && 'message' in json && typeof json.message === 'string' && json.message) {
      message = json.message
    }
  } catch {
    if (body) message = `${message} ${body}`
  }

  if (status === 401 || status === 403) return new UnauthenticatedError(message)
  if (status === 409) return new ConflictError(message)
  if (status >= 500) return new RemoteUnavailableError(message)
  return new ApiError(status, message)
}
