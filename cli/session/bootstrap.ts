import type { ControlPlaneClient } from '../api/client.js'
import type { Connection, Destination, SessionDescriptor, Source } from '../api/types.js'
import { ConflictError, RemoteUnavailableError, ValidationError } from '../errors.js'
import { RouteTable } from '../routes/route-table.js'
import { slugify, sleep } from '../utils.js'
import { deviceName as defaultDeviceName } from './device.js'
import { isPath, parseSourceQuery } from './target.js'

const SOURCE_LIST_LIMIT = 255

export interface BootstrapInput {
  target: URL
  sourceQuery?: string
  connectionFilter?: string
  /** --path prefix applied locally on top of the target's own path */
  path?: string
}

export interface Session {
  id: string
  token: string
  endpoint: URL
  heartbeatIntervalMs?: number
  deviceName: string
  sources: Source[]
  connections: Connection[]
}

export interface BootstrapResult {
  session: Session
  routes: RouteTable
}

export interface BootstrapOptions {
  wsBase: string
  wsBaseOverride?: string
  noWss?: boolean
  deviceName?: string
  /** Attempts per control-plane call when the remote is unavailable */
  retryAttempts?: number
  retryBaseDelayMs?: number
  signal?: AbortSignal
  verbose?: boolean
}

/**
 * Turns the user's inputs into a Session: resolves (or creates) sources, the
 * device's CLI destination and one connection per source, then opens a
 * session on the control plane.
 */
export class SessionBootstrapper {
  private client: ControlPlaneClient
  private options: BootstrapOptions
  private device: string

  constructor(client: ControlPlaneClient, options: BootstrapOptions) {
    this.client = client
    this.options = options
    this.device = options.deviceName ?? defaultDeviceName()
  }

  async bootstrap(input: BootstrapInput): Promise<BootstrapResult> {
    const { sources, connections } = await this.resolve(input)
    const session = await this.openSession(sources, connections)
    const routes = RouteTable.build(connections, input.target, input.path ?? '/')

    console.log(`[Bootstrap] Session ${session.id} ready with ${routes.size} connection(s)`)
    return { session, routes }
  }

  /**
   * Re-resolve the routing set without opening a session, for a transport
   * that came back under a different session id.
   */
  async refreshRoutes(input: BootstrapInput, epoch: number): Promise<RouteTable> {
    const { connections } = await this.resolve(input)
    return RouteTable.build(connections, input.target, input.path ?? '/', epoch)
  }

  private async resolve(input: BootstrapInput): Promise<{ sources: Source[]; connections: Connection[] }> {
    const aliases = parseSourceQuery(input.sourceQuery)
    const isMultiSource = aliases.length > 1 || aliases[0] === '*'

    if (input.path !== undefined && input.path !== '/') {
      if (isMultiSource) {
        throw new ValidationError('Can only set a path when listening to a single source')
      }
      if (!isPath(input.path)) {
        throw new ValidationError(`The path "${input.path}" must be in a valid format`)
      }
    }

    const sources = await this.resolveSources(aliases)
    const destination = await this.resolveDestination()
    const connections = await this.resolveConnections(sources, destination, input.connectionFilter)

    if (connections.length === 0) {
      throw new ValidationError('no connections provided')
    }
    return { sources: relevantSources(sources, connections), connections }
  }

  /**
   * Open a fresh session for an existing routing set, e.g. after the
   * previous token expired.
   */
  async renew(previous: Session): Promise<Session> {
    return this.openSession(previous.sources, previous.connections)
  }

  // ============ Sources ============

  private async resolveSources(aliases: string[]): Promise<Source[]> {
    if (aliases.length === 0) {
      return []
    }

    if (aliases.length === 1 && aliases[0] === '*') {
      const sources = await this.call(() => this.client.listSources({ limit: SOURCE_LIST_LIMIT }))
      if (sources.length === 0) {
        throw new ValidationError('unable to find any matching sources')
      }
      return sources
    }

    const sources: Source[] = []
    for (const alias of aliases) {
      const found = await this.findSource(alias)
      if (found) {
        sources.push(found)
        continue
      }

      if (aliases.length > 1) {
        throw new ValidationError(`unable to find source "${alias}"`)
      }

      const name = slugify(alias)
      if (!name) {
        throw new ValidationError(`"${alias}" is not a usable source name`)
      }
      console.log(`[Bootstrap] Source "${alias}" not found, creating "${name}"`)
      sources.push(await this.call(() => this.client.createSource(name)))
    }
    return sources
  }

  private async findSource(alias: string): Promise<Source | undefined> {
    const candidates = await this.call(() => this.client.listSources({ name: alias }))

    const exact = candidates.filter(source => source.name === alias)
    const matches = exact.length > 0
      ? exact
      : candidates.filter(source => source.name.toLowerCase() === alias.toLowerCase())

    if (matches.length > 1) {
      throw new ConflictError(
        `Source "${alias}" matches ${matches.length} sources: ${matches.map(source => source.id).join(', ')}`,
        'Use the exact source name',
      )
    }
    return matches[0]
  }

  // ============ Destination ============

  private async resolveDestination(): Promise<Destination> {
    const existing = await this.call(() => this.client.listDestinations({ name: this.device, type: 'CLI' }))
    const match = existing.find(destination =>
      destination.name === this.device && (destination.type === undefined || destination.type === 'CLI'))

    if (match) {
      return match
    }

    if (this.options.verbose) {
      console.log(`[Bootstrap] Creating CLI destination "${this.device}"`)
    }
    return this.call(() => this.client.createCliDestination(this.device, '/'))
  }

  // ============ Connections ============

  private async resolveConnections(
    sources: Source[],
    destination: Destination,
    filter: string | undefined,
  ): Promise<Connection[]> {
    if (sources.length === 0) {
      const existing = await this.call(() => this.client.listConnections({ destination_id: destination.id }))
      const matched = applyFilter(existing.filter(c => c.destination.id === destination.id), filter)
      if (matched.length === 0) {
        throw new ValidationError(
          'No source given and no existing connections for this device',
          'Pass a source name, e.g. `hookrelay listen 3000 my-source`',
        )
      }
      return matched
    }

    const connections: Connection[] = []
    for (const source of sources) {
      const existing = (await this.call(() => this.client.listConnections({
        source_id: source.id,
        destination_id: destination.id,
      }))).filter(c => c.destination.id === destination.id && c.source.id === source.id)

      const matched = applyFilter(existing, filter)
      if (matched.length > 0) {
        connections.push(...matched)
        continue
      }

      // Nothing to reuse: bind the source to this device, named after the
      // filter when one was given.
      if (filter !== undefined && (isPath(filter) || sources.length > 1)) {
        continue
      }
      const name = slugify(filter ?? `cli-${source.name}`)
      console.log(`[Bootstrap] Creating connection "${name}" for source "${source.name}"`)
      connections.push(await this.call(() => this.client.createConnection({
        name,
        source_id: source.id,
        destination_id: destination.id,
      })))
    }
    return connections
  }

  // ============ Session ============

  private async openSession(sources: Source[], connections: Connection[]): Promise<Session> {
    const descriptor = await this.call(() => this.client.createSession({
      source_ids: sources.map(source => source.id),
      webhook_ids: connections.map(connection => connection.id),
      device_name: this.device,
    }))

    return {
      id: descriptor.id,
      token: descriptor.token,
      endpoint: this.endpointFor(descriptor),
      heartbeatIntervalMs: descriptor.heartbeat_interval_ms,
      deviceName: this.device,
      sources,
      connections,
    }
  }

  private endpointFor(descriptor: SessionDescriptor): URL {
    const raw = this.options.wsBaseOverride ?? descriptor.websocket_url ?? this.options.wsBase
    let endpoint: URL
    try {
      endpoint = new URL(raw)
    } catch {
      throw new ValidationError(`Invalid websocket endpoint "${raw}"`)
    }

    if (endpoint.protocol === 'https:') endpoint.protocol = 'wss:'
    if (endpoint.protocol === 'http:') endpoint.protocol = 'ws:'
    if (this.options.noWss && endpoint.protocol === 'wss:') endpoint.protocol = 'ws:'
    return endpoint
  }

  /**
   * Run a control-plane call, retrying with exponential backoff while the
   * remote is unavailable.
   */
  private async call<T>(fn: () => Promise<T>): Promise<T> {
    const attempts = this.options.retryAttempts ?? 4
    let delay = this.options.retryBaseDelayMs ?? 500

    for (let attempt = 1; ; attempt++) {
      try {
        return await fn()
      } catch (err) {
        if (!(err instanceof RemoteUnavailableError) || attempt >= attempts) {
          throw err
        }
        if (this.options.verbose) {
          console.warn(`[Bootstrap] Control plane unavailable (attempt ${attempt}/${attempts}), retrying in ${delay}ms: ${err.message}`)
        }
        await sleep(delay, this.options.signal)
        delay = Math.min(delay * 2, 4_000)
      }
    }
  }
}

/**
 * Match connections by exact name, or by CLI path containing the filter
 * when the filter is itself a path.
 */
export function applyFilter(connections: Connection[], filter: string | undefined): Connection[] {
  if (filter === undefined || filter === '') return connections
  const byPath = isPath(filter)
  return connections.filter(connection =>
    connection.name === filter ||
    (byPath && (connection.destination.cli_path ?? '').includes(filter)))
}

/**
 * Sources that ended up with at least one connection, in the order given.
 * With no explicit sources, they come from the connections themselves.
 */
export function relevantSources(sources: Source[], connections: Connection[]): Source[] {
  const pool = sources.length > 0 ? sources : connections.map(connection => connection.source)
  const used = new Set(connections.map(connection => connection.source.id))
  const seen = new Set<string>()
  return pool.filter(source => {
    if (!used.has(source.id) || seen.has(source.id)) return false
    seen.add(source.id)
    return true
  })
}
