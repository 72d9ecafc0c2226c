import type { Route } from '../../shared/types.js'
import type { Connection } from '../api/types.js'
import { joinPaths } from '../session/target.js'

/**
 * Connection id → local target, fixed for one transport epoch. A reconnect
 * that changes the routing set builds a new table with the next epoch.
 */
export class RouteTable {
  readonly epoch: number
  private routes: Map<string, Route>

  private constructor(routes: Route[], epoch: number) {
    this.epoch = epoch
    this.routes = new Map(routes.map(route => [route.connectionId, route]))
  }

  /**
   * Every connection points at the same forwarding target; the target's own
   * path and the --path prefix form the base that inbound paths extend.
   */
  static build(connections: Connection[], target: URL, pathPrefix = '/', epoch = 1): RouteTable {
    const routes = connections.map((connection): Route => {
      const localBase = new URL(target.href)
      localBase.pathname = joinPaths(target.pathname, pathPrefix)
      return {
        connectionId: connection.id,
        connectionName: connection.name ?? connection.destination.name,
        sourceId: connection.source.id,
        sourceName: connection.source.name,
        sourceUrl: connection.source.url,
        localBase,
      }
    })
    return new RouteTable(routes, epoch)
  }

  static fromRoutes(routes: Route[], epoch = 1): RouteTable {
    return new RouteTable(routes, epoch)
  }

  lookup(connectionId: string): Route | undefined {
    return this.routes.get(connectionId)
  }

  list(): Route[] {
    return Array.from(this.routes.values())
  }

  get size(): number {
    return this.routes.size
  }

  connectionIds(): string[] {
    return Array.from(this.routes.keys())
  }
}

/**
 * Request target for an inbound request: route base path + inbound path +
 * query, kept byte for byte. Empty segments and `..` are not resolved.
 */
export function localRequestPath(route: Route, path: string, query: string): string {
  let pathname = route.localBase.pathname
  if (path) {
    pathname = pathname.replace(/\/+$/, '') + (path.startsWith('/') ? path : `/${path}`)
  }
  const search = query.startsWith('?') ? query.slice(1) : query
  return search ? `${pathname}?${search}` : pathname
}

/**
 * Local URL for an inbound request, for display and connection details.
 * The request line itself uses `localRequestPath`.
 */
export function resolveLocalUrl(route: Route, path: string, query: string): URL {
  return new URL(route.localBase.origin + localRequestPath(route, path, query))
}
