import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { ControlPlaneClient } from '../api/client.js'
import { ConflictError, RemoteUnavailableError, ValidationError } from '../errors.js'
import { FakeControlPlane } from '../test-utils/index.js'
import { SessionBootstrapper, applyFilter, relevantSources, type BootstrapOptions } from './bootstrap.js'

const target = new URL('http://localhost:3000/')

describe('SessionBootstrapper', () => {
  let plane: FakeControlPlane
  let client: ControlPlaneClient

  function bootstrapper(options: Partial<BootstrapOptions> = {}) {
    return new SessionBootstrapper(client, {
      wsBase: 'wss://ws.example.test',
      deviceName: 'test-device',
      retryBaseDelayMs: 10,
      ...options,
    })
  }

  beforeEach(async () => {
    plane = new FakeControlPlane({ websocketUrl: 'http://127.0.0.1:9/listen', heartbeatIntervalMs: 15_000 })
    await plane.start()
    client = new ControlPlaneClient({ baseUrl: plane.url, apiKey: 'test-secret' })
  })

  afterEach(async () => {
    await plane.close()
  })

  describe('bootstrap', () => {
    it('should create the source, destination and connection when none exist', async () => {
      const { session, routes } = await bootstrapper().bootstrap({ target, sourceQuery: 'Shop.Orders' })

      expect(plane.sources.map(source => source.name)).toEqual(['shop-orders'])
      expect(plane.destinations).toEqual([{ id: 'des_2', name: 'test-device', type: 'CLI', cli_path: '/' }])
      expect(plane.connections.map(connection => connection.name)).toEqual(['cli-shop-orders'])

      expect(session).toMatchObject({ id: 'ses_4', token: 'token-ses_4', heartbeatIntervalMs: 15_000, deviceName: 'test-device' })
      expect(session.endpoint.href).toBe('ws://127.0.0.1:9/listen')
      expect(plane.sessions[0].input).toEqual({ source_ids: ['src_1'], webhook_ids: ['web_3'], device_name: 'test-device' })

      expect(routes.epoch).toBe(1)
      expect(routes.lookup('web_3')).toMatchObject({ sourceName: 'shop-orders', connectionName: 'cli-shop-orders' })
      expect(routes.lookup('web_3')?.localBase.href).toBe('http://localhost:3000/')
    })

    it('should reuse an existing connection', async () => {
      const source = plane.addSource('shop')
      const device = plane.addDestination('test-device')
      plane.addConnection(source, device, 'main')

      const { routes } = await bootstrapper().bootstrap({ target, sourceQuery: 'shop' })

      expect(routes.connectionIds()).toEqual(['web_3'])
      expect(plane.calls).not.toContain('POST /2025-01-01/connections')
    })

    it('should keep only connections named by the filter', async () => {
      const source = plane.addSource('shop')
      const device = plane.addDestination('test-device')
      plane.addConnection(source, device, 'main')
      plane.addConnection(source, device, 'other')

      const { routes } = await bootstrapper().bootstrap({ target, sourceQuery: 'shop', connectionFilter: 'other' })

      expect(routes.list().map(route => route.connectionName)).toEqual(['other'])
    })

    it('should fail when a path filter matches nothing', async () => {
      const source = plane.addSource('shop')
      plane.addConnection(source, plane.addDestination('test-device'), 'main')

      await expect(bootstrapper().bootstrap({ target, sourceQuery: 'shop', connectionFilter: '/missing' }))
        .rejects.toThrow('no connections provided')
    })

    it('should route from existing connections when no source is given', async () => {
      const source = plane.addSource('shop')
      plane.addConnection(source, plane.addDestination('test-device'), 'main')

      const { session } = await bootstrapper().bootstrap({ target })

      expect(session.sources.map(s => s.id)).toEqual(['src_1'])
      expect(plane.sessions[0].input.source_ids).toEqual(['src_1'])
    })

    it('should refuse to start with no source and no connections', async () => {
      await expect(bootstrapper().bootstrap({ target }))
        .rejects.toThrow('No source given and no existing connections for this device')
    })

    it('should listen to every source for *', async () => {
      plane.addSource('shop')
      plane.addSource('billing')

      const { session, routes } = await bootstrapper().bootstrap({ target, sourceQuery: '*' })

      expect(session.sources.map(source => source.name)).toEqual(['shop', 'billing'])
      expect(routes.size).toBe(2)
    })

    it('should fail for * when the project has no sources', async () => {
      await expect(bootstrapper().bootstrap({ target, sourceQuery: '*' }))
        .rejects.toThrow('unable to find any matching sources')
    })

    it('should not create sources named in a list', async () => {
      plane.addSource('shop')

      await expect(bootstrapper().bootstrap({ target, sourceQuery: 'shop,billing' }))
        .rejects.toThrow('unable to find source "billing"')
      expect(plane.sources).toHaveLength(1)
    })

    it('should report a name that matches several sources', async () => {
      plane.addSource('Shop')
      plane.addSource('SHOP')

      await expect(bootstrapper().bootstrap({ target, sourceQuery: 'shop' })).rejects.toBeInstanceOf(ConflictError)
    })

    it('should validate --path before calling the control plane', async () => {
      await expect(bootstrapper().bootstrap({ target, sourceQuery: 'shop,billing', path: '/hooks' }))
        .rejects.toThrow('Can only set a path when listening to a single source')
      await expect(bootstrapper().bootstrap({ target, sourceQuery: 'shop', path: 'hooks' }))
        .rejects.toBeInstanceOf(ValidationError)
      expect(plane.calls).toEqual([])
    })

    it('should join the target path and --path prefix', async () => {
      const { routes } = await bootstrapper().bootstrap({
        target: new URL('http://localhost:3000/api'),
        sourceQuery: 'shop',
        path: '/hooks',
      })

      expect(routes.list()[0].localBase.href).toBe('http://localhost:3000/api/hooks')
    })

    it('should retry while the control plane is unavailable', async () => {
      plane.failNext('POST', '/cli-sessions', 503)

      const { session } = await bootstrapper().bootstrap({ target, sourceQuery: 'shop' })

      expect(session.id).toBe('ses_4')
      expect(plane.calls.filter(call => call === 'POST /cli-sessions')).toHaveLength(2)
    })

    it('should give up after the last retry', async () => {
      plane.failNext('GET', '/2025-01-01/sources', 503)
      plane.failNext('GET', '/2025-01-01/sources', 503)

      await expect(bootstrapper({ retryAttempts: 2 }).bootstrap({ target, sourceQuery: 'shop' }))
        .rejects.toBeInstanceOf(RemoteUnavailableError)
    })
  })

  describe('endpoint', () => {
    it('should prefer the override and map https to wss', async () => {
      const { session } = await bootstrapper({ wsBaseOverride: 'https://relay.example.test/ws' })
        .bootstrap({ target, sourceQuery: 'shop' })

      expect(session.endpoint.href).toBe('wss://relay.example.test/ws')
    })

    it('should fall back to the configured base and honour noWss', async () => {
      plane.websocketUrl = undefined

      const { session } = await bootstrapper({ noWss: true }).bootstrap({ target, sourceQuery: 'shop' })

      expect(session.endpoint.href).toBe('ws://ws.example.test/')
    })
  })

  describe('renew and refreshRoutes', () => {
    it('should open a new session for the same connections', async () => {
      const boot = bootstrapper()
      const { session } = await boot.bootstrap({ target, sourceQuery: 'shop' })

      const renewed = await boot.renew(session)

      expect(renewed.id).toBe('ses_5')
      expect(renewed.connections).toEqual(session.connections)
      expect(plane.sessions[1].input.webhook_ids).toEqual(['web_3'])
    })

    it('should rebuild routes under a new epoch without opening a session', async () => {
      const boot = bootstrapper()
      const input = { target, sourceQuery: 'shop' }
      await boot.bootstrap(input)
      const source = plane.sources[0]
      plane.addConnection(source, plane.destinations[0], 'second')

      const routes = await boot.refreshRoutes(input, 2)

      expect(routes.epoch).toBe(2)
      expect(routes.connectionIds()).toEqual(['web_3', 'web_5'])
      expect(plane.sessions).toHaveLength(1)
    })
  })
})

describe('applyFilter', () => {
  const connection = (id: string, name: string, cliPath: string) => ({
    id,
    name,
    source: { id: 'src_1', name: 'shop' },
    destination: { id: 'des_1', name: 'laptop', cli_path: cliPath },
  })

  it('should match by name or by CLI path', () => {
    const all = [connection('web_1', 'orders', '/orders'), connection('web_2', 'refunds', '/payments/refunds')]

    expect(applyFilter(all, undefined)).toHaveLength(2)
    expect(applyFilter(all, 'orders').map(c => c.id)).toEqual(['web_1'])
    expect(applyFilter(all, '/payments').map(c => c.id)).toEqual(['web_2'])
  })
})

describe('relevantSources', () => {
  it('should keep sources that have a connection, once each', () => {
    const shop = { id: 'src_1', name: 'shop' }
    const billing = { id: 'src_2', name: 'billing' }
    const connections = [
      { id: 'web_1', source: shop, destination: { id: 'des_1', name: 'laptop' } },
      { id: 'web_2', source: shop, destination: { id: 'des_1', name: 'laptop' } },
    ]

    expect(relevantSources([shop, billing], connections)).toEqual([shop])
    expect(relevantSources([], connections)).toEqual([shop])
  })
})
