import { describe, it, expect } from 'vitest'
import type { Connection } from '../api/types.js'
import { RouteTable, localRequestPath, resolveLocalUrl } from './route-table.js'

function connection(id: string, name: string | null, sourceName: string): Connection {
  return {
    id,
    name,
    source: { id: `src-${sourceName}`, name: sourceName, url: `https://events.example.test/${sourceName}` },
    destination: { id: 'des-1', name: 'laptop-alice', type: 'CLI', cli_path: '/' },
  }
}

describe('RouteTable', () => {
  it('should route every connection to the target plus the path prefix', () => {
    const table = RouteTable.build(
      [connection('web_1', 'stripe-cli', 'stripe'), connection('web_2', null, 'github')],
      new URL('http://localhost:3000/api'),
      '/hooks',
      2,
    )

    expect(table.epoch).toBe(2)
    expect(table.size).toBe(2)
    expect(table.connectionIds()).toEqual(['web_1', 'web_2'])

    const route = table.lookup('web_1')
    expect(route?.localBase.href).toBe('http://localhost:3000/api/hooks')
    expect(route?.sourceName).toBe('stripe')
    expect(route?.sourceUrl).toBe('https://events.example.test/stripe')
  })

  it('should name a connection after its destination when it has no name', () => {
    const table = RouteTable.build([connection('web_2', null, 'github')], new URL('http://localhost:3000/'))
    expect(table.lookup('web_2')?.connectionName).toBe('laptop-alice')
    expect(table.epoch).toBe(1)
  })

  it('should return undefined for unknown connections', () => {
    const table = RouteTable.build([], new URL('http://localhost:3000/'))
    expect(table.lookup('web_9')).toBeUndefined()
    expect(table.list()).toEqual([])
  })
})

describe('resolveLocalUrl', () => {
  const [route] = RouteTable.build([connection('web_1', 'a', 'stripe')], new URL('http://localhost:3000/api'), '/hooks').list()

  it('should append the inbound path and query', () => {
    expect(resolveLocalUrl(route, '/stripe', 'a=1').href).toBe('http://localhost:3000/api/hooks/stripe?a=1')
  })

  it('should accept a query with its leading question mark', () => {
    expect(resolveLocalUrl(route, '/x', '?b=2').href).toBe('http://localhost:3000/api/hooks/x?b=2')
  })

  it('should use the base path when the inbound path is empty', () => {
    expect(resolveLocalUrl(route, '', '').href).toBe('http://localhost:3000/api/hooks')
  })

  it('should not double the root slash', () => {
    const [root] = RouteTable.build([connection('web_1', 'a', 'stripe')], new URL('http://localhost:3000/')).list()
    expect(resolveLocalUrl(root, '/webhooks', '').href).toBe('http://localhost:3000/webhooks')
  })
})

describe('localRequestPath', () => {
  const [route] = RouteTable.build([connection('web_1', 'a', 'stripe')], new URL('http://localhost:3000/api'), '/hooks').list()
  const [root] = RouteTable.build([connection('web_1', 'a', 'stripe')], new URL('http://localhost:3000/')).list()

  it('should append the inbound path to the base path', () => {
    expect(localRequestPath(route, '/stripe', 'a=1')).toBe('/api/hooks/stripe?a=1')
  })

  it('should keep empty segments and dot segments as sent', () => {
    expect(localRequestPath(route, '//double/../x', '')).toBe('/api/hooks//double/../x')
    expect(localRequestPath(root, '//double', '')).toBe('//double')
  })

  it('should keep the host when the inbound path starts with two slashes', () => {
    expect(resolveLocalUrl(root, '//double', '').href).toBe('http://localhost:3000//double')
  })
})
