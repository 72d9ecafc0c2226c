import { describe, it, expect } from 'vitest'
import { buildForwardHeaders, isHopByHop, responseHeaderList, toRawHeaders } from './headers.js'

const context = { host: '127.0.0.1:3000', sourceName: 'stripe', attemptId: 'att_1', bodyLength: 7 }

describe('isHopByHop', () => {
  it('should match the fixed list case-insensitively', () => {
    expect(isHopByHop('Connection')).toBe(true)
    expect(isHopByHop('transfer-encoding')).toBe(true)
    expect(isHopByHop('Host')).toBe(true)
  })

  it('should match proxy- headers', () => {
    expect(isHopByHop('Proxy-Authorization')).toBe(true)
  })

  it('should keep end-to-end headers', () => {
    expect(isHopByHop('Content-Type')).toBe(false)
    expect(isHopByHop('X-Signature')).toBe(false)
  })
})

describe('buildForwardHeaders', () => {
  it('should rewrite Host and append attribution', () => {
    const headers = buildForwardHeaders([
      ['Content-Type', 'application/json'],
      ['Host', 'events.example.test'],
      ['Connection', 'keep-alive'],
      ['X-Trace', 'a'],
      ['X-Trace', 'b'],
    ], context)

    expect(headers).toEqual([
      ['Host', '127.0.0.1:3000'],
      ['Content-Type', 'application/json'],
      ['X-Trace', 'a'],
      ['X-Trace', 'b'],
      ['Content-Length', '7'],
      ['X-Forwarded-Host', 'events.example.test'],
      ['X-Forwarded-Source', 'stripe'],
      ['X-Forwarded-Attempt-Id', 'att_1'],
    ])
  })

  it('should keep an existing X-Forwarded-Host', () => {
    const headers = buildForwardHeaders([
      ['Host', 'events.example.test'],
      ['X-Forwarded-Host', 'origin.example.test'],
    ], context)

    expect(headers.filter(([name]) => name.toLowerCase() === 'x-forwarded-host')).toEqual([
      ['X-Forwarded-Host', 'origin.example.test'],
    ])
  })

  it('should replace Content-Length with the body actually sent', () => {
    const headers = buildForwardHeaders([['content-length', '999']], context)
    expect(headers.filter(([name]) => name.toLowerCase() === 'content-length')).toEqual([['content-length', '7']])
  })

  it('should leave Content-Length out for an empty body', () => {
    const headers = buildForwardHeaders([], { ...context, bodyLength: 0 })
    expect(headers.map(([name]) => name)).toEqual(['Host', 'X-Forwarded-Source', 'X-Forwarded-Attempt-Id'])
  })

  it('should strip transfer-encoding and proxy headers', () => {
    const headers = buildForwardHeaders([
      ['Transfer-Encoding', 'chunked'],
      ['Proxy-Connection', 'keep-alive'],
      ['TE', 'trailers'],
    ], context)

    expect(headers.map(([name]) => name)).toEqual(['Host', 'Content-Length', 'X-Forwarded-Source', 'X-Forwarded-Attempt-Id'])
  })
})

describe('toRawHeaders', () => {
  it('should keep interleaved repeated names in place', () => {
    expect(toRawHeaders([
      ['X-Trace', 'a'],
      ['Accept', '*/*'],
      ['x-trace', 'b'],
    ])).toEqual(['X-Trace', 'a', 'Accept', '*/*', 'x-trace', 'b'])
  })
})

describe('responseHeaderList', () => {
  it('should pair raw headers and drop hop-by-hop ones', () => {
    expect(responseHeaderList([
      'Content-Type', 'text/plain',
      'Connection', 'close',
      'Transfer-Encoding', 'chunked',
      'Set-Cookie', 'a=1',
      'Set-Cookie', 'b=2',
    ])).toEqual([
      ['Content-Type', 'text/plain'],
      ['Set-Cookie', 'a=1'],
      ['Set-Cookie', 'b=2'],
    ])
  })
})
