import { describe, it, expect } from 'vitest'
import { ValidationError } from '../errors.js'
import { isPath, joinPaths, parseForwardTarget, parseSourceQuery } from './target.js'

describe('parseForwardTarget', () => {
  it('should treat a bare port as localhost over http', () => {
    expect(parseForwardTarget('3000').href).toBe('http://localhost:3000/')
  })

  it('should keep the path of a full URL', () => {
    expect(parseForwardTarget('https://example.test:8443/hooks').href).toBe('https://example.test:8443/hooks')
  })

  it('should drop a fragment', () => {
    expect(parseForwardTarget('http://localhost:4000/in#top').href).toBe('http://localhost:4000/in')
  })

  it.each(['0', '70000'])('should reject out-of-range port %s', port => {
    expect(() => parseForwardTarget(port)).toThrow(ValidationError)
  })

  it('should reject unsupported protocols', () => {
    expect(() => parseForwardTarget('ftp://localhost/')).toThrow('Unsupported protocol "ftp:"')
  })

  it('should reject a query string', () => {
    expect(() => parseForwardTarget('http://localhost:3000/a?b=1')).toThrow('must not contain a query string')
  })

  it('should reject input that is neither a port nor a URL', () => {
    expect(() => parseForwardTarget('not a url')).toThrow('Invalid forwarding target "not a url"')
  })
})

describe('isPath', () => {
  it('should accept slash-prefixed paths', () => {
    expect(isPath('/hooks/stripe')).toBe(true)
    expect(isPath('//double')).toBe(true)
  })

  it('should reject relative paths and spaces', () => {
    expect(isPath('hooks')).toBe(false)
    expect(isPath('/a b')).toBe(false)
  })
})

describe('parseSourceQuery', () => {
  it('should return nothing for an empty query', () => {
    expect(parseSourceQuery(undefined)).toEqual([])
    expect(parseSourceQuery('  ')).toEqual([])
  })

  it('should split on commas before spaces', () => {
    expect(parseSourceQuery('a,b , c')).toEqual(['a', 'b', 'c'])
    expect(parseSourceQuery('a b')).toEqual(['a', 'b'])
  })

  it('should keep the wildcard', () => {
    expect(parseSourceQuery('*')).toEqual(['*'])
  })

  it('should cap the number of sources', () => {
    const names = Array.from({ length: 11 }, (_, i) => `s${i}`).join(',')
    expect(() => parseSourceQuery(names)).toThrow('max 10 sources supported')
  })
})

describe('joinPaths', () => {
  it('should collapse slashes at the seams', () => {
    expect(joinPaths('/api/', '/hooks')).toBe('/api/hooks')
    expect(joinPaths('/', '/')).toBe('/')
    expect(joinPaths('/', 'x')).toBe('/x')
  })

  it('should prefix a leading slash', () => {
    expect(joinPaths('api')).toBe('/api')
  })
})
