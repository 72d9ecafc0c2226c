import { describe, it, expect } from 'vitest'
import { compress } from './test-utils/compression.js'
import { decompressBody, formatBytes, settlesWithin, sleep, slugify } from './utils.js'

describe('slugify', () => {
  it('should lowercase and dash-separate', () => {
    expect(slugify('My Source!')).toBe('my-source')
  })

  it('should strip accents', () => {
    expect(slugify('Crème Brûlée')).toBe('creme-brulee')
  })

  it('should keep underscores', () => {
    expect(slugify('__a')).toBe('__a')
  })
})

describe('formatBytes', () => {
  it('should pick a unit', () => {
    expect(formatBytes(512)).toBe('512 B')
    expect(formatBytes(2048)).toBe('2.0 KB')
    expect(formatBytes(1572864)).toBe('1.5 MB')
  })
})

describe('decompressBody', () => {
  it.each(['gzip', 'deflate', 'br'] as const)('should inflate %s', encoding => {
    expect(decompressBody(compress('hello world', encoding), encoding)).toBe('hello world')
  })

  it('should pass through when no encoding is given', () => {
    expect(decompressBody(Buffer.from('plain'), undefined)).toBe('plain')
  })

  it('should show the raw body when decompression fails', () => {
    expect(decompressBody(Buffer.from('not gzip'), 'gzip')).toBe('not gzip')
  })
})

describe('sleep', () => {
  it('should reject when aborted', async () => {
    const controller = new AbortController()
    const pending = sleep(10_000, controller.signal)
    controller.abort()
    await expect(pending).rejects.toThrow()
  })
})

describe('settlesWithin', () => {
  it('should report settled promises', async () => {
    expect(await settlesWithin(Promise.resolve(), 50)).toBe(true)
    expect(await settlesWithin(Promise.reject(new Error('boom')), 50)).toBe(true)
  })

  it('should report promises still pending at the deadline', async () => {
    expect(await settlesWithin(new Promise(() => {}), 20)).toBe(false)
  })
})
