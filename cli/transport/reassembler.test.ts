import { describe, it, expect } from 'vitest'
import type { InboundAttempt } from '../../shared/types.js'
import { FragmentReassembler } from './reassembler.js'

function part(body: string, attemptId = 'att_1'): InboundAttempt {
  return {
    attemptId,
    connectionId: 'web_1',
    method: 'POST',
    path: '/hooks',
    query: '',
    headers: [['content-type', 'text/plain']],
    body: Buffer.from(body),
  }
}

describe('FragmentReassembler', () => {
  it('should pass unfragmented attempts through', () => {
    const reassembler = new FragmentReassembler()
    const attempt = part('whole')

    expect(reassembler.accept(attempt)).toBe(attempt)
    expect(reassembler.accept(attempt, { index: 0, total: 1 })).toBe(attempt)
    expect(reassembler.pendingCount).toBe(0)
  })

  it('should join fragments in index order regardless of arrival order', () => {
    const reassembler = new FragmentReassembler()

    expect(reassembler.accept(part('world'), { index: 1, total: 2 })).toBeUndefined()
    expect(reassembler.pendingCount).toBe(1)

    const joined = reassembler.accept(part('hello '), { index: 0, total: 2 })
    expect(joined?.body.toString()).toBe('hello world')
    expect(joined?.path).toBe('/hooks')
    expect(reassembler.pendingCount).toBe(0)
  })

  it('should count a repeated fragment once', () => {
    const reassembler = new FragmentReassembler()

    reassembler.accept(part('a'), { index: 0, total: 3 })
    reassembler.accept(part('a'), { index: 0, total: 3 })
    reassembler.accept(part('b'), { index: 1, total: 3 })
    expect(reassembler.pendingCount).toBe(1)

    expect(reassembler.accept(part('c'), { index: 2, total: 3 })?.body.toString()).toBe('abc')
  })

  it('should reject an index outside the total', () => {
    const reassembler = new FragmentReassembler()
    expect(() => reassembler.accept(part('x'), { index: 2, total: 2 })).toThrow(RangeError)
  })

  it('should drop partial attempts past their max age', () => {
    const reassembler = new FragmentReassembler(1000)
    reassembler.accept(part('a', 'att_old'), { index: 0, total: 2 }, 0)
    reassembler.accept(part('a', 'att_new'), { index: 0, total: 2 }, 900)

    expect(reassembler.prune(1000)).toEqual(['att_old'])
    expect(reassembler.pendingCount).toBe(1)
  })
})
