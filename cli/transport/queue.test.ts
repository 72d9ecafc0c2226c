import { describe, it, expect, vi } from 'vitest'
import { OverloadedError } from '../errors.js'
import { BoundedQueue } from './queue.js'

describe('BoundedQueue', () => {
  it('should reject a non-positive capacity', () => {
    expect(() => new BoundedQueue<number>(0)).toThrow(RangeError)
  })

  it('should report when a push reaches capacity', () => {
    const queue = new BoundedQueue<string>(2)

    expect(queue.push('a')).toBe(true)
    expect(queue.push('b')).toBe(false)
    // Pushes past capacity are still kept
    expect(queue.push('c')).toBe(false)
    expect(queue.size).toBe(3)
    expect(queue.isFull).toBe(true)
  })

  it('should hand items out in order', async () => {
    const queue = new BoundedQueue<string>(4)
    queue.push('a')
    queue.push('b')

    expect(await queue.take()).toBe('a')
    expect(queue.tryTake()).toBe('b')
    expect(queue.tryTake()).toBeUndefined()
  })

  it('should hand a push straight to a waiting taker', async () => {
    const queue = new BoundedQueue<string>(1)
    const next = queue.take()

    expect(queue.push('a')).toBe(true)
    expect(await next).toBe('a')
    expect(queue.size).toBe(0)
  })

  it('should resolve undefined when the take is aborted', async () => {
    const queue = new BoundedQueue<string>(1)
    const controller = new AbortController()
    const next = queue.take(controller.signal)

    controller.abort()
    expect(await next).toBeUndefined()

    // The aborted taker no longer receives items
    queue.push('a')
    expect(queue.size).toBe(1)
  })

  it('should queue a send once room frees up', async () => {
    const queue = new BoundedQueue<string>(1)
    queue.push('a')
    const sent = queue.send('b', 1000)

    expect(queue.size).toBe(1)
    expect(queue.tryTake()).toBe('a')
    await sent
    expect(queue.tryTake()).toBe('b')
  })

  it('should fail a send that finds no room in time', async () => {
    const queue = new BoundedQueue<string>(1)
    queue.push('a')

    await expect(queue.send('b', 10)).rejects.toBeInstanceOf(OverloadedError)
    expect(queue.size).toBe(1)
  })

  it('should keep sends behind earlier waiting senders', async () => {
    const queue = new BoundedQueue<string>(1)
    queue.push('a')
    const first = queue.send('b', 1000)
    const second = queue.send('c', 1000)

    queue.tryTake()
    await first
    expect(queue.tryTake()).toBe('b')
    await second
    expect(queue.tryTake()).toBe('c')
  })

  it('should notify space listeners after a take', () => {
    const queue = new BoundedQueue<string>(1)
    const listener = vi.fn()
    const unsubscribe = queue.onSpace(listener)

    queue.push('a')
    queue.tryTake()
    expect(listener).toHaveBeenCalledTimes(1)

    unsubscribe()
    queue.push('b')
    queue.tryTake()
    expect(listener).toHaveBeenCalledTimes(1)
  })

  it('should drain queued items and waiting senders together', async () => {
    const queue = new BoundedQueue<string>(1)
    queue.push('a')
    const sent = queue.send('b', 1000)

    expect(queue.drainAll()).toEqual(['a', 'b'])
    await sent
    expect(queue.size).toBe(0)
  })

  it('should release takers and senders on close', async () => {
    const queue = new BoundedQueue<string>(1)
    const next = queue.take()
    queue.close()
    expect(await next).toBeUndefined()

    expect(() => queue.push('a')).toThrow('Queue is closed')
    await expect(queue.send('a', 10)).rejects.toThrow('Queue is closed')
    expect(queue.isClosed).toBe(true)
  })
})
