import { OverloadedError } from '../errors.js'

interface PendingSend<T> {
  item: T
  resolve: () => void
  reject: (err: Error) => void
  timer: NodeJS.Timeout
}

/**
 * FIFO channel with a soft capacity, shared by one producer side and one
 * consumer side. Producers either `push` unconditionally (the caller applies
 * backpressure upstream) or `send` and wait for room.
 */
export class BoundedQueue<T> {
  readonly capacity: number
  private items: T[] = []
  private senders: PendingSend<T>[] = []
  private takers: Array<(item: T | undefined) => void> = []
  private spaceListeners = new Set<() => void>()
  private closed = false

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`)
    }
    this.capacity = capacity
  }

  get size(): number {
    return this.items.length
  }

  get isFull(): boolean {
    return this.items.length >= this.capacity
  }

  get isClosed(): boolean {
    return this.closed
  }

  /**
   * Append without waiting. Returns false once the queue is at or above
   * capacity so the producer can pause its source.
   */
  push(item: T): boolean {
    if (this.closed) {
      throw new Error('Queue is closed')
    }
    const taker = this.takers.shift()
    if (taker) {
      taker(item)
      return true
    }
    this.items.push(item)
    return !this.isFull
  }

  /**
   * Append, waiting up to `timeoutMs` for room. Items that fit are queued
   * synchronously, so call order is preserved.
   */
  send(item: T, timeoutMs: number): Promise<void> {
    if (this.closed) {
      return Promise.reject(new Error('Queue is closed'))
    }
    if (this.senders.length === 0 && !this.isFull) {
      this.push(item)
      return Promise.resolve()
    }

    return new Promise<void>((resolve, reject) => {
      const pending: PendingSend<T> = {
        item,
        resolve,
        reject,
        timer: setTimeout(() => {
          this.senders = this.senders.filter(sender => sender !== pending)
          reject(new OverloadedError())
        }, timeoutMs),
      }
      this.senders.push(pending)
    })
  }

  /** Put an item back at the head, e.g. after a failed write. */
  unshift(item: T): void {
    this.items.unshift(item)
  }

  tryTake(): T | undefined {
    const item = this.items.shift()
    if (item !== undefined) this.afterTake()
    return item
  }

  /**
   * Next item in order. Resolves undefined when the queue is closed and
   * empty, or when `signal` aborts.
   */
  take(signal?: AbortSignal): Promise<T | undefined> {
    const item = this.tryTake()
    if (item !== undefined || this.closed || signal?.aborted) {
      return Promise.resolve(item)
    }

    return new Promise(resolve => {
      const onAbort = () => {
        this.takers = this.takers.filter(taker => taker !== deliver)
        resolve(undefined)
      }
      const deliver = (next: T | undefined) => {
        signal?.removeEventListener('abort', onAbort)
        resolve(next)
      }
      signal?.addEventListener('abort', onAbort, { once: true })
      this.takers.push(deliver)
    })
  }

  /** Remove and return everything queued, including waiting senders' items. */
  drainAll(): T[] {
    const items = this.items
    this.items = []
    for (const sender of this.senders) {
      clearTimeout(sender.timer)
      items.push(sender.item)
      sender.resolve()
    }
    this.senders = []
    this.notifySpace()
    return items
  }

  /** Called whenever an item leaves the queue and there is room again. */
  onSpace(listener: () => void): () => void {
    this.spaceListeners.add(listener)
    return () => {
      this.spaceListeners.delete(listener)
    }
  }

  close(): void {
    this.closed = true
    for (const taker of this.takers) taker(undefined)
    this.takers = []
    for (const sender of this.senders) {
      clearTimeout(sender.timer)
      sender.reject(new Error('Queue is closed'))
    }
    this.senders = []
  }

  private afterTake(): void {
    while (this.senders.length > 0 && !this.isFull) {
      const sender = this.senders.shift()
      if (!sender) break
      clearTimeout(sender.timer)
      this.items.push(sender.item)
      sender.resolve()
    }
    if (!this.isFull) this.notifySpace()
  }

  private notifySpace(): void {
    for (const listener of this.spaceListeners) listener()
  }
}
