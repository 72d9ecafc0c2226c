import { EventEmitter } from 'events'
import type { AttemptStarted, Delivery, Route, TransportStatus } from '../shared/types.js'

/**
 * EventEmitter with listener signatures checked against an event map.
 * `on` returns the matching unsubscribe function.
 */
export class TypedEmitter<Events extends Record<string, unknown[]>> {
  private emitter = new EventEmitter()

  constructor() {
    this.emitter.setMaxListeners(50)
  }

  on<K extends keyof Events & string>(event: K, listener: (...args: Events[K]) => void): () => void {
    this.emitter.on(event, listener)
    return () => {
      this.emitter.off(event, listener)
    }
  }

  once<K extends keyof Events & string>(event: K, listener: (...args: Events[K]) => void): void {
    this.emitter.once(event, listener)
  }

  emit<K extends keyof Events & string>(event: K, ...args: Events[K]): void {
    this.emitter.emit(event, ...args)
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners()
  }
}

export type ListenEvents = {
  'transport:status': [TransportStatus]
  'routes:changed': [Route[]]
  'attempt:start': [AttemptStarted]
  'attempt:finish': [Delivery]
  'attempt:unreported': [string[]]
  'notice': [string]
}

/**
 * Single subscription point for the status views: the transport publishes
 * its state, the pipeline publishes deliveries.
 */
export class ListenEventBus extends TypedEmitter<ListenEvents> {}
