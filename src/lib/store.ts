/**
 * Minimal external store: views read immutable snapshots and subscribe for
 * change notifications.
 */
export abstract class SnapshotStore<T> {
  private listeners = new Set<() => void>()

  subscribe = (listener: () => void): (() => void) => {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  abstract snapshot(): T

  protected notify(): void {
    for (const listener of this.listeners) listener()
  }
}
