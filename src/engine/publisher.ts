import type { ConnectionEvent, ConnectionSnapshot } from '../types'
import { EventLog } from './eventLog'
import { toSnapshot } from './machine'
import type { MachineState } from './machine'

const deepFreeze = <T>(value: T): T => {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value)
    for (const child of Object.values(value)) {
      deepFreeze(child)
    }
  }
  return value
}

type EventSubscriber = {
  push(event: ConnectionEvent): void
  close(): void
}

/**
 * Owns the latest snapshot and the event log. `publish` builds the next
 * snapshot completely, freezes it, then swaps the reference, so readers only
 * ever see a whole snapshot.
 */
export class SnapshotPublisher {
  readonly #log: EventLog
  #current: ConnectionSnapshot
  #closed = false
  readonly #listeners = new Set<() => void>()
  readonly #subscribers = new Set<EventSubscriber>()

  constructor(initial: MachineState, options: { eventLogCap?: number; now?: number } = {}) {
    this.#log = new EventLog(options.eventLogCap)
    this.#current = deepFreeze(toSnapshot(initial, 0, options.now ?? Date.now(), this.#log.entries()))
  }

  latest(): ConnectionSnapshot {
    return this.#current
  }

  publish(state: MachineState, events: readonly ConnectionEvent[], now: number): ConnectionSnapshot {
    for (const event of events) {
      this.#log.append(event)
    }
    const next = deepFreeze(toSnapshot(state, this.#current.seq + 1, now, this.#log.entries()))
    this.#current = next
    for (const event of events) {
      for (const subscriber of this.#subscribers) {
        subscriber.push(event)
      }
    }
    for (const listener of [...this.#listeners]) {
      listener()
    }
    return next
  }

  /** Called after every publish; the signature fits React's useSyncExternalStore. */
  subscribe(listener: () => void): () => void {
    this.#listeners.add(listener)
    return () => {
      this.#listeners.delete(listener)
    }
  }

  /** Yields events appended after this call, until `close` or `return()`. */
  subscribeEvents(): AsyncIterableIterator<ConnectionEvent> {
    const queue: ConnectionEvent[] = []
    let done = this.#closed
    // one resolver per pending next(), woken in call order
    const waiting: Array<() => void> = []
    const subscribers = this.#subscribers
    const subscriber: EventSubscriber = {
      push(event) {
        queue.push(event)
        waiting.shift()?.()
      },
      close() {
        done = true
        subscribers.delete(subscriber)
        for (const resolve of waiting.splice(0)) {
          resolve()
        }
      },
    }
    if (!done) {
      subscribers.add(subscriber)
    }

    const iterator: AsyncIterableIterator<ConnectionEvent> = {
      [Symbol.asyncIterator]() {
        return iterator
      },
      async next() {
        while (queue.length === 0 && !done) {
          await new Promise<void>((resolve) => {
            waiting.push(resolve)
          })
        }
        const event = queue.shift()
        return event ? { value: event, done: false } : { value: undefined, done: true }
      },
      async return() {
        subscriber.close()
        queue.length = 0
        return { value: undefined, done: true }
      },
    }
    return iterator
  }

  close() {
    this.#closed = true
    this.#listeners.clear()
    for (const subscriber of [...this.#subscribers]) {
      subscriber.close()
    }
  }
}
