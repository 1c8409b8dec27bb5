import type { ConnectionEvent } from '../types'

export const DEFAULT_EVENT_LOG_CAP = 200

/** Bounded FIFO of events; appending past the cap drops the oldest entries. */
export class EventLog {
  readonly cap: number
  #entries: ConnectionEvent[] = []

  constructor(cap = DEFAULT_EVENT_LOG_CAP) {
    if (!Number.isInteger(cap) || cap < 1) {
      throw new RangeError(`Event log cap must be a positive integer, got ${cap}`)
    }
    this.cap = cap
  }

  append(event: ConnectionEvent) {
    this.#entries.push(Object.freeze({ ...event }))
    if (this.#entries.length > this.cap) {
      this.#entries.splice(0, this.#entries.length - this.cap)
    }
  }

  get size() {
    return this.#entries.length
  }

  /** Oldest first. */
  entries(): readonly ConnectionEvent[] {
    return Object.freeze([...this.#entries])
  }
}
