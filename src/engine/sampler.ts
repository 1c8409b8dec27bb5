import type { CounterSource } from '../system/counters'
import type { InterfaceSample, ThroughputRate } from '../types'

export const invalidRate: ThroughputRate = { downBps: 0, upBps: 0, valid: false }

/**
 * Bytes per second between two samples of the same interface. A counter
 * decrease, a non-positive interval or a gap over `staleAfterMs` is an
 * invalid interval; no wraparound correction is attempted.
 */
export const deriveRate = (
  previous: InterfaceSample | undefined,
  current: InterfaceSample,
  staleAfterMs: number,
): ThroughputRate => {
  if (!previous || previous.interfaceId !== current.interfaceId) {
    return invalidRate
  }
  const elapsedMs = current.at - previous.at
  if (elapsedMs <= 0 || elapsedMs > staleAfterMs) {
    return invalidRate
  }
  const down = current.rxBytes - previous.rxBytes
  const up = current.txBytes - previous.txBytes
  if (down < 0 || up < 0) {
    return invalidRate
  }
  const seconds = elapsedMs / 1000
  return { downBps: down / seconds, upBps: up / seconds, valid: true }
}

export type SamplerOptions = {
  staleAfterMs: number
  timeoutMs: number
  now?: () => number
}

export type Measurement = {
  sample: InterfaceSample
  rate: ThroughputRate
}

export class MetricSampler {
  #previous: InterfaceSample | undefined
  readonly #counters: CounterSource
  readonly #options: SamplerOptions

  constructor(counters: CounterSource, options: SamplerOptions) {
    this.#counters = counters
    this.#options = options
  }

  async sample(interfaceId: string, signal?: AbortSignal): Promise<InterfaceSample> {
    const now = this.#options.now ?? Date.now
    const reading = await this.#counters.read(interfaceId, { timeoutMs: this.#options.timeoutMs, signal })
    return { interfaceId, at: now(), ...reading }
  }

  /** Derives the rate against the previous sample, then keeps `sample` as the new baseline. */
  observe(sample: InterfaceSample): ThroughputRate {
    const rate = deriveRate(this.#previous, sample, this.#options.staleAfterMs)
    this.#previous = sample
    return rate
  }

  async measure(interfaceId: string, signal?: AbortSignal): Promise<Measurement> {
    const sample = await this.sample(interfaceId, signal)
    return { sample, rate: this.observe(sample) }
  }

  reset() {
    this.#previous = undefined
  }
}
