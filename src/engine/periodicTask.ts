export type TaskRunner = (signal: AbortSignal) => Promise<void>

/**
 * Runs `run` every `intervalMs`. A run still in flight when the next tick
 * fires makes that tick a no-op, so a slow probe only delays its own cadence.
 */
export class PeriodicTask {
  readonly name: string
  readonly intervalMs: number
  readonly #run: TaskRunner
  readonly #onError: (error: unknown) => void
  readonly #controller = new AbortController()
  #timer: ReturnType<typeof setInterval> | undefined
  #inFlight: Promise<void> | undefined

  constructor(name: string, intervalMs: number, run: TaskRunner, onError: (error: unknown) => void) {
    this.name = name
    this.intervalMs = intervalMs
    this.#run = run
    this.#onError = onError
  }

  get running() {
    return this.#timer !== undefined
  }

  start({ immediate = true }: { immediate?: boolean } = {}) {
    if (this.#timer !== undefined || this.#controller.signal.aborted) {
      return
    }
    this.#timer = setInterval(() => void this.trigger(), this.intervalMs)
    if (immediate) {
      void this.trigger()
    }
  }

  /** Runs now unless a run is in flight; resolves when that run settles. */
  trigger(): Promise<void> {
    if (this.#controller.signal.aborted) {
      return Promise.resolve()
    }
    if (!this.#inFlight) {
      this.#inFlight = this.#run(this.#controller.signal)
        .catch((error: unknown) => {
          if (!this.#controller.signal.aborted) {
            this.#onError(error)
          }
        })
        .finally(() => {
          this.#inFlight = undefined
        })
    }
    return this.#inFlight
  }

  /** Stops the schedule, aborts the in-flight run and waits for it to settle. */
  async stop() {
    if (this.#timer !== undefined) {
      clearInterval(this.#timer)
      this.#timer = undefined
    }
    this.#controller.abort()
    await this.#inFlight
  }
}
