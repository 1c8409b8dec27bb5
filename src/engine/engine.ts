import type { MonitorConfig } from '../config'
import { describeError } from '../errors'
import type { ProfileStore } from '../profiles/store'
import type { TunnelControl } from '../system/control'
import type { CounterSource } from '../system/counters'
import type { NetworkInfoProbe } from '../system/networkInfo'
import type { ConnectionEvent, ConnectionSnapshot, LeakCheck, LeakVerdict, Profile, ScanResult } from '../types'
import type { LeakDetector } from './leaks'
import { initialMachineState, reduce } from './machine'
import type { Effect, EngineMessage, MachineState } from './machine'
import { PeriodicTask } from './periodicTask'
import { SnapshotPublisher } from './publisher'
import type { MetricSampler } from './sampler'

export type EngineSettings = Pick<
  MonitorConfig,
  | 'scanIntervalMs'
  | 'sampleIntervalMs'
  | 'leakIntervalMs'
  | 'networkIntervalMs'
  | 'networkTimeoutMs'
  | 'connectTimeoutMs'
  | 'disconnectDebounceScans'
  | 'scannerFailureThreshold'
  | 'eventLogCap'
>

export type MonitorEngineOptions = {
  settings: EngineSettings
  store: ProfileStore
  scanner: { scan(preferredProfile?: string, signal?: AbortSignal): Promise<ScanResult> }
  sampler: MetricSampler
  leaks: LeakDetector
  control: TunnelControl
  /** Checked by `preflight`. */
  counters?: CounterSource
  network?: NetworkInfoProbe
  now?: () => number
}

/**
 * Connection monitoring engine. Timer tasks post messages to an inbox; one
 * drain per microtask turn reduces the whole batch and publishes a single
 * snapshot, so the state machine is the only writer.
 */
export class MonitorEngine {
  readonly #options: MonitorEngineOptions
  readonly #publisher: SnapshotPublisher
  readonly #tasks: PeriodicTask[]
  readonly #leakTask: PeriodicTask
  readonly #commands = new Set<Promise<void>>()
  #state: MachineState = initialMachineState()
  #inbox: EngineMessage[] = []
  #drain: Promise<void> | undefined
  #started = false
  #stopping = false
  #closed = false

  constructor(options: MonitorEngineOptions) {
    this.#options = options
    const { settings } = options
    this.#publisher = new SnapshotPublisher(this.#state, { eventLogCap: settings.eventLogCap, now: this.#now() })
    this.#leakTask = this.#task('leak check', settings.leakIntervalMs, (signal) => this.runLeakChecks(signal))
    this.#tasks = [
      this.#task('scan', settings.scanIntervalMs, (signal) => this.runScan(signal)),
      this.#task('sample', settings.sampleIntervalMs, (signal) => this.runSample(signal)),
      this.#leakTask,
    ]
    if (options.network) {
      this.#tasks.push(this.#task('network info', settings.networkIntervalMs, (signal) => this.runNetworkCheck(signal)))
    }
  }

  #now() {
    return (this.#options.now ?? Date.now)()
  }

  #task(name: string, intervalMs: number, run: (signal: AbortSignal) => Promise<void>) {
    return new PeriodicTask(name, intervalMs, run, (error) => {
      void this.#post({ type: 'notice', level: 'error', message: `${name} task failed: ${describeError(error, 'unknown error')}` })
    })
  }

  latestSnapshot = (): ConnectionSnapshot => this.#publisher.latest()

  subscribe = (listener: () => void): (() => void) => this.#publisher.subscribe(listener)

  subscribeEvents(): AsyncIterableIterator<ConnectionEvent> {
    return this.#publisher.subscribeEvents()
  }

  /** Startup checks; a failure here is fatal and must reach the operator before `start`. */
  async preflight() {
    await this.#options.counters?.check()
    await this.#options.store.listProfiles()
  }

  start() {
    if (this.#started || this.#stopping) {
      return
    }
    this.#started = true
    void this.#post({ type: 'notice', level: 'info', message: 'Monitoring started' })
    for (const task of this.#tasks) {
      task.start()
    }
  }

  /** Stops every task, lets issued commands finish, then closes subscriptions. */
  async stop() {
    if (this.#stopping) {
      return
    }
    this.#stopping = true
    await Promise.all(this.#tasks.map((task) => task.stop()))
    await this.#settle()
    this.#closed = true
    this.#publisher.close()
  }

  async connect(profileName: string) {
    let profile: Profile | undefined
    try {
      profile = (await this.#options.store.listProfiles()).find((candidate) => candidate.name === profileName)
    } catch (error) {
      await this.#post({ type: 'notice', level: 'error', message: `Cannot load profiles: ${describeError(error, 'unknown error')}` })
      return
    }
    if (!profile) {
      await this.#post({ type: 'notice', level: 'warn', message: `Unknown profile: ${profileName}` })
      return
    }
    await this.#post({ type: 'connect-requested', profile })
    await this.#settle()
  }

  async disconnect() {
    await this.#post({ type: 'disconnect-requested' })
    await this.#settle()
  }

  /** Disconnects the current profile and connects it again once the scanner sees it gone. */
  async reconnect() {
    const profileName = this.#state.profile
    let profile: Profile | undefined
    if (profileName) {
      try {
        profile = (await this.#options.store.listProfiles()).find((candidate) => candidate.name === profileName)
      } catch (error) {
        await this.#post({ type: 'notice', level: 'error', message: `Cannot load profiles: ${describeError(error, 'unknown error')}` })
        return
      }
    }
    await this.#post({ type: 'reconnect-requested', profile })
    await this.#settle()
  }

  listProfiles(): Promise<Profile[]> {
    return this.#options.store.listProfiles()
  }

  /** Runs both leak checks now instead of waiting for the next interval. */
  async checkLeaks() {
    if (!this.#started || this.#stopping) {
      return
    }
    if (this.#state.connection !== 'connected') {
      await this.#post({ type: 'notice', level: 'warn', message: 'Leak checks need an active connection' })
      return
    }
    await this.#leakTask.trigger()
  }

  async runScan(signal?: AbortSignal) {
    try {
      const result = await this.#options.scanner.scan(this.#state.profile, signal)
      if (!signal?.aborted) {
        await this.#post({ type: 'scan', result })
      }
    } catch (error) {
      if (!signal?.aborted) {
        await this.#post({ type: 'scan-failed', error: describeError(error, 'scan failed') })
      }
    }
  }

  async runSample(signal?: AbortSignal) {
    const { connection, interfaceId } = this.#state
    if (connection !== 'connected' || !interfaceId) {
      return
    }
    try {
      const { sample, rate } = await this.#options.sampler.measure(interfaceId, signal)
      if (!signal?.aborted) {
        await this.#post({ type: 'sample', sample, rate })
      }
    } catch (error) {
      if (!signal?.aborted) {
        await this.#post({ type: 'sample-failed', interfaceId, error: describeError(error, 'counter read failed') })
      }
    }
  }

  /** Both checks run independently; each verdict is posted as soon as it is known. */
  async runLeakChecks(signal?: AbortSignal) {
    if (this.#state.connection !== 'connected') {
      return
    }
    const { leaks } = this.#options
    const { profile: profileName, session } = this.#state
    const report = async (check: LeakCheck, verdict: LeakVerdict) => {
      if (!signal?.aborted) {
        await this.#post({ type: 'leak', check, verdict, session })
      }
    }
    const dns = async () => {
      let profile: Profile | undefined
      try {
        profile = (await this.#options.store.listProfiles()).find((candidate) => candidate.name === profileName)
      } catch (error) {
        await report('dns', { status: 'unknown', checkedAt: this.#now(), detail: describeError(error, 'profiles unreadable') })
        return
      }
      await report('dns', await leaks.checkDNS(profile, signal))
    }
    await Promise.all([leaks.checkIPv6(signal).then((verdict) => report('ipv6', verdict)), dns()])
  }

  async runNetworkCheck(signal?: AbortSignal) {
    const { network, settings } = this.#options
    if (!network) {
      return
    }
    const options = { timeoutMs: settings.networkTimeoutMs, signal }
    const failed = async (error: unknown) => {
      if (!signal?.aborted) {
        await this.#post({ type: 'network-failed', error: describeError(error, 'lookup failed') })
      }
    }
    await Promise.all([
      network.lookupPublicIp(options).then((info) => this.#post({ type: 'network', info }), failed),
      network.measureLatency(options).then((latencyMs) => this.#post({ type: 'network', info: { latencyMs } }), failed),
    ])
  }

  #post(...messages: EngineMessage[]): Promise<void> {
    if (this.#closed) {
      return Promise.resolve()
    }
    this.#inbox.push(...messages)
    this.#drain ??= Promise.resolve().then(() => {
      this.#drain = undefined
      this.#flush()
    })
    return this.#drain
  }

  #flush() {
    const batch = this.#inbox
    this.#inbox = []
    if (batch.length === 0) {
      return
    }
    const now = this.#now()
    const { state, events, effects } = reduce(this.#state, batch, now, this.#options.settings)
    this.#state = state
    this.#publisher.publish(state, events, now)
    for (const effect of effects) {
      this.#apply(effect)
    }
  }

  #apply(effect: Effect) {
    switch (effect.type) {
      case 'reset-sampler':
        this.#options.sampler.reset()
        return
      case 'check-leaks':
        if (this.#started && !this.#stopping) {
          void this.#leakTask.trigger()
        }
        return
      case 'connect':
        this.#track(this.#command('connect', async () => effect.profile))
        return
      case 'disconnect':
        this.#track(
          this.#command('disconnect', async () => {
            const profiles = await this.#options.store.listProfiles()
            const profile = profiles.find((candidate) => candidate.name === effect.profile)
            if (!profile) {
              throw new Error(`profile ${effect.profile} no longer exists`)
            }
            return profile
          }),
        )
        return
    }
  }

  async #command(action: 'connect' | 'disconnect', resolveProfile: () => Promise<Profile>) {
    let name = ''
    try {
      const profile = await resolveProfile()
      name = profile.name
      await this.#options.control[action](profile)
    } catch (error) {
      await this.#post({
        type: 'command-failed',
        action,
        profile: name || (this.#state.profile ?? 'unknown profile'),
        error: describeError(error, `${action} failed`),
      })
    }
  }

  #track(command: Promise<void>) {
    this.#commands.add(command)
    void command.finally(() => {
      this.#commands.delete(command)
    })
  }

  /** Resolves once no command is in flight and the inbox is drained. */
  async #settle() {
    while (this.#commands.size > 0 || this.#drain) {
      await Promise.allSettled([...this.#commands])
      await this.#drain
    }
  }
}
