import { THROUGHPUT_HISTORY_SIZE } from '../constants'
import type {
  ActiveSession,
  ConnectionEvent,
  ConnectionSnapshot,
  ConnectionState,
  EventLevel,
  InterfaceSample,
  LeakCheck,
  LeakVerdict,
  NetworkInfo,
  Profile,
  ScanResult,
  ScannerHealth,
  TelemetryHealth,
  ThroughputPoint,
  ThroughputRate,
  TransferTotals,
} from '../types'
import { invalidRate } from './sampler'
import { sessionLabel } from './scanner'

export type MachineSettings = {
  disconnectDebounceScans: number
  scannerFailureThreshold: number
  connectTimeoutMs: number
}

export type MachineState = {
  connection: ConnectionState
  profile?: string
  interfaceId?: string
  attributed: boolean
  connectingSince?: number
  sessionStartedAt?: number
  handshakeAt?: number
  transfer?: TransferTotals
  throughput: ThroughputRate
  throughputHistory: readonly ThroughputPoint[]
  leaks: Readonly<Record<LeakCheck, LeakVerdict>>
  scanner: ScannerHealth
  telemetry: TelemetryHealth
  details: Readonly<Record<string, string>>
  network: NetworkInfo
  networkError?: string
  /** Scans in a row that did not show the current session. */
  missedScans: number
  /** Counts confirmed sessions; leak checks carry the one they ran for. */
  session: number
  /** Connect to issue once the current session is confirmed gone (switch, reconnect). */
  pendingConnect?: Profile
  /** Warnings of the latest scan; only new ones are logged. */
  scanWarnings: readonly string[]
}

export type EngineMessage =
  | { type: 'connect-requested'; profile: Profile }
  | { type: 'disconnect-requested' }
  | { type: 'reconnect-requested'; profile?: Profile }
  | { type: 'command-failed'; action: 'connect' | 'disconnect'; profile: string; error: string }
  | { type: 'scan'; result: ScanResult }
  | { type: 'scan-failed'; error: string }
  | { type: 'sample'; sample: InterfaceSample; rate: ThroughputRate }
  | { type: 'sample-failed'; interfaceId: string; error: string }
  | { type: 'leak'; check: LeakCheck; verdict: LeakVerdict; session: number }
  | { type: 'network'; info: NetworkInfo }
  | { type: 'network-failed'; error: string }
  | { type: 'notice'; level: EventLevel; message: string }

export type Effect =
  | { type: 'connect'; profile: Profile }
  | { type: 'disconnect'; profile: string }
  | { type: 'reset-sampler' }
  | { type: 'check-leaks' }

export type Transition = {
  state: MachineState
  events: ConnectionEvent[]
  effects: Effect[]
}

const unknownLeaks: MachineState['leaks'] = { ipv6: { status: 'unknown' }, dns: { status: 'unknown' } }

const leakName: Record<LeakCheck, string> = { ipv6: 'IPv6', dns: 'DNS' }

// Control first, then the scan that gates whether telemetry is meaningful.
const phase: Record<EngineMessage['type'], number> = {
  'connect-requested': 0,
  'disconnect-requested': 0,
  'reconnect-requested': 0,
  'command-failed': 0,
  notice: 0,
  scan: 1,
  'scan-failed': 1,
  sample: 2,
  'sample-failed': 2,
  leak: 3,
  network: 4,
  'network-failed': 4,
}

export const initialMachineState = (): MachineState => ({
  connection: 'disconnected',
  attributed: false,
  throughput: invalidRate,
  throughputHistory: [],
  leaks: unknownLeaks,
  scanner: { available: true, consecutiveFailures: 0 },
  telemetry: { available: true },
  details: {},
  network: {},
  missedScans: 0,
  session: 0,
  scanWarnings: [],
})

const describeSession = (state: MachineState) =>
  state.profile ?? (state.interfaceId ? `unknown session on ${state.interfaceId}` : 'unknown session')

/** Clears everything that belongs to a session; health and network info survive. */
const idle = (state: MachineState): MachineState => ({
  ...state,
  connection: 'disconnected',
  profile: undefined,
  interfaceId: undefined,
  attributed: false,
  connectingSince: undefined,
  sessionStartedAt: undefined,
  handshakeAt: undefined,
  transfer: undefined,
  throughput: invalidRate,
  throughputHistory: [],
  leaks: unknownLeaks,
  telemetry: { available: true },
  details: {},
  missedScans: 0,
  pendingConnect: undefined,
})

const matches = (state: MachineState, session: ActiveSession) =>
  (state.interfaceId !== undefined && session.interfaceId === state.interfaceId) ||
  (state.profile !== undefined && session.profile === state.profile)

const definedOnly = (info: NetworkInfo): NetworkInfo =>
  Object.fromEntries(Object.entries(info).filter(([, value]) => value !== undefined))

/**
 * Merges one batch of messages into the machine state. Pure: the caller
 * publishes the returned state and runs the returned effects.
 */
export const reduce = (
  state: MachineState,
  messages: readonly EngineMessage[],
  now: number,
  settings: MachineSettings,
): Transition => {
  const events: ConnectionEvent[] = []
  const effects: Effect[] = []
  const log = (level: EventLevel, message: string) => {
    events.push({ at: now, level, message })
  }
  // One edge per tick: a session requested in this batch is confirmed by a later scan.
  const startedAs = state.connection

  const end = (current: MachineState): MachineState => {
    effects.push({ type: 'reset-sampler' })
    return idle(current)
  }

  const startConnect = (current: MachineState, profile: Profile): MachineState => {
    log('info', `Connecting to ${profile.name}`)
    effects.push({ type: 'connect', profile })
    return {
      ...current,
      connection: 'connecting',
      profile: profile.name,
      interfaceId: profile.interfaceName,
      attributed: true,
      connectingSince: now,
      missedScans: 0,
      pendingConnect: undefined,
    }
  }

  /** Stops the current session and queues `profile` for the scan that confirms it gone. */
  const restartAs = (current: MachineState, profile: Profile, message: string): MachineState => {
    if (!current.profile) {
      log('warn', `Cannot leave ${describeSession(current)}: no profile to stop it with`)
      return current
    }
    log('info', message)
    effects.push({ type: 'disconnect', profile: current.profile })
    return { ...current, connection: 'disconnecting', missedScans: 0, pendingConnect: profile }
  }

  const refresh = (current: MachineState, session: ActiveSession): MachineState => {
    if (session.handshakeAt !== undefined && current.handshakeAt === undefined) {
      log('info', `Handshake observed${session.details.endpoint ? ` with ${session.details.endpoint}` : ''}`)
    }
    const handshakeAt =
      session.handshakeAt !== undefined && (current.handshakeAt === undefined || session.handshakeAt > current.handshakeAt)
        ? session.handshakeAt
        : current.handshakeAt
    return {
      ...current,
      interfaceId: session.interfaceId ?? current.interfaceId,
      sessionStartedAt: session.startedAt ?? current.sessionStartedAt,
      handshakeAt,
      transfer:
        session.rxBytes !== undefined && session.txBytes !== undefined
          ? { rxBytes: session.rxBytes, txBytes: session.txBytes }
          : current.transfer,
      details: { ...session.details },
      missedScans: 0,
    }
  }

  const confirm = (current: MachineState, session: ActiveSession): MachineState => {
    const where = session.interfaceId ? ` on ${session.interfaceId}` : ''
    log('info', `Connected to ${sessionLabel(session)}${session.profile ? where : ''}`)
    if (!session.profile) {
      log('warn', `Active ${session.protocol} session${where} matches no known profile`)
    }
    effects.push({ type: 'reset-sampler' }, { type: 'check-leaks' })
    return refresh(
      {
        ...current,
        connection: 'connected',
        profile: session.profile,
        interfaceId: session.interfaceId,
        attributed: session.profile !== undefined,
        connectingSince: undefined,
        session: current.session + 1,
        sessionStartedAt: session.startedAt ?? now,
        handshakeAt: undefined,
        throughput: invalidRate,
        throughputHistory: [],
        leaks: unknownLeaks,
        telemetry: { available: true },
      },
      session,
    )
  }

  const applyScan = (current: MachineState, result: ScanResult): MachineState => {
    if (!current.scanner.available) {
      log('info', `Scanner recovered after ${current.scanner.consecutiveFailures} failed scan(s)`)
    }
    const scanWarnings = result.warnings.map((warning) => warning.message)
    for (const warning of scanWarnings) {
      if (!current.scanWarnings.includes(warning)) {
        log('warn', warning)
      }
    }
    const next: MachineState = { ...current, scanner: { available: true, consecutiveFailures: 0 }, scanWarnings }
    const session = result.active

    switch (next.connection) {
      case 'disconnected': {
        const queued = next.pendingConnect
        if (!session) {
          return queued && startedAs === 'disconnected' ? startConnect(next, queued) : next
        }
        if (queued) {
          log('warn', `Dropped queued connect to ${queued.name}: ${sessionLabel(session)} is active`)
        }
        log('info', `Detected active session ${sessionLabel(session)}`)
        return {
          ...next,
          connection: 'connecting',
          profile: session.profile,
          interfaceId: session.interfaceId,
          attributed: session.profile !== undefined,
          connectingSince: now,
          missedScans: 0,
          pendingConnect: undefined,
        }
      }
      case 'connecting': {
        if (session) {
          return startedAs === 'connecting' ? confirm(next, session) : next
        }
        const since = next.connectingSince ?? now
        if (now - since >= settings.connectTimeoutMs) {
          log('error', `Connection to ${describeSession(next)} timed out after ${Math.round((now - since) / 1000)}s`)
          return end(next)
        }
        return next
      }
      case 'connected':
      case 'disconnecting': {
        if (session && matches(next, session)) {
          return refresh(next, session)
        }
        const missedScans = next.missedScans + 1
        if (missedScans >= settings.disconnectDebounceScans) {
          log('info', `Disconnected from ${describeSession(next)}`)
          const queued = next.connection === 'disconnecting' ? next.pendingConnect : undefined
          return { ...end(next), pendingConnect: queued }
        }
        return { ...next, missedScans }
      }
    }
  }

  const applyScanFailure = (current: MachineState, error: string): MachineState => {
    const consecutiveFailures = current.scanner.consecutiveFailures + 1
    const next: MachineState = {
      ...current,
      scanner: { available: false, consecutiveFailures, lastError: error },
    }
    if (consecutiveFailures === 1) {
      log('warn', `Scanner unavailable, keeping last known state: ${error}`)
    }
    if (consecutiveFailures >= settings.scannerFailureThreshold && next.connection !== 'disconnected') {
      log(
        'error',
        `Forced disconnect from ${describeSession(next)}: scanner failed ${consecutiveFailures} times in a row`,
      )
      return end(next)
    }
    return next
  }

  const applyControl = (
    current: MachineState,
    message: Extract<
      EngineMessage,
      { type: 'connect-requested' | 'disconnect-requested' | 'reconnect-requested' | 'command-failed' }
    >,
  ): MachineState => {
    switch (message.type) {
      case 'connect-requested': {
        const { profile } = message
        if (current.connection === 'disconnected') {
          return startConnect(current, profile)
        }
        if (current.connection === 'connected') {
          if (current.profile === profile.name) {
            log('warn', `Already connected to ${profile.name}`)
            return current
          }
          return restartAs(current, profile, `Switching from ${describeSession(current)} to ${profile.name}`)
        }
        log(
          'warn',
          current.connection === 'connecting'
            ? `Connection to ${describeSession(current)} already in progress`
            : `Disconnect from ${describeSession(current)} in progress`,
        )
        return current
      }
      case 'reconnect-requested': {
        if (current.connection !== 'connected') {
          log('warn', 'No active connection to reconnect')
          return current
        }
        if (current.profile && !message.profile) {
          log('warn', `Cannot reconnect: profile ${current.profile} no longer exists`)
          return current
        }
        if (!message.profile) {
          log('warn', `Cannot reconnect ${describeSession(current)}: no profile to start it with`)
          return current
        }
        return restartAs(current, message.profile, `Reconnecting to ${message.profile.name}`)
      }
      case 'disconnect-requested': {
        if (current.connection === 'disconnecting' && current.pendingConnect) {
          log('info', `Cancelled queued connect to ${current.pendingConnect.name}`)
          return { ...current, pendingConnect: undefined }
        }
        if (current.connection !== 'connected') {
          log(
            'warn',
            current.connection === 'disconnected'
              ? 'No active connection to disconnect'
              : `Cannot disconnect while ${current.connection}`,
          )
          return current
        }
        if (!current.profile) {
          log('warn', `Cannot disconnect ${describeSession(current)}: no profile to stop it with`)
          return current
        }
        log('info', `Disconnecting from ${current.profile}`)
        effects.push({ type: 'disconnect', profile: current.profile })
        return { ...current, connection: 'disconnecting', missedScans: 0 }
      }
      case 'command-failed': {
        const verb = message.action === 'connect' ? 'Connect to' : 'Disconnect from'
        log('error', `${verb} ${message.profile} failed: ${message.error}`)
        if (message.action === 'connect' && current.connection === 'connecting' && current.profile === message.profile) {
          return end(current)
        }
        if (
          message.action === 'disconnect' &&
          current.connection === 'disconnecting' &&
          current.profile === message.profile
        ) {
          if (current.pendingConnect) {
            log('warn', `Dropped queued connect to ${current.pendingConnect.name}`)
          }
          return { ...current, connection: 'connected', missedScans: 0, pendingConnect: undefined }
        }
        return current
      }
    }
  }

  const applyLeak = (current: MachineState, check: LeakCheck, verdict: LeakVerdict, session: number): MachineState => {
    if (current.connection !== 'connected' || session !== current.session) {
      return current
    }
    const previous = current.leaks[check]
    const name = leakName[check]
    const detail = verdict.detail ? `: ${verdict.detail}` : ''
    if (verdict.status === 'leaking' && previous.status !== 'leaking') {
      log('warn', `${name} leak detected${detail}`)
    } else if (verdict.status === 'clear' && previous.status === 'leaking') {
      log('info', `${name} leak cleared`)
    } else if (
      verdict.status === 'unknown' &&
      verdict.detail &&
      (previous.status !== 'unknown' || previous.detail !== verdict.detail)
    ) {
      log('warn', `${name} leak check inconclusive${detail}`)
    }
    return { ...current, leaks: { ...current.leaks, [check]: verdict } }
  }

  const apply = (current: MachineState, message: EngineMessage): MachineState => {
    switch (message.type) {
      case 'connect-requested':
      case 'disconnect-requested':
      case 'reconnect-requested':
      case 'command-failed':
        return applyControl(current, message)
      case 'notice':
        log(message.level, message.message)
        return current
      case 'scan':
        return applyScan(current, message.result)
      case 'scan-failed':
        return applyScanFailure(current, message.error)
      case 'sample': {
        const { sample, rate } = message
        if (current.connection !== 'connected' || sample.interfaceId !== current.interfaceId) {
          return current
        }
        if (!current.telemetry.available) {
          log('info', `Telemetry restored on ${sample.interfaceId}`)
        }
        const throughputHistory = rate.valid
          ? [...current.throughputHistory, { at: sample.at, downBps: rate.downBps, upBps: rate.upBps }].slice(
              -THROUGHPUT_HISTORY_SIZE,
            )
          : current.throughputHistory
        return {
          ...current,
          throughput: rate,
          throughputHistory,
          transfer: { rxBytes: sample.rxBytes, txBytes: sample.txBytes },
          telemetry: { available: true },
        }
      }
      case 'sample-failed': {
        if (current.connection !== 'connected' || message.interfaceId !== current.interfaceId) {
          return current
        }
        if (current.telemetry.available) {
          log('warn', `Telemetry unavailable on ${message.interfaceId}: ${message.error}`)
        }
        return { ...current, throughput: invalidRate, telemetry: { available: false, lastError: message.error } }
      }
      case 'leak':
        return applyLeak(current, message.check, message.verdict, message.session)
      case 'network':
        return {
          ...current,
          network: { ...current.network, ...definedOnly(message.info), updatedAt: now },
          networkError: undefined,
        }
      case 'network-failed':
        if (current.networkError !== message.error) {
          log('warn', `Network info unavailable: ${message.error}`)
        }
        return { ...current, networkError: message.error }
    }
  }

  const ordered = messages
    .map((message, index) => ({ message, index }))
    .sort((left, right) => phase[left.message.type] - phase[right.message.type] || left.index - right.index)
    .map(({ message }) => message)

  let next = ordered.reduce(apply, state)
  if (next.connection !== 'connected') {
    next = { ...next, leaks: unknownLeaks }
  } else if (next.interfaceId === undefined && next.telemetry.available) {
    const lastError = 'no network interface known for this session'
    log('warn', `Telemetry unavailable for ${describeSession(next)}: ${lastError}`)
    next = { ...next, throughput: invalidRate, telemetry: { available: false, lastError } }
  }
  return { state: next, events, effects }
}

const ageOf = (live: boolean, since: number | undefined, now: number) =>
  live && since !== undefined ? Math.max(0, now - since) : undefined

/** Copies machine state into a fresh snapshot value; the publisher freezes it. */
export const toSnapshot = (
  state: MachineState,
  seq: number,
  now: number,
  events: readonly ConnectionEvent[],
): ConnectionSnapshot => {
  const live = state.connection === 'connected'
  return {
    seq,
    at: now,
    state: state.connection,
    profile: state.profile,
    interfaceId: state.interfaceId,
    attributed: state.attributed,
    sessionStartedAt: state.sessionStartedAt,
    sessionAgeMs: ageOf(live, state.sessionStartedAt, now),
    handshakeAt: state.handshakeAt,
    handshakeAgeMs: ageOf(live, state.handshakeAt, now),
    transfer: state.transfer ? { ...state.transfer } : undefined,
    throughput: { ...state.throughput },
    throughputHistory: state.throughputHistory.map((point) => ({ ...point })),
    leaks: { ipv6: { ...state.leaks.ipv6 }, dns: { ...state.leaks.dns } },
    scanner: { ...state.scanner },
    telemetry: { ...state.telemetry },
    details: { ...state.details },
    network: { ...state.network },
    events,
  }
}
