import { describe, expect, it } from 'vitest'
import { ProbeError } from '../errors'
import type { ActiveSession, ConnectionEvent, Profile, ThroughputRate } from '../types'
import { initialMachineState, reduce, toSnapshot } from './machine'
import type { EngineMessage, MachineState } from './machine'

const settings = { disconnectDebounceScans: 2, scannerFailureThreshold: 5, connectTimeoutMs: 30000 }

const profile: Profile = {
  name: 'nl-amsterdam',
  protocol: 'wireguard',
  configPath: '/profiles/nl-amsterdam.conf',
  endpoint: '203.0.113.10:51820',
  interfaceName: 'wg0',
}

const berlin: Profile = {
  name: 'de-berlin',
  protocol: 'openvpn',
  configPath: '/profiles/de-berlin.ovpn',
  interfaceName: 'tun1',
}

const session = (overrides: Partial<ActiveSession> = {}): ActiveSession => ({
  protocol: 'wireguard',
  interfaceId: 'wg0',
  profile: 'nl-amsterdam',
  details: { interface: 'wg0' },
  ...overrides,
})

const scan = (active?: ActiveSession): EngineMessage => ({
  type: 'scan',
  result: { sessions: active ? [active] : [], active, warnings: [], protocolDetails: {} },
})

const messages = (state: MachineState, steps: Array<[number, EngineMessage[]]>) => {
  let current = state
  const log: string[] = []
  for (const [now, batch] of steps) {
    const transition = reduce(current, batch, now, settings)
    current = transition.state
    log.push(...transition.events.map((event) => event.message))
  }
  return { state: current, log }
}

const sampled = (at: number, interfaceId: string, bytes: number, rate: ThroughputRate): EngineMessage => ({
  type: 'sample',
  sample: { interfaceId, at, rxBytes: bytes, txBytes: bytes / 4 },
  rate,
})

const connected = (active = session()) =>
  messages(initialMachineState(), [
    [0, [scan(active)]],
    [1000, [scan(active)]],
  ]).state

describe('reduce', () => {
  it('confirms an externally started session on the following scan', () => {
    const first = reduce(initialMachineState(), [scan(session())], 0, settings)
    expect(first.state.connection).toBe('connecting')
    expect(first.events.map((event) => event.message)).toEqual(['Detected active session nl-amsterdam'])

    const second = reduce(first.state, [scan(session())], 1000, settings)
    expect(second.state.connection).toBe('connected')
    expect(second.state.sessionStartedAt).toBe(1000)
    expect(second.events.map((event) => event.message)).toEqual(['Connected to nl-amsterdam on wg0'])
    expect(second.effects).toEqual([{ type: 'reset-sampler' }, { type: 'check-leaks' }])
  })

  it('takes one edge per batch when a connect request and a matching scan arrive together', () => {
    const { state, events, effects } = reduce(
      initialMachineState(),
      [scan(session()), { type: 'connect-requested', profile }],
      0,
      settings,
    )

    expect(state.connection).toBe('connecting')
    expect(state.profile).toBe('nl-amsterdam')
    expect(events.map((event) => event.message)).toEqual(['Connecting to nl-amsterdam'])
    expect(effects).toEqual([{ type: 'connect', profile }])
  })

  it('keeps the system start time of a session', () => {
    const state = connected(session({ startedAt: 500 }))
    expect(state.sessionStartedAt).toBe(500)
  })

  it('debounces a single missing scan', () => {
    const { state, log } = messages(connected(), [[2000, [scan()]]])

    expect(state.connection).toBe('connected')
    expect(state.missedScans).toBe(1)
    expect(log).toEqual([])
  })

  it('disconnects after two consecutive scans without the session', () => {
    const { state, log } = messages(connected(), [
      [2000, [scan()]],
      [3000, [scan()]],
    ])

    expect(state.connection).toBe('disconnected')
    expect(state.profile).toBeUndefined()
    expect(log).toEqual(['Disconnected from nl-amsterdam'])
  })

  it('resets the debounce when the session reappears', () => {
    const { state } = messages(connected(), [
      [2000, [scan()]],
      [3000, [scan(session())]],
      [4000, [scan()]],
    ])

    expect(state.connection).toBe('connected')
    expect(state.missedScans).toBe(1)
  })

  it('keeps the connection through four scanner failures', () => {
    const failed: EngineMessage = { type: 'scan-failed', error: 'wg is not installed' }
    const { state, log } = messages(connected(), [
      [2000, [failed]],
      [3000, [failed]],
      [4000, [failed]],
      [5000, [failed]],
    ])

    expect(state.connection).toBe('connected')
    expect(state.scanner).toEqual({ available: false, consecutiveFailures: 4, lastError: 'wg is not installed' })
    expect(log).toEqual(['Scanner unavailable, keeping last known state: wg is not installed'])
  })

  it('forces a disconnect after repeated scanner failures', () => {
    let state = connected()
    const events: ConnectionEvent[] = []
    for (let step = 1; step <= 6; step += 1) {
      const transition = reduce(state, [{ type: 'scan-failed', error: 'wg is not installed' }], 1000 + step * 1000, settings)
      state = transition.state
      events.push(...transition.events)
    }

    expect(state.connection).toBe('disconnected')
    expect(state.scanner.consecutiveFailures).toBe(6)
    expect(events.filter((event) => event.level === 'error').map((event) => event.message)).toEqual([
      'Forced disconnect from nl-amsterdam: scanner failed 5 times in a row',
    ])
  })

  it('logs recovery once the scanner answers again', () => {
    const { state, log } = messages(connected(), [
      [2000, [{ type: 'scan-failed', error: 'timeout' }]],
      [3000, [scan(session())]],
    ])

    expect(state.scanner).toEqual({ available: true, consecutiveFailures: 0 })
    expect(log).toEqual([
      'Scanner unavailable, keeping last known state: timeout',
      'Scanner recovered after 1 failed scan(s)',
    ])
  })

  it('times out a connect that never shows up', () => {
    const { state, log } = messages(initialMachineState(), [
      [1000, [{ type: 'connect-requested', profile }]],
      [2000, [scan()]],
      [31000, [scan()]],
    ])

    expect(state.connection).toBe('disconnected')
    expect(log).toEqual(['Connecting to nl-amsterdam', 'Connection to nl-amsterdam timed out after 30s'])
  })

  it('returns to disconnected when the connect command fails', () => {
    const { state, log } = messages(initialMachineState(), [
      [0, [{ type: 'connect-requested', profile }]],
      [100, [{ type: 'command-failed', action: 'connect', profile: 'nl-amsterdam', error: 'wg-quick is not installed' }]],
    ])

    expect(state.connection).toBe('disconnected')
    expect(log).toEqual(['Connecting to nl-amsterdam', 'Connect to nl-amsterdam failed: wg-quick is not installed'])
  })

  it('issues a disconnect and reverts when it fails', () => {
    const requested = reduce(connected(), [{ type: 'disconnect-requested' }], 2000, settings)
    expect(requested.state.connection).toBe('disconnecting')
    expect(requested.effects).toEqual([{ type: 'disconnect', profile: 'nl-amsterdam' }])

    const failed = reduce(
      requested.state,
      [{ type: 'command-failed', action: 'disconnect', profile: 'nl-amsterdam', error: 'permission denied' }],
      2100,
      settings,
    )
    expect(failed.state.connection).toBe('connected')
  })

  it('ignores a connect to the profile already connected', () => {
    const { state, events, effects } = reduce(connected(), [{ type: 'connect-requested', profile }], 2000, settings)

    expect(state.connection).toBe('connected')
    expect(effects).toEqual([])
    expect(events).toEqual([{ at: 2000, level: 'warn', message: 'Already connected to nl-amsterdam' }])
  })

  it('switches profiles by disconnecting first and connecting once the old session is gone', () => {
    const requested = reduce(connected(), [{ type: 'connect-requested', profile: berlin }], 2000, settings)
    expect(requested.state.connection).toBe('disconnecting')
    expect(requested.state.pendingConnect).toBe(berlin)
    expect(requested.effects).toEqual([{ type: 'disconnect', profile: 'nl-amsterdam' }])

    const gone = messages(requested.state, [
      [3000, [scan()]],
      [4000, [scan()]],
    ])
    expect(gone.state.connection).toBe('disconnected')
    expect(gone.state.pendingConnect).toBe(berlin)

    const started = reduce(gone.state, [scan()], 5000, settings)
    expect(started.state.connection).toBe('connecting')
    expect(started.state.profile).toBe('de-berlin')
    expect(started.state.interfaceId).toBe('tun1')
    expect(started.effects).toEqual([{ type: 'connect', profile: berlin }])
    expect([
      ...requested.events.map((event) => event.message),
      ...gone.log,
      ...started.events.map((event) => event.message),
    ]).toEqual(['Switching from nl-amsterdam to de-berlin', 'Disconnected from nl-amsterdam', 'Connecting to de-berlin'])
  })

  it('reconnects the current profile', () => {
    const requested = reduce(connected(), [{ type: 'reconnect-requested', profile }], 2000, settings)
    expect(requested.state.connection).toBe('disconnecting')
    expect(requested.effects).toEqual([{ type: 'disconnect', profile: 'nl-amsterdam' }])

    const { state, log } = messages(requested.state, [
      [3000, [scan()]],
      [4000, [scan()]],
      [5000, [scan()]],
    ])
    expect(state.connection).toBe('connecting')
    expect(state.profile).toBe('nl-amsterdam')
    expect([...requested.events.map((event) => event.message), ...log]).toEqual([
      'Reconnecting to nl-amsterdam',
      'Disconnected from nl-amsterdam',
      'Connecting to nl-amsterdam',
    ])
  })

  it('refuses to reconnect without a connection or a profile', () => {
    const idleState = reduce(initialMachineState(), [{ type: 'reconnect-requested', profile }], 0, settings)
    expect(idleState.effects).toEqual([])
    expect(idleState.events.map((event) => event.message)).toEqual(['No active connection to reconnect'])

    const removed = reduce(connected(), [{ type: 'reconnect-requested' }], 2000, settings)
    expect(removed.state.connection).toBe('connected')
    expect(removed.effects).toEqual([])
    expect(removed.events.map((event) => event.message)).toEqual([
      'Cannot reconnect: profile nl-amsterdam no longer exists',
    ])
  })

  it('cancels a queued connect on disconnect', () => {
    const switching = reduce(connected(), [{ type: 'connect-requested', profile: berlin }], 2000, settings).state
    const { state, log } = messages(switching, [
      [2500, [{ type: 'disconnect-requested' }]],
      [3000, [scan()]],
      [4000, [scan()]],
      [5000, [scan()]],
    ])

    expect(state.connection).toBe('disconnected')
    expect(state.pendingConnect).toBeUndefined()
    expect(log).toEqual(['Cancelled queued connect to de-berlin', 'Disconnected from nl-amsterdam'])
  })

  it('drops a queued connect when the disconnect fails', () => {
    const switching = reduce(connected(), [{ type: 'connect-requested', profile: berlin }], 2000, settings).state
    const { state, log } = messages(switching, [
      [2100, [{ type: 'command-failed', action: 'disconnect', profile: 'nl-amsterdam', error: 'permission denied' }]],
    ])

    expect(state.connection).toBe('connected')
    expect(state.pendingConnect).toBeUndefined()
    expect(log).toEqual(['Disconnect from nl-amsterdam failed: permission denied', 'Dropped queued connect to de-berlin'])
  })

  it('reports an unattributed session and will not disconnect it', () => {
    const stranger = session({ profile: undefined, interfaceId: 'wg9' })
    const detected = messages(initialMachineState(), [
      [0, [scan(stranger)]],
      [1000, [scan(stranger)]],
    ])
    expect(detected.state.attributed).toBe(false)
    expect(detected.log).toEqual([
      'Detected active session unknown session on wg9',
      'Connected to unknown session on wg9',
      'Active wireguard session on wg9 matches no known profile',
    ])

    const { state, effects } = reduce(detected.state, [{ type: 'disconnect-requested' }], 2000, settings)
    expect(state.connection).toBe('connected')
    expect(effects).toEqual([])
  })

  it('logs only the first handshake of a session', () => {
    const withHandshake = (handshakeAt: number) =>
      session({ handshakeAt, details: { interface: 'wg0', endpoint: '203.0.113.10:51820' } })
    const { state, log } = messages(initialMachineState(), [
      [0, [scan(withHandshake(500))]],
      [1000, [scan(withHandshake(500))]],
      [2000, [scan(withHandshake(1900))]],
    ])

    expect(state.handshakeAt).toBe(1900)
    expect(log.filter((message) => message.startsWith('Handshake'))).toEqual([
      'Handshake observed with 203.0.113.10:51820',
    ])
  })

  it('marks telemetry unavailable when a session has no interface', () => {
    const daemon = session({ protocol: 'openvpn', profile: 'de-berlin', interfaceId: undefined, details: { pid: '518' } })
    const { state, log } = messages(initialMachineState(), [
      [0, [scan(daemon)]],
      [1000, [scan(daemon)]],
      [2000, [scan(daemon)]],
    ])

    expect(state.connection).toBe('connected')
    expect(state.telemetry).toEqual({ available: false, lastError: 'no network interface known for this session' })
    expect(log).toEqual([
      'Detected active session de-berlin',
      'Connected to de-berlin',
      'Telemetry unavailable for de-berlin: no network interface known for this session',
    ])
  })

  it('logs a scan warning once while it persists', () => {
    const warned: EngineMessage = {
      type: 'scan',
      result: {
        sessions: [],
        warnings: [new ProbeError('profile-unreadable', 'Skipped profile backup.conf: is a directory')],
        protocolDetails: {},
      },
    }
    const { state, log } = messages(initialMachineState(), [
      [0, [warned]],
      [1000, [warned]],
      [2000, [scan()]],
      [3000, [warned]],
    ])

    expect(state.scanWarnings).toEqual(['Skipped profile backup.conf: is a directory'])
    expect(log).toEqual(['Skipped profile backup.conf: is a directory', 'Skipped profile backup.conf: is a directory'])
  })

  it('records throughput history from valid samples only', () => {
    const { state } = messages(connected(), [
      [2000, [sampled(2000, 'wg0', 0, { downBps: 0, upBps: 0, valid: false })]],
      [3000, [sampled(3000, 'wg0', 2000, { downBps: 2000, upBps: 500, valid: true })]],
      [4000, [sampled(4000, 'eth0', 9000, { downBps: 9, upBps: 9, valid: true })]],
    ])

    expect(state.throughput).toEqual({ downBps: 2000, upBps: 500, valid: true })
    expect(state.throughputHistory).toEqual([{ at: 3000, downBps: 2000, upBps: 500 }])
    expect(state.transfer).toEqual({ rxBytes: 2000, txBytes: 500 })
  })

  it('marks telemetry unavailable and restored', () => {
    const { state, log } = messages(connected(), [
      [2000, [{ type: 'sample-failed', interfaceId: 'wg0', error: 'Interface wg0 has no counters' }]],
      [3000, [{ type: 'sample-failed', interfaceId: 'wg0', error: 'Interface wg0 has no counters' }]],
    ])
    expect(state.telemetry).toEqual({ available: false, lastError: 'Interface wg0 has no counters' })
    expect(state.throughput.valid).toBe(false)
    expect(log).toEqual(['Telemetry unavailable on wg0: Interface wg0 has no counters'])

    const restored = reduce(
      state,
      [sampled(4000, 'wg0', 4000, { downBps: 0, upBps: 0, valid: false })],
      4000,
      settings,
    )
    expect(restored.state.telemetry).toEqual({ available: true })
    expect(restored.events.map((event) => event.message)).toEqual(['Telemetry restored on wg0'])
  })

  it('keeps IPv6 and DNS verdicts independent', () => {
    const { state, log } = messages(connected(), [
      [
        2000,
        [
          {
            type: 'leak',
            session: 1,
            check: 'ipv6',
            verdict: { status: 'leaking', checkedAt: 2000, detail: 'reached api6.example:443 over IPv6' },
          },
          {
            type: 'leak',
            session: 1,
            check: 'dns',
            verdict: { status: 'clear', checkedAt: 2000, detail: 'nameserver 10.64.0.1' },
          },
        ],
      ],
    ])

    expect(state.leaks.ipv6.status).toBe('leaking')
    expect(state.leaks.dns.status).toBe('clear')
    expect(log).toEqual(['IPv6 leak detected: reached api6.example:443 over IPv6'])
  })

  it('holds leak verdicts at unknown outside the connected state', () => {
    const connecting = reduce(initialMachineState(), [{ type: 'connect-requested', profile }], 0, settings).state
    const { state } = reduce(
      connecting,
      [{ type: 'leak', session: 0, check: 'dns', verdict: { status: 'leaking', checkedAt: 0 } }],
      100,
      settings,
    )
    expect(state.leaks).toEqual({ ipv6: { status: 'unknown' }, dns: { status: 'unknown' } })

    const leaking = reduce(
      connected(),
      [{ type: 'leak', session: 1, check: 'dns', verdict: { status: 'leaking', checkedAt: 2000 } }],
      2000,
      settings,
    ).state
    const dropped = messages(leaking, [
      [3000, [scan()]],
      [4000, [scan()]],
    ]).state
    expect(dropped.connection).toBe('disconnected')
    expect(dropped.leaks).toEqual({ ipv6: { status: 'unknown' }, dns: { status: 'unknown' } })
  })

  it('drops leak verdicts from an earlier session', () => {
    const { state, events } = reduce(
      connected(),
      [{ type: 'leak', session: 0, check: 'dns', verdict: { status: 'leaking', checkedAt: 2000 } }],
      2000,
      settings,
    )

    expect(state.session).toBe(1)
    expect(state.leaks).toEqual({ ipv6: { status: 'unknown' }, dns: { status: 'unknown' } })
    expect(events).toEqual([])
  })

  it('merges network info without erasing earlier fields', () => {
    const { state, log } = messages(initialMachineState(), [
      [1000, [{ type: 'network', info: { publicIp: '198.51.100.7', isp: 'Example Net' } }]],
      [2000, [{ type: 'network', info: { latencyMs: 18 } }]],
      [3000, [{ type: 'network-failed', error: 'fetch failed' }]],
      [4000, [{ type: 'network-failed', error: 'fetch failed' }]],
    ])

    expect(state.network).toEqual({ publicIp: '198.51.100.7', isp: 'Example Net', latencyMs: 18, updatedAt: 2000 })
    expect(log).toEqual(['Network info unavailable: fetch failed'])
  })
})

describe('toSnapshot', () => {
  it('reports session ages only while connected', () => {
    const live = toSnapshot(connected(), 1, 4000, [])
    expect(live.sessionAgeMs).toBe(3000)

    const idle = toSnapshot(initialMachineState(), 2, 4000, [])
    expect(idle.sessionAgeMs).toBeUndefined()
    expect(idle.state).toBe('disconnected')
  })
})
