import type { ProbeError } from './errors'

export type Protocol = 'wireguard' | 'openvpn'

export type Profile = {
  name: string
  protocol: Protocol
  configPath: string
  endpoint?: string
  interfaceName?: string
  dns?: string
}

export type InterfaceSample = {
  interfaceId: string
  at: number
  rxBytes: number
  txBytes: number
}

export type ThroughputRate = {
  downBps: number
  upBps: number
  valid: boolean
}

export type ThroughputPoint = {
  at: number
  downBps: number
  upBps: number
}

export type LeakStatus = 'unknown' | 'clear' | 'leaking'

export type LeakCheck = 'ipv6' | 'dns'

export type LeakVerdict = {
  status: LeakStatus
  checkedAt?: number
  detail?: string
}

export type ConnectionState = 'disconnected' | 'connecting' | 'connected' | 'disconnecting'

export type EventLevel = 'info' | 'warn' | 'error'

export type ConnectionEvent = {
  at: number
  level: EventLevel
  message: string
}

/** One tunnel seen on the host by a protocol driver. */
export type ActiveSession = {
  protocol: Protocol
  interfaceId?: string
  /** Undefined when the interface maps to no known profile. */
  profile?: string
  startedAt?: number
  handshakeAt?: number
  rxBytes?: number
  txBytes?: number
  details: Record<string, string>
}

export type ScanResult = {
  sessions: ActiveSession[]
  active?: ActiveSession
  /** Non-fatal findings, e.g. an ambiguous-scan when several tunnels are up. */
  warnings: ProbeError[]
  protocolDetails: Record<string, string>
}

export type TransferTotals = {
  rxBytes: number
  txBytes: number
}

export type ScannerHealth = {
  available: boolean
  consecutiveFailures: number
  lastError?: string
}

export type TelemetryHealth = {
  available: boolean
  lastError?: string
}

export type NetworkInfo = {
  publicIp?: string
  isp?: string
  latencyMs?: number
  updatedAt?: number
}

export type ConnectionSnapshot = {
  seq: number
  at: number
  state: ConnectionState
  profile?: string
  interfaceId?: string
  attributed: boolean
  sessionStartedAt?: number
  sessionAgeMs?: number
  handshakeAt?: number
  handshakeAgeMs?: number
  transfer?: TransferTotals
  throughput: ThroughputRate
  throughputHistory: readonly ThroughputPoint[]
  leaks: Readonly<Record<LeakCheck, LeakVerdict>>
  scanner: ScannerHealth
  telemetry: TelemetryHealth
  details: Readonly<Record<string, string>>
  network: NetworkInfo
  events: readonly ConnectionEvent[]
}
