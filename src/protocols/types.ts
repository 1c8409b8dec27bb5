import type { CommandRunner } from '../system/command'
import type { InterfaceInspector } from '../system/interfaces'
import type { NameMapReader } from '../system/wireguardNames'
import type { ActiveSession, Profile, Protocol } from '../types'

export type ScanContext = {
  profiles: readonly Profile[]
  run: CommandRunner
  readNameMap: NameMapReader
  interfaces: InterfaceInspector
  timeoutMs: number
  signal?: AbortSignal
}

/** Capabilities shared by every protocol; the scanner dispatches on `protocol`. */
export type ProtocolDriver<P extends Protocol, Status> = {
  protocol: P
  scan(context: ScanContext): Promise<ActiveSession[]>
  parseStatus(output: string): Status[]
}
