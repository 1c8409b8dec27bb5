import { ProbeError } from '../errors'
import { allProtocols } from '../protocols'
import type { ProtocolDrivers } from '../protocols'
import type { ProfileStore } from '../profiles/store'
import type { CommandRunner } from '../system/command'
import type { InterfaceInspector } from '../system/interfaces'
import type { NameMapReader } from '../system/wireguardNames'
import type { ActiveSession, ScanResult } from '../types'

export type SessionScannerOptions = {
  store: ProfileStore
  drivers: ProtocolDrivers
  run: CommandRunner
  readNameMap: NameMapReader
  interfaces: InterfaceInspector
  timeoutMs: number
}

export const sessionLabel = (session: ActiveSession) =>
  session.profile ?? `unknown session on ${session.interfaceId ?? session.protocol}`

const sortKey = (session: ActiveSession) => `${session.interfaceId ?? ''}\u0000${session.profile ?? ''}`

/**
 * Chooses the session to report when several tunnels are up: the preferred
 * profile's if present, else the first by interface name.
 */
export const pickActive = (sessions: readonly ActiveSession[], preferredProfile?: string) => {
  const ordered = [...sessions].sort((left, right) => sortKey(left).localeCompare(sortKey(right)))
  const preferred = preferredProfile ? ordered.find((session) => session.profile === preferredProfile) : undefined
  return { ordered, active: preferred ?? ordered[0] }
}

export class SessionScanner {
  readonly #options: SessionScannerOptions

  constructor(options: SessionScannerOptions) {
    this.#options = options
  }

  /**
   * Asks every protocol's tool, so a tunnel shows up even without a matching
   * profile. A missing tool only fails the scan for a protocol that has profiles.
   */
  async scan(preferredProfile?: string, signal?: AbortSignal): Promise<ScanResult> {
    const { store, drivers, run, readNameMap, interfaces, timeoutMs } = this.#options
    const profiles = await store.listProfiles()
    const configured = new Set(profiles.map((profile) => profile.protocol))
    const context = { profiles, run, readNameMap, interfaces, timeoutMs, signal }

    const found = await Promise.all(
      allProtocols.map(async (protocol) => {
        try {
          return await drivers[protocol].scan(context)
        } catch (error) {
          if (signal?.aborted) {
            throw error
          }
          const failure =
            error instanceof ProbeError
              ? error
              : new ProbeError('probe-unavailable', `${protocol} scan failed`, { cause: error })
          if (failure.kind === 'probe-unavailable' && !configured.has(protocol)) {
            return []
          }
          throw failure
        }
      }),
    )
    const { ordered, active } = pickActive(found.flat(), preferredProfile)
    const warnings = store.skipped().map((problem) => new ProbeError('profile-unreadable', `Skipped profile ${problem}`))
    if (ordered.length > 1 && active) {
      warnings.push(
        new ProbeError(
          'ambiguous-scan',
          `${ordered.length} tunnels active (${ordered.map(sessionLabel).join(', ')}); reporting ${sessionLabel(active)}`,
        ),
      )
    }
    return {
      sessions: ordered,
      active,
      warnings,
      protocolDetails: active ? { ...active.details } : {},
    }
  }
}
