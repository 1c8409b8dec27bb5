import { describeError, errorCode, isAbortError, ProbeError } from '../errors'
import type { ProfileStore } from '../profiles/store'
import type { ProbeTarget, ReachabilityProbe } from '../system/reachability'
import type { ResolverReader } from '../system/resolver'
import type { LeakVerdict, Profile } from '../types'

// The probe host was unreachable: IPv6 traffic is not leaving the host.
const blockedCodes = new Set(['ECONNREFUSED', 'ECONNRESET', 'ENETUNREACH', 'EHOSTUNREACH', 'ETIMEDOUT'])

export type LeakDetectorOptions = {
  probe: ReachabilityProbe
  readResolver: ResolverReader
  store: Pick<ProfileStore, 'getExpectedDns'>
  ipv6Target: ProbeTarget
  ipv6TimeoutMs: number
  dnsTimeoutMs: number
  now?: () => number
}

export const unknownVerdict: LeakVerdict = { status: 'unknown' }

export class LeakDetector {
  readonly #options: LeakDetectorOptions

  constructor(options: LeakDetectorOptions) {
    this.#options = options
  }

  #now() {
    return (this.#options.now ?? Date.now)()
  }

  /** Reaching an IPv6-only host while the tunnel should carry all traffic is a leak. */
  async checkIPv6(signal?: AbortSignal): Promise<LeakVerdict> {
    const { probe, ipv6Target, ipv6TimeoutMs } = this.#options
    const target = `${ipv6Target.host}:${ipv6Target.port}`
    try {
      await probe(ipv6Target, { timeoutMs: ipv6TimeoutMs, signal })
      return { status: 'leaking', checkedAt: this.#now(), detail: `reached ${target} over IPv6` }
    } catch (error) {
      if (signal?.aborted && isAbortError(error)) {
        return unknownVerdict
      }
      if (error instanceof ProbeError && error.kind === 'probe-timeout') {
        return { status: 'clear', checkedAt: this.#now() }
      }
      const code = errorCode(error)
      if (code && blockedCodes.has(code)) {
        return { status: 'clear', checkedAt: this.#now() }
      }
      return {
        status: 'unknown',
        checkedAt: this.#now(),
        detail: code ? `${code}: ${describeError(error, 'probe failed')}` : describeError(error, 'probe failed'),
      }
    }
  }

  async checkDNS(profile: Profile | undefined, signal?: AbortSignal): Promise<LeakVerdict> {
    const { readResolver, store, dnsTimeoutMs } = this.#options
    let nameservers: string[]
    try {
      nameservers = await readResolver({ timeoutMs: dnsTimeoutMs, signal })
    } catch (error) {
      return { status: 'unknown', checkedAt: this.#now(), detail: describeError(error, 'resolver unreadable') }
    }
    const first = nameservers[0]
    if (first === undefined) {
      return { status: 'unknown', checkedAt: this.#now(), detail: 'no nameserver configured' }
    }
    const expected = profile ? store.getExpectedDns(profile) : undefined
    if (expected === undefined || expected === first) {
      return { status: 'clear', checkedAt: this.#now(), detail: `nameserver ${first}` }
    }
    return {
      status: 'leaking',
      checkedAt: this.#now(),
      detail: `nameserver ${first} is not the tunnel resolver ${expected}`,
    }
  }
}
