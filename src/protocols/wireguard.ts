import { withInterfaceDetails } from '../system/interfaces'
import type { NameMapEntry } from '../system/wireguardNames'
import type { ActiveSession, Profile } from '../types'
import type { ProtocolDriver } from './types'

export type WireGuardPeer = {
  publicKey: string
  endpoint?: string
  allowedIps: string
  /** Unix seconds; 0 means no handshake yet. */
  latestHandshake: number
  rxBytes: number
  txBytes: number
}

export type WireGuardTunnel = {
  interfaceId: string
  publicKey: string
  listenPort: string
  peers: WireGuardPeer[]
}

const toNumber = (value: string | undefined) => {
  const parsed = Number(value)
  return Number.isFinite(parsed) ? parsed : 0
}

const optional = (value: string | undefined) => (value && value !== '(none)' ? value : undefined)

/**
 * Parses `wg show all dump`. Interface lines have 5 tab-separated fields
 * (the private key among them, which is dropped), peer lines have 9.
 */
export const parseDump = (output: string): WireGuardTunnel[] => {
  const tunnels = new Map<string, WireGuardTunnel>()
  for (const line of output.split('\n')) {
    const fields = line.split('\t')
    if (fields.length === 5) {
      const [interfaceId, , publicKey, listenPort] = fields
      tunnels.set(interfaceId, { interfaceId, publicKey, listenPort, peers: [] })
    } else if (fields.length === 9) {
      const [interfaceId, publicKey, , endpoint, allowedIps, handshake, rx, tx] = fields
      tunnels.get(interfaceId)?.peers.push({
        publicKey,
        endpoint: optional(endpoint),
        allowedIps,
        latestHandshake: toNumber(handshake),
        rxBytes: toNumber(rx),
        txBytes: toNumber(tx),
      })
    }
  }
  return [...tunnels.values()]
}

export const resolveWireGuardProfile = (
  interfaceId: string,
  profiles: readonly Profile[],
  nameMap: ReadonlyMap<string, NameMapEntry>,
): Profile | undefined => {
  const wireguard = profiles.filter((profile) => profile.protocol === 'wireguard')
  const mapped = nameMap.get(interfaceId)
  return (
    (mapped && wireguard.find((profile) => profile.name === mapped.profile)) ??
    wireguard.find((profile) => profile.interfaceName === interfaceId) ??
    wireguard.find((profile) => profile.name === interfaceId)
  )
}

export const tunnelToSession = (
  tunnel: WireGuardTunnel,
  profile: Profile | undefined,
  mapped: NameMapEntry | undefined,
): ActiveSession => {
  const latest = Math.max(0, ...tunnel.peers.map((peer) => peer.latestHandshake))
  const rxBytes = tunnel.peers.reduce((sum, peer) => sum + peer.rxBytes, 0)
  const txBytes = tunnel.peers.reduce((sum, peer) => sum + peer.txBytes, 0)
  const peer = tunnel.peers[0]
  const details: Record<string, string> = {
    interface: tunnel.interfaceId,
    publicKey: tunnel.publicKey,
    listenPort: tunnel.listenPort,
    peers: String(tunnel.peers.length),
  }
  if (peer?.endpoint) {
    details.endpoint = peer.endpoint
  }
  if (peer) {
    details.allowedIps = peer.allowedIps
  }
  if (mapped && !profile) {
    details.configName = mapped.profile
  }
  return {
    protocol: 'wireguard',
    interfaceId: tunnel.interfaceId,
    profile: profile?.name,
    startedAt: mapped?.startedAt,
    handshakeAt: latest > 0 ? latest * 1000 : undefined,
    rxBytes,
    txBytes,
    details,
  }
}

export const wireguardDriver: ProtocolDriver<'wireguard', WireGuardTunnel> = {
  protocol: 'wireguard',
  parseStatus: parseDump,
  async scan({ profiles, run, readNameMap, interfaces, timeoutMs, signal }) {
    const [{ stdout }, nameMap] = await Promise.all([
      run('wg', ['show', 'all', 'dump'], { timeoutMs, signal }),
      readNameMap(),
    ])
    const sessions = parseDump(stdout).map((tunnel) =>
      tunnelToSession(
        tunnel,
        resolveWireGuardProfile(tunnel.interfaceId, profiles, nameMap),
        nameMap.get(tunnel.interfaceId),
      ),
    )
    return Promise.all(sessions.map((session) => withInterfaceDetails(session, interfaces, { timeoutMs, signal })))
  },
}
