import type { Protocol } from '../types'
import { openvpnDriver } from './openvpn'
import type { OpenVpnProcess } from './openvpn'
import type { ProtocolDriver } from './types'
import { wireguardDriver } from './wireguard'
import type { WireGuardTunnel } from './wireguard'

export type ProtocolDrivers = {
  wireguard: ProtocolDriver<'wireguard', WireGuardTunnel>
  openvpn: ProtocolDriver<'openvpn', OpenVpnProcess>
}

export const defaultDrivers: ProtocolDrivers = {
  wireguard: wireguardDriver,
  openvpn: openvpnDriver,
}

export const allProtocols: readonly Protocol[] = ['wireguard', 'openvpn']

export const protocolLabel = (protocol: Protocol) => (protocol === 'wireguard' ? 'WireGuard' : 'OpenVPN')

export type { ProtocolDriver, ScanContext } from './types'
