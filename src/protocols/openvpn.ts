import { basename, resolve } from 'node:path'
import { withInterfaceDetails } from '../system/interfaces'
import type { ActiveSession, Profile } from '../types'
import type { ProtocolDriver } from './types'

export type OpenVpnProcess = {
  pid: number
  configPath?: string
  device?: string
}

const optionValue = (args: readonly string[], name: string) => {
  for (let index = 0; index < args.length; index += 1) {
    const arg = args[index]
    if (arg === name) {
      return args[index + 1]
    }
    if (arg.startsWith(`${name}=`)) {
      return arg.slice(name.length + 1)
    }
  }
  return undefined
}

/** Parses `ps ax -o pid=,command=` and keeps the openvpn daemons. */
export const parseProcessList = (output: string): OpenVpnProcess[] =>
  output
    .split('\n')
    .map((line) => line.trim().split(/\s+/))
    .filter(([pid, executable]) => /^\d+$/.test(pid) && executable !== undefined && basename(executable) === 'openvpn')
    .map(([pid, , ...args]) => ({
      pid: Number(pid),
      configPath: optionValue(args, '--config') ?? args.find((arg) => arg.endsWith('.ovpn') || arg.endsWith('.conf')),
      device: optionValue(args, '--dev'),
    }))

const sameConfig = (profile: Profile, configPath: string) =>
  resolve(profile.configPath) === resolve(configPath) || basename(profile.configPath) === basename(configPath)

// --dev tun / tap lets the kernel pick the unit number
const isConcreteDevice = (device: string | undefined): device is string =>
  device !== undefined && device !== 'tun' && device !== 'tap'

export const processToSession = (daemon: OpenVpnProcess, profiles: readonly Profile[]): ActiveSession => {
  const { configPath } = daemon
  const profile = configPath
    ? profiles.find((candidate) => candidate.protocol === 'openvpn' && sameConfig(candidate, configPath))
    : undefined
  const interfaceId = isConcreteDevice(daemon.device) ? daemon.device : profile?.interfaceName
  const details: Record<string, string> = { pid: String(daemon.pid) }
  if (configPath) {
    details.config = configPath
  }
  if (interfaceId) {
    details.device = interfaceId
  }
  if (profile?.endpoint) {
    details.endpoint = profile.endpoint
  }
  return {
    protocol: 'openvpn',
    interfaceId,
    profile: profile?.name,
    details,
  }
}

type DeviceType = 'tun' | 'tap'

const devicePattern: Record<DeviceType, RegExp> = {
  tun: /^u?tun\d+$/,
  tap: /^tap\d+$/,
}

const unitNumber = (name: string) => Number(/(\d+)$/.exec(name)?.[1] ?? 0)

/**
 * Gives daemons without a fixed device the unit the kernel assigned. Units
 * count up as devices are created, so the newest daemon (highest pid) gets the
 * highest free unit of its device type, and so on down; system utun devices
 * with low units are left over. A daemon with no `--dev` option uses tun.
 */
export const assignKernelDevices = (
  found: ReadonlyArray<{ daemon: OpenVpnProcess; session: ActiveSession }>,
  interfaceNames: readonly string[],
  claimed: ReadonlySet<string>,
): ActiveSession[] => {
  const taken = new Set(claimed)
  for (const { session } of found) {
    if (session.interfaceId) {
      taken.add(session.interfaceId)
    }
  }
  const assigned = new Map<ActiveSession, string>()
  for (const type of ['tun', 'tap'] as const) {
    const free = interfaceNames
      .filter((name) => devicePattern[type].test(name) && !taken.has(name))
      .sort((left, right) => unitNumber(right) - unitNumber(left))
    const waiting = found
      .filter(({ daemon, session }) => !session.interfaceId && (daemon.device ?? 'tun') === type)
      .sort((left, right) => right.daemon.pid - left.daemon.pid)
    waiting.forEach(({ session }, index) => {
      const name = free[index]
      if (name) {
        assigned.set(session, name)
      }
    })
  }
  return found.map(({ session }) => {
    const interfaceId = assigned.get(session)
    return interfaceId ? { ...session, interfaceId, details: { ...session.details, device: interfaceId } } : session
  })
}

export const openvpnDriver: ProtocolDriver<'openvpn', OpenVpnProcess> = {
  protocol: 'openvpn',
  parseStatus: parseProcessList,
  async scan({ profiles, run, readNameMap, interfaces, timeoutMs, signal }) {
    const { stdout } = await run('ps', ['ax', '-o', 'pid=,command='], { timeoutMs, signal })
    const found = parseProcessList(stdout).map((daemon) => ({ daemon, session: processToSession(daemon, profiles) }))
    let sessions = found.map(({ session }) => session)
    if (sessions.some((session) => !session.interfaceId)) {
      // WireGuard on macOS also runs on utun devices
      const nameMap = await readNameMap()
      sessions = assignKernelDevices(found, interfaces.list(), new Set(nameMap.keys()))
    }
    return Promise.all(sessions.map((session) => withInterfaceDetails(session, interfaces, { timeoutMs, signal })))
  },
}
