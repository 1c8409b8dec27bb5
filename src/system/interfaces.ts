import { readFile } from 'node:fs/promises'
import { networkInterfaces } from 'node:os'
import { join } from 'node:path'
import { SYS_NET_DIR } from '../constants'
import type { ActiveSession } from '../types'
import type { CommandRunner } from './command'
import { assertInterfaceId } from './counters'

export type InterfaceDetails = {
  address?: string
  mtu?: number
}

export type InterfaceInspector = {
  /** Names of the interfaces that currently carry an address. */
  list(): string[]
  /** Best effort: a detail that cannot be read is left out. */
  describe(interfaceId: string, options: { timeoutMs: number; signal?: AbortSignal }): Promise<InterfaceDetails>
}

type InspectorOptions = {
  sysNetDir?: string
  addresses?: typeof networkInterfaces
}

export const parseIfconfigMtu = (output: string) => {
  const match = /\bmtu (\d+)/.exec(output)
  return match ? Number(match[1]) : undefined
}

export const createInterfaceInspector = (
  platform: NodeJS.Platform,
  run: CommandRunner,
  { sysNetDir = SYS_NET_DIR, addresses = networkInterfaces }: InspectorOptions = {},
): InterfaceInspector => {
  const readMtu = async (interfaceId: string, timeoutMs: number, signal?: AbortSignal) => {
    try {
      assertInterfaceId(interfaceId)
      if (platform === 'linux') {
        const mtu = Number((await readFile(join(sysNetDir, interfaceId, 'mtu'), { encoding: 'utf8', signal })).trim())
        return Number.isSafeInteger(mtu) && mtu > 0 ? mtu : undefined
      }
      const { stdout } = await run('ifconfig', [interfaceId], { timeoutMs, signal })
      return parseIfconfigMtu(stdout)
    } catch {
      return undefined
    }
  }

  return {
    list: () => Object.keys(addresses()),
    async describe(interfaceId, { timeoutMs, signal }) {
      const entries = addresses()[interfaceId] ?? []
      const address = (entries.find((entry) => entry.family === 'IPv4') ?? entries[0])?.address
      const mtu = await readMtu(interfaceId, timeoutMs, signal)
      return { address, mtu }
    },
  }
}

export const withInterfaceDetails = async (
  session: ActiveSession,
  inspector: InterfaceInspector,
  options: { timeoutMs: number; signal?: AbortSignal },
): Promise<ActiveSession> => {
  if (!session.interfaceId) {
    return session
  }
  const { address, mtu } = await inspector.describe(session.interfaceId, options)
  const details = { ...session.details }
  if (address) {
    details.address = address
  }
  if (mtu !== undefined) {
    details.mtu = String(mtu)
  }
  return { ...session, details }
}
