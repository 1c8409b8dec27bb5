import { z } from 'zod'
import type { NetworkInfo } from '../types'
import type { CommandRunner } from './command'

const ipInfoSchema = z.object({
  ip: z.string().min(1),
  org: z.string().optional(),
})

export type NetworkInfoProbe = {
  lookupPublicIp(options: { timeoutMs: number; signal?: AbortSignal }): Promise<Pick<NetworkInfo, 'publicIp' | 'isp'>>
  measureLatency(options: { timeoutMs: number; signal?: AbortSignal }): Promise<number>
}

async function request<T>(url: string, schema: z.ZodType<T>, init?: RequestInit): Promise<T> {
  const response = await fetch(url, {
    ...init,
    headers: {
      Accept: 'application/json',
      ...(init?.headers ?? {}),
    },
  })

  if (!response.ok) {
    const text = await response.text()
    throw new Error(text || `Request failed: ${response.status}`)
  }

  return schema.parse(await response.json())
}

export const parsePingLatency = (output: string) => {
  const match = /time[=<]\s*([\d.]+)\s*ms/.exec(output)
  if (!match) {
    return undefined
  }
  const value = Number(match[1])
  return Number.isFinite(value) ? Math.max(0, Math.round(value)) : undefined
}

export const createNetworkInfoProbe = ({
  url,
  pingTarget,
  run,
}: {
  url: string
  pingTarget: string
  run: CommandRunner
}): NetworkInfoProbe => ({
  async lookupPublicIp({ timeoutMs, signal }) {
    const deadline = AbortSignal.timeout(timeoutMs)
    const info = await request(url, ipInfoSchema, {
      signal: signal ? AbortSignal.any([signal, deadline]) : deadline,
    })
    return { publicIp: info.ip, isp: info.org }
  },
  async measureLatency({ timeoutMs, signal }) {
    const { stdout } = await run('ping', ['-c', '1', pingTarget], { timeoutMs, signal })
    const latency = parsePingLatency(stdout)
    if (latency === undefined) {
      throw new Error(`No reply time in ping output for ${pingTarget}`)
    }
    return latency
  },
})
