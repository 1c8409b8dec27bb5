import type { Profile } from '../types'
import type { CommandRunner } from './command'

export type TunnelControl = {
  connect(profile: Profile, options?: { signal?: AbortSignal }): Promise<void>
  disconnect(profile: Profile, options?: { signal?: AbortSignal }): Promise<void>
}

const escapePattern = (value: string) => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')

export const createTunnelControl = (run: CommandRunner, timeoutMs: number): TunnelControl => ({
  async connect(profile, { signal } = {}) {
    switch (profile.protocol) {
      case 'wireguard':
        await run('wg-quick', ['up', profile.configPath], { timeoutMs, signal })
        return
      case 'openvpn':
        await run('openvpn', ['--config', profile.configPath, '--daemon'], { timeoutMs, signal })
        return
    }
  },
  async disconnect(profile, { signal } = {}) {
    switch (profile.protocol) {
      case 'wireguard':
        await run('wg-quick', ['down', profile.configPath], { timeoutMs, signal })
        return
      case 'openvpn':
        // exit code 1: no process matched, the daemon is already gone
        await run('pkill', ['-f', '--', `openvpn.*${escapePattern(profile.configPath)}`], {
          timeoutMs,
          signal,
          okExitCodes: [1],
        })
        return
    }
  },
})
