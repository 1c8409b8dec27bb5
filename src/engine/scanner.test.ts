import { describe, expect, it, vi } from 'vitest'
import { ProbeError } from '../errors'
import { createMemoryProfileStore } from '../profiles/store'
import type { ProfileStore } from '../profiles/store'
import { defaultDrivers } from '../protocols'
import type { CommandRunner } from '../system/command'
import type { InterfaceInspector } from '../system/interfaces'
import type { NameMapEntry } from '../system/wireguardNames'
import type { Profile } from '../types'
import { pickActive, SessionScanner } from './scanner'

const wireguard: Profile = { name: 'nl-amsterdam', protocol: 'wireguard', configPath: '/profiles/nl-amsterdam.conf' }
const openvpn: Profile = { name: 'de-berlin', protocol: 'openvpn', configPath: '/profiles/de-berlin.ovpn' }

const wgDump = [
  'wg0\ttest-private-key\ttest-public-key\t51820\toff',
  'wg0\ttest-peer-key\t(none)\t203.0.113.10:51820\t0.0.0.0/0\t1700000000\t1024\t2048\t25',
].join('\n')

const psOutput = '  412 /usr/sbin/openvpn --config /profiles/de-berlin.ovpn --daemon --dev tun1\n'

const output = (stdout: string) => ({ stdout, stderr: '', exitCode: 0 })

const fakeRun = (outputs: Record<string, string>) =>
  vi.fn<CommandRunner>(async (command) => {
    const stdout = outputs[command]
    if (stdout === undefined) {
      throw new ProbeError('probe-unavailable', `${command} is not installed`)
    }
    return output(stdout)
  })

const interfaces: InterfaceInspector = {
  list: () => [],
  describe: async () => ({}),
}

const namedWg0 = new Map<string, NameMapEntry>([['wg0', { profile: 'nl-amsterdam', startedAt: 1000 }]])

const scanner = (profiles: Profile[] | ProfileStore, run: CommandRunner, nameMap = namedWg0) =>
  new SessionScanner({
    store: Array.isArray(profiles) ? createMemoryProfileStore(profiles) : profiles,
    drivers: defaultDrivers,
    run,
    readNameMap: async () => nameMap,
    interfaces,
    timeoutMs: 2000,
  })

describe('SessionScanner', () => {
  it('reports the single active session', async () => {
    const result = await scanner([wireguard], fakeRun({ wg: wgDump })).scan()

    expect(result.warnings).toEqual([])
    expect(result.active).toMatchObject({
      protocol: 'wireguard',
      interfaceId: 'wg0',
      profile: 'nl-amsterdam',
      startedAt: 1000,
    })
    expect(result.protocolDetails.endpoint).toBe('203.0.113.10:51820')
  })

  it('reports a live tunnel even when no profile is imported', async () => {
    const run = fakeRun({ wg: wgDump })
    const result = await scanner([], run, new Map()).scan()

    expect(result.warnings).toEqual([])
    expect(result.sessions).toHaveLength(1)
    expect(result.active).toMatchObject({ protocol: 'wireguard', interfaceId: 'wg0' })
    expect(result.active?.profile).toBeUndefined()
    expect(run).toHaveBeenCalledWith('wg', ['show', 'all', 'dump'], { timeoutMs: 2000, signal: undefined })
    expect(run).toHaveBeenCalledWith('ps', ['ax', '-o', 'pid=,command='], { timeoutMs: 2000, signal: undefined })
  })

  it('ignores a missing tool for a protocol without profiles', async () => {
    const result = await scanner([openvpn], fakeRun({ ps: psOutput })).scan()

    expect(result.sessions.map((session) => session.profile)).toEqual(['de-berlin'])
    expect(result.warnings).toEqual([])
  })

  it('reports profiles the store had to skip', async () => {
    const store: ProfileStore = {
      ...createMemoryProfileStore([wireguard]),
      skipped: () => ['backup.conf: is a directory'],
    }
    const result = await scanner(store, fakeRun({ wg: '' })).scan()

    expect(result.active).toBeUndefined()
    expect(result.warnings.map((warning) => [warning.kind, warning.message])).toEqual([
      ['profile-unreadable', 'Skipped profile backup.conf: is a directory'],
    ])
  })

  it('breaks ties by interface name and warns about it', async () => {
    const result = await scanner([wireguard, openvpn], fakeRun({ wg: wgDump, ps: psOutput })).scan()

    expect(result.sessions.map((session) => session.profile)).toEqual(['de-berlin', 'nl-amsterdam'])
    expect(result.active?.profile).toBe('de-berlin')
    expect(result.warnings.map((warning) => [warning.kind, warning.message])).toEqual([
      ['ambiguous-scan', '2 tunnels active (de-berlin, nl-amsterdam); reporting de-berlin'],
    ])
  })

  it('keeps reporting the preferred profile when several tunnels are up', async () => {
    const result = await scanner([wireguard, openvpn], fakeRun({ wg: wgDump, ps: psOutput })).scan('nl-amsterdam')

    expect(result.active?.profile).toBe('nl-amsterdam')
    expect(result.warnings[0]?.message).toBe('2 tunnels active (de-berlin, nl-amsterdam); reporting nl-amsterdam')
  })

  it('fails the scan when a configured protocol has no tool', async () => {
    await expect(scanner([wireguard], fakeRun({})).scan()).rejects.toMatchObject({
      kind: 'probe-unavailable',
      message: 'wg is not installed',
    })
  })

  it('wraps unexpected driver failures', async () => {
    const run = vi.fn<CommandRunner>(async () => {
      throw new Error('spawn EACCES')
    })

    await expect(scanner([wireguard], run).scan()).rejects.toMatchObject({
      kind: 'probe-unavailable',
      message: 'wireguard scan failed',
    })
  })
})

describe('pickActive', () => {
  it('returns nothing when no session is up', () => {
    expect(pickActive([])).toEqual({ ordered: [], active: undefined })
  })
})
