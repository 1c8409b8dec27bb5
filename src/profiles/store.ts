import type { Dirent } from 'node:fs'
import { readdir, readFile } from 'node:fs/promises'
import { extname, join } from 'node:path'
import { describeError, errorCode, StartupError } from '../errors'
import type { Profile, Protocol } from '../types'
import { parseOpenVpnConfig, parseWireGuardConfig } from './parse'

/** Read-only view of the imported profiles. */
export type ProfileStore = {
  listProfiles(): Promise<Profile[]>
  getExpectedDns(profile: Profile): string | undefined
  /** Files the latest listing could not use, as `file: reason`. */
  skipped(): readonly string[]
}

const protocolForExtension: Record<string, Protocol> = {
  '.conf': 'wireguard',
  '.ovpn': 'openvpn',
}

const byName = (left: Profile, right: Profile) => left.name.localeCompare(right.name)

export const createDirectoryProfileStore = (dir: string): ProfileStore => {
  let skipped: string[] = []

  return {
    async listProfiles() {
      let entries: Dirent[]
      try {
        entries = await readdir(dir, { withFileTypes: true })
      } catch (error) {
        if (errorCode(error) === 'ENOENT') {
          skipped = []
          return []
        }
        throw new StartupError(`Cannot read profiles in ${dir}: ${describeError(error, 'read failed')}`, {
          cause: error,
        })
      }
      const problems: string[] = []
      const profiles = await Promise.all(
        entries.map(async (entry): Promise<Profile | undefined> => {
          const extension = extname(entry.name)
          const protocol = protocolForExtension[extension]
          if (!protocol) {
            return undefined
          }
          if (entry.isDirectory()) {
            problems.push(`${entry.name}: is a directory`)
            return undefined
          }
          const configPath = join(dir, entry.name)
          try {
            const text = await readFile(configPath, 'utf8')
            const parsed = protocol === 'wireguard' ? parseWireGuardConfig(text) : parseOpenVpnConfig(text)
            return { name: entry.name.slice(0, -extension.length), protocol, configPath, ...parsed }
          } catch (error) {
            problems.push(`${entry.name}: ${describeError(error, 'unreadable')}`)
            return undefined
          }
        }),
      )
      skipped = problems.sort()
      return profiles.filter((profile): profile is Profile => profile !== undefined).sort(byName)
    },
    getExpectedDns: (profile) => profile.dns,
    skipped: () => skipped,
  }
}

export const createMemoryProfileStore = (profiles: readonly Profile[]): ProfileStore => ({
  listProfiles: async () => [...profiles].sort(byName),
  getExpectedDns: (profile) => profile.dns,
  skipped: () => [],
})
