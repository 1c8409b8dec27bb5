import { readdir, readFile, stat } from 'node:fs/promises'
import { join } from 'node:path'
import { WIREGUARD_NAME_DIR } from '../constants'
import { describeError, errorCode, ProbeError } from '../errors'

export type NameMapEntry = {
  profile: string
  startedAt?: number
}

/** Real interface name (e.g. utun4) → profile, from wg-quick's `<profile>.name` files. */
export type NameMapReader = () => Promise<Map<string, NameMapEntry>>

export const createNameMapReader =
  (dir = WIREGUARD_NAME_DIR): NameMapReader =>
  async () => {
    const map = new Map<string, NameMapEntry>()
    let files: string[]
    try {
      files = await readdir(dir)
    } catch (error) {
      const code = errorCode(error)
      if (code === 'ENOENT' || code === 'ENOTDIR') {
        return map
      }
      throw new ProbeError('probe-unavailable', `Cannot list ${dir}: ${describeError(error, 'read failed')}`, {
        cause: error,
      })
    }
    for (const file of files.filter((name) => name.endsWith('.name')).sort()) {
      const path = join(dir, file)
      try {
        const [content, info] = await Promise.all([readFile(path, 'utf8'), stat(path)])
        const interfaceId = content.trim()
        if (interfaceId) {
          map.set(interfaceId, { profile: file.slice(0, -'.name'.length), startedAt: info.mtimeMs })
        }
      } catch (error) {
        // wg-quick removes the file on teardown; a vanished entry is not an error
        if (errorCode(error) !== 'ENOENT') {
          throw new ProbeError('probe-unavailable', `Cannot read ${path}: ${describeError(error, 'read failed')}`, {
            cause: error,
          })
        }
      }
    }
    return map
  }
