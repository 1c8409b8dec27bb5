import { readdir, readFile } from 'node:fs/promises'
import { join } from 'node:path'
import { SYS_NET_DIR } from '../constants'
import { describeError, errorCode, ProbeError, StartupError } from '../errors'
import type { CommandRunner } from './command'

export type CounterReading = {
  rxBytes: number
  txBytes: number
}

export type CounterSource = {
  read(interfaceId: string, options: { timeoutMs: number; signal?: AbortSignal }): Promise<CounterReading>
  /** Fails with StartupError when no interface counters can be read at all. */
  check(): Promise<void>
}

const interfacePattern = /^[A-Za-z0-9_.:-]+$/

export const assertInterfaceId = (interfaceId: string) => {
  if (!interfacePattern.test(interfaceId) || interfaceId === '.' || interfaceId === '..') {
    throw new ProbeError('interface-gone', `Invalid interface name: ${interfaceId}`)
  }
}

const parseCounter = (text: string, label: string) => {
  const value = Number(text.trim())
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new ProbeError('probe-unavailable', `Unreadable counter ${label}: ${text.trim()}`)
  }
  return value
}

export const createSysfsCounterSource = (root = SYS_NET_DIR): CounterSource => {
  const readStat = async (interfaceId: string, stat: string, signal?: AbortSignal) => {
    const path = join(root, interfaceId, 'statistics', stat)
    try {
      return parseCounter(await readFile(path, { encoding: 'utf8', signal }), path)
    } catch (error) {
      if (error instanceof ProbeError) {
        throw error
      }
      const code = errorCode(error)
      if (code === 'ENOENT' || code === 'ENODEV') {
        throw new ProbeError('interface-gone', `Interface ${interfaceId} has no counters`, { cause: error })
      }
      throw new ProbeError('probe-unavailable', describeError(error, `Cannot read ${path}`), { cause: error })
    }
  }

  return {
    async read(interfaceId, { signal }) {
      assertInterfaceId(interfaceId)
      const [rxBytes, txBytes] = await Promise.all([
        readStat(interfaceId, 'rx_bytes', signal),
        readStat(interfaceId, 'tx_bytes', signal),
      ])
      return { rxBytes, txBytes }
    },
    async check() {
      let entries: string[]
      try {
        entries = await readdir(root)
      } catch (error) {
        throw new StartupError(`Cannot list network interfaces in ${root}: ${describeError(error, 'read failed')}`, {
          cause: error,
        })
      }
      if (entries.length === 0) {
        throw new StartupError(`No network interfaces found in ${root}`)
      }
      await readStat(entries[0], 'rx_bytes').catch((error: unknown) => {
        throw new StartupError(`Interface counters are not readable: ${describeError(error, 'read failed')}`, {
          cause: error,
        })
      })
    },
  }
}

/**
 * Parses `netstat -ibn` output. Columns are located from the header and read
 * from the right, since rows without a link address have fewer fields.
 */
export const parseNetstat = (output: string, interfaceId: string): CounterReading | undefined => {
  const lines = output.split('\n').map((line) => line.trim()).filter(Boolean)
  const header = lines[0]?.split(/\s+/)
  if (!header) {
    return undefined
  }
  const addressIndex = header.indexOf('Address')
  const trailing = header.slice(addressIndex + 1)
  const rxIndex = trailing.indexOf('Ibytes')
  const txIndex = trailing.indexOf('Obytes')
  if (addressIndex < 0 || rxIndex < 0 || txIndex < 0) {
    return undefined
  }
  for (const line of lines.slice(1)) {
    const fields = line.split(/\s+/)
    if (fields[0] !== interfaceId && fields[0] !== `${interfaceId}*`) {
      continue
    }
    const tail = fields.slice(-trailing.length)
    const rxBytes = Number(tail[rxIndex])
    const txBytes = Number(tail[txIndex])
    if (Number.isSafeInteger(rxBytes) && Number.isSafeInteger(txBytes)) {
      return { rxBytes, txBytes }
    }
  }
  return undefined
}

export const createNetstatCounterSource = (run: CommandRunner): CounterSource => ({
  async read(interfaceId, { timeoutMs, signal }) {
    assertInterfaceId(interfaceId)
    const { stdout } = await run('netstat', ['-ibn', '-I', interfaceId], { timeoutMs, signal, okExitCodes: [1] })
    const reading = parseNetstat(stdout, interfaceId)
    if (!reading) {
      throw new ProbeError('interface-gone', `Interface ${interfaceId} is not listed by netstat`)
    }
    return reading
  },
  async check() {
    try {
      const { stdout } = await run('netstat', ['-ibn'], { timeoutMs: 2000 })
      if (!stdout.includes('Ibytes')) {
        throw new StartupError('netstat output carries no byte counters')
      }
    } catch (error) {
      if (error instanceof StartupError) {
        throw error
      }
      throw new StartupError(`Interface counters are not readable: ${describeError(error, 'netstat failed')}`, {
        cause: error,
      })
    }
  },
})

export const createCounterSource = (platform: NodeJS.Platform, run: CommandRunner): CounterSource =>
  platform === 'linux' ? createSysfsCounterSource() : createNetstatCounterSource(run)
