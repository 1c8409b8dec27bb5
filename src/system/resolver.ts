import { readFile } from 'node:fs/promises'
import { describeError, ProbeError } from '../errors'

export type ResolverReader = (options: { timeoutMs: number; signal?: AbortSignal }) => Promise<string[]>

export const parseNameservers = (text: string) =>
  text
    .split('\n')
    .map((line) => line.replace(/[#;].*$/, '').trim())
    .filter((line) => /^nameserver\s/.test(line))
    .map((line) => line.slice('nameserver'.length).trim())
    .filter(Boolean)

export const createResolvConfReader =
  (path: string): ResolverReader =>
  async ({ timeoutMs, signal }) => {
    const deadline = AbortSignal.timeout(timeoutMs)
    const combined = signal ? AbortSignal.any([signal, deadline]) : deadline
    try {
      return parseNameservers(await readFile(path, { encoding: 'utf8', signal: combined }))
    } catch (error) {
      throw new ProbeError('resolver-unreadable', `Cannot read ${path}: ${describeError(error, 'read failed')}`, {
        cause: error,
      })
    }
  }
