import { execFile } from 'node:child_process'
import { ProbeError } from '../errors'

export type CommandOutput = {
  stdout: string
  stderr: string
  exitCode: number
}

export type CommandOptions = {
  timeoutMs: number
  signal?: AbortSignal
  /** Exit codes other than 0 that still count as an answer (pkill's 1 is "no match"). */
  okExitCodes?: readonly number[]
}

export type CommandRunner = (
  command: string,
  args: readonly string[],
  options: CommandOptions,
) => Promise<CommandOutput>

const maxBuffer = 4 * 1024 * 1024

export const runCommand: CommandRunner = (command, args, { timeoutMs, signal, okExitCodes = [] }) =>
  new Promise((resolve, reject) => {
    execFile(
      command,
      [...args],
      { encoding: 'utf8', timeout: timeoutMs, signal, maxBuffer, windowsHide: true },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ stdout, stderr, exitCode: 0 })
          return
        }
        if (error.name === 'AbortError') {
          reject(error)
          return
        }
        const label = [command, ...args].join(' ')
        if (error.code === 'ENOENT') {
          reject(new ProbeError('probe-unavailable', `${command} is not installed`, { cause: error }))
          return
        }
        if (error.killed) {
          reject(new ProbeError('probe-timeout', `${label} timed out after ${timeoutMs}ms`, { cause: error }))
          return
        }
        if (typeof error.code === 'number' && okExitCodes.includes(error.code)) {
          resolve({ stdout, stderr, exitCode: error.code })
          return
        }
        const text = stderr.trim()
        reject(
          new ProbeError('probe-unavailable', text || `${label} failed: ${error.message}`, {
            cause: error,
          }),
        )
      },
    )
  })
