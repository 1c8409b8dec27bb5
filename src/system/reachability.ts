import { connect } from 'node:net'
import { ProbeError } from '../errors'

export type ProbeTarget = {
  host: string
  port: number
}

/** Resolves once a TCP connection over IPv6 is established, then closes it. */
export type ReachabilityProbe = (
  target: ProbeTarget,
  options: { timeoutMs: number; signal?: AbortSignal },
) => Promise<void>

export const connectIPv6: ReachabilityProbe = ({ host, port }, { timeoutMs, signal }) =>
  new Promise((resolve, reject) => {
    const socket = connect({ host, port, family: 6, timeout: timeoutMs })
    const onAbort = () => {
      socket.destroy()
      reject(signal?.reason ?? new Error('aborted'))
    }
    const settle = () => {
      signal?.removeEventListener('abort', onAbort)
      socket.destroy()
    }
    if (signal?.aborted) {
      onAbort()
      return
    }
    signal?.addEventListener('abort', onAbort, { once: true })
    socket.once('connect', () => {
      settle()
      resolve()
    })
    socket.once('timeout', () => {
      settle()
      reject(new ProbeError('probe-timeout', `${host}:${port} did not answer within ${timeoutMs}ms`))
    })
    socket.once('error', (error) => {
      settle()
      reject(error)
    })
  })
