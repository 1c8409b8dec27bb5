import { format } from 'date-fns'
import { protocolLabel } from './protocols'
import type { ConnectionEvent, ScanResult, ThroughputRate } from './types'

const rateUnits = ['B/s', 'KB/s', 'MB/s', 'GB/s']
const byteUnits = ['B', 'KB', 'MB', 'GB', 'TB']

const scaled = (value: number, units: readonly string[]) => {
  let amount = Math.max(0, value)
  let unit = 0
  while (amount >= 1000 && unit < units.length - 1) {
    amount /= 1000
    unit += 1
  }
  return unit === 0 ? `${Math.round(amount)} ${units[0]}` : `${amount.toFixed(1)} ${units[unit]}`
}

export const formatBytesPerSecond = (value: number) => scaled(value, rateUnits)

export const formatBytes = (value: number) => scaled(value, byteUnits)

/** An invalid rate renders as a dash, never as zero. */
export const formatRate = (rate: ThroughputRate, direction: 'down' | 'up') => {
  if (!rate.valid) {
    return '—'
  }
  return formatBytesPerSecond(direction === 'down' ? rate.downBps : rate.upBps)
}

const pad = (value: number) => String(value).padStart(2, '0')

export const formatDuration = (ms: number | undefined) => {
  if (ms === undefined) {
    return '—'
  }
  const totalSeconds = Math.floor(Math.max(0, ms) / 1000)
  const days = Math.floor(totalSeconds / 86400)
  const hours = Math.floor((totalSeconds % 86400) / 3600)
  const minutes = Math.floor((totalSeconds % 3600) / 60)
  const seconds = totalSeconds % 60
  if (days > 0) {
    return `${days}d ${pad(hours)}h`
  }
  return `${pad(hours)}:${pad(minutes)}:${pad(seconds)}`
}

export const formatClock = (at: number) => format(at, 'HH:mm:ss')

export const formatEvent = (event: ConnectionEvent) =>
  `${formatClock(event.at)} ${event.level === 'info' ? '' : `[${event.level}] `}${event.message}`

export const truncate = (text: string, width: number) => {
  if (width <= 0) {
    return ''
  }
  return text.length <= width ? text : `${text.slice(0, Math.max(0, width - 1))}…`
}

const bars = ['▁', '▂', '▃', '▄', '▅', '▆', '▇', '█']

/** One bar per value, scaled to the largest value in the series. */
export const sparkline = (values: readonly number[]) => {
  const peak = Math.max(0, ...values)
  if (peak === 0) {
    return bars[0].repeat(values.length)
  }
  return values
    .map((value) => bars[Math.min(bars.length - 1, Math.floor((Math.max(0, value) / peak) * (bars.length - 1)))])
    .join('')
}

/** Plain-text report for the `status` command; `*` marks the session the dashboard would show. */
export const formatScanResult = (result: ScanResult) => {
  const lines = result.warnings.map((warning) => `warning: ${warning.message}`)
  if (result.sessions.length === 0) {
    return [...lines, 'No active tunnel'].join('\n')
  }
  for (const session of result.sessions) {
    const marker = session === result.active ? '*' : ' '
    const name = session.profile ?? 'unknown profile'
    lines.push(`${marker} ${protocolLabel(session.protocol)} ${name} ${session.interfaceId ?? '-'}`)
  }
  for (const [key, value] of Object.entries(result.protocolDetails)) {
    lines.push(`    ${key}: ${value}`)
  }
  return lines.join('\n')
}
