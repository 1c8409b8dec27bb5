import { useCallback, useEffect, useMemo, useState } from 'react'
import { Box, Text, useApp, useInput } from 'ink'
import { APP_NAME } from './constants'
import { formatBytes, formatDuration, formatEvent, formatRate, sparkline, truncate } from './format'
import { protocolLabel } from './protocols'
import type { ConnectionSnapshot, ConnectionState, EventLevel, LeakVerdict, Profile } from './types'
import { useSnapshot } from './ui/useSnapshot'
import type { SnapshotSource } from './ui/useSnapshot'

export type DashboardEngine = SnapshotSource & {
  listProfiles(): Promise<Profile[]>
  connect(profileName: string): Promise<void>
  disconnect(): Promise<void>
  reconnect(): Promise<void>
  checkLeaks(): Promise<void>
}

type AppProps = {
  engine: DashboardEngine
  onQuit?: () => void
  eventRows?: number
  width?: number
}

const profileRefreshMs = 5000

const stateLabel: Record<ConnectionState, string> = {
  disconnected: 'Disconnected',
  connecting: 'Connecting',
  connected: 'Connected',
  disconnecting: 'Disconnecting',
}

const stateColor: Record<ConnectionState, string> = {
  disconnected: 'gray',
  connecting: 'yellow',
  connected: 'green',
  disconnecting: 'yellow',
}

const eventColor: Record<EventLevel, string | undefined> = {
  info: undefined,
  warn: 'yellow',
  error: 'red',
}

const leakColor: Record<LeakVerdict['status'], string> = {
  unknown: 'gray',
  clear: 'green',
  leaking: 'red',
}

function Header({ snapshot }: { snapshot: ConnectionSnapshot }) {
  return (
    <Box gap={2}>
      <Text bold>{APP_NAME}</Text>
      <Text color={stateColor[snapshot.state]}>● {stateLabel[snapshot.state]}</Text>
      <Text>{snapshot.profile ?? (snapshot.state === 'disconnected' ? '—' : 'unknown profile')}</Text>
      {snapshot.interfaceId ? <Text dimColor>{snapshot.interfaceId}</Text> : null}
      <Text>up {formatDuration(snapshot.sessionAgeMs)}</Text>
      {snapshot.handshakeAgeMs !== undefined ? (
        <Text dimColor>handshake {formatDuration(snapshot.handshakeAgeMs)} ago</Text>
      ) : null}
    </Box>
  )
}

function Throughput({ snapshot, width }: { snapshot: ConnectionSnapshot; width: number }) {
  const { throughput, transfer, telemetry } = snapshot
  const history = snapshot.throughputHistory.slice(-width).map((point) => point.downBps + point.upBps)
  return (
    <Box flexDirection="column" marginTop={1}>
      <Box gap={2}>
        <Text>↓ {formatRate(throughput, 'down')}</Text>
        <Text>↑ {formatRate(throughput, 'up')}</Text>
        {transfer ? (
          <Text dimColor>
            total ↓ {formatBytes(transfer.rxBytes)} ↑ {formatBytes(transfer.txBytes)}
          </Text>
        ) : null}
        {telemetry.available ? null : <Text color="yellow">telemetry unavailable</Text>}
      </Box>
      <Text color="cyan">{history.length > 0 ? sparkline(history) : ' '}</Text>
    </Box>
  )
}

function Security({ snapshot }: { snapshot: ConnectionSnapshot }) {
  const { leaks, scanner, network } = snapshot
  return (
    <Box flexDirection="column" marginTop={1}>
      <Box gap={2}>
        <Text color={leakColor[leaks.ipv6.status]}>IPv6 {leaks.ipv6.status}</Text>
        <Text color={leakColor[leaks.dns.status]}>DNS {leaks.dns.status}</Text>
        <Text color={scanner.available ? 'green' : 'red'}>
          scanner {scanner.available ? 'ok' : `failing (${scanner.consecutiveFailures})`}
        </Text>
      </Box>
      <Box gap={2}>
        <Text dimColor>IP {network.publicIp ?? '—'}</Text>
        {network.isp ? <Text dimColor>{network.isp}</Text> : null}
        <Text dimColor>latency {network.latencyMs !== undefined ? `${network.latencyMs} ms` : '—'}</Text>
      </Box>
    </Box>
  )
}

function App({ engine, onQuit, eventRows = 8, width = 60 }: AppProps) {
  const snapshot = useSnapshot(engine)
  const { exit } = useApp()
  const [profiles, setProfiles] = useState<Profile[]>([])
  const [selected, setSelected] = useState(0)
  const [errorMessage, setErrorMessage] = useState<string | null>(null)
  const [isBusy, setIsBusy] = useState(false)

  const selectedProfile: Profile | undefined = profiles[Math.min(selected, profiles.length - 1)]

  const loadProfiles = useCallback(async () => {
    try {
      const nextProfiles = await engine.listProfiles()
      setProfiles(nextProfiles)
      setErrorMessage(null)
    } catch (error) {
      setErrorMessage(error instanceof Error ? error.message : 'Failed to load profiles')
    }
  }, [engine])

  useEffect(() => {
    void loadProfiles()
    const intervalId = setInterval(() => void loadProfiles(), profileRefreshMs)
    return () => clearInterval(intervalId)
  }, [loadProfiles])

  const runAction = useCallback(async (action: () => Promise<void>, fallback: string) => {
    try {
      setIsBusy(true)
      setErrorMessage(null)
      await action()
    } catch (error) {
      setErrorMessage(error instanceof Error ? error.message : fallback)
    } finally {
      setIsBusy(false)
    }
  }, [])

  const handleToggle = useCallback(async () => {
    if (!selectedProfile) {
      setErrorMessage('No profiles found')
      return
    }
    if (snapshot.state === 'connected' && snapshot.profile === selectedProfile.name) {
      await runAction(() => engine.disconnect(), 'Failed to disconnect')
      return
    }
    await runAction(() => engine.connect(selectedProfile.name), 'Failed to connect')
  }, [engine, runAction, selectedProfile, snapshot.profile, snapshot.state])

  useInput((input, key) => {
    if (input === 'q') {
      if (onQuit) {
        onQuit()
      } else {
        exit()
      }
      return
    }
    if (key.upArrow || input === 'k') {
      setSelected((prev) => Math.max(0, prev - 1))
      return
    }
    if (key.downArrow || input === 'j') {
      setSelected((prev) => Math.min(Math.max(0, profiles.length - 1), prev + 1))
      return
    }
    if (isBusy) {
      return
    }
    if (key.return || input === 'c') {
      void handleToggle()
    } else if (input === 'd') {
      void runAction(() => engine.disconnect(), 'Failed to disconnect')
    } else if (input === 'r') {
      void runAction(() => engine.reconnect(), 'Failed to reconnect')
    } else if (input === 't') {
      void runAction(() => engine.checkLeaks(), 'Failed to run leak checks')
    }
  })

  const events = useMemo(() => snapshot.events.slice(-eventRows), [eventRows, snapshot.events])

  return (
    <Box flexDirection="column">
      <Header snapshot={snapshot} />
      {errorMessage ? <Text color="red">{errorMessage}</Text> : null}
      <Throughput snapshot={snapshot} width={width} />
      <Security snapshot={snapshot} />

      <Box flexDirection="column" marginTop={1}>
        <Text bold>Profiles ({profiles.length})</Text>
        {profiles.length === 0 ? <Text dimColor>No profiles found</Text> : null}
        {profiles.map((profile) => {
          const isSelected = profile === selectedProfile
          const isActive = profile.name === snapshot.profile && snapshot.state !== 'disconnected'
          return (
            <Text key={profile.name} inverse={isSelected} color={isActive ? stateColor[snapshot.state] : undefined}>
              {isSelected ? '>' : ' '} {profile.name} ({protocolLabel(profile.protocol)})
              {profile.endpoint ? ` ${profile.endpoint}` : ''}
            </Text>
          )
        })}
      </Box>

      <Box flexDirection="column" marginTop={1}>
        <Text bold>Events</Text>
        {events.map((event, index) => (
          <Text key={`${event.at}-${index}`} color={eventColor[event.level]}>
            {truncate(formatEvent(event), width + 20)}
          </Text>
        ))}
      </Box>

      <Box marginTop={1}>
        <Text dimColor>↑/↓ select · enter connect/switch/disconnect · d disconnect · r reconnect · t leak test · q quit</Text>
      </Box>
    </Box>
  )
}

export default App
