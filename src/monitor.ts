import type { MonitorConfig } from './config'
import { MonitorEngine } from './engine/engine'
import { LeakDetector } from './engine/leaks'
import { MetricSampler } from './engine/sampler'
import { SessionScanner } from './engine/scanner'
import { createDirectoryProfileStore } from './profiles/store'
import type { ProfileStore } from './profiles/store'
import { defaultDrivers } from './protocols'
import { runCommand } from './system/command'
import { createTunnelControl } from './system/control'
import { createCounterSource } from './system/counters'
import { createInterfaceInspector } from './system/interfaces'
import { createNetworkInfoProbe } from './system/networkInfo'
import { connectIPv6 } from './system/reachability'
import { createResolvConfReader } from './system/resolver'
import { createNameMapReader } from './system/wireguardNames'

export const createScanner = (
  config: MonitorConfig,
  platform: NodeJS.Platform = process.platform,
  store: ProfileStore = createDirectoryProfileStore(config.profilesDir),
) =>
  new SessionScanner({
    store,
    drivers: defaultDrivers,
    run: runCommand,
    readNameMap: createNameMapReader(),
    interfaces: createInterfaceInspector(platform, runCommand),
    timeoutMs: config.scanTimeoutMs,
  })

/** Wires the engine to the real host: sysfs or netstat, wg, ps, resolv.conf. */
export const createMonitor = (config: MonitorConfig, platform: NodeJS.Platform = process.platform) => {
  const store = createDirectoryProfileStore(config.profilesDir)
  const counters = createCounterSource(platform, runCommand)
  return new MonitorEngine({
    settings: config,
    store,
    scanner: createScanner(config, platform, store),
    sampler: new MetricSampler(counters, { staleAfterMs: config.staleAfterMs, timeoutMs: config.counterTimeoutMs }),
    leaks: new LeakDetector({
      probe: connectIPv6,
      readResolver: createResolvConfReader(config.resolvConfPath),
      store,
      ipv6Target: config.ipv6Probe,
      ipv6TimeoutMs: config.ipv6TimeoutMs,
      dnsTimeoutMs: config.dnsTimeoutMs,
    }),
    control: createTunnelControl(runCommand, config.commandTimeoutMs),
    counters,
    network: config.networkInfo
      ? createNetworkInfoProbe({ url: config.ipInfoUrl, pingTarget: config.pingTarget, run: runCommand })
      : undefined,
  })
}
