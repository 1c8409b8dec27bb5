import { readFile } from 'node:fs/promises'
import { homedir } from 'node:os'
import { join } from 'node:path'
import { z } from 'zod'
import {
  APP_NAME,
  IP_INFO_URL,
  IPV6_PROBE_HOST,
  IPV6_PROBE_PORT,
  PING_TARGET,
  RESOLV_CONF_PATH,
} from './constants'
import { ConfigError, describeError, errorCode } from './errors'

const interval = (fallback: number) => z.number().int().positive().default(fallback)

export const configSchema = z
  .object({
    profilesDir: z.string().min(1).default(join(homedir(), '.config', APP_NAME, 'profiles')),
    scanIntervalMs: interval(1000),
    sampleIntervalMs: interval(1000),
    leakIntervalMs: interval(15000),
    networkIntervalMs: interval(15000),
    scanTimeoutMs: interval(2000),
    counterTimeoutMs: interval(1000),
    ipv6TimeoutMs: interval(3000),
    dnsTimeoutMs: interval(100),
    networkTimeoutMs: interval(3000),
    staleAfterMs: interval(5000),
    connectTimeoutMs: interval(30000),
    commandTimeoutMs: interval(15000),
    disconnectDebounceScans: interval(2),
    scannerFailureThreshold: interval(5),
    eventLogCap: interval(200),
    resolvConfPath: z.string().min(1).default(RESOLV_CONF_PATH),
    ipv6Probe: z
      .object({
        host: z.string().min(1).default(IPV6_PROBE_HOST),
        port: z.number().int().min(1).max(65535).default(IPV6_PROBE_PORT),
      })
      .default({}),
    ipInfoUrl: z.string().url().default(IP_INFO_URL),
    pingTarget: z.string().min(1).default(PING_TARGET),
    networkInfo: z.boolean().default(true),
    logFile: z.string().min(1).optional(),
  })
  .strict()

export type MonitorConfig = z.infer<typeof configSchema>
export type ConfigInput = z.input<typeof configSchema>

export const defaultConfigPath = () => join(homedir(), '.config', APP_NAME, 'config.json')

export const parseConfig = (input: unknown): MonitorConfig => {
  const result = configSchema.safeParse(input)
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    throw new ConfigError(`Invalid configuration: ${issues}`)
  }
  return result.data
}

const readConfigFile = async (path: string, required: boolean): Promise<Record<string, unknown>> => {
  let text: string
  try {
    text = await readFile(path, 'utf8')
  } catch (error) {
    if (!required && errorCode(error) === 'ENOENT') {
      return {}
    }
    throw new ConfigError(`Cannot read config ${path}: ${describeError(error, 'read failed')}`, {
      cause: error,
    })
  }
  let parsed: unknown
  try {
    parsed = JSON.parse(text)
  } catch (error) {
    throw new ConfigError(`Config ${path} is not valid JSON: ${describeError(error, 'parse failed')}`, {
      cause: error,
    })
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError(`Config ${path} must contain a JSON object`)
  }
  return Object.fromEntries(Object.entries(parsed))
}

const envNumber = (value: string | undefined) => {
  if (value === undefined || value.trim() === '') {
    return undefined
  }
  const parsed = Number(value)
  return Number.isNaN(parsed) ? value : parsed
}

/** TUNNELSCOPE_* variables, applied over the config file. */
export const configFromEnv = (env: NodeJS.ProcessEnv): Record<string, unknown> => {
  const overrides: Record<string, unknown> = {
    profilesDir: env.TUNNELSCOPE_PROFILES_DIR,
    scanIntervalMs: envNumber(env.TUNNELSCOPE_SCAN_INTERVAL_MS),
    sampleIntervalMs: envNumber(env.TUNNELSCOPE_SAMPLE_INTERVAL_MS),
    leakIntervalMs: envNumber(env.TUNNELSCOPE_LEAK_INTERVAL_MS),
    resolvConfPath: env.TUNNELSCOPE_RESOLV_CONF,
    logFile: env.TUNNELSCOPE_LOG_FILE,
  }
  return Object.fromEntries(Object.entries(overrides).filter(([, value]) => value !== undefined))
}

export type LoadConfigOptions = {
  path?: string
  env?: NodeJS.ProcessEnv
  overrides?: ConfigInput
}

export const loadConfig = async ({
  path,
  env = process.env,
  overrides = {},
}: LoadConfigOptions = {}): Promise<MonitorConfig> => {
  const fromFile = await readConfigFile(path ?? defaultConfigPath(), path !== undefined)
  return parseConfig({ ...fromFile, ...configFromEnv(env), ...overrides })
}
