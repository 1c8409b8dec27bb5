import { createWriteStream } from 'node:fs'
import { parseArgs } from 'node:util'
import { render } from 'ink'
import App from './App'
import { loadConfig } from './config'
import type { ConfigInput, MonitorConfig } from './config'
import { APP_NAME } from './constants'
import type { MonitorEngine } from './engine/engine'
import { describeError, StartupError } from './errors'
import { formatEvent, formatScanResult } from './format'
import { createMonitor, createScanner } from './monitor'

const usage = `Usage: ${APP_NAME} [status] [--config path] [--profiles dir] [--log-file path] [--interval ms]

  status            print the active tunnel once and exit
  --config path     JSON config file (default ~/.config/${APP_NAME}/config.json)
  --profiles dir    directory of .conf and .ovpn profiles
  --log-file path   append every event to this file
  --interval ms     scan and sample interval`

const cliOptions = {
  config: { type: 'string' },
  profiles: { type: 'string' },
  'log-file': { type: 'string' },
  interval: { type: 'string' },
  help: { type: 'boolean', short: 'h' },
} as const

const readArgs = (argv: string[]) => {
  try {
    return parseArgs({ args: argv, allowPositionals: true, options: cliOptions })
  } catch (error) {
    throw new StartupError(`${describeError(error, 'invalid arguments')}\n\n${usage}`, { cause: error })
  }
}

const parseCli = (argv: string[]) => {
  const { values, positionals } = readArgs(argv)
  const overrides: ConfigInput = {}
  if (values.profiles !== undefined) {
    overrides.profilesDir = values.profiles
  }
  if (values['log-file'] !== undefined) {
    overrides.logFile = values['log-file']
  }
  if (values.interval !== undefined) {
    const interval = Number(values.interval)
    overrides.scanIntervalMs = interval
    overrides.sampleIntervalMs = interval
  }
  return { command: positionals[0], help: values.help === true, configPath: values.config, overrides }
}

const printStatus = async (config: MonitorConfig) => {
  const result = await createScanner(config).scan()
  console.log(formatScanResult(result))
}

const writeLog = async (engine: MonitorEngine, path: string) => {
  const stream = createWriteStream(path, { flags: 'a' })
  stream.once('error', (error) => {
    console.error(`${APP_NAME}: cannot write ${path}: ${error.message}`)
  })
  try {
    for await (const event of engine.subscribeEvents()) {
      stream.write(`${formatEvent(event)}\n`)
    }
  } finally {
    await new Promise<void>((resolve) => stream.end(() => resolve()))
  }
}

const runDashboard = async (config: MonitorConfig) => {
  const engine = createMonitor(config)
  await engine.preflight()
  const logging = config.logFile ? writeLog(engine, config.logFile) : Promise.resolve()
  engine.start()
  const app = render(<App engine={engine} />)
  try {
    await app.waitUntilExit()
  } finally {
    await engine.stop()
    await logging
  }
}

const main = async (argv: string[]) => {
  const cli = parseCli(argv)
  if (cli.help) {
    console.log(usage)
    return 0
  }
  const config = await loadConfig({ path: cli.configPath, overrides: cli.overrides })
  switch (cli.command) {
    case undefined:
      await runDashboard(config)
      return 0
    case 'status':
      await printStatus(config)
      return 0
    default:
      console.error(`${APP_NAME}: unknown command ${cli.command}\n\n${usage}`)
      return 2
  }
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code
  },
  (error: unknown) => {
    const prefix = error instanceof StartupError ? `${APP_NAME}` : `${APP_NAME}: unexpected error`
    console.error(`${prefix}: ${describeError(error, 'failed to start')}`)
    process.exitCode = 1
  },
)
