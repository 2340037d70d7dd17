/**
 * Startup wiring for the main command
 *
 * validate → acquire power assertion → schedule loop → release.
 * Resolves to the process exit code: 0 on quit, 1 on any fatal error.
 */

import {
  createLogger,
  getErrorMessage,
  printError,
  setLogLevel,
  type Clock,
  type RandomSource,
} from '../shared/index.js'
import { loadSettings, type KeepaliveSettings, type RawConfigValues } from '../config/index.js'
import { formatTimeOfDay, formatWeekdays } from '../schedule/index.js'
import {
  createKeepaliveSink,
  createTerminalPoller,
  type KeepaliveSink,
  type TerminalPoller,
} from '../keepalive/index.js'
import { runScheduleLoop, type KeepaliveObserver } from '../session/index.js'
import { createConsoleRenderer } from './renderer.js'
import { info, list } from './output.js'

const logger = createLogger('cli')

export interface KeepaliveCliOptions {
  flags: RawConfigValues
  config?: string
  verbose?: boolean
}

export interface KeepaliveRuntime {
  cwd?: string
  env?: NodeJS.ProcessEnv
  createSink?: (settings: KeepaliveSettings) => KeepaliveSink
  createPoller?: () => TerminalPoller
  createObserver?: (poller: TerminalPoller, settings: KeepaliveSettings) => KeepaliveObserver
  clock?: Clock
  random?: RandomSource
  /** Install SIGINT/SIGTERM handlers (off in tests) */
  handleSignals?: boolean
}

function printSettings(settings: KeepaliveSettings, sink: KeepaliveSink): void {
  info(`nodoze running on ${sink.name}`)
  list([
    {
      label: 'Start window',
      value: `${formatTimeOfDay(settings.window.start)} - ${formatTimeOfDay(settings.window.end)}`,
    },
    { label: 'Days', value: formatWeekdays(settings.weekdays) },
    { label: 'Duration', value: `${settings.duration.min}-${settings.duration.max} minutes` },
    { label: 'Keypress', value: settings.pulse ? `every ${settings.intervalSeconds}s` : 'off' },
    { label: 'Power assertion', value: settings.powerAssertion ? 'on' : 'off' },
  ])
}

export async function runKeepalive(
  options: KeepaliveCliOptions,
  runtime: KeepaliveRuntime = {}
): Promise<number> {
  if (options.verbose) setLogLevel('debug')

  const loaded = await loadSettings({
    cwd: runtime.cwd,
    env: runtime.env,
    configPath: options.config,
    flags: options.flags,
  })
  if (!loaded.ok) {
    printError(loaded.error)
    return 1
  }
  const settings = loaded.value

  const sink = (runtime.createSink ?? defaultSink)(settings)
  await sink.open()
  printSettings(settings, sink)

  const poller = (runtime.createPoller ?? createTerminalPoller)()
  const observer =
    runtime.createObserver?.(poller, settings) ??
    createConsoleRenderer(process.stdout, {
      showControls: poller.interactive,
      progressTickSeconds: settings.progressTickSeconds,
    })

  const shutdown = (signal: NodeJS.Signals) => {
    logger.debug(`Received ${signal}`)
    observer({ type: 'quit-requested' })
    poller.close()
    sink
      .close()
      .catch(printError)
      .finally(() => process.exit(0))
  }
  if (runtime.handleSignals ?? true) {
    process.once('SIGINT', shutdown)
    process.once('SIGTERM', shutdown)
  }

  try {
    await runScheduleLoop(settings, {
      sink,
      poller,
      observer,
      clock: runtime.clock,
      random: runtime.random,
    })
    return 0
  } catch (error) {
    observer({ type: 'fatal-error', message: getErrorMessage(error) })
    printError(error)
    return 1
  } finally {
    process.removeListener('SIGINT', shutdown)
    process.removeListener('SIGTERM', shutdown)
    poller.close()
    await sink.close()
  }
}

function defaultSink(settings: KeepaliveSettings): KeepaliveSink {
  return createKeepaliveSink({
    pulse: settings.pulse,
    powerAssertion: settings.powerAssertion,
  })
}
