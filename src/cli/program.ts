import { Command } from 'commander'
import type { KeepaliveConfigInput, RawConfigValues } from '../config/schema.js'
import type { KeepaliveCliOptions } from './runKeepalive.js'

export const VERSION = '0.1.0'

/** Options that map 1:1 onto config keys */
const CONFIG_OPTION_KEYS = [
  'startWindowStart',
  'startWindowEnd',
  'daysOfWeek',
  'minDurationMinutes',
  'maxDurationMinutes',
  'intervalSeconds',
  'progressTickSeconds',
  'pulse',
  'powerAssertion',
] as const satisfies ReadonlyArray<keyof KeepaliveConfigInput>

/**
 * Only options actually typed on the command line, so that config files and
 * env vars are not shadowed by commander's implicit defaults (e.g. --no-pulse
 * makes `pulse` default to true).
 */
export function pickCliFlags(command: Command): RawConfigValues {
  const values = command.opts<Record<string, unknown>>()
  const flags: RawConfigValues = {}
  for (const key of CONFIG_OPTION_KEYS) {
    if (command.getOptionValueSource(key) === 'cli') {
      flags[key] = values[key]
    }
  }
  return flags
}

export function createProgram(
  run: (options: KeepaliveCliOptions) => Promise<void>
): Command {
  const program = new Command()

  program
    .name('nodoze')
    .description(
      'Keep the machine awake: hold a power assertion and tap F13 during randomly scheduled sessions'
    )
    .version(VERSION)
    .option('-s, --start-window-start <time>', 'earliest daily session start (default: 08:30)')
    .option('-e, --start-window-end <time>', 'latest daily session start (default: 10:00)')
    .option('-d, --days-of-week <days>', 'allowed weekdays (default: Mon,Tue,Wed,Thu,Fri)')
    .option('--min-duration-minutes <n>', 'shortest session in minutes (default: 240)')
    .option('--max-duration-minutes <n>', 'longest session in minutes (default: 480)')
    .option('-i, --interval-seconds <n>', 'seconds between keypresses (default: 60)')
    .option('--progress-tick-seconds <n>', 'seconds between status line redraws (default: 1)')
    .option('--no-pulse', 'do not send keypresses, only hold the power assertion')
    .option('--no-power-assertion', 'do not hold the power assertion, only send keypresses')
    .option('-c, --config <path>', 'YAML config file (default: ~/.nodoze.yaml, ./.nodoze.yaml)')
    .option('-v, --verbose', 'debug logging')
    .addHelpText(
      'after',
      `
Controls (terminal must have focus):
  E  end the current session early
  Q  quit (also Ctrl+C)

Environment:
  NODOZE_START_WINDOW_START, NODOZE_START_WINDOW_END, NODOZE_DAYS_OF_WEEK,
  NODOZE_MIN_DURATION_MINUTES, NODOZE_MAX_DURATION_MINUTES, NODOZE_INTERVAL_SECONDS,
  NODOZE_PROGRESS_TICK_SECONDS`
    )
    .action(async (options: { config?: string; verbose?: boolean }, command: Command) => {
      await run({
        flags: pickCliFlags(command),
        config: options.config,
        verbose: options.verbose,
      })
    })

  return program
}
