/**
 * Diagnostic logger
 *
 * - levels: debug/info/warn/error/silent
 * - `HH:mm:ss LVL [scope] message`, coloured with chalk
 * - level from env (LOG_LEVEL / DEBUG=1 / SILENT=1), silent under NODE_ENV=test
 *
 * User-facing CLI output lives in cli/output.ts and cli/renderer.ts.
 */

import chalk from 'chalk'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

type OutputLevel = Exclude<LogLevel, 'silent'>

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
}

const LEVEL_COLORS: Record<OutputLevel, (s: string) => string> = {
  debug: chalk.gray,
  info: chalk.blue,
  warn: chalk.yellow,
  error: chalk.red,
}

const LEVEL_LABELS: Record<OutputLevel, string> = {
  debug: 'DBG',
  info: 'INF',
  warn: 'WRN',
  error: 'ERR',
}

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_PRIORITY
}

function initLogLevel(): LogLevel {
  if (process.env.NODE_ENV === 'test') return 'silent'
  if (process.env.SILENT === '1') return 'silent'
  if (process.env.DEBUG === '1') return 'debug'
  const fromEnv = process.env.LOG_LEVEL
  if (fromEnv && isLogLevel(fromEnv)) return fromEnv
  return 'info'
}

let currentLevel: LogLevel = initLogLevel()

export function setLogLevel(level: LogLevel): void {
  currentLevel = level
}

function shouldLog(level: OutputLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[currentLevel]
}

function formatClock(): string {
  const now = new Date()
  return chalk.dim(
    `${now.getHours().toString().padStart(2, '0')}:${now.getMinutes().toString().padStart(2, '0')}:${now.getSeconds().toString().padStart(2, '0')}`
  )
}

function formatMessage(level: OutputLevel, scope: string, message: string): string {
  const scopeStr = scope ? ` ${chalk.cyan(`[${scope}]`)}` : ''
  return `${formatClock()} ${LEVEL_COLORS[level](LEVEL_LABELS[level])}${scopeStr} ${message}`
}

export interface Logger {
  debug(message: string, ...args: unknown[]): void
  info(message: string, ...args: unknown[]): void
  warn(message: string, ...args: unknown[]): void
  error(message: string, ...args: unknown[]): void
}

export function createLogger(scope: string = ''): Logger {
  function logWithLevel(level: OutputLevel, message: string, args: unknown[]): void {
    if (!shouldLog(level)) return
    const output = formatMessage(level, scope, message)
    const logFn = level === 'error' ? console.error : level === 'warn' ? console.warn : console.log
    logFn(output, ...args)
  }

  return {
    debug(message: string, ...args: unknown[]) {
      logWithLevel('debug', message, args)
    },
    info(message: string, ...args: unknown[]) {
      logWithLevel('info', message, args)
    },
    warn(message: string, ...args: unknown[]) {
      logWithLevel('warn', message, args)
    },
    error(message: string, ...args: unknown[]) {
      logWithLevel('error', message, args)
    },
  }
}
