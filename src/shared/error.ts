/**
 * Error taxonomy
 *
 * - ConfigurationError: fatal, raised while validating options at startup
 * - NoValidScheduleError: fatal, the scheduler exhausted its search horizon
 * - PulseDeliveryError: per pulse, reported and then ignored by the session loop
 */

import chalk from 'chalk'
import { getErrorMessage } from './assertError.js'

// ============ Categories ============

export type ErrorCategory =
  | 'CONFIG' // invalid or contradictory options
  | 'SCHEDULE' // scheduler invariant violated
  | 'PLATFORM' // OS primitive failed (keypress, power assertion)
  | 'UNKNOWN'

export type ErrorCode =
  | 'CONFIG_INVALID'
  | 'NO_VALID_SCHEDULE'
  | 'PULSE_DELIVERY_FAILED'
  | 'ERR_PERMISSION'
  | 'ERR_UNKNOWN'

// ============ Base error ============

export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly category: ErrorCategory = 'UNKNOWN',
    public readonly cause?: unknown,
    public readonly suggestion?: string
  ) {
    super(message)
    this.name = 'AppError'
  }

  /**
   * Render for the terminal
   */
  format(): string {
    const lines: string[] = []
    const colorFn = categoryColors[this.category]

    lines.push('')
    lines.push(chalk.red('✗') + ' ' + chalk.bold('Error') + ` [${colorFn(categoryLabels[this.category])}]`)
    lines.push('')
    lines.push(chalk.dim(`  code: ${this.code}`))
    lines.push(`  ${this.message}`)

    if (this.suggestion) {
      lines.push('')
      lines.push(chalk.cyan('  Try:'))
      lines.push(chalk.dim('    →') + ` ${this.suggestion}`)
    }

    lines.push('')
    return lines.join('\n')
  }

  static unknown(cause: unknown): AppError {
    return new AppError('ERR_UNKNOWN', getErrorMessage(cause), 'UNKNOWN', cause)
  }

  /**
   * Wrap a plain Error or string, classifying it by message where possible
   */
  static fromError(error: Error | string): AppError {
    const message = typeof error === 'string' ? error : error.message
    const cause = typeof error === 'string' ? undefined : error

    for (const pattern of errorPatterns) {
      if (pattern.pattern.test(message)) {
        return new AppError(pattern.code, message, pattern.category, cause, pattern.suggestion)
      }
    }

    return new AppError('ERR_UNKNOWN', message, 'UNKNOWN', cause, 'Re-run with --verbose for details')
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string, suggestion = 'Run nodoze --help to see the accepted formats') {
    super('CONFIG_INVALID', message, 'CONFIG', undefined, suggestion)
    this.name = 'ConfigurationError'
  }
}

export class NoValidScheduleError extends AppError {
  constructor(horizonDays: number) {
    super(
      'NO_VALID_SCHEDULE',
      `Could not find a valid next session start within ${horizonDays} days`,
      'SCHEDULE',
      undefined,
      'Check --days-of-week and the start window'
    )
    this.name = 'NoValidScheduleError'
  }
}

export class PulseDeliveryError extends AppError {
  constructor(message: string, cause?: unknown, suggestion?: string) {
    super('PULSE_DELIVERY_FAILED', message, 'PLATFORM', cause, suggestion)
    this.name = 'PulseDeliveryError'
  }
}

// ============ Message patterns ============

interface ErrorPattern {
  pattern: RegExp
  category: ErrorCategory
  code: ErrorCode
  suggestion: string
}

const errorPatterns: ErrorPattern[] = [
  {
    pattern: /EACCES|permission denied|EPERM|not allowed/i,
    category: 'PLATFORM',
    code: 'ERR_PERMISSION',
    suggestion: 'Grant the terminal the required OS permissions and retry',
  },
]

// ============ Output ============

const categoryLabels: Record<ErrorCategory, string> = {
  CONFIG: 'configuration',
  SCHEDULE: 'schedule',
  PLATFORM: 'platform',
  UNKNOWN: 'unknown',
}

const categoryColors: Record<ErrorCategory, (text: string) => string> = {
  CONFIG: chalk.yellow,
  SCHEDULE: chalk.magenta,
  PLATFORM: chalk.red,
  UNKNOWN: chalk.gray,
}

/**
 * Print any thrown value to stderr
 */
export function printError(error: unknown): void {
  if (error instanceof AppError) {
    console.error(error.format())
    return
  }
  const appError =
    error instanceof Error || typeof error === 'string'
      ? AppError.fromError(error)
      : AppError.unknown(error)
  console.error(appError.format())
}
