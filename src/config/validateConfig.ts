/**
 * Startup validation
 *
 * Pure: the same input always yields the same settings or the same error.
 */

import { ConfigurationError } from '../shared/error.js'
import { ok, err, type Result } from '../shared/result.js'
import { createTimeWindow, parseTimeOfDay, type TimeWindow } from '../schedule/timeWindow.js'
import { normalizeWeekdays, type WeekdaySet } from '../schedule/weekdays.js'
import { createDurationRange, isPositiveInteger, type DurationRange } from '../schedule/durationRange.js'
import { keepaliveConfigSchema } from './schema.js'

export const MAX_INTERVAL_SECONDS = 24 * 60 * 60

export interface KeepaliveSettings {
  window: TimeWindow
  weekdays: WeekdaySet
  duration: DurationRange
  intervalSeconds: number
  pulse: boolean
  powerAssertion: boolean
  /** Minimum seconds between status line redraws */
  progressTickSeconds: number
}

function buildSettings(raw: unknown): KeepaliveSettings {
  const parsed = keepaliveConfigSchema.safeParse(raw)
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    throw new ConfigurationError(`Invalid configuration: ${details}`)
  }
  const config = parsed.data

  const window = createTimeWindow(
    parseTimeOfDay(config.startWindowStart),
    parseTimeOfDay(config.startWindowEnd)
  )
  const weekdays = normalizeWeekdays(config.daysOfWeek)
  const duration = createDurationRange(config.minDurationMinutes, config.maxDurationMinutes)

  if (!isPositiveInteger(config.intervalSeconds)) {
    throw new ConfigurationError(
      `Interval seconds must be a positive integer (got ${config.intervalSeconds})`
    )
  }
  if (config.intervalSeconds > MAX_INTERVAL_SECONDS) {
    throw new ConfigurationError(
      `Interval seconds must be at most ${MAX_INTERVAL_SECONDS} (got ${config.intervalSeconds})`
    )
  }
  if (!isPositiveInteger(config.progressTickSeconds)) {
    throw new ConfigurationError(
      `Progress tick seconds must be a positive integer (got ${config.progressTickSeconds})`
    )
  }

  return {
    window,
    weekdays,
    duration,
    intervalSeconds: config.intervalSeconds,
    pulse: config.pulse,
    powerAssertion: config.powerAssertion,
    progressTickSeconds: config.progressTickSeconds,
  }
}

export function validateConfig(raw: unknown): Result<KeepaliveSettings, ConfigurationError> {
  try {
    return ok(buildSettings(raw))
  } catch (error) {
    if (error instanceof ConfigurationError) return err(error)
    throw error
  }
}
