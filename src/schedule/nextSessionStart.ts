/**
 * Next session start
 *
 * Walks calendar days forward from today and returns a uniformly random
 * instant inside the first allowed day's window that is not in the past.
 * The first feasible day wins; later days are never compared against it.
 */

import { addDays, addSeconds, max, startOfDay } from 'date-fns'
import { NoValidScheduleError } from '../shared/error.js'
import { createLogger } from '../shared/logger.js'
import { secureRandom, type RandomSource } from '../shared/random.js'
import { windowOn, type TimeWindow } from './timeWindow.js'
import { weekdayOf, type WeekdaySet } from './weekdays.js'

const logger = createLogger('scheduler')

/** Days scanned, today included */
export const SCHEDULE_HORIZON_DAYS = 14

/**
 * Random instant in [max(windowStart, earliest), windowEnd] at whole-second
 * offsets, or null when the clamped range is empty.
 */
export function randomInstantInWindow(
  earliest: Date,
  windowStart: Date,
  windowEnd: Date,
  random: RandomSource = secureRandom
): Date | null {
  const lower = max([windowStart, earliest])
  if (lower.getTime() > windowEnd.getTime()) return null

  const spanSeconds = Math.floor((windowEnd.getTime() - lower.getTime()) / 1000)
  return addSeconds(lower, random.int(0, spanSeconds))
}

export function nextSessionStart(
  now: Date,
  window: TimeWindow,
  weekdays: WeekdaySet,
  random: RandomSource = secureRandom
): Date {
  const today = startOfDay(now)

  for (let offset = 0; offset < SCHEDULE_HORIZON_DAYS; offset++) {
    const day = addDays(today, offset)
    if (!weekdays.has(weekdayOf(day))) continue

    const bounds = windowOn(day, window)
    // Today the past is off limits; later days are open from midnight
    const earliest = offset === 0 ? now : day
    const candidate = randomInstantInWindow(earliest, bounds.start, bounds.end, random)

    if (candidate) {
      logger.debug(`Next session start picked ${offset} day(s) ahead: ${candidate.toISOString()}`)
      return candidate
    }
  }

  throw new NoValidScheduleError(SCHEDULE_HORIZON_DAYS)
}
