/**
 * Daily start window
 *
 * A window never crosses midnight: end >= start on the same calendar day.
 */

import { set } from 'date-fns'
import { ConfigurationError } from '../shared/error.js'

export interface TimeOfDay {
  readonly hours: number
  readonly minutes: number
  readonly seconds: number
}

export interface TimeWindow {
  readonly start: TimeOfDay
  readonly end: TimeOfDay
}

const TIME_OF_DAY_PATTERN = /^(\d{1,2}):(\d{2})(?::(\d{2}))?$/

/** Parse `H:mm`, `HH:mm`, `H:mm:ss` or `HH:mm:ss` */
export function parseTimeOfDay(input: string): TimeOfDay {
  const text = input.trim()
  const match = text.match(TIME_OF_DAY_PATTERN)
  if (!match) {
    throw new ConfigurationError(
      `Invalid time "${input}". Use HH:MM or HH:MM:SS (e.g. 08:30)`
    )
  }

  const hours = parseInt(match[1]!, 10)
  const minutes = parseInt(match[2]!, 10)
  const seconds = match[3] === undefined ? 0 : parseInt(match[3], 10)

  if (hours > 23 || minutes > 59 || seconds > 59) {
    throw new ConfigurationError(`Time out of range: "${input}"`)
  }

  return Object.freeze({ hours, minutes, seconds })
}

export function secondsOfDay(time: TimeOfDay): number {
  return time.hours * 3600 + time.minutes * 60 + time.seconds
}

export function formatTimeOfDay(time: TimeOfDay): string {
  return [time.hours, time.minutes, time.seconds].map(n => n.toString().padStart(2, '0')).join(':')
}

export function createTimeWindow(start: TimeOfDay, end: TimeOfDay): TimeWindow {
  if (secondsOfDay(end) < secondsOfDay(start)) {
    throw new ConfigurationError(
      `Start window end (${formatTimeOfDay(end)}) must not be earlier than its start (${formatTimeOfDay(start)}); windows do not cross midnight`
    )
  }
  return Object.freeze({ start, end })
}

/** Anchor a time of day to the calendar day of `day` (local time) */
export function atTimeOfDay(day: Date, time: TimeOfDay): Date {
  return set(day, {
    hours: time.hours,
    minutes: time.minutes,
    seconds: time.seconds,
    milliseconds: 0,
  })
}

/** The window as absolute instants on the calendar day of `day` */
export function windowOn(day: Date, window: TimeWindow): { start: Date; end: Date } {
  return {
    start: atTimeOfDay(day, window.start),
    end: atTimeOfDay(day, window.end),
  }
}
