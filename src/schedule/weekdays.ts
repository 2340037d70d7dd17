import { getDay } from 'date-fns'
import { ConfigurationError } from '../shared/error.js'

/** Indexed like Date#getDay(): 0 = Sunday */
export const WEEKDAYS = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'] as const

export type Weekday = (typeof WEEKDAYS)[number]

export type WeekdaySet = ReadonlySet<Weekday>

export const DEFAULT_WEEKDAYS = 'Mon,Tue,Wed,Thu,Fri'

const BY_PREFIX = new Map<string, Weekday>(WEEKDAYS.map(day => [day.toLowerCase(), day]))

/** `"monday"`, `"MON"` and `" Mon "` all map to `Mon`; anything else is `undefined` */
export function normalizeWeekday(token: string): Weekday | undefined {
  return BY_PREFIX.get(token.trim().toLowerCase().slice(0, 3))
}

/**
 * Normalize a comma-separated list (or an array) of weekday names.
 * Unknown tokens are dropped; an empty result is a configuration error.
 */
export function normalizeWeekdays(input: string | readonly string[]): WeekdaySet {
  const tokens = typeof input === 'string' ? input.split(',') : input
  const days = new Set<Weekday>()

  for (const token of tokens) {
    const day = normalizeWeekday(token)
    if (day) days.add(day)
  }

  if (days.size === 0) {
    throw new ConfigurationError(
      'Days of week is empty or invalid',
      'Use a comma-separated list such as Mon,Tue,Wed,Thu,Fri'
    )
  }
  return days
}

export function weekdayOf(date: Date): Weekday {
  const day = WEEKDAYS[getDay(date)]
  if (day === undefined) throw new RangeError(`Invalid date: ${String(date)}`)
  return day
}

/** Calendar order, Monday first */
export function formatWeekdays(days: WeekdaySet): string {
  const order: Weekday[] = ['Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat', 'Sun']
  return order.filter(day => days.has(day)).join(',')
}
