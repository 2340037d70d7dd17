/**
 * @entry Scheduling primitives
 *
 * - TimeWindow: parseTimeOfDay/createTimeWindow/windowOn
 * - WeekdaySet: normalizeWeekdays/weekdayOf
 * - DurationRange: createDurationRange/drawDurationMinutes
 * - nextSessionStart: next eligible session start
 */

export {
  type TimeOfDay,
  type TimeWindow,
  parseTimeOfDay,
  createTimeWindow,
  formatTimeOfDay,
  secondsOfDay,
  atTimeOfDay,
  windowOn,
} from './timeWindow.js'

export {
  type Weekday,
  type WeekdaySet,
  WEEKDAYS,
  DEFAULT_WEEKDAYS,
  normalizeWeekday,
  normalizeWeekdays,
  weekdayOf,
  formatWeekdays,
} from './weekdays.js'

export { type DurationRange, createDurationRange, drawDurationMinutes } from './durationRange.js'

export { SCHEDULE_HORIZON_DAYS, nextSessionStart, randomInstantInWindow } from './nextSessionStart.js'
