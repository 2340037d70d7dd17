import { ConfigurationError } from '../shared/error.js'
import { secureRandom, type RandomSource } from '../shared/random.js'

/** Session length bounds in whole minutes */
export interface DurationRange {
  readonly min: number
  readonly max: number
}

/** One week. Keeps session ends representable and draws inside randomInt's range. */
export const MAX_SESSION_MINUTES = 7 * 24 * 60

export function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0
}

export function createDurationRange(min: number, max: number): DurationRange {
  if (!isPositiveInteger(min) || !isPositiveInteger(max)) {
    throw new ConfigurationError(
      `Duration minutes must be positive integers (got min=${min}, max=${max})`
    )
  }
  if (min > MAX_SESSION_MINUTES || max > MAX_SESSION_MINUTES) {
    throw new ConfigurationError(
      `Duration minutes must be at most ${MAX_SESSION_MINUTES} (got min=${min}, max=${max})`
    )
  }
  if (max < min) {
    throw new ConfigurationError(
      `Max duration (${max}) must be >= min duration (${min})`
    )
  }
  return Object.freeze({ min, max })
}

/** Uniform draw from [min, max] inclusive */
export function drawDurationMinutes(
  range: DurationRange,
  random: RandomSource = secureRandom
): number {
  return random.int(range.min, range.max)
}
