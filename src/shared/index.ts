/**
 * @entry Shared infrastructure
 *
 * No domain logic here:
 * - Result<T,E>: ok/err/unwrap
 * - AppError and its subclasses, printError
 * - Logger: createLogger/setLogLevel
 * - Clock and RandomSource, injected into the loops
 * - Time formatting: formatTimestamp/formatCountdown
 */

export { type Result, ok, err, unwrap } from './result.js'

export {
  type ErrorCode,
  type ErrorCategory,
  AppError,
  ConfigurationError,
  NoValidScheduleError,
  PulseDeliveryError,
  printError,
} from './error.js'

export { getErrorMessage } from './assertError.js'

export { type LogLevel, type Logger, createLogger, setLogLevel } from './logger.js'

export { type Clock, systemClock } from './clock.js'
export { type RandomSource, secureRandom } from './random.js'

export { formatTimestamp, formatCountdown } from './formatTime.js'
