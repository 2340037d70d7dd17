/**
 * @entry Session and wait loops
 */

export {
  type KeepaliveEvent,
  type KeepaliveEventType,
  type KeepaliveObserver,
  type SessionEndReason,
} from './events.js'
export { type SessionProgress, computeProgress, secondsUntil } from './progress.js'
export {
  type Session,
  type SessionOutcome,
  type RunSessionOptions,
  SESSION_TICK_MS,
  createSession,
  advancePulseDue,
  runSession,
} from './runSession.js'
export { type WaitOutcome, type WaitUntilOptions, WAIT_TICK_MS, waitUntil } from './waitUntil.js'
export { type ScheduleLoopDeps, runScheduleLoop } from './runScheduleLoop.js'
