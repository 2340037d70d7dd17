/**
 * One keepalive session
 *
 * Polls for commands every tick and pulses on its own cadence: the pulse
 * schedule is anchored to the session start, not to the tick. A pulse runs
 * in the background so a slow sink never delays Q/E; at most one is in flight.
 */

import { addMinutes } from 'date-fns'
import { createLogger } from '../shared/logger.js'
import { getErrorMessage } from '../shared/assertError.js'
import { systemClock, type Clock } from '../shared/clock.js'
import { secureRandom, type RandomSource } from '../shared/random.js'
import { drawDurationMinutes, type DurationRange } from '../schedule/durationRange.js'
import type { InputPoller, KeepaliveSink } from '../keepalive/types.js'
import type { KeepaliveObserver } from './events.js'
import { computeProgress } from './progress.js'

const logger = createLogger('session')

export const SESSION_TICK_MS = 250

const SESSION_COMMANDS: ReadonlySet<'Q' | 'E'> = new Set(['Q', 'E'])

export type SessionOutcome = 'completed' | 'ended-early' | 'quit'

export interface Session {
  readonly start: Date
  readonly durationMinutes: number
  readonly end: Date
  readonly intervalSeconds: number
}

export interface RunSessionOptions {
  duration: DurationRange
  intervalSeconds: number
  sink: KeepaliveSink
  poller: InputPoller
  observer: KeepaliveObserver
  clock?: Clock
  random?: RandomSource
  tickMs?: number
}

export function createSession(
  start: Date,
  duration: DurationRange,
  intervalSeconds: number,
  random: RandomSource = secureRandom
): Session {
  const durationMinutes = drawDurationMinutes(duration, random)
  return {
    start,
    durationMinutes,
    end: addMinutes(start, durationMinutes),
    intervalSeconds,
  }
}

/**
 * Next pulse slot after `due`. When the loop fell more than one interval
 * behind (e.g. the machine was suspended) skip ahead to the first slot after
 * `now` rather than bursting.
 */
export function advancePulseDue(due: number, intervalMs: number, now: number): number {
  const next = due + intervalMs
  if (next > now) return next
  const missed = Math.floor((now - due) / intervalMs)
  return due + (missed + 1) * intervalMs
}

async function deliverPulse(sink: KeepaliveSink, observer: KeepaliveObserver): Promise<void> {
  try {
    await sink.pulse()
  } catch (error) {
    const message = getErrorMessage(error)
    logger.debug(`Pulse via ${sink.name} failed: ${message}`)
    observer({ type: 'pulse-failed', message })
  }
}

export async function runSession(options: RunSessionOptions): Promise<SessionOutcome> {
  const {
    duration,
    intervalSeconds,
    sink,
    poller,
    observer,
    clock = systemClock,
    random = secureRandom,
    tickMs = SESSION_TICK_MS,
  } = options

  const session = createSession(clock.now(), duration, intervalSeconds, random)
  const endMs = session.end.getTime()
  const intervalMs = session.intervalSeconds * 1000

  observer({
    type: 'session-started',
    start: session.start,
    durationMinutes: session.durationMinutes,
    end: session.end,
  })

  let nextPulseDue = session.start.getTime()
  let outcome: SessionOutcome = 'completed'
  let inFlight: Promise<void> | null = null

  for (;;) {
    const now = clock.now()
    if (now.getTime() >= endMs) break

    const command = poller.tryReadCommand(SESSION_COMMANDS)
    if (command === 'Q') {
      observer({ type: 'quit-requested' })
      return 'quit'
    }
    if (command === 'E') {
      outcome = 'ended-early'
      break
    }

    if (now.getTime() >= nextPulseDue) {
      if (inFlight) {
        logger.debug(`Previous pulse via ${sink.name} still running, skipping this one`)
      } else {
        inFlight = deliverPulse(sink, observer).finally(() => {
          inFlight = null
        })
      }
      nextPulseDue = advancePulseDue(nextPulseDue, intervalMs, now.getTime())
    }

    observer({ type: 'progress', ...computeProgress(session.start, session.end, now) })

    await clock.sleep(Math.min(tickMs, endMs - now.getTime()))
  }

  observer({ type: 'session-ended', at: clock.now(), reason: outcome })
  return outcome
}
