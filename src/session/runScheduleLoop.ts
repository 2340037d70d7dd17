/**
 * Top-level driver
 *
 * One session right away, then forever: pick the next start, count down to
 * it, run a session. Returns only when the user quits; scheduler failures
 * propagate as fatal errors.
 */

import { createLogger } from '../shared/logger.js'
import { systemClock, type Clock } from '../shared/clock.js'
import { secureRandom, type RandomSource } from '../shared/random.js'
import { nextSessionStart } from '../schedule/nextSessionStart.js'
import type { KeepaliveSettings } from '../config/validateConfig.js'
import type { InputPoller, KeepaliveSink } from '../keepalive/types.js'
import type { KeepaliveObserver } from './events.js'
import { runSession, SESSION_TICK_MS } from './runSession.js'
import { waitUntil, WAIT_TICK_MS } from './waitUntil.js'

const logger = createLogger('loop')

export interface ScheduleLoopDeps {
  sink: KeepaliveSink
  poller: InputPoller
  observer: KeepaliveObserver
  clock?: Clock
  random?: RandomSource
  sessionTickMs?: number
  waitTickMs?: number
}

export async function runScheduleLoop(
  settings: KeepaliveSettings,
  deps: ScheduleLoopDeps
): Promise<'quit'> {
  const {
    sink,
    poller,
    observer,
    clock = systemClock,
    random = secureRandom,
    sessionTickMs = SESSION_TICK_MS,
    waitTickMs = WAIT_TICK_MS,
  } = deps

  const session = () =>
    runSession({
      duration: settings.duration,
      intervalSeconds: settings.intervalSeconds,
      sink,
      poller,
      observer,
      clock,
      random,
      tickMs: sessionTickMs,
    })

  logger.debug('Starting immediate session')
  if ((await session()) === 'quit') return 'quit'

  for (;;) {
    const start = nextSessionStart(clock.now(), settings.window, settings.weekdays, random)
    observer({ type: 'session-scheduled', start })

    const waited = await waitUntil(start, { poller, observer, clock, tickMs: waitTickMs })
    if (waited === 'quit') return 'quit'

    if ((await session()) === 'quit') return 'quit'
  }
}
