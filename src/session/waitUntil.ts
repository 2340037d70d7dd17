import { systemClock, type Clock } from '../shared/clock.js'
import type { InputPoller } from '../keepalive/types.js'
import type { KeepaliveObserver } from './events.js'
import { secondsUntil } from './progress.js'

/** Idle responsiveness is less critical than in-session */
export const WAIT_TICK_MS = 1000

const WAIT_COMMANDS: ReadonlySet<'Q'> = new Set(['Q'])

export type WaitOutcome = 'reached' | 'quit'

export interface WaitUntilOptions {
  poller: InputPoller
  observer: KeepaliveObserver
  clock?: Clock
  tickMs?: number
}

/** Count down to `target`, returning early only on quit */
export async function waitUntil(target: Date, options: WaitUntilOptions): Promise<WaitOutcome> {
  const { poller, observer, clock = systemClock, tickMs = WAIT_TICK_MS } = options
  const targetMs = target.getTime()

  for (;;) {
    const now = clock.now()
    if (now.getTime() >= targetMs) break

    if (poller.tryReadCommand(WAIT_COMMANDS) === 'Q') {
      observer({ type: 'quit-requested' })
      return 'quit'
    }

    observer({ type: 'waiting', target, remainingSeconds: secondsUntil(target, now), percent: 0 })

    await clock.sleep(Math.min(tickMs, targetMs - now.getTime()))
  }

  observer({ type: 'wait-completed', at: clock.now() })
  return 'reached'
}
