/**
 * Time source for the polling loops.
 * Injected so loops can run against a manual clock in tests.
 */

export interface Clock {
  now(): Date
  sleep(ms: number): Promise<void>
}

export const systemClock: Clock = {
  now: () => new Date(),
  sleep: ms => new Promise(resolve => setTimeout(resolve, Math.max(0, ms))),
}
