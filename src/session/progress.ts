export interface SessionProgress {
  percent: number
  elapsedSeconds: number
  remainingSeconds: number
  totalSeconds: number
}

/** Whole seconds from `now` until `target`, never negative */
export function secondsUntil(target: Date, now: Date): number {
  return Math.max(0, Math.floor((target.getTime() - now.getTime()) / 1000))
}

/**
 * Elapsed/remaining clamped to [0, total]; percent is floor(elapsed * 100 / total),
 * or 0 for an empty session.
 */
export function computeProgress(start: Date, end: Date, now: Date): SessionProgress {
  const totalSeconds = Math.max(0, Math.floor((end.getTime() - start.getTime()) / 1000))
  const remainingSeconds = Math.min(totalSeconds, secondsUntil(end, now))
  const elapsedSeconds = Math.min(totalSeconds, Math.max(0, totalSeconds - remainingSeconds))
  const percent = totalSeconds > 0 ? Math.floor((elapsedSeconds * 100) / totalSeconds) : 0

  return { percent, elapsedSeconds, remainingSeconds, totalSeconds }
}
