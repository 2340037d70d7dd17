/**
 * Structured events emitted by the session and wait loops.
 * Rendering is the observer's concern (see cli/renderer.ts).
 */

export type SessionEndReason = 'completed' | 'ended-early'

export type KeepaliveEvent =
  | { type: 'session-started'; start: Date; durationMinutes: number; end: Date }
  | {
      type: 'progress'
      percent: number
      elapsedSeconds: number
      remainingSeconds: number
      totalSeconds: number
    }
  | { type: 'pulse-failed'; message: string }
  | { type: 'session-ended'; at: Date; reason: SessionEndReason }
  | { type: 'session-scheduled'; start: Date }
  | { type: 'waiting'; target: Date; remainingSeconds: number; percent: 0 }
  | { type: 'wait-completed'; at: Date }
  | { type: 'quit-requested' }
  | { type: 'fatal-error'; message: string }

export type KeepaliveEventType = KeepaliveEvent['type']

export type KeepaliveObserver = (event: KeepaliveEvent) => void
