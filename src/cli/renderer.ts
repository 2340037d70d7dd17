/**
 * Console rendering of session events
 *
 * One-off events print as lines. progress/waiting redraw a single status line
 * in place, kept shorter than the terminal so it never wraps:
 *
 *   RUN  06:03:50  [####--------]  40%
 *   WAIT 10:19:05
 *
 * The status line is only drawn on a TTY, and at most once per
 * `progressTickSeconds` of countdown; the first one after a printed line
 * always draws.
 */

import chalk from 'chalk'
import { formatCountdown, formatTimestamp } from '../shared/formatTime.js'
import type { KeepaliveEvent, KeepaliveObserver } from '../session/events.js'

const CLEAR_LINE = '\r\x1b[2K'
const BAR_WIDTH = 12
const FALLBACK_COLUMNS = 80

export interface RenderTarget {
  isTTY?: boolean
  columns?: number
  write(chunk: string): unknown
}

export interface RendererOptions {
  /** Print the key controls hint when a session starts */
  showControls?: boolean
  /** Seconds of countdown between status line redraws (default: 1) */
  progressTickSeconds?: number
}

type StatusMode = 'run' | 'wait'

export function progressBar(percent: number, width: number = BAR_WIDTH): string {
  const done = Math.max(0, Math.min(width, Math.floor((percent / 100) * width)))
  return '[' + '#'.repeat(done) + '-'.repeat(width - done) + ']'
}

export function formatRunLine(remainingSeconds: number, percent: number): string {
  return `RUN  ${formatCountdown(remainingSeconds)}  ${progressBar(percent)} ${String(percent).padStart(3)}%`
}

export function formatWaitLine(remainingSeconds: number): string {
  return `WAIT ${formatCountdown(remainingSeconds)}`
}

export function fitToWidth(line: string, columns: number | undefined): string {
  const cols = columns === undefined || columns < 20 ? FALLBACK_COLUMNS : columns
  // Writing into the last column can still wrap in some terminals
  const maxLen = Math.max(10, cols - 2)
  return line.length > maxLen ? line.slice(0, maxLen) : line
}

export function createConsoleRenderer(
  target: RenderTarget = process.stdout,
  options: RendererOptions = {}
): KeepaliveObserver {
  const { showControls = true, progressTickSeconds = 1 } = options
  let statusVisible = false
  let lastStatus: { mode: StatusMode; seconds: number } | null = null

  function clearStatus(): void {
    if (!statusVisible) return
    target.write(CLEAR_LINE)
    statusVisible = false
  }

  function line(text: string): void {
    clearStatus()
    target.write(text + '\n')
  }

  function status(mode: StatusMode, seconds: number, text: string): void {
    if (!target.isTTY) return
    if (
      statusVisible &&
      lastStatus?.mode === mode &&
      Math.abs(seconds - lastStatus.seconds) < progressTickSeconds
    ) {
      return
    }
    target.write(CLEAR_LINE + fitToWidth(text, target.columns))
    statusVisible = true
    lastStatus = { mode, seconds }
  }

  return (event: KeepaliveEvent) => {
    switch (event.type) {
      case 'session-started':
        line(
          chalk.green('Session started: ') +
            `${formatTimestamp(event.start)} | Duration: ${event.durationMinutes} minutes | Ends: ${formatTimestamp(event.end)}`
        )
        if (showControls) line(chalk.gray('Controls while running: [E] end session early, [Q] quit'))
        return
      case 'progress':
        status('run', event.elapsedSeconds, formatRunLine(event.remainingSeconds, event.percent))
        return
      case 'pulse-failed':
        line(chalk.yellow('! ') + `Keypress not delivered: ${event.message}`)
        return
      case 'session-ended':
        line(
          event.reason === 'ended-early'
            ? `Session ended early: ${formatTimestamp(event.at)}. Waiting for next scheduled session.`
            : `Session ended: ${formatTimestamp(event.at)}`
        )
        return
      case 'session-scheduled':
        line(chalk.cyan('Next session starts at: ') + formatTimestamp(event.start))
        return
      case 'waiting':
        status('wait', event.remainingSeconds, formatWaitLine(event.remainingSeconds))
        return
      case 'wait-completed':
        clearStatus()
        return
      case 'quit-requested':
        line('Exiting.')
        return
      case 'fatal-error':
        // printError reports it; just get the status line out of the way
        clearStatus()
        return
    }
  }
}
