/**
 * Console renderer tests
 * chalk is disabled in tests/setup.ts, so output compares as plain text
 */

import { describe, it, expect } from 'vitest'
import {
  createConsoleRenderer,
  fitToWidth,
  formatRunLine,
  formatWaitLine,
  progressBar,
} from '../renderer.js'

const CLEAR = '\r\x1b[2K'
const START = new Date(2026, 0, 5, 9, 0, 0)
const END = new Date(2026, 0, 5, 13, 0, 0)

function createTarget(isTTY: boolean, columns = 80) {
  const chunks: string[] = []
  return {
    chunks,
    target: {
      isTTY,
      columns,
      write: (chunk: string) => {
        chunks.push(chunk)
        return true
      },
    },
  }
}

describe('progressBar', () => {
  it('fills proportionally, rounding down', () => {
    expect(progressBar(0)).toBe('[------------]')
    expect(progressBar(50)).toBe('[######------]')
    expect(progressBar(99)).toBe('[###########-]')
    expect(progressBar(100)).toBe('[############]')
  })

  it('clamps out-of-range values', () => {
    expect(progressBar(150, 4)).toBe('[####]')
    expect(progressBar(-10, 4)).toBe('[----]')
  })
})

describe('status lines', () => {
  it('formats the running line', () => {
    expect(formatRunLine(300, 50)).toBe('RUN  00:05:00  [######------]  50%')
    expect(formatRunLine(21830, 5)).toBe('RUN  06:03:50  [------------]   5%')
  })

  it('formats the waiting line', () => {
    expect(formatWaitLine(37145)).toBe('WAIT 10:19:05')
  })
})

describe('fitToWidth', () => {
  it('keeps lines two columns short of the terminal', () => {
    expect(fitToWidth('x'.repeat(100), 40)).toHaveLength(38)
    expect(fitToWidth('short', 40)).toBe('short')
  })

  it('falls back to 80 columns for unknown or tiny terminals', () => {
    expect(fitToWidth('x'.repeat(100), undefined)).toHaveLength(78)
    expect(fitToWidth('x'.repeat(100), 10)).toHaveLength(78)
  })
})

describe('createConsoleRenderer', () => {
  it('announces a session with the controls hint', () => {
    const { chunks, target } = createTarget(true)
    const render = createConsoleRenderer(target)

    render({ type: 'session-started', start: START, durationMinutes: 240, end: END })

    expect(chunks).toEqual([
      'Session started: 2026-01-05 09:00:00 | Duration: 240 minutes | Ends: 2026-01-05 13:00:00\n',
      'Controls while running: [E] end session early, [Q] quit\n',
    ])
  })

  it('omits the controls hint when asked', () => {
    const { chunks, target } = createTarget(false)
    const render = createConsoleRenderer(target, { showControls: false })

    render({ type: 'session-started', start: START, durationMinutes: 240, end: END })

    expect(chunks).toHaveLength(1)
  })

  it('redraws the status line in place and clears it before other output', () => {
    const { chunks, target } = createTarget(true)
    const render = createConsoleRenderer(target)

    render({ type: 'progress', percent: 50, elapsedSeconds: 300, remainingSeconds: 300, totalSeconds: 600 })
    render({ type: 'progress', percent: 50, elapsedSeconds: 301, remainingSeconds: 299, totalSeconds: 600 })
    render({ type: 'session-ended', at: END, reason: 'completed' })

    expect(chunks).toEqual([
      CLEAR + 'RUN  00:05:00  [######------]  50%',
      CLEAR + 'RUN  00:04:59  [######------]  50%',
      CLEAR,
      'Session ended: 2026-01-05 13:00:00\n',
    ])
  })

  it('draws no status line without a TTY', () => {
    const { chunks, target } = createTarget(false)
    const render = createConsoleRenderer(target)

    render({ type: 'waiting', target: END, remainingSeconds: 60, percent: 0 })
    render({ type: 'wait-completed', at: END })

    expect(chunks).toEqual([])
  })

  it('clears the waiting line when the wait completes', () => {
    const { chunks, target } = createTarget(true)
    const render = createConsoleRenderer(target)

    render({ type: 'waiting', target: END, remainingSeconds: 60, percent: 0 })
    render({ type: 'wait-completed', at: END })

    expect(chunks).toEqual([CLEAR + 'WAIT 00:01:00', CLEAR])
  })

  it('prints the remaining event lines', () => {
    const { chunks, target } = createTarget(false)
    const render = createConsoleRenderer(target)

    render({ type: 'session-ended', at: START, reason: 'ended-early' })
    render({ type: 'session-scheduled', start: END })
    render({ type: 'pulse-failed', message: 'osascript exited with 1' })
    render({ type: 'quit-requested' })

    expect(chunks).toEqual([
      'Session ended early: 2026-01-05 09:00:00. Waiting for next scheduled session.\n',
      'Next session starts at: 2026-01-05 13:00:00\n',
      '! Keypress not delivered: osascript exited with 1\n',
      'Exiting.\n',
    ])
  })

  it('leaves fatal errors to printError and only clears the status line', () => {
    const { chunks, target } = createTarget(true)
    const render = createConsoleRenderer(target)

    render({ type: 'waiting', target: END, remainingSeconds: 60, percent: 0 })
    render({ type: 'fatal-error', message: 'boom' })

    expect(chunks).toEqual([CLEAR + 'WAIT 00:01:00', CLEAR])
  })
})

describe('createConsoleRenderer progress tick', () => {
  const progress = (elapsedSeconds: number) => ({
    type: 'progress' as const,
    percent: Math.floor((elapsedSeconds * 100) / 600),
    elapsedSeconds,
    remainingSeconds: 600 - elapsedSeconds,
    totalSeconds: 600,
  })

  it('redraws once per second of countdown by default', () => {
    const { chunks, target } = createTarget(true)
    const render = createConsoleRenderer(target)

    render(progress(300))
    render(progress(300))
    render(progress(300))
    render(progress(301))

    expect(chunks).toEqual([
      CLEAR + 'RUN  00:05:00  [######------]  50%',
      CLEAR + 'RUN  00:04:59  [######------]  50%',
    ])
  })

  it('throttles the running line to the configured tick', () => {
    const { chunks, target } = createTarget(true)
    const render = createConsoleRenderer(target, { progressTickSeconds: 5 })

    for (const elapsed of [300, 301, 304, 305, 309, 310]) render(progress(elapsed))

    expect(chunks).toEqual([
      CLEAR + 'RUN  00:05:00  [######------]  50%',
      CLEAR + 'RUN  00:04:55  [######------]  50%',
      CLEAR + 'RUN  00:04:50  [######------]  51%',
    ])
  })

  it('throttles the waiting line to the configured tick', () => {
    const { chunks, target } = createTarget(true)
    const render = createConsoleRenderer(target, { progressTickSeconds: 10 })

    for (const remainingSeconds of [60, 59, 51, 50, 41]) {
      render({ type: 'waiting', target: END, remainingSeconds, percent: 0 })
    }

    expect(chunks).toEqual([CLEAR + 'WAIT 00:01:00', CLEAR + 'WAIT 00:00:50'])
  })

  it('draws right away after a printed line', () => {
    const { chunks, target } = createTarget(true)
    const render = createConsoleRenderer(target, { progressTickSeconds: 5 })

    render(progress(300))
    render({ type: 'pulse-failed', message: 'osascript exited with 1' })
    render(progress(301))

    expect(chunks).toEqual([
      CLEAR + 'RUN  00:05:00  [######------]  50%',
      CLEAR,
      '! Keypress not delivered: osascript exited with 1\n',
      CLEAR + 'RUN  00:04:59  [######------]  50%',
    ])
  })
})
