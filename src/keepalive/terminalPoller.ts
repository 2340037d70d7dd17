/**
 * Single-key command input from the terminal
 *
 * On a TTY stdin is switched to raw mode and keystrokes are buffered as they
 * arrive; tryReadCommand() only drains the buffer, so it never blocks.
 * Without a TTY every poll reports nothing pending.
 */

import type { Command, InputPoller } from './types.js'

const CTRL_C = '\u0003'

/** The subset of a tty.ReadStream the poller touches */
export interface TerminalInput {
  isTTY?: boolean
  setRawMode?(mode: boolean): unknown
  setEncoding(encoding: BufferEncoding): unknown
  on(event: 'data', listener: (chunk: string | Buffer) => void): unknown
  removeListener(event: 'data', listener: (chunk: string | Buffer) => void): unknown
  resume(): unknown
  pause(): unknown
}

export interface TerminalPoller extends InputPoller {
  readonly interactive: boolean
  close(): void
}

function isCommand(key: string): key is Command {
  return key === 'Q' || key === 'E'
}

export function createTerminalPoller(input: TerminalInput = process.stdin): TerminalPoller {
  if (!input.isTTY || !input.setRawMode) {
    return {
      interactive: false,
      tryReadCommand: () => null,
      close: () => {},
    }
  }

  const pending: string[] = []
  const onData = (chunk: string | Buffer) => {
    for (const ch of chunk.toString()) {
      // Raw mode swallows SIGINT; treat Ctrl+C as quit
      pending.push(ch === CTRL_C ? 'Q' : ch.toUpperCase())
    }
  }

  input.setRawMode(true)
  input.setEncoding('utf8')
  input.on('data', onData)
  input.resume()

  let closed = false

  return {
    interactive: true,

    tryReadCommand<C extends Command>(accepted: ReadonlySet<C>): C | null {
      while (pending.length > 0) {
        const key = pending.shift()
        if (key === undefined || !isCommand(key)) continue
        for (const command of accepted) {
          if (command === key) return command
        }
      }
      return null
    },

    close() {
      if (closed) return
      closed = true
      input.removeListener('data', onData)
      input.setRawMode?.(false)
      input.pause()
    },
  }
}
