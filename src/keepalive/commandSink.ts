/**
 * KeepaliveSink driven by external commands
 *
 * - power assertion: a long-lived child process (caffeinate, systemd-inhibit)
 *   spawned on open() and killed on close()
 * - pulse: a one-shot command run through execa
 */

import { spawn } from 'child_process'
import { execa } from 'execa'
import { createLogger } from '../shared/logger.js'
import { getErrorMessage } from '../shared/assertError.js'
import { PulseDeliveryError } from '../shared/error.js'
import type { KeepaliveSink } from './types.js'

const logger = createLogger('keepalive')

const PULSE_TIMEOUT_MS = 10_000

export interface CommandSpec {
  command: string
  args: readonly string[]
}

/** The held assertion process, reduced to what the sink needs */
export interface HeldProcess {
  onSpawn(listener: () => void): void
  onError(listener: (error: Error) => void): void
  kill(): void
}

export type SpawnHeld = (spec: CommandSpec) => HeldProcess
export type RunCommand = (spec: CommandSpec) => Promise<unknown>

export interface CommandSinkOptions {
  name: string
  assertion?: CommandSpec
  pulse?: CommandSpec
  /** Shown when a pulse fails */
  pulseHint?: string
  spawnHeld?: SpawnHeld
  runCommand?: RunCommand
}

export const spawnDetachedFromStdio: SpawnHeld = ({ command, args }) => {
  const child = spawn(command, [...args], { stdio: 'ignore' })
  return {
    onSpawn: listener => child.once('spawn', listener),
    onError: listener => child.once('error', listener),
    kill: () => child.kill(),
  }
}

export const runWithExeca: RunCommand = ({ command, args }) =>
  execa(command, [...args], { timeout: PULSE_TIMEOUT_MS, stdio: 'ignore' })

function formatCommand(spec: CommandSpec): string {
  return [spec.command, ...spec.args].join(' ')
}

export function createCommandSink(options: CommandSinkOptions): KeepaliveSink {
  const {
    name,
    assertion,
    pulse,
    pulseHint,
    spawnHeld = spawnDetachedFromStdio,
    runCommand = runWithExeca,
  } = options

  let held: HeldProcess | null = null

  // Last resort when the process exits without going through close()
  const killOnExit = () => held?.kill()

  return {
    name,

    open() {
      if (!assertion) {
        logger.debug(`${name}: no power assertion`)
        return Promise.resolve()
      }
      if (held) return Promise.resolve()

      return new Promise<void>(resolve => {
        const child = spawnHeld(assertion)
        held = child
        child.onSpawn(() => {
          logger.debug(`Power assertion held: ${formatCommand(assertion)}`)
          process.once('exit', killOnExit)
          resolve()
        })
        child.onError(error => {
          logger.warn(`Power assertion unavailable (${formatCommand(assertion)}): ${error.message}`)
          if (held === child) held = null
          resolve()
        })
      })
    },

    async pulse() {
      if (!pulse) return
      try {
        await runCommand(pulse)
      } catch (error) {
        throw new PulseDeliveryError(
          `Keypress via ${name} failed: ${getErrorMessage(error)}`,
          error,
          pulseHint
        )
      }
    },

    close() {
      process.removeListener('exit', killOnExit)
      if (held) {
        held.kill()
        held = null
        logger.debug('Power assertion released')
      }
      return Promise.resolve()
    },
  }
}
