/**
 * Platform sink selection
 *
 * darwin: caffeinate + F13 via System Events
 * linux:  systemd-inhibit + xdotool
 * win32:  SendKeys only (no power assertion)
 */

import { createLogger } from '../shared/logger.js'
import { createCommandSink, type CommandSinkOptions, type CommandSpec } from './commandSink.js'
import type { KeepaliveSink } from './types.js'

const logger = createLogger('keepalive')

/** System Events key code for F13 */
export const F13_KEYCODE = 105

export interface KeepaliveSinkOptions {
  platform?: NodeJS.Platform
  /** Send keypresses during sessions */
  pulse?: boolean
  /** Hold the OS power assertion */
  powerAssertion?: boolean
  /** Process the assertion is tied to (caffeinate -w) */
  pid?: number
}

interface PlatformCommands {
  assertion?: CommandSpec
  pulse?: CommandSpec
  pulseHint?: string
}

function platformCommands(platform: NodeJS.Platform, pid: number): PlatformCommands | null {
  switch (platform) {
    case 'darwin':
      return {
        // -d display, -i idle, -s system (on AC), -m disk; -w exits with us
        assertion: { command: '/usr/bin/caffeinate', args: ['-d', '-i', '-s', '-m', '-w', String(pid)] },
        pulse: {
          command: '/usr/bin/osascript',
          args: ['-e', `tell application "System Events" to key code ${F13_KEYCODE}`],
        },
        pulseHint:
          'Allow your terminal in System Settings → Privacy & Security → Accessibility and Automation (System Events)',
      }
    case 'linux':
      return {
        assertion: {
          command: 'systemd-inhibit',
          args: ['--what=idle:sleep', '--who=nodoze', '--why=Keeping the session awake', 'sleep', 'infinity'],
        },
        pulse: { command: 'xdotool', args: ['key', 'F13'] },
        pulseHint: 'Install xdotool and run under an X11 session',
      }
    case 'win32':
      return {
        pulse: {
          command: 'powershell.exe',
          args: [
            '-NoProfile',
            '-NonInteractive',
            '-Command',
            "(New-Object -ComObject WScript.Shell).SendKeys('{F13}')",
          ],
        },
      }
    default:
      return null
  }
}

export function createKeepaliveSink(
  options: KeepaliveSinkOptions = {},
  overrides: Pick<CommandSinkOptions, 'spawnHeld' | 'runCommand'> = {}
): KeepaliveSink {
  const {
    platform = process.platform,
    pulse = true,
    powerAssertion = true,
    pid = process.pid,
  } = options

  const commands = platformCommands(platform, pid)
  if (!commands) {
    logger.warn(`Platform "${platform}" is not supported; running without keepalive effects`)
    return createCommandSink({ name: platform, ...overrides })
  }

  if (powerAssertion && !commands.assertion) {
    logger.warn(`No power assertion available on ${platform}; only keypresses will be sent`)
  }

  return createCommandSink({
    name: platform,
    assertion: powerAssertion ? commands.assertion : undefined,
    pulse: pulse ? commands.pulse : undefined,
    pulseHint: commands.pulseHint,
    ...overrides,
  })
}
