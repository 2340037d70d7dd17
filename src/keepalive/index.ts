export type { Command, InputPoller, KeepaliveSink } from './types.js'
export {
  createCommandSink,
  spawnDetachedFromStdio,
  runWithExeca,
  type CommandSpec,
  type CommandSinkOptions,
  type HeldProcess,
  type RunCommand,
  type SpawnHeld,
} from './commandSink.js'
export { createKeepaliveSink, F13_KEYCODE, type KeepaliveSinkOptions } from './createKeepaliveSink.js'
export { createTerminalPoller, type TerminalInput, type TerminalPoller } from './terminalPoller.js'
