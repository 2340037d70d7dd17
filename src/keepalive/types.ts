/**
 * Platform collaborators consumed by the session loop
 */

/**
 * Emits idle-preventing pulses and holds the OS power assertion.
 * `open`/`close` bracket the process lifetime; `pulse` may throw
 * PulseDeliveryError, which the session loop reports and ignores.
 */
export interface KeepaliveSink {
  readonly name: string
  open(): Promise<void>
  pulse(): Promise<void>
  close(): Promise<void>
}

/** Single-key commands typed into the terminal */
export type Command = 'Q' | 'E'

export interface InputPoller {
  /** Non-blocking: first pending accepted command, or null */
  tryReadCommand<C extends Command>(accepted: ReadonlySet<C>): C | null
}
