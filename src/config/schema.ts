import { z } from 'zod'
import { DEFAULT_WEEKDAYS } from '../schedule/weekdays.js'

/**
 * Raw option shape shared by YAML files, env overrides and CLI flags.
 * Domain checks (window order, weekday names, bounds) run afterwards in
 * validateConfig.ts.
 */
export const keepaliveConfigSchema = z.object({
  /** Earliest daily session start, HH:MM[:SS] */
  startWindowStart: z.string().default('08:30'),
  /** Latest daily session start, HH:MM[:SS] */
  startWindowEnd: z.string().default('10:00'),
  /** Comma-separated string or list, e.g. Mon,Tue,Wed */
  daysOfWeek: z.union([z.string(), z.array(z.string())]).default(DEFAULT_WEEKDAYS),
  minDurationMinutes: z.coerce.number().default(240),
  maxDurationMinutes: z.coerce.number().default(480),
  /** Seconds between keypress pulses */
  intervalSeconds: z.coerce.number().default(60),
  /** Seconds between status line redraws */
  progressTickSeconds: z.coerce.number().default(1),
  /** Send keypresses during sessions */
  pulse: z.boolean().default(true),
  /** Hold the OS power assertion while running */
  powerAssertion: z.boolean().default(true),
})

export type KeepaliveConfigInput = z.input<typeof keepaliveConfigSchema>
export type KeepaliveConfig = z.infer<typeof keepaliveConfigSchema>

/** Unvalidated option values as read from a file, env or the command line */
export type RawConfigValues = Partial<Record<keyof KeepaliveConfigInput, unknown>>
