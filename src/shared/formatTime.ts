/**
 * Time formatting helpers
 * Thin wrappers over date-fns
 */

import { format } from 'date-fns'

// Absolute local timestamp, e.g. 2026-01-22 08:47:12
export function formatTimestamp(date: Date, pattern: string = 'yyyy-MM-dd HH:mm:ss'): string {
  return format(date, pattern)
}

// Countdown readout, e.g. 06:03:50; negative input reads as zero
export function formatCountdown(seconds: number): string {
  const total = Math.max(0, Math.floor(seconds))
  const hh = Math.floor(total / 3600)
  const mm = Math.floor((total % 3600) / 60)
  const ss = total % 60
  return [hh, mm, ss].map(n => n.toString().padStart(2, '0')).join(':')
}
