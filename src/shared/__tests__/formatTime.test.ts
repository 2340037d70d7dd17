import { describe, it, expect } from 'vitest'
import { formatCountdown, formatTimestamp } from '../formatTime.js'

describe('formatCountdown', () => {
  it('formats HH:MM:SS', () => {
    expect(formatCountdown(0)).toBe('00:00:00')
    expect(formatCountdown(3661)).toBe('01:01:01')
    expect(formatCountdown(21830)).toBe('06:03:50')
  })

  it('floors fractional seconds', () => {
    expect(formatCountdown(59.9)).toBe('00:00:59')
  })

  it('reads negative input as zero', () => {
    expect(formatCountdown(-5)).toBe('00:00:00')
  })

  it('lets hours grow past two digits', () => {
    expect(formatCountdown(100 * 3600)).toBe('100:00:00')
  })
})

describe('formatTimestamp', () => {
  it('uses local time', () => {
    expect(formatTimestamp(new Date(2026, 0, 22, 8, 47, 12))).toBe('2026-01-22 08:47:12')
  })

  it('accepts a custom pattern', () => {
    expect(formatTimestamp(new Date(2026, 0, 22, 8, 47, 12), 'EEE HH:mm')).toBe('Thu 08:47')
  })
})
