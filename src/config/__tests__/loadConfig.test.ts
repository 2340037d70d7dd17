/**
 * loadConfig tests
 * File discovery, precedence and YAML failure modes
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { mkdirSync, writeFileSync, rmSync } from 'fs'
import { join } from 'path'
import { tmpdir } from 'os'

const TEST_DIR = join(tmpdir(), `nodoze-config-test-${Date.now()}`)
const PROJECT_DIR = join(TEST_DIR, 'project')

// Mock homedir to prevent loading the user's real ~/.nodoze.yaml
vi.mock('os', async importOriginal => {
  const os = await importOriginal<typeof import('os')>()
  return { ...os, homedir: () => TEST_DIR }
})

const { loadConfig, loadSettings, findConfigPaths, mergeConfig, readEnvOverrides, CONFIG_FILENAME } =
  await import('../loadConfig.js')

function writeConfig(dir: string, content: string, name = CONFIG_FILENAME): string {
  const path = join(dir, name)
  writeFileSync(path, content)
  return path
}

beforeEach(() => {
  mkdirSync(PROJECT_DIR, { recursive: true })
})

afterEach(() => {
  rmSync(TEST_DIR, { recursive: true, force: true })
})

describe('findConfigPaths', () => {
  it('returns nulls when no file exists', () => {
    expect(findConfigPaths(PROJECT_DIR)).toEqual({ globalPath: null, projectPath: null })
  })

  it('finds both files', () => {
    writeConfig(TEST_DIR, 'intervalSeconds: 30\n')
    writeConfig(PROJECT_DIR, 'intervalSeconds: 45\n')

    expect(findConfigPaths(PROJECT_DIR)).toEqual({
      globalPath: join(TEST_DIR, CONFIG_FILENAME),
      projectPath: join(PROJECT_DIR, CONFIG_FILENAME),
    })
  })

  it('loads the home file once when cwd is home', () => {
    writeConfig(TEST_DIR, 'intervalSeconds: 30\n')
    expect(findConfigPaths(TEST_DIR)).toEqual({
      globalPath: join(TEST_DIR, CONFIG_FILENAME),
      projectPath: null,
    })
  })
})

describe('mergeConfig', () => {
  it('lets later sources win and ignores empty values', () => {
    expect(
      mergeConfig({ a: 1, b: 2 }, { b: 3, c: undefined }, { c: null, d: false })
    ).toEqual({ a: 1, b: 3, d: false })
  })
})

describe('readEnvOverrides', () => {
  it('maps NODOZE_* variables to option keys', () => {
    expect(
      readEnvOverrides({
        NODOZE_DAYS_OF_WEEK: 'Sat,Sun',
        NODOZE_INTERVAL_SECONDS: '15',
        NODOZE_PROGRESS_TICK_SECONDS: '5',
        NODOZE_MIN_DURATION_MINUTES: '  ',
        UNRELATED: 'x',
      })
    ).toEqual({ daysOfWeek: 'Sat,Sun', intervalSeconds: '15', progressTickSeconds: '5' })
  })
})

describe('loadConfig', () => {
  it('returns an empty object without files, env or flags', async () => {
    expect(await loadConfig({ cwd: PROJECT_DIR, env: {} })).toEqual({})
  })

  it('applies home < project < env < flags', async () => {
    writeConfig(TEST_DIR, 'intervalSeconds: 30\ndaysOfWeek: Mon\nstartWindowStart: "07:00"\n')
    writeConfig(PROJECT_DIR, 'daysOfWeek: Tue\nminDurationMinutes: 60\n')

    const config = await loadConfig({
      cwd: PROJECT_DIR,
      env: { NODOZE_INTERVAL_SECONDS: '45' },
      flags: { minDurationMinutes: '10' },
    })

    expect(config).toEqual({
      intervalSeconds: '45',
      daysOfWeek: 'Tue',
      startWindowStart: '07:00',
      minDurationMinutes: '10',
    })
  })

  it('keeps file toggles when flags leave them out', async () => {
    writeConfig(PROJECT_DIR, 'pulse: false\n')
    const config = await loadConfig({ cwd: PROJECT_DIR, env: {}, flags: { daysOfWeek: 'Mon' } })
    expect(config).toEqual({ pulse: false, daysOfWeek: 'Mon' })
  })

  it('uses only the explicit file when one is given', async () => {
    writeConfig(TEST_DIR, 'intervalSeconds: 30\n')
    writeConfig(PROJECT_DIR, 'daysOfWeek: Tue\n')
    const explicit = writeConfig(PROJECT_DIR, 'maxDurationMinutes: 300\n', 'custom.yaml')

    const config = await loadConfig({ cwd: PROJECT_DIR, configPath: explicit, env: {} })
    expect(config).toEqual({ maxDurationMinutes: 300 })
  })

  it('treats an empty file as no options', async () => {
    writeConfig(PROJECT_DIR, '# nothing yet\n')
    expect(await loadConfig({ cwd: PROJECT_DIR, env: {} })).toEqual({})
  })
})

describe('loadSettings', () => {
  it('validates the merged result', async () => {
    writeConfig(PROJECT_DIR, 'daysOfWeek: [Sat, Sun]\nintervalSeconds: 20\n')

    const result = await loadSettings({ cwd: PROJECT_DIR, env: {} })
    if (!result.ok) throw result.error

    expect([...result.value.weekdays]).toEqual(['Sat', 'Sun'])
    expect(result.value.intervalSeconds).toBe(20)
  })

  it('reports a missing explicit file', async () => {
    const result = await loadSettings({
      cwd: PROJECT_DIR,
      configPath: join(PROJECT_DIR, 'missing.yaml'),
      env: {},
    })

    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.message).toMatch(/^Cannot read config file .*missing\.yaml/)
      expect(result.error.suggestion).toBe('Check the --config path')
    }
  })

  it('reports malformed YAML', async () => {
    writeConfig(PROJECT_DIR, 'daysOfWeek: [Mon, Tue\n')

    const result = await loadSettings({ cwd: PROJECT_DIR, env: {} })
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.message).toMatch(/^Malformed YAML in /)
    }
  })

  it('rejects a file that is not a mapping', async () => {
    writeConfig(PROJECT_DIR, '- Mon\n- Tue\n')

    const result = await loadSettings({ cwd: PROJECT_DIR, env: {} })
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.message).toBe(
        `Config file ${join(PROJECT_DIR, CONFIG_FILENAME)} must contain a mapping of options`
      )
    }
  })

  it('surfaces validation errors from env values', async () => {
    const result = await loadSettings({
      cwd: PROJECT_DIR,
      env: { NODOZE_START_WINDOW_START: '11:00', NODOZE_START_WINDOW_END: '10:00' },
    })
    expect(result.ok).toBe(false)
  })
})
