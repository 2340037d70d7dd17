import { readFile } from 'fs/promises'
import { existsSync } from 'fs'
import { join, resolve } from 'path'
import { homedir } from 'os'
import YAML from 'yaml'
import { createLogger } from '../shared/logger.js'
import { ConfigurationError } from '../shared/error.js'
import { getErrorMessage } from '../shared/assertError.js'
import { err, type Result } from '../shared/result.js'
import type { KeepaliveConfigInput, RawConfigValues } from './schema.js'
import { validateConfig, type KeepaliveSettings } from './validateConfig.js'

const logger = createLogger('config')

export const CONFIG_FILENAME = '.nodoze.yaml'

type RawConfig = Record<string, unknown>

/** Env var → config key; values stay strings and are coerced by the schema */
const ENV_OVERRIDES: Record<string, keyof KeepaliveConfigInput> = {
  NODOZE_START_WINDOW_START: 'startWindowStart',
  NODOZE_START_WINDOW_END: 'startWindowEnd',
  NODOZE_DAYS_OF_WEEK: 'daysOfWeek',
  NODOZE_MIN_DURATION_MINUTES: 'minDurationMinutes',
  NODOZE_MAX_DURATION_MINUTES: 'maxDurationMinutes',
  NODOZE_INTERVAL_SECONDS: 'intervalSeconds',
  NODOZE_PROGRESS_TICK_SECONDS: 'progressTickSeconds',
}

export interface LoadConfigOptions {
  /** Project directory searched for .nodoze.yaml (default: process.cwd()) */
  cwd?: string
  /** Explicit file; replaces the global and project files */
  configPath?: string
  env?: NodeJS.ProcessEnv
  /** Options given on the command line; undefined entries are ignored */
  flags?: RawConfigValues
}

/**
 * Locate config files (global + project).
 * Global is the base and the project file overrides it.
 */
export function findConfigPaths(cwd?: string): { globalPath: string | null; projectPath: string | null } {
  const homePath = join(homedir(), CONFIG_FILENAME)
  const projectDir = cwd || process.cwd()
  const projectPath = join(projectDir, CONFIG_FILENAME)

  // Same directory as home: load once
  const isHomeCwd = resolve(projectDir) === resolve(homedir())

  return {
    globalPath: existsSync(homePath) ? homePath : null,
    projectPath: !isHomeCwd && existsSync(projectPath) ? projectPath : null,
  }
}

function isPlainObject(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Parse a YAML file; empty or comment-only files yield {}
 */
async function parseYamlFile(filePath: string): Promise<RawConfig> {
  let content: string
  try {
    content = await readFile(filePath, 'utf-8')
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read config file ${filePath}: ${getErrorMessage(error)}`,
      'Check the --config path'
    )
  }

  let parsed: unknown
  try {
    parsed = YAML.parse(content)
  } catch (error) {
    throw new ConfigurationError(`Malformed YAML in ${filePath}: ${getErrorMessage(error)}`)
  }

  if (parsed === null || parsed === undefined) return {}
  if (!isPlainObject(parsed)) {
    throw new ConfigurationError(`Config file ${filePath} must contain a mapping of options`)
  }
  return parsed
}

/**
 * Merge config objects key by key; later sources win.
 * undefined/null values never override.
 */
export function mergeConfig(...sources: RawConfig[]): RawConfig {
  const result: RawConfig = {}
  for (const source of sources) {
    for (const [key, value] of Object.entries(source)) {
      if (value !== undefined && value !== null) {
        result[key] = value
      }
    }
  }
  return result
}

export function readEnvOverrides(env: NodeJS.ProcessEnv = process.env): RawConfig {
  const overrides: RawConfig = {}
  for (const [name, key] of Object.entries(ENV_OVERRIDES)) {
    const value = env[name]
    if (value !== undefined && value.trim() !== '') {
      overrides[key] = value
    }
  }
  return overrides
}

/**
 * Merge every source, lowest precedence first:
 * files → env → CLI flags. Schema defaults fill the rest during validation.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<RawConfig> {
  const { cwd, configPath, env = process.env, flags = {} } = options

  const files: RawConfig[] = []
  if (configPath) {
    logger.debug(`Loading config file: ${configPath}`)
    files.push(await parseYamlFile(configPath))
  } else {
    const { globalPath, projectPath } = findConfigPaths(cwd)
    for (const path of [globalPath, projectPath]) {
      if (!path) continue
      logger.debug(`Loading config file: ${path}`)
      files.push(await parseYamlFile(path))
    }
  }

  return mergeConfig(...files, readEnvOverrides(env), flags)
}

/**
 * Load and validate. File errors and validation errors both surface as
 * ConfigurationError results.
 */
export async function loadSettings(
  options: LoadConfigOptions = {}
): Promise<Result<KeepaliveSettings, ConfigurationError>> {
  let raw: RawConfig
  try {
    raw = await loadConfig(options)
  } catch (error) {
    if (error instanceof ConfigurationError) return err(error)
    throw error
  }
  return validateConfig(raw)
}
