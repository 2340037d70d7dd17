export {
  keepaliveConfigSchema,
  type KeepaliveConfig,
  type KeepaliveConfigInput,
  type RawConfigValues,
} from './schema.js'
export { validateConfig, type KeepaliveSettings } from './validateConfig.js'
export {
  CONFIG_FILENAME,
  findConfigPaths,
  loadConfig,
  loadSettings,
  mergeConfig,
  readEnvOverrides,
  type LoadConfigOptions,
} from './loadConfig.js'
