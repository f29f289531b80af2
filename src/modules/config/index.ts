/**
 * Barrel exports for the config module.
 */

export {
  createConfigSystem,
  ConfigSystemImpl,
  CONFIG_DIR_NAME,
  CONFIG_FILE_NAME,
  coerceScalar,
  readEnvOverrides,
  getByPath,
  setByPath,
} from './config-system-impl.js'
export type { ConfigSystem, ConfigSystemOptions } from './config-system.js'
export {
  DeliberateConfigSchema,
  PartialDeliberateConfigSchema,
  CURRENT_CONFIG_FORMAT_VERSION,
} from './config-schema.js'
export type {
  DeliberateConfig,
  PartialDeliberateConfig,
  BackendSettings,
  DeliberationSettings,
  StorageSettings,
} from './config-schema.js'
export { DEFAULT_CONFIG } from './defaults.js'
