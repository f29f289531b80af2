/**
 * ConfigSystem implementation: loads configuration in hierarchy order and
 * exposes get/set/getMasked operations.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults
 *     → global user config  (~/.deliberate/config.yaml)
 *     → project config      (./.deliberate/config.yaml)
 *     → environment vars    (DELIBERATE_* prefixed)
 *     → CLI flag overrides  (passed via ConfigSystemOptions.cliOverrides)
 */

import { readFile, writeFile, mkdir, access } from 'fs/promises'
import { join, resolve } from 'path'
import { homedir } from 'os'
import yaml from 'js-yaml'
import type { ZodIssue } from 'zod'
import { createLogger } from '../../utils/logger.js'
import { isPlainObject } from '../../utils/helpers.js'
import { ConfigError } from '../../core/errors.js'
import {
  DeliberateConfigSchema,
  PartialDeliberateConfigSchema,
  type DeliberateConfig,
  type PartialDeliberateConfig,
} from './config-schema.js'
import { DEFAULT_CONFIG } from './defaults.js'
import type { ConfigSystem, ConfigSystemOptions } from './config-system.js'
import { deepMask } from '../../utils/masking.js'

const logger = createLogger('config')

/** Directory name used for both the global and the project config */
export const CONFIG_DIR_NAME = '.deliberate'
export const CONFIG_FILE_NAME = 'config.yaml'

// ---------------------------------------------------------------------------
// Deep merge utility
// ---------------------------------------------------------------------------

function deepMerge(
  base: Record<string, unknown>,
  override: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base }
  for (const [key, val] of Object.entries(override)) {
    const current = result[key]
    if (isPlainObject(val) && isPlainObject(current)) {
      result[key] = deepMerge(current, val)
    } else if (val !== undefined) {
      result[key] = val
    }
  }
  return result
}

function formatIssues(issues: ZodIssue[]): string {
  return issues.map((issue) => `  • ${issue.path.join('.')}: ${issue.message}`).join('\n')
}

// ---------------------------------------------------------------------------
// Environment variable resolution
// ---------------------------------------------------------------------------

/**
 * Map of DELIBERATE_ environment variable names to config paths.
 */
const ENV_VAR_MAP: Record<string, string> = {
  DELIBERATE_LOG_LEVEL: 'global.log_level',
  DELIBERATE_BASE_URL: 'backend.base_url',
  DELIBERATE_API_KEY_ENV: 'backend.api_key_env',
  DELIBERATE_TIMEOUT_MS: 'backend.timeout_ms',
  DELIBERATE_MAX_ATTEMPTS: 'backend.max_attempts',
  DELIBERATE_BACKOFF_BASE_MS: 'backend.backoff_base_ms',
  DELIBERATE_MAX_OUTPUT_TOKENS: 'deliberation.max_output_tokens',
  DELIBERATE_DATABASE_PATH: 'storage.database_path',
}

/** Comma-separated list of exactly three backend identifiers */
const MODELS_ENV_VAR = 'DELIBERATE_MODELS'

/**
 * Coerce a raw string (env var or CLI argument) to boolean, number or string.
 */
export function coerceScalar(rawValue: string): string | number | boolean {
  if (rawValue === 'true') return true
  if (rawValue === 'false') return false
  if (/^-?\d+$/.test(rawValue)) return parseInt(rawValue, 10)
  if (/^-?\d*\.\d+$/.test(rawValue)) return parseFloat(rawValue)
  return rawValue
}

/**
 * Read relevant environment variables and return a partial config overlay.
 */
export function readEnvOverrides(env: NodeJS.ProcessEnv = process.env): PartialDeliberateConfig {
  let overrides: Record<string, unknown> = {}

  for (const [envKey, configPath] of Object.entries(ENV_VAR_MAP)) {
    const rawValue = env[envKey]
    if (rawValue === undefined || rawValue === '') continue
    overrides = setByPath(overrides, configPath, coerceScalar(rawValue))
  }

  const models = env[MODELS_ENV_VAR]
  if (models !== undefined && models !== '') {
    overrides = setByPath(
      overrides,
      'deliberation.default_models',
      models.split(',').map((m) => m.trim()).filter((m) => m.length > 0)
    )
  }

  const parsed = PartialDeliberateConfigSchema.safeParse(overrides)
  if (!parsed.success) {
    logger.warn({ errors: parsed.error.issues }, 'Invalid environment variable overrides ignored')
    return {}
  }
  return parsed.data
}

// ---------------------------------------------------------------------------
// Dot-notation key accessor / setter
// ---------------------------------------------------------------------------

/**
 * Get a value from a nested object using dot-notation key.
 */
export function getByPath(obj: unknown, path: string): unknown {
  let cursor: unknown = obj
  for (const part of path.split('.')) {
    if (!isPlainObject(cursor)) return undefined
    cursor = cursor[part]
  }
  return cursor
}

/**
 * Return a copy of `obj` with `path` set to `value`.
 * Creates intermediate objects as needed.
 */
export function setByPath(
  obj: Record<string, unknown>,
  path: string,
  value: unknown
): Record<string, unknown> {
  const [head, ...rest] = path.split('.')
  if (head === undefined) return { ...obj }
  if (rest.length === 0) return { ...obj, [head]: value }
  const existing = obj[head]
  const child = isPlainObject(existing) ? existing : {}
  return { ...obj, [head]: setByPath(child, rest.join('.'), value) }
}

// ---------------------------------------------------------------------------
// ConfigSystemImpl
// ---------------------------------------------------------------------------

export class ConfigSystemImpl implements ConfigSystem {
  private _config: DeliberateConfig | null = null
  private readonly _projectConfigDir: string
  private readonly _globalConfigDir: string
  private readonly _cliOverrides: PartialDeliberateConfig
  private readonly _env: NodeJS.ProcessEnv

  constructor(options: ConfigSystemOptions = {}) {
    this._projectConfigDir = options.projectConfigDir
      ? resolve(options.projectConfigDir)
      : resolve(process.cwd(), CONFIG_DIR_NAME)
    this._globalConfigDir = options.globalConfigDir
      ? resolve(options.globalConfigDir)
      : resolve(homedir(), CONFIG_DIR_NAME)
    this._cliOverrides = options.cliOverrides ?? {}
    this._env = options.env ?? process.env
  }

  get isLoaded(): boolean {
    return this._config !== null
  }

  async load(): Promise<void> {
    let merged: Record<string, unknown> = structuredClone(DEFAULT_CONFIG)

    const globalConfig = await this._loadYamlFile(join(this._globalConfigDir, CONFIG_FILE_NAME))
    if (globalConfig !== null) merged = deepMerge(merged, globalConfig)

    const projectConfig = await this._loadYamlFile(join(this._projectConfigDir, CONFIG_FILE_NAME))
    if (projectConfig !== null) merged = deepMerge(merged, projectConfig)

    const envOverrides = readEnvOverrides(this._env)
    if (Object.keys(envOverrides).length > 0) merged = deepMerge(merged, envOverrides)

    if (Object.keys(this._cliOverrides).length > 0) merged = deepMerge(merged, this._cliOverrides)

    const result = DeliberateConfigSchema.safeParse(merged)
    if (!result.success) {
      throw new ConfigError(
        `Configuration validation failed:\n${formatIssues(result.error.issues)}`,
        { issues: result.error.issues }
      )
    }

    this._config = result.data
    logger.debug('Configuration loaded successfully')
  }

  getConfig(): DeliberateConfig {
    if (this._config === null) {
      throw new ConfigError('Configuration has not been loaded. Call load() before getConfig().', {})
    }
    return this._config
  }

  get(key: string): unknown {
    return getByPath(this.getConfig(), key)
  }

  async set(key: string, value: unknown): Promise<void> {
    const existing = getByPath(this.getConfig(), key)

    if (existing === undefined) {
      throw new ConfigError(`Unknown config key: ${key}`, { key })
    }
    if (typeof existing === 'object' && existing !== null) {
      throw new ConfigError(
        `Cannot set object key "${key}", use a more specific dot-notation path`,
        { key }
      )
    }

    const projectConfigPath = join(this._projectConfigDir, CONFIG_FILE_NAME)
    const projectConfigRaw: Record<string, unknown> =
      (await this._loadYamlFile(projectConfigPath)) ?? {}

    const updated = setByPath(projectConfigRaw, key, value)

    const partial = PartialDeliberateConfigSchema.safeParse(updated)
    if (!partial.success) {
      throw new ConfigError(
        `Invalid value for "${key}":\n${formatIssues(partial.error.issues)}`,
        { key, value, issues: partial.error.issues }
      )
    }

    await mkdir(this._projectConfigDir, { recursive: true })
    await writeFile(projectConfigPath, yaml.dump(partial.data), 'utf-8')

    await this.load()
  }

  getMasked(): Record<string, unknown> {
    const masked = deepMask(this.getConfig())
    return isPlainObject(masked) ? masked : {}
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private async _fileExists(filePath: string): Promise<boolean> {
    try {
      await access(filePath)
      return true
    } catch {
      return false
    }
  }

  private async _loadYamlFile(filePath: string): Promise<PartialDeliberateConfig | null> {
    if (!(await this._fileExists(filePath))) return null

    let parsed: unknown
    try {
      const raw = await readFile(filePath, 'utf-8')
      parsed = yaml.load(raw)
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      throw new ConfigError(`Failed to read config file at ${filePath}: ${message}`, { filePath })
    }

    // An empty file parses to undefined
    if (parsed === undefined || parsed === null) return {}

    const result = PartialDeliberateConfigSchema.safeParse(parsed)
    if (!result.success) {
      throw new ConfigError(
        `Invalid config file at ${filePath}:\n${formatIssues(result.error.issues)}`,
        { filePath, issues: result.error.issues }
      )
    }
    return result.data
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

/**
 * Create a new ConfigSystem instance.
 *
 * @example
 * const config = createConfigSystem({ projectConfigDir: './.deliberate' })
 * await config.load()
 * const cfg = config.getConfig()
 */
export function createConfigSystem(options: ConfigSystemOptions = {}): ConfigSystem {
  return new ConfigSystemImpl(options)
}
