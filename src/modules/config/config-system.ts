/**
 * ConfigSystem interface: public contract for the configuration subsystem.
 *
 * All callers should depend on this interface, not the concrete implementation.
 * Create an instance via `createConfigSystem()` from config-system-impl.ts.
 */

import type { DeliberateConfig, PartialDeliberateConfig } from './config-schema.js'

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface ConfigSystemOptions {
  /** Path to the project-level .deliberate/ directory (default: <cwd>/.deliberate) */
  projectConfigDir?: string
  /** Path to the global user-level .deliberate/ directory (default: ~/.deliberate) */
  globalConfigDir?: string
  /**
   * Values that override every other source.
   * Typically populated from CLI flags.
   */
  cliOverrides?: PartialDeliberateConfig
  /** Environment to read DELIBERATE_* overrides from (default: process.env) */
  env?: NodeJS.ProcessEnv
}

// ---------------------------------------------------------------------------
// ConfigSystem interface
// ---------------------------------------------------------------------------

/**
 * Provides access to fully-merged, validated configuration.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults < global config < project config < env vars < CLI flags
 */
export interface ConfigSystem {
  /**
   * Load and validate configuration from all sources in hierarchy order.
   * Must be called before `getConfig()`.
   */
  load(): Promise<void>

  /**
   * Return the fully-merged, validated configuration.
   * @throws {ConfigError} if `load()` has not been called.
   */
  getConfig(): DeliberateConfig

  /**
   * Return a single value by dot-notation key (e.g. "backend.timeout_ms").
   * @returns the value, or undefined if the key does not exist.
   */
  get(key: string): unknown

  /**
   * Persist a single scalar value to the project config file.
   * @throws {ConfigError} if the key is unknown or the value is invalid.
   */
  set(key: string, value: unknown): Promise<void>

  /**
   * Return the merged config with credential values masked.
   * Safe to display in CLI output or logs.
   */
  getMasked(): Record<string, unknown>

  /** Whether load() has been called and succeeded. */
  readonly isLoaded: boolean
}
