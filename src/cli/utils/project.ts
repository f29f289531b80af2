/**
 * Shared command setup: configuration loading and the job store services.
 */

import { join, resolve } from 'path'
import { ServiceRegistry } from '../../core/di.js'
import { createConfigSystem, CONFIG_DIR_NAME } from '../../modules/config/index.js'
import type { ConfigSystem, DeliberateConfig, PartialDeliberateConfig } from '../../modules/config/index.js'
import { createDatabaseService, IN_MEMORY_DATABASE } from '../../persistence/database.js'
import type { DatabaseService } from '../../persistence/database.js'
import { SqliteJobStore } from '../../modules/job-runner/index.js'
import type { JobStore } from '../../modules/job-runner/index.js'
import { setLogLevel } from '../../utils/logger.js'

export interface ProjectOptions {
  /** Directory holding .deliberate/ (default: cwd) */
  projectRoot?: string
  /** Path to the global .deliberate/ directory (default: ~/.deliberate) */
  globalConfigDir?: string
  /** Environment for DELIBERATE_* overrides and the API key (default: process.env) */
  env?: NodeJS.ProcessEnv
}

export function resolveProjectRoot(opts: ProjectOptions): string {
  return resolve(opts.projectRoot ?? process.cwd())
}

export function createProjectConfigSystem(
  opts: ProjectOptions,
  cliOverrides?: PartialDeliberateConfig
): ConfigSystem {
  return createConfigSystem({
    projectConfigDir: join(resolveProjectRoot(opts), CONFIG_DIR_NAME),
    ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
    ...(opts.env !== undefined && { env: opts.env }),
    ...(cliOverrides !== undefined && { cliOverrides }),
  })
}

/**
 * Load the merged configuration and apply its log level.
 * @throws {ConfigError}
 */
export async function loadProjectConfig(
  opts: ProjectOptions,
  cliOverrides?: PartialDeliberateConfig
): Promise<DeliberateConfig> {
  const system = createProjectConfigSystem(opts, cliOverrides)
  await system.load()
  const config = system.getConfig()
  setLogLevel(config.global.log_level)
  return config
}

/** Relative database paths are taken from the project root */
export function resolveDatabasePath(config: DeliberateConfig, projectRoot: string): string {
  const configured = config.storage.database_path
  return configured === IN_MEMORY_DATABASE ? configured : resolve(projectRoot, configured)
}

export interface JobServices {
  registry: ServiceRegistry
  database: DatabaseService
  store: JobStore
}

/**
 * Open the job database (migrations applied) inside a fresh registry.
 * Callers own the registry and must call `shutdownAll()`.
 */
export async function openJobServices(config: DeliberateConfig, projectRoot: string): Promise<JobServices> {
  const registry = new ServiceRegistry()
  const database = createDatabaseService(resolveDatabasePath(config, projectRoot))
  registry.register('database', database)
  try {
    await registry.initializeAll()
  } catch (err) {
    await registry.shutdownAll()
    throw err
  }
  return { registry, database, store: new SqliteJobStore(database.db) }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
