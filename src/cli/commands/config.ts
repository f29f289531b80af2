/**
 * `deliberate config` command group
 *
 * Subcommands:
 *   - `deliberate config show`               display merged config (credentials masked)
 *   - `deliberate config get <key>`          print one value by dot-notation key
 *   - `deliberate config set <key> <value>`  update a project config value
 */

import type { Command } from 'commander'
import yaml from 'js-yaml'
import { ConfigError } from '../../core/errors.js'
import { coerceScalar } from '../../modules/config/index.js'
import type { ConfigSystem } from '../../modules/config/index.js'
import { createLogger } from '../../utils/logger.js'
import { createProjectConfigSystem, errorMessage } from '../utils/project.js'
import type { ProjectOptions } from '../utils/project.js'

const logger = createLogger('config-cmd')

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const CONFIG_EXIT_SUCCESS = 0
export const CONFIG_EXIT_ERROR = 1
export const CONFIG_EXIT_INVALID = 2

export type ConfigDisplayFormat = 'yaml' | 'json'

/**
 * Load configuration, reporting failures on stderr.
 * Returns the exit code to use when loading failed.
 */
async function loadSystem(opts: ProjectOptions): Promise<ConfigSystem | number> {
  const system = createProjectConfigSystem(opts)
  try {
    await system.load()
    return system
  } catch (err) {
    if (err instanceof ConfigError) {
      process.stderr.write(`  Configuration error: ${err.message}\n`)
      return CONFIG_EXIT_INVALID
    }
    logger.error({ err }, 'Failed to load configuration')
    process.stderr.write(`  Error loading configuration: ${errorMessage(err)}\n`)
    return CONFIG_EXIT_ERROR
  }
}

function formatValue(value: unknown): string {
  return typeof value === 'object' && value !== null ? JSON.stringify(value) : String(value)
}

// ---------------------------------------------------------------------------
// `config show` action
// ---------------------------------------------------------------------------

export interface ConfigShowOptions extends ProjectOptions {
  format?: ConfigDisplayFormat
}

export async function runConfigShow(opts: ConfigShowOptions = {}): Promise<number> {
  const system = await loadSystem(opts)
  if (typeof system === 'number') return system

  const masked = system.getMasked()
  if ((opts.format ?? 'yaml') === 'json') {
    process.stdout.write(JSON.stringify(masked, null, 2) + '\n')
  } else {
    process.stdout.write('# deliberate configuration (credentials masked)\n\n')
    process.stdout.write(yaml.dump(masked))
  }
  return CONFIG_EXIT_SUCCESS
}

// ---------------------------------------------------------------------------
// `config get` action
// ---------------------------------------------------------------------------

export async function runConfigGet(key: string, opts: ProjectOptions = {}): Promise<number> {
  const system = await loadSystem(opts)
  if (typeof system === 'number') return system

  const value = system.get(key)
  if (value === undefined) {
    process.stderr.write(`  Error: Unknown config key: ${key}\n`)
    return CONFIG_EXIT_INVALID
  }
  process.stdout.write(formatValue(value) + '\n')
  return CONFIG_EXIT_SUCCESS
}

// ---------------------------------------------------------------------------
// `config set` action
// ---------------------------------------------------------------------------

export async function runConfigSet(
  key: string,
  rawValue: string,
  opts: ProjectOptions = {}
): Promise<number> {
  if (key.trim() === '') {
    process.stderr.write('  Error: key must not be empty\n')
    return CONFIG_EXIT_INVALID
  }

  const system = await loadSystem(opts)
  if (typeof system === 'number') return system

  const value = rawValue.trim() === 'null' ? null : coerceScalar(rawValue.trim())
  try {
    await system.set(key, value)
    process.stdout.write(`  Set ${key} = ${JSON.stringify(value)}\n`)
    return CONFIG_EXIT_SUCCESS
  } catch (err) {
    if (err instanceof ConfigError) {
      process.stderr.write(`  Error: ${err.message}\n`)
      return CONFIG_EXIT_INVALID
    }
    process.stderr.write(`  Error updating configuration: ${errorMessage(err)}\n`)
    return CONFIG_EXIT_ERROR
  }
}

// ---------------------------------------------------------------------------
// Commander registration
// ---------------------------------------------------------------------------

interface ProjectFlags {
  projectRoot: string
  globalConfigDir?: string
}

function projectOptions(opts: ProjectFlags): ProjectOptions {
  return {
    projectRoot: opts.projectRoot,
    ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
  }
}

/**
 * Register the `config` command group on a Commander program.
 */
export function registerConfigCommand(program: Command, _version: string): void {
  const configCmd = program.command('config').description('View and modify deliberate configuration')

  configCmd
    .command('show')
    .description('Display the merged configuration with credentials masked')
    .option('--format <format>', 'Output format: yaml (default) or json', 'yaml')
    .option('--project-root <path>', 'Directory holding .deliberate/', process.cwd())
    .option('--global-config-dir <dir>', 'Path to global .deliberate/ directory')
    .action(async (opts: ProjectFlags & { format: string }) => {
      process.exitCode = await runConfigShow({
        ...projectOptions(opts),
        format: opts.format === 'json' ? 'json' : 'yaml',
      })
    })

  configCmd
    .command('get <key>')
    .description('Print one configuration value (e.g. backend.timeout_ms)')
    .option('--project-root <path>', 'Directory holding .deliberate/', process.cwd())
    .option('--global-config-dir <dir>', 'Path to global .deliberate/ directory')
    .action(async (key: string, opts: ProjectFlags) => {
      process.exitCode = await runConfigGet(key, projectOptions(opts))
    })

  configCmd
    .command('set <key> <value>')
    .description('Set a configuration value using dot-notation (e.g. global.log_level debug)')
    .option('--project-root <path>', 'Directory holding .deliberate/', process.cwd())
    .option('--global-config-dir <dir>', 'Path to global .deliberate/ directory')
    .action(async (key: string, value: string, opts: ProjectFlags) => {
      process.exitCode = await runConfigSet(key, value, projectOptions(opts))
    })
}
