#!/usr/bin/env node
/**
 * deliberate CLI - Main entry point
 * Provides the `deliberate` command-line interface
 */

import { Command } from 'commander'
import { fileURLToPath } from 'url'
import { dirname, resolve } from 'path'
import { readFile } from 'fs/promises'
import { z } from 'zod'
import { createLogger } from '../utils/logger.js'
import { registerRunCommand } from './commands/run.js'
import { registerJobsCommand } from './commands/jobs.js'
import { registerConfigCommand } from './commands/config.js'

const logger = createLogger('cli')

const PackageJsonSchema = z.object({ name: z.string().optional(), version: z.string().optional() })

/** Resolve the package.json path relative to this file */
export async function getPackageVersion(): Promise<string> {
  const here = dirname(fileURLToPath(import.meta.url))
  // Run from dist/cli/ or src/cli/
  const paths = [resolve(here, '../../package.json'), resolve(here, '../package.json')]

  for (const pkgPath of paths) {
    try {
      const pkg = PackageJsonSchema.safeParse(JSON.parse(await readFile(pkgPath, 'utf-8')))
      if (pkg.success && pkg.data.name === 'deliberate' && pkg.data.version !== undefined) {
        return pkg.data.version
      }
    } catch (err) {
      logger.debug({ pkgPath, err }, 'package.json not readable here')
    }
  }
  return '0.0.0'
}

/** Create and configure the CLI program */
export async function createProgram(): Promise<Command> {
  const version = await getPackageVersion()

  const program = new Command()

  program
    .name('deliberate')
    .description('Stress-test a thesis with a three-round, three-model deliberation')
    .version(version, '-v, --version', 'Output the current version')

  registerRunCommand(program, version)
  registerJobsCommand(program, version)
  registerConfigCommand(program, version)

  return program
}

/** Main entry point */
async function main(): Promise<void> {
  try {
    const program = await createProgram()
    await program.parseAsync(process.argv)
  } catch (error) {
    logger.error({ error }, 'CLI error')
    process.exit(1)
  }
}

// Errors are handled internally by main() which calls process.exit(1)
void main()
