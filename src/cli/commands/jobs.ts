/**
 * `deliberate jobs` command group
 *
 * Subcommands:
 *   - `deliberate jobs list [--limit n]`  most recent jobs first
 *   - `deliberate jobs show <jobId>`      one job with its result or error
 *
 * Exit codes:
 *   0 - Success
 *   1 - System error
 *   2 - Job not found or invalid arguments
 */

import type { Command } from 'commander'
import { ConfigError } from '../../core/errors.js'
import type { Job } from '../../modules/job-runner/index.js'
import { createLogger } from '../../utils/logger.js'
import { renderJobHuman, renderJobTable } from '../formatters/result-formatter.js'
import { buildJsonOutput, parseOutputFormat } from '../utils/formatting.js'
import type { OutputFormat } from '../utils/formatting.js'
import { errorMessage, loadProjectConfig, openJobServices, resolveProjectRoot } from '../utils/project.js'
import type { JobServices, ProjectOptions } from '../utils/project.js'

const logger = createLogger('jobs-cmd')

export const JOBS_EXIT_SUCCESS = 0
export const JOBS_EXIT_ERROR = 1
export const JOBS_EXIT_INVALID = 2

export const DEFAULT_LIST_LIMIT = 20

export interface JobsCommandOptions extends ProjectOptions {
  outputFormat?: OutputFormat
  version?: string
}

/**
 * Open the job store, run `body`, and always close the store again.
 */
async function withJobServices(
  opts: ProjectOptions,
  body: (services: JobServices) => number
): Promise<number> {
  let services: JobServices
  try {
    const config = await loadProjectConfig(opts)
    services = await openJobServices(config, resolveProjectRoot(opts))
  } catch (err) {
    const prefix = err instanceof ConfigError ? 'Configuration error' : 'Error'
    process.stderr.write(`${prefix}: ${errorMessage(err)}\n`)
    return JOBS_EXIT_ERROR
  }

  try {
    return body(services)
  } catch (err) {
    logger.error({ err }, 'jobs command failed')
    process.stderr.write(`Error: ${errorMessage(err)}\n`)
    return JOBS_EXIT_ERROR
  } finally {
    await services.registry.shutdownAll()
  }
}

// ---------------------------------------------------------------------------
// `jobs list`
// ---------------------------------------------------------------------------

export interface JobsListOptions extends JobsCommandOptions {
  limit?: number
}

export async function runJobsList(opts: JobsListOptions = {}): Promise<number> {
  const limit = opts.limit ?? DEFAULT_LIST_LIMIT
  if (!Number.isInteger(limit) || limit < 1) {
    process.stderr.write('Error: --limit must be a positive integer\n')
    return JOBS_EXIT_INVALID
  }

  return withJobServices(opts, ({ store }) => {
    const jobs = store.list({ limit })
    if (opts.outputFormat === 'json') {
      const payload = buildJsonOutput('deliberate jobs list', jobs, opts.version ?? '0.0.0')
      process.stdout.write(JSON.stringify(payload, null, 2) + '\n')
    } else if (jobs.length === 0) {
      process.stdout.write('No jobs found.\n')
    } else {
      process.stdout.write(renderJobTable(jobs) + '\n')
    }
    return JOBS_EXIT_SUCCESS
  })
}

// ---------------------------------------------------------------------------
// `jobs show`
// ---------------------------------------------------------------------------

export async function runJobsShow(jobId: string, opts: JobsCommandOptions = {}): Promise<number> {
  return withJobServices(opts, ({ store }) => {
    const job: Job | undefined = store.get(jobId)
    if (job === undefined) {
      process.stderr.write(`Error: Job not found: ${jobId}\n`)
      return JOBS_EXIT_INVALID
    }
    if (opts.outputFormat === 'json') {
      const payload = buildJsonOutput('deliberate jobs show', job, opts.version ?? '0.0.0')
      process.stdout.write(JSON.stringify(payload, null, 2) + '\n')
    } else {
      process.stdout.write(renderJobHuman(job) + '\n')
    }
    return JOBS_EXIT_SUCCESS
  })
}

// ---------------------------------------------------------------------------
// Commander registration
// ---------------------------------------------------------------------------

interface JobsFlags {
  outputFormat: string
  projectRoot: string
}

/**
 * Register the `jobs` command group on a Commander program.
 */
export function registerJobsCommand(program: Command, version: string): void {
  const jobsCmd = program.command('jobs').description('Inspect submitted deliberations')

  jobsCmd
    .command('list')
    .description('List the most recent jobs')
    .option('--limit <n>', 'Maximum number of jobs', String(DEFAULT_LIST_LIMIT))
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .option('--project-root <path>', 'Directory holding .deliberate/', process.cwd())
    .action(async (opts: JobsFlags & { limit: string }) => {
      process.exitCode = await runJobsList({
        limit: Number(opts.limit),
        outputFormat: parseOutputFormat(opts.outputFormat),
        projectRoot: opts.projectRoot,
        version,
      })
    })

  jobsCmd
    .command('show <jobId>')
    .description('Show one job with its result')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .option('--project-root <path>', 'Directory holding .deliberate/', process.cwd())
    .action(async (jobId: string, opts: JobsFlags) => {
      process.exitCode = await runJobsShow(jobId, {
        outputFormat: parseOutputFormat(opts.outputFormat),
        projectRoot: opts.projectRoot,
        version,
      })
    })
}
