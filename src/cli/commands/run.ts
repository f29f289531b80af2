/**
 * `deliberate run` command
 *
 * Submits a thesis to the job runner, streams round progress to stderr and
 * prints the final result to stdout.
 *
 * Usage:
 *   deliberate run <thesis> [--context <text>] [--model <id> x3]
 *                  [--output-format human|json] [--project-root <path>]
 *
 * Exit codes:
 *   0 - Deliberation completed
 *   1 - Deliberation failed or system error
 *   2 - Usage error (wrong model count, empty thesis)
 */

import type { Command } from 'commander'
import { ConfigError, DeliberationInputError } from '../../core/errors.js'
import { createEventBus } from '../../core/event-bus.js'
import { createBackendClient } from '../../modules/backend/index.js'
import type { BackendClient } from '../../modules/backend/index.js'
import type { DeliberateConfig } from '../../modules/config/index.js'
import { createDeliberationEngine, TOTAL_ROUNDS } from '../../modules/deliberation/index.js'
import type { BackendTriple, DeliberationResult } from '../../modules/deliberation/index.js'
import { createJobRunner } from '../../modules/job-runner/index.js'
import type { Job } from '../../modules/job-runner/index.js'
import { createLogger } from '../../utils/logger.js'
import { formatDuration } from '../../utils/helpers.js'
import { renderResultMarkdown } from '../formatters/result-formatter.js'
import { buildJsonOutput, parseOutputFormat } from '../utils/formatting.js'
import type { OutputFormat } from '../utils/formatting.js'
import { maskSecrets } from '../../utils/masking.js'
import { errorMessage, loadProjectConfig, openJobServices, resolveProjectRoot } from '../utils/project.js'
import type { JobServices, ProjectOptions } from '../utils/project.js'

const logger = createLogger('run-cmd')

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const RUN_EXIT_SUCCESS = 0
export const RUN_EXIT_ERROR = 1
export const RUN_EXIT_USAGE = 2

export const REQUIRED_MODEL_COUNT = 3

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RunOptions extends ProjectOptions {
  thesis: string
  context?: string
  /** Backend identifiers; exactly three when given */
  models?: string[]
  outputFormat?: OutputFormat
  version?: string
  /** Used instead of the OpenRouter client built from configuration */
  client?: BackendClient
}

export interface RunJsonData {
  jobId: string
  status: Job['status']
  result: DeliberationResult | null
  error: string | null
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function toBackendTriple(models: readonly string[]): [string, string, string] | undefined {
  const [first, second, third] = models
  if (models.length !== REQUIRED_MODEL_COUNT || first === undefined || second === undefined || third === undefined) {
    return undefined
  }
  return [first, second, third]
}

function writeResult(job: Job, format: OutputFormat, version: string): void {
  if (format === 'json') {
    const data: RunJsonData = { jobId: job.id, status: job.status, result: job.result, error: job.error }
    process.stdout.write(JSON.stringify(buildJsonOutput('deliberate run', data, version), null, 2) + '\n')
    return
  }
  if (job.result !== null) {
    process.stdout.write(renderResultMarkdown(job.result) + '\n')
  }
}

// ---------------------------------------------------------------------------
// runDeliberateRun
// ---------------------------------------------------------------------------

export async function runDeliberateRun(opts: RunOptions): Promise<number> {
  const format = opts.outputFormat ?? 'human'
  const version = opts.version ?? '0.0.0'

  let requestedModels: [string, string, string] | undefined
  if (opts.models !== undefined && opts.models.length > 0) {
    requestedModels = toBackendTriple(opts.models)
    if (requestedModels === undefined) {
      process.stderr.write(
        `Error: --model must be given exactly ${String(REQUIRED_MODEL_COUNT)} times (got ${String(opts.models.length)})\n`
      )
      return RUN_EXIT_USAGE
    }
  }

  const projectRoot = resolveProjectRoot(opts)

  let services: JobServices
  let defaultBackends: BackendTriple
  let client: BackendClient
  let config: DeliberateConfig
  try {
    config = await loadProjectConfig(opts)
    const configured = toBackendTriple(config.deliberation.default_models)
    if (configured === undefined) {
      throw new ConfigError('deliberation.default_models must list exactly 3 models')
    }
    defaultBackends = configured
    client = opts.client ?? createBackendClient(config.backend, opts.env ?? process.env)
    services = await openJobServices(config, projectRoot)
  } catch (err) {
    const prefix = err instanceof ConfigError ? 'Configuration error' : 'Error'
    process.stderr.write(`${prefix}: ${maskSecrets(errorMessage(err))}\n`)
    return RUN_EXIT_ERROR
  }

  const eventBus = createEventBus()
  const engine = createDeliberationEngine({ client, settings: config.deliberation, eventBus })
  const runner = createJobRunner({ store: services.store, engine, defaultBackends, eventBus })
  services.registry.register('jobRunner', runner)

  eventBus.on('job:progress', ({ round, message }) => {
    process.stderr.write(`[${String(round)}/${String(TOTAL_ROUNDS)}] ${message}\n`)
  })

  try {
    let submitted: Job
    try {
      submitted = runner.submit({
        thesis: opts.thesis,
        ...(opts.context !== undefined && { context: opts.context }),
        ...(requestedModels !== undefined && { models: requestedModels }),
      })
    } catch (err) {
      if (err instanceof DeliberationInputError) {
        process.stderr.write(`Error: ${err.message}\n`)
        return RUN_EXIT_USAGE
      }
      throw err
    }

    if (format === 'human') {
      process.stderr.write(`Submitted ${submitted.id}\n`)
    }

    const startedAt = Date.now()
    const job = await runner.waitFor(submitted.id)
    if (format === 'human' && job.status === 'completed') {
      process.stderr.write(`Completed ${job.id} in ${formatDuration(Date.now() - startedAt)}\n`)
    }
    writeResult(job, format, version)

    if (job.status !== 'completed') {
      if (format === 'human') {
        process.stderr.write(`Deliberation failed: ${maskSecrets(job.error ?? 'unknown error')}\n`)
      }
      return RUN_EXIT_ERROR
    }
    return RUN_EXIT_SUCCESS
  } catch (err) {
    logger.error({ err }, 'run command failed')
    process.stderr.write(`Error: ${maskSecrets(errorMessage(err))}\n`)
    return RUN_EXIT_ERROR
  } finally {
    await services.registry.shutdownAll()
  }
}

// ---------------------------------------------------------------------------
// Commander registration
// ---------------------------------------------------------------------------

function collectModel(value: string, previous: string[]): string[] {
  return [...previous, value]
}

/**
 * Register the `run` command on a Commander program.
 */
export function registerRunCommand(program: Command, version: string): void {
  program
    .command('run <thesis>')
    .description('Deliberate on a thesis with three independent models')
    .option('--context <text>', 'Background the agents should take into account')
    .option('--model <id>', 'Backend model (repeat exactly 3 times)', collectModel, [])
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .option('--project-root <path>', 'Directory holding .deliberate/', process.cwd())
    .action(
      async (
        thesis: string,
        opts: { context?: string; model: string[]; outputFormat: string; projectRoot: string }
      ) => {
        const exitCode = await runDeliberateRun({
          thesis,
          ...(opts.context !== undefined && { context: opts.context }),
          models: opts.model,
          outputFormat: parseOutputFormat(opts.outputFormat),
          projectRoot: opts.projectRoot,
          version,
        })
        process.exitCode = exitCode
      }
    )
}
