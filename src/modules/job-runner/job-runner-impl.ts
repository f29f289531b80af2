/**
 * JobRunnerImpl: background dispatch of deliberations.
 *
 * Each submitted job is stored as pending, then run without blocking the
 * caller. Status moves pending → running → completed | failed; any error
 * raised during the run is recorded on the job rather than propagated.
 */

import { createLogger } from '../../utils/logger.js'
import { generateId, preview } from '../../utils/helpers.js'
import { DeliberationInputError, JobNotFoundError } from '../../core/errors.js'
import type { TypedEventBus } from '../../core/event-bus.js'
import type { Job } from '../../persistence/queries/jobs.js'
import type { DeliberationEngine } from '../deliberation/deliberation-engine.js'
import type { BackendTriple, DeliberationInput } from '../deliberation/types.js'
import type { JobStore } from './job-store.js'
import { DeliberateRequestSchema } from './job-runner.js'
import type { DeliberateRequest, JobRunner } from './job-runner.js'

const logger = createLogger('job-runner')

export const JOB_ID_PREFIX = 'dlb'

export interface JobRunnerOptions {
  store: JobStore
  engine: DeliberationEngine
  /** Used when a request names no models */
  defaultBackends: BackendTriple
  eventBus?: TypedEventBus
  idGenerator?: () => string
}

// ---------------------------------------------------------------------------
// JobRunnerImpl
// ---------------------------------------------------------------------------

export class JobRunnerImpl implements JobRunner {
  private readonly _store: JobStore
  private readonly _engine: DeliberationEngine
  private readonly _defaultBackends: BackendTriple
  private readonly _eventBus: TypedEventBus | undefined
  private readonly _idGenerator: () => string
  private readonly _inFlight = new Map<string, Promise<void>>()

  constructor(options: JobRunnerOptions) {
    this._store = options.store
    this._engine = options.engine
    this._defaultBackends = options.defaultBackends
    this._eventBus = options.eventBus
    this._idGenerator = options.idGenerator ?? (() => generateId(JOB_ID_PREFIX))
  }

  get activeCount(): number {
    return this._inFlight.size
  }

  async initialize(): Promise<void> {
    // Nothing to open; jobs are only started by submit()
  }

  async shutdown(): Promise<void> {
    if (this._inFlight.size > 0) {
      logger.info({ active: this._inFlight.size }, 'Waiting for in-flight deliberations')
    }
    await Promise.all(this._inFlight.values())
  }

  submit(request: DeliberateRequest): Job {
    const parsed = DeliberateRequestSchema.safeParse(request)
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.') || 'request'}: ${i.message}`).join('; ')
      throw new DeliberationInputError(`Invalid deliberation request: ${issues}`, {
        issues: parsed.error.issues,
      })
    }

    const input: DeliberationInput = {
      thesis: parsed.data.thesis,
      context: parsed.data.context ?? null,
      backends: parsed.data.models ?? this._defaultBackends,
    }

    const job = this._store.create({
      id: this._idGenerator(),
      thesis: input.thesis,
      context: input.context,
      backends: [...input.backends],
    })

    logger.info({ jobId: job.id, thesis: preview(input.thesis) }, 'Job submitted')
    this._eventBus?.emit('job:submitted', { jobId: job.id, thesis: input.thesis, backends: job.backends })

    // Deferred: the job's events fire only after submit() has returned
    const run = Promise.resolve()
      .then(() => this._execute(job.id, input))
      .finally(() => {
        this._inFlight.delete(job.id)
      })
    this._inFlight.set(job.id, run)

    return job
  }

  async waitFor(jobId: string): Promise<Job> {
    const run = this._inFlight.get(jobId)
    if (run !== undefined) await run

    const job = this._store.get(jobId)
    if (job === undefined) throw new JobNotFoundError(jobId)
    return job
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private async _execute(jobId: string, input: DeliberationInput): Promise<void> {
    try {
      this._store.markRunning(jobId)
      this._eventBus?.emit('job:started', { jobId })

      const result = await this._engine.run(input, (round, message) => {
        this._store.updateRound(jobId, round)
        this._eventBus?.emit('job:progress', { jobId, round, message })
      })

      this._store.complete(jobId, result)
      logger.info({ jobId, tokensUsed: result.tokensUsed }, 'Job completed')
      this._eventBus?.emit('job:completed', {
        jobId,
        tokensUsed: result.tokensUsed,
        roundsCompleted: result.roundsCompleted,
      })
    } catch (err) {
      this._recordFailure(jobId, err instanceof Error ? err.message : String(err))
    }
  }

  private _recordFailure(jobId: string, message: string): void {
    logger.error({ jobId, err: message }, 'Job failed')
    try {
      this._store.fail(jobId, message)
    } catch (storeErr) {
      logger.error({ jobId, err: storeErr }, 'Could not record job failure')
    }
    this._eventBus?.emit('job:failed', { jobId, error: message })
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

export function createJobRunner(options: JobRunnerOptions): JobRunner {
  return new JobRunnerImpl(options)
}
