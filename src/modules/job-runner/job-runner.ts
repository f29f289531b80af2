/**
 * JobRunner interface definition.
 *
 * Accepts deliberation requests, runs them in the background and records
 * their progress and outcome in the job store.
 */

import { z } from 'zod'
import type { BaseService } from '../../core/di.js'
import type { Job } from '../../persistence/queries/jobs.js'

export const DeliberateRequestSchema = z.object({
  thesis: z.string().refine((s) => s.trim().length > 0, 'thesis must not be empty'),
  context: z.string().nullable().optional(),
  /** Exactly three backend identifiers; defaults to the configured models */
  models: z.tuple([z.string().min(1), z.string().min(1), z.string().min(1)]).optional(),
})

export type DeliberateRequest = z.input<typeof DeliberateRequestSchema>

export interface JobRunner extends BaseService {
  /**
   * Store a pending job and start its deliberation in the background.
   * @throws {DeliberationInputError} when the request is invalid.
   */
  submit(request: DeliberateRequest): Job

  /**
   * Resolve with the job once its run (if any) has finished.
   * @throws {JobNotFoundError}
   */
  waitFor(jobId: string): Promise<Job>

  /** Number of deliberations still running */
  readonly activeCount: number
}
