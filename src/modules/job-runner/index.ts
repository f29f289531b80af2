/**
 * Barrel exports for the job-runner module.
 */

export { JobRunnerImpl, createJobRunner, JOB_ID_PREFIX } from './job-runner-impl.js'
export type { JobRunnerOptions } from './job-runner-impl.js'
export { DeliberateRequestSchema } from './job-runner.js'
export type { DeliberateRequest, JobRunner } from './job-runner.js'
export { SqliteJobStore } from './job-store.js'
export type { JobStore } from './job-store.js'
export type { Job, JobStatus } from '../../persistence/queries/jobs.js'
