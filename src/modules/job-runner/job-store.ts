/**
 * JobStore: persistence contract for deliberation jobs, with a SQLite
 * implementation over the persistence query layer.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import {
  createJob,
  getJob,
  listJobs,
  markJobRunning,
  updateJobRound,
  completeJob,
  failJob,
} from '../../persistence/queries/jobs.js'
import type { CreateJobInput, Job, ListJobsOptions } from '../../persistence/queries/jobs.js'
import type { DeliberationResult } from '../deliberation/types.js'

export interface JobStore {
  create(input: CreateJobInput): Job
  get(id: string): Job | undefined
  list(options?: ListJobsOptions): Job[]
  markRunning(id: string): void
  updateRound(id: string, round: number): void
  complete(id: string, result: DeliberationResult): void
  fail(id: string, error: string): void
}

export class SqliteJobStore implements JobStore {
  private readonly _db: BetterSqlite3Database

  constructor(db: BetterSqlite3Database) {
    this._db = db
  }

  create(input: CreateJobInput): Job {
    return createJob(this._db, input)
  }

  get(id: string): Job | undefined {
    return getJob(this._db, id)
  }

  list(options: ListJobsOptions = {}): Job[] {
    return listJobs(this._db, options)
  }

  markRunning(id: string): void {
    markJobRunning(this._db, id)
  }

  updateRound(id: string, round: number): void {
    updateJobRound(this._db, id, round)
  }

  complete(id: string, result: DeliberationResult): void {
    completeJob(this._db, id, result)
  }

  fail(id: string, error: string): void {
    failJob(this._db, id, error)
  }
}
