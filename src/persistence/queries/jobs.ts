/**
 * Job query functions for the SQLite persistence layer.
 *
 * Status moves pending → running → completed | failed. Timestamps are ISO-8601
 * strings written by the caller's clock.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { JobNotFoundError } from '../../core/errors.js'
import type { DeliberationResult } from '../../modules/deliberation/types.js'
import {
  BackendListSchema,
  CreateJobInputSchema,
  JobRowSchema,
  ListJobsOptionsSchema,
  RoundNumberSchema,
  StoredResultSchema,
} from '../schemas/jobs.js'
import type { CreateJobInput, JobRow, JobStatus, ListJobsOptions } from '../schemas/jobs.js'

export type { CreateJobInput, JobStatus, ListJobsOptions }

// ---------------------------------------------------------------------------
// Job
// ---------------------------------------------------------------------------

export interface Job {
  id: string
  status: JobStatus
  thesis: string
  context: string | null
  backends: string[]
  currentRound: number | null
  result: DeliberationResult | null
  error: string | null
  tokensUsed: number
  createdAt: string
  completedAt: string | null
}

function toJob(raw: unknown): Job {
  const row: JobRow = JobRowSchema.parse(raw)
  return {
    id: row.id,
    status: row.status,
    thesis: row.thesis,
    context: row.context,
    backends: BackendListSchema.parse(JSON.parse(row.backends_json)),
    currentRound: row.current_round,
    result: row.result_json === null ? null : StoredResultSchema.parse(JSON.parse(row.result_json)),
    error: row.error,
    tokensUsed: row.tokens_used,
    createdAt: row.created_at,
    completedAt: row.completed_at,
  }
}

function requireChange(changes: number, id: string): void {
  if (changes === 0) throw new JobNotFoundError(id)
}

function now(): string {
  return new Date().toISOString()
}

// ---------------------------------------------------------------------------
// Queries
// ---------------------------------------------------------------------------

/**
 * Insert a new pending job.
 */
export function createJob(db: BetterSqlite3Database, input: CreateJobInput): Job {
  const validated = CreateJobInputSchema.parse(input)

  db.prepare(
    `INSERT INTO jobs (id, status, thesis, context, backends_json, created_at)
     VALUES (?, 'pending', ?, ?, ?, ?)`
  ).run(
    validated.id,
    validated.thesis,
    validated.context ?? null,
    JSON.stringify(validated.backends),
    now()
  )

  return getJobOrThrow(db, validated.id)
}

export function getJob(db: BetterSqlite3Database, id: string): Job | undefined {
  const row: unknown = db.prepare('SELECT * FROM jobs WHERE id = ?').get(id)
  return row === undefined ? undefined : toJob(row)
}

/**
 * @throws {JobNotFoundError}
 */
export function getJobOrThrow(db: BetterSqlite3Database, id: string): Job {
  const job = getJob(db, id)
  if (job === undefined) throw new JobNotFoundError(id)
  return job
}

/**
 * Most recent jobs first.
 */
export function listJobs(db: BetterSqlite3Database, options: ListJobsOptions = {}): Job[] {
  const { limit, status } = ListJobsOptionsSchema.parse(options)
  const rows: unknown[] =
    status === undefined
      ? db.prepare('SELECT * FROM jobs ORDER BY created_at DESC, rowid DESC LIMIT ?').all(limit)
      : db
          .prepare('SELECT * FROM jobs WHERE status = ? ORDER BY created_at DESC, rowid DESC LIMIT ?')
          .all(status, limit)
  return rows.map(toJob)
}

export function markJobRunning(db: BetterSqlite3Database, id: string): void {
  const info = db.prepare("UPDATE jobs SET status = 'running' WHERE id = ?").run(id)
  requireChange(info.changes, id)
}

export function updateJobRound(db: BetterSqlite3Database, id: string, round: number): void {
  const validRound = RoundNumberSchema.parse(round)
  const info = db.prepare('UPDATE jobs SET current_round = ? WHERE id = ?').run(validRound, id)
  requireChange(info.changes, id)
}

export function completeJob(db: BetterSqlite3Database, id: string, result: DeliberationResult): void {
  const stored = StoredResultSchema.parse(result)
  const info = db
    .prepare(
      `UPDATE jobs
       SET status = 'completed', result_json = ?, tokens_used = ?, error = NULL, completed_at = ?
       WHERE id = ?`
    )
    .run(JSON.stringify(stored), stored.tokensUsed, now(), id)
  requireChange(info.changes, id)
}

export function failJob(db: BetterSqlite3Database, id: string, error: string): void {
  const info = db
    .prepare("UPDATE jobs SET status = 'failed', error = ?, completed_at = ? WHERE id = ?")
    .run(error, now(), id)
  requireChange(info.changes, id)
}
