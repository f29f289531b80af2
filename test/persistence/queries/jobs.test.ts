/**
 * Tests for the job query functions.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import BetterSqlite3 from 'better-sqlite3'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { runMigrations } from '../../../src/persistence/migrations/index.js'
import {
  createJob,
  getJob,
  getJobOrThrow,
  listJobs,
  markJobRunning,
  updateJobRound,
  completeJob,
  failJob,
} from '../../../src/persistence/queries/jobs.js'
import type { DeliberationResult } from '../../../src/modules/deliberation/types.js'
import { JobNotFoundError } from '../../../src/core/errors.js'

const BACKENDS = ['a/one', 'b/two', 'c/three']

const RESULT: DeliberationResult = {
  verdict: 'Qualified yes',
  confidence: 'high',
  reasoning: 'Because.',
  keyAgreements: ['one'],
  concerns: ['two'],
  divergences: [
    {
      topic: 'Scope',
      description: 'How broad',
      positions: [{ agent: 'Agent Alpha', view: 'Broad', confidence: 'low' }],
    },
  ],
  strongestAgreement: 'one',
  openQuestions: [],
  tokensUsed: 1234,
  roundsCompleted: 3,
}

describe('job queries', () => {
  let db: BetterSqlite3Database

  beforeEach(() => {
    db = new BetterSqlite3(':memory:')
    runMigrations(db)
  })

  afterEach(() => {
    db.close()
  })

  describe('createJob', () => {
    it('stores a pending job', () => {
      const job = createJob(db, { id: 'dlb-1', thesis: 'A thesis', context: 'Some context', backends: BACKENDS })
      expect(job).toMatchObject({
        id: 'dlb-1',
        status: 'pending',
        thesis: 'A thesis',
        context: 'Some context',
        backends: BACKENDS,
        currentRound: null,
        result: null,
        error: null,
        tokensUsed: 0,
        completedAt: null,
      })
      expect(Number.isNaN(Date.parse(job.createdAt))).toBe(false)
    })

    it('defaults context to null', () => {
      expect(createJob(db, { id: 'dlb-2', thesis: 't', backends: BACKENDS }).context).toBeNull()
    })

    it('rejects an empty thesis', () => {
      expect(() => createJob(db, { id: 'dlb-3', thesis: '', backends: BACKENDS })).toThrow()
    })

    it('rejects a backend list that is not three long', () => {
      expect(() => createJob(db, { id: 'dlb-4', thesis: 't', backends: ['a/one'] })).toThrow()
    })

    it('rejects a duplicate id', () => {
      createJob(db, { id: 'dlb-5', thesis: 't', backends: BACKENDS })
      expect(() => createJob(db, { id: 'dlb-5', thesis: 't', backends: BACKENDS })).toThrow(/UNIQUE/)
    })
  })

  describe('getJob', () => {
    it('returns undefined for an unknown id', () => {
      expect(getJob(db, 'dlb-missing')).toBeUndefined()
    })

    it('getJobOrThrow raises JobNotFoundError', () => {
      expect(() => getJobOrThrow(db, 'dlb-missing')).toThrow(JobNotFoundError)
    })
  })

  describe('status transitions', () => {
    beforeEach(() => {
      createJob(db, { id: 'dlb-1', thesis: 't', backends: BACKENDS })
    })

    it('marks a job running and tracks its round', () => {
      markJobRunning(db, 'dlb-1')
      updateJobRound(db, 'dlb-1', 2)
      expect(getJobOrThrow(db, 'dlb-1')).toMatchObject({ status: 'running', currentRound: 2 })
    })

    it('rejects an out-of-range round', () => {
      expect(() => updateJobRound(db, 'dlb-1', 4)).toThrow()
    })

    it('stores the result of a completed job', () => {
      completeJob(db, 'dlb-1', RESULT)
      const job = getJobOrThrow(db, 'dlb-1')
      expect(job.status).toBe('completed')
      expect(job.result).toEqual(RESULT)
      expect(job.tokensUsed).toBe(1234)
      expect(job.completedAt).not.toBeNull()
    })

    it('stores the error of a failed job', () => {
      failJob(db, 'dlb-1', 'engine exploded')
      const job = getJobOrThrow(db, 'dlb-1')
      expect(job.status).toBe('failed')
      expect(job.error).toBe('engine exploded')
      expect(job.result).toBeNull()
      expect(job.completedAt).not.toBeNull()
    })

    it('raises JobNotFoundError when updating an unknown job', () => {
      expect(() => markJobRunning(db, 'dlb-missing')).toThrow(JobNotFoundError)
      expect(() => updateJobRound(db, 'dlb-missing', 1)).toThrow(JobNotFoundError)
      expect(() => completeJob(db, 'dlb-missing', RESULT)).toThrow(JobNotFoundError)
      expect(() => failJob(db, 'dlb-missing', 'x')).toThrow(JobNotFoundError)
    })
  })

  describe('listJobs', () => {
    beforeEach(() => {
      for (const id of ['dlb-a', 'dlb-b', 'dlb-c']) {
        createJob(db, { id, thesis: `thesis ${id}`, backends: BACKENDS })
      }
      failJob(db, 'dlb-b', 'boom')
    })

    it('returns the most recent jobs first', () => {
      expect(listJobs(db).map((j) => j.id)).toEqual(['dlb-c', 'dlb-b', 'dlb-a'])
    })

    it('honours the limit', () => {
      expect(listJobs(db, { limit: 2 }).map((j) => j.id)).toEqual(['dlb-c', 'dlb-b'])
    })

    it('filters by status', () => {
      expect(listJobs(db, { status: 'failed' }).map((j) => j.id)).toEqual(['dlb-b'])
    })
  })
})
