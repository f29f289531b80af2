/**
 * Unit tests for the `deliberate jobs` command group
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { rm } from 'fs/promises'
import { join } from 'path'
import { createDatabaseService } from '../../../persistence/database.js'
import { createJob, failJob } from '../../../persistence/queries/jobs.js'
import { runJobsList, runJobsShow, JOBS_EXIT_SUCCESS, JOBS_EXIT_INVALID } from '../jobs.js'
import { runDeliberateRun } from '../run.js'
import { captureOutput, makeProjectRoot, scriptedClient } from './cli-helpers.js'

const BACKENDS = ['a/one', 'b/two', 'c/three']

let projectRoot: string

beforeEach(async () => {
  projectRoot = await makeProjectRoot()
})

afterEach(async () => {
  vi.restoreAllMocks()
  await rm(projectRoot, { recursive: true, force: true })
})

function baseOptions(): { projectRoot: string; globalConfigDir: string; env: NodeJS.ProcessEnv } {
  return { projectRoot, globalConfigDir: join(projectRoot, 'global'), env: {} }
}

async function seedJobs(seed: (db: Parameters<typeof createJob>[0]) => void): Promise<void> {
  const database = createDatabaseService(join(projectRoot, '.deliberate', 'deliberate.db'))
  await database.initialize()
  try {
    seed(database.db)
  } finally {
    await database.shutdown()
  }
}

describe('runJobsShow', () => {
  it('exits 2 for an unknown job', async () => {
    const { getStderr, restore } = captureOutput()
    let exitCode: number
    try {
      exitCode = await runJobsShow('dlb-missing', baseOptions())
    } finally {
      restore()
    }
    expect(exitCode).toBe(JOBS_EXIT_INVALID)
    expect(getStderr()).toBe('Error: Job not found: dlb-missing\n')
  })

  it('shows the error of a failed job', async () => {
    await seedJobs((db) => {
      createJob(db, { id: 'dlb-failed', thesis: 'A thesis', backends: BACKENDS })
      failJob(db, 'dlb-failed', 'engine exploded')
    })

    const { getStdout, restore } = captureOutput()
    let exitCode: number
    try {
      exitCode = await runJobsShow('dlb-failed', baseOptions())
    } finally {
      restore()
    }
    expect(exitCode).toBe(JOBS_EXIT_SUCCESS)
    const lines = getStdout().split('\n')
    expect(lines[0]).toBe('Job dlb-failed  Status: failed')
    expect(lines[1]).toBe('Thesis: A thesis')
    expect(lines[2]).toBe('Models: a/one, b/two, c/three')
    expect(lines).toContain('Error: engine exploded')
  })

  it('shows a job submitted by run, with its result', async () => {
    const { client } = scriptedClient()
    const { getStdout, restore } = captureOutput()
    let jobId = ''
    try {
      await runDeliberateRun({ ...baseOptions(), thesis: 'Remote work is better', outputFormat: 'json', client })
      const parsed: unknown = JSON.parse(getStdout())
      if (typeof parsed === 'object' && parsed !== null && 'data' in parsed) {
        const data: unknown = parsed.data
        if (typeof data === 'object' && data !== null && 'jobId' in data && typeof data.jobId === 'string') {
          jobId = data.jobId
        }
      }
    } finally {
      restore()
    }
    expect(jobId).toMatch(/^dlb-/)

    const second = captureOutput()
    let exitCode: number
    try {
      exitCode = await runJobsShow(jobId, { ...baseOptions(), outputFormat: 'json' })
    } finally {
      second.restore()
    }
    expect(exitCode).toBe(JOBS_EXIT_SUCCESS)
    const shown: unknown = JSON.parse(second.getStdout())
    expect(shown).toMatchObject({
      command: 'deliberate jobs show',
      data: { id: jobId, status: 'completed', currentRound: 3, tokensUsed: 70 },
    })
  })
})

describe('runJobsList', () => {
  it('reports an empty store', async () => {
    const { getStdout, restore } = captureOutput()
    try {
      await runJobsList(baseOptions())
    } finally {
      restore()
    }
    expect(getStdout()).toBe('No jobs found.\n')
  })

  it('lists jobs most recent first, honouring the limit', async () => {
    await seedJobs((db) => {
      createJob(db, { id: 'dlb-1', thesis: 'first', backends: BACKENDS })
      createJob(db, { id: 'dlb-2', thesis: 'second', backends: BACKENDS })
      createJob(db, { id: 'dlb-3', thesis: 'third', backends: BACKENDS })
    })

    const { getStdout, restore } = captureOutput()
    let exitCode: number
    try {
      exitCode = await runJobsList({ ...baseOptions(), limit: 2, outputFormat: 'json' })
    } finally {
      restore()
    }
    expect(exitCode).toBe(JOBS_EXIT_SUCCESS)
    const parsed: unknown = JSON.parse(getStdout())
    expect(parsed).toMatchObject({ data: [{ id: 'dlb-3' }, { id: 'dlb-2' }] })
  })

  it('renders a table in human format', async () => {
    await seedJobs((db) => {
      createJob(db, { id: 'dlb-1', thesis: 'first', backends: BACKENDS })
    })

    const { getStdout, restore } = captureOutput()
    try {
      await runJobsList(baseOptions())
    } finally {
      restore()
    }
    const lines = getStdout().split('\n')
    expect(lines[0]).toMatch(/^ID\s+\| Status\s+\| Round \| Tokens \| Created\s+\| Thesis$/)
    expect(lines[2]).toMatch(/^dlb-1 \| pending \| -\s+\| 0\s+\| \S+ \| first\s*$/)
  })

  it('rejects a non-positive limit', async () => {
    const { getStderr, restore } = captureOutput()
    let exitCode: number
    try {
      exitCode = await runJobsList({ ...baseOptions(), limit: 0 })
    } finally {
      restore()
    }
    expect(exitCode).toBe(JOBS_EXIT_INVALID)
    expect(getStderr()).toBe('Error: --limit must be a positive integer\n')
  })
})
