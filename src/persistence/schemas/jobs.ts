/**
 * Zod schemas for the job store persistence layer.
 *
 * Validates query inputs and the rows read back from the jobs table.
 */

import { z } from 'zod'

// ---------------------------------------------------------------------------
// Enums
// ---------------------------------------------------------------------------

export const JobStatusEnum = z.enum(['pending', 'running', 'completed', 'failed'])
export type JobStatus = z.infer<typeof JobStatusEnum>

export const RoundNumberSchema = z.union([z.literal(1), z.literal(2), z.literal(3)])

// ---------------------------------------------------------------------------
// Stored result
// ---------------------------------------------------------------------------

const ConfidenceEnum = z.enum(['high', 'medium', 'low'])

export const StoredResultSchema = z.object({
  verdict: z.string(),
  confidence: ConfidenceEnum,
  reasoning: z.string(),
  keyAgreements: z.array(z.string()),
  concerns: z.array(z.string()),
  divergences: z.array(
    z.object({
      topic: z.string(),
      description: z.string(),
      positions: z.array(z.object({ agent: z.string(), view: z.string(), confidence: ConfidenceEnum })),
    })
  ),
  strongestAgreement: z.string(),
  openQuestions: z.array(z.string()),
  tokensUsed: z.number().int().min(0),
  roundsCompleted: z.number().int().min(0),
})

// ---------------------------------------------------------------------------
// Rows
// ---------------------------------------------------------------------------

export const JobRowSchema = z.object({
  id: z.string().min(1),
  status: JobStatusEnum,
  thesis: z.string(),
  context: z.string().nullable(),
  backends_json: z.string(),
  current_round: z.number().int().nullable(),
  result_json: z.string().nullable(),
  error: z.string().nullable(),
  tokens_used: z.number().int(),
  created_at: z.string(),
  completed_at: z.string().nullable(),
})
export type JobRow = z.infer<typeof JobRowSchema>

export const BackendListSchema = z.array(z.string())

// ---------------------------------------------------------------------------
// Inputs
// ---------------------------------------------------------------------------

export const CreateJobInputSchema = z.object({
  id: z.string().min(1),
  thesis: z.string().min(1),
  context: z.string().nullable().optional(),
  backends: z.array(z.string().min(1)).length(3),
})
export type CreateJobInput = z.infer<typeof CreateJobInputSchema>

export const ListJobsOptionsSchema = z.object({
  limit: z.number().int().positive().max(1000).default(20),
  status: JobStatusEnum.optional(),
})
export type ListJobsOptions = z.input<typeof ListJobsOptionsSchema>
