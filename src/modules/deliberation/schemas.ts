/**
 * Zod schemas for decoding the structured block of a synthesis response.
 *
 * Every field carries a default via `.catch`, so a payload that decodes as a
 * JSON object always yields a complete result.
 */

import { z } from 'zod'
import { isPlainObject } from '../../utils/helpers.js'

export const DEFAULT_VERDICT = 'No verdict provided'

// ---------------------------------------------------------------------------
// Field schemas
// ---------------------------------------------------------------------------

/** Case-insensitive high/medium/low; anything else is medium */
export const ConfidenceSchema = z
  .preprocess(
    (value) => (typeof value === 'string' ? value.trim().toLowerCase() : value),
    z.enum(['high', 'medium', 'low'])
  )
  .catch('medium')

const TextSchema = z.string().catch('')

/** Keeps string entries only */
const StringListSchema = z
  .array(z.unknown())
  .catch([])
  .transform((entries) => entries.filter((entry): entry is string => typeof entry === 'string'))

/** Keeps entries that decode as `item`, drops the rest */
function objectList<T extends z.ZodTypeAny>(item: T) {
  return z
    .array(z.unknown())
    .catch([])
    .transform((entries) =>
      entries.flatMap((entry): z.output<T>[] => {
        const parsed = item.safeParse(entry)
        return parsed.success ? [parsed.data] : []
      })
    )
}

export const DivergencePositionSchema = z.object({
  agent: TextSchema,
  view: TextSchema,
  confidence: ConfidenceSchema,
})

export const DivergenceSchema = z.object({
  topic: TextSchema,
  description: TextSchema,
  positions: objectList(DivergencePositionSchema),
})

// ---------------------------------------------------------------------------
// Legacy shape
// ---------------------------------------------------------------------------

/**
 * Older synthesis prompts asked for an answer-centric object. Its keys are
 * copied onto their canonical names unless the canonical key is present.
 */
export const LEGACY_KEY_MAP: Readonly<Record<string, string>> = {
  answer: 'verdict',
  support: 'key_agreements',
  conviction: 'strongest_agreement',
}

export function normalizeLegacyKeys(raw: unknown): unknown {
  if (!isPlainObject(raw)) return raw
  const normalized: Record<string, unknown> = { ...raw }
  for (const [legacy, canonical] of Object.entries(LEGACY_KEY_MAP)) {
    if (normalized[canonical] === undefined && normalized[legacy] !== undefined) {
      normalized[canonical] = normalized[legacy]
    }
  }
  return normalized
}

// ---------------------------------------------------------------------------
// Synthesis payload
// ---------------------------------------------------------------------------

export const SynthesisPayloadSchema = z.preprocess(
  normalizeLegacyKeys,
  z.object({
    verdict: z.string().catch(DEFAULT_VERDICT),
    confidence: ConfidenceSchema,
    reasoning: TextSchema,
    key_agreements: StringListSchema,
    concerns: StringListSchema,
    divergences: objectList(DivergenceSchema),
    strongest_agreement: TextSchema,
    open_questions: StringListSchema,
  })
)

export type SynthesisPayload = z.output<typeof SynthesisPayloadSchema>
