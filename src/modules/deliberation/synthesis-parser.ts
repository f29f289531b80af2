/**
 * Synthesis parser: reduces the free-form round 3 response to a DeliberationResult.
 *
 * Strategy (first success wins):
 *  1. fenced ```json blocks, in document order
 *  2. a raw object opening with "verdict" or "answer"
 *  3. the first paragraph of the text
 *
 * parseSynthesis never throws.
 */

import { createLogger } from '../../utils/logger.js'
import { isPlainObject, preview } from '../../utils/helpers.js'
import { SynthesisPayloadSchema } from './schemas.js'
import type { DeliberationResult } from './types.js'

const logger = createLogger('deliberation:synthesis-parser')

export const DEFAULT_FALLBACK_MAX_CHARS = 500
export const EMPTY_SYNTHESIS_VERDICT = 'Deliberation complete. No structured verdict was returned.'

const FENCE_PATTERN = /```json/gi
const RAW_OBJECT_PATTERN = /\{\s*"(?:verdict|answer)"\s*:/g

export interface ParseSynthesisOptions {
  /** Verdict length cap for the plain-text fallback */
  fallbackMaxChars?: number
}

export interface ExtractedJson {
  /** Balanced object text as found in the response */
  json: string
  data: Record<string, unknown>
  source: 'fenced' | 'raw'
}

// ---------------------------------------------------------------------------
// Extraction
// ---------------------------------------------------------------------------

/**
 * Return the substring from the first `{` at or after `fromIndex` to its
 * matching `}`. Braces inside JSON string literals are not counted.
 * Returns null when there is no `{` or the braces never balance.
 */
export function extractBalancedObject(text: string, fromIndex = 0): string | null {
  const start = text.indexOf('{', fromIndex)
  if (start === -1) return null

  let depth = 0
  let inString = false
  let escaped = false

  for (let i = start; i < text.length; i++) {
    const ch = text[i]
    if (inString) {
      if (escaped) escaped = false
      else if (ch === '\\') escaped = true
      else if (ch === '"') inString = false
      continue
    }
    if (ch === '"') {
      inString = true
    } else if (ch === '{') {
      depth++
    } else if (ch === '}') {
      depth--
      if (depth === 0) return text.slice(start, i + 1)
    }
  }
  return null
}

function decodeObject(json: string): Record<string, unknown> | null {
  try {
    const parsed: unknown = JSON.parse(json)
    return isPlainObject(parsed) ? parsed : null
  } catch (err) {
    logger.debug({ err, json: preview(json, 200) }, 'Candidate synthesis JSON did not decode')
    return null
  }
}

function fromIndices(text: string, indices: readonly number[], source: ExtractedJson['source']): ExtractedJson | null {
  for (const index of indices) {
    const json = extractBalancedObject(text, index)
    if (json === null) continue
    const data = decodeObject(json)
    if (data !== null) return { json, data, source }
  }
  return null
}

/**
 * Locate the structured block of a synthesis response.
 */
export function extractSynthesisJson(text: string): ExtractedJson | null {
  const fenceStarts = Array.from(text.matchAll(FENCE_PATTERN), (m) => m.index ?? 0)
  const fenced = fromIndices(text, fenceStarts, 'fenced')
  if (fenced !== null) return fenced

  const rawStarts = Array.from(text.matchAll(RAW_OBJECT_PATTERN), (m) => m.index ?? 0)
  return fromIndices(text, rawStarts, 'raw')
}

// ---------------------------------------------------------------------------
// Result building
// ---------------------------------------------------------------------------

function buildFromPayload(data: Record<string, unknown>): DeliberationResult {
  const payload = SynthesisPayloadSchema.parse(data)
  return {
    verdict: payload.verdict,
    confidence: payload.confidence,
    reasoning: payload.reasoning,
    keyAgreements: payload.key_agreements,
    concerns: payload.concerns,
    divergences: payload.divergences,
    strongestAgreement: payload.strongest_agreement,
    openQuestions: payload.open_questions,
    tokensUsed: 0,
    roundsCompleted: 0,
  }
}

/** Cut to at most `maxChars` code points, never splitting a surrogate pair */
function truncateCodePoints(text: string, maxChars: number): string {
  return Array.from(text).slice(0, maxChars).join('')
}

function buildFallback(text: string, maxChars: number): DeliberationResult {
  const firstParagraph = text
    .split(/\n\s*\n/)
    .map((p) => p.trim())
    .find((p) => p.length > 0)

  return {
    verdict: firstParagraph === undefined ? EMPTY_SYNTHESIS_VERDICT : truncateCodePoints(firstParagraph, maxChars),
    confidence: 'medium',
    reasoning: '',
    keyAgreements: [],
    concerns: [],
    divergences: [],
    strongestAgreement: '',
    openQuestions: [],
    tokensUsed: 0,
    roundsCompleted: 0,
  }
}

/**
 * Parse a synthesis response. tokensUsed and roundsCompleted are left at 0
 * for the caller to fill in.
 */
export function parseSynthesis(text: string, options: ParseSynthesisOptions = {}): DeliberationResult {
  const extracted = extractSynthesisJson(text)
  if (extracted !== null) {
    logger.debug({ source: extracted.source }, 'Decoded structured synthesis')
    return buildFromPayload(extracted.data)
  }

  logger.warn({ length: text.length }, 'No structured synthesis found, using fallback extraction')
  return buildFallback(text, options.fallbackMaxChars ?? DEFAULT_FALLBACK_MAX_CHARS)
}
