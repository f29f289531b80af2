/**
 * DeliberationEngineImpl: the three-round protocol state machine.
 *
 *   R1_RUNNING → R2_RUNNING → R3_RUNNING → DONE
 *
 * Round 1 fans out one role-framed analysis per backend, round 2 lets each
 * agent read the others' analyses under anonymized labels, round 3 asks the
 * first backend for a synthesis that the parser reduces to a result.
 * No round is retried and no state is re-entered.
 */

import { z } from 'zod'
import { createLogger } from '../../utils/logger.js'
import { preview } from '../../utils/helpers.js'
import { DeliberationInputError } from '../../core/errors.js'
import type { TypedEventBus } from '../../core/event-bus.js'
import type { BackendClient } from '../backend/types.js'
import type { DeliberationSettings } from '../config/config-schema.js'
import { DEFAULT_DELIBERATION_SETTINGS } from '../config/defaults.js'
import { agentId } from './agent-caller.js'
import type { AgentCallOptions } from './agent-caller.js'
import { buildAnalysisCalls, buildCrossReadingCalls, runRound } from './round-orchestrator.js'
import { agentLabel, buildSynthesisPrompt } from './prompts.js'
import { parseSynthesis } from './synthesis-parser.js'
import type { DeliberationEngine } from './deliberation-engine.js'
import type {
  AgentCall,
  DeliberationInput,
  DeliberationResult,
  ProgressCallback,
  Round,
  RoundNumber,
} from './types.js'

const logger = createLogger('deliberation:engine')

export const ROUND_MESSAGES: Readonly<Record<RoundNumber, string>> = {
  1: 'Running independent analysis...',
  2: 'Running cross-reading...',
  3: 'Synthesizing results...',
}

export const TOTAL_ROUNDS = 3

export const DeliberationInputSchema = z.object({
  thesis: z.string().refine((s) => s.trim().length > 0, 'thesis must not be empty'),
  context: z.string().nullable(),
  backends: z.tuple([z.string().min(1), z.string().min(1), z.string().min(1)]),
})

export type EngineSettings = Pick<
  DeliberationSettings,
  'max_output_tokens' | 'analysis_temperature' | 'synthesis_temperature' | 'fallback_max_chars'
>

export interface DeliberationEngineOptions {
  client: BackendClient
  settings?: Partial<EngineSettings>
  /** Receives round:complete after every round */
  eventBus?: TypedEventBus
  /** Date shown in round 1 prompts */
  now?: () => Date
}

// ---------------------------------------------------------------------------
// DeliberationEngineImpl
// ---------------------------------------------------------------------------

export class DeliberationEngineImpl implements DeliberationEngine {
  private readonly _client: BackendClient
  private readonly _settings: EngineSettings
  private readonly _eventBus: TypedEventBus | undefined
  private readonly _now: () => Date

  constructor(options: DeliberationEngineOptions) {
    this._client = options.client
    this._settings = {
      max_output_tokens: options.settings?.max_output_tokens ?? DEFAULT_DELIBERATION_SETTINGS.max_output_tokens,
      analysis_temperature:
        options.settings?.analysis_temperature ?? DEFAULT_DELIBERATION_SETTINGS.analysis_temperature,
      synthesis_temperature:
        options.settings?.synthesis_temperature ?? DEFAULT_DELIBERATION_SETTINGS.synthesis_temperature,
      fallback_max_chars: options.settings?.fallback_max_chars ?? DEFAULT_DELIBERATION_SETTINGS.fallback_max_chars,
    }
    this._eventBus = options.eventBus
    this._now = options.now ?? (() => new Date())
  }

  async run(input: DeliberationInput, onProgress?: ProgressCallback): Promise<DeliberationResult> {
    const parsed = DeliberationInputSchema.safeParse(input)
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')
      throw new DeliberationInputError(`Invalid deliberation input: ${issues}`, {
        issues: parsed.error.issues,
      })
    }
    const valid = parsed.data
    logger.info({ thesis: preview(valid.thesis), backends: valid.backends }, 'Deliberation starting')

    const analysis: AgentCallOptions = {
      temperature: this._settings.analysis_temperature,
      maxOutputTokens: this._settings.max_output_tokens,
    }

    await onProgress?.(1, ROUND_MESSAGES[1])
    const round1 = await this._runRound(1, buildAnalysisCalls(valid, this._now()), analysis)

    await onProgress?.(2, ROUND_MESSAGES[2])
    const round2 = await this._runRound(2, buildCrossReadingCalls(valid, round1), analysis)

    await onProgress?.(3, ROUND_MESSAGES[3])
    const synthesisCall: AgentCall = {
      agentId: agentId(0),
      backend: valid.backends[0],
      prompt: buildSynthesisPrompt(
        valid.thesis,
        round2.outputs.map((o, i) => ({ label: agentLabel(i), content: o.content }))
      ),
    }
    const round3 = await this._runRound(3, [synthesisCall], {
      temperature: this._settings.synthesis_temperature,
      maxOutputTokens: this._settings.max_output_tokens,
    })

    const synthesis = round3.outputs[0]?.content ?? ''
    const result = parseSynthesis(synthesis, { fallbackMaxChars: this._settings.fallback_max_chars })
    const tokensUsed = [round1, round2, round3].reduce((sum, round) => sum + roundTokens(round), 0)

    logger.info(
      { verdict: preview(result.verdict), confidence: result.confidence, tokensUsed },
      'Deliberation complete'
    )

    return { ...result, tokensUsed, roundsCompleted: TOTAL_ROUNDS }
  }

  private async _runRound(
    round: RoundNumber,
    calls: readonly AgentCall[],
    options: AgentCallOptions
  ): Promise<Round> {
    const result = await runRound(this._client, round, calls, options)
    this._eventBus?.emit('round:complete', {
      round,
      agents: result.outputs.length,
      degraded: result.outputs.filter((o) => o.degraded).length,
      tokensUsed: roundTokens(result),
    })
    return result
  }
}

function roundTokens(round: Round): number {
  return round.outputs.reduce((sum, o) => sum + o.tokensUsed, 0)
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

export function createDeliberationEngine(options: DeliberationEngineOptions): DeliberationEngine {
  return new DeliberationEngineImpl(options)
}
