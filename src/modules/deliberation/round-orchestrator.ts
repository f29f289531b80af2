/**
 * Round orchestrator: concurrent fan-out of agent calls with an ordered barrier,
 * plus construction of the round 1 and round 2 call lists.
 */

import { createLogger } from '../../utils/logger.js'
import type { BackendClient } from '../backend/types.js'
import { agentId, callAgent } from './agent-caller.js'
import type { AgentCallOptions } from './agent-caller.js'
import { agentLabel, buildAnalysisPrompt, buildCrossReadingPrompt } from './prompts.js'
import type { AgentCall, DeliberationInput, Round, RoundNumber } from './types.js'

const logger = createLogger('deliberation:round-orchestrator')

/**
 * Issue every call concurrently and resolve once all have settled.
 * outputs[i] always corresponds to calls[i].
 */
export async function runRound(
  client: BackendClient,
  round: RoundNumber,
  calls: readonly AgentCall[],
  options: AgentCallOptions
): Promise<Round> {
  const outputs = await Promise.all(
    calls.map((call) => callAgent(client, call.backend, call.prompt, call.agentId, options))
  )

  const degraded = outputs.filter((o) => o.degraded).length
  logger.info({ round, agents: outputs.length, degraded }, 'Round complete')

  return { round, outputs }
}

/** Round 1: one role-framed prompt per backend, no inter-agent data */
export function buildAnalysisCalls(input: DeliberationInput, today: Date = new Date()): AgentCall[] {
  return input.backends.map((backend, i) => ({
    agentId: agentId(i),
    backend,
    prompt: buildAnalysisPrompt(input.thesis, i, input.context, today),
  }))
}

/** Round 2: each agent reads its own analysis and the others' under positional labels */
export function buildCrossReadingCalls(input: DeliberationInput, round1: Round): AgentCall[] {
  return input.backends.map((backend, i) => {
    const own = round1.outputs[i]?.content ?? ''
    const others = round1.outputs
      .map((output, j) => ({ label: agentLabel(j), content: output.content, index: j }))
      .filter((o) => o.index !== i)
      .map(({ label, content }) => ({ label, content }))

    return {
      agentId: agentId(i),
      backend,
      prompt: buildCrossReadingPrompt(input.thesis, own, others),
    }
  })
}
