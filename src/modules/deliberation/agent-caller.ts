/**
 * Agent caller: turns one backend call into one AgentOutput.
 *
 * A failed call becomes a degraded output instead of a rejection, so a round
 * always completes with one output per agent.
 */

import { createLogger } from '../../utils/logger.js'
import type { BackendClient } from '../backend/types.js'
import type { AgentOutput } from './types.js'

const logger = createLogger('deliberation:agent-caller')

export const DEFAULT_MAX_OUTPUT_TOKENS = 4096

export interface AgentCallOptions {
  temperature: number
  maxOutputTokens?: number
}

export function agentId(index: number): string {
  return `agent-${String(index)}`
}

export function degradedContent(message: string): string {
  return `[Error: ${message}]`
}

/**
 * Call `backend` with `prompt` on behalf of `id`. Never rejects.
 */
export async function callAgent(
  client: BackendClient,
  backend: string,
  prompt: string,
  id: string,
  options: AgentCallOptions
): Promise<AgentOutput> {
  try {
    const { content, tokensUsed } = await client.complete({
      backend,
      prompt,
      maxOutputTokens: options.maxOutputTokens ?? DEFAULT_MAX_OUTPUT_TOKENS,
      temperature: options.temperature,
    })
    return { agentId: id, backend, content, tokensUsed, degraded: false }
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    logger.error({ agentId: id, backend, err: message }, 'Agent call failed')
    return {
      agentId: id,
      backend,
      content: degradedContent(message),
      tokensUsed: 0,
      degraded: true,
      error: message,
    }
  }
}
