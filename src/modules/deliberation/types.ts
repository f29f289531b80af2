/**
 * Type definitions for the deliberation module.
 */

// ---------------------------------------------------------------------------
// Rounds and agent outputs
// ---------------------------------------------------------------------------

/** Independent analysis, cross-reading, synthesis */
export type RoundNumber = 1 | 2 | 3

export type Confidence = 'high' | 'medium' | 'low'

export const CONFIDENCE_LEVELS: readonly Confidence[] = ['high', 'medium', 'low']

/**
 * Result of a single backend call made on behalf of one agent.
 */
export interface AgentOutput {
  /** Positional id: agent-0, agent-1, agent-2 */
  readonly agentId: string
  /** Backend model identifier the call went to */
  readonly backend: string
  readonly content: string
  readonly tokensUsed: number
  /** True when the call failed and content holds the error placeholder */
  readonly degraded: boolean
  readonly error?: string
}

export interface Round {
  readonly round: RoundNumber
  /** Ordered by agent index, not by completion */
  readonly outputs: readonly AgentOutput[]
}

/**
 * One call to issue within a round.
 */
export interface AgentCall {
  agentId: string
  backend: string
  prompt: string
}

// ---------------------------------------------------------------------------
// Input
// ---------------------------------------------------------------------------

export type BackendTriple = readonly [string, string, string]

export interface DeliberationInput {
  thesis: string
  context: string | null
  backends: BackendTriple
}

/**
 * Invoked once before each round starts.
 */
export type ProgressCallback = (round: RoundNumber, message: string) => void | Promise<void>

// ---------------------------------------------------------------------------
// Result
// ---------------------------------------------------------------------------

export interface DivergencePosition {
  agent: string
  view: string
  confidence: Confidence
}

export interface Divergence {
  topic: string
  description: string
  positions: DivergencePosition[]
}

export interface DeliberationResult {
  verdict: string
  confidence: Confidence
  reasoning: string
  /** Points every agent supported */
  keyAgreements: string[]
  /** Risks and limitations */
  concerns: string[]
  divergences: Divergence[]
  /** What the agents most strongly agreed on */
  strongestAgreement: string
  openQuestions: string[]
  tokensUsed: number
  roundsCompleted: number
}
