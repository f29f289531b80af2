/**
 * Barrel exports for the deliberation module.
 */

export type { DeliberationEngine } from './deliberation-engine.js'
export {
  DeliberationEngineImpl,
  createDeliberationEngine,
  DeliberationInputSchema,
  ROUND_MESSAGES,
  TOTAL_ROUNDS,
} from './deliberation-engine-impl.js'
export type { DeliberationEngineOptions, EngineSettings } from './deliberation-engine-impl.js'
export { callAgent, agentId, degradedContent, DEFAULT_MAX_OUTPUT_TOKENS } from './agent-caller.js'
export type { AgentCallOptions } from './agent-caller.js'
export { runRound, buildAnalysisCalls, buildCrossReadingCalls } from './round-orchestrator.js'
export {
  AGENT_LABELS,
  AGENT_ROLES,
  agentLabel,
  buildAnalysisPrompt,
  buildCrossReadingPrompt,
  buildSynthesisPrompt,
} from './prompts.js'
export {
  parseSynthesis,
  extractBalancedObject,
  extractSynthesisJson,
  DEFAULT_FALLBACK_MAX_CHARS,
  EMPTY_SYNTHESIS_VERDICT,
} from './synthesis-parser.js'
export type { ExtractedJson, ParseSynthesisOptions } from './synthesis-parser.js'
export { SynthesisPayloadSchema, DEFAULT_VERDICT, LEGACY_KEY_MAP } from './schemas.js'
export { CONFIDENCE_LEVELS } from './types.js'
export type {
  AgentCall,
  AgentOutput,
  BackendTriple,
  Confidence,
  DeliberationInput,
  DeliberationResult,
  Divergence,
  DivergencePosition,
  ProgressCallback,
  Round,
  RoundNumber,
} from './types.js'
