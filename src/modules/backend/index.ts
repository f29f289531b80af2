/**
 * Barrel exports for the backend module.
 */

export {
  OpenRouterClient,
  createBackendClient,
  OPENROUTER_BASE_URL,
  DEFAULT_TIMEOUT_MS,
  RETRYABLE_STATUS_CODES,
} from './openrouter-client.js'
export type { ChatCompletionsApi, OpenRouterClientOptions } from './openrouter-client.js'
export { DEFAULT_RETRY_POLICY } from './types.js'
export type { BackendClient, CompletionRequest, CompletionResult, RetryPolicy } from './types.js'
