/**
 * Type definitions for the backend module.
 */

export interface CompletionRequest {
  /** Model identifier on the upstream provider */
  backend: string
  prompt: string
  maxOutputTokens: number
  temperature: number
}

export interface CompletionResult {
  /** Assistant message text; may be empty */
  content: string
  /** Total tokens reported by the provider, 0 when absent */
  tokensUsed: number
}

/**
 * A chat-completion backend.
 *
 * Rejects with BackendError once its retry policy is exhausted.
 */
export interface BackendClient {
  complete(request: CompletionRequest): Promise<CompletionResult>
}

export interface RetryPolicy {
  /** Total attempts, the first one included */
  maxAttempts: number
  /** Wait before retry n (0-based) is backoffBaseMs * 2^n */
  backoffBaseMs: number
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  backoffBaseMs: 2_000,
}
