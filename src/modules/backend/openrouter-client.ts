/**
 * OpenRouterClient: BackendClient over OpenRouter's OpenAI-compatible API.
 *
 * Uses the openai SDK with its own retries disabled and applies a bounded
 * retry policy: timeouts, connection failures, 429 and 5xx gateway errors
 * are retried with exponential backoff; anything else fails immediately.
 */

import OpenAI, { APIConnectionError, APIConnectionTimeoutError, APIError } from 'openai'
import { createLogger } from '../../utils/logger.js'
import { sleep as defaultSleep } from '../../utils/helpers.js'
import { BackendError, ConfigError } from '../../core/errors.js'
import type { BackendErrorKind } from '../../core/errors.js'
import type { BackendSettings } from '../config/config-schema.js'
import { maskSecrets } from '../../utils/masking.js'
import { DEFAULT_RETRY_POLICY } from './types.js'
import type { BackendClient, CompletionRequest, CompletionResult, RetryPolicy } from './types.js'

const logger = createLogger('backend:openrouter')

export const OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1'
export const DEFAULT_TIMEOUT_MS = 300_000

/** Status codes worth another attempt */
export const RETRYABLE_STATUS_CODES: readonly number[] = [429, 500, 502, 503, 504]

/**
 * The slice of the openai SDK this client calls. Tests substitute a stub.
 */
export interface ChatCompletionsApi {
  create(body: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming): Promise<OpenAI.Chat.ChatCompletion>
}

export interface OpenRouterClientOptions {
  apiKey: string | undefined
  baseUrl?: string
  timeoutMs?: number
  retry?: Partial<RetryPolicy>
  /** Sent as X-Title */
  appName?: string
  /** Sent as HTTP-Referer */
  appUrl?: string
  /** Replaces the SDK transport */
  api?: ChatCompletionsApi
  /** Replaces the backoff timer */
  sleep?: (ms: number) => Promise<void>
}

// ---------------------------------------------------------------------------
// Error classification
// ---------------------------------------------------------------------------

interface ClassifiedError {
  kind: BackendErrorKind
  statusCode?: number
  retryable: boolean
  message: string
}

function classifyError(err: unknown): ClassifiedError {
  // APIConnectionTimeoutError extends APIConnectionError
  if (err instanceof APIConnectionTimeoutError) {
    return { kind: 'timeout', retryable: true, message: err.message }
  }
  if (err instanceof APIConnectionError) {
    return { kind: 'transport', retryable: true, message: err.message }
  }
  if (err instanceof APIError) {
    const status = err.status
    if (status === 429) {
      return { kind: 'rate_limit', statusCode: status, retryable: true, message: err.message }
    }
    return {
      kind: 'http',
      statusCode: status,
      retryable: status !== undefined && RETRYABLE_STATUS_CODES.includes(status),
      message: err.message,
    }
  }
  if (err instanceof BackendError) {
    return { kind: err.kind, statusCode: err.statusCode, retryable: false, message: err.message }
  }
  return {
    kind: 'unknown',
    retryable: false,
    message: err instanceof Error ? err.message : String(err),
  }
}

// ---------------------------------------------------------------------------
// OpenRouterClient
// ---------------------------------------------------------------------------

export class OpenRouterClient implements BackendClient {
  private readonly _api: ChatCompletionsApi
  private readonly _retry: RetryPolicy
  private readonly _sleep: (ms: number) => Promise<void>

  constructor(options: OpenRouterClientOptions) {
    if (options.apiKey === undefined || options.apiKey.trim() === '') {
      throw new ConfigError('OpenRouter API key is not set', {})
    }

    this._retry = { ...DEFAULT_RETRY_POLICY, ...options.retry }
    this._sleep = options.sleep ?? defaultSleep

    if (options.api !== undefined) {
      this._api = options.api
    } else {
      const sdk = new OpenAI({
        apiKey: options.apiKey,
        baseURL: options.baseUrl ?? OPENROUTER_BASE_URL,
        timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
        maxRetries: 0,
        defaultHeaders: {
          'HTTP-Referer': options.appUrl ?? 'https://github.com/deliberate-cli/deliberate',
          'X-Title': options.appName ?? 'Deliberate',
        },
      })
      this._api = sdk.chat.completions
    }
  }

  async complete(request: CompletionRequest): Promise<CompletionResult> {
    const { maxAttempts, backoffBaseMs } = this._retry

    for (let attempt = 1; ; attempt++) {
      try {
        return await this._attempt(request)
      } catch (err) {
        const classified = classifyError(err)
        const message = maskSecrets(classified.message)

        if (!classified.retryable || attempt >= maxAttempts) {
          throw new BackendError(message, classified.kind, {
            statusCode: classified.statusCode,
            attempts: attempt,
            context: { backend: request.backend },
          })
        }

        const delayMs = backoffBaseMs * 2 ** (attempt - 1)
        logger.warn(
          { backend: request.backend, attempt, kind: classified.kind, statusCode: classified.statusCode, delayMs },
          'Backend call failed, retrying'
        )
        await this._sleep(delayMs)
      }
    }
  }

  private async _attempt(request: CompletionRequest): Promise<CompletionResult> {
    logger.debug({ backend: request.backend, promptChars: request.prompt.length }, 'Backend request')

    const response = await this._api.create({
      model: request.backend,
      messages: [{ role: 'user', content: request.prompt }],
      max_tokens: request.maxOutputTokens,
      temperature: request.temperature,
    })

    const choice = response.choices[0]
    if (choice === undefined) {
      throw new BackendError('Backend returned no choices', 'empty_response', {
        context: { backend: request.backend },
      })
    }

    return {
      content: choice.message.content ?? '',
      tokensUsed: response.usage?.total_tokens ?? 0,
    }
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/**
 * Build the configured backend client. The API key is read from the
 * environment variable named by `backend.api_key_env`.
 *
 * @throws {ConfigError} when that variable is unset or empty.
 */
export function createBackendClient(
  settings: BackendSettings,
  env: NodeJS.ProcessEnv = process.env
): BackendClient {
  const apiKey = env[settings.api_key_env]
  if (apiKey === undefined || apiKey.trim() === '') {
    throw new ConfigError(`${settings.api_key_env} is not set`, { env: settings.api_key_env })
  }

  return new OpenRouterClient({
    apiKey,
    baseUrl: settings.base_url,
    timeoutMs: settings.timeout_ms,
    retry: { maxAttempts: settings.max_attempts, backoffBaseMs: settings.backoff_base_ms },
    appName: settings.app_name,
    appUrl: settings.app_url,
  })
}
