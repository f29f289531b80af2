/**
 * Error definitions for deliberate
 * Provides the structured error hierarchy for the engine, backend client and job layer
 */

/** Base error class for all deliberate errors */
export class DeliberateError extends Error {
  public readonly code: string
  public readonly context: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context: Record<string, unknown> = {}
  ) {
    super(message)
    this.name = 'DeliberateError'
    this.code = code
    this.context = context
    // Maintains proper stack trace for V8 (not available in all environments)
    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DeliberateError)
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      stack: this.stack,
    }
  }
}

/** Failure classes reported by the backend chat-completion client */
export type BackendErrorKind =
  | 'timeout'
  | 'transport'
  | 'rate_limit'
  | 'http'
  | 'empty_response'
  | 'unknown'

export interface BackendErrorOptions {
  statusCode?: number
  /** Attempts made before giving up */
  attempts?: number
  context?: Record<string, unknown>
}

/** Error thrown when a backend chat-completion call fails after the retry policy */
export class BackendError extends DeliberateError {
  public readonly kind: BackendErrorKind
  public readonly statusCode: number | undefined
  public readonly attempts: number

  constructor(message: string, kind: BackendErrorKind, options: BackendErrorOptions = {}) {
    const attempts = options.attempts ?? 1
    super(message, 'BACKEND_ERROR', {
      kind,
      statusCode: options.statusCode,
      attempts,
      ...options.context,
    })
    this.name = 'BackendError'
    this.kind = kind
    this.statusCode = options.statusCode
    this.attempts = attempts
  }
}

/** Error thrown when configuration is invalid or a required credential is missing */
export class ConfigError extends DeliberateError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFIG_ERROR', context)
    this.name = 'ConfigError'
  }
}

/** Error thrown when a deliberation request does not satisfy the input contract */
export class DeliberationInputError extends DeliberateError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'DELIBERATION_INPUT_ERROR', context)
    this.name = 'DeliberationInputError'
  }
}

/** Error thrown when a job id does not exist in the job store */
export class JobNotFoundError extends DeliberateError {
  constructor(jobId: string) {
    super(`Job not found: ${jobId}`, 'JOB_NOT_FOUND', { jobId })
    this.name = 'JobNotFoundError'
  }
}
