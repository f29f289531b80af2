/**
 * Credential masking for logger redaction, error text and config display.
 *
 * Keeps the backend API key out of logs, `config show` output and error messages.
 */

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Placeholder shown instead of a real credential */
export const MASKED_VALUE = '***'

/**
 * Regex patterns that identify API key values inside free text.
 */
export const API_KEY_PATTERNS: RegExp[] = [
  // OpenRouter: sk-or-v1-...
  /sk-or-[A-Za-z0-9_-]{20,}/g,
  // OpenAI-style: sk-...
  /sk-[A-Za-z0-9_-]{20,}/g,
  // Bearer tokens echoed back in provider error bodies
  /Bearer\s+[A-Za-z0-9._~+/-]{16,}=*/g,
  // Generic 40-char hex tokens
  /\b[A-Fa-f0-9]{40}\b/g,
]

/**
 * Pino redaction paths for credential fields.
 * Pass this array to the `pino({ redact: ... })` option.
 */
export const PINO_REDACT_PATHS: string[] = [
  'apiKey',
  'api_key',
  '*.apiKey',
  '*.api_key',
  'headers.Authorization',
  'headers.authorization',
  'env.OPENROUTER_API_KEY',
]

// ---------------------------------------------------------------------------
// String scrubbing
// ---------------------------------------------------------------------------

/**
 * Replace any known API key patterns in a string with `***`.
 *
 * Best-effort scrub for log messages and error strings.
 */
export function maskSecrets(input: string): string {
  let result = input
  for (const pattern of API_KEY_PATTERNS) {
    // Reset lastIndex in case the regex is reused (global flag)
    pattern.lastIndex = 0
    result = result.replace(pattern, MASKED_VALUE)
  }
  return result
}

// ---------------------------------------------------------------------------
// Object masking (for config display)
// ---------------------------------------------------------------------------

/** Credential field names replaced with `***` in displayed output */
const CREDENTIAL_FIELDS = new Set([
  'api_key',
  'apiKey',
  'token',
  'secret',
  'password',
])

/**
 * Deep-clone a plain-object tree and replace known credential fields with `***`.
 *
 * Only operates on plain objects and arrays; primitives are returned as-is.
 */
export function deepMask(value: unknown): unknown {
  if (value === null || value === undefined) return value
  if (Array.isArray(value)) return value.map(deepMask)
  if (typeof value === 'object') {
    const masked: Record<string, unknown> = {}
    for (const [k, v] of Object.entries(value)) {
      masked[k] = CREDENTIAL_FIELDS.has(k) ? MASKED_VALUE : deepMask(v)
    }
    return masked
  }
  return value
}
