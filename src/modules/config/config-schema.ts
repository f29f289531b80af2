/**
 * Zod validation schemas for the deliberate configuration system.
 *
 * Defines schemas for all config sections:
 *  - global settings
 *  - backend (chat-completion endpoint and retry policy)
 *  - deliberation (models and sampling parameters)
 *  - storage (job store location)
 *  - full config document
 */

import { z } from 'zod'

// ---------------------------------------------------------------------------
// Global settings
// ---------------------------------------------------------------------------

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal'])
export type LogLevelValue = z.infer<typeof LogLevelSchema>

export const GlobalSettingsSchema = z
  .object({
    log_level: LogLevelSchema,
  })
  .strict()

export type GlobalSettings = z.infer<typeof GlobalSettingsSchema>

// ---------------------------------------------------------------------------
// Backend
// ---------------------------------------------------------------------------

export const BackendProviderSchema = z.enum(['openrouter'])
export type BackendProvider = z.infer<typeof BackendProviderSchema>

export const BackendSettingsSchema = z
  .object({
    provider: BackendProviderSchema,
    /** Base URL of the OpenAI-compatible chat-completion API */
    base_url: z.string().url(),
    /** Name of the environment variable that holds the API key */
    api_key_env: z.string().min(1),
    /** Per-attempt wall-clock timeout */
    timeout_ms: z.number().int().positive(),
    /** Total attempts per call, first one included */
    max_attempts: z.number().int().min(1).max(10),
    /** Wait before retry n (0-based) is backoff_base_ms * 2^n */
    backoff_base_ms: z.number().int().min(0),
    /** Sent as X-Title to the provider */
    app_name: z.string().min(1),
    /** Sent as HTTP-Referer to the provider */
    app_url: z.string().url(),
  })
  .strict()

export type BackendSettings = z.infer<typeof BackendSettingsSchema>

// ---------------------------------------------------------------------------
// Deliberation
// ---------------------------------------------------------------------------

export const DeliberationSettingsSchema = z
  .object({
    /** Backends used when a request does not name its own */
    default_models: z.array(z.string().min(1)).length(3),
    max_output_tokens: z.number().int().positive(),
    analysis_temperature: z.number().min(0).max(2),
    synthesis_temperature: z.number().min(0).max(2),
    /** Verdict length cap when the synthesis carries no structured block */
    fallback_max_chars: z.number().int().positive(),
  })
  .strict()

export type DeliberationSettings = z.infer<typeof DeliberationSettingsSchema>

// ---------------------------------------------------------------------------
// Storage
// ---------------------------------------------------------------------------

export const StorageSettingsSchema = z
  .object({
    /**
     * SQLite file for the job store, relative to the project root.
     * ':memory:' keeps jobs for the lifetime of the process only.
     */
    database_path: z.string().min(1),
  })
  .strict()

export type StorageSettings = z.infer<typeof StorageSettingsSchema>

// ---------------------------------------------------------------------------
// Top-level configuration document
// ---------------------------------------------------------------------------

/** Current supported config format version */
export const CURRENT_CONFIG_FORMAT_VERSION = '1'

export const DeliberateConfigSchema = z
  .object({
    config_format_version: z.literal('1'),
    global: GlobalSettingsSchema,
    backend: BackendSettingsSchema,
    deliberation: DeliberationSettingsSchema,
    storage: StorageSettingsSchema,
  })
  .strict()

export type DeliberateConfig = z.infer<typeof DeliberateConfigSchema>

// ---------------------------------------------------------------------------
// Partial config (config files, env overrides and CLI flags before merging)
// ---------------------------------------------------------------------------

export const PartialDeliberateConfigSchema = z
  .object({
    config_format_version: z.literal('1').optional(),
    global: GlobalSettingsSchema.partial().optional(),
    backend: BackendSettingsSchema.partial().optional(),
    deliberation: DeliberationSettingsSchema.partial().optional(),
    storage: StorageSettingsSchema.partial().optional(),
  })
  .strict()

export type PartialDeliberateConfig = z.infer<typeof PartialDeliberateConfigSchema>
