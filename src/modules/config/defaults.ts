/**
 * Built-in default values for the deliberate configuration system.
 *
 * These are the lowest-priority defaults; they are overridden by:
 *   global config → project config → environment variables → CLI flags
 */

import type {
  DeliberateConfig,
  BackendSettings,
  DeliberationSettings,
  GlobalSettings,
  StorageSettings,
} from './config-schema.js'

export const DEFAULT_GLOBAL_SETTINGS: GlobalSettings = {
  log_level: 'warn',
}

export const DEFAULT_BACKEND_SETTINGS: BackendSettings = {
  provider: 'openrouter',
  base_url: 'https://openrouter.ai/api/v1',
  api_key_env: 'OPENROUTER_API_KEY',
  timeout_ms: 300_000,
  max_attempts: 3,
  backoff_base_ms: 2_000,
  app_name: 'Deliberate',
  app_url: 'https://github.com/deliberate-cli/deliberate',
}

export const DEFAULT_DELIBERATION_SETTINGS: DeliberationSettings = {
  default_models: [
    'anthropic/claude-haiku-4.5',
    'liquid/lfm-2.5-1.2b-thinking:free',
    'google/gemini-3-flash-preview',
  ],
  max_output_tokens: 4096,
  analysis_temperature: 0.7,
  synthesis_temperature: 0.5,
  fallback_max_chars: 500,
}

export const DEFAULT_STORAGE_SETTINGS: StorageSettings = {
  database_path: '.deliberate/deliberate.db',
}

export const DEFAULT_CONFIG: DeliberateConfig = {
  config_format_version: '1',
  global: DEFAULT_GLOBAL_SETTINGS,
  backend: DEFAULT_BACKEND_SETTINGS,
  deliberation: DEFAULT_DELIBERATION_SETTINGS,
  storage: DEFAULT_STORAGE_SETTINGS,
}
