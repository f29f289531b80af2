/**
 * Logger utility for deliberate
 * Uses pino for structured JSON logging with pretty printing in development
 */

import pino from 'pino'
import { PINO_REDACT_PATHS } from './masking.js'

/** Logger configuration options */
export interface LoggerOptions {
  level?: string
  name?: string
  pretty?: boolean
}

/** Default log level based on environment */
function getDefaultLogLevel(): string {
  const envLevel = process.env.LOG_LEVEL
  if (envLevel) return envLevel
  if (configuredLevel !== undefined) return configuredLevel
  if (process.env.NODE_ENV === 'production') return 'info'
  if (process.env.NODE_ENV === 'test' || process.env.NODE_ENV === 'development') return 'debug'
  // No NODE_ENV set (typical CLI use)
  return 'warn'
}

/** Level set through setLogLevel(), used for loggers created afterwards */
let configuredLevel: string | undefined

/** Loggers that follow setLogLevel() */
const levelFollowers = new Set<pino.Logger>()

/** Whether to use pretty printing */
function isPrettyMode(): boolean {
  if (process.env.LOG_PRETTY !== undefined) {
    return process.env.LOG_PRETTY === 'true'
  }
  // pino-pretty runs in a worker thread; only start it for interactive development.
  return process.env.NODE_ENV === 'development'
}

/**
 * Create a named logger instance
 * @param name - Logger name (module identifier)
 * @param options - Optional logger configuration overrides
 */
export function createLogger(
  name: string,
  options: LoggerOptions = {}
): pino.Logger {
  const level = options.level ?? getDefaultLogLevel()
  const pretty = options.pretty ?? isPrettyMode()

  const baseOptions: pino.LoggerOptions = {
    name: options.name ?? name,
    level,
    redact: PINO_REDACT_PATHS,
    formatters: {
      level(label) {
        return { level: label }
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      pid: process.pid,
    },
  }

  if (pretty) {
    // pino-pretty is a devDependency; only used outside production.
    return track(pino({
      ...baseOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    }), options.level)
  }

  // Logs go to stderr so stdout stays clean for CLI output (JSON results, Markdown).
  return track(pino(baseOptions, pino.destination(2)), options.level)
}

function track(instance: pino.Logger, explicitLevel: string | undefined): pino.Logger {
  if (explicitLevel === undefined) levelFollowers.add(instance)
  return instance
}

/**
 * Apply a level to every logger created without an explicit one.
 * LOG_LEVEL in the environment wins over the configured level.
 */
export function setLogLevel(level: string): void {
  if (process.env.LOG_LEVEL) return
  configuredLevel = level
  for (const instance of levelFollowers) {
    instance.level = level
  }
}

/** Root application logger */
export const logger = createLogger('deliberate')

/** Create a child logger with additional context */
export function childLogger(
  parent: pino.Logger,
  bindings: Record<string, unknown>
): pino.Logger {
  return parent.child(bindings)
}
