/**
 * Logger utility for qualitygate
 * Uses pino for structured JSON logging with pretty printing in development
 */

import pino from 'pino'

/**
 * Paths censored in every log line. Contract endpoints and artifact payloads
 * may carry request headers or credentials copied from the system under test.
 */
export const LOG_REDACT_PATHS: string[] = [
  'password',
  'token',
  'secret',
  'authorization',
  '*.password',
  '*.token',
  '*.secret',
  '*.authorization',
  'headers.authorization',
  'headers.cookie',
  '*.headers.authorization',
  '*.headers.cookie',
]

/** Logger configuration options */
export interface LoggerOptions {
  level?: string
  name?: string
  pretty?: boolean
  /** Write to this stream instead of stdout (pretty printing is then ignored) */
  destination?: pino.DestinationStream
}

/** Every logger created so far, so a configured level can reach them all */
const loggers = new Set<pino.Logger>()
let levelOverride: string | null = null

function getDefaultLogLevel(): string {
  if (levelOverride !== null) return levelOverride
  const envLevel = process.env.LOG_LEVEL
  if (envLevel) return envLevel
  if (process.env.NODE_ENV === 'production') return 'info'
  if (process.env.NODE_ENV === 'development') return 'debug'
  // Tests and plain CLI use stay quiet unless asked
  return 'warn'
}

function isPrettyMode(): boolean {
  if (process.env.LOG_PRETTY !== undefined) {
    return process.env.LOG_PRETTY === 'true'
  }
  return process.env.NODE_ENV === 'development'
}

/**
 * Create a named logger instance
 * @param name - Logger name (module identifier, e.g. `quality-gates:runner`)
 */
export function createLogger(name: string, options: LoggerOptions = {}): pino.Logger {
  const level = options.level ?? getDefaultLogLevel()

  const baseOptions: pino.LoggerOptions = {
    name: options.name ?? name,
    level,
    redact: LOG_REDACT_PATHS,
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

  if (options.destination !== undefined) {
    return track(pino(baseOptions, options.destination))
  }

  if (options.pretty ?? isPrettyMode()) {
    // pino-pretty is a devDependency; only used outside production
    return track(pino({
      ...baseOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      },
    }))
  }

  return track(pino(baseOptions))
}

function track(instance: pino.Logger): pino.Logger {
  loggers.add(instance)
  return instance
}

/**
 * Apply a level to every logger created so far and to those created later.
 * LOG_LEVEL in the environment still wins when set.
 */
export function setLogLevel(level: string): void {
  if (process.env.LOG_LEVEL) return
  levelOverride = level
  for (const instance of loggers) {
    instance.level = level
  }
}
