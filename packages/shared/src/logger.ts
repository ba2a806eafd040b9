/**
 * Shared Structured Logger using pino
 *
 * All packages should import from here:
 * import { createLogger, type Logger } from '@lenslab/shared'
 *
 * Diagnostics are written to stderr so that command output on stdout
 * can be piped.
 */

import pino from 'pino'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error']

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value)
}

const isProduction = process.env.NODE_ENV === 'production'
const isTest = process.env.NODE_ENV === 'test' || Boolean(process.env.VITEST)
const envLevel = process.env.LOG_LEVEL
const logLevel: LogLevel = isLogLevel(envLevel) ? envLevel : 'info'

const baseOptions: pino.LoggerOptions = {
  level: logLevel,
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
}

const baseLogger =
  !isProduction && !isTest
    ? pino({
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
      })
    : pino(baseOptions, pino.destination(2))

// Children created without an explicit level follow setLogLevel
const followers = new Set<pino.Logger>()
const loggers = new Map<string, Logger>()

export interface Logger {
  debug: (message: string, data?: Record<string, unknown>) => void
  info: (message: string, data?: Record<string, unknown>) => void
  warn: (message: string, data?: Record<string, unknown>) => void
  error: (message: string, data?: Record<string, unknown>) => void
}

export interface LoggerConfig {
  level?: LogLevel
  silent?: boolean
}

/**
 * Create a logger instance for a specific service/component
 */
export function createLogger(service: string, config?: LoggerConfig): Logger {
  const logger = baseLogger.child({ service })

  if (config?.level) {
    logger.level = config.level
  }

  if (config?.silent) {
    logger.level = 'silent'
  }

  if (!config?.level && !config?.silent) {
    followers.add(logger)
  }

  return {
    debug: (message, data) => {
      if (data) {
        logger.debug(data, message)
      } else {
        logger.debug(message)
      }
    },
    info: (message, data) => {
      if (data) {
        logger.info(data, message)
      } else {
        logger.info(message)
      }
    },
    warn: (message, data) => {
      if (data) {
        logger.warn(data, message)
      } else {
        logger.warn(message)
      }
    },
    error: (message, data) => {
      if (data) {
        logger.error(data, message)
      } else {
        logger.error(message)
      }
    },
  }
}

/**
 * Get or create a logger for a service (cached)
 */
export function getLogger(service: string): Logger {
  const existing = loggers.get(service)
  if (existing) {
    return existing
  }

  const newLogger = createLogger(service)
  loggers.set(service, newLogger)
  return newLogger
}

/**
 * Change the level of the base logger and of every child that did not pin its own
 */
export function setLogLevel(level: LogLevel | 'silent'): void {
  baseLogger.level = level
  for (const child of followers) {
    child.level = level
  }
}

/**
 * Back to the level taken from LOG_LEVEL at startup
 */
export function resetLogLevel(): void {
  setLogLevel(logLevel)
}

export function getLogLevel(): string {
  return baseLogger.level
}
