/**
 * Shared Structured Logger using pino
 *
 * All packages should import from here:
 * import { createLogger, type Logger } from '@mintkit/shared';
 */

import pino from 'pino'
import { z } from 'zod'

export const LogLevelSchema = z.enum([
  'debug',
  'info',
  'warn',
  'error',
  'silent',
])
export type LogLevel = z.infer<typeof LogLevelSchema>

const isProduction = process.env.NODE_ENV === 'production'
const parsedLevel = LogLevelSchema.safeParse(process.env.LOG_LEVEL)
const logLevel: LogLevel = parsedLevel.success ? parsedLevel.data : 'info'

// Pretty output only for an interactive terminal; pipes and CI get JSON lines
const baseLogger = pino({
  level: logLevel,
  transport:
    !isProduction && process.stdout.isTTY
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
})

export interface Logger {
  debug: (message: string, data?: Record<string, unknown>) => void
  info: (message: string, data?: Record<string, unknown>) => void
  warn: (message: string, data?: Record<string, unknown>) => void
  error: (message: string, data?: Record<string, unknown>) => void
  setLevel: (level: LogLevel) => void
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
    setLevel: (level) => {
      logger.level = level
    },
  }
}
