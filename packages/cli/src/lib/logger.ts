/**
 * CLI Logger - structured events go to the shared pino logger, operator
 * facing progress lines are printed with chalk.
 */

import { createLogger, type Logger as BaseLogger } from '@mintkit/shared'
import chalk from 'chalk'

export interface LoggerOptions {
  verbose?: boolean
  silent?: boolean
}

export class Logger {
  private baseLogger: BaseLogger
  private verbose = false
  private silent = false

  constructor(options: LoggerOptions & { prefix?: string } = {}) {
    this.baseLogger = createLogger(options.prefix ?? 'cli')
    this.configure(options)
  }

  configure(options: LoggerOptions): void {
    this.verbose = options.verbose ?? this.verbose
    this.silent = options.silent ?? this.silent
    if (this.silent) {
      this.baseLogger.setLevel('silent')
    } else if (this.verbose) {
      this.baseLogger.setLevel('debug')
    }
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.baseLogger.debug(message, data)
  }

  info(message: string): void {
    if (this.silent) return
    console.log(message)
  }

  step(message: string): void {
    if (this.silent) return
    console.log(chalk.cyan(`\n▸ ${message}`))
  }

  success(message: string): void {
    if (this.silent) return
    console.log(chalk.green(`✓ ${message}`))
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.baseLogger.warn(message, data)
    if (this.silent) return
    console.warn(chalk.yellow(`⚠ ${message}`))
  }

  /** Errors are printed even in quiet mode. */
  error(message: string, data?: Record<string, unknown>): void {
    if (data) this.baseLogger.error(message, data)
    console.error(chalk.red(message))
  }
}

export const logger = new Logger()
