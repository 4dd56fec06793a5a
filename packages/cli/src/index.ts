#!/usr/bin/env tsx

/**
 * mintkit CLI
 */

import { isValidationError } from '@mintkit/types'
import chalk from 'chalk'
import { createDefaultDeps } from './lib/deps'
import { PipelineFailedError } from './lib/errors'
import { CLI_NAME, createProgram } from './program'
import { type CommanderError, CommanderErrorSchema } from './schemas'

const deps = createDefaultDeps()
const program = createProgram(deps)

try {
  await program.parseAsync(process.argv)
} catch (error) {
  if (error instanceof PipelineFailedError) {
    deps.logger.error(`${error.failure.step}: ${error.failure.message}`, {
      ...error.failure,
    })
    deps.logger.error(error.message)
    process.exit(1)
  }

  if (isValidationError(error)) {
    console.error(chalk.red(`\nError: ${error.message}\n`))
    process.exit(1)
  }

  const parsed = CommanderErrorSchema.safeParse(error)
  const err: CommanderError = parsed.success ? parsed.data : { message: String(error) }

  if (
    err.code === 'commander.help' ||
    err.code === 'commander.helpDisplayed' ||
    err.code === 'commander.version'
  ) {
    process.exit(0)
  }

  // A mistyped command reaches the default command as a stray argument
  if (err.code === 'commander.excessArguments') {
    console.error(
      chalk.red(
        `\nUnexpected argument. Run '${CLI_NAME} --help' for available commands.\n`,
      ),
    )
    process.exit(1)
  }

  if (err.code?.startsWith('commander.')) {
    // Commander has already printed its own message
    process.exit(1)
  }

  console.error(chalk.red(`\nError: ${err.message ?? 'Unknown error'}\n`))
  process.exit(1)
}
