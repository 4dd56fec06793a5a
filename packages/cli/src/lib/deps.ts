import { type CommandRunner, execaRunner } from './exec'
import { type Logger, logger } from './logger'
import { createReadlinePrompt, type Prompt } from './prompt'

/** Everything a command touches outside its own arguments. */
export interface CliDeps {
  runner: CommandRunner
  prompt: Prompt
  env: NodeJS.ProcessEnv
  cwd: string
  logger: Logger
}

export function createDefaultDeps(): CliDeps {
  return {
    runner: execaRunner,
    prompt: createReadlinePrompt(),
    env: process.env,
    cwd: process.cwd(),
    logger,
  }
}
