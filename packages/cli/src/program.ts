/**
 * mintkit CLI program definition
 */

import { existsSync, readFileSync } from 'node:fs'
import { dirname, join } from 'node:path'
import { fileURLToPath } from 'node:url'
import { expectValid } from '@mintkit/types'
import { Command, type OutputConfiguration } from 'commander'
import { bootstrapCommand } from './commands/bootstrap'
import { deployCommand, mintCommand } from './commands/deploy'
import { generateCommand } from './commands/generate'
import { mintsCommand } from './commands/mints'
import { networksCommand } from './commands/networks'
import type { CliDeps } from './lib/deps'
import { GlobalOptionsSchema, PackageJsonSchema } from './schemas'

export const CLI_NAME = 'mintkit'

export function getVersion(): string {
  const __dirname = dirname(fileURLToPath(import.meta.url))
  const pkgPath = join(__dirname, '..', 'package.json')
  if (existsSync(pkgPath)) {
    const pkg = expectValid(
      PackageJsonSchema,
      JSON.parse(readFileSync(pkgPath, 'utf-8')),
      'package.json',
    )
    return pkg.version
  }
  return '0.1.0'
}

export interface ProgramOptions {
  output?: OutputConfiguration
}

export function createProgram(
  deps: CliDeps,
  options: ProgramOptions = {},
): Command {
  const program = new Command()

  program
    .name(CLI_NAME)
    .description(
      'Bootstrap a Hardhat ERC-721 project, deploy it and mint a token',
    )
    .version(getVersion())
    .option('-v, --verbose', 'Verbose output')
    .option('-q, --quiet', 'Quiet mode')
    .hook('preAction', (thisCommand) => {
      const opts = expectValid(
        GlobalOptionsSchema,
        thisCommand.opts(),
        'global options',
      )
      deps.logger.configure({
        verbose: opts.verbose,
        silent: opts.quiet,
      })
    })

  program.exitOverride()
  program.allowExcessArguments(false)
  if (options.output) {
    program.configureOutput(options.output)
  }

  // addCommand does not pass exitOverride or output settings down
  const add = (command: Command, isDefault = false) =>
    program.addCommand(command.copyInheritedSettings(program), { isDefault })

  // With no command the whole pipeline runs, as a one-shot setup script
  add(bootstrapCommand(deps), true)
  add(generateCommand(deps))
  add(deployCommand(deps))
  add(mintCommand(deps))
  add(mintsCommand(deps))
  add(networksCommand(deps))

  return program
}
