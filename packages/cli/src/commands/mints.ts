import { resolve } from 'node:path'
import { expectValid } from '@mintkit/types'
import chalk from 'chalk'
import { Command } from 'commander'
import type { CliDeps } from '../lib/deps'
import { formatMintLogLine, PROJECT_FILES, readMintLog } from '../scaffold/files'
import { ProjectOptionsSchema } from '../schemas'
import { addProjectOption } from './shared'

export function mintsCommand(deps: CliDeps): Command {
  const command = new Command('mints').description(
    `List minted NFTs recorded in ${PROJECT_FILES.mintLog}`,
  )

  addProjectOption(command)

  return command.action((rawOptions: unknown) => {
    const options = expectValid(ProjectOptionsSchema, rawOptions, 'options')
    const entries = readMintLog(resolve(deps.cwd, options.dir))

    if (entries.length === 0) {
      deps.logger.info(chalk.dim('No NFTs minted yet.'))
      return
    }
    for (const entry of entries) {
      deps.logger.info(formatMintLogLine(entry))
    }
  })
}
