import { expectValid } from '@mintkit/types'
import { Command } from 'commander'
import type { CliDeps } from '../lib/deps'
import { PipelineFailedError } from '../lib/errors'
import { PROJECT_FILES } from '../scaffold/files'
import { runPipeline } from '../scaffold/pipeline'
import {
  configStep,
  contractStep,
  credentialsStep,
  writeDeployScript,
  writeMintScript,
} from '../scaffold/steps'
import { GenerateOptionsSchema } from '../schemas'
import {
  addNetworkOptions,
  addParamOptions,
  addProjectOption,
  createContext,
  gatherParams,
  resolveProjectDir,
  resolveRunNetwork,
} from './shared'

export function generateCommand(deps: CliDeps): Command {
  const command = new Command('generate').description(
    'Write .env, hardhat.config.ts, the contract and the scripts without running any tool',
  )

  addProjectOption(command)
  addNetworkOptions(command)
  addParamOptions(command)

  return command.action(async (rawOptions: unknown) => {
    const options = expectValid(GenerateOptionsSchema, rawOptions, 'options')
    const network = resolveRunNetwork(deps, options)
    const params = await gatherParams(deps, options)
    const ctx = createContext(
      deps,
      resolveProjectDir(deps, options.dir),
      network,
      params,
    )

    const report = await runPipeline(
      [credentialsStep, configStep, contractStep],
      ctx,
    )
    if (!report.ok) {
      throw new PipelineFailedError(report.failure)
    }

    writeDeployScript(ctx)
    deps.logger.success(`${PROJECT_FILES.deployScript} script created.`)
    writeMintScript(ctx)
    deps.logger.success(`${PROJECT_FILES.mintScript} script created.`)
  })
}
