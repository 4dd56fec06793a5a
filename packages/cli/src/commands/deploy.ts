import { expectValid } from '@mintkit/types'
import { Command } from 'commander'
import type { CliDeps } from '../lib/deps'
import { PipelineFailedError } from '../lib/errors'
import type { ScaffoldStep } from '../scaffold/context'
import { runPipeline } from '../scaffold/pipeline'
import { deployStep, mintStep } from '../scaffold/steps'
import { StepOptionsSchema } from '../schemas'
import {
  addNetworkOptions,
  addProjectOption,
  createContext,
  resolveProjectDir,
  resolveRunNetwork,
} from './shared'

/** A command that runs one network step against an existing project. */
function singleStepCommand(
  deps: CliDeps,
  name: string,
  description: string,
  step: ScaffoldStep,
): Command {
  const command = new Command(name).description(description)

  addProjectOption(command)
  addNetworkOptions(command)

  return command.action(async (rawOptions: unknown) => {
    const options = expectValid(StepOptionsSchema, rawOptions, 'options')
    const ctx = createContext(
      deps,
      resolveProjectDir(deps, options.dir),
      resolveRunNetwork(deps, options),
      null,
    )

    const report = await runPipeline([step], ctx)
    if (!report.ok) {
      throw new PipelineFailedError(report.failure)
    }
  })
}

export function deployCommand(deps: CliDeps): Command {
  return singleStepCommand(
    deps,
    'deploy',
    'Write scripts/deploy.ts and deploy the compiled contract',
    deployStep,
  )
}

export function mintCommand(deps: CliDeps): Command {
  return singleStepCommand(
    deps,
    'mint',
    'Write scripts/mint.ts and mint one NFT to the deployer',
    mintStep,
  )
}
