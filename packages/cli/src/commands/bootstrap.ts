import { expectValid } from '@mintkit/types'
import { Command } from 'commander'
import type { CliDeps } from '../lib/deps'
import { PipelineFailedError } from '../lib/errors'
import type { StepId } from '../scaffold/context'
import { runPipeline, selectSteps } from '../scaffold/pipeline'
import { SCAFFOLD_STEPS } from '../scaffold/steps'
import { BootstrapOptionsSchema } from '../schemas'
import {
  addNetworkOptions,
  addParamOptions,
  addProjectOption,
  createContext,
  gatherParams,
  resolveProjectDir,
  resolveRunNetwork,
} from './shared'

export function bootstrapCommand(deps: CliDeps): Command {
  const command = new Command('bootstrap')
    .description(
      'Install, scaffold, configure, compile, deploy and mint in one run',
    )
    .option('--skip-system-update', 'Do not run apt-get update/upgrade')
    .option('--from <step>', 'Start at this step and run the rest')
    .option('--only <step>', 'Run a single step')

  addProjectOption(command)
  addNetworkOptions(command)
  addParamOptions(command)

  return command.action(async (rawOptions: unknown) => {
    const options = expectValid(BootstrapOptionsSchema, rawOptions, 'options')
    const skip: StepId[] = options.skipSystemUpdate ? ['system-update'] : []
    const steps = selectSteps(SCAFFOLD_STEPS, {
      from: options.from,
      only: options.only,
      skip,
    })

    const network = resolveRunNetwork(deps, options)
    const params = steps.some((step) => step.needsParams)
      ? await gatherParams(deps, options)
      : null
    const projectDir = resolveProjectDir(deps, options.dir)

    deps.logger.debug('Bootstrapping project', {
      projectDir,
      network: network.name,
      steps: steps.map((step) => step.id),
    })

    const report = await runPipeline(
      steps,
      createContext(deps, projectDir, network, params),
    )
    if (!report.ok) {
      throw new PipelineFailedError(report.failure)
    }

    deps.logger.step('All operations completed successfully.')
  })
}
