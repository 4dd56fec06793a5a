import type { NetworkPreset } from '@mintkit/config'
import type { ScaffoldParams } from '@mintkit/types'
import type { CommandRunner } from '../lib/exec'
import type { Logger } from '../lib/logger'

/** Pipeline steps in execution order. */
export const STEP_IDS = [
  'system-update',
  'install',
  'init',
  'cleanup',
  'credentials',
  'config',
  'contract',
  'compile',
  'deploy',
  'mint',
] as const
export type StepId = (typeof STEP_IDS)[number]

/** Name of the generated Solidity contract, also used by the scripts. */
export const CONTRACT_NAME = 'TestNFT'

export interface ScaffoldContext {
  projectDir: string
  network: NetworkPreset
  /** Null when none of the selected steps consumes operator input. */
  params: ScaffoldParams | null
  runner: CommandRunner
  logger: Logger
}

export interface StepFailure {
  step: StepId
  message: string
  exitCode?: number
}

export type StepResult = { ok: true } | { ok: false; error: StepFailure }

export interface ScaffoldStep {
  id: StepId
  title: string
  doneMessage: string
  needsParams: boolean
  run(ctx: ScaffoldContext): Promise<StepResult>
}
