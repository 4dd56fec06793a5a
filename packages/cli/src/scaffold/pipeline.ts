/**
 * Sequential bootstrap pipeline.
 *
 * Steps run strictly in order. The first failure ends the run: no later step
 * runs, nothing is retried and files written by earlier steps stay on disk.
 */

import { ValidationError } from '@mintkit/types'
import {
  type ScaffoldContext,
  type ScaffoldStep,
  STEP_IDS,
  type StepFailure,
  type StepId,
  type StepResult,
} from './context'

export interface StepSelection {
  /** Start at this step and run every later one */
  from?: StepId
  /** Run this step alone */
  only?: StepId
  skip?: readonly StepId[]
}

export type PipelineReport =
  | { ok: true; completed: StepId[] }
  | { ok: false; completed: StepId[]; failure: StepFailure }

/**
 * Narrow the step list without ever reordering it.
 */
export function selectSteps(
  steps: readonly ScaffoldStep[],
  selection: StepSelection = {},
): ScaffoldStep[] {
  if (selection.from && selection.only) {
    throw new ValidationError('Use either --from or --only, not both')
  }

  const skip = new Set(selection.skip ?? [])
  let selected = steps.filter((step) => !skip.has(step.id))

  if (selection.only) {
    const only = selection.only
    selected = selected.filter((step) => step.id === only)
  } else if (selection.from) {
    const start = STEP_IDS.indexOf(selection.from)
    selected = selected.filter((step) => STEP_IDS.indexOf(step.id) >= start)
  }

  return selected
}

async function runStep(
  step: ScaffoldStep,
  ctx: ScaffoldContext,
): Promise<StepResult> {
  try {
    return await step.run(ctx)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    return { ok: false, error: { step: step.id, message } }
  }
}

export async function runPipeline(
  steps: readonly ScaffoldStep[],
  ctx: ScaffoldContext,
): Promise<PipelineReport> {
  const completed: StepId[] = []

  for (const step of steps) {
    ctx.logger.step(`${step.title}...`)
    const result = await runStep(step, ctx)

    if (!result.ok) {
      ctx.logger.debug('Step failed', { ...result.error })
      return { ok: false, completed, failure: result.error }
    }

    ctx.logger.success(step.doneMessage)
    completed.push(step.id)
  }

  return { ok: true, completed }
}
