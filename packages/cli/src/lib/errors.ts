import type { StepFailure } from '../scaffold/context'

/** The one diagnostic a failed run prints, whichever step failed. */
export const PIPELINE_FAILURE_MESSAGE =
  'Error occurred in script execution. Exiting.'

export class PipelineFailedError extends Error {
  constructor(public readonly failure: StepFailure) {
    super(PIPELINE_FAILURE_MESSAGE)
    this.name = 'PipelineFailedError'
  }
}
