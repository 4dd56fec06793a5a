/**
 * Fail-fast validation helpers.
 *
 * Every value that crosses into the pipeline (flags, parameter files,
 * environment, prompt answers, generated files read back from disk) goes
 * through `expectValid` so that downstream code only sees typed data.
 */

import type { ZodType, ZodTypeDef } from 'zod'

export interface ValidationIssue {
  path: string[]
  message: string
  code: string
}

export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly issues: ValidationIssue[] = [],
  ) {
    super(message)
    this.name = 'ValidationError'
  }
}

/**
 * Validate unknown external data against a Zod schema.
 */
export function expectValid<O, D extends ZodTypeDef = ZodTypeDef, I = O>(
  schema: ZodType<O, D, I>,
  data: unknown,
  context: string = 'data',
): O {
  const result = schema.safeParse(data)
  if (!result.success) {
    const errors = result.error.issues
      .map((e) => (e.path.length > 0 ? `${e.path.join('.')}: ${e.message}` : e.message))
      .join(', ')
    const issues = result.error.issues.map((i) => ({
      path: i.path.map(String),
      message: i.message,
      code: i.code,
    }))
    throw new ValidationError(`Invalid ${context}: ${errors}`, issues)
  }
  return result.data
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError
}
