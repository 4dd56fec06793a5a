/**
 * Operator parameter collection.
 *
 * Each value is taken from the first source that has it: command-line flag,
 * `--params` JSON file, environment variable, then an interactive prompt.
 * Everything is validated before the pipeline starts.
 */

import { readFileSync } from 'node:fs'
import {
  expectValid,
  type ScaffoldParams,
  type ScaffoldParamsFile,
  ScaffoldParamsFileSchema,
  ScaffoldParamsSchema,
  ValidationError,
} from '@mintkit/types'
import type { Prompt } from './prompt'

export type ParamKey = keyof ScaffoldParams

interface ParamField {
  key: ParamKey
  env: string
  question: string
  flag: string
}

export const PARAM_FIELDS: readonly ParamField[] = [
  {
    key: 'privateKey',
    env: 'PRIVATE_KEY',
    question: 'Enter your private key',
    flag: '--private-key',
  },
  {
    key: 'name',
    env: 'NFT_NAME',
    question: 'Enter the NFT name',
    flag: '--name',
  },
  {
    key: 'symbol',
    env: 'NFT_SYMBOL',
    question: 'Enter the NFT symbol',
    flag: '--symbol',
  },
]

export interface ParamSources {
  flags?: Partial<Record<ParamKey, string>>
  paramsFile?: string
  env?: NodeJS.ProcessEnv
  prompt?: Prompt
  interactive?: boolean
}

export function readParamsFile(path: string): ScaffoldParamsFile {
  let raw: unknown
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'))
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new ValidationError(`Cannot read parameters file ${path}: ${reason}`)
  }
  return expectValid(ScaffoldParamsFileSchema, raw, `parameters file ${path}`)
}

export async function collectParams(
  sources: ParamSources,
): Promise<ScaffoldParams> {
  const fromFile: ScaffoldParamsFile = sources.paramsFile
    ? readParamsFile(sources.paramsFile)
    : {}
  const env: NodeJS.ProcessEnv = sources.env ?? {}
  const interactive = sources.interactive ?? true
  const values: Partial<Record<ParamKey, string>> = {}

  for (const field of PARAM_FIELDS) {
    const value =
      sources.flags?.[field.key] ?? fromFile[field.key] ?? env[field.env]

    if (value !== undefined) {
      values[field.key] = value
      continue
    }

    if (!interactive || !sources.prompt) {
      throw new ValidationError(
        `Missing ${field.key}: pass ${field.flag}, set ${field.env} or run interactively`,
      )
    }
    values[field.key] = await sources.prompt.ask(field.question)
  }

  return expectValid(ScaffoldParamsSchema, values, 'parameters')
}
