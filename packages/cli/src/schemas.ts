/**
 * CLI Zod Schemas
 *
 * Commander hands option values over untyped; every action validates them
 * here before use.
 */

import { z } from 'zod'
import { STEP_IDS } from './scaffold/context'

export const StepIdSchema = z.enum(STEP_IDS)

export const ProjectOptionsSchema = z.object({
  dir: z.string().min(1).default('.'),
})

export const NetworkOptionsSchema = z.object({
  network: z.string().optional(),
  rpcUrl: z.string().optional(),
  explorerUrl: z.string().optional(),
  solidityVersion: z.string().optional(),
})
export type NetworkOptions = z.infer<typeof NetworkOptionsSchema>

export const ParamOptionsSchema = z.object({
  privateKey: z.string().optional(),
  name: z.string().optional(),
  symbol: z.string().optional(),
  params: z.string().optional(),
  interactive: z.boolean().default(true),
})
export type ParamOptions = z.infer<typeof ParamOptionsSchema>

export const BootstrapOptionsSchema = ProjectOptionsSchema.merge(
  NetworkOptionsSchema,
)
  .merge(ParamOptionsSchema)
  .extend({
    skipSystemUpdate: z.boolean().default(false),
    from: StepIdSchema.optional(),
    only: StepIdSchema.optional(),
  })
  .refine((options) => !(options.from && options.only), {
    message: 'Use either --from or --only, not both',
  })
export type BootstrapOptions = z.infer<typeof BootstrapOptionsSchema>

export const GenerateOptionsSchema = ProjectOptionsSchema.merge(
  NetworkOptionsSchema,
).merge(ParamOptionsSchema)
export type GenerateOptions = z.infer<typeof GenerateOptionsSchema>

export const StepOptionsSchema = ProjectOptionsSchema.merge(NetworkOptionsSchema)
export type StepOptions = z.infer<typeof StepOptionsSchema>

export const GlobalOptionsSchema = z.object({
  verbose: z.boolean().optional(),
  quiet: z.boolean().optional(),
})

export const PackageJsonSchema = z.object({
  name: z.string(),
  version: z.string(),
})

// Commander throws objects with code/message properties
export const CommanderErrorSchema = z.object({
  code: z.string().optional(),
  message: z.string().optional(),
  exitCode: z.number().optional(),
})
export type CommanderError = z.infer<typeof CommanderErrorSchema>
