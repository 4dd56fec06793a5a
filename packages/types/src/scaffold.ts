/**
 * Operator parameter and project file schemas.
 */

import { z } from 'zod'

/** Characters Solidity accepts inside a plain (non-unicode) string literal. */
const PRINTABLE_ASCII = /^[\x20-\x7E]*$/

/**
 * A dotenv line `KEY=value` is read back verbatim only when the value has no
 * whitespace, comment marker or quote characters.
 */
export const PrivateKeySchema = z
  .string()
  .min(1, 'Private key is required')
  .regex(
    /^[^\s#'"`]+$/,
    'Private key must not contain whitespace, #, quotes or backticks',
  )

export const TokenNameSchema = z
  .string()
  .trim()
  .min(1, 'Token name is required')
  .max(64, 'Token name must be at most 64 characters')
  .regex(PRINTABLE_ASCII, 'Token name must be printable ASCII')

export const TokenSymbolSchema = z
  .string()
  .trim()
  .min(1, 'Token symbol is required')
  .max(16, 'Token symbol must be at most 16 characters')
  .regex(/^[\x21-\x7E]*$/, 'Token symbol must be printable ASCII without spaces')

/** Used as an object key in the Hardhat config and on the command line. */
export const NetworkIdSchema = z
  .string()
  .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'Network name must be an identifier')

export const SolidityVersionSchema = z
  .string()
  .regex(/^\d+\.\d+\.\d+$/, 'Solidity version must be x.y.z')

export const ContractIdentifierSchema = z
  .string()
  .regex(/^[A-Za-z_$][A-Za-z0-9_$]*$/, 'Contract name must be an identifier')

export const ScaffoldParamsSchema = z.object({
  privateKey: PrivateKeySchema,
  name: TokenNameSchema,
  symbol: TokenSymbolSchema,
})
export type ScaffoldParams = z.infer<typeof ScaffoldParamsSchema>

/** Shape of a `--params` JSON file. Every field may be left to another source. */
export const ScaffoldParamsFileSchema = z
  .object({
    privateKey: z.string().optional(),
    name: z.string().optional(),
    symbol: z.string().optional(),
  })
  .strict()
export type ScaffoldParamsFile = z.infer<typeof ScaffoldParamsFileSchema>

export const MintLogEntrySchema = z.object({
  tokenId: z.string().regex(/^\d+$/),
  txUrl: z.string().url(),
})
export type MintLogEntry = z.infer<typeof MintLogEntrySchema>
