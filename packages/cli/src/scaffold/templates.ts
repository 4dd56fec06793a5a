/**
 * Template rendering for the generated project files.
 *
 * Templates are plain files under `templates/` with `{{slot}}` markers.
 * Every slot value is encoded for the language of the target file before
 * it is substituted, and substitution happens in one pass, so operator
 * input can neither close a string literal nor inject another marker.
 */

import { readFileSync } from 'node:fs'
import { dirname, join } from 'node:path'
import { fileURLToPath } from 'node:url'
import type { NetworkPreset } from '@mintkit/config'
import {
  ContractIdentifierSchema,
  expectValid,
  NetworkIdSchema,
  PrivateKeySchema,
  type ScaffoldParams,
  SolidityVersionSchema,
  ValidationError,
} from '@mintkit/types'
import { CONTRACT_NAME } from './context'
import { PROJECT_FILES } from './files'

const __dirname = dirname(fileURLToPath(import.meta.url))
const TEMPLATE_DIR = join(__dirname, '..', '..', 'templates')

export type TemplateName =
  | 'hardhat.config.ts'
  | 'NFT.sol'
  | 'deploy.ts'
  | 'mint.ts'

const templateCache = new Map<TemplateName, string>()

export function loadTemplate(name: TemplateName): string {
  const cached = templateCache.get(name)
  if (cached !== undefined) return cached

  const body = readFileSync(join(TEMPLATE_DIR, `${name}.tmpl`), 'utf-8')
  templateCache.set(name, body)
  return body
}

const SLOT_PATTERN = /\{\{\s*([A-Za-z][A-Za-z0-9_]*)\s*\}\}/g

/**
 * Substitute every `{{slot}}` in `body`. Values are inserted as given; the
 * caller encodes them. A slot with no value is an error.
 */
export function renderTemplate(
  body: string,
  values: Readonly<Record<string, string>>,
): string {
  return body.replace(SLOT_PATTERN, (_marker, slot: string) => {
    const value = values[slot]
    if (value === undefined) {
      throw new Error(`Template slot "${slot}" has no value`)
    }
    return value
  })
}

// ============================================================================
// Encoders
// ============================================================================

/**
 * Double-quoted Solidity string literal. Plain Solidity literals only take
 * printable ASCII, so anything else is refused rather than escaped.
 */
export function solidityString(value: string): string {
  if (!/^[\x20-\x7E]*$/.test(value)) {
    throw new ValidationError(
      `Cannot place ${JSON.stringify(value)} in a Solidity string: only printable ASCII is allowed`,
    )
  }
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`
}

/** TypeScript string literal. JSON string syntax is valid TypeScript. */
export function tsString(value: string): string {
  return JSON.stringify(value)
}

export function dotenvLine(key: string, value: string): string {
  if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(key)) {
    throw new ValidationError(`Invalid environment variable name: ${key}`)
  }
  const checked = expectValid(PrivateKeySchema, value, key)
  return `${key}=${checked}\n`
}

// ============================================================================
// Project files
// ============================================================================

export const PRIVATE_KEY_ENV = 'PRIVATE_KEY'

export function renderEnvFile(params: Pick<ScaffoldParams, 'privateKey'>): string {
  return dotenvLine(PRIVATE_KEY_ENV, params.privateKey)
}

export function renderHardhatConfig(network: NetworkPreset): string {
  const networkKey = expectValid(NetworkIdSchema, network.name, 'network name')
  return renderTemplate(loadTemplate('hardhat.config.ts'), {
    defaultNetwork: tsString(networkKey),
    solidityVersion: tsString(network.solidityVersion),
    networkKey,
    rpcUrl: tsString(network.rpcUrl),
  })
}

export function renderContract(
  params: Pick<ScaffoldParams, 'name' | 'symbol'>,
  network: Pick<NetworkPreset, 'solidityVersion'>,
): string {
  return renderTemplate(loadTemplate('NFT.sol'), {
    solidityVersion: expectValid(
      SolidityVersionSchema,
      network.solidityVersion,
      'solidity version',
    ),
    contractName: expectValid(
      ContractIdentifierSchema,
      CONTRACT_NAME,
      'contract name',
    ),
    tokenName: solidityString(params.name),
    tokenSymbol: solidityString(params.symbol),
  })
}

export function renderDeployScript(): string {
  return renderTemplate(loadTemplate('deploy.ts'), {
    contractName: tsString(CONTRACT_NAME),
    addressFile: tsString(PROJECT_FILES.deployedAddress),
  })
}

export function renderMintScript(network: Pick<NetworkPreset, 'explorerUrl'>): string {
  return renderTemplate(loadTemplate('mint.ts'), {
    contractName: tsString(CONTRACT_NAME),
    mintLogFile: tsString(PROJECT_FILES.mintLog),
    explorerUrl: tsString(network.explorerUrl),
  })
}
