/**
 * @fileoverview Network Configuration
 * @module config
 *
 * Config-First Architecture:
 * - Public network values live in networks.json
 * - Environment variables and CLI flags only override them
 *
 * Environment overrides:
 * - MINTKIT_NETWORK           Network preset name
 * - MINTKIT_RPC_URL           JSON-RPC endpoint
 * - MINTKIT_EXPLORER_URL      Block explorer base URL
 * - MINTKIT_SOLIDITY_VERSION  solc version written to hardhat.config.ts
 *
 * @example
 * ```ts
 * import { resolveNetwork } from '@mintkit/config';
 *
 * const network = resolveNetwork({ network: 'swisstronik' });
 * console.log(network.rpcUrl);
 * ```
 */

import { expectValid, ValidationError } from '@mintkit/types'
import { loadJson } from './json-loader'
import {
  type NetworkOverrides,
  type NetworkPreset,
  NetworkPresetSchema,
  type NetworksFile,
  NetworksFileSchema,
} from './schemas'

export * from './schemas'

let networksCache: NetworksFile | null = null

export function getNetworksFile(): NetworksFile {
  if (!networksCache) {
    networksCache = expectValid(
      NetworksFileSchema,
      loadJson('./networks.json'),
      'networks.json',
    )
  }
  return networksCache
}

export function getDefaultNetworkName(): string {
  return getNetworksFile().defaultNetwork
}

export function listNetworks(): NetworkPreset[] {
  return Object.entries(getNetworksFile().networks).map(([name, preset]) => ({
    name,
    ...preset,
  }))
}

export function getNetworkPreset(name: string): NetworkPreset {
  const preset = getNetworksFile().networks[name]
  if (!preset) {
    const known = Object.keys(getNetworksFile().networks).join(', ')
    throw new ValidationError(`Unknown network "${name}". Known: ${known}`)
  }
  return { name, ...preset }
}

/**
 * Resolve the network for a run. Explicit overrides win over environment
 * variables, which win over networks.json.
 */
export function resolveNetwork(
  overrides: NetworkOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): NetworkPreset {
  const name =
    overrides.network ?? env.MINTKIT_NETWORK ?? getDefaultNetworkName()
  const preset = getNetworkPreset(name)

  const merged = expectValid(
    NetworkPresetSchema,
    {
      displayName: preset.displayName,
      chainId: preset.chainId,
      rpcUrl: overrides.rpcUrl ?? env.MINTKIT_RPC_URL ?? preset.rpcUrl,
      explorerUrl:
        overrides.explorerUrl ?? env.MINTKIT_EXPLORER_URL ?? preset.explorerUrl,
      solidityVersion:
        overrides.solidityVersion ??
        env.MINTKIT_SOLIDITY_VERSION ??
        preset.solidityVersion,
    },
    `network "${name}"`,
  )

  return { name, ...merged }
}
