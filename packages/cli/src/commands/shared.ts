import { mkdirSync } from 'node:fs'
import { resolve } from 'node:path'
import { type NetworkPreset, resolveNetwork } from '@mintkit/config'
import type { ScaffoldParams } from '@mintkit/types'
import type { Command } from 'commander'
import type { CliDeps } from '../lib/deps'
import { collectParams } from '../lib/params'
import type { ScaffoldContext } from '../scaffold/context'
import type { NetworkOptions, ParamOptions } from '../schemas'

export function addProjectOption(command: Command): Command {
  return command.option(
    '-d, --dir <path>',
    'Project directory (defaults to the current directory)',
  )
}

export function addNetworkOptions(command: Command): Command {
  return command
    .option('-n, --network <name>', 'Network preset (see `mintkit networks`)')
    .option('--rpc-url <url>', 'Override the network JSON-RPC URL')
    .option('--explorer-url <url>', 'Override the block explorer URL')
    .option('--solidity-version <version>', 'Override the solc version')
}

export function addParamOptions(command: Command): Command {
  return command
    .option('--private-key <key>', 'Deployer private key (written to .env)')
    .option('--name <name>', 'NFT name')
    .option('--symbol <symbol>', 'NFT symbol')
    .option('--params <file>', 'JSON file with privateKey, name and symbol')
    .option('--no-interactive', 'Fail instead of prompting for missing values')
}

export function resolveProjectDir(deps: CliDeps, dir: string): string {
  const projectDir = resolve(deps.cwd, dir)
  mkdirSync(projectDir, { recursive: true })
  return projectDir
}

export function resolveRunNetwork(
  deps: CliDeps,
  options: NetworkOptions,
): NetworkPreset {
  return resolveNetwork(
    {
      network: options.network,
      rpcUrl: options.rpcUrl,
      explorerUrl: options.explorerUrl,
      solidityVersion: options.solidityVersion,
    },
    deps.env,
  )
}

export async function gatherParams(
  deps: CliDeps,
  options: ParamOptions,
): Promise<ScaffoldParams> {
  try {
    return await collectParams({
      flags: {
        privateKey: options.privateKey,
        name: options.name,
        symbol: options.symbol,
      },
      paramsFile: options.params
        ? resolve(deps.cwd, options.params)
        : undefined,
      env: deps.env,
      prompt: deps.prompt,
      interactive: options.interactive,
    })
  } finally {
    // stdin stays referenced until the prompt lets go of it
    deps.prompt.close()
  }
}

export function createContext(
  deps: CliDeps,
  projectDir: string,
  network: NetworkPreset,
  params: ScaffoldParams | null,
): ScaffoldContext {
  return {
    projectDir,
    network,
    params,
    runner: deps.runner,
    logger: deps.logger,
  }
}
