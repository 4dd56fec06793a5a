import { getDefaultNetworkName, listNetworks } from '@mintkit/config'
import chalk from 'chalk'
import { Command } from 'commander'
import type { CliDeps } from '../lib/deps'

export function networksCommand(deps: CliDeps): Command {
  return new Command('networks')
    .description('List the network presets')
    .action(() => {
      const defaultName = getDefaultNetworkName()
      for (const network of listNetworks()) {
        const marker = network.name === defaultName ? chalk.green(' (default)') : ''
        deps.logger.info(
          `${chalk.cyan(network.name)}${marker}  ${network.displayName}  chainId ${network.chainId}`,
        )
        deps.logger.info(`  rpc:      ${network.rpcUrl}`)
        deps.logger.info(`  explorer: ${network.explorerUrl}`)
        deps.logger.info(`  solc:     ${network.solidityVersion}`)
      }
    })
}
