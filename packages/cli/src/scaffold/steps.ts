/**
 * The ten bootstrap steps, in order.
 *
 * Steps that shell out report the subprocess exit code; steps that write
 * files throw on I/O errors and the pipeline turns that into a failure.
 */

import { type CommandInvocation, formatCommand } from '../lib/exec'
import type {
  ScaffoldContext,
  ScaffoldStep,
  StepId,
  StepResult,
} from './context'
import {
  PROJECT_FILES,
  readDeployedAddress,
  readMintLog,
  removePlaceholderContract,
  writeProjectFile,
} from './files'
import {
  renderContract,
  renderDeployScript,
  renderEnvFile,
  renderHardhatConfig,
  renderMintScript,
} from './templates'

export const SYSTEM_UPDATE_COMMANDS: CommandInvocation[] = [
  { command: 'sudo', args: ['apt-get', 'update'] },
  { command: 'sudo', args: ['apt-get', 'upgrade', '-y'] },
]

export const INSTALL_COMMANDS: CommandInvocation[] = [
  { command: 'npm', args: ['install', '--save-dev', 'hardhat'] },
  { command: 'npm', args: ['install', 'dotenv'] },
  { command: 'npm', args: ['install', '@swisstronik/utils'] },
  { command: 'npm', args: ['install', '@openzeppelin/contracts'] },
  {
    command: 'npm',
    args: ['install', '--save-dev', '@openzeppelin/hardhat-upgrades'],
  },
  { command: 'npm', args: ['install', '@nomicfoundation/hardhat-toolbox'] },
  { command: 'npm', args: ['install', 'typescript', 'ts-node', '@types/node'] },
]

export const HARDHAT_INIT_COMMAND: CommandInvocation = {
  command: 'npx',
  args: ['hardhat', 'init'],
}

export const HARDHAT_COMPILE_COMMAND: CommandInvocation = {
  command: 'npx',
  args: ['hardhat', 'compile'],
}

export function hardhatRunCommand(
  script: string,
  network: string,
): CommandInvocation {
  return { command: 'npx', args: ['hardhat', 'run', script, '--network', network] }
}

const OK: StepResult = { ok: true }

function fail(step: StepId, message: string, exitCode?: number): StepResult {
  return { ok: false, error: { step, message, exitCode } }
}

/**
 * Run invocations one after another, stopping at the first non-zero exit.
 */
export async function runCommands(
  ctx: ScaffoldContext,
  step: StepId,
  invocations: CommandInvocation[],
): Promise<StepResult> {
  for (const invocation of invocations) {
    const display = formatCommand(invocation)
    ctx.logger.debug('Running command', { step, command: display })
    const { exitCode } = await ctx.runner.run(invocation, {
      cwd: ctx.projectDir,
    })
    if (exitCode !== 0) {
      return fail(step, `${display} exited with code ${exitCode}`, exitCode)
    }
  }
  return OK
}

function requireParams(ctx: ScaffoldContext, step: StepId) {
  if (!ctx.params) {
    throw new Error(`Step ${step} needs the token parameters`)
  }
  return ctx.params
}

export function writeDeployScript(ctx: ScaffoldContext): string {
  return writeProjectFile(ctx.projectDir, 'deployScript', renderDeployScript())
}

export function writeMintScript(ctx: ScaffoldContext): string {
  return writeProjectFile(
    ctx.projectDir,
    'mintScript',
    renderMintScript(ctx.network),
  )
}

export const systemUpdateStep: ScaffoldStep = {
  id: 'system-update',
  title: 'Updating and upgrading the system',
  doneMessage: 'System packages updated.',
  needsParams: false,
  run: (ctx) => runCommands(ctx, 'system-update', SYSTEM_UPDATE_COMMANDS),
}

export const installStep: ScaffoldStep = {
  id: 'install',
  title: 'Installing necessary packages and dependencies',
  doneMessage: 'Installation of dependencies completed.',
  needsParams: false,
  run: (ctx) => runCommands(ctx, 'install', INSTALL_COMMANDS),
}

export const initStep: ScaffoldStep = {
  id: 'init',
  title: 'Creating a new Hardhat project',
  doneMessage: 'Hardhat project created.',
  needsParams: false,
  run: (ctx) => runCommands(ctx, 'init', [HARDHAT_INIT_COMMAND]),
}

export const cleanupStep: ScaffoldStep = {
  id: 'cleanup',
  title: 'Removing default Lock.sol contract',
  doneMessage: 'Default contract removed.',
  needsParams: false,
  async run(ctx) {
    const removed = removePlaceholderContract(ctx.projectDir)
    ctx.logger.debug('Placeholder contract', { removed })
    return OK
  },
}

export const credentialsStep: ScaffoldStep = {
  id: 'credentials',
  title: 'Creating .env file',
  doneMessage: '.env file created.',
  needsParams: true,
  async run(ctx) {
    const params = requireParams(ctx, 'credentials')
    writeProjectFile(ctx.projectDir, 'env', renderEnvFile(params))
    return OK
  },
}

export const configStep: ScaffoldStep = {
  id: 'config',
  title: 'Configuring Hardhat',
  doneMessage: 'Hardhat configuration completed.',
  needsParams: false,
  async run(ctx) {
    writeProjectFile(
      ctx.projectDir,
      'hardhatConfig',
      renderHardhatConfig(ctx.network),
    )
    return OK
  },
}

export const contractStep: ScaffoldStep = {
  id: 'contract',
  title: 'Creating NFT.sol contract',
  doneMessage: 'NFT.sol contract created.',
  needsParams: true,
  async run(ctx) {
    const params = requireParams(ctx, 'contract')
    writeProjectFile(
      ctx.projectDir,
      'contract',
      renderContract(params, ctx.network),
    )
    return OK
  },
}

export const compileStep: ScaffoldStep = {
  id: 'compile',
  title: 'Compiling the contract',
  doneMessage: 'Contract compiled.',
  needsParams: false,
  run: (ctx) => runCommands(ctx, 'compile', [HARDHAT_COMPILE_COMMAND]),
}

export const deployStep: ScaffoldStep = {
  id: 'deploy',
  title: 'Deploying the contract',
  doneMessage: 'Contract deployed.',
  needsParams: false,
  async run(ctx) {
    writeDeployScript(ctx)
    const result = await runCommands(ctx, 'deploy', [
      hardhatRunCommand(PROJECT_FILES.deployScript, ctx.network.name),
    ])
    if (!result.ok) return result

    const deployed = readDeployedAddress(ctx.projectDir)
    if (!deployed.ok) return fail('deploy', deployed.error)
    ctx.logger.info(`NFT deployed to: ${deployed.address}`)
    return OK
  },
}

export const mintStep: ScaffoldStep = {
  id: 'mint',
  title: 'Minting NFT',
  doneMessage: 'NFT minted.',
  needsParams: false,
  async run(ctx) {
    const deployed = readDeployedAddress(ctx.projectDir)
    if (!deployed.ok) return fail('mint', deployed.error)

    writeMintScript(ctx)
    const before = readMintLog(ctx.projectDir).length
    const result = await runCommands(ctx, 'mint', [
      hardhatRunCommand(PROJECT_FILES.mintScript, ctx.network.name),
    ])
    if (!result.ok) return result

    const entries = readMintLog(ctx.projectDir)
    const latest = entries[entries.length - 1]
    if (entries.length > before && latest) {
      ctx.logger.info(`NFT ID ${latest.tokenId}: ${latest.txUrl}`)
    } else {
      ctx.logger.warn(`No new entry in ${PROJECT_FILES.mintLog}`)
    }
    return OK
  },
}

export const SCAFFOLD_STEPS: readonly ScaffoldStep[] = [
  systemUpdateStep,
  installStep,
  initStep,
  cleanupStep,
  credentialsStep,
  configStep,
  contractStep,
  compileStep,
  deployStep,
  mintStep,
]
