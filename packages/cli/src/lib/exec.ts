/**
 * Subprocess invocation for the external toolchain (apt-get, npm, npx hardhat).
 *
 * Output is inherited by the terminal and never captured; only the exit
 * code comes back.
 */

import { execa } from 'execa'

export interface CommandInvocation {
  command: string
  args: string[]
}

export interface RunOptions {
  cwd: string
}

export interface RunResult {
  exitCode: number
}

export interface CommandRunner {
  run(invocation: CommandInvocation, options: RunOptions): Promise<RunResult>
}

export function formatCommand({ command, args }: CommandInvocation): string {
  return [command, ...args].join(' ')
}

export const execaRunner: CommandRunner = {
  async run({ command, args }, { cwd }) {
    const result = await execa(command, args, {
      cwd,
      stdio: 'inherit',
      reject: false,
    })
    // A command that never spawned (ENOENT) has no exit code of its own
    return { exitCode: result.failed && !result.exitCode ? 1 : result.exitCode }
  },
}
