/**
 * In-process stand-ins for the terminal and the external toolchain, shared
 * by the CLI tests.
 */

import { appendFileSync, mkdirSync, mkdtempSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { dirname, join } from 'node:path'
import type { CliDeps } from './lib/deps'
import type { CommandInvocation, CommandRunner, RunOptions } from './lib/exec'
import { Logger } from './lib/logger'
import type { Prompt } from './lib/prompt'

export const TEST_ADDRESS = '0x5FbDB2315678afecb367f032d93F642f64180aa3'
export const TEST_TX_HASH = `0x${'ab'.repeat(32)}`

export interface RecordedCall extends CommandInvocation {
  cwd: string
}

export type FakeHandler = (
  invocation: CommandInvocation,
  options: RunOptions,
) => number

export interface FakeRunner extends CommandRunner {
  calls: RecordedCall[]
  commandLines(): string[]
}

export function createFakeRunner(handler: FakeHandler = () => 0): FakeRunner {
  const calls: RecordedCall[] = []
  return {
    calls,
    commandLines: () =>
      calls.map(({ command, args }) => [command, ...args].join(' ')),
    async run(invocation, options) {
      calls.push({ ...invocation, args: [...invocation.args], cwd: options.cwd })
      return { exitCode: handler(invocation, options) }
    },
  }
}

/**
 * Behaves like Hardhat running the generated scripts: the deploy script
 * records an address, the mint script appends one log line per run.
 */
export function simulateHardhat(explorerUrl: string): FakeHandler {
  let nextTokenId = 1
  return ({ command, args }, { cwd }) => {
    if (command !== 'npx' || args[1] !== 'run') return 0

    if (args[2] === 'scripts/deploy.ts') {
      const path = join(cwd, 'utils', 'deployed-address.ts')
      mkdirSync(dirname(path), { recursive: true })
      writeFileSync(
        path,
        `const deployedAddress = '${TEST_ADDRESS}'\n\nexport default deployedAddress\n`,
      )
    }

    if (args[2] === 'scripts/mint.ts') {
      const path = join(cwd, 'utils', 'tx-hash.txt')
      mkdirSync(dirname(path), { recursive: true })
      appendFileSync(
        path,
        `NFT ID ${nextTokenId} : ${explorerUrl}/tx/${TEST_TX_HASH}\n`,
      )
      nextTokenId += 1
    }
    return 0
  }
}

export interface ScriptedPrompt extends Prompt {
  questions: string[]
  closed: boolean
}

export function createScriptedPrompt(answers: string[]): ScriptedPrompt {
  const queue = [...answers]
  const prompt: ScriptedPrompt = {
    questions: [],
    closed: false,
    async ask(question) {
      prompt.questions.push(question)
      const answer = queue.shift()
      if (answer === undefined) {
        throw new Error(`No scripted answer for "${question}"`)
      }
      return answer
    },
    close() {
      prompt.closed = true
    },
  }
  return prompt
}

export function createTempDir(): string {
  return mkdtempSync(join(tmpdir(), 'mintkit-'))
}

export function createTestDeps(overrides: Partial<CliDeps> = {}): CliDeps {
  return {
    runner: createFakeRunner(),
    prompt: createScriptedPrompt([]),
    env: {},
    cwd: createTempDir(),
    logger: new Logger({ silent: true }),
    ...overrides,
  }
}
