import { existsSync, readFileSync } from 'node:fs'
import { dirname, join } from 'node:path'
import { fileURLToPath } from 'node:url'
import { ValidationError } from '@mintkit/types'
import { execa } from 'execa'
import { afterEach, describe, expect, test, vi } from 'vitest'
import type { CliDeps } from './lib/deps'
import { PIPELINE_FAILURE_MESSAGE, PipelineFailedError } from './lib/errors'
import { Logger } from './lib/logger'
import { createProgram, getVersion } from './program'
import {
  createFakeRunner,
  createScriptedPrompt,
  createTempDir,
  createTestDeps,
  simulateHardhat,
  TEST_TX_HASH,
} from './testing'

const EXPLORER = 'https://explorer-evm.testnet.swisstronik.com'

function runCLI(deps: CliDeps, args: string[]): Promise<unknown> {
  const program = createProgram(deps, {
    output: { writeOut: () => {}, writeErr: () => {} },
  })
  return program.parseAsync(args, { from: 'user' })
}

afterEach(() => {
  vi.restoreAllMocks()
})

describe('CLI Core', () => {
  test('--help lists every command', () => {
    const help = createProgram(createTestDeps()).helpInformation()
    for (const name of ['bootstrap', 'generate', 'deploy', 'mint', 'mints', 'networks']) {
      expect(help).toContain(name)
    }
    expect(help).toContain('--verbose')
  })

  test('version comes from package.json', () => {
    expect(getVersion()).toMatch(/^\d+\.\d+\.\d+/)
  })

  test('bootstrap --help shows the step options', () => {
    const program = createProgram(createTestDeps())
    const bootstrap = program.commands.find((c) => c.name() === 'bootstrap')
    const help = bootstrap?.helpInformation() ?? ''
    expect(help).toContain('--skip-system-update')
    expect(help).toContain('--from <step>')
    expect(help).toContain('--only <step>')
    expect(help).toContain('--no-interactive')
  })

  test('unknown words are rejected instead of starting a run', async () => {
    const deps = createTestDeps()
    await expect(runCLI(deps, ['frobnicate'])).rejects.toMatchObject({
      code: 'commander.excessArguments',
    })
  })
})

describe('bootstrap command', () => {
  test('runs the whole pipeline when called with no command', async () => {
    const dir = createTempDir()
    const runner = createFakeRunner(simulateHardhat(EXPLORER))
    const prompt = createScriptedPrompt(['abc123', 'Demo', 'DNFT'])
    const deps = createTestDeps({ cwd: dir, runner, prompt })

    await runCLI(deps, [])

    expect(prompt.questions).toHaveLength(3)
    expect(runner.calls).toHaveLength(13)
    expect(readFileSync(join(dir, '.env'), 'utf-8')).toBe('PRIVATE_KEY=abc123\n')
    expect(readFileSync(join(dir, 'contracts', 'NFT.sol'), 'utf-8')).toContain(
      'ERC721("Demo", "DNFT")',
    )
    expect(
      readFileSync(join(dir, 'utils', 'deployed-address.ts'), 'utf-8'),
    ).toContain('0x5FbDB2315678afecb367f032d93F642f64180aa3')
    expect(readFileSync(join(dir, 'utils', 'tx-hash.txt'), 'utf-8')).toBe(
      `NFT ID 1 : ${EXPLORER}/tx/${TEST_TX_HASH}\n`,
    )
  })

  test('--skip-system-update and --dir', async () => {
    const cwd = createTempDir()
    const runner = createFakeRunner(simulateHardhat(EXPLORER))
    const deps = createTestDeps({ cwd, runner })

    await runCLI(deps, [
      'bootstrap',
      '--dir',
      'my-nft',
      '--skip-system-update',
      '--private-key',
      'abc123',
      '--name',
      'Demo',
      '--symbol',
      'DNFT',
    ])

    expect(runner.commandLines()[0]).toBe('npm install --save-dev hardhat')
    expect(runner.calls.every((c) => c.cwd === join(cwd, 'my-nft'))).toBe(true)
    expect(existsSync(join(cwd, 'my-nft', 'hardhat.config.ts'))).toBe(true)
  })

  test('a failing tool aborts with the fixed diagnostic', async () => {
    const dir = createTempDir()
    const runner = createFakeRunner(({ args }) => (args[1] === 'init' ? 1 : 0))
    const deps = createTestDeps({ cwd: dir, runner })

    const run = runCLI(deps, [
      '--private-key',
      'abc123',
      '--name',
      'Demo',
      '--symbol',
      'DNFT',
    ])

    await expect(run).rejects.toBeInstanceOf(PipelineFailedError)
    await expect(run).rejects.toThrow(PIPELINE_FAILURE_MESSAGE)
    expect(runner.commandLines().at(-1)).toBe('npx hardhat init')
    expect(existsSync(join(dir, '.env'))).toBe(false)
  })

  test('--from compile needs no token parameters', async () => {
    const dir = createTempDir()
    const runner = createFakeRunner(simulateHardhat(EXPLORER))
    const deps = createTestDeps({ cwd: dir, runner })

    await runCLI(deps, ['bootstrap', '--from', 'compile'])

    expect(runner.commandLines()).toEqual([
      'npx hardhat compile',
      'npx hardhat run scripts/deploy.ts --network swisstronik',
      'npx hardhat run scripts/mint.ts --network swisstronik',
    ])
  })

  test('--no-interactive fails before any step when a value is missing', async () => {
    const runner = createFakeRunner()
    const deps = createTestDeps({ runner })

    await expect(
      runCLI(deps, ['--no-interactive', '--name', 'Demo', '--symbol', 'DNFT']),
    ).rejects.toThrow(
      'Missing privateKey: pass --private-key, set PRIVATE_KEY or run interactively',
    )
    expect(runner.calls).toEqual([])
  })

  test('rejects conflicting or unknown step selections', async () => {
    const deps = createTestDeps()
    await expect(
      runCLI(deps, ['bootstrap', '--from', 'init', '--only', 'mint']),
    ).rejects.toThrow('Invalid options: Use either --from or --only, not both')
    await expect(
      runCLI(deps, ['bootstrap', '--only', 'publish']),
    ).rejects.toBeInstanceOf(ValidationError)
  })
})

describe('generate command', () => {
  test('writes every project file without running a tool', async () => {
    const dir = createTempDir()
    const runner = createFakeRunner()
    const deps = createTestDeps({ cwd: dir, runner })

    await runCLI(deps, [
      'generate',
      '--private-key',
      'abc123',
      '--name',
      'Demo',
      '--symbol',
      'DNFT',
      '--rpc-url',
      'http://127.0.0.1:8545',
    ])

    expect(runner.calls).toEqual([])
    for (const file of [
      '.env',
      'hardhat.config.ts',
      'contracts/NFT.sol',
      'scripts/deploy.ts',
      'scripts/mint.ts',
    ]) {
      expect(existsSync(join(dir, file))).toBe(true)
    }
    expect(readFileSync(join(dir, 'hardhat.config.ts'), 'utf-8')).toContain(
      'url: "http://127.0.0.1:8545",',
    )
  })

  test('releases the prompt once the answers are in', async () => {
    const dir = createTempDir()
    const prompt = createScriptedPrompt(['abc123', 'Demo', 'DNFT'])
    const deps = createTestDeps({ cwd: dir, prompt })

    await runCLI(deps, ['generate'])

    expect(prompt.closed).toBe(true)
    expect(readFileSync(join(dir, '.env'), 'utf-8')).toBe('PRIVATE_KEY=abc123\n')
  })
})

describe('mint and mints commands', () => {
  test('mint fails without a deployment', async () => {
    const dir = createTempDir()
    const runner = createFakeRunner()
    const deps = createTestDeps({ cwd: dir, runner })

    const run = runCLI(deps, ['mint'])
    await expect(run).rejects.toBeInstanceOf(PipelineFailedError)
    await expect(run).rejects.toMatchObject({
      failure: {
        step: 'mint',
        message: 'utils/deployed-address.ts not found; deploy the contract first',
      },
    })
    expect(runner.calls).toEqual([])
  })

  test('deploy then mint, then list the log', async () => {
    const dir = createTempDir()
    const runner = createFakeRunner(simulateHardhat(EXPLORER))
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})
    const deps = createTestDeps({ cwd: dir, runner, logger: new Logger() })

    await runCLI(deps, ['deploy'])
    await runCLI(deps, ['mint'])
    await runCLI(deps, ['mint'])
    log.mockClear()
    await runCLI(deps, ['mints'])

    expect(log.mock.calls).toEqual([
      [`NFT ID 1 : ${EXPLORER}/tx/${TEST_TX_HASH}`],
      [`NFT ID 2 : ${EXPLORER}/tx/${TEST_TX_HASH}`],
    ])
  })
})

describe('networks command', () => {
  test('lists the presets', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})
    const deps = createTestDeps({ logger: new Logger() })

    await runCLI(deps, ['networks'])

    const lines = log.mock.calls.map((call) => String(call[0]))
    expect(lines).toContain('  rpc:      https://json-rpc.testnet.swisstronik.com/')
    expect(lines).toContain(`  explorer: ${EXPLORER}`)
  })
})

const CLI_ROOT = join(dirname(fileURLToPath(import.meta.url)), '..')
const PROCESS_TIMEOUT = 30_000

interface CliProcessResult {
  stdout: string
  stderr: string
  exitCode: number
}

async function runCLIProcess(
  args: string[],
  input?: string,
): Promise<CliProcessResult> {
  const result = await execa('tsx', ['src/index.ts', ...args], {
    cwd: CLI_ROOT,
    preferLocal: true,
    reject: false,
    input,
    extendEnv: false,
    env: {
      PATH: process.env.PATH,
      HOME: process.env.HOME,
      LOG_LEVEL: 'silent',
      FORCE_COLOR: '0',
      NO_COLOR: '1',
    },
  })
  return {
    stdout: result.stdout,
    stderr: result.stderr,
    exitCode: result.exitCode,
  }
}

describe('CLI process', () => {
  test(
    'networks exits 0',
    async () => {
      const { stdout, exitCode } = await runCLIProcess(['networks'])
      expect(exitCode).toBe(0)
      expect(stdout).toContain('  rpc:      https://json-rpc.testnet.swisstronik.com/')
    },
    PROCESS_TIMEOUT,
  )

  test(
    '--help and --version exit 0',
    async () => {
      const help = await runCLIProcess(['--help'])
      expect(help.exitCode).toBe(0)
      expect(help.stdout).toContain('Usage: mintkit')

      const version = await runCLIProcess(['--version'])
      expect(version.exitCode).toBe(0)
      expect(version.stdout).toBe(getVersion())
    },
    PROCESS_TIMEOUT,
  )

  test(
    'a missing value with --no-interactive exits 1',
    async () => {
      const dir = createTempDir()
      const { stderr, exitCode } = await runCLIProcess([
        'generate',
        '--no-interactive',
        '--dir',
        dir,
      ])
      expect(exitCode).toBe(1)
      expect(stderr).toContain(
        'Error: Missing privateKey: pass --private-key, set PRIVATE_KEY or run interactively',
      )
      expect(existsSync(join(dir, '.env'))).toBe(false)
    },
    PROCESS_TIMEOUT,
  )

  test(
    'a failed step exits 1 with the fixed diagnostic',
    async () => {
      const dir = createTempDir()
      const { stderr, exitCode } = await runCLIProcess([
        'bootstrap',
        '--only',
        'mint',
        '--dir',
        dir,
      ])
      expect(exitCode).toBe(1)
      expect(stderr).toContain(PIPELINE_FAILURE_MESSAGE)
      expect(existsSync(join(dir, 'scripts', 'mint.ts'))).toBe(false)
    },
    PROCESS_TIMEOUT,
  )

  test(
    'a stray word exits 1 with a hint',
    async () => {
      const { stderr, exitCode } = await runCLIProcess(['frobnicate'])
      expect(exitCode).toBe(1)
      expect(stderr).toContain(
        "Unexpected argument. Run 'mintkit --help' for available commands.",
      )
    },
    PROCESS_TIMEOUT,
  )

  test(
    'answers piped in one go fill every prompt',
    async () => {
      const dir = createTempDir()
      const { exitCode } = await runCLIProcess(
        ['generate', '--dir', dir],
        'abc123\nDemo\nDNFT\n',
      )
      expect(exitCode).toBe(0)
      expect(readFileSync(join(dir, '.env'), 'utf-8')).toBe('PRIVATE_KEY=abc123\n')
      expect(readFileSync(join(dir, 'contracts', 'NFT.sol'), 'utf-8')).toContain(
        'ERC721("Demo", "DNFT")',
      )
    },
    PROCESS_TIMEOUT,
  )
})
