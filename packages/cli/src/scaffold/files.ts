/**
 * Layout of the generated Hardhat project and the records passed between
 * steps through it.
 */

import {
  existsSync,
  mkdirSync,
  readFileSync,
  rmSync,
  writeFileSync,
} from 'node:fs'
import { dirname, join } from 'node:path'
import { type MintLogEntry, MintLogEntrySchema } from '@mintkit/types'
import { type Address, getAddress, isAddress } from 'viem'

export const PROJECT_FILES = {
  env: '.env',
  hardhatConfig: 'hardhat.config.ts',
  contract: 'contracts/NFT.sol',
  placeholderContract: 'contracts/Lock.sol',
  deployScript: 'scripts/deploy.ts',
  mintScript: 'scripts/mint.ts',
  deployedAddress: 'utils/deployed-address.ts',
  mintLog: 'utils/tx-hash.txt',
} as const
export type ProjectFile = keyof typeof PROJECT_FILES

export function projectPath(projectDir: string, file: ProjectFile): string {
  return join(projectDir, PROJECT_FILES[file])
}

/** Writes the whole file, replacing anything already there. */
export function writeProjectFile(
  projectDir: string,
  file: ProjectFile,
  content: string,
): string {
  const path = projectPath(projectDir, file)
  mkdirSync(dirname(path), { recursive: true })
  writeFileSync(path, content, 'utf-8')
  return path
}

/** Returns whether the scaffold's Lock.sol was there to remove. */
export function removePlaceholderContract(projectDir: string): boolean {
  const path = projectPath(projectDir, 'placeholderContract')
  const existed = existsSync(path)
  rmSync(path, { force: true })
  return existed
}

export type DeployedAddressResult =
  | { ok: true; address: Address }
  | { ok: false; error: string }

const DEPLOYED_ADDRESS_PATTERN =
  /const\s+deployedAddress\s*=\s*['"]([^'"]*)['"]/

export function parseDeployedAddress(content: string): DeployedAddressResult {
  const file = PROJECT_FILES.deployedAddress
  if (content.trim() === '') {
    return { ok: false, error: `${file} is empty` }
  }

  const match = DEPLOYED_ADDRESS_PATTERN.exec(content)
  if (!match) {
    return { ok: false, error: `${file} does not declare deployedAddress` }
  }

  const value = match[1] ?? ''
  if (value === '') {
    return { ok: false, error: `${file} holds an empty address` }
  }
  if (!isAddress(value, { strict: false })) {
    return { ok: false, error: `${file} holds an invalid address: ${value}` }
  }
  return { ok: true, address: getAddress(value) }
}

export function readDeployedAddress(projectDir: string): DeployedAddressResult {
  const path = projectPath(projectDir, 'deployedAddress')
  if (!existsSync(path)) {
    return {
      ok: false,
      error: `${PROJECT_FILES.deployedAddress} not found; deploy the contract first`,
    }
  }
  return parseDeployedAddress(readFileSync(path, 'utf-8'))
}

const MINT_LOG_LINE = /^NFT ID (\d+) : (\S+)$/

export function formatMintLogLine(entry: MintLogEntry): string {
  return `NFT ID ${entry.tokenId} : ${entry.txUrl}`
}

export function parseMintLogLine(line: string): MintLogEntry | null {
  const match = MINT_LOG_LINE.exec(line.trim())
  if (!match) return null
  const parsed = MintLogEntrySchema.safeParse({
    tokenId: match[1],
    txUrl: match[2],
  })
  return parsed.success ? parsed.data : null
}

/** Entries in append order; lines that do not match the format are skipped. */
export function readMintLog(projectDir: string): MintLogEntry[] {
  const path = projectPath(projectDir, 'mintLog')
  if (!existsSync(path)) return []

  const entries: MintLogEntry[] = []
  for (const line of readFileSync(path, 'utf-8').split('\n')) {
    const entry = parseMintLogLine(line)
    if (entry) entries.push(entry)
  }
  return entries
}
