/**
 * @fileoverview Tests for network preset resolution
 */

import { ValidationError } from '@mintkit/types'
import { describe, expect, it } from 'vitest'
import {
  getDefaultNetworkName,
  getNetworkPreset,
  listNetworks,
  resolveNetwork,
} from './index'

describe('Network presets', () => {
  it('defaults to the Swisstronik testnet', () => {
    expect(getDefaultNetworkName()).toBe('swisstronik')
    expect(listNetworks().map((n) => n.name)).toContain('swisstronik')
  })

  it('loads the preset values from networks.json', () => {
    const preset = getNetworkPreset('swisstronik')
    expect(preset.rpcUrl).toBe('https://json-rpc.testnet.swisstronik.com/')
    expect(preset.explorerUrl).toBe('https://explorer-evm.testnet.swisstronik.com')
    expect(preset.solidityVersion).toBe('0.8.20')
    expect(preset.chainId).toBe(1291)
  })

  it('rejects unknown networks', () => {
    expect(() => getNetworkPreset('nowhere')).toThrow(ValidationError)
    expect(() => getNetworkPreset('nowhere')).toThrow(
      'Unknown network "nowhere". Known: swisstronik',
    )
  })
})

describe('resolveNetwork', () => {
  it('uses the preset when nothing overrides it', () => {
    const network = resolveNetwork({}, {})
    expect(network.name).toBe('swisstronik')
    expect(network.rpcUrl).toBe('https://json-rpc.testnet.swisstronik.com/')
  })

  it('lets the environment override the preset', () => {
    const network = resolveNetwork(
      {},
      {
        MINTKIT_RPC_URL: 'http://127.0.0.1:8545',
        MINTKIT_SOLIDITY_VERSION: '0.8.24',
      },
    )
    expect(network.rpcUrl).toBe('http://127.0.0.1:8545')
    expect(network.solidityVersion).toBe('0.8.24')
  })

  it('lets explicit overrides win over the environment', () => {
    const network = resolveNetwork(
      { explorerUrl: 'https://explorer.example.test/' },
      { MINTKIT_EXPLORER_URL: 'https://other.example.test' },
    )
    expect(network.explorerUrl).toBe('https://explorer.example.test')
  })

  it('validates overridden values', () => {
    expect(() => resolveNetwork({ solidityVersion: 'latest' }, {})).toThrow(
      'Invalid network "swisstronik": solidityVersion: Solidity version must be x.y.z',
    )
  })
})
