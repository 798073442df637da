/**
 * Tests for network initialization, the transaction pipeline and fitness.
 */

import { describe, it, expect } from 'vitest'
import {
  applyTransaction,
  describeGood,
  describeTransaction,
  fitness,
  initializeNetwork,
  totalCash,
  totalFmv,
  totalTaxLiability,
} from '../../src/rules/engine'
import { findAssetByName, getEntity, getLedger } from '../../src/rules/graph'
import { validateNetwork } from '../../src/rules/qualityGates'
import { NetworkError } from '../../src/model/errors'
import type { NetworkErrorKind } from '../../src/model/errors'
import type { NetworkConfigInput } from '../../src/model/schemas'
import { cents } from '../../src/model/traced'
import { chainConfig, chainSale, threeTierConfig } from '../fixtures/networks'

// ── Helpers ──────────────────────────────────────────────────────

function initError(config: NetworkConfigInput): NetworkErrorKind | undefined {
  try {
    initializeNetwork(config)
  } catch (e) {
    if (e instanceof NetworkError) return e.kind
    throw e
  }
  return undefined
}

// ── Initialization ───────────────────────────────────────────────

describe('initializeNetwork', () => {
  it('builds entities, assets and edges from config', () => {
    const network = initializeNetwork(chainConfig())

    expect(Object.keys(network.entities)).toEqual(['A', 'B', 'C'])
    expect(network.assets['asset-1']).toEqual({
      id: 'asset-1',
      name: 'X',
      type: 'Material',
      basis: cents(100),
      fmv: cents(500),
    })
    expect(getEntity(network, 'B').directAssets).toEqual(['asset-1'])
    expect(network.partnerships).toEqual([{ upstream: 'A', downstream: 'B', share: 0.99 }])
    expect(network.taxRecords).toEqual({})
  })

  it('defaults FMV to basis', () => {
    const network = initializeNetwork(threeTierConfig())
    expect(findAssetByName(network, 'Y')?.fmv).toBe(cents(300))
  })

  it('accepts a config without assets or partnerships', () => {
    const network = initializeNetwork({ entities: [{ name: 'Solo', cash: 5 }] })
    expect(network.assets).toEqual({})
    expect(network.partnerships).toEqual([])
  })

  it('rejects a duplicate entity', () => {
    expect(initError({ entities: [{ name: 'A', cash: 0 }, { name: 'A', cash: 0 }] })).toBe('DuplicateEntity')
  })

  it('rejects a duplicate asset name', () => {
    const config = chainConfig()
    config.assets.push({ owner: 'A', name: 'X', type: 'Security', basis: 1 })
    expect(initError(config)).toBe('DuplicateAssetName')
  })

  it('rejects an asset owned by an unknown entity', () => {
    const config = chainConfig()
    config.assets.push({ owner: 'Ghost', name: 'G', type: 'Security', basis: 1 })
    expect(initError(config)).toBe('UnknownEntity')
  })

  it('rejects an edge to an unknown entity', () => {
    const config = chainConfig()
    config.partnerships.push({ upstream: 'A', downstream: 'Ghost', share: 0.1 })
    expect(initError(config)).toBe('UnknownEntity')
  })

  it('rejects a self-owning entity', () => {
    const config = chainConfig()
    config.partnerships.push({ upstream: 'C', downstream: 'C', share: 0.1 })
    expect(initError(config)).toBe('InvalidPartnership')
  })

  it('rejects a repeated edge', () => {
    const config = chainConfig()
    config.partnerships.push({ upstream: 'A', downstream: 'B', share: 0.01 })
    expect(initError(config)).toBe('InvalidPartnership')
  })

  it('rejects partners owning more than all of an entity', () => {
    const config = chainConfig()
    config.partnerships.push({ upstream: 'C', downstream: 'B', share: 0.02 })
    expect(initError(config)).toBe('InvalidPartnership')
  })

  it('rejects cyclic ownership', () => {
    const config = chainConfig()
    config.partnerships.push({ upstream: 'B', downstream: 'A', share: 0.5 })
    expect(initError(config)).toBe('CyclicOwnership')
  })

  it('rejects malformed input', () => {
    const config = chainConfig()
    config.partnerships[0] = { upstream: 'A', downstream: 'B', share: 1.5 }
    expect(initError(config)).toBe('InvalidInput')
  })
})

// ── Transactions ─────────────────────────────────────────────────

describe('applyTransaction', () => {
  it('sells an asset held under a 99% partner', () => {
    const network = initializeNetwork(chainConfig())
    const outcome = applyTransaction(network, chainSale())
    if (!outcome.ok) throw outcome.error
    const next = outcome.value.network

    expect(outcome.value.taxFrom.liabilityByEntity).toEqual({ B: 400, A: 39600 })
    expect(outcome.value.taxTo.liabilityByEntity).toEqual({})
    expect(outcome.value.basis.triggered).toBe(false)
    expect(next.taxRecords).toEqual({ B: 400, A: 39600 })
    expect(getEntity(next, 'B').cashBalance).toBe(cents(500))
    expect(getEntity(next, 'C').cashBalance).toBe(cents(500))
    expect(getEntity(next, 'C').directAssets).toEqual(['asset-1'])
    expect(next.assets['asset-1']?.basis).toBe(cents(500))
    expect(getLedger(next, 'A', 'B')).toEqual([])
    expect(validateNetwork(next).passed).toBe(true)
  })

  it('never mutates the network it is given', () => {
    const network = initializeNetwork(chainConfig())
    const before = structuredClone(network)
    applyTransaction(network, chainSale())
    expect(network).toEqual(before)
  })

  it('taxes both sides of an asset swap', () => {
    const network = initializeNetwork(threeTierConfig())
    const outcome = applyTransaction(network, {
      entityFrom: 'E',
      entityTo: 'S',
      goodFrom: { kind: 'asset', asset: 'X' },
      goodTo: { kind: 'asset', asset: 'W' },
      section754Election: false,
    })
    if (!outcome.ok) throw outcome.error

    expect(outcome.value.taxFrom.liabilityByEntity).toEqual({ E: 16000, P: 12000, Q: 12000 })
    expect(outcome.value.taxTo.liabilityByEntity).toEqual({ S: 0 })
    expect(getEntity(outcome.value.network, 'S').directAssets).toEqual(['asset-1'])
    expect(getEntity(outcome.value.network, 'E').directAssets).toEqual(['asset-2', 'asset-3', 'asset-4'])
    expect(validateNetwork(outcome.value.network).passed).toBe(true)
  })

  it('rejects a non-viable transaction and leaves the network as it was', () => {
    const network = initializeNetwork(chainConfig())
    const before = structuredClone(network)
    const outcome = applyTransaction(network, { ...chainSale(), entityFrom: 'A' })

    expect(outcome.ok).toBe(false)
    if (!outcome.ok) {
      expect(outcome.error.kind).toBe('InsufficientGood')
      expect(outcome.error.entity).toBe('A')
    }
    expect(network).toEqual(before)
  })

  it('discards partial work when a later step fails', () => {
    const network = initializeNetwork(chainConfig())
    getEntity(network, 'A').partnerships.B = []
    const before = structuredClone(network)
    const outcome = applyTransaction(network, chainSale())

    expect(outcome.ok).toBe(false)
    if (!outcome.ok) expect(outcome.error.kind).toBe('InconsistentLedger')
    expect(network).toEqual(before)
  })

  it('conserves cash and visible value on a cash-only exchange', () => {
    const network = initializeNetwork(chainConfig())
    const outcome = applyTransaction(network, {
      entityFrom: 'C',
      entityTo: 'A',
      goodFrom: { kind: 'cash', amount: cents(100) },
      goodTo: { kind: 'cash', amount: 0 },
      section754Election: false,
    })
    if (!outcome.ok) throw outcome.error

    expect(totalCash(outcome.value.network)).toBe(totalCash(network))
    expect(totalFmv(outcome.value.network)).toBe(totalFmv(network))
    expect(outcome.value.network.taxRecords).toEqual({})
  })
})

// ── Aggregates ───────────────────────────────────────────────────

describe('fitness', () => {
  it('is total cash minus recorded tax', () => {
    const network = initializeNetwork(chainConfig())
    expect(fitness(network)).toBe(cents(1000))

    const outcome = applyTransaction(network, chainSale())
    if (!outcome.ok) throw outcome.error
    expect(totalTaxLiability(outcome.value.network)).toBe(40000)
    expect(fitness(outcome.value.network)).toBe(60000)
  })

  it('counts mirrors once per tier in totalFmv', () => {
    const network = initializeNetwork(chainConfig())
    // $1,000 cash + X at $500 + A's 99% mirror at $495
    expect(totalFmv(network)).toBe(199500)
  })
})

// ── Descriptions ─────────────────────────────────────────────────

describe('describeTransaction', () => {
  it('reads as a sentence', () => {
    expect(describeTransaction(chainSale())).toBe('B gives X to C for $500.00')
  })

  it('mentions the election', () => {
    expect(
      describeTransaction({
        entityFrom: 'P',
        entityTo: 'R',
        goodFrom: { kind: 'partnership', partner: 'E' },
        goodTo: { kind: 'cash', amount: 123456 },
        section754Election: true,
      }),
    ).toBe('P gives interest in E to R for $1234.56 (§754 election)')
  })

  it('describes each kind of good', () => {
    expect(describeGood({ kind: 'asset', asset: 'Hotel' })).toBe('Hotel')
    expect(describeGood({ kind: 'partnership', partner: 'Fund' })).toBe('interest in Fund')
    expect(describeGood({ kind: 'cash', amount: 5 })).toBe('$0.05')
  })
})
