import { describe, it, expect } from 'vitest'
import {
  enterTier,
  findAssetByName,
  getEntity,
  getLedger,
  holdingFmv,
  holdingKey,
  holdingsOf,
  isUpstreamOf,
  rebuildLedgers,
  topologicalOrder,
  upstreamShareSum,
} from '../../src/rules/graph'
import { initializeNetwork } from '../../src/rules/engine'
import { isNetworkError } from '../../src/model/errors'
import { cents } from '../../src/model/traced'
import { diamondConfig, threeTierConfig } from '../fixtures/networks'

describe('lookups', () => {
  it('getEntity throws UnknownEntity for a missing name', () => {
    const network = initializeNetwork(threeTierConfig())
    try {
      getEntity(network, 'Nobody')
      expect.unreachable()
    } catch (e) {
      expect(isNetworkError(e) && e.kind).toBe('UnknownEntity')
    }
  })

  it('assigns asset ids in config order', () => {
    const network = initializeNetwork(threeTierConfig())
    expect(findAssetByName(network, 'X')?.id).toBe('asset-1')
    expect(findAssetByName(network, 'W')?.id).toBe('asset-4')
    expect(findAssetByName(network, 'missing')).toBeUndefined()
  })

  it('sums upstream shares', () => {
    const network = initializeNetwork(diamondConfig())
    expect(upstreamShareSum(network, 'D')).toBe(1)
    expect(upstreamShareSum(network, 'B')).toBe(0.5)
    expect(upstreamShareSum(network, 'A')).toBe(0)
  })
})

describe('ledgers', () => {
  it('mirrors each tier with the product of shares and scaled inside basis', () => {
    const network = initializeNetwork(threeTierConfig())
    const x = findAssetByName(network, 'X')
    if (!x) throw new Error('fixture missing X')

    const pLedger = getLedger(network, 'P', 'E')
    const pX = pLedger.find((pa) => pa.assetId === x.id)
    expect(pX?.path).toEqual(['E'])
    expect(pX?.share).toBeCloseTo(0.6, 12)
    expect(pX?.insideBasis).toBe(6000)

    const qLedger = getLedger(network, 'Q', 'P')
    const qX = qLedger.find((pa) => pa.assetId === x.id)
    expect(qX?.path).toEqual(['P', 'E'])
    expect(qX?.key).toBe(holdingKey(x.id, ['P', 'E']))
    expect(qX?.share).toBeCloseTo(0.3, 12)
    expect(qX?.insideBasis).toBe(3000)
  })

  it('mirrors every downstream holding, annuities included', () => {
    const network = initializeNetwork(threeTierConfig())
    expect(getLedger(network, 'P', 'E')).toHaveLength(3)
    expect(getLedger(network, 'Q', 'P')).toHaveLength(3)
  })

  it('keeps a separate mirror per path through a diamond', () => {
    const network = initializeNetwork(diamondConfig())
    const viaB = getLedger(network, 'A', 'B')
    const viaC = getLedger(network, 'A', 'C')
    expect(viaB.map((pa) => pa.path)).toEqual([['B', 'D']])
    expect(viaC.map((pa) => pa.path)).toEqual([['C', 'D']])
    expect(viaB[0]?.insideBasis).toBe(2500)
    expect(viaC[0]?.insideBasis).toBe(2500)
    expect(viaB[0]?.share).toBe(0.25)
  })

  it('holdingsOf lists direct assets before ledger entries', () => {
    const network = initializeNetwork(threeTierConfig())
    const holdings = holdingsOf(network, 'P')
    expect(holdings.every((h) => h.path[0] === 'E')).toBe(true)
    expect(holdingsOf(network, 'E').map((h) => h.path)).toEqual([[], [], []])
  })

  it('holdingFmv scales the asset FMV by the cumulative share', () => {
    const network = initializeNetwork(threeTierConfig())
    const qX = getLedger(network, 'Q', 'P').find((pa) => pa.path.length === 2 && pa.assetId === 'asset-1')
    if (!qX) throw new Error('mirror missing')
    expect(holdingFmv(network, qX)).toBe(cents(150))
  })

  it('getLedger throws InconsistentLedger when the ledger is missing', () => {
    const network = initializeNetwork(threeTierConfig())
    try {
      getLedger(network, 'R', 'E')
      expect.unreachable()
    } catch (e) {
      expect(isNetworkError(e) && e.kind).toBe('InconsistentLedger')
    }
  })

  it('rebuildLedgers restores a wiped ledger', () => {
    const network = initializeNetwork(threeTierConfig())
    const before = structuredClone(network.entities)
    network.entities.Q = { ...getEntity(network, 'Q'), partnerships: {} }
    rebuildLedgers(network)
    expect(network.entities).toEqual(before)
  })
})

describe('traversal', () => {
  it('orders entities after everything they own', () => {
    const network = initializeNetwork(diamondConfig())
    const order = topologicalOrder(network)
    expect(order.indexOf('D')).toBeLessThan(order.indexOf('B'))
    expect(order.indexOf('D')).toBeLessThan(order.indexOf('C'))
    expect(order.indexOf('B')).toBeLessThan(order.indexOf('A'))
    expect(order.indexOf('C')).toBeLessThan(order.indexOf('A'))
    expect(order).toHaveLength(5)
  })

  it('detects cycles', () => {
    const network = initializeNetwork(threeTierConfig())
    network.partnerships.push({ upstream: 'E', downstream: 'Q', share: 0.1 })
    try {
      topologicalOrder(network)
      expect.unreachable()
    } catch (e) {
      expect(isNetworkError(e) && e.kind).toBe('CyclicOwnership')
    }
  })

  it('isUpstreamOf follows indirect ownership', () => {
    const network = initializeNetwork(threeTierConfig())
    expect(isUpstreamOf(network, 'Q', 'E')).toBe(true)
    expect(isUpstreamOf(network, 'P', 'E')).toBe(true)
    expect(isUpstreamOf(network, 'E', 'Q')).toBe(false)
    expect(isUpstreamOf(network, 'R', 'E')).toBe(false)
  })

  it('enterTier extends the trail and rejects repeats', () => {
    expect(enterTier(['A'], 'B')).toEqual(['A', 'B'])
    expect(() => enterTier(['A', 'B'], 'A')).toThrow('CyclicOwnership')
  })
})
