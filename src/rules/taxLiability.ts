/**
 * Tax Liability — gain on a sale, attributed up the ownership chain
 *
 * The selling entity keeps the part of the gain its partners do not own:
 *
 *   liability(E) = (1 − Σ upstream shares of E) × Σ(FMV − inside basis)
 *
 * Each partner then repeats the computation on its own mirrors of the sold
 * holdings, so a partner with share t in E, whose own partner owns s of it,
 * ends up with (1 − s) × t × gain and passes s × t × gain further up. Paths
 * are walked independently: an ancestor reached through two routes (the
 * "diamond") is attributed once per route, each with its own mirrors.
 *
 * Annuities are excluded at every tier. Cash has no tax consequence. Losses
 * record zero: no refund is modeled, so recorded liability never decreases.
 *
 * All amounts in integer cents.
 */

import type { Good, Holding, Network } from '../model/types'
import type { TracedValue } from '../model/traced'
import { tracedFromComputation } from '../model/traced'
import { NetworkError } from '../model/errors'
import {
  enterTier,
  findAssetByName,
  directHolding,
  getLedger,
  holdingFmv,
  isTaxExempt,
  mirrorRef,
  refKey,
  upstreamEdges,
  upstreamShareSum,
} from './graph'
import { CITATIONS } from './constants'

// ── Types ──────────────────────────────────────────────────────

export interface TaxComputation {
  /** Liability added by this sale, per entity name (cents). */
  liabilityByEntity: Record<string, number>
  /** One trace per tier reached, in traversal order. */
  traces: TracedValue[]
}

export interface TierGain {
  fmv: number
  insideBasis: number
  gain: number
}

// ── Helpers ────────────────────────────────────────────────────

export function tierGain(network: Network, holdings: readonly Holding[]): TierGain {
  let fmv = 0
  let insideBasis = 0
  for (const h of holdings) {
    fmv += holdingFmv(network, h)
    insideBasis += h.insideBasis
  }
  return { fmv, insideBasis, gain: fmv - insideBasis }
}

/** Liability kept at one tier; clamped at zero and normalized away from -0. */
export function tierLiability(retainedShare: number, gain: number): number {
  return Math.max(0, Math.round(retainedShare * gain))
}

function emptyComputation(): TaxComputation {
  return { liabilityByEntity: {}, traces: [] }
}

/** Holdings whose sale is taxed: what `entity` hands over, minus annuities. */
function taxableHoldings(network: Network, entity: string, good: Good): Holding[] {
  switch (good.kind) {
    case 'asset': {
      const asset = findAssetByName(network, good.asset)
      if (!asset) {
        throw new NetworkError('UnknownAsset', `No asset named "${good.asset}"`, { entity, good })
      }
      return [directHolding(asset)].filter((h) => !isTaxExempt(network, h))
    }
    case 'partnership':
      return getLedger(network, entity, good.partner).filter((pa) => !isTaxExempt(network, pa))
    case 'cash':
      return []
  }
}

// ── Computation ────────────────────────────────────────────────

/**
 * Compute liability for `entityFrom` handing over `good`, attribute it to
 * every upstream partner, and add each amount into `network.taxRecords`.
 */
export function computeTax(network: Network, entityFrom: string, good: Good): TaxComputation {
  const holdings = taxableHoldings(network, entityFrom, good)
  if (holdings.length === 0) return emptyComputation()

  const result = emptyComputation()
  const citation = good.kind === 'asset' ? CITATIONS.assetSale : CITATIONS.interestSale
  const description = good.kind === 'asset' ? `Sale of ${good.asset}` : `Sale of interest in ${good.partner}`

  const attribute = (
    name: string,
    tierHoldings: readonly Holding[],
    trail: readonly string[],
    inputs: string[],
  ): void => {
    const retained = 1 - upstreamShareSum(network, name)
    const { gain } = tierGain(network, tierHoldings)
    const amount = tierLiability(retained, gain)
    const nodeId = `tax.${name}`

    result.liabilityByEntity[name] = (result.liabilityByEntity[name] ?? 0) + amount
    network.taxRecords[name] = (network.taxRecords[name] ?? 0) + amount
    result.traces.push(tracedFromComputation(amount, nodeId, inputs, citation, description))

    for (const edge of upstreamEdges(network, name)) {
      const next = enterTier(trail, edge.upstream)
      const byKey = new Map(getLedger(network, edge.upstream, name).map((pa) => [pa.key, pa]))
      const mirrors = tierHoldings.map((h) => {
        const key = refKey(mirrorRef(h, name))
        const mirror = byKey.get(key)
        if (!mirror) {
          throw new NetworkError(
            'InconsistentLedger',
            `${edge.upstream} has no mirror of ${h.assetId} held through ${name}`,
            { entity: edge.upstream, good },
          )
        }
        return mirror
      })
      attribute(edge.upstream, mirrors, next, [nodeId])
    }
  }

  attribute(entityFrom, holdings, [entityFrom], [])
  return result
}
