/**
 * Inside Basis Adjustment — IRC §754 / §743(b)
 *
 * When a partnership interest changes hands and either a §754 election is in
 * effect or the transferred good carries a substantial built-in loss
 * (§743(d): loss strictly above $250,000), the partnership's inside basis in
 * each asset of the transferred interest is stepped to the basis of the good
 * given in exchange. The change is then carried to every upstream tier that
 * mirrors those assets.
 *
 * FMV never changes here; only inside basis does.
 */

import type { Good, Network, PartnershipAsset, Transaction } from '../model/types'
import { scaleCents } from '../model/traced'
import {
  enterTier,
  findAssetByName,
  getEntity,
  getLedger,
  holdingFmv,
  mirrorRef,
  refKey,
  upstreamEdges,
} from './graph'
import { SUBSTANTIAL_BUILT_IN_LOSS_THRESHOLD } from './constants'

// ── Types ──────────────────────────────────────────────────────

export interface BasisAdjustment {
  entity: string          // holder of the adjusted ledger
  partner: string         // partnership whose inside basis moved
  assetId: string
  key: string
  before: number          // cents
  after: number           // cents
}

export interface BasisAdjustmentResult {
  triggered: boolean
  electionTriggered: boolean
  lossTriggered: boolean
  adjustments: BasisAdjustment[]
}

// ── Trigger tests ──────────────────────────────────────────────

/**
 * Built-in loss `entity` would carry out by transferring `good`:
 * basis − FMV for an asset, Σ(inside basis − FMV) across the ledger for a
 * partnership interest, zero for cash.
 *
 * Unlike gain recognition, annuities count toward an interest's loss.
 */
export function builtInLoss(network: Network, entity: string, good: Good): number {
  switch (good.kind) {
    case 'asset': {
      const asset = findAssetByName(network, good.asset)
      return asset ? asset.basis - asset.fmv : 0
    }
    case 'partnership': {
      const ledger = getEntity(network, entity).partnerships[good.partner] ?? []
      return ledger.reduce((sum, pa) => sum + (pa.insideBasis - holdingFmv(network, pa)), 0)
    }
    case 'cash':
      return 0
  }
}

export function hasSubstantialBuiltInLoss(network: Network, entity: string, good: Good): boolean {
  return builtInLoss(network, entity, good) > SUBSTANTIAL_BUILT_IN_LOSS_THRESHOLD
}

export function shouldAdjustBasis(network: Network, tx: Transaction): Omit<BasisAdjustmentResult, 'adjustments'> {
  const involvesInterest = tx.goodFrom.kind === 'partnership' || tx.goodTo.kind === 'partnership'
  const electionTriggered = tx.section754Election && involvesInterest
  const lossTriggered =
    hasSubstantialBuiltInLoss(network, tx.entityFrom, tx.goodFrom) ||
    hasSubstantialBuiltInLoss(network, tx.entityTo, tx.goodTo)
  return {
    triggered: electionTriggered || lossTriggered,
    electionTriggered,
    lossTriggered,
  }
}

/**
 * Basis of a good as seen by the party handing it over: an asset's basis, the
 * face amount of cash, or the summed inside basis of a partnership interest.
 */
export function exchangedBasis(network: Network, holder: string, good: Good): number {
  switch (good.kind) {
    case 'asset': {
      const asset = findAssetByName(network, good.asset)
      return asset ? asset.basis : 0
    }
    case 'partnership': {
      const ledger = getEntity(network, holder).partnerships[good.partner] ?? []
      return ledger.reduce((sum, pa) => sum + pa.insideBasis, 0)
    }
    case 'cash':
      return good.amount
  }
}

// ── Upstream refresh ───────────────────────────────────────────

/**
 * Inside basis of `changed` moved at tier `name`: recompute each owner's
 * mirror as its share of the new figure and continue upward.
 */
export function refreshUpstreamBasis(
  network: Network,
  name: string,
  changed: readonly PartnershipAsset[],
  trail: readonly string[] = [name],
): void {
  if (changed.length === 0) return
  for (const edge of upstreamEdges(network, name)) {
    const next = enterTier(trail, edge.upstream)
    const ledger = getLedger(network, edge.upstream, name)
    const byKey = new Map(ledger.map((pa) => [pa.key, pa]))
    const touched: PartnershipAsset[] = []
    for (const pa of changed) {
      const mirror = byKey.get(refKey(mirrorRef(pa, name)))
      if (!mirror) continue
      mirror.insideBasis = scaleCents(pa.insideBasis, edge.share)
      touched.push(mirror)
    }
    refreshUpstreamBasis(network, edge.upstream, touched, next)
  }
}

// ── Adjustment ─────────────────────────────────────────────────

function adjustInterest(
  network: Network,
  holder: string,
  partner: string,
  targetBasis: number,
): BasisAdjustment[] {
  const ledger = getLedger(network, holder, partner)
  const adjustments: BasisAdjustment[] = []
  for (const pa of ledger) {
    const before = pa.insideBasis
    const delta = targetBasis - pa.insideBasis
    pa.insideBasis += delta
    pa.basisAdjustment = (pa.basisAdjustment ?? 0) + delta
    adjustments.push({ entity: holder, partner, assetId: pa.assetId, key: pa.key, before, after: pa.insideBasis })
  }
  refreshUpstreamBasis(network, holder, ledger)
  return adjustments
}

/**
 * Apply §743(b) adjustments for `tx` when triggered. Mutates `network`.
 * Both exchanged bases are read before either side is adjusted.
 */
export function maybeAdjustBasis(network: Network, tx: Transaction): BasisAdjustmentResult {
  const trigger = shouldAdjustBasis(network, tx)
  if (!trigger.triggered) return { ...trigger, adjustments: [] }

  const basisForFromSide = exchangedBasis(network, tx.entityTo, tx.goodTo)
  const basisForToSide = exchangedBasis(network, tx.entityFrom, tx.goodFrom)

  const adjustments: BasisAdjustment[] = []
  if (tx.goodFrom.kind === 'partnership') {
    adjustments.push(...adjustInterest(network, tx.entityFrom, tx.goodFrom.partner, basisForFromSide))
  }
  if (tx.goodTo.kind === 'partnership') {
    adjustments.push(...adjustInterest(network, tx.entityTo, tx.goodTo.partner, basisForToSide))
  }
  return { ...trigger, adjustments }
}
