/**
 * Ownership Transfer — moves an asset, partnership interest or cash between
 * entities and keeps every upstream ledger in step.
 *
 * Runs after basis adjustment and tax, which must see the pre-transfer
 * network. Mutates the network it is given; the engine hands it a copy.
 *
 * Upstream ledgers are matched by holding key (asset identity plus the path
 * it is held through), never by value, so two holdings with equal basis and
 * FMV are never confused.
 */

import type { Good, Holding, HoldingRef, Network, PartnershipAsset } from '../model/types'
import { NetworkError } from '../model/errors'
import {
  enterTier,
  findAssetByName,
  findEdge,
  getEntity,
  getLedger,
  directHolding,
  mirrorHolding,
  mirrorRef,
  refKey,
  upstreamEdges,
} from './graph'

// ── Upstream propagation ───────────────────────────────────────

/**
 * `name` now holds `holdings`: give every owner of `name` a mirror of each,
 * scaled by its share, and continue from each owner with those mirrors.
 */
export function propagateUpstreamAdd(
  network: Network,
  name: string,
  holdings: readonly Holding[],
  trail: readonly string[] = [name],
): void {
  if (holdings.length === 0) return
  for (const edge of upstreamEdges(network, name)) {
    const next = enterTier(trail, edge.upstream)
    const mirrors = holdings.map((h) => mirrorHolding(h, name, edge.share))
    getLedger(network, edge.upstream, name).push(...mirrors)
    propagateUpstreamAdd(network, edge.upstream, mirrors, next)
  }
}

/**
 * `name` no longer holds `refs`: delete their mirrors from every owner of
 * `name` and continue upward.
 */
export function propagateUpstreamRemove(
  network: Network,
  name: string,
  refs: readonly HoldingRef[],
  trail: readonly string[] = [name],
): void {
  if (refs.length === 0) return
  for (const edge of upstreamEdges(network, name)) {
    const next = enterTier(trail, edge.upstream)
    const mirrors = refs.map((r) => mirrorRef(r, name))
    const doomed = new Set(mirrors.map(refKey))
    const owner = getEntity(network, edge.upstream)
    owner.partnerships[name] = getLedger(network, edge.upstream, name).filter((pa) => !doomed.has(pa.key))
    propagateUpstreamRemove(network, edge.upstream, mirrors, next)
  }
}

// ── Transfers by kind ──────────────────────────────────────────

function transferAsset(network: Network, from: string, to: string, assetName: string): void {
  const asset = findAssetByName(network, assetName)
  if (!asset) {
    throw new NetworkError('UnknownAsset', `No asset named "${assetName}"`, { entity: from })
  }
  const giver = getEntity(network, from)
  const receiver = getEntity(network, to)

  // Gain is realized on the sale; the buyer takes a cost basis equal to FMV.
  asset.basis = asset.fmv

  receiver.directAssets.push(asset.id)
  propagateUpstreamAdd(network, to, [directHolding(asset)])

  giver.directAssets = giver.directAssets.filter((id) => id !== asset.id)
  propagateUpstreamRemove(network, from, [{ assetId: asset.id, path: [] }])
}

/** Combine two ledgers for the same partnership; shares and inside basis add per holding. */
function mergeLedgers(existing: PartnershipAsset[], incoming: PartnershipAsset[]): PartnershipAsset[] {
  const merged = existing.map((pa) => ({ ...pa, path: [...pa.path] }))
  const byKey = new Map(merged.map((pa) => [pa.key, pa]))
  for (const pa of incoming) {
    const match = byKey.get(pa.key)
    if (match) {
      match.share += pa.share
      match.insideBasis += pa.insideBasis
      if (pa.basisAdjustment !== undefined) {
        match.basisAdjustment = (match.basisAdjustment ?? 0) + pa.basisAdjustment
      }
    } else {
      const copy = { ...pa, path: [...pa.path] }
      merged.push(copy)
      byKey.set(copy.key, copy)
    }
  }
  return merged
}

function transferInterest(network: Network, from: string, to: string, partner: string): void {
  const edge = findEdge(network, from, partner)
  if (!edge) {
    throw new NetworkError('InsufficientGood', `${from} holds no interest in ${partner}`, {
      entity: from,
      good: { kind: 'partnership', partner },
    })
  }
  const giver = getEntity(network, from)
  const receiver = getEntity(network, to)
  const ledger = getLedger(network, from, partner)
  const existing = findEdge(network, to, partner)

  if (existing) {
    const previous = getLedger(network, to, partner)
    propagateUpstreamRemove(network, to, previous)
    existing.share += edge.share
    receiver.partnerships[partner] = mergeLedgers(previous, ledger)
  } else {
    network.partnerships.push({ upstream: to, downstream: partner, share: edge.share })
    receiver.partnerships[partner] = ledger.map((pa) => ({ ...pa, path: [...pa.path] }))
  }
  propagateUpstreamAdd(network, to, receiver.partnerships[partner] ?? [])

  propagateUpstreamRemove(network, from, ledger)
  delete giver.partnerships[partner]
  network.partnerships = network.partnerships.filter((e) => e !== edge)
}

function transferCash(network: Network, from: string, to: string, amount: number): void {
  getEntity(network, from).cashBalance -= amount
  getEntity(network, to).cashBalance += amount
}

/**
 * Move `good` from `from` to `to`, propagating additions and removals through
 * every upstream tier.
 */
export function adjustOwnership(network: Network, from: string, to: string, good: Good): void {
  switch (good.kind) {
    case 'asset':
      transferAsset(network, from, to, good.asset)
      return
    case 'partnership':
      transferInterest(network, from, to, good.partner)
      return
    case 'cash':
      transferCash(network, from, to, good.amount)
      return
  }
}
