/**
 * Ownership Graph — lookups over the partnership edge set.
 *
 * Edges point from an owner (upstream) to the entity it owns a share of
 * (downstream). Each upstream entity keeps a ledger per downstream entity
 * holding one PartnershipAsset per holding the downstream entity can see.
 *
 * Every upward walk carries a trail of visited entities and fails with
 * CyclicOwnership on a repeat, so a corrupted graph cannot recurse forever.
 */

import type {
  Asset,
  Entity,
  Holding,
  HoldingRef,
  Network,
  PartnershipAsset,
  PartnershipEdge,
} from '../model/types'
import { NetworkError } from '../model/errors'
import { scaleCents } from '../model/traced'
import { TAX_EXEMPT_ASSET_TYPES } from './constants'

// ── Lookups ────────────────────────────────────────────────────

export function getEntity(network: Network, name: string): Entity {
  const entity = network.entities[name]
  if (!entity) {
    throw new NetworkError('UnknownEntity', `No entity named "${name}"`, { entity: name })
  }
  return entity
}

export function getAsset(network: Network, assetId: string): Asset {
  const asset = network.assets[assetId]
  if (!asset) {
    throw new NetworkError('UnknownAsset', `No asset with id "${assetId}"`)
  }
  return asset
}

export function findAssetByName(network: Network, name: string): Asset | undefined {
  return Object.values(network.assets).find((a) => a.name === name)
}

export function upstreamEdges(network: Network, name: string): PartnershipEdge[] {
  return network.partnerships.filter((e) => e.downstream === name)
}

export function downstreamEdges(network: Network, name: string): PartnershipEdge[] {
  return network.partnerships.filter((e) => e.upstream === name)
}

export function findEdge(
  network: Network,
  upstream: string,
  downstream: string,
): PartnershipEdge | undefined {
  return network.partnerships.find((e) => e.upstream === upstream && e.downstream === downstream)
}

/** Fraction of `name` owned by its partners; the rest is the entity's own share. */
export function upstreamShareSum(network: Network, name: string): number {
  return upstreamEdges(network, name).reduce((sum, e) => sum + e.share, 0)
}

// ── Holdings ───────────────────────────────────────────────────

export function holdingKey(assetId: string, path: readonly string[]): string {
  return [...path, assetId].join('␟')
}

export function directHolding(asset: Asset): Holding {
  return {
    key: holdingKey(asset.id, []),
    assetId: asset.id,
    path: [],
    share: 1,
    insideBasis: asset.basis,
  }
}

/** Direct assets first, then every ledger entry, in ledger insertion order. */
export function holdingsOf(network: Network, name: string): Holding[] {
  const entity = getEntity(network, name)
  const direct = entity.directAssets.map((id) => directHolding(getAsset(network, id)))
  const viaPartnerships = Object.values(entity.partnerships).flat()
  return [...direct, ...viaPartnerships]
}

/** The view an owner of `share` of `partner` has of one of `partner`'s holdings. */
export function mirrorHolding(holding: Holding, partner: string, share: number): PartnershipAsset {
  const path = [partner, ...holding.path]
  return {
    key: holdingKey(holding.assetId, path),
    assetId: holding.assetId,
    path,
    share: holding.share * share,
    insideBasis: scaleCents(holding.insideBasis, share),
  }
}

export function mirrorRef(ref: HoldingRef, partner: string): HoldingRef {
  return { assetId: ref.assetId, path: [partner, ...ref.path] }
}

export function refKey(ref: HoldingRef): string {
  return holdingKey(ref.assetId, ref.path)
}

export function holdingFmv(network: Network, holding: Holding): number {
  return scaleCents(getAsset(network, holding.assetId).fmv, holding.share)
}

export function isTaxExempt(network: Network, holding: Holding): boolean {
  return TAX_EXEMPT_ASSET_TYPES.has(getAsset(network, holding.assetId).type)
}

/** Ledger `upstream` keeps for `downstream`; missing ledgers mean the graph is out of sync. */
export function getLedger(network: Network, upstream: string, downstream: string): PartnershipAsset[] {
  const ledger = getEntity(network, upstream).partnerships[downstream]
  if (!ledger) {
    throw new NetworkError(
      'InconsistentLedger',
      `${upstream} owns part of ${downstream} but keeps no ledger for it`,
      { entity: upstream },
    )
  }
  return ledger
}

// ── Traversal ──────────────────────────────────────────────────

/** Extend an upward-walk trail, failing fast on a repeat visit. */
export function enterTier(trail: readonly string[], name: string): string[] {
  if (trail.includes(name)) {
    throw new NetworkError(
      'CyclicOwnership',
      `Ownership cycle detected: ${[...trail, name].join(' → ')}`,
      { entity: name },
    )
  }
  return [...trail, name]
}

/** True when `candidate` owns part of `name`, directly or through other entities. */
export function isUpstreamOf(network: Network, candidate: string, name: string): boolean {
  const seen = new Set<string>()
  const frontier = [name]
  while (frontier.length > 0) {
    const current = frontier.pop()
    if (current === undefined) break
    for (const edge of upstreamEdges(network, current)) {
      if (edge.upstream === candidate) return true
      if (!seen.has(edge.upstream)) {
        seen.add(edge.upstream)
        frontier.push(edge.upstream)
      }
    }
  }
  return false
}

/**
 * Entity names ordered so every entity comes after everything it owns.
 * Throws CyclicOwnership when the edge set is not a DAG.
 */
export function topologicalOrder(network: Network): string[] {
  const order: string[] = []
  const done = new Set<string>()

  const visit = (name: string, trail: readonly string[]): void => {
    if (done.has(name)) return
    const next = enterTier(trail, name)
    for (const edge of downstreamEdges(network, name)) {
      visit(edge.downstream, next)
    }
    done.add(name)
    order.push(name)
  }

  for (const name of Object.keys(network.entities)) {
    visit(name, [])
  }
  return order
}

/** Recompute every ledger from direct holdings, downstream tiers first. */
export function rebuildLedgers(network: Network): void {
  const order = topologicalOrder(network)
  for (const entity of Object.values(network.entities)) {
    entity.partnerships = {}
  }
  for (const name of order) {
    for (const edge of upstreamEdges(network, name)) {
      const owner = getEntity(network, edge.upstream)
      owner.partnerships[name] = holdingsOf(network, name).map((h) => mirrorHolding(h, name, edge.share))
    }
  }
}
