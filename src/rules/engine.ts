/**
 * Network Engine
 *
 * The narrow surface an external search driver uses:
 *
 *   initializeNetwork(config)          → Network
 *   applyTransaction(network, tx)      → Result<TransactionOutcome, NetworkError>
 *   fitness(network)                   → total cash − total recorded tax
 *
 * applyTransaction never mutates its input. It works on a deep copy and only
 * hands that copy back when every step succeeded, so a rejected or failed
 * transaction leaves the caller's network untouched.
 *
 * Not synchronized: a driver evaluating sequences in parallel must give each
 * sequence its own Network.
 */

import type { Good, Network, NetworkConfig, Transaction } from '../model/types'
import { emptyNetwork } from '../model/types'
import type { NetworkConfigInput } from '../model/schemas'
import { networkConfigSchema } from '../model/schemas'
import type { Result } from '../model/errors'
import { NetworkError, err, isNetworkError, ok } from '../model/errors'
import { dollars } from '../model/traced'
import {
  findEdge,
  getEntity,
  holdingFmv,
  rebuildLedgers,
  topologicalOrder,
  upstreamShareSum,
} from './graph'
import type { BasisAdjustmentResult } from './basisAdjustment'
import { maybeAdjustBasis } from './basisAdjustment'
import type { TaxComputation } from './taxLiability'
import { computeTax } from './taxLiability'
import { adjustOwnership } from './ownershipTransfer'
import { checkTransaction } from './viability'

// ── Types ────────────────────────────────────────────────────────

export interface TransactionOutcome {
  network: Network
  basis: BasisAdjustmentResult
  /** Tax from `entityFrom` handing over `goodFrom`. */
  taxFrom: TaxComputation
  /** Tax from `entityTo` handing over `goodTo`. */
  taxTo: TaxComputation
}

// ── Initialization ───────────────────────────────────────────────

function parseConfig(input: NetworkConfigInput): NetworkConfig {
  const parsed = networkConfigSchema.safeParse(input)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const where = issue ? issue.path.join('.') : ''
    throw new NetworkError('InvalidInput', `Invalid network config at ${where}: ${issue?.message ?? 'unknown'}`)
  }
  return parsed.data
}

/**
 * Build a network from configuration: entities, then assets (ids assigned in
 * config order), then partnership edges, then every ledger.
 */
export function initializeNetwork(input: NetworkConfigInput): Network {
  const config = parseConfig(input)
  const network = emptyNetwork()

  for (const e of config.entities) {
    if (network.entities[e.name]) {
      throw new NetworkError('DuplicateEntity', `Entity "${e.name}" is defined twice`, { entity: e.name })
    }
    network.entities[e.name] = { name: e.name, cashBalance: e.cash, directAssets: [], partnerships: {} }
  }

  const assetNames = new Set<string>()
  config.assets.forEach((a, index) => {
    if (assetNames.has(a.name)) {
      throw new NetworkError('DuplicateAssetName', `Asset name "${a.name}" is already in use`, {
        entity: a.owner,
        good: { kind: 'asset', asset: a.name },
      })
    }
    assetNames.add(a.name)
    const owner = getEntity(network, a.owner)
    const id = `asset-${index + 1}`
    network.assets[id] = { id, name: a.name, type: a.type, basis: a.basis, fmv: a.fmv ?? a.basis }
    owner.directAssets.push(id)
  })

  for (const p of config.partnerships) {
    getEntity(network, p.upstream)
    getEntity(network, p.downstream)
    if (p.upstream === p.downstream) {
      throw new NetworkError('InvalidPartnership', `${p.upstream} cannot own a share of itself`, { entity: p.upstream })
    }
    if (findEdge(network, p.upstream, p.downstream)) {
      throw new NetworkError(
        'InvalidPartnership',
        `${p.upstream} already owns a share of ${p.downstream}`,
        { entity: p.upstream, good: { kind: 'partnership', partner: p.downstream } },
      )
    }
    network.partnerships.push({ upstream: p.upstream, downstream: p.downstream, share: p.share })
    if (upstreamShareSum(network, p.downstream) > 1 + 1e-9) {
      throw new NetworkError(
        'InvalidPartnership',
        `Partners of ${p.downstream} would own more than 100% of it`,
        { entity: p.downstream },
      )
    }
  }

  rebuildLedgers(network)
  return network
}

// ── Transactions ─────────────────────────────────────────────────

/**
 * Viability → basis adjustment → tax (both sides) → ownership transfer (both
 * sides). Tax and basis see the pre-transfer network.
 */
export function applyTransaction(network: Network, tx: Transaction): Result<TransactionOutcome, NetworkError> {
  const next = structuredClone(network)
  try {
    checkTransaction(next, tx)
    const basis = maybeAdjustBasis(next, tx)
    const taxFrom = computeTax(next, tx.entityFrom, tx.goodFrom)
    const taxTo = computeTax(next, tx.entityTo, tx.goodTo)
    adjustOwnership(next, tx.entityFrom, tx.entityTo, tx.goodFrom)
    adjustOwnership(next, tx.entityTo, tx.entityFrom, tx.goodTo)
    topologicalOrder(next)
    return ok({ network: next, basis, taxFrom, taxTo })
  } catch (e) {
    if (isNetworkError(e)) return err(e)
    throw e
  }
}

// ── Aggregates ───────────────────────────────────────────────────

export function totalCash(network: Network): number {
  return Object.values(network.entities).reduce((sum, e) => sum + e.cashBalance, 0)
}

export function totalTaxLiability(network: Network): number {
  return Object.values(network.taxRecords).reduce((sum, t) => sum + t, 0)
}

/** Optimization objective: aggregate cash minus aggregate recorded tax (cents). */
export function fitness(network: Network): number {
  return totalCash(network) - totalTaxLiability(network)
}

/**
 * FMV of everything every entity can see (direct assets plus every mirror)
 * plus all cash. Mirrors count value once per tier, so this is a
 * consistency measure, not a valuation.
 */
export function totalFmv(network: Network): number {
  let total = totalCash(network)
  for (const entity of Object.values(network.entities)) {
    for (const id of entity.directAssets) {
      const asset = network.assets[id]
      if (asset) total += asset.fmv
    }
    for (const ledger of Object.values(entity.partnerships)) {
      for (const pa of ledger) total += holdingFmv(network, pa)
    }
  }
  return total
}

// ── Descriptions ─────────────────────────────────────────────────

export function describeGood(good: Good): string {
  switch (good.kind) {
    case 'asset':
      return good.asset
    case 'partnership':
      return `interest in ${good.partner}`
    case 'cash':
      return `$${dollars(good.amount).toFixed(2)}`
  }
}

export function describeTransaction(tx: Transaction): string {
  const election = tx.section754Election ? ' (§754 election)' : ''
  return `${tx.entityFrom} gives ${describeGood(tx.goodFrom)} to ${tx.entityTo} for ${describeGood(tx.goodTo)}${election}`
}
