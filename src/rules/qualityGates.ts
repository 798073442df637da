/**
 * Quality Gates — invariant checks over a whole network
 *
 * Enforces invariants at three levels:
 *   1. Graph gates:  the partnership edge set is a DAG, shares add up, and
 *                    every edge has a ledger (and only edges do)
 *   2. Ledger gates: each ledger mirrors exactly the downstream holdings,
 *                    with matching shares and reconciled inside basis
 *   3. Book gates:   assets have one direct owner, tax records are
 *                    non-negative, cash balances are not overdrawn
 *
 * Gate violations are collected (not thrown) so callers can surface all issues
 * at once rather than failing on the first one.
 */

import type { Network } from '../model/types'
import { isNetworkError } from '../model/errors'
import { holdingsOf, mirrorHolding, topologicalOrder, upstreamShareSum } from './graph'
import { RECONCILIATION_TOLERANCE } from './constants'

// ── Types ────────────────────────────────────────────────────────

export type GateSeverity = 'error' | 'warning'

export type GateCategory = 'graph' | 'ledger' | 'assets' | 'tax' | 'cash'

export interface GateViolation {
  gate: string
  category: GateCategory
  severity: GateSeverity
  message: string
  entity?: string
}

export interface GateResult {
  passed: boolean
  violations: GateViolation[]
}

const SHARE_EPSILON = 1e-9

function result(violations: GateViolation[]): GateResult {
  return { passed: violations.filter(v => v.severity === 'error').length === 0, violations }
}

// ── Graph gates ──────────────────────────────────────────────────

export function validateGraph(network: Network): GateResult {
  const violations: GateViolation[] = []

  try {
    topologicalOrder(network)
  } catch (e) {
    if (!isNetworkError(e)) throw e
    violations.push({
      gate: 'graph.acyclic',
      category: 'graph',
      severity: 'error',
      message: e.reason,
      entity: e.entity,
    })
  }

  for (const name of Object.keys(network.entities)) {
    const sum = upstreamShareSum(network, name)
    if (sum > 1 + SHARE_EPSILON) {
      violations.push({
        gate: 'graph.share-sum',
        category: 'graph',
        severity: 'error',
        message: `Partners own ${(sum * 100).toFixed(2)}% of ${name}`,
        entity: name,
      })
    }
  }

  for (const edge of network.partnerships) {
    const owner = network.entities[edge.upstream]
    if (!owner || !network.entities[edge.downstream]) {
      violations.push({
        gate: 'graph.unknown-entity',
        category: 'graph',
        severity: 'error',
        message: `Edge ${edge.upstream} → ${edge.downstream} references a missing entity`,
        entity: edge.upstream,
      })
      continue
    }
    if (!owner.partnerships[edge.downstream]) {
      violations.push({
        gate: 'graph.ledger-parity',
        category: 'graph',
        severity: 'error',
        message: `${edge.upstream} owns part of ${edge.downstream} but keeps no ledger for it`,
        entity: edge.upstream,
      })
    }
  }

  for (const entity of Object.values(network.entities)) {
    for (const partner of Object.keys(entity.partnerships)) {
      if (!network.partnerships.some(e => e.upstream === entity.name && e.downstream === partner)) {
        violations.push({
          gate: 'graph.ledger-parity',
          category: 'graph',
          severity: 'error',
          message: `${entity.name} keeps a ledger for ${partner} without owning any of it`,
          entity: entity.name,
        })
      }
    }
  }

  return result(violations)
}

// ── Ledger gates ─────────────────────────────────────────────────

/**
 * Each ledger must hold one mirror per downstream holding, keyed the same,
 * with share = holding share × edge share and inside basis equal to the
 * scaled downstream figure plus any §743(b) adjustment recorded at this tier.
 */
export function validateLedgers(network: Network): GateResult {
  const violations: GateViolation[] = []

  for (const edge of network.partnerships) {
    const ledger = network.entities[edge.upstream]?.partnerships[edge.downstream]
    if (!ledger || !network.entities[edge.downstream]) continue

    const expected = holdingsOf(network, edge.downstream).map(h => mirrorHolding(h, edge.downstream, edge.share))
    const actual = new Map(ledger.map(pa => [pa.key, pa]))

    if (actual.size !== ledger.length) {
      violations.push({
        gate: 'ledger.duplicate',
        category: 'ledger',
        severity: 'error',
        message: `${edge.upstream}'s ledger for ${edge.downstream} repeats a holding`,
        entity: edge.upstream,
      })
    }

    for (const want of expected) {
      const have = actual.get(want.key)
      if (!have) {
        violations.push({
          gate: 'ledger.complete',
          category: 'ledger',
          severity: 'error',
          message: `${edge.upstream} is missing ${want.assetId} held through ${want.path.join(' → ')}`,
          entity: edge.upstream,
        })
        continue
      }
      actual.delete(want.key)
      if (Math.abs(have.share - want.share) > SHARE_EPSILON) {
        violations.push({
          gate: 'ledger.share',
          category: 'ledger',
          severity: 'error',
          message: `${edge.upstream} holds ${have.share} of ${want.assetId}, expected ${want.share}`,
          entity: edge.upstream,
        })
      }
      const implied = want.insideBasis + (have.basisAdjustment ?? 0)
      if (Math.abs(have.insideBasis - implied) > RECONCILIATION_TOLERANCE) {
        violations.push({
          gate: 'ledger.inside-basis',
          category: 'ledger',
          severity: 'error',
          message: `${edge.upstream} carries inside basis ${have.insideBasis} for ${want.assetId}, downstream implies ${implied}`,
          entity: edge.upstream,
        })
      }
    }

    for (const stale of actual.values()) {
      violations.push({
        gate: 'ledger.stale',
        category: 'ledger',
        severity: 'error',
        message: `${edge.upstream} still mirrors ${stale.assetId} through ${stale.path.join(' → ')}`,
        entity: edge.upstream,
      })
    }
  }

  return result(violations)
}

// ── Book gates ───────────────────────────────────────────────────

export function validateBooks(network: Network): GateResult {
  const violations: GateViolation[] = []

  const owners = new Map<string, string[]>()
  for (const entity of Object.values(network.entities)) {
    for (const id of entity.directAssets) {
      owners.set(id, [...(owners.get(id) ?? []), entity.name])
    }
  }
  for (const asset of Object.values(network.assets)) {
    const held = owners.get(asset.id) ?? []
    if (held.length !== 1) {
      violations.push({
        gate: 'assets.single-owner',
        category: 'assets',
        severity: 'error',
        message: `Asset ${asset.name} has ${held.length} direct owners${held.length ? ` (${held.join(', ')})` : ''}`,
      })
    }
  }

  for (const [name, amount] of Object.entries(network.taxRecords)) {
    if (amount < 0) {
      violations.push({
        gate: 'tax.non-negative',
        category: 'tax',
        severity: 'error',
        message: `${name} has negative recorded tax ${amount}`,
        entity: name,
      })
    }
  }

  for (const entity of Object.values(network.entities)) {
    if (entity.cashBalance < 0) {
      violations.push({
        gate: 'cash.negative',
        category: 'cash',
        severity: 'warning',
        message: `${entity.name} is overdrawn (${entity.cashBalance})`,
        entity: entity.name,
      })
    }
  }

  return result(violations)
}

// ── Convenience: run all gates ───────────────────────────────────

export function validateNetwork(network: Network): GateResult {
  const graph = validateGraph(network)
  // Ledger checks walk holdings, which assumes the graph itself is sound.
  const ledgers = graph.passed ? validateLedgers(network) : result([])
  const books = validateBooks(network)
  return result([...graph.violations, ...ledgers.violations, ...books.violations])
}
