/**
 * Partnership Tax Constants
 *
 * All monetary amounts are in integer cents.
 *
 * Source: IRC §743(d) (substantial built-in loss), §754 (optional basis
 * adjustment election), §741 (sale of a partnership interest).
 */

import type { AssetType } from '../model/types'

// ── Helpers ────────────────────────────────────────────────────

/** Convert dollars to cents for readability in this file. */
function c(dollars: number): number {
  return Math.round(dollars * 100)
}

// ── Substantial built-in loss ──────────────────────────────────
// IRC §743(d)(1): a loss strictly greater than $250,000 mandates the
// §743(b) adjustment even without a §754 election.

export const SUBSTANTIAL_BUILT_IN_LOSS_THRESHOLD = c(250_000)

// ── Asset classes excluded from gain recognition ───────────────

export const TAX_EXEMPT_ASSET_TYPES: ReadonlySet<AssetType> = new Set<AssetType>(['Annuity'])

// ── Citations attached to traced values ────────────────────────

export const CITATIONS = {
  assetSale: 'IRC §1001',
  interestSale: 'IRC §741',
} as const

/** Tolerance (cents) when reconciling rounded inside basis across tiers. */
export const RECONCILIATION_TOLERANCE = 1
