/**
 * TracedValue and ValueSource — provenance for every computed liability.
 *
 * A tax amount recorded against an entity carries the node that produced it
 * and the downstream nodes it was derived from, so a driver can walk an
 * attribution back to the sale that caused it.
 */

// ── Value sources ──────────────────────────────────────────────

/** A value produced by a deterministic computation node */
export interface ComputedSource {
  kind: 'computed'
  nodeId: string         // e.g., "tax.JonesCo"
  inputs: string[]       // node IDs this was derived from
  description?: string   // e.g., "Sale of Hotel (share 0.99)"
}

export type ValueSource = ComputedSource

// ── TracedValue ────────────────────────────────────────────────

/**
 * A monetary amount with provenance.
 * `amount` is always in integer cents to avoid floating-point drift.
 */
export interface TracedValue {
  amount: number          // integer cents (e.g., 10050 = $100.50)
  source: ValueSource
  irsCitation?: string    // e.g., "IRC §741"
}

// ── Helpers ────────────────────────────────────────────────────

/**
 * Convert a dollar amount to integer cents.
 *
 *   cents(100.10) → 10010
 *   cents(-50.5)  → -5050
 */
export function cents(dollars: number): number {
  return Math.round(dollars * 100)
}

/**
 * Convert integer cents back to dollars for display.
 *
 *   dollars(10010) → 100.10
 */
export function dollars(amountInCents: number): number {
  return amountInCents / 100
}

/**
 * Scale a cent amount by an ownership fraction, rounding to the nearest cent.
 * Normalizes -0 to 0 so results compare cleanly.
 */
export function scaleCents(amountInCents: number, fraction: number): number {
  const scaled = Math.round(amountInCents * fraction)
  return scaled === 0 ? 0 : scaled
}

export function tracedFromComputation(
  amount: number,
  nodeId: string,
  inputs: string[],
  irsCitation?: string,
  description?: string,
): TracedValue {
  return {
    amount,
    source: {
      kind: 'computed',
      nodeId,
      inputs,
      description,
    },
    irsCitation,
  }
}
