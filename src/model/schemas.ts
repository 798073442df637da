/**
 * Zod runtime validation schemas — mirrors the TypeScript types in types.ts.
 *
 * These validate the records an external driver hands to the engine: the
 * network configuration and each proposed transaction. They complement (but
 * do not replace) the TypeScript types.
 *
 * Conventions:
 *  - Monetary amounts are in integer cents.
 *  - Shares are fractions in (0, 1].
 *  - Entity and asset names are non-empty strings.
 */

import { z } from 'zod'

// ── Reusable validators ──────────────────────────────────────────

const nameSchema = z.string().trim().min(1, 'Name must not be empty')

/** Non-negative integer (cents). */
const centsNonNeg = z.number().int().min(0, 'Amount must be non-negative')

/** Ownership fraction: greater than 0, at most 1. */
const shareSchema = z
  .number()
  .gt(0, 'Share must be greater than 0')
  .max(1, 'Share must be at most 1')

const assetTypeSchema = z.enum(['Material', 'Annuity', 'Security', 'RealEstate', 'Receivable'])

// ── Network configuration ────────────────────────────────────────

const entityConfigSchema = z.object({
  name: nameSchema,
  cash: centsNonNeg,
})

const assetConfigSchema = z.object({
  owner: nameSchema,
  name: nameSchema,
  type: assetTypeSchema,
  basis: centsNonNeg,
  fmv: centsNonNeg.optional(),
})

const partnershipConfigSchema = z.object({
  upstream: nameSchema,
  downstream: nameSchema,
  share: shareSchema,
})

export const networkConfigSchema = z.object({
  entities: z.array(entityConfigSchema),
  assets: z.array(assetConfigSchema).default([]),
  partnerships: z.array(partnershipConfigSchema).default([]),
})

// ── Transactions ─────────────────────────────────────────────────

const goodSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('asset'), asset: nameSchema }),
  z.object({ kind: z.literal('partnership'), partner: nameSchema }),
  z.object({ kind: z.literal('cash'), amount: centsNonNeg }),
])

export const transactionSchema = z.object({
  entityFrom: nameSchema,
  entityTo: nameSchema,
  goodFrom: goodSchema,
  goodTo: goodSchema,
  section754Election: z.boolean().default(false),
})

/** Shape accepted before defaults are applied (election may be omitted). */
export type TransactionInput = z.input<typeof transactionSchema>
export type NetworkConfigInput = z.input<typeof networkConfigSchema>

// ── Export sub-schemas for testing ────────────────────────────────

export {
  nameSchema,
  shareSchema,
  assetTypeSchema,
  entityConfigSchema,
  assetConfigSchema,
  partnershipConfigSchema,
  goodSchema,
}
