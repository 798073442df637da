/**
 * Canonical network model — the single source of truth for a simulation run.
 *
 * The engine reads from and writes to this model. Everything here is plain
 * data so a whole network can be deep-copied with structuredClone.
 * Monetary values are in integer cents unless noted otherwise.
 */

// ── Assets ─────────────────────────────────────────────────────

export type AssetType = 'Material' | 'Annuity' | 'Security' | 'RealEstate' | 'Receivable'

/** Opaque, stable identity for an asset (e.g. "asset-3"). Names are display only. */
export type AssetId = string

export interface Asset {
  id: AssetId
  name: string           // globally unique display name
  type: AssetType
  basis: number          // cents; set to fmv when the asset changes hands
  fmv: number            // cents
}

/**
 * A fractional view of an Asset held through one or more partnership tiers.
 *
 * `path` lists the entities between the holder and the asset, starting with
 * the partnership the holder owns and ending with the asset's direct owner.
 * `share` is the product of the edge shares along that path.
 */
export interface PartnershipAsset {
  key: string
  assetId: AssetId
  path: string[]
  share: number
  insideBasis: number    // cents; tracked independently of asset.basis
  /** Cumulative §743(b) adjustment personal to this holder (cents). */
  basisAdjustment?: number
}

/**
 * Anything an entity can see: a direct asset (empty path, share 1, inside
 * basis equal to the asset's basis) or a PartnershipAsset.
 */
export type Holding = Pick<PartnershipAsset, 'key' | 'assetId' | 'path' | 'share' | 'insideBasis'>

/** Identity of a holding, enough to locate its mirrors upstream. */
export type HoldingRef = Pick<PartnershipAsset, 'assetId' | 'path'>

// ── Entities and partnerships ──────────────────────────────────

export interface Entity {
  name: string
  cashBalance: number                              // cents
  directAssets: AssetId[]
  /** Keyed by the name of the entity partnered with (the downstream entity). */
  partnerships: Record<string, PartnershipAsset[]>
}

/** `upstream` owns `share` of `downstream`. */
export interface PartnershipEdge {
  upstream: string
  downstream: string
  share: number
}

// ── Network ────────────────────────────────────────────────────

export interface Network {
  entities: Record<string, Entity>
  assets: Record<AssetId, Asset>
  partnerships: PartnershipEdge[]
  /** Cumulative liability per entity name (cents). Entries appear on first liability. */
  taxRecords: Record<string, number>
}

// ── Transactions ───────────────────────────────────────────────

export interface AssetGood {
  kind: 'asset'
  asset: string          // asset name
}

export interface PartnershipGood {
  kind: 'partnership'
  partner: string        // name of the entity the interest is in
}

export interface CashGood {
  kind: 'cash'
  amount: number         // cents
}

export type Good = AssetGood | PartnershipGood | CashGood

/** `entityFrom` gives `goodFrom` to `entityTo` and receives `goodTo` in exchange. */
export interface Transaction {
  entityFrom: string
  entityTo: string
  goodFrom: Good
  goodTo: Good
  section754Election: boolean
}

// ── Initialization config ──────────────────────────────────────

export interface EntityConfig {
  name: string
  cash: number
}

export interface AssetConfig {
  owner: string
  name: string
  type: AssetType
  basis: number
  fmv?: number           // defaults to basis
}

export interface PartnershipConfig {
  upstream: string
  downstream: string
  share: number
}

export interface NetworkConfig {
  entities: EntityConfig[]
  assets: AssetConfig[]
  partnerships: PartnershipConfig[]
}

/** A network with no entities, assets or partnerships. */
export function emptyNetwork(): Network {
  return {
    entities: {},
    assets: {},
    partnerships: [],
    taxRecords: {},
  }
}
