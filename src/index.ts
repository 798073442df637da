/**
 * Public surface for search drivers.
 */

export type {
  Asset,
  AssetId,
  AssetType,
  Entity,
  Good,
  Network,
  NetworkConfig,
  PartnershipAsset,
  PartnershipEdge,
  Transaction,
} from './model/types'
export type { NetworkErrorKind, Result } from './model/errors'
export { NetworkError, isNetworkError } from './model/errors'
export type { TracedValue } from './model/traced'
export { cents, dollars } from './model/traced'
export type { NetworkConfigInput, TransactionInput } from './model/schemas'
export { networkConfigSchema, transactionSchema } from './model/schemas'
export type { TransactionOutcome } from './rules/engine'
export {
  applyTransaction,
  describeTransaction,
  fitness,
  initializeNetwork,
  totalCash,
  totalFmv,
  totalTaxLiability,
} from './rules/engine'
export type { BasisAdjustment, BasisAdjustmentResult } from './rules/basisAdjustment'
export { maybeAdjustBasis } from './rules/basisAdjustment'
export type { TaxComputation } from './rules/taxLiability'
export { computeTax } from './rules/taxLiability'
export { adjustOwnership } from './rules/ownershipTransfer'
export type { GateResult, GateViolation } from './rules/qualityGates'
export { validateNetwork } from './rules/qualityGates'
export type { SequenceResult, SimulationServiceOptions } from './service/SimulationService'
export { SimulationService, evaluateSequence } from './service/SimulationService'
export type { SimulationConfig } from './config'
export { loadConfig } from './config'
export type { LogLevel, LogWriter } from './utils/logger'
export { Logger, logger } from './utils/logger'
