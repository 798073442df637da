/**
 * Typed failures surfaced by initialization and transaction processing.
 *
 * Transaction failures are returned as a Result rather than thrown, so a
 * search driver can log the rejection and keep going.
 */

import type { Good } from './types'

export type NetworkErrorKind =
  | 'InsufficientGood'
  | 'DuplicateAssetName'
  | 'DuplicateEntity'
  | 'CyclicOwnership'
  | 'UnknownEntity'
  | 'UnknownAsset'
  | 'InvalidPartnership'
  | 'InvalidTransaction'
  | 'InconsistentLedger'
  | 'InvalidInput'

export interface NetworkErrorDetails {
  entity?: string
  good?: Good
}

export class NetworkError extends Error {
  readonly kind: NetworkErrorKind
  readonly entity?: string
  readonly good?: Good
  readonly reason: string

  constructor(kind: NetworkErrorKind, reason: string, details: NetworkErrorDetails = {}) {
    super(`${kind}: ${reason}`)
    this.name = 'NetworkError'
    this.kind = kind
    this.reason = reason
    this.entity = details.entity
    this.good = details.good
  }
}

export function isNetworkError(err: unknown): err is NetworkError {
  return err instanceof NetworkError
}

// ── Result ─────────────────────────────────────────────────────

export type Result<T, E> =
  | { ok: true; value: T }
  | { ok: false; error: E }

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value }
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error }
}
