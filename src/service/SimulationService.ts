/**
 * SimulationService — stateful wrapper a search driver talks to.
 *
 * Holds one network, applies proposed transactions to it one at a time and
 * reports fitness. Extends EventEmitter so drivers can observe applied and
 * rejected transactions without polling.
 *
 * One instance per evaluation: the service is not safe to share between
 * concurrently running sequences.
 */

import { EventEmitter } from 'node:events'
import type { Network, Transaction } from '../model/types'
import type { NetworkConfigInput, TransactionInput } from '../model/schemas'
import { transactionSchema } from '../model/schemas'
import type { Result } from '../model/errors'
import { NetworkError, err, ok } from '../model/errors'
import type { TransactionOutcome } from '../rules/engine'
import { applyTransaction, describeTransaction, fitness, initializeNetwork } from '../rules/engine'
import type { GateViolation } from '../rules/qualityGates'
import { validateNetwork } from '../rules/qualityGates'
import type { SimulationConfig } from '../config'
import { loadConfig } from '../config'
import type { LogWriter } from '../utils/logger'
import { Logger } from '../utils/logger'

// ── Types ────────────────────────────────────────────────────────

export interface TransactionAppliedEvent {
  transaction: Transaction
  outcome: TransactionOutcome
  stateVersion: number
  fitness: number
}

export interface TransactionRejectedEvent {
  input: TransactionInput
  error: NetworkError
  stateVersion: number
}

export interface Rejection {
  index: number
  error: NetworkError
}

export interface SequenceResult {
  applied: number
  rejected: Rejection[]
  fitness: number
  /** True when stopOnError cut the sequence short. */
  halted: boolean
}

export interface SequenceOptions {
  stopOnError?: boolean
}

export interface SimulationServiceOptions {
  config?: SimulationConfig
  logger?: LogWriter
}

// ── Service ──────────────────────────────────────────────────────

export class SimulationService extends EventEmitter {
  network: Network
  stateVersion: number

  private readonly config: SimulationConfig
  private readonly log: LogWriter

  constructor(networkConfig: NetworkConfigInput, options: SimulationServiceOptions = {}) {
    super()
    this.config = options.config ?? loadConfig()
    this.log = (options.logger ?? new Logger(this.config.logLevel)).child({ component: 'simulation' })
    this.network = initializeNetwork(networkConfig)
    this.stateVersion = 0
    this.log.debug('network initialized', {
      entities: Object.keys(this.network.entities).length,
      assets: Object.keys(this.network.assets).length,
      partnerships: this.network.partnerships.length,
    })
  }

  get fitness(): number {
    return fitness(this.network)
  }

  // ── Core mutation helper ────────────────────────────────────────

  private reject(input: TransactionInput, error: NetworkError): Result<TransactionOutcome, NetworkError> {
    this.log.warn('transaction rejected', {
      kind: error.kind,
      reason: error.reason,
      entity: error.entity,
      stateVersion: this.stateVersion,
    })
    const event: TransactionRejectedEvent = { input, error, stateVersion: this.stateVersion }
    this.emit('transactionRejected', event)
    return err(error)
  }

  private gateFailure(violations: GateViolation[]): NetworkError {
    const errors = violations.filter((v) => v.severity === 'error')
    this.log.error('invariant gates failed', {
      gates: errors.map((v) => v.gate),
      stateVersion: this.stateVersion,
    })
    const first = errors[0]
    return new NetworkError(
      'InconsistentLedger',
      first ? `${first.gate}: ${first.message}` : 'invariant gates failed',
      { entity: first?.entity },
    )
  }

  /**
   * Validate and apply one transaction. On success the new network replaces
   * the current one; on failure nothing changes.
   */
  apply(input: TransactionInput): Result<TransactionOutcome, NetworkError> {
    const parsed = transactionSchema.safeParse(input)
    if (!parsed.success) {
      const issue = parsed.error.issues[0]
      return this.reject(
        input,
        new NetworkError('InvalidInput', `Invalid transaction at ${issue ? issue.path.join('.') : ''}: ${issue?.message ?? 'unknown'}`),
      )
    }
    const tx = parsed.data

    const applied = applyTransaction(this.network, tx)
    if (!applied.ok) return this.reject(input, applied.error)

    if (this.config.verifyInvariants) {
      const gates = validateNetwork(applied.value.network)
      if (!gates.passed) return this.reject(input, this.gateFailure(gates.violations))
    }

    this.network = applied.value.network
    this.stateVersion++
    const event: TransactionAppliedEvent = {
      transaction: tx,
      outcome: applied.value,
      stateVersion: this.stateVersion,
      fitness: this.fitness,
    }
    this.log.debug('transaction applied', {
      transaction: describeTransaction(tx),
      basisAdjusted: applied.value.basis.triggered,
      stateVersion: this.stateVersion,
      fitness: event.fitness,
    })
    this.emit('transactionApplied', event)
    return ok(applied.value)
  }

  /**
   * Apply transactions in order. Rejected transactions are recorded and
   * skipped unless `stopOnError` is set.
   */
  runSequence(inputs: readonly TransactionInput[], options: SequenceOptions = {}): SequenceResult {
    const rejected: Rejection[] = []
    let applied = 0
    let halted = false

    for (const [index, input] of inputs.entries()) {
      const outcome = this.apply(input)
      if (outcome.ok) {
        applied++
        continue
      }
      rejected.push({ index, error: outcome.error })
      if (options.stopOnError) {
        halted = index < inputs.length - 1
        break
      }
    }

    this.log.info('sequence evaluated', {
      applied,
      rejected: rejected.length,
      halted,
      fitness: this.fitness,
    })
    return { applied, rejected, fitness: this.fitness, halted }
  }
}

// ── One-shot evaluation ──────────────────────────────────────────

/**
 * Fresh network, one sequence, final fitness. What a search driver calls per
 * candidate; each call builds its own network, so calls are independent.
 */
export function evaluateSequence(
  networkConfig: NetworkConfigInput,
  inputs: readonly TransactionInput[],
  options: SequenceOptions & SimulationServiceOptions = {},
): SequenceResult {
  const service = new SimulationService(networkConfig, options)
  return service.runSequence(inputs, options)
}
