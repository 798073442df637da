/**
 * Transaction viability — every check runs before any mutation, so a
 * rejected transaction leaves the network exactly as it was.
 */

import type { Good, Network, Transaction } from '../model/types'
import { NetworkError } from '../model/errors'
import { findAssetByName, getEntity, isUpstreamOf } from './graph'

/** Throws unless `entity` actually holds `good`. */
export function checkViability(network: Network, entity: string, good: Good): void {
  const holder = getEntity(network, entity)

  switch (good.kind) {
    case 'asset': {
      const asset = findAssetByName(network, good.asset)
      if (!asset) {
        throw new NetworkError('UnknownAsset', `No asset named "${good.asset}"`, { entity, good })
      }
      if (!holder.directAssets.includes(asset.id)) {
        throw new NetworkError('InsufficientGood', `${entity} does not own asset ${good.asset}`, { entity, good })
      }
      return
    }
    case 'partnership': {
      getEntity(network, good.partner)
      if (!holder.partnerships[good.partner]) {
        throw new NetworkError(
          'InsufficientGood',
          `${entity} does not hold an interest in ${good.partner}`,
          { entity, good },
        )
      }
      return
    }
    case 'cash': {
      if (!Number.isFinite(good.amount) || good.amount < 0) {
        throw new NetworkError('InvalidTransaction', `Cash amount must be a non-negative number`, { entity, good })
      }
      if (holder.cashBalance < good.amount) {
        throw new NetworkError(
          'InsufficientGood',
          `${entity} does not have enough cash (${holder.cashBalance} < ${good.amount})`,
          { entity, good },
        )
      }
      return
    }
  }
}

/** An interest in `partner` may not land on `partner` itself or on anything it owns. */
function checkInterestDestination(network: Network, receiver: string, good: Good): void {
  if (good.kind !== 'partnership') return
  if (receiver === good.partner || isUpstreamOf(network, good.partner, receiver)) {
    throw new NetworkError(
      'CyclicOwnership',
      `${receiver} cannot take an interest in ${good.partner}: ${good.partner} already owns part of ${receiver}`,
      { entity: receiver, good },
    )
  }
}

export function checkTransaction(network: Network, tx: Transaction): void {
  if (tx.entityFrom === tx.entityTo) {
    throw new NetworkError('InvalidTransaction', `${tx.entityFrom} cannot transact with itself`, {
      entity: tx.entityFrom,
    })
  }
  checkViability(network, tx.entityFrom, tx.goodFrom)
  checkViability(network, tx.entityTo, tx.goodTo)

  if (
    tx.goodFrom.kind === 'partnership' &&
    tx.goodTo.kind === 'partnership' &&
    tx.goodFrom.partner === tx.goodTo.partner
  ) {
    throw new NetworkError(
      'InvalidTransaction',
      `Both sides exchange an interest in ${tx.goodFrom.partner}`,
      { entity: tx.entityFrom, good: tx.goodFrom },
    )
  }

  checkInterestDestination(network, tx.entityTo, tx.goodFrom)
  checkInterestDestination(network, tx.entityFrom, tx.goodTo)
}
