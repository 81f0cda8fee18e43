/* Purchase authorization.

   Discounted (an authorizer co-signed): the payouts start at the offset and each
   must carry the listing tag; their total must be positive.

   Otherwise the fee output comes first, followed by the payouts. Payouts may
   go untagged here; the tag is required on the fee output. Keep this split
   between the two paths.
*/

import { ListingTerms, TransactionContext } from '@listing-escrow/dto'
import { marketplaceFee } from '@listing-escrow/math'
import { Result, ok, reject } from '../result'
import { datumTag } from '../datumTag'
import { matchOutputs } from './match'
import { verifyPayouts } from './payouts'
import { verifyMarketplaceOutput } from './marketplace'
import type { ValidatorConfig } from '../validatorConfig'

export interface PurchaseReceipt {
  tag: string
  discounted: boolean
  payoutsSum: bigint
  fee: bigint
}

export function hasAuthorizerSignature(config: ValidatorConfig, context: TransactionContext): boolean {
  return config.authorizers.some(a => context.extraSignatories.includes(a))
}

export function authorizeBuy(
  datum: ListingTerms,
  offset: number,
  context: TransactionContext,
  config: ValidatorConfig
): Result<PurchaseReceipt> {
  if (context.purpose.type !== 'Spend') {
    return reject('STRUCTURE_NOT_SPEND', { purpose: context.purpose.type })
  }
  const tag = datumTag(context.purpose.outputReference)
  const discounted = hasAuthorizerSignature(config, context)

  if (discounted) {
    const slice = matchOutputs(context.outputs, offset, datum.payouts.length)
    if (!slice.ok) return slice
    const verified = verifyPayouts(slice.value, datum.payouts, { type: 'Required', tag })
    if (!verified.ok) return verified
    if (verified.value <= 0n) return reject('PAYOUT_SUM_NOT_POSITIVE')
    return ok({ tag, discounted, payoutsSum: verified.value, fee: 0n })
  }

  const slice = matchOutputs(context.outputs, offset, datum.payouts.length + 1)
  if (!slice.ok) return slice
  const [feeOutput, ...payoutOutputs] = slice.value
  const verified = verifyPayouts(payoutOutputs, datum.payouts, { type: 'Untagged', tag })
  if (!verified.ok) return verified
  const fee = marketplaceFee(verified.value)
  const paid = verifyMarketplaceOutput(feeOutput, fee, tag, config.feeAddress)
  if (!paid.ok) return paid
  return ok({ tag, discounted, payoutsSum: verified.value, fee })
}
