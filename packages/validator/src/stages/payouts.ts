/* Positional payout check: payout i is settled by output i of the matched slice,
   never by searching for a matching destination. One linear pass, bounded by the
   payout count.

   Returns the declared total of the verified payouts; the first mismatch rejects
   the whole purchase.
*/

import { OutputDatum, Payout, TransactionOutput, addressEquals, datumEquals } from '@listing-escrow/dto'
import { Result, ok, reject } from '../result'
import { tagDatum } from '../datumTag'

/**
 * Required: every payout output carries exactly this listing's tag.
 * Untagged: a payout output carries no datum or this listing's tag; anything else is
 * refused so an output tagged for another listing is never counted here.
 */
export type TagRequirement =
  | { type: 'Required'; tag: string }
  | { type: 'Untagged'; tag: string }

export function datumSatisfies(datum: OutputDatum, requirement: TagRequirement): boolean {
  const own = tagDatum(requirement.tag)
  switch (requirement.type) {
    case 'Required':
      return datumEquals(datum, own)
    case 'Untagged':
      return datum.type === 'NoDatum' || datumEquals(datum, own)
  }
}

export function verifyPayouts(
  outputs: readonly TransactionOutput[],
  payouts: readonly Payout[],
  requirement: TagRequirement
): Result<bigint> {
  if (outputs.length < payouts.length) {
    return reject('STRUCTURE_INSUFFICIENT_OUTPUTS', { expected: payouts.length, available: outputs.length })
  }

  let sum = 0n
  for (let i = 0; i < payouts.length; i++) {
    const payout = payouts[i]
    const output = outputs[i]
    if (!addressEquals(output.address, payout.address)) {
      return reject('PAYOUT_ADDRESS_MISMATCH', { index: i })
    }
    if (output.lovelace < payout.amountLovelace) {
      return reject('PAYOUT_AMOUNT_TOO_LOW', {
        index: i,
        expected: payout.amountLovelace.toString(),
        got: output.lovelace.toString(),
      })
    }
    if (!datumSatisfies(output.datum, requirement)) {
      return reject('PAYOUT_TAG_MISMATCH', { index: i, requirement: requirement.type, datum: output.datum.type })
    }
    sum += payout.amountLovelace
  }
  return ok(sum)
}
