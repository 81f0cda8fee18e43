/* Checks the leading output of a non-discounted purchase: it pays the marketplace
   fee address at least the computed fee and carries the listing tag.
*/

import { Address, TransactionOutput, addressEquals, datumEquals } from '@listing-escrow/dto'
import { Result, ok, reject } from '../result'
import { tagDatum } from '../datumTag'

export function verifyMarketplaceOutput(
  output: TransactionOutput,
  fee: bigint,
  tag: string,
  feeAddress: Address
): Result<void> {
  if (!addressEquals(output.address, feeAddress)) {
    return reject('FEE_ADDRESS_MISMATCH')
  }
  if (output.lovelace < fee) {
    return reject('FEE_AMOUNT_TOO_LOW', { expected: fee.toString(), got: output.lovelace.toString() })
  }
  if (!datumEquals(output.datum, tagDatum(tag))) {
    return reject('FEE_TAG_MISMATCH', { datum: output.datum.type })
  }
  return ok(undefined)
}
