/* Locates the contiguous run of outputs a purchase must settle, starting at the
   offset the buyer supplies. The caller decides how many outputs are expected;
   nothing here looks at destinations or amounts.
*/

import { TransactionOutput } from '@listing-escrow/dto'
import { Result, ok, reject } from '../result'

export function matchOutputs(
  outputs: readonly TransactionOutput[],
  offset: number,
  expected: number
): Result<readonly TransactionOutput[]> {
  if (!Number.isSafeInteger(offset) || offset < 0 || offset > outputs.length) {
    return reject('STRUCTURE_OFFSET_OUT_OF_RANGE', { offset, outputs: outputs.length })
  }
  if (outputs.length - offset < expected) {
    return reject('STRUCTURE_INSUFFICIENT_OUTPUTS', { offset, expected, available: outputs.length - offset })
  }
  return ok(outputs.slice(offset, offset + expected))
}
