/* Owner consent for cancelling or updating a listing.

   A key owner must sign. A script owner proves its logic ran by appearing in the
   withdrawal set; the withdrawn amount is irrelevant and may be zero.
*/

import { Credential, TransactionContext, credentialEquals } from '@listing-escrow/dto'
import { Result, ok, reject } from '../result'

export type OwnerConsent = 'signature' | 'withdrawal'

export function authorizeWithdraw(owner: Credential, context: TransactionContext): Result<OwnerConsent> {
  switch (owner.type) {
    case 'VerificationKey':
      if (context.extraSignatories.includes(owner.hash)) return ok<OwnerConsent>('signature')
      return reject('AUTH_SIGNATURE_MISSING', { owner: owner.hash })
    case 'Script':
      if (context.withdrawals.some(w => credentialEquals(w.credential, owner))) return ok<OwnerConsent>('withdrawal')
      return reject('AUTH_WITHDRAWAL_MISSING', { owner: owner.hash })
  }
}
