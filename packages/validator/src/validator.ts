/* Listing validator entry point.

   check() branches on the requested action and returns the first reason a
   transaction is refused, or what authorized it. validate() is the external
   contract: a plain boolean where every rejection, including an unexpected fault
   while evaluating, is `false`.

   Both are pure; the only state is the frozen config injected at construction.
*/

import { ActionRequest, ListingTerms, TransactionContext } from '@listing-escrow/dto'
import { Result, ok, reject } from './result'
import { authorizeBuy } from './stages/buy'
import { authorizeWithdraw, OwnerConsent } from './stages/withdraw'
import { defineValidatorConfig, type ValidatorConfig } from './validatorConfig'

export type Authorization =
  | { action: 'Buy'; tag: string; discounted: boolean; payoutsSum: bigint; fee: bigint }
  | { action: 'WithdrawOrUpdate'; consent: OwnerConsent }

export type Verdict = Result<Authorization>

export interface ListingValidator {
  readonly config: ValidatorConfig
  check(datum: ListingTerms, redeemer: ActionRequest, context: TransactionContext): Verdict
  validate(datum: ListingTerms, redeemer: ActionRequest, context: TransactionContext): boolean
}

function assertNever(x: never): never {
  throw new Error(`unhandled action request: ${JSON.stringify(x)}`)
}

function dispatch(
  config: ValidatorConfig,
  datum: ListingTerms,
  redeemer: ActionRequest,
  context: TransactionContext
): Verdict {
  switch (redeemer.type) {
    case 'Buy': {
      const bought = authorizeBuy(datum, redeemer.payoutOutputsOffset, context, config)
      if (!bought.ok) return bought
      return ok<Authorization>({ action: 'Buy', ...bought.value })
    }
    case 'WithdrawOrUpdate': {
      const consent = authorizeWithdraw(datum.owner, context)
      if (!consent.ok) return consent
      return ok<Authorization>({ action: 'WithdrawOrUpdate', consent: consent.value })
    }
    default:
      return assertNever(redeemer)
  }
}

export function createListingValidator(config: ValidatorConfig): ListingValidator {
  const frozen = defineValidatorConfig(config)

  function check(datum: ListingTerms, redeemer: ActionRequest, context: TransactionContext): Verdict {
    try {
      return dispatch(frozen, datum, redeemer, context)
    } catch (e) {
      return reject('INTERNAL_ERROR', { message: e instanceof Error ? e.message : String(e) })
    }
  }

  return {
    config: frozen,
    check,
    validate: (datum, redeemer, context) => check(datum, redeemer, context).ok,
  }
}
