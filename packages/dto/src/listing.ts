import { Address, Credential } from './ledger'

export interface Payout {
  address: Address
  amountLovelace: bigint
}

/** Listing terms stored as the datum of the locked output. */
export interface ListingTerms {
  payouts: readonly Payout[]
  owner: Credential
}

export type ActionRequest =
  | { type: 'Buy'; payoutOutputsOffset: number }
  | { type: 'WithdrawOrUpdate' }
