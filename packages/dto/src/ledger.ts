/**
 * ledger.ts
 * Decoded ledger shapes the host hands to the validator. Hashes are lowercase hex.
 */

export type Credential =
  | { type: 'VerificationKey'; hash: string }
  | { type: 'Script'; hash: string }

export interface Address {
  paymentCredential: Credential
  stakeCredential: Credential | null
}

export type OutputDatum =
  | { type: 'NoDatum' }
  | { type: 'DatumHash'; hash: string }
  | { type: 'InlineDatum'; data: string }

export interface TransactionOutput {
  address: Address
  lovelace: bigint
  datum: OutputDatum
}

export interface OutputReference {
  transactionId: string
  outputIndex: number
}

export type ScriptPurpose =
  | { type: 'Spend'; outputReference: OutputReference }
  | { type: 'Mint'; policyId: string }
  | { type: 'WithdrawFrom'; credential: Credential }
  | { type: 'Publish'; index: number }

export interface Withdrawal {
  credential: Credential
  amount: bigint
}

export interface TransactionContext {
  outputs: readonly TransactionOutput[]
  extraSignatories: readonly string[]
  withdrawals: readonly Withdrawal[]
  purpose: ScriptPurpose
}

export function credentialEquals(a: Credential, b: Credential): boolean {
  return a.type === b.type && a.hash === b.hash
}

export function addressEquals(a: Address, b: Address): boolean {
  if (!credentialEquals(a.paymentCredential, b.paymentCredential)) return false
  if (a.stakeCredential === null || b.stakeCredential === null) return a.stakeCredential === b.stakeCredential
  return credentialEquals(a.stakeCredential, b.stakeCredential)
}

export function datumEquals(a: OutputDatum, b: OutputDatum): boolean {
  switch (a.type) {
    case 'NoDatum':
      return b.type === 'NoDatum'
    case 'DatumHash':
      return b.type === 'DatumHash' && a.hash === b.hash
    case 'InlineDatum':
      return b.type === 'InlineDatum' && a.data === b.data
  }
}
