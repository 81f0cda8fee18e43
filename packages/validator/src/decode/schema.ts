/* This file validates the JSON hand-off form of an evaluation request:
   the listing datum, the redeemer and the decoded transaction context.
   Hex is normalised to lowercase and lovelace amounts become bigint. */

import { z } from 'zod'
import { ActionRequest, ListingTerms, TransactionContext } from '@listing-escrow/dto'

const hex = z.string().regex(/^(?:[0-9a-fA-F]{2})*$/, 'expected even-length hex').transform(s => s.toLowerCase())
const hash28 = hex.refine(s => s.length === 56, 'expected a 28-byte hash')
const hash32 = hex.refine(s => s.length === 64, 'expected a 32-byte hash')

const lovelace = z
  .union([z.string().regex(/^\d+$/, 'expected a non-negative integer string'), z.number().int().nonnegative().safe()])
  .transform(v => BigInt(v))

export const CredentialSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('VerificationKey'), hash: hash28 }),
  z.object({ type: z.literal('Script'), hash: hash28 }),
])

export const AddressSchema = z.object({
  paymentCredential: CredentialSchema,
  stakeCredential: CredentialSchema.nullable().default(null),
})

export const OutputDatumSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('NoDatum') }),
  z.object({ type: z.literal('DatumHash'), hash: hash32 }),
  z.object({ type: z.literal('InlineDatum'), data: hex }),
])

export const TransactionOutputSchema = z.object({
  address: AddressSchema,
  lovelace,
  datum: OutputDatumSchema.default({ type: 'NoDatum' }),
})

export const OutputReferenceSchema = z.object({
  transactionId: hash32,
  outputIndex: z.number().int().nonnegative().safe(),
})

export const ScriptPurposeSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('Spend'), outputReference: OutputReferenceSchema }),
  z.object({ type: z.literal('Mint'), policyId: hash28 }),
  z.object({ type: z.literal('WithdrawFrom'), credential: CredentialSchema }),
  z.object({ type: z.literal('Publish'), index: z.number().int().nonnegative() }),
])

export const TransactionContextSchema = z.object({
  outputs: z.array(TransactionOutputSchema),
  extraSignatories: z.array(hash28).default([]),
  withdrawals: z.array(z.object({ credential: CredentialSchema, amount: lovelace })).default([]),
  purpose: ScriptPurposeSchema,
})

export const ListingTermsSchema = z.object({
  payouts: z.array(z.object({ address: AddressSchema, amountLovelace: lovelace })),
  owner: CredentialSchema,
})

export const ActionRequestSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('Buy'), payoutOutputsOffset: z.number().int() }),
  z.object({ type: z.literal('WithdrawOrUpdate') }),
])

export const EvaluationSchema = z.object({
  listing: z.string().optional(),
  datum: ListingTermsSchema,
  redeemer: ActionRequestSchema,
  context: TransactionContextSchema,
})

export interface EvaluationInput {
  listing?: string
  datum: ListingTerms
  redeemer: ActionRequest
  context: TransactionContext
}

export type DecodeResult = { valid: true; value: EvaluationInput } | { valid: false; error: string }

export function decodeEvaluation(body: unknown): DecodeResult {
  const res = EvaluationSchema.safeParse(body)
  if (!res.success) return { valid: false, error: res.error.message }
  const value: EvaluationInput = res.data
  return { valid: true, value }
}
