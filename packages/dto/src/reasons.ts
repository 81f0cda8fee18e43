import { RejectionCode, RejectionCategory, ReasonDetail } from './enums'

// Centralized mapping from RejectionCode -> ReasonDetail (stable code, category, message)
export const REASONS: Record<RejectionCode, ReasonDetail> = {
  // STRUCTURE
  STRUCTURE_NOT_SPEND: { code: 'STRUCTURE_NOT_SPEND', category: RejectionCategory.STRUCTURE, message: 'Buy requested outside a spend purpose' },
  STRUCTURE_OFFSET_OUT_OF_RANGE: { code: 'STRUCTURE_OFFSET_OUT_OF_RANGE', category: RejectionCategory.STRUCTURE, message: 'Payout offset out of range' },
  STRUCTURE_INSUFFICIENT_OUTPUTS: { code: 'STRUCTURE_INSUFFICIENT_OUTPUTS', category: RejectionCategory.STRUCTURE, message: 'Not enough outputs after offset' },

  // PAYOUT
  PAYOUT_ADDRESS_MISMATCH: { code: 'PAYOUT_ADDRESS_MISMATCH', category: RejectionCategory.PAYOUT, message: 'Payout output pays a different address' },
  PAYOUT_AMOUNT_TOO_LOW: { code: 'PAYOUT_AMOUNT_TOO_LOW', category: RejectionCategory.PAYOUT, message: 'Payout output pays less than declared' },
  PAYOUT_TAG_MISMATCH: { code: 'PAYOUT_TAG_MISMATCH', category: RejectionCategory.PAYOUT, message: 'Payout output datum does not carry the listing tag' },
  PAYOUT_SUM_NOT_POSITIVE: { code: 'PAYOUT_SUM_NOT_POSITIVE', category: RejectionCategory.PAYOUT, message: 'Verified payout sum must be positive' },

  // FEE
  FEE_ADDRESS_MISMATCH: { code: 'FEE_ADDRESS_MISMATCH', category: RejectionCategory.FEE, message: 'Fee output pays a different address' },
  FEE_AMOUNT_TOO_LOW: { code: 'FEE_AMOUNT_TOO_LOW', category: RejectionCategory.FEE, message: 'Fee output pays less than the marketplace fee' },
  FEE_TAG_MISMATCH: { code: 'FEE_TAG_MISMATCH', category: RejectionCategory.FEE, message: 'Fee output datum does not carry the listing tag' },

  // AUTHORIZATION
  AUTH_SIGNATURE_MISSING: { code: 'AUTH_SIGNATURE_MISSING', category: RejectionCategory.AUTHORIZATION, message: 'Owner key did not sign' },
  AUTH_WITHDRAWAL_MISSING: { code: 'AUTH_WITHDRAWAL_MISSING', category: RejectionCategory.AUTHORIZATION, message: 'Owner credential absent from withdrawals' },

  // DECODE
  DECODE_INVALID_INPUT: { code: 'DECODE_INVALID_INPUT', category: RejectionCategory.DECODE, message: 'Evaluation input failed schema validation' },

  // CONFIG
  CONFIG_INVALID: { code: 'CONFIG_INVALID', category: RejectionCategory.CONFIG, message: 'Validator configuration is invalid' },

  // INTERNAL
  INTERNAL_ERROR: { code: 'INTERNAL_ERROR', category: RejectionCategory.INTERNAL, message: 'Internal evaluation fault' },
}

export function getReason(code: RejectionCode): ReasonDetail {
  return REASONS[code]
}
