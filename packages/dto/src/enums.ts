export enum RejectionCategory {
  STRUCTURE = "STRUCTURE",
  PAYOUT = "PAYOUT",
  FEE = "FEE",
  AUTHORIZATION = "AUTHORIZATION",
  DECODE = "DECODE",
  CONFIG = "CONFIG",
  INTERNAL = "INTERNAL",
}

export type RejectionCode =
  | "STRUCTURE_NOT_SPEND"
  | "STRUCTURE_OFFSET_OUT_OF_RANGE"
  | "STRUCTURE_INSUFFICIENT_OUTPUTS"
  | "PAYOUT_ADDRESS_MISMATCH"
  | "PAYOUT_AMOUNT_TOO_LOW"
  | "PAYOUT_TAG_MISMATCH"
  | "PAYOUT_SUM_NOT_POSITIVE"
  | "FEE_ADDRESS_MISMATCH"
  | "FEE_AMOUNT_TOO_LOW"
  | "FEE_TAG_MISMATCH"
  | "AUTH_SIGNATURE_MISSING"
  | "AUTH_WITHDRAWAL_MISSING"
  | "DECODE_INVALID_INPUT"
  | "CONFIG_INVALID"
  | "INTERNAL_ERROR";

export interface ReasonDetail {
  code: RejectionCode;
  category: RejectionCategory;
  message: string;
  context?: Record<string, string | number | boolean>;
}
