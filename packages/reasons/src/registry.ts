/**
 * Reasons Registry
 * Centralizes every machine-parsable rejection code for the listing validator.
 */
import { RejectionCode, ReasonDetail, REASONS as DTO_REASONS } from '@listing-escrow/dto'

export const REASONS: Record<RejectionCode, ReasonDetail> = DTO_REASONS

export function getReason(code: RejectionCode): ReasonDetail { return DTO_REASONS[code] }

export type { ReasonDetail }
