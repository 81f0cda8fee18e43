import { ReasonDetail, RejectionCode } from '@listing-escrow/dto'
import { reason } from '@listing-escrow/reasons'

/**
 * Outcome of a stage. A mismatch is a value, never a throw; the entry point
 * collapses any `ok: false` to a rejected transaction.
 */
export type Result<T> = { ok: true; value: T } | { ok: false; reason: ReasonDetail }

export type ReasonContext = Record<string, string | number | boolean>

export function ok<T>(value: T): Result<T> {
  return { ok: true, value }
}

export function reject(code: RejectionCode, context?: ReasonContext): Result<never> {
  return { ok: false, reason: reason(code, context ? { context } : undefined) }
}
