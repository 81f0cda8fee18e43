/**
 * reason() factory
 * Merges a base registry entry with optional overrides.
 * Defaults come from REASONS; overrides can change `message` and add `context`.
 * Adding new codes: extend REASONS in the dto package. Keep codes stable once published; off-chain builders match on them.
 */
import { ReasonDetail, RejectionCode } from '@listing-escrow/dto'
import { REASONS } from './registry'

export type ReasonOverrides = Partial<Pick<ReasonDetail, 'message' | 'context'>>

export function reason(code: RejectionCode, overrides?: ReasonOverrides): ReasonDetail {
  const base = REASONS[code]
  const context = { ...(base.context || {}), ...(overrides?.context || {}) }
  return {
    ...base,
    message: overrides?.message ?? base.message,
    context: Object.keys(context).length ? context : undefined,
  }
}
