/**
 * ReasonedRejection Error
 * Wraps a ReasonDetail so strict callers get a deterministic rejection shape.
 * On construction, emits a single console.warn for observability.
 */
import { ReasonDetail } from '@listing-escrow/dto'

export class ReasonedRejection extends Error {
  public readonly reason: ReasonDetail
  public readonly terminalState = 'REJECTED' as const

  constructor(reason: ReasonDetail, human?: string) {
    super(human || reason.message)
    this.name = 'ReasonedRejection'
    this.reason = reason
    const contextKeys = Object.keys(reason.context || {})
    // eslint-disable-next-line no-console
    console.warn('[reason.created]', {
      event: 'reason.created',
      code: reason.code,
      category: reason.category,
      contextKeys,
      message: human || reason.message,
    })
  }
}
