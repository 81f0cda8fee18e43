/* Host adapter around the pure validator.

   Everything observable happens here, after the verdict is decided: a structured
   log line, verdict/rejection counters and an evaluation timing. The verdict
   itself is exactly what ListingValidator.check returned.
*/

import { ReasonDetail } from '@listing-escrow/dto'
import { ReasonedRejection, reason } from '@listing-escrow/reasons'
import { ListingValidator, Verdict } from './validator'
import { EvaluationInput, decodeEvaluation } from './decode/schema'
import { logDecodeFailure, logVerdict } from './utils/logger'
import { countRejection, countVerdict, observeEvaluation } from './utils/metrics'

export type EvaluationResult =
  | { accepted: true; verdict: Verdict }
  | { accepted: false; reason: ReasonDetail }

export function evaluate(validator: ListingValidator, input: EvaluationInput): EvaluationResult {
  const started = performance.now()
  const verdict = validator.check(input.datum, input.redeemer, input.context)
  const duration_ms = performance.now() - started
  const action = input.redeemer.type

  observeEvaluation(action, duration_ms)
  countVerdict(action, verdict.ok)

  if (!verdict.ok) {
    countRejection(verdict.reason.category, verdict.reason.code)
    logVerdict({ listing: input.listing, action, accepted: false, reason_code: verdict.reason.code, duration_ms })
    return { accepted: false, reason: verdict.reason }
  }

  const auth = verdict.value
  logVerdict({
    listing: input.listing,
    action,
    accepted: true,
    discounted: auth.action === 'Buy' ? auth.discounted : undefined,
    fee: auth.action === 'Buy' ? auth.fee.toString() : undefined,
    duration_ms,
  })
  return { accepted: true, verdict }
}

export function evaluateJson(validator: ListingValidator, body: unknown): EvaluationResult {
  const decoded = decodeEvaluation(body)
  if (!decoded.valid) {
    logDecodeFailure(decoded.error)
    countRejection('DECODE', 'DECODE_INVALID_INPUT')
    return { accepted: false, reason: reason('DECODE_INVALID_INPUT', { context: { error: decoded.error.slice(0, 200) } }) }
  }
  return evaluate(validator, decoded.value)
}

/** Strict form for callers that prefer an exception to a flag. */
export function evaluateOrThrow(validator: ListingValidator, input: EvaluationInput): Verdict {
  const result = evaluate(validator, input)
  if (!result.accepted) {
    throw new ReasonedRejection(result.reason, `Rejecting ${input.redeemer.type}: ${result.reason.message}`)
  }
  return result.verdict
}
