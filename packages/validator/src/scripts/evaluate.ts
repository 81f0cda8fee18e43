/* Evaluates one JSON evaluation request (`{ datum, redeemer, context }`) against a
   validator built from the environment, e.g.

     AUTHORIZER_KEY_HASHES=... FEE_PAYMENT_CREDENTIAL=script:... tsx src/scripts/evaluate.ts request.json

   Prints ACCEPT or `REJECT <code>` and exits 0 or 1. */

import fs from 'fs'
import { ENV } from '../config'
import { loadValidatorConfig } from '../validatorConfig'
import { createListingValidator, type ListingValidator } from '../validator'
import { evaluateJson } from '../host'
import { logDecodeFailure } from '../utils/logger'
import { ReasonedRejection } from '@listing-escrow/reasons'

function readRequest(file: string): { ok: true; body: unknown } | { ok: false; error: string } {
  try {
    const body: unknown = JSON.parse(fs.readFileSync(file, 'utf8'))
    return { ok: true, body }
  } catch (e) {
    return { ok: false, error: e instanceof Error ? e.message : String(e) }
  }
}

export function runEvaluate(argv: string[]): number {
  const file = argv[0]
  if (!file) {
    console.error('usage: evaluate <request.json>')
    return 2
  }
  let validator: ListingValidator
  try {
    validator = createListingValidator(loadValidatorConfig(ENV))
  } catch (e) {
    if (!(e instanceof ReasonedRejection)) throw e
    console.log(`REJECT ${e.reason.code}`)
    return 1
  }
  const request = readRequest(file)
  if (!request.ok) {
    logDecodeFailure(request.error)
    console.log('REJECT DECODE_INVALID_INPUT')
    return 1
  }
  const result = evaluateJson(validator, request.body)
  if (result.accepted) {
    console.log('ACCEPT')
    return 0
  }
  console.log(`REJECT ${result.reason.code}`)
  return 1
}

if (require.main === module) {
  process.exitCode = runEvaluate(process.argv.slice(2))
}
