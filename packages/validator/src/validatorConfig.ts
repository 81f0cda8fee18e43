/**
 * validatorConfig.ts
 * The immutable deploy-time settings a listing validator is built with: the
 * authorizer key hashes and the marketplace fee address.
 */

import { z } from 'zod'
import { Address, Credential } from '@listing-escrow/dto'
import { ReasonedRejection, reason } from '@listing-escrow/reasons'

export interface ConfigEnv {
  AUTHORIZER_KEY_HASHES: string
  FEE_PAYMENT_CREDENTIAL: string
  FEE_STAKE_CREDENTIAL: string
}

export interface ValidatorConfig {
  readonly authorizers: readonly string[]
  readonly feeAddress: Address
}

const KeyHash = z.string().regex(/^[0-9a-fA-F]{56}$/, 'expected a 28-byte hex hash').transform(s => s.toLowerCase())

const CredentialSpec = z
  .string()
  .regex(/^(key|script):[0-9a-fA-F]{56}$/, 'expected key:<hex> or script:<hex>')
  .transform((s): Credential => {
    const [kind, hash] = s.split(':')
    return kind === 'key'
      ? { type: 'VerificationKey', hash: hash.toLowerCase() }
      : { type: 'Script', hash: hash.toLowerCase() }
  })

const ConfigEnvSchema = z.object({
  AUTHORIZER_KEY_HASHES: z
    .string()
    .transform(s => s.split(',').map(x => x.trim()).filter(Boolean))
    .pipe(z.array(KeyHash)),
  FEE_PAYMENT_CREDENTIAL: CredentialSpec,
  FEE_STAKE_CREDENTIAL: z
    .string()
    .transform(s => s.trim())
    .pipe(z.union([z.literal(''), CredentialSpec]))
    .transform(c => (c === '' ? null : c)),
})

export function loadValidatorConfig(env: ConfigEnv): ValidatorConfig {
  const res = ConfigEnvSchema.safeParse(env)
  if (!res.success) {
    const issue = res.error.issues[0]
    throw new ReasonedRejection(
      reason('CONFIG_INVALID', { context: { field: issue.path.join('.'), issue: issue.message } }),
      `invalid validator configuration: ${issue.path.join('.')} ${issue.message}`
    )
  }
  return defineValidatorConfig({
    authorizers: res.data.AUTHORIZER_KEY_HASHES,
    feeAddress: { paymentCredential: res.data.FEE_PAYMENT_CREDENTIAL, stakeCredential: res.data.FEE_STAKE_CREDENTIAL },
  })
}

/** Freezes a config so it stays immutable for the lifetime of a validator instance. */
export function defineValidatorConfig(config: ValidatorConfig): ValidatorConfig {
  return Object.freeze({
    authorizers: Object.freeze([...config.authorizers]),
    feeAddress: Object.freeze({
      paymentCredential: Object.freeze({ ...config.feeAddress.paymentCredential }),
      stakeCredential: config.feeAddress.stakeCredential ? Object.freeze({ ...config.feeAddress.stakeCredential }) : null,
    }),
  })
}
