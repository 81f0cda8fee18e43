/**
 * Listing validator public surface.
 * createListingValidator() is the pure core; evaluate*() wrap it with logging and metrics.
 */
export { createListingValidator, type ListingValidator, type Verdict, type Authorization } from './validator'
export { defineValidatorConfig, loadValidatorConfig, type ValidatorConfig, type ConfigEnv } from './validatorConfig'
export { datumTag, outputReferenceData, serialiseOutputReference, tagDatum } from './datumTag'
export { matchOutputs } from './stages/match'
export { verifyPayouts, datumSatisfies, type TagRequirement } from './stages/payouts'
export { verifyMarketplaceOutput } from './stages/marketplace'
export { authorizeBuy, hasAuthorizerSignature, type PurchaseReceipt } from './stages/buy'
export { authorizeWithdraw, type OwnerConsent } from './stages/withdraw'
export { decodeEvaluation, EvaluationSchema, type EvaluationInput, type DecodeResult } from './decode/schema'
export { evaluate, evaluateJson, evaluateOrThrow, type EvaluationResult } from './host'
export { type Result } from './result'
