/**
 * fee.ts
 * Marketplace fee accounting; pure functions only (no I/O, no side-effects).
 */

const FEE_NUMERATOR = 50n
const FEE_DENOMINATOR = 49n
const FEE_DIVISOR = 50n

export const LOVELACE_PER_ADA = 1_000_000n

/**
 * marketplaceFee
 * fee = floor(floor(sum * 50 / 49) / 50), roughly sum / 49, i.e. 2% of the post-fee total.
 * The truncation order is part of the contract: reordering the divisions changes which fee outputs pass.
 */
export function marketplaceFee(payoutsSum: bigint): bigint {
  const sum = payoutsSum < 0n ? 0n : payoutsSum
  return (sum * FEE_NUMERATOR) / FEE_DENOMINATOR / FEE_DIVISOR
}

/**
 * marketplaceFeeError
 * Distance in lovelace between the truncated fee and the exact rational sum / 49, floored.
 */
export function marketplaceFeeError(payoutsSum: bigint): bigint {
  const sum = payoutsSum < 0n ? 0n : payoutsSum
  const fee = marketplaceFee(sum)
  // exact - fee = (sum - 49 * fee) / 49
  return (sum - FEE_DENOMINATOR * fee) / FEE_DENOMINATOR
}

export function adaToLovelace(ada: bigint): bigint {
  return ada * LOVELACE_PER_ADA
}
