import { marketplaceFee, marketplaceFeeError, adaToLovelace } from '../src/fee'

describe('marketplace fee math', () => {
  const table: Array<{ sum: bigint; fee: bigint }> = [
    { sum: 4_900_000_000n, fee: 100_000_000n },
    { sum: 100n, fee: 2n }, // floor(floor(5000 / 49) / 50) = floor(102 / 50)
    { sum: 1_000_000n, fee: 20_408n },
    { sum: 149n, fee: 3n }, // dividing by 50 first would give 2
    { sum: 49n, fee: 1n },
    { sum: 48n, fee: 0n },
    { sum: 0n, fee: 0n },
  ]

  it('multiplies, then divides by 49, then by 50', () => {
    for (const row of table) {
      expect(marketplaceFee(row.sum)).toBe(row.fee)
    }
  })

  it('clamps negative sums to a zero fee', () => {
    expect(marketplaceFee(-5n)).toBe(0n)
  })

  it('stays within the documented error bound up to 100k ADA', () => {
    const sums = [adaToLovelace(100_000n), adaToLovelace(12_345n) + 678n, 99_999_999_999n, 1n]
    for (const sum of sums) {
      expect(marketplaceFeeError(sum) < 40_000n).toBe(true)
    }
    expect(marketplaceFee(adaToLovelace(100_000n))).toBe(2_040_816_326n)
  })
})
