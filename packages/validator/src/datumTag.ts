/* Anti-replay tag for a listing purchase.

   The tag is blake2b-256 over the Plutus-data CBOR of the spent output reference,
   `Constr 0 [Constr 0 [transactionId], outputIndex]`. Each payout output tied to this
   listing carries it as an inline datum, so one output cannot settle two listings
   spent in the same transaction.
*/

import { blake2b } from '@noble/hashes/blake2b'
import { bytesToHex, hexToBytes } from '@noble/hashes/utils'
import { DataB, DataConstr, DataI, dataToCbor } from '@harmoniclabs/plutus-data'
import { OutputDatum, OutputReference } from '@listing-escrow/dto'

export function outputReferenceData(ref: OutputReference): DataConstr {
  if (!Number.isSafeInteger(ref.outputIndex) || ref.outputIndex < 0) {
    throw new RangeError(`output index out of range: ${ref.outputIndex}`)
  }
  return new DataConstr(0, [
    new DataConstr(0, [new DataB(hexToBytes(ref.transactionId))]),
    new DataI(ref.outputIndex),
  ])
}

export function serialiseOutputReference(ref: OutputReference): Uint8Array {
  return dataToCbor(outputReferenceData(ref)).toBuffer()
}

export function datumTag(ref: OutputReference): string {
  return bytesToHex(blake2b(serialiseOutputReference(ref), { dkLen: 32 }))
}

export function tagDatum(tag: string): OutputDatum {
  return { type: 'InlineDatum', data: tag }
}
