import {
  type Address,
  createAddressFromPublicKey,
  ErrorCode,
  SECP256K1_ORDER,
  SECP256K1_ORDER_DIV_2,
  SigningError,
} from '@chainforge/utils'
import { secp256k1 } from 'ethereum-cryptography/secp256k1.js'
import type { SignatureValues } from '../types'

/**
 * Checks a signature before it is attached to anything: `r` and `s` in
 * `[1, n-1]`, `s` in the lower half of the curve order, recovery id 0 or 1.
 */
export function assertSignatureValues(sig: SignatureValues): void {
  const fail = (reason: string) =>
    new SigningError(`Invalid signature: ${reason}`, {
      code: ErrorCode.InvalidSignature,
    })

  if (sig.r <= 0n || sig.r >= SECP256K1_ORDER) {
    throw fail('r is out of range')
  }
  if (sig.s <= 0n || sig.s >= SECP256K1_ORDER) {
    throw fail('s is out of range')
  }
  if (sig.s > SECP256K1_ORDER_DIV_2) {
    throw fail('s is not in the lower half of the curve order')
  }
  if (sig.recoveryId !== 0 && sig.recoveryId !== 1) {
    throw fail(`recovery id ${String(sig.recoveryId)} is not 0 or 1`)
  }
}

/**
 * Address whose key produced `sig` over `hash`
 */
export function recoverAddress(
  hash: Uint8Array,
  sig: SignatureValues,
): Address {
  assertSignatureValues(sig)
  try {
    const publicKey = new secp256k1.Signature(sig.r, sig.s)
      .addRecoveryBit(sig.recoveryId)
      .recoverPublicKey(hash)
      .toRawBytes(false)
    return createAddressFromPublicKey(publicKey)
  } catch (err) {
    throw new SigningError('Invalid signature: public key recovery failed', {
      code: ErrorCode.InvalidSignature,
      cause: err,
    })
  }
}
