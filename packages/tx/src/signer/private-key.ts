import {
  type Address,
  type BytesLike,
  createAddressFromPublicKey,
  ErrorCode,
  SigningError,
  toBytes,
} from '@chainforge/utils'
import { secp256k1 } from 'ethereum-cryptography/secp256k1.js'
import type { SignatureValues } from '../types'
import type { Signer, SignOptions } from './types'

/**
 * In-process secp256k1 signer. Signatures are RFC 6979 deterministic and
 * low-s normalised, so the same key and hash always give the same bytes.
 */
export class PrivateKeySigner implements Signer {
  private readonly privateKey: Uint8Array
  readonly address: Address

  constructor(privateKey: BytesLike) {
    const key = toBytes(privateKey)
    if (key.length !== 32 || !secp256k1.utils.isValidPrivateKey(key)) {
      throw new SigningError(
        'Invalid private key: expected 32 bytes in [1, n-1]',
      )
    }
    this.privateKey = Uint8Array.from(key)
    this.address = createAddressFromPublicKey(
      secp256k1.getPublicKey(this.privateKey, false),
    )
  }

  async sign(
    hash: Uint8Array,
    options: SignOptions = {},
  ): Promise<SignatureValues> {
    if (options.signal?.aborted === true) {
      throw new SigningError('Signing aborted', { code: ErrorCode.SignerAborted })
    }
    if (hash.length !== 32) {
      throw new SigningError(`Expected a 32-byte hash, got ${hash.length} bytes`)
    }
    const sig = secp256k1.sign(hash, this.privateKey)
    if (sig.recovery !== 0 && sig.recovery !== 1) {
      throw new SigningError(`Unexpected recovery id ${sig.recovery}`, {
        code: ErrorCode.InvalidSignature,
      })
    }
    return { r: sig.r, s: sig.s, recoveryId: sig.recovery }
  }
}
