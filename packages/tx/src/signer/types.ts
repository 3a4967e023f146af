import type { SignatureValues } from '../types'

export interface SignOptions {
  signal?: AbortSignal
}

/**
 * Signing capability. Implementations may hold a key in process or forward
 * the hash to a hardware or remote signer; either way they resolve to a
 * secp256k1 signature over the 32-byte hash they were given.
 */
export interface Signer {
  sign(hash: Uint8Array, options?: SignOptions): Promise<SignatureValues>
}
