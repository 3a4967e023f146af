/**
 * A 0x-prefixed hex string
 */
export type PrefixedHexString = `0x${string}`

export type BigIntLike = bigint | PrefixedHexString | number | Uint8Array

export type BytesLike = Uint8Array | number[] | PrefixedHexString

/**
 * Hash capability injected into the codecs and signers (keccak256 by default)
 */
export type HashFn = (data: Uint8Array) => Uint8Array
