export const asciis = {
  _0: 48,
  _9: 57,
  _A: 65,
  _F: 70,
  _a: 97,
  _f: 102,
} as const

export const cachedHexes = Array.from({ length: 256 }, (_v, i) =>
  i.toString(16).padStart(2, '0'),
)

export const BIGINT_0 = BigInt(0)
export const BIGINT_1 = BigInt(1)
export const BIGINT_2 = BigInt(2)

/**
 * 2^256 - 1
 */
export const MAX_UINT256 = (BIGINT_1 << BigInt(256)) - BIGINT_1

/**
 * 2^64 - 1
 */
export const MAX_UINT64 = (BIGINT_1 << BigInt(64)) - BIGINT_1

/**
 * The order of the secp256k1 curve
 */
export const SECP256K1_ORDER =
  0xfffffffffffffffffffffffffffffffebaaedce6af48a03bbfd25e8cd0364141n

export const SECP256K1_ORDER_DIV_2 = SECP256K1_ORDER / BIGINT_2

export const ADDRESS_LENGTH = 20
