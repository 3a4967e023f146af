import { BIGINT_0, bytesToBigInt, MAX_UINT256 } from '@chainforge/utils'
import { isHex } from 'viem'
import { z } from 'zod'

export type BigIntInput = bigint | number | `0x${string}` | Uint8Array

interface BigIntSchemaOptions {
  /** Inclusive upper bound, defaults to 2^256 - 1 */
  max?: bigint
  errorMessage?: string
}

const isBigIntInput = (val: unknown): val is BigIntInput => {
  if (typeof val === 'bigint') return true
  if (typeof val === 'number') return Number.isSafeInteger(val)
  if (typeof val === 'string') return isHex(val, { strict: true })
  return val instanceof Uint8Array
}

const toBigInt = (val: BigIntInput): bigint => {
  if (typeof val === 'bigint') return val
  if (typeof val === 'number') return BigInt(val)
  if (typeof val === 'string') return val === '0x' ? BIGINT_0 : BigInt(val)
  return bytesToBigInt(val)
}

/**
 * Quantity schema. Accepts bigint, safe integers, 0x-prefixed hex (odd
 * length allowed) and big-endian bytes, and checks the result lies in
 * `[0, max]`.
 */
export const zBigInt = (options: BigIntSchemaOptions = {}) => {
  const { max = MAX_UINT256, errorMessage } = options
  return z
    .custom<BigIntInput>(isBigIntInput, {
      message:
        errorMessage ??
        'Invalid input: must be bigint, safe integer, hex string or Uint8Array',
    })
    .transform((val, ctx) => {
      const n = toBigInt(val)
      if (n < BIGINT_0) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: errorMessage ?? `value ${n} must not be negative`,
        })
        return z.NEVER
      }
      if (n > max) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: errorMessage ?? `value ${n} exceeds maximum ${max}`,
        })
        return z.NEVER
      }
      return n
    })
}
