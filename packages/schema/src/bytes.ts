import { hexToBytes } from '@chainforge/utils'
import { isHex } from 'viem'
import { z } from 'zod'

export type BytesInput = Uint8Array | `0x${string}`

interface BytesSchemaOptions {
  /** Exact length the decoded bytes must have */
  byteLength?: number
  errorMessage?: string
}

const isBytesInput = (val: unknown): val is BytesInput => {
  if (val instanceof Uint8Array) return true
  return typeof val === 'string' && isHex(val, { strict: true })
}

/**
 * Byte string schema. Accepts a Uint8Array or an even-length 0x-prefixed hex
 * string and outputs a fresh Uint8Array.
 */
export const zBytes = (options: BytesSchemaOptions = {}) => {
  const { byteLength, errorMessage } = options
  return z
    .custom<BytesInput>(isBytesInput, {
      message:
        errorMessage ?? 'Invalid input: must be Uint8Array or 0x-prefixed hex',
    })
    .transform((val, ctx) => {
      if (typeof val === 'string' && val.length % 2 !== 0) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: errorMessage ?? `odd-length hex string: ${val}`,
        })
        return z.NEVER
      }
      const bytes =
        typeof val === 'string' ? hexToBytes(val) : Uint8Array.from(val)
      if (byteLength !== undefined && bytes.length !== byteLength) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message:
            errorMessage ??
            `Expected ${byteLength} bytes, got ${bytes.length}`,
        })
        return z.NEVER
      }
      return bytes
    })
}

export const zBytes32 = (options: { errorMessage?: string } = {}) =>
  zBytes({ byteLength: 32, errorMessage: options.errorMessage })
