import {
  bigIntToUnpaddedBytes,
  DecodeError,
  EncodeError,
  hexToBytes,
  padToEven,
  stripHexPrefix,
  utf8ToBytes,
} from '@chainforge/utils'
import type { Input } from './types'

export function toBytes(v: Input): Uint8Array {
  if (v instanceof Uint8Array) {
    return v
  }
  if (typeof v === 'string') {
    if (v.startsWith('0x')) {
      return hexToBytes(padToEven(stripHexPrefix(v)))
    }
    return utf8ToBytes(v)
  }
  if (typeof v === 'number' || typeof v === 'bigint') {
    if (typeof v === 'number' && !Number.isSafeInteger(v)) {
      throw new EncodeError(`RLP: ${v} is not a safe integer`)
    }
    if (v < 0) {
      throw new EncodeError(`RLP: cannot encode negative integer ${v}`)
    }
    return bigIntToUnpaddedBytes(BigInt(v))
  }
  if (v === null || v === undefined) {
    return Uint8Array.from([])
  }
  throw new EncodeError(`RLP: received unsupported type ${typeof v}`)
}

export function safeSlice(
  input: Uint8Array,
  start: number,
  end: number,
): Uint8Array {
  if (end > input.length) {
    throw new DecodeError(
      `invalid RLP: need ${end} bytes but only ${input.length} available`,
    )
  }
  return input.slice(start, end)
}
