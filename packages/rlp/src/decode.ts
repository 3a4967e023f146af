import { bytesToBigInt, DecodeError } from '@chainforge/utils'
import type { Decoded, Input, NestedUint8Array, RlpItem } from './types'
import { safeSlice, toBytes } from './utils'

export function decode(input: Input, stream?: false): RlpItem
export function decode(input: Input, stream: true): Decoded
export function decode(input: Input, stream = false): RlpItem | Decoded {
  if (Array.isArray(input)) {
    throw new DecodeError('invalid RLP: cannot decode a list input')
  }
  const inputBytes = toBytes(input)
  if (inputBytes.length === 0) {
    throw new DecodeError('invalid RLP: empty input')
  }

  const decoded = _decode(inputBytes)

  if (stream) {
    return {
      data: decoded.data,
      remainder: decoded.remainder.slice(),
    }
  }
  if (decoded.remainder.length !== 0) {
    throw new DecodeError('invalid RLP: remainder must be zero')
  }

  return decoded.data
}

function decodeLength(v: Uint8Array): number {
  if (v[0] === 0) {
    throw new DecodeError('invalid RLP: extra zeros')
  }
  const length = bytesToBigInt(v)
  if (length > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw new DecodeError('invalid RLP: length exceeds safe integer range')
  }
  return Number(length)
}

function decodeListItems(payload: Uint8Array): NestedUint8Array {
  const items: NestedUint8Array = []
  let innerRemainder = payload
  while (innerRemainder.length) {
    const d = _decode(innerRemainder)
    items.push(d.data)
    innerRemainder = d.remainder
  }
  return items
}

function _decode(input: Uint8Array): Decoded {
  const firstByte = input[0]

  if (firstByte <= 0x7f) {
    return {
      data: input.slice(0, 1),
      remainder: input.subarray(1),
    }
  }

  if (firstByte <= 0xb7) {
    // short string, prefix included in `length`
    const length = firstByte - 0x7f
    const data =
      firstByte === 0x80 ? Uint8Array.from([]) : safeSlice(input, 1, length)

    if (length === 2 && data[0] < 0x80) {
      throw new DecodeError(
        'invalid RLP encoding: invalid prefix, single byte < 0x80 are not prefixed',
      )
    }

    return {
      data,
      remainder: input.subarray(length),
    }
  }

  if (firstByte <= 0xbf) {
    const lLength = firstByte - 0xb6
    if (input.length - 1 < lLength) {
      throw new DecodeError('invalid RLP: not enough bytes for string length')
    }
    const length = decodeLength(safeSlice(input, 1, lLength))
    if (length <= 55) {
      throw new DecodeError(
        'invalid RLP: expected string length to be greater than 55',
      )
    }
    const data = safeSlice(input, lLength, length + lLength)

    return {
      data,
      remainder: input.subarray(length + lLength),
    }
  }

  if (firstByte <= 0xf7) {
    const length = firstByte - 0xbf
    return {
      data: decodeListItems(safeSlice(input, 1, length)),
      remainder: input.subarray(length),
    }
  }

  const lLength = firstByte - 0xf6
  if (input.length - 1 < lLength) {
    throw new DecodeError('invalid RLP: not enough bytes for list length')
  }
  const length = decodeLength(safeSlice(input, 1, lLength))
  if (length < 56) {
    throw new DecodeError('invalid RLP: encoded list too short')
  }
  const totalLength = lLength + length
  if (totalLength > input.length) {
    throw new DecodeError('invalid RLP: total length is larger than the data')
  }

  return {
    data: decodeListItems(safeSlice(input, lLength, totalLength)),
    remainder: input.subarray(totalLength),
  }
}
