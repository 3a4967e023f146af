import {
  Address,
  BIGINT_0,
  BIGINT_1,
  type BytesLike,
  bytesToBigInt,
  bytesToUtf8,
  DecodeError,
  toBytes,
} from '@chainforge/utils'
import { type ParameterSource, toAbiTypes } from './parser'
import type { AbiDecodedValue, AbiType } from './types'

const WORD = 32
const TWO_256 = BIGINT_1 << BigInt(256)

function readWord(data: Uint8Array, pos: number, what: string): Uint8Array {
  if (pos < 0 || pos + WORD > data.length) {
    throw new DecodeError(`insufficient data for ${what} at offset ${pos}`)
  }
  return data.subarray(pos, pos + WORD)
}

function toIndex(value: bigint, what: string): number {
  if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw new DecodeError(`${what} ${value} is too large`)
  }
  return Number(value)
}

function isZero(bytes: Uint8Array): boolean {
  return bytes.every((b) => b === 0)
}

function decodeValue(
  type: AbiType,
  data: Uint8Array,
  pos: number,
): AbiDecodedValue {
  switch (type.kind) {
    case 'address': {
      const word = readWord(data, pos, 'address')
      if (!isZero(word.subarray(0, 12))) {
        throw new DecodeError(`dirty padding in address at offset ${pos}`)
      }
      return new Address(word.slice(12)).toChecksumString()
    }
    case 'bool': {
      const value = bytesToBigInt(readWord(data, pos, 'bool'))
      if (value > BIGINT_1) {
        throw new DecodeError(`invalid bool value ${value} at offset ${pos}`)
      }
      return value === BIGINT_1
    }
    case 'uint': {
      const value = bytesToBigInt(readWord(data, pos, type.canonical))
      if (value >> BigInt(type.bits) !== BIGINT_0) {
        throw new DecodeError(
          `dirty padding in ${type.canonical} at offset ${pos}`,
        )
      }
      return value
    }
    case 'int': {
      const raw = bytesToBigInt(readWord(data, pos, type.canonical))
      const value = raw >= TWO_256 >> BIGINT_1 ? raw - TWO_256 : raw
      const limit = BIGINT_1 << BigInt(type.bits - 1)
      if (value < -limit || value >= limit) {
        throw new DecodeError(
          `dirty padding in ${type.canonical} at offset ${pos}`,
        )
      }
      return value
    }
    case 'fixedBytes': {
      const word = readWord(data, pos, type.canonical)
      if (!isZero(word.subarray(type.size))) {
        throw new DecodeError(
          `dirty padding in ${type.canonical} at offset ${pos}`,
        )
      }
      return word.slice(0, type.size)
    }
    case 'bytes':
    case 'string': {
      const length = toIndex(
        bytesToBigInt(readWord(data, pos, `${type.kind} length`)),
        `${type.kind} length`,
      )
      const start = pos + WORD
      if (start + length > data.length) {
        throw new DecodeError(
          `insufficient data for ${type.kind} at offset ${start}`,
        )
      }
      const content = data.slice(start, start + length)
      if (type.kind === 'bytes') return content
      try {
        return bytesToUtf8(content)
      } catch (err) {
        throw new DecodeError(`invalid UTF-8 in string at offset ${start}`, {
          cause: err,
        })
      }
    }
    case 'array': {
      if (type.length !== undefined) {
        assertFits(type.length, type.element, data.length - pos, pos)
        return decodeSequence(
          new Array<AbiType>(type.length).fill(type.element),
          data,
          pos,
        )
      }
      const length = toIndex(
        bytesToBigInt(readWord(data, pos, `${type.canonical} length`)),
        'array length',
      )
      const start = pos + WORD
      assertFits(length, type.element, data.length - start, pos)
      return decodeSequence(
        new Array<AbiType>(length).fill(type.element),
        data,
        start,
      )
    }
    case 'tuple':
      return decodeSequence(
        type.components.map((c) => c.type),
        data,
        pos,
      )
  }
}

/** Every element takes at least one word of head space. */
function assertFits(
  length: number,
  element: AbiType,
  remaining: number,
  offset: number,
): void {
  const head = Math.max(element.staticSize, WORD)
  if (length * head > remaining) {
    throw new DecodeError(
      `array length ${length} exceeds remaining data at offset ${offset}`,
    )
  }
}

/**
 * Decodes a head-tail sequence starting at `base`. Dynamic heads hold
 * offsets relative to `base`.
 */
function decodeSequence(
  types: readonly AbiType[],
  data: Uint8Array,
  base: number,
): AbiDecodedValue[] {
  const values: AbiDecodedValue[] = []
  let cursor = base
  for (const type of types) {
    if (type.dynamic) {
      const offset = bytesToBigInt(readWord(data, cursor, 'offset'))
      const start = base + toIndex(offset, 'offset')
      if (start >= data.length) {
        throw new DecodeError(
          `offset ${offset} for ${type.canonical} points outside data of length ${data.length}`,
        )
      }
      values.push(decodeValue(type, data, start))
    } else {
      values.push(decodeValue(type, data, cursor))
    }
    cursor += type.staticSize
  }
  return values
}

/**
 * Decodes an ABI parameter block. The buffer must start at the first head
 * word; a leading selector is not stripped.
 */
export function decodeAbiParameters(
  params: readonly ParameterSource[],
  data: BytesLike,
): AbiDecodedValue[] {
  return decodeSequence(toAbiTypes(params), toBytes(data), 0)
}
