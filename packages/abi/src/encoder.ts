import {
  Address,
  BIGINT_0,
  BIGINT_1,
  bigIntToBytes,
  concatBytes,
  EncodeError,
  hexToBytes,
  isHexString,
  isValidAddress,
  setLengthLeft,
  setLengthRight,
  utf8ToBytes,
} from '@chainforge/utils'
import { type ParameterSource, toAbiTypes } from './parser'
import type {
  AbiInputValue,
  AbiType,
  IntType,
  TupleType,
  UintType,
} from './types'

const WORD = 32
const TWO_256 = BIGINT_1 << BigInt(256)

export function describeValue(value: AbiInputValue): string {
  if (value instanceof Uint8Array) return `Uint8Array(${value.length})`
  if (value instanceof Address) return value.toString()
  if (isValueList(value)) return `array of ${value.length}`
  if (typeof value === 'object') return 'object'
  return `${typeof value} ${String(value)}`
}

export function isValueList(
  value: AbiInputValue,
): value is readonly AbiInputValue[] {
  return Array.isArray(value)
}

export function isValueRecord(
  value: AbiInputValue,
): value is { readonly [name: string]: AbiInputValue } {
  return (
    typeof value === 'object' &&
    !(value instanceof Uint8Array) &&
    !(value instanceof Address) &&
    !Array.isArray(value)
  )
}

/** Unsigned 256-bit big-endian word. */
export function encodeWord(value: bigint): Uint8Array {
  return setLengthLeft(bigIntToBytes(value), WORD)
}

export function toAddressBytes(value: AbiInputValue): Uint8Array {
  if (value instanceof Address) return value.bytes
  if (value instanceof Uint8Array && value.length === 20) return value
  if (typeof value === 'string' && isValidAddress(value)) {
    return hexToBytes(value)
  }
  throw new EncodeError(`Invalid address value: ${describeValue(value)}`)
}

export function toByteString(type: AbiType, value: AbiInputValue): Uint8Array {
  if (value instanceof Uint8Array) return value
  if (
    typeof value === 'string' &&
    isHexString(value) &&
    value.length % 2 === 0
  ) {
    return hexToBytes(value)
  }
  throw new EncodeError(
    `Expected bytes or even-length hex for ${type.canonical}, got ${describeValue(value)}`,
  )
}

function toInteger(type: AbiType, value: AbiInputValue): bigint {
  if (typeof value === 'bigint') return value
  if (typeof value === 'number' && Number.isSafeInteger(value)) {
    return BigInt(value)
  }
  throw new EncodeError(
    `Expected integer for ${type.canonical}, got ${describeValue(value)}`,
  )
}

/**
 * Range-checked integer word: zero padded for uintN, two's complement for
 * intN.
 */
export function encodeInteger(
  type: UintType | IntType,
  value: AbiInputValue,
): Uint8Array {
  const n = toInteger(type, value)
  const signed = type.kind === 'int'
  const bits = BigInt(type.bits)
  const min = signed ? -(BIGINT_1 << (bits - BIGINT_1)) : BIGINT_0
  const max = signed
    ? (BIGINT_1 << (bits - BIGINT_1)) - BIGINT_1
    : (BIGINT_1 << bits) - BIGINT_1
  if (n < min || n > max) {
    throw new EncodeError(
      `Value ${n} out of range for ${type.canonical} [${min}, ${max}]`,
    )
  }
  return encodeWord(n < BIGINT_0 ? TWO_256 + n : n)
}

function encodeDynamicBytes(content: Uint8Array): Uint8Array {
  const padded = Math.ceil(content.length / WORD) * WORD
  return concatBytes(
    encodeWord(BigInt(content.length)),
    setLengthRight(content, padded),
  )
}

export function expectList(
  type: AbiType,
  value: AbiInputValue,
): readonly AbiInputValue[] {
  if (!isValueList(value)) {
    throw new EncodeError(
      `Expected array for ${type.canonical}, got ${describeValue(value)}`,
    )
  }
  return value
}

/** Positional values for a tuple given as an array or a named object. */
export function tupleValues(
  type: TupleType,
  value: AbiInputValue,
): readonly AbiInputValue[] {
  if (isValueList(value)) {
    if (value.length !== type.components.length) {
      throw new EncodeError(
        `Tuple ${type.canonical} expects ${type.components.length} values, got ${value.length}`,
      )
    }
    return value
  }
  if (isValueRecord(value)) {
    const record = value
    return type.components.map((component, i) => {
      const name = component.name
      if (name === undefined || name === '') {
        throw new EncodeError(
          `Tuple ${type.canonical} component ${i} has no name; pass an array`,
        )
      }
      if (!Object.hasOwn(record, name)) {
        throw new EncodeError(`Missing tuple component "${name}"`)
      }
      return record[name]
    })
  }
  throw new EncodeError(
    `Expected array or object for ${type.canonical}, got ${describeValue(value)}`,
  )
}

function encodeValue(type: AbiType, value: AbiInputValue): Uint8Array {
  switch (type.kind) {
    case 'address':
      return setLengthLeft(toAddressBytes(value), WORD)
    case 'bool':
      if (typeof value !== 'boolean') {
        throw new EncodeError(`Expected boolean, got ${describeValue(value)}`)
      }
      return encodeWord(value ? BIGINT_1 : BIGINT_0)
    case 'uint':
    case 'int':
      return encodeInteger(type, value)
    case 'fixedBytes': {
      const bytes = toByteString(type, value)
      if (bytes.length !== type.size) {
        throw new EncodeError(
          `Expected ${type.size} bytes for ${type.canonical}, got ${bytes.length}`,
        )
      }
      return setLengthRight(bytes, WORD)
    }
    case 'bytes':
      return encodeDynamicBytes(toByteString(type, value))
    case 'string':
      if (typeof value !== 'string') {
        throw new EncodeError(`Expected string, got ${describeValue(value)}`)
      }
      return encodeDynamicBytes(utf8ToBytes(value))
    case 'array': {
      const list = expectList(type, value)
      if (type.length !== undefined && list.length !== type.length) {
        throw new EncodeError(
          `Expected ${type.length} elements for ${type.canonical}, got ${list.length}`,
        )
      }
      const body = encodeSequence(
        list.map(() => type.element),
        list,
      )
      return type.length === undefined
        ? concatBytes(encodeWord(BigInt(list.length)), body)
        : body
    }
    case 'tuple':
      return encodeSequence(
        type.components.map((c) => c.type),
        tupleValues(type, value),
      )
  }
}

/**
 * Head-tail encoding of a value sequence. Offsets are relative to the start
 * of the sequence.
 */
function encodeSequence(
  types: readonly AbiType[],
  values: readonly AbiInputValue[],
): Uint8Array {
  const heads: Uint8Array[] = []
  const tails: Uint8Array[] = []
  let tailOffset = types.reduce((size, type) => size + type.staticSize, 0)
  for (let i = 0; i < types.length; i++) {
    const type = types[i]
    const encoded = encodeValue(type, values[i])
    if (type.dynamic) {
      heads.push(encodeWord(BigInt(tailOffset)))
      tails.push(encoded)
      tailOffset += encoded.length
    } else {
      heads.push(encoded)
    }
  }
  return concatBytes(...heads, ...tails)
}

/**
 * Encodes values against a parameter list.
 *
 * @example
 * encodeAbiParameters(['uint256', 'string'], [123n, 'Hello World'])
 */
export function encodeAbiParameters(
  params: readonly ParameterSource[],
  values: readonly AbiInputValue[],
): Uint8Array {
  const types = toAbiTypes(params)
  if (types.length !== values.length) {
    throw new EncodeError(
      `Expected ${types.length} values, got ${values.length}`,
    )
  }
  return encodeSequence(types, values)
}
