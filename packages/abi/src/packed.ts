import {
  concatBytes,
  EncodeError,
  setLengthLeft,
  setLengthRight,
  utf8ToBytes,
} from '@chainforge/utils'
import {
  describeValue,
  encodeInteger,
  expectList,
  toAddressBytes,
  toByteString,
} from './encoder'
import { type ParameterSource, toAbiTypes } from './parser'
import type { AbiInputValue, AbiType } from './types'

function packValue(
  type: AbiType,
  value: AbiInputValue,
  inArray: boolean,
): Uint8Array {
  switch (type.kind) {
    case 'address': {
      const bytes = toAddressBytes(value)
      return inArray ? setLengthLeft(bytes, 32) : bytes
    }
    case 'bool':
      if (typeof value !== 'boolean') {
        throw new EncodeError(`Expected boolean, got ${describeValue(value)}`)
      }
      return inArray
        ? setLengthLeft(Uint8Array.of(value ? 1 : 0), 32)
        : Uint8Array.of(value ? 1 : 0)
    case 'uint':
    case 'int': {
      const word = encodeInteger(type, value)
      return inArray ? word : word.slice(32 - type.bits / 8)
    }
    case 'fixedBytes': {
      const bytes = toByteString(type, value)
      if (bytes.length !== type.size) {
        throw new EncodeError(
          `Expected ${type.size} bytes for ${type.canonical}, got ${bytes.length}`,
        )
      }
      return inArray ? setLengthRight(bytes, 32) : bytes
    }
    case 'bytes':
      return toByteString(type, value)
    case 'string':
      if (typeof value !== 'string') {
        throw new EncodeError(`Expected string, got ${describeValue(value)}`)
      }
      return utf8ToBytes(value)
    case 'array': {
      const list = expectList(type, value)
      if (type.length !== undefined && list.length !== type.length) {
        throw new EncodeError(
          `Expected ${type.length} elements for ${type.canonical}, got ${list.length}`,
        )
      }
      return concatBytes(...list.map((v) => packValue(type.element, v, true)))
    }
    case 'tuple':
      throw new EncodeError(
        `Packed encoding does not support tuples: ${type.canonical}`,
      )
  }
}

/**
 * Non-standard packed mode: no offsets, no length prefixes, values at their
 * natural width. Array elements are padded to 32 bytes. Not decodable.
 */
export function encodePacked(
  params: readonly ParameterSource[],
  values: readonly AbiInputValue[],
): Uint8Array {
  const types = toAbiTypes(params)
  if (types.length !== values.length) {
    throw new EncodeError(
      `Expected ${types.length} values, got ${values.length}`,
    )
  }
  return concatBytes(...types.map((t, i) => packValue(t, values[i], false)))
}
