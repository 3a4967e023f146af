import {
  type BytesLike,
  bytesToHex,
  concatBytes,
  DecodeError,
  equalsBytes,
  type HashFn,
  keccak256,
  toBytes,
} from '@chainforge/utils'
import { decodeAbiParameters } from './decoder'
import { encodeAbiParameters } from './encoder'
import { parseFunctionSignature } from './parser'
import { functionSelector } from './selector'
import type { AbiDecodedValue, AbiFunction, AbiInputValue } from './types'

export type FunctionSource = string | AbiFunction

function toFunction(source: FunctionSource): AbiFunction {
  return typeof source === 'string' ? parseFunctionSignature(source) : source
}

/** Selector followed by the encoded arguments. */
export function encodeFunctionData(
  source: FunctionSource,
  args: readonly AbiInputValue[] = [],
  hash: HashFn = keccak256,
): Uint8Array {
  const fn = toFunction(source)
  return concatBytes(
    functionSelector(fn, hash),
    encodeAbiParameters(fn.inputs, args),
  )
}

/**
 * Decodes call data, checking and stripping the 4-byte selector.
 */
export function decodeFunctionData(
  source: FunctionSource,
  data: BytesLike,
  hash: HashFn = keccak256,
): AbiDecodedValue[] {
  const fn = toFunction(source)
  const bytes = toBytes(data)
  if (bytes.length < 4) {
    throw new DecodeError(`call data of ${bytes.length} bytes has no selector`)
  }
  const expected = functionSelector(fn, hash)
  const actual = bytes.subarray(0, 4)
  if (!equalsBytes(expected, actual)) {
    throw new DecodeError(
      `selector mismatch: expected ${bytesToHex(expected)}, got ${bytesToHex(actual)}`,
    )
  }
  return decodeAbiParameters(fn.inputs, bytes.subarray(4))
}

/**
 * Decodes a call's return data against the function outputs. The data must
 * not carry a selector.
 */
export function decodeFunctionResult(
  source: FunctionSource,
  data: BytesLike,
): AbiDecodedValue[] {
  return decodeAbiParameters(toFunction(source).outputs, data)
}
