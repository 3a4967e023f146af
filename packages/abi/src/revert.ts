import {
  type BytesLike,
  bytesToHex,
  DecodeError,
  type HashFn,
  keccak256,
  toBytes,
} from '@chainforge/utils'
import { decodeAbiParameters } from './decoder'
import { functionSelector } from './selector'
import type { AbiDecodedValue, AbiError, AbiItem } from './types'

/** Selector of `Error(string)` */
export const ERROR_STRING_SELECTOR = '0x08c379a0'
/** Selector of `Panic(uint256)` */
export const PANIC_SELECTOR = '0x4e487b71'

const PANIC_MESSAGES: ReadonlyMap<number, string> = new Map([
  [0x00, 'Generic compiler panic'],
  [0x01, 'Assert failed'],
  [0x11, 'Arithmetic overflow/underflow'],
  [0x12, 'Division by zero'],
  [0x21, 'Invalid enum value'],
  [0x22, 'Storage byte array encoding error'],
  [0x31, 'Pop on empty array'],
  [0x32, 'Array index out of bounds'],
  [0x41, 'Memory allocation overflow'],
  [0x51, 'Zero-initialized function pointer'],
])

export type DecodedRevert =
  | { readonly kind: 'error'; readonly message: string }
  | { readonly kind: 'panic'; readonly code: bigint; readonly message: string }
  | {
      readonly kind: 'custom'
      readonly error: AbiError
      readonly args: AbiDecodedValue[]
    }
  | { readonly kind: 'unknown'; readonly data: Uint8Array }

export function panicMessage(code: bigint): string {
  const known =
    code <= BigInt(0xff) ? PANIC_MESSAGES.get(Number(code)) : undefined
  return known ?? `Panic(0x${code.toString(16)})`
}

/**
 * Classifies revert data as `Error(string)`, `Panic(uint256)`, one of the
 * given custom errors, or unknown.
 */
export function decodeRevert(
  data: BytesLike,
  abi: readonly AbiItem[] = [],
  hash: HashFn = keccak256,
): DecodedRevert {
  const bytes = toBytes(data)
  if (bytes.length < 4) return { kind: 'unknown', data: bytes }
  const selector = bytesToHex(bytes.subarray(0, 4))
  const body = bytes.subarray(4)

  if (selector === ERROR_STRING_SELECTOR) {
    const [message] = decodeAbiParameters(['string'], body)
    if (typeof message !== 'string') {
      throw new DecodeError('Error(string) payload is not a string')
    }
    return { kind: 'error', message }
  }
  if (selector === PANIC_SELECTOR) {
    const [code] = decodeAbiParameters(['uint256'], body)
    if (typeof code !== 'bigint') {
      throw new DecodeError('Panic(uint256) payload is not an integer')
    }
    return { kind: 'panic', code, message: panicMessage(code) }
  }

  for (const item of abi) {
    if (item.type !== 'error') continue
    if (bytesToHex(functionSelector(item, hash)) === selector) {
      return {
        kind: 'custom',
        error: item,
        args: decodeAbiParameters(item.inputs, body),
      }
    }
  }
  return { kind: 'unknown', data: bytes }
}
