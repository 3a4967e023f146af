import { asciis, BIGINT_0, cachedHexes } from './constants'
import { assertIsHexString } from './helpers'
import type { BytesLike, PrefixedHexString } from './types'

export function isHexString(str: string, length?: number): boolean {
  if (!/^0x[0-9a-fA-F]*$/.test(str)) return false
  if (length !== undefined && str.length !== 2 + 2 * length) return false
  return true
}

export function padToEven(a: string): string {
  return a.length % 2 ? `0${a}` : a
}

export function stripHexPrefix(str: string): string {
  return str.startsWith('0x') ? str.slice(2) : str
}

export function bytesToHex(bytes: Uint8Array): PrefixedHexString {
  let hex = ''
  for (let i = 0; i < bytes.length; i++) {
    hex += cachedHexes[bytes[i]]
  }
  return `0x${hex}`
}

function asciiToBase16(char: number): number | undefined {
  if (char >= asciis._0 && char <= asciis._9) return char - asciis._0
  if (char >= asciis._A && char <= asciis._F) return char - (asciis._A - 10)
  if (char >= asciis._a && char <= asciis._f) return char - (asciis._a - 10)
  return
}

/**
 * Converts a hex string (with or without 0x) to bytes. Odd-length input is
 * rejected rather than silently left-padded.
 */
export function hexToBytes(hex: string): Uint8Array {
  const stripped = stripHexPrefix(hex)
  const hl = stripped.length
  if (hl % 2) {
    throw new Error(
      `padded hex string expected, got unpadded hex of length ${hl}`,
    )
  }
  const al = hl / 2
  const array = new Uint8Array(al)
  for (let ai = 0, hi = 0; ai < al; ai++, hi += 2) {
    const n1 = asciiToBase16(stripped.charCodeAt(hi))
    const n2 = asciiToBase16(stripped.charCodeAt(hi + 1))
    if (n1 === undefined || n2 === undefined) {
      const char = stripped[hi] + stripped[hi + 1]
      throw new Error(
        `hex string expected, got non-hex character "${char}" at index ${hi}`,
      )
    }
    array[ai] = n1 * 16 + n2
  }
  return array
}

export function concatBytes(...arrays: Uint8Array[]): Uint8Array {
  if (arrays.length === 1) return arrays[0]
  const length = arrays.reduce((a, arr) => a + arr.length, 0)
  const result = new Uint8Array(length)
  for (let i = 0, pad = 0; i < arrays.length; i++) {
    const arr = arrays[i]
    result.set(arr, pad)
    pad += arr.length
  }
  return result
}

export function equalsBytes(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false
  }
  return true
}

export function utf8ToBytes(utf: string): Uint8Array {
  return new TextEncoder().encode(utf)
}

/**
 * Decodes UTF-8, throwing on malformed sequences instead of substituting
 * U+FFFD.
 */
export function bytesToUtf8(bytes: Uint8Array): string {
  return new TextDecoder('utf-8', { fatal: true }).decode(bytes)
}

export function bytesToBigInt(bytes: Uint8Array): bigint {
  if (bytes.length === 0) return BIGINT_0
  return BigInt(bytesToHex(bytes))
}

export function bigIntToHex(num: bigint): PrefixedHexString {
  return `0x${num.toString(16)}`
}

/**
 * Minimal big-endian encoding; zero becomes a single 0x00 byte.
 */
export function bigIntToBytes(num: bigint): Uint8Array {
  if (num < BIGINT_0) {
    throw new Error(`Cannot convert negative bigint to bytes: ${num}`)
  }
  return hexToBytes(padToEven(num.toString(16)))
}

/**
 * Minimal big-endian encoding with no leading zero byte; zero becomes the
 * empty byte string.
 */
export function bigIntToUnpaddedBytes(num: bigint): Uint8Array {
  return unpadBytes(bigIntToBytes(num))
}

export function intToBytes(i: number): Uint8Array {
  if (!Number.isSafeInteger(i) || i < 0) {
    throw new Error(`Received an invalid integer type: ${i}`)
  }
  return bigIntToBytes(BigInt(i))
}

export function unpadBytes(a: Uint8Array): Uint8Array {
  let first = 0
  while (first < a.length && a[first] === 0) first++
  return a.slice(first)
}

export function setLengthLeft(msg: Uint8Array, length: number): Uint8Array {
  if (msg.length > length) {
    throw new Error(`Input of ${msg.length} bytes exceeds ${length} bytes`)
  }
  const buf = new Uint8Array(length)
  buf.set(msg, length - msg.length)
  return buf
}

export function setLengthRight(msg: Uint8Array, length: number): Uint8Array {
  if (msg.length > length) {
    throw new Error(`Input of ${msg.length} bytes exceeds ${length} bytes`)
  }
  const buf = new Uint8Array(length)
  buf.set(msg, 0)
  return buf
}

export function toBytes(v: BytesLike): Uint8Array {
  if (v instanceof Uint8Array) return v
  if (Array.isArray(v)) return Uint8Array.from(v)
  assertIsHexString(v)
  return hexToBytes(v)
}
