import { describe, expect, it } from 'vitest'
import {
  bigIntToBytes,
  bigIntToUnpaddedBytes,
  bytesToBigInt,
  bytesToHex,
  bytesToUtf8,
  concatBytes,
  equalsBytes,
  hexToBytes,
  isHexString,
  keccak256,
  setLengthLeft,
  setLengthRight,
  toBytes,
  unpadBytes,
  utf8ToBytes,
} from '../../src'

describe('hex conversion', () => {
  it('should round trip prefixed hex', () => {
    const bytes = hexToBytes('0x00ff10')
    expect(bytes).toEqual(Uint8Array.from([0x00, 0xff, 0x10]))
    expect(bytesToHex(bytes)).toBe('0x00ff10')
  })

  it('should accept unprefixed and mixed-case hex', () => {
    expect(hexToBytes('ABcd')).toEqual(Uint8Array.from([0xab, 0xcd]))
  })

  it('should reject odd-length and non-hex input', () => {
    expect(() => hexToBytes('0xabc')).toThrow('unpadded hex of length 3')
    expect(() => hexToBytes('0xzz')).toThrow('non-hex character "zz"')
  })

  it('should validate hex strings with optional byte length', () => {
    expect(isHexString('0x')).toBe(true)
    expect(isHexString('0x1234', 2)).toBe(true)
    expect(isHexString('0x1234', 3)).toBe(false)
    expect(isHexString('1234')).toBe(false)
  })
})

describe('bigint conversion', () => {
  it('should encode minimal big-endian bytes', () => {
    expect(bigIntToBytes(1024n)).toEqual(Uint8Array.from([0x04, 0x00]))
    expect(bigIntToBytes(0n)).toEqual(Uint8Array.from([0x00]))
    expect(bigIntToUnpaddedBytes(0n)).toEqual(new Uint8Array(0))
    expect(bigIntToUnpaddedBytes(255n)).toEqual(Uint8Array.from([0xff]))
  })

  it('should reject negative values', () => {
    expect(() => bigIntToBytes(-1n)).toThrow('negative')
  })

  it('should decode bytes to bigint', () => {
    expect(bytesToBigInt(new Uint8Array(0))).toBe(0n)
    expect(bytesToBigInt(Uint8Array.from([0x01, 0x00]))).toBe(256n)
  })
})

describe('byte helpers', () => {
  it('should pad left and right', () => {
    expect(setLengthLeft(Uint8Array.from([1]), 3)).toEqual(
      Uint8Array.from([0, 0, 1]),
    )
    expect(setLengthRight(Uint8Array.from([1]), 3)).toEqual(
      Uint8Array.from([1, 0, 0]),
    )
    expect(() => setLengthLeft(new Uint8Array(4), 3)).toThrow()
  })

  it('should strip leading zeros', () => {
    expect(unpadBytes(Uint8Array.from([0, 0, 5, 0]))).toEqual(
      Uint8Array.from([5, 0]),
    )
  })

  it('should concat and compare', () => {
    const joined = concatBytes(Uint8Array.from([1]), Uint8Array.from([2, 3]))
    expect(equalsBytes(joined, Uint8Array.from([1, 2, 3]))).toBe(true)
    expect(equalsBytes(joined, Uint8Array.from([1, 2]))).toBe(false)
  })

  it('should convert BytesLike inputs', () => {
    expect(toBytes([1, 2])).toEqual(Uint8Array.from([1, 2]))
    expect(toBytes('0x0102')).toEqual(Uint8Array.from([1, 2]))
  })

  it('should use UTF-8 byte length for multi-byte text', () => {
    const bytes = utf8ToBytes('你好🎉')
    expect(bytes.length).toBe(10)
    expect(bytesToUtf8(bytes)).toBe('你好🎉')
  })

  it('should reject malformed UTF-8', () => {
    expect(() => bytesToUtf8(Uint8Array.from([0xc3, 0x28]))).toThrow()
  })
})

describe('keccak256', () => {
  it('should hash the empty input', () => {
    expect(bytesToHex(keccak256(new Uint8Array(0)))).toBe(
      '0xc5d2460186f7233c927e7db2dcc703c0e500b653ca82273b7bfad8045d85a470',
    )
  })
})
