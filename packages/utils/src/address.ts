import { bytesToHex, equalsBytes, hexToBytes, utf8ToBytes } from './bytes'
import { ADDRESS_LENGTH } from './constants'
import { keccak256 } from './hash'
import type { PrefixedHexString } from './types'

/**
 * Handling and generating Ethereum addresses
 */
export class Address {
  public readonly bytes: Uint8Array

  constructor(bytes: Uint8Array) {
    if (bytes.length !== ADDRESS_LENGTH) {
      throw new Error(
        `Invalid address length: expected ${ADDRESS_LENGTH} bytes, got ${bytes.length}`,
      )
    }
    this.bytes = bytes
  }

  /**
   * Is address equal to another.
   */
  equals(address: Address): boolean {
    return equalsBytes(this.bytes, address.bytes)
  }

  /**
   * Is address zero.
   */
  isZero(): boolean {
    return this.bytes.every((b) => b === 0)
  }

  /**
   * Returns lowercase hex representation of address.
   */
  toString(): PrefixedHexString {
    return bytesToHex(this.bytes)
  }

  /**
   * EIP-55 mixed-case checksum representation.
   */
  toChecksumString(): PrefixedHexString {
    const lower = this.toString().slice(2)
    const hash = bytesToHex(keccak256(utf8ToBytes(lower))).slice(2)
    let out = ''
    for (let i = 0; i < lower.length; i++) {
      out += Number.parseInt(hash[i], 16) >= 8 ? lower[i].toUpperCase() : lower[i]
    }
    return `0x${out}`
  }

  toBytes(): Uint8Array {
    return new Uint8Array(this.bytes)
  }
}

export function isValidAddress(hexAddress: string): boolean {
  return /^0x[0-9a-fA-F]{40}$/.test(hexAddress)
}

export function createAddressFromString(str: string): Address {
  if (!isValidAddress(str)) {
    throw new Error(`Invalid address input=${str}`)
  }
  return new Address(hexToBytes(str))
}

export function createZeroAddress(): Address {
  return new Address(new Uint8Array(ADDRESS_LENGTH))
}

/**
 * Derives the address of an uncompressed (65 byte, 0x04-prefixed) or raw
 * (64 byte) secp256k1 public key.
 */
export function createAddressFromPublicKey(publicKey: Uint8Array): Address {
  let raw = publicKey
  if (raw.length === 65 && raw[0] === 0x04) raw = raw.subarray(1)
  if (raw.length !== 64) {
    throw new Error(`Expected 64 or 65 byte public key, got ${publicKey.length}`)
  }
  return new Address(keccak256(raw).slice(-ADDRESS_LENGTH))
}
