import { keccak256 as keccak } from 'ethereum-cryptography/keccak.js'
import type { HashFn } from './types'

/**
 * Default hash capability
 */
export const keccak256: HashFn = (data: Uint8Array): Uint8Array => keccak(data)
