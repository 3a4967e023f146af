import {
  type HashFn,
  keccak256,
  TypeParseError,
  utf8ToBytes,
} from '@chainforge/utils'
import { formatSignature, parseEventSignature, parseSignature } from './parser'
import type { AbiError, AbiEvent, AbiFunction } from './types'

export type SelectorSource = string | AbiFunction | AbiError

/**
 * Canonical `name(type1,...)` form of a function or error, whether given as
 * an ABI item or a human-readable signature.
 */
export function canonicalSignature(
  source: SelectorSource | AbiEvent,
): string {
  const item = typeof source === 'string' ? parseSignature(source) : source
  if (
    item.type !== 'function' &&
    item.type !== 'error' &&
    item.type !== 'event'
  ) {
    throw new TypeParseError(`A ${item.type} has no signature to hash`)
  }
  return formatSignature(item)
}

/** `hash(signature)[0:4]` */
export function functionSelector(
  source: SelectorSource,
  hash: HashFn = keccak256,
): Uint8Array {
  return hash(utf8ToBytes(canonicalSignature(source))).slice(0, 4)
}

/** `hash(signature)` of an event, its topic0 unless anonymous. */
export function eventTopic(
  source: string | AbiEvent,
  hash: HashFn = keccak256,
): Uint8Array {
  const event =
    typeof source === 'string' ? parseEventSignature(source) : source
  return hash(utf8ToBytes(formatSignature(event)))
}
