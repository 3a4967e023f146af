import type { Input } from '@chainforge/rlp'
import {
  type Address,
  bigIntToHex,
  bigIntToUnpaddedBytes,
  bytesToHex,
  type PrefixedHexString,
} from '@chainforge/utils'
import type {
  AccessList,
  AccessListBytes,
  AccessListBytesItem,
  JsonAccessListItem,
  JsonAuthorization,
  SignedAuthorization,
} from '../types'

export const EMPTY_BYTES = new Uint8Array(0)

/**
 * Signature slots as they sit in a transaction. Typed transactions keep
 * yParity in `v`.
 */
export interface TxSignature {
  readonly v: bigint
  readonly r: bigint
  readonly s: bigint
}

export const quantity = (n: bigint): Uint8Array => bigIntToUnpaddedBytes(n)

export const addressField = (to: Address | undefined): Uint8Array =>
  to?.bytes ?? EMPTY_BYTES

export function accessListToBytes(list: AccessList): AccessListBytes {
  return list.map((item): AccessListBytesItem => [
    item.address.bytes,
    [...item.storageKeys],
  ])
}

export function accessListToJSON(list: AccessList): JsonAccessListItem[] {
  return list.map((item) => ({
    address: item.address.toString(),
    storageKeys: item.storageKeys.map((key) => bytesToHex(key)),
  }))
}

export function freezeAccessList(list: AccessList): AccessList {
  return Object.freeze(
    list.map((item) =>
      Object.freeze({
        address: item.address,
        storageKeys: Object.freeze([...item.storageKeys]),
      }),
    ),
  )
}

export function authorizationToJSON(
  auth: SignedAuthorization,
): JsonAuthorization {
  return {
    chainId: bigIntToHex(auth.chainId),
    address: auth.address.toString(),
    nonce: bigIntToHex(auth.nonce),
    yParity: bigIntToHex(BigInt(auth.yParity)),
    r: bigIntToHex(auth.r),
    s: bigIntToHex(auth.s),
  }
}

export function signatureFields(sig: TxSignature | undefined): Input[] {
  if (sig === undefined) return []
  return [quantity(sig.v), quantity(sig.r), quantity(sig.s)]
}

export const hexOrUndefined = (
  n: bigint | undefined,
): PrefixedHexString | undefined => (n === undefined ? undefined : bigIntToHex(n))
