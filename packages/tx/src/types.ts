import type { Address, PrefixedHexString } from '@chainforge/utils'

export const TransactionType = {
  Legacy: 0,
  AccessListEIP2930: 1,
  FeeMarketEIP1559: 2,
  BlobEIP4844: 3,
  EOACodeEIP7702: 4,
} as const

export type TransactionType =
  (typeof TransactionType)[keyof typeof TransactionType]

/**
 * Short names accepted wherever a transaction type is given
 */
export const TransactionTypeName = {
  legacy: TransactionType.Legacy,
  eip2930: TransactionType.AccessListEIP2930,
  eip1559: TransactionType.FeeMarketEIP1559,
  eip4844: TransactionType.BlobEIP4844,
  eip7702: TransactionType.EOACodeEIP7702,
} as const

export type TransactionTypeName = keyof typeof TransactionTypeName

export function txTypeName(type: TransactionType): TransactionTypeName {
  switch (type) {
    case TransactionType.Legacy:
      return 'legacy'
    case TransactionType.AccessListEIP2930:
      return 'eip2930'
    case TransactionType.FeeMarketEIP1559:
      return 'eip1559'
    case TransactionType.BlobEIP4844:
      return 'eip4844'
    case TransactionType.EOACodeEIP7702:
      return 'eip7702'
  }
}

export interface AccessListItem {
  readonly address: Address
  readonly storageKeys: readonly Uint8Array[]
}

export type AccessList = readonly AccessListItem[]

export type AccessListBytesItem = [Uint8Array, Uint8Array[]]
export type AccessListBytes = AccessListBytesItem[]

/**
 * An EIP-7702 delegation: the authority lets `address` run as its code on
 * `chainId` (0 for any chain) while its account nonce equals `nonce`.
 */
export interface Authorization {
  readonly chainId: bigint
  readonly address: Address
  readonly nonce: bigint
}

export interface SignedAuthorization extends Authorization {
  readonly yParity: 0 | 1
  readonly r: bigint
  readonly s: bigint
}

/**
 * Raw output of a signer for one 32-byte hash
 */
export interface SignatureValues {
  readonly r: bigint
  readonly s: bigint
  readonly recoveryId: 0 | 1
}

export interface JsonAccessListItem {
  address: PrefixedHexString
  storageKeys: PrefixedHexString[]
}

export interface JsonAuthorization {
  chainId: PrefixedHexString
  address: PrefixedHexString
  nonce: PrefixedHexString
  yParity: PrefixedHexString
  r: PrefixedHexString
  s: PrefixedHexString
}

/**
 * Hex form of a transaction, keyed the way JSON-RPC names the fields
 */
export interface JsonTx {
  type: PrefixedHexString
  chainId?: PrefixedHexString
  nonce: PrefixedHexString
  gasLimit: PrefixedHexString
  to?: PrefixedHexString
  value: PrefixedHexString
  data: PrefixedHexString
  gasPrice?: PrefixedHexString
  maxPriorityFeePerGas?: PrefixedHexString
  maxFeePerGas?: PrefixedHexString
  accessList?: JsonAccessListItem[]
  maxFeePerBlobGas?: PrefixedHexString
  blobVersionedHashes?: PrefixedHexString[]
  authorizationList?: JsonAuthorization[]
  v?: PrefixedHexString
  yParity?: PrefixedHexString
  r?: PrefixedHexString
  s?: PrefixedHexString
}
