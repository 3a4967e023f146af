import type { Input } from '@chainforge/rlp'
import { type Address, bigIntToHex, bytesToHex } from '@chainforge/utils'
import {
  type AccessList,
  type JsonTx,
  type SignatureValues,
  TransactionType,
} from '../types'
import { BaseTransaction } from './base'
import {
  freezeAccessList,
  hexOrUndefined,
  quantity,
  type TxSignature,
} from './helpers'
import {
  assertDynamicFeeFields,
  type DynamicFeeTxFields,
  dynamicFeeJSON,
  dynamicFeePayload,
} from './tx-dynamic-fee'
import {
  assertBlobVersionedHashes,
  assertQuantity,
  assertYParitySignature,
} from './validation'

export interface BlobTxFields extends DynamicFeeTxFields {
  readonly to: Address
  readonly maxFeePerBlobGas: bigint
  readonly blobVersionedHashes: readonly Uint8Array[]
}

/**
 * EIP-4844 blob-carrying transaction, in its network-free form (no blobs,
 * commitments or proofs attached).
 *
 * Transaction type: 3
 * Fields: [...EIP-1559 fields, maxFeePerBlobGas, blobVersionedHashes]
 */
export class BlobTx extends BaseTransaction {
  readonly type = TransactionType.BlobEIP4844
  readonly chainId: bigint
  readonly nonce: bigint
  readonly maxPriorityFeePerGas: bigint
  readonly maxFeePerGas: bigint
  readonly gasLimit: bigint
  readonly to: Address
  readonly value: bigint
  readonly data: Uint8Array
  readonly accessList: AccessList
  readonly maxFeePerBlobGas: bigint
  readonly blobVersionedHashes: readonly Uint8Array[]
  readonly signature: TxSignature | undefined

  constructor(fields: BlobTxFields, signature?: TxSignature) {
    super()
    this.chainId = fields.chainId
    this.nonce = fields.nonce
    this.maxPriorityFeePerGas = fields.maxPriorityFeePerGas
    this.maxFeePerGas = fields.maxFeePerGas
    this.gasLimit = fields.gasLimit
    this.to = fields.to
    this.value = fields.value
    this.data = fields.data
    this.accessList = freezeAccessList(fields.accessList)
    this.maxFeePerBlobGas = fields.maxFeePerBlobGas
    this.blobVersionedHashes = Object.freeze([...fields.blobVersionedHashes])
    this.signature = signature

    assertDynamicFeeFields(this)
    assertQuantity('maxFeePerBlobGas', this.maxFeePerBlobGas)
    assertBlobVersionedHashes(this.blobVersionedHashes)
    assertYParitySignature(signature)
    Object.freeze(this)
  }

  fields(): BlobTxFields {
    return {
      chainId: this.chainId,
      nonce: this.nonce,
      maxPriorityFeePerGas: this.maxPriorityFeePerGas,
      maxFeePerGas: this.maxFeePerGas,
      gasLimit: this.gasLimit,
      to: this.to,
      value: this.value,
      data: this.data,
      accessList: this.accessList,
      maxFeePerBlobGas: this.maxFeePerBlobGas,
      blobVersionedHashes: this.blobVersionedHashes,
    }
  }

  payload(): Input[] {
    return [
      ...dynamicFeePayload(this),
      quantity(this.maxFeePerBlobGas),
      [...this.blobVersionedHashes],
    ]
  }

  withSignature(sig: SignatureValues): BlobTx {
    return new BlobTx(this.fields(), {
      v: BigInt(sig.recoveryId),
      r: sig.r,
      s: sig.s,
    })
  }

  toJSON(): JsonTx {
    return {
      ...dynamicFeeJSON(this.type, this),
      maxFeePerBlobGas: bigIntToHex(this.maxFeePerBlobGas),
      blobVersionedHashes: this.blobVersionedHashes.map((h) => bytesToHex(h)),
      yParity: hexOrUndefined(this.v),
      r: hexOrUndefined(this.r),
      s: hexOrUndefined(this.s),
    }
  }
}
