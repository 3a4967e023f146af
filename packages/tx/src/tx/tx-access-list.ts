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
  accessListToBytes,
  accessListToJSON,
  addressField,
  freezeAccessList,
  hexOrUndefined,
  quantity,
  type TxSignature,
} from './helpers'
import {
  assertAccessList,
  assertNonce,
  assertQuantity,
  assertYParitySignature,
} from './validation'

export interface AccessListTxFields {
  readonly chainId: bigint
  readonly nonce: bigint
  readonly gasPrice: bigint
  readonly gasLimit: bigint
  readonly to?: Address
  readonly value: bigint
  readonly data: Uint8Array
  readonly accessList: AccessList
}

/**
 * EIP-2930 access list transaction.
 *
 * Transaction type: 1
 * Fields: [chainId, nonce, gasPrice, gasLimit, to, value, data, accessList]
 */
export class AccessListTx extends BaseTransaction {
  readonly type = TransactionType.AccessListEIP2930
  readonly chainId: bigint
  readonly nonce: bigint
  readonly gasPrice: bigint
  readonly gasLimit: bigint
  readonly to: Address | undefined
  readonly value: bigint
  readonly data: Uint8Array
  readonly accessList: AccessList
  readonly signature: TxSignature | undefined

  constructor(fields: AccessListTxFields, signature?: TxSignature) {
    super()
    this.chainId = fields.chainId
    this.nonce = fields.nonce
    this.gasPrice = fields.gasPrice
    this.gasLimit = fields.gasLimit
    this.to = fields.to
    this.value = fields.value
    this.data = fields.data
    this.accessList = freezeAccessList(fields.accessList)
    this.signature = signature

    assertQuantity('chainId', this.chainId)
    assertNonce(this.nonce)
    assertQuantity('gasPrice', this.gasPrice)
    assertQuantity('gasLimit', this.gasLimit)
    assertQuantity('value', this.value)
    assertAccessList(this.accessList)
    assertYParitySignature(signature)
    Object.freeze(this)
  }

  fields(): AccessListTxFields {
    return {
      chainId: this.chainId,
      nonce: this.nonce,
      gasPrice: this.gasPrice,
      gasLimit: this.gasLimit,
      to: this.to,
      value: this.value,
      data: this.data,
      accessList: this.accessList,
    }
  }

  payload(): Input[] {
    return [
      quantity(this.chainId),
      quantity(this.nonce),
      quantity(this.gasPrice),
      quantity(this.gasLimit),
      addressField(this.to),
      quantity(this.value),
      this.data,
      accessListToBytes(this.accessList),
    ]
  }

  withSignature(sig: SignatureValues): AccessListTx {
    return new AccessListTx(this.fields(), {
      v: BigInt(sig.recoveryId),
      r: sig.r,
      s: sig.s,
    })
  }

  toJSON(): JsonTx {
    return {
      type: bigIntToHex(BigInt(this.type)),
      chainId: bigIntToHex(this.chainId),
      nonce: bigIntToHex(this.nonce),
      gasPrice: bigIntToHex(this.gasPrice),
      gasLimit: bigIntToHex(this.gasLimit),
      to: this.to?.toString(),
      value: bigIntToHex(this.value),
      data: bytesToHex(this.data),
      accessList: accessListToJSON(this.accessList),
      yParity: hexOrUndefined(this.v),
      r: hexOrUndefined(this.r),
      s: hexOrUndefined(this.s),
    }
  }
}
