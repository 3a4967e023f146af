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
  assertFeeCaps,
  assertNonce,
  assertQuantity,
  assertYParitySignature,
} from './validation'

export interface DynamicFeeTxFields {
  readonly chainId: bigint
  readonly nonce: bigint
  readonly maxPriorityFeePerGas: bigint
  readonly maxFeePerGas: bigint
  readonly gasLimit: bigint
  readonly to?: Address
  readonly value: bigint
  readonly data: Uint8Array
  readonly accessList: AccessList
}

/**
 * Field checks shared with the blob and set-code shapes, which extend the
 * EIP-1559 field list
 */
export function assertDynamicFeeFields(fields: DynamicFeeTxFields): void {
  assertQuantity('chainId', fields.chainId)
  assertNonce(fields.nonce)
  assertFeeCaps(fields.maxPriorityFeePerGas, fields.maxFeePerGas)
  assertQuantity('gasLimit', fields.gasLimit)
  assertQuantity('value', fields.value)
  assertAccessList(fields.accessList)
}

export function dynamicFeePayload(fields: DynamicFeeTxFields): Input[] {
  return [
    quantity(fields.chainId),
    quantity(fields.nonce),
    quantity(fields.maxPriorityFeePerGas),
    quantity(fields.maxFeePerGas),
    quantity(fields.gasLimit),
    addressField(fields.to),
    quantity(fields.value),
    fields.data,
    accessListToBytes(fields.accessList),
  ]
}

export function dynamicFeeJSON(
  type: TransactionType,
  fields: DynamicFeeTxFields,
): JsonTx {
  return {
    type: bigIntToHex(BigInt(type)),
    chainId: bigIntToHex(fields.chainId),
    nonce: bigIntToHex(fields.nonce),
    maxPriorityFeePerGas: bigIntToHex(fields.maxPriorityFeePerGas),
    maxFeePerGas: bigIntToHex(fields.maxFeePerGas),
    gasLimit: bigIntToHex(fields.gasLimit),
    to: fields.to?.toString(),
    value: bigIntToHex(fields.value),
    data: bytesToHex(fields.data),
    accessList: accessListToJSON(fields.accessList),
  }
}

/**
 * EIP-1559 fee market transaction.
 *
 * Transaction type: 2
 * Fields: [chainId, nonce, maxPriorityFeePerGas, maxFeePerGas, gasLimit, to, value, data, accessList]
 */
export class DynamicFeeTx extends BaseTransaction {
  readonly type = TransactionType.FeeMarketEIP1559
  readonly chainId: bigint
  readonly nonce: bigint
  readonly maxPriorityFeePerGas: bigint
  readonly maxFeePerGas: bigint
  readonly gasLimit: bigint
  readonly to: Address | undefined
  readonly value: bigint
  readonly data: Uint8Array
  readonly accessList: AccessList
  readonly signature: TxSignature | undefined

  constructor(fields: DynamicFeeTxFields, signature?: TxSignature) {
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
    this.signature = signature

    assertDynamicFeeFields(this)
    assertYParitySignature(signature)
    Object.freeze(this)
  }

  fields(): DynamicFeeTxFields {
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
    }
  }

  payload(): Input[] {
    return dynamicFeePayload(this)
  }

  withSignature(sig: SignatureValues): DynamicFeeTx {
    return new DynamicFeeTx(this.fields(), {
      v: BigInt(sig.recoveryId),
      r: sig.r,
      s: sig.s,
    })
  }

  toJSON(): JsonTx {
    return {
      ...dynamicFeeJSON(this.type, this),
      yParity: hexOrUndefined(this.v),
      r: hexOrUndefined(this.r),
      s: hexOrUndefined(this.s),
    }
  }
}
