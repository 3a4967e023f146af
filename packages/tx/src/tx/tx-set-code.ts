import type { Input } from '@chainforge/rlp'
import type { Address } from '@chainforge/utils'
import { authorizationToRlp } from '../authorization'
import {
  type AccessList,
  type JsonTx,
  type SignatureValues,
  type SignedAuthorization,
  TransactionType,
} from '../types'
import { BaseTransaction } from './base'
import {
  authorizationToJSON,
  freezeAccessList,
  hexOrUndefined,
  type TxSignature,
} from './helpers'
import {
  assertDynamicFeeFields,
  type DynamicFeeTxFields,
  dynamicFeeJSON,
  dynamicFeePayload,
} from './tx-dynamic-fee'
import { assertAuthorizationList, assertYParitySignature } from './validation'

export interface SetCodeTxFields extends DynamicFeeTxFields {
  readonly to: Address
  readonly authorizationList: readonly SignedAuthorization[]
}

/**
 * EIP-7702 set-code transaction: lets externally owned accounts delegate
 * their code through signed authorizations.
 *
 * Transaction type: 4
 * Fields: [...EIP-1559 fields, authorizationList]
 */
export class SetCodeTx extends BaseTransaction {
  readonly type = TransactionType.EOACodeEIP7702
  readonly chainId: bigint
  readonly nonce: bigint
  readonly maxPriorityFeePerGas: bigint
  readonly maxFeePerGas: bigint
  readonly gasLimit: bigint
  readonly to: Address
  readonly value: bigint
  readonly data: Uint8Array
  readonly accessList: AccessList
  readonly authorizationList: readonly SignedAuthorization[]
  readonly signature: TxSignature | undefined

  constructor(fields: SetCodeTxFields, signature?: TxSignature) {
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
    this.authorizationList = Object.freeze([...fields.authorizationList])
    this.signature = signature

    assertDynamicFeeFields(this)
    assertAuthorizationList(this.authorizationList)
    assertYParitySignature(signature)
    Object.freeze(this)
  }

  fields(): SetCodeTxFields {
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
      authorizationList: this.authorizationList,
    }
  }

  payload(): Input[] {
    return [
      ...dynamicFeePayload(this),
      this.authorizationList.map((auth) => authorizationToRlp(auth)),
    ]
  }

  withSignature(sig: SignatureValues): SetCodeTx {
    return new SetCodeTx(this.fields(), {
      v: BigInt(sig.recoveryId),
      r: sig.r,
      s: sig.s,
    })
  }

  toJSON(): JsonTx {
    return {
      ...dynamicFeeJSON(this.type, this),
      authorizationList: this.authorizationList.map(authorizationToJSON),
      yParity: hexOrUndefined(this.v),
      r: hexOrUndefined(this.r),
      s: hexOrUndefined(this.s),
    }
  }
}
