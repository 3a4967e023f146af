import { type Input, RLP } from '@chainforge/rlp'
import {
  type Address,
  bigIntToHex,
  bytesToHex,
  InvalidTransactionError,
} from '@chainforge/utils'
import { paramsTx } from '../params'
import {
  type JsonTx,
  type SignatureValues,
  TransactionType,
} from '../types'
import { BaseTransaction } from './base'
import {
  addressField,
  EMPTY_BYTES,
  hexOrUndefined,
  quantity,
  signatureFields,
  type TxSignature,
} from './helpers'
import { assertNonce, assertQuantity } from './validation'

export interface LegacyTxFields {
  /** Absent only for transactions that predate replay protection */
  readonly chainId?: bigint
  readonly nonce: bigint
  readonly gasPrice: bigint
  readonly gasLimit: bigint
  readonly to?: Address
  readonly value: bigint
  readonly data: Uint8Array
}

const { chainIdOffset, homesteadOffset } = paramsTx[155]

/**
 * Legacy transaction, signed with EIP-155 replay protection.
 *
 * Signing preimage: rlp([nonce, gasPrice, gasLimit, to, value, data, chainId, 0, 0])
 * Serialized:       rlp([nonce, gasPrice, gasLimit, to, value, data, v, r, s])
 */
export class LegacyTx extends BaseTransaction {
  readonly type = TransactionType.Legacy
  readonly chainId: bigint | undefined
  readonly nonce: bigint
  readonly gasPrice: bigint
  readonly gasLimit: bigint
  readonly to: Address | undefined
  readonly value: bigint
  readonly data: Uint8Array
  readonly signature: TxSignature | undefined

  constructor(fields: LegacyTxFields, signature?: TxSignature) {
    super()
    this.chainId = fields.chainId
    this.nonce = fields.nonce
    this.gasPrice = fields.gasPrice
    this.gasLimit = fields.gasLimit
    this.to = fields.to
    this.value = fields.value
    this.data = fields.data
    this.signature = signature

    if (this.chainId !== undefined) assertQuantity('chainId', this.chainId)
    assertNonce(this.nonce)
    assertQuantity('gasPrice', this.gasPrice)
    assertQuantity('gasLimit', this.gasLimit)
    assertQuantity('value', this.value)
    if (signature !== undefined) {
      this.assertV(signature.v)
      assertQuantity('r', signature.r)
      assertQuantity('s', signature.s)
    }
    Object.freeze(this)
  }

  fields(): LegacyTxFields {
    return {
      chainId: this.chainId,
      nonce: this.nonce,
      gasPrice: this.gasPrice,
      gasLimit: this.gasLimit,
      to: this.to,
      value: this.value,
      data: this.data,
    }
  }

  payload(): Input[] {
    return [
      quantity(this.nonce),
      quantity(this.gasPrice),
      quantity(this.gasLimit),
      addressField(this.to),
      quantity(this.value),
      this.data,
    ]
  }

  /**
   * Payload plus the EIP-155 `chainId, 0, 0` tail when a chain is bound
   */
  private unsignedFields(): Input[] {
    if (this.chainId === undefined) return this.payload()
    return [...this.payload(), quantity(this.chainId), EMPTY_BYTES, EMPTY_BYTES]
  }

  override getMessageToSign(): Uint8Array {
    return RLP.encode(this.unsignedFields())
  }

  override raw(): Input[] {
    if (this.signature === undefined) return this.unsignedFields()
    return [...this.payload(), ...signatureFields(this.signature)]
  }

  override serialize(): Uint8Array {
    return RLP.encode(this.raw())
  }

  override recoveryId(): 0 | 1 | undefined {
    if (this.signature === undefined) return undefined
    const base =
      this.chainId === undefined
        ? homesteadOffset
        : this.chainId * 2n + chainIdOffset
    return this.signature.v === base ? 0 : 1
  }

  withSignature(sig: SignatureValues): LegacyTx {
    const recoveryId = BigInt(sig.recoveryId)
    const v =
      this.chainId === undefined
        ? homesteadOffset + recoveryId
        : this.chainId * 2n + chainIdOffset + recoveryId
    return new LegacyTx(this.fields(), { v, r: sig.r, s: sig.s })
  }

  toJSON(): JsonTx {
    return {
      type: bigIntToHex(BigInt(this.type)),
      chainId: hexOrUndefined(this.chainId),
      nonce: bigIntToHex(this.nonce),
      gasPrice: bigIntToHex(this.gasPrice),
      gasLimit: bigIntToHex(this.gasLimit),
      to: this.to?.toString(),
      value: bigIntToHex(this.value),
      data: bytesToHex(this.data),
      v: hexOrUndefined(this.v),
      r: hexOrUndefined(this.r),
      s: hexOrUndefined(this.s),
    }
  }

  private assertV(v: bigint): void {
    const base =
      this.chainId === undefined
        ? homesteadOffset
        : this.chainId * 2n + chainIdOffset
    if (v !== base && v !== base + 1n) {
      throw new InvalidTransactionError(
        `Invalid v ${v}: expected ${base} or ${base + 1n}`,
      )
    }
  }
}
