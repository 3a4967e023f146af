import { type Input, RLP } from '@chainforge/rlp'
import {
  concatBytes,
  type HashFn,
  InvalidTransactionError,
  keccak256,
} from '@chainforge/utils'
import type { JsonTx, SignatureValues, TransactionType } from '../types'
import { signatureFields, type TxSignature } from './helpers'

/**
 * Behaviour shared by all five transaction shapes. The defaults implement
 * the EIP-2718 typed envelope `type ‖ rlp(fields)`; LegacyTx overrides the
 * envelope methods.
 */
export abstract class BaseTransaction {
  abstract readonly type: TransactionType
  abstract readonly signature: TxSignature | undefined

  /**
   * Unsigned RLP fields in wire order
   */
  abstract payload(): Input[]

  abstract withSignature(sig: SignatureValues): BaseTransaction

  abstract toJSON(): JsonTx

  get v(): bigint | undefined {
    return this.signature?.v
  }

  get r(): bigint | undefined {
    return this.signature?.r
  }

  get s(): bigint | undefined {
    return this.signature?.s
  }

  isSigned(): boolean {
    return this.signature !== undefined
  }

  /**
   * Recovery id of the attached signature
   */
  recoveryId(): 0 | 1 | undefined {
    if (this.signature === undefined) return undefined
    return this.signature.v === 0n ? 0 : 1
  }

  /**
   * Bytes whose hash is signed
   */
  getMessageToSign(): Uint8Array {
    return concatBytes(Uint8Array.of(this.type), RLP.encode(this.payload()))
  }

  getHashedMessageToSign(hash: HashFn = keccak256): Uint8Array {
    return hash(this.getMessageToSign())
  }

  /**
   * Fields as they are serialized: the payload, then `v, r, s` once signed
   */
  raw(): Input[] {
    return [...this.payload(), ...signatureFields(this.signature)]
  }

  serialize(): Uint8Array {
    return concatBytes(Uint8Array.of(this.type), RLP.encode(this.raw()))
  }

  /**
   * Transaction hash, the hash of the signed serialization
   */
  hash(hash: HashFn = keccak256): Uint8Array {
    if (!this.isSigned()) {
      throw new InvalidTransactionError(
        'Cannot compute the hash of an unsigned transaction',
      )
    }
    return hash(this.serialize())
  }
}
