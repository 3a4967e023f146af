import { AccessListTx } from './tx-access-list'
import { BlobTx } from './tx-blob'
import { DynamicFeeTx } from './tx-dynamic-fee'
import { LegacyTx } from './tx-legacy'
import { SetCodeTx } from './tx-set-code'

export * from './base'
export type { TxSignature } from './helpers'
export * from './tx-access-list'
export * from './tx-blob'
export * from './tx-dynamic-fee'
export * from './tx-legacy'
export * from './tx-set-code'

/**
 * One fully resolved transaction, discriminated by `type`
 */
export type TypedTransaction =
  | LegacyTx
  | AccessListTx
  | DynamicFeeTx
  | BlobTx
  | SetCodeTx

export function isTypedTransaction(value: unknown): value is TypedTransaction {
  return (
    value instanceof LegacyTx ||
    value instanceof AccessListTx ||
    value instanceof DynamicFeeTx ||
    value instanceof BlobTx ||
    value instanceof SetCodeTx
  )
}
