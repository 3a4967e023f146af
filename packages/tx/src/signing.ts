import {
  type Address,
  bytesToHex,
  type HashFn,
  InvalidTransactionError,
  keccak256,
} from '@chainforge/utils'
import debug from 'debug'
import { defaultSignerConfig, type SignerConfig } from './config'
import type { TxRequest, TxRequestInput } from './request'
import { resolveTx } from './resolve'
import { recoverAddress } from './signer/recover'
import { requestSignature } from './signer/request'
import type { Signer } from './signer/types'
import type { TypedTransaction } from './tx'
import { txTypeName } from './types'

const log = debug('chainforge:tx:signing')

export interface SignTxOptions {
  signal?: AbortSignal
  config?: SignerConfig
}

export interface SignedTransaction {
  readonly tx: TypedTransaction
  /** Bytes for `eth_sendRawTransaction` */
  readonly serialized: Uint8Array
  readonly hash: Uint8Array
}

/**
 * Signs a resolved transaction and returns a new, signed copy
 */
export async function signTx(
  tx: TypedTransaction,
  signer: Signer,
  options: SignTxOptions = {},
): Promise<TypedTransaction> {
  const { signal, config = defaultSignerConfig } = options
  const hash = tx.getHashedMessageToSign(config.hash)
  log('signing %s transaction %s', txTypeName(tx.type), bytesToHex(hash))
  const sig = await requestSignature(signer, hash, signal)
  return tx.withSignature(sig)
}

/**
 * Resolves a request to its transaction shape, signs it and serializes the
 * result
 */
export async function signTransaction(
  request: TxRequestInput | TxRequest,
  signer: Signer,
  options: SignTxOptions = {},
): Promise<SignedTransaction> {
  const config = options.config ?? defaultSignerConfig
  const signed = await signTx(resolveTx(request, config), signer, {
    ...options,
    config,
  })
  return {
    tx: signed,
    serialized: signed.serialize(),
    hash: signed.hash(config.hash),
  }
}

/**
 * Address that signed `tx`
 */
export function recoverSender(
  tx: TypedTransaction,
  hash: HashFn = keccak256,
): Address {
  const { signature } = tx
  const recoveryId = tx.recoveryId()
  if (signature === undefined || recoveryId === undefined) {
    throw new InvalidTransactionError(
      'Cannot recover the sender of an unsigned transaction',
    )
  }
  return recoverAddress(tx.getHashedMessageToSign(hash), {
    r: signature.r,
    s: signature.s,
    recoveryId,
  })
}
