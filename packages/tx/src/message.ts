import { hashTypedData, type TypedDataDefinition } from '@chainforge/abi'
import {
  type Address,
  type BytesLike,
  bigIntToBytes,
  bytesToBigInt,
  bytesToHex,
  concatBytes,
  ErrorCode,
  type HashFn,
  keccak256,
  type PrefixedHexString,
  setLengthLeft,
  SigningError,
  toBytes,
  utf8ToBytes,
} from '@chainforge/utils'
import debug from 'debug'
import { defaultSignerConfig, type SignerConfig } from './config'
import { recoverAddress } from './signer/recover'
import { requestSignature } from './signer/request'
import type { Signer } from './signer/types'
import type { SignatureValues } from './types'

const log = debug('chainforge:tx:message')

const MESSAGE_PREFIX = '\x19Ethereum Signed Message:\n'

/** Text is hashed as UTF-8; `raw` bytes are hashed as given. */
export type SignableMessage = string | { readonly raw: BytesLike }

export interface SignMessageOptions {
  signal?: AbortSignal
  config?: SignerConfig
}

export interface SignedMessage {
  readonly hash: Uint8Array
  readonly signature: SignatureValues
  /** 65-byte `r ‖ s ‖ v` with `v` in {27, 28} */
  readonly serialized: PrefixedHexString
}

/**
 * EIP-191 personal-message hash,
 * `hash("\x19Ethereum Signed Message:\n" ‖ len(message) ‖ message)`
 */
export function hashMessage(
  message: SignableMessage,
  hash: HashFn = keccak256,
): Uint8Array {
  const bytes =
    typeof message === 'string' ? utf8ToBytes(message) : toBytes(message.raw)
  return hash(
    concatBytes(utf8ToBytes(`${MESSAGE_PREFIX}${bytes.length}`), bytes),
  )
}

export function signatureToBytes(sig: SignatureValues): Uint8Array {
  return concatBytes(
    setLengthLeft(bigIntToBytes(sig.r), 32),
    setLengthLeft(bigIntToBytes(sig.s), 32),
    new Uint8Array([sig.recoveryId + 27]),
  )
}

/** Reads a 65-byte `r ‖ s ‖ v` signature; `v` may be 0/1 or 27/28. */
export function signatureFromBytes(input: BytesLike): SignatureValues {
  const bytes = toBytes(input)
  if (bytes.length !== 65) {
    throw new SigningError(
      `Invalid signature: expected 65 bytes, got ${bytes.length}`,
      { code: ErrorCode.InvalidSignature },
    )
  }
  const v = bytes[64]
  const recoveryId = v >= 27 ? v - 27 : v
  if (recoveryId !== 0 && recoveryId !== 1) {
    throw new SigningError(`Invalid signature: v ${v}`, {
      code: ErrorCode.InvalidSignature,
    })
  }
  return {
    r: bytesToBigInt(bytes.subarray(0, 32)),
    s: bytesToBigInt(bytes.subarray(32, 64)),
    recoveryId: recoveryId === 0 ? 0 : 1,
  }
}

async function signDigest(
  digest: Uint8Array,
  signer: Signer,
  signal?: AbortSignal,
): Promise<SignedMessage> {
  const signature = await requestSignature(signer, digest, signal)
  return {
    hash: digest,
    signature,
    serialized: bytesToHex(signatureToBytes(signature)),
  }
}

export async function signMessage(
  message: SignableMessage,
  signer: Signer,
  options: SignMessageOptions = {},
): Promise<SignedMessage> {
  const { signal, config = defaultSignerConfig } = options
  const digest = hashMessage(message, config.hash)
  log('signing personal message %s', bytesToHex(digest))
  return signDigest(digest, signer, signal)
}

export async function signTypedData(
  typedData: TypedDataDefinition,
  signer: Signer,
  options: SignMessageOptions = {},
): Promise<SignedMessage> {
  const { signal, config = defaultSignerConfig } = options
  const digest = hashTypedData(typedData, config.hash)
  log('signing typed data %s %s', typedData.primaryType, bytesToHex(digest))
  return signDigest(digest, signer, signal)
}

function toSignatureValues(
  signature: SignatureValues | BytesLike,
): SignatureValues {
  if (
    typeof signature === 'string' ||
    signature instanceof Uint8Array ||
    Array.isArray(signature)
  ) {
    return signatureFromBytes(signature)
  }
  return signature
}

export function recoverMessageAddress(
  message: SignableMessage,
  signature: SignatureValues | BytesLike,
  hash: HashFn = keccak256,
): Address {
  return recoverAddress(
    hashMessage(message, hash),
    toSignatureValues(signature),
  )
}

export function recoverTypedDataAddress(
  typedData: TypedDataDefinition,
  signature: SignatureValues | BytesLike,
  hash: HashFn = keccak256,
): Address {
  return recoverAddress(
    hashTypedData(typedData, hash),
    toSignatureValues(signature),
  )
}
