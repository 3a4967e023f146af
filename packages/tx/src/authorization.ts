import { RLP, type RlpItem } from '@chainforge/rlp'
import { firstIssue, z, zAddress, zBigInt } from '@chainforge/schema'
import {
  type Address,
  bigIntToUnpaddedBytes,
  bytesToBigInt,
  concatBytes,
  createZeroAddress,
  DecodeError,
  InvalidTransactionError,
  MAX_UINT64,
  setLengthLeft,
} from '@chainforge/utils'
import debug from 'debug'
import { defaultSignerConfig, type SignerConfig } from './config'
import { paramsTx } from './params'
import { recoverAddress } from './signer/recover'
import type { Signer } from './signer/types'
import { requestSignature } from './signer/request'
import type { Authorization, SignedAuthorization } from './types'

const log = debug('chainforge:tx:authorization')

const { authorizationMagic } = paramsTx[7702]

const zAuthorization = z.object({
  chainId: zBigInt(),
  address: zAddress(),
  nonce: zBigInt({ max: MAX_UINT64 }),
})

export type AuthorizationInput = z.input<typeof zAuthorization>

export function createAuthorization(input: AuthorizationInput): Authorization {
  const result = zAuthorization.safeParse(input)
  if (!result.success) {
    const { path, message } = firstIssue(result.error)
    throw new InvalidTransactionError(
      `Invalid authorization at ${path || '<root>'}: ${message}`,
      { metadata: { path } },
    )
  }
  return Object.freeze(result.data)
}

/**
 * Authorization that clears any delegation of the authority
 */
export function createRevocation(
  chainId: AuthorizationInput['chainId'],
  nonce: AuthorizationInput['nonce'],
): Authorization {
  return createAuthorization({ chainId, address: createZeroAddress(), nonce })
}

export function isRevocation(auth: Authorization): boolean {
  return auth.address.isZero()
}

/**
 * Bytes the authority signs, `0x05` followed by the fields in the layout the
 * config selects
 */
export function authorizationPreimage(
  auth: Authorization,
  config: SignerConfig = defaultSignerConfig,
): Uint8Array {
  const magic = Uint8Array.of(authorizationMagic)
  if (config.authorizationPreimage === 'rlp') {
    return concatBytes(
      magic,
      RLP.encode([
        bigIntToUnpaddedBytes(auth.chainId),
        auth.address.bytes,
        bigIntToUnpaddedBytes(auth.nonce),
      ]),
    )
  }
  return concatBytes(
    magic,
    setLengthLeft(bigIntToUnpaddedBytes(auth.chainId), 32),
    auth.address.bytes,
    setLengthLeft(bigIntToUnpaddedBytes(auth.nonce), 32),
  )
}

export function authorizationHash(
  auth: Authorization,
  config: SignerConfig = defaultSignerConfig,
): Uint8Array {
  return config.hash(authorizationPreimage(auth, config))
}

export interface SignAuthorizationOptions {
  signal?: AbortSignal
  config?: SignerConfig
}

export async function signAuthorization(
  auth: Authorization,
  signer: Signer,
  options: SignAuthorizationOptions = {},
): Promise<SignedAuthorization> {
  const { signal, config = defaultSignerConfig } = options
  const hash = authorizationHash(auth, config)
  log(
    'signing authorization for %s on chain %s',
    auth.address.toString(),
    auth.chainId,
  )
  const sig = await requestSignature(signer, hash, signal)
  return Object.freeze({
    chainId: auth.chainId,
    address: auth.address,
    nonce: auth.nonce,
    yParity: sig.recoveryId,
    r: sig.r,
    s: sig.s,
  })
}

/**
 * Signs each authorization in order with the same signer. The first failure
 * rejects the batch.
 */
export async function signAuthorizations(
  auths: readonly Authorization[],
  signer: Signer,
  options: SignAuthorizationOptions = {},
): Promise<SignedAuthorization[]> {
  const signed: SignedAuthorization[] = []
  for (const auth of auths) {
    signed.push(await signAuthorization(auth, signer, options))
  }
  return signed
}

/**
 * Address of the account that signed the authorization
 */
export function recoverAuthority(
  auth: SignedAuthorization,
  config: SignerConfig = defaultSignerConfig,
): Address {
  return recoverAddress(authorizationHash(auth, config), {
    r: auth.r,
    s: auth.s,
    recoveryId: auth.yParity,
  })
}

export function verifyAuthorization(
  auth: SignedAuthorization,
  authority: Address,
  config: SignerConfig = defaultSignerConfig,
): boolean {
  return recoverAuthority(auth, config).equals(authority)
}

/**
 * The `[chainId, address, nonce, yParity, r, s]` tuple embedded in a
 * set-code transaction
 */
export function authorizationToRlp(auth: SignedAuthorization): Uint8Array[] {
  return [
    bigIntToUnpaddedBytes(auth.chainId),
    auth.address.bytes,
    bigIntToUnpaddedBytes(auth.nonce),
    bigIntToUnpaddedBytes(BigInt(auth.yParity)),
    bigIntToUnpaddedBytes(auth.r),
    bigIntToUnpaddedBytes(auth.s),
  ]
}

export function authorizationFromRlp(item: RlpItem): SignedAuthorization {
  if (!Array.isArray(item) || item.length !== 6) {
    throw new DecodeError(
      'Invalid authorization: expected a list of 6 items',
    )
  }
  const [chainId, address, nonce, yParity, r, s] = item.map((field, i) => {
    if (!(field instanceof Uint8Array)) {
      throw new DecodeError(`Invalid authorization: item ${i} is a list`)
    }
    return field
  })
  const parity = decodeQuantity(yParity, 'yParity')
  if (parity !== 0n && parity !== 1n) {
    throw new DecodeError(`Invalid authorization: yParity ${parity}`)
  }
  const normalizedParity: 0 | 1 = parity === 0n ? 0 : 1
  if (address.length !== 20) {
    throw new DecodeError(
      `Invalid authorization: address must be 20 bytes, got ${address.length}`,
    )
  }
  return Object.freeze({
    ...createAuthorization({
      chainId: decodeQuantity(chainId, 'chainId'),
      address,
      nonce: decodeQuantity(nonce, 'nonce'),
    }),
    yParity: normalizedParity,
    r: decodeQuantity(r, 'r'),
    s: decodeQuantity(s, 's'),
  })
}

/**
 * Canonical RLP quantity: at most 32 bytes with no leading zero
 */
export function decodeQuantity(bytes: Uint8Array, name: string): bigint {
  if (bytes.length > 32) {
    throw new DecodeError(`${name} is longer than 32 bytes`)
  }
  if (bytes.length > 0 && bytes[0] === 0) {
    throw new DecodeError(`${name} has a leading zero byte`)
  }
  return bytesToBigInt(bytes)
}
