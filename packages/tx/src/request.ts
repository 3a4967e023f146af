import {
  firstIssue,
  z,
  zAddress,
  zBigInt,
  zBytes,
  zBytes32,
} from '@chainforge/schema'
import {
  InvalidTransactionError,
  MAX_UINT64,
  UnsupportedTransactionTypeError,
} from '@chainforge/utils'
import {
  TransactionType,
  TransactionTypeName,
  type SignedAuthorization,
} from './types'

/** A type tag as a number, bigint, hex string or short name */
export type TxTypeInput = number | bigint | string

const TYPE_VALUES: readonly TransactionType[] = Object.values(TransactionType)

const isTransactionType = (n: number): n is TransactionType =>
  TYPE_VALUES.some((t) => t === n)

const isTypeName = (name: string): name is TransactionTypeName =>
  Object.hasOwn(TransactionTypeName, name)

/**
 * Maps a type tag given as a number, bigint, hex string or short name
 * (`legacy`, `eip2930`, `eip1559`, `eip4844`, `eip7702`) to its
 * TransactionType.
 */
export function resolveTxType(input: unknown): TransactionType {
  if (typeof input === 'number' && isTransactionType(input)) return input
  if (typeof input === 'bigint' && input >= 0n && input <= 4n) {
    const n = Number(input)
    if (isTransactionType(n)) return n
  }
  if (typeof input === 'string') {
    if (isTypeName(input)) return TransactionTypeName[input]
    if (/^0x0*[0-4]$/.test(input)) {
      const n = Number.parseInt(input.slice(2), 16)
      if (isTransactionType(n)) return n
    }
  }
  throw new UnsupportedTransactionTypeError(input)
}

const zAccessListItem = z.object({
  address: zAddress(),
  storageKeys: z.array(zBytes32()),
})

const zYParity = zBigInt({ max: 1n }).transform((v): 0 | 1 => (v === 0n ? 0 : 1))

const zSignedAuthorization = z
  .object({
    chainId: zBigInt(),
    address: zAddress(),
    nonce: zBigInt({ max: MAX_UINT64 }),
    yParity: zYParity,
    r: zBigInt(),
    s: zBigInt(),
  })
  .transform((auth): SignedAuthorization => Object.freeze(auth))

const zTxRequest = z
  .object({
    type: z
      .custom<TxTypeInput>((val) => val !== undefined)
      .transform((val) => resolveTxType(val))
      .optional(),
    chainId: zBigInt().optional(),
    nonce: zBigInt({ max: MAX_UINT64 }).optional(),
    gasLimit: zBigInt().optional(),
    to: zAddress()
      .nullish()
      .transform((to) => to ?? undefined),
    value: zBigInt().optional(),
    data: zBytes().optional(),
    gasPrice: zBigInt().optional(),
    maxPriorityFeePerGas: zBigInt().optional(),
    maxFeePerGas: zBigInt().optional(),
    accessList: z.array(zAccessListItem).optional(),
    maxFeePerBlobGas: zBigInt().optional(),
    blobVersionedHashes: z.array(zBytes32()).optional(),
    authorizationList: z.array(zSignedAuthorization).optional(),
  })
  .strict()

/**
 * Loose, caller-facing transaction fields. Quantities take bigint, safe
 * integers or hex; byte fields take Uint8Array or hex; `to` takes an Address,
 * 20 bytes or a hex string, and `null` for contract creation.
 */
export type TxRequestInput = z.input<typeof zTxRequest>

/**
 * Normalised transaction fields before a shape is chosen
 */
export type TxRequest = Readonly<z.output<typeof zTxRequest>>

export function createTxRequest(input: TxRequestInput): TxRequest {
  if (input.type !== undefined) resolveTxType(input.type)

  const result = zTxRequest.safeParse(input)
  if (!result.success) {
    const { path, message } = firstIssue(result.error)
    throw new InvalidTransactionError(
      `Invalid transaction request at ${path || '<root>'}: ${message}`,
      { metadata: { path }, cause: result.error },
    )
  }
  return Object.freeze(result.data)
}

/**
 * Returns a new request with `updates` laid over `base`. A key present in
 * `updates` with value `undefined` clears the field.
 */
export function withTxFields(
  base: TxRequest,
  updates: TxRequestInput,
): TxRequest {
  return createTxRequest({ ...base, ...updates })
}

/**
 * Picks the transaction shape for a request. An explicit `type` always wins.
 * Otherwise field groups decide, and groups that belong to different shapes
 * are rejected instead of one being preferred.
 */
export function inferTransactionType(request: TxRequest): TransactionType {
  if (request.type !== undefined) return request.type

  const hasBlob =
    request.blobVersionedHashes !== undefined ||
    request.maxFeePerBlobGas !== undefined
  const hasAuthorizations = request.authorizationList !== undefined
  const hasFeeMarket =
    request.maxFeePerGas !== undefined ||
    request.maxPriorityFeePerGas !== undefined
  const hasGasPrice = request.gasPrice !== undefined

  if (hasBlob && hasAuthorizations) {
    throw new InvalidTransactionError(
      'Cannot infer transaction type: blob fields and authorizationList are both set',
    )
  }
  if (hasGasPrice && (hasFeeMarket || hasBlob || hasAuthorizations)) {
    throw new InvalidTransactionError(
      'Cannot infer transaction type: gasPrice is set together with fee market fields',
    )
  }

  if (hasBlob) return TransactionType.BlobEIP4844
  if (hasAuthorizations) return TransactionType.EOACodeEIP7702
  if (hasFeeMarket) return TransactionType.FeeMarketEIP1559
  if (request.accessList !== undefined) return TransactionType.AccessListEIP2930
  return TransactionType.Legacy
}
