import { InvalidTransactionError } from '@chainforge/utils'
import debug from 'debug'
import { defaultSignerConfig, type SignerConfig } from './config'
import {
  createTxRequest,
  inferTransactionType,
  type TxRequest,
  type TxRequestInput,
} from './request'
import {
  AccessListTx,
  BlobTx,
  DynamicFeeTx,
  LegacyTx,
  SetCodeTx,
  type TypedTransaction,
} from './tx'
import { TransactionType, txTypeName } from './types'

const log = debug('chainforge:tx:resolve')

type RequestField = Exclude<keyof TxRequest, 'type'>

const COMMON_FIELDS: readonly RequestField[] = [
  'chainId',
  'nonce',
  'gasLimit',
  'to',
  'value',
  'data',
]
const FEE_MARKET_FIELDS: readonly RequestField[] = [
  ...COMMON_FIELDS,
  'maxPriorityFeePerGas',
  'maxFeePerGas',
  'accessList',
]

/**
 * Request fields each shape carries
 */
const CARRIED_FIELDS: Record<TransactionType, readonly RequestField[]> = {
  [TransactionType.Legacy]: [...COMMON_FIELDS, 'gasPrice'],
  [TransactionType.AccessListEIP2930]: [...COMMON_FIELDS, 'gasPrice', 'accessList'],
  [TransactionType.FeeMarketEIP1559]: FEE_MARKET_FIELDS,
  [TransactionType.BlobEIP4844]: [
    ...FEE_MARKET_FIELDS,
    'maxFeePerBlobGas',
    'blobVersionedHashes',
  ],
  [TransactionType.EOACodeEIP7702]: [...FEE_MARKET_FIELDS, 'authorizationList'],
}

function ignoredFields(request: TxRequest, type: TransactionType): string[] {
  const carried: readonly string[] = CARRIED_FIELDS[type]
  return Object.entries(request)
    .filter(([key, value]) => key !== 'type' && value !== undefined)
    .filter(([key]) => !carried.includes(key))
    .map(([key]) => key)
}

/**
 * Builds the one concrete transaction a request describes. Numeric fields
 * left out default to 0 and `data` to empty bytes; `chainId` falls back to
 * the config's `defaultChainId`. With an explicit `type`, fields that shape
 * does not carry are dropped.
 */
export function resolveTx(
  input: TxRequestInput | TxRequest,
  config: SignerConfig = defaultSignerConfig,
): TypedTransaction {
  const request = createTxRequest(input)
  const type = inferTransactionType(request)

  const ignored = ignoredFields(request, type)
  if (ignored.length > 0) {
    log('ignoring %s for %s transaction', ignored.join(', '), txTypeName(type))
  }

  const chainId = request.chainId ?? config.defaultChainId
  if (chainId === undefined) {
    throw new InvalidTransactionError(
      'chainId is required: set it on the request or as defaultChainId in the signer config',
    )
  }
  const common = {
    chainId,
    nonce: request.nonce ?? 0n,
    gasLimit: request.gasLimit ?? 0n,
    to: request.to,
    value: request.value ?? 0n,
    data: request.data ?? new Uint8Array(0),
  }
  const feeMarket = {
    ...common,
    maxPriorityFeePerGas: request.maxPriorityFeePerGas ?? 0n,
    maxFeePerGas: request.maxFeePerGas ?? 0n,
    accessList: request.accessList ?? [],
  }

  switch (type) {
    case TransactionType.Legacy:
      return new LegacyTx({ ...common, gasPrice: request.gasPrice ?? 0n })
    case TransactionType.AccessListEIP2930:
      return new AccessListTx({
        ...common,
        gasPrice: request.gasPrice ?? 0n,
        accessList: request.accessList ?? [],
      })
    case TransactionType.FeeMarketEIP1559:
      return new DynamicFeeTx(feeMarket)
    case TransactionType.BlobEIP4844: {
      const to = requireRecipient(request, type)
      return new BlobTx({
        ...feeMarket,
        to,
        maxFeePerBlobGas: request.maxFeePerBlobGas ?? 0n,
        blobVersionedHashes: request.blobVersionedHashes ?? [],
      })
    }
    case TransactionType.EOACodeEIP7702: {
      const to = requireRecipient(request, type)
      return new SetCodeTx({
        ...feeMarket,
        to,
        authorizationList: request.authorizationList ?? [],
      })
    }
  }
}

function requireRecipient(request: TxRequest, type: TransactionType) {
  if (request.to === undefined) {
    throw new InvalidTransactionError(
      `${txTypeName(type)} transactions cannot create contracts: to is required`,
    )
  }
  return request.to
}
