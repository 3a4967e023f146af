import { RLP, type RlpItem } from '@chainforge/rlp'
import {
  Address,
  type BytesLike,
  DecodeError,
  toBytes,
  UnsupportedTransactionTypeError,
} from '@chainforge/utils'
import { authorizationFromRlp, decodeQuantity } from './authorization'
import { paramsTx } from './params'
import {
  AccessListTx,
  BlobTx,
  DynamicFeeTx,
  LegacyTx,
  SetCodeTx,
  type DynamicFeeTxFields,
  type TxSignature,
  type TypedTransaction,
} from './tx'
import {
  type AccessListItem,
  type SignedAuthorization,
  TransactionType,
} from './types'

const { chainIdOffset, homesteadOffset } = paramsTx[155]

/**
 * Parses signed or unsigned transaction bytes back into a transaction.
 * Legacy bytes start with an RLP list prefix (>= 0xc0); typed bytes start
 * with their type byte.
 */
export function decodeTx(input: BytesLike): TypedTransaction {
  const bytes = toBytes(input)
  if (bytes.length === 0) {
    throw new DecodeError('Cannot decode an empty transaction')
  }
  const first = bytes[0]
  if (first >= 0xc0) return decodeLegacy(bytes)
  if (first >= 0x80) {
    throw new DecodeError(
      `Invalid transaction envelope: leading byte 0x${first.toString(16)}`,
    )
  }

  const fields = expectList(RLP.decode(bytes.subarray(1)), 'transaction')
  switch (first) {
    case TransactionType.AccessListEIP2930:
      return decodeAccessListTx(fields)
    case TransactionType.FeeMarketEIP1559:
      return decodeDynamicFeeTx(fields)
    case TransactionType.BlobEIP4844:
      return decodeBlobTx(fields)
    case TransactionType.EOACodeEIP7702:
      return decodeSetCodeTx(fields)
    default:
      throw new UnsupportedTransactionTypeError(first)
  }
}

function decodeLegacy(bytes: Uint8Array): LegacyTx {
  const fields = expectList(RLP.decode(bytes), 'legacy transaction')
  if (fields.length !== 6 && fields.length !== 9) {
    throw new DecodeError(
      `Invalid legacy transaction: expected 6 or 9 fields, got ${fields.length}`,
    )
  }
  const [nonce, gasPrice, gasLimit, to, value, data] = fields
  const base = {
    nonce: quantityAt(nonce, 'nonce'),
    gasPrice: quantityAt(gasPrice, 'gasPrice'),
    gasLimit: quantityAt(gasLimit, 'gasLimit'),
    to: optionalAddress(to),
    value: quantityAt(value, 'value'),
    data: bytesAt(data, 'data'),
  }
  if (fields.length === 6) return new LegacyTx(base)

  const v = quantityAt(fields[6], 'v')
  const r = quantityAt(fields[7], 'r')
  const s = quantityAt(fields[8], 's')

  // EIP-155 unsigned form: [..., chainId, 0, 0]
  if (r === 0n && s === 0n) return new LegacyTx({ ...base, chainId: v })

  if (v === homesteadOffset || v === homesteadOffset + 1n) {
    return new LegacyTx(base, { v, r, s })
  }
  if (v < chainIdOffset) {
    throw new DecodeError(`Invalid legacy transaction: v ${v}`)
  }
  const chainId = (v - chainIdOffset) / 2n
  return new LegacyTx({ ...base, chainId }, { v, r, s })
}

function decodeAccessListTx(fields: RlpItem[]): AccessListTx {
  const signature = splitSignature(fields, 8, 'eip2930')
  const [chainId, nonce, gasPrice, gasLimit, to, value, data, accessList] =
    fields
  return new AccessListTx(
    {
      chainId: quantityAt(chainId, 'chainId'),
      nonce: quantityAt(nonce, 'nonce'),
      gasPrice: quantityAt(gasPrice, 'gasPrice'),
      gasLimit: quantityAt(gasLimit, 'gasLimit'),
      to: optionalAddress(to),
      value: quantityAt(value, 'value'),
      data: bytesAt(data, 'data'),
      accessList: decodeAccessList(accessList),
    },
    signature,
  )
}

function dynamicFeeFields(fields: RlpItem[]): DynamicFeeTxFields {
  const [
    chainId,
    nonce,
    maxPriorityFeePerGas,
    maxFeePerGas,
    gasLimit,
    to,
    value,
    data,
    accessList,
  ] = fields
  return {
    chainId: quantityAt(chainId, 'chainId'),
    nonce: quantityAt(nonce, 'nonce'),
    maxPriorityFeePerGas: quantityAt(maxPriorityFeePerGas, 'maxPriorityFeePerGas'),
    maxFeePerGas: quantityAt(maxFeePerGas, 'maxFeePerGas'),
    gasLimit: quantityAt(gasLimit, 'gasLimit'),
    to: optionalAddress(to),
    value: quantityAt(value, 'value'),
    data: bytesAt(data, 'data'),
    accessList: decodeAccessList(accessList),
  }
}

function decodeDynamicFeeTx(fields: RlpItem[]): DynamicFeeTx {
  const signature = splitSignature(fields, 9, 'eip1559')
  return new DynamicFeeTx(dynamicFeeFields(fields), signature)
}

function decodeBlobTx(fields: RlpItem[]): BlobTx {
  const signature = splitSignature(fields, 11, 'eip4844')
  const common = dynamicFeeFields(fields)
  const hashes = expectList(fields[10], 'blobVersionedHashes').map((item, i) =>
    bytesAt(item, `blobVersionedHashes[${i}]`),
  )
  return new BlobTx(
    {
      ...common,
      to: requireAddress(common.to, 'eip4844'),
      maxFeePerBlobGas: quantityAt(fields[9], 'maxFeePerBlobGas'),
      blobVersionedHashes: hashes,
    },
    signature,
  )
}

function decodeSetCodeTx(fields: RlpItem[]): SetCodeTx {
  const signature = splitSignature(fields, 10, 'eip7702')
  const common = dynamicFeeFields(fields)
  const authorizationList: SignedAuthorization[] = expectList(
    fields[9],
    'authorizationList',
  ).map((item) => authorizationFromRlp(item))
  return new SetCodeTx(
    {
      ...common,
      to: requireAddress(common.to, 'eip7702'),
      authorizationList,
    },
    signature,
  )
}

/**
 * Typed payloads have `unsignedCount` fields, or that many plus
 * `yParity, r, s` once signed
 */
function splitSignature(
  fields: RlpItem[],
  unsignedCount: number,
  name: string,
): TxSignature | undefined {
  if (fields.length === unsignedCount) return undefined
  if (fields.length !== unsignedCount + 3) {
    throw new DecodeError(
      `Invalid ${name} transaction: expected ${unsignedCount} or ${unsignedCount + 3} fields, got ${fields.length}`,
    )
  }
  return {
    v: quantityAt(fields[unsignedCount], 'yParity'),
    r: quantityAt(fields[unsignedCount + 1], 'r'),
    s: quantityAt(fields[unsignedCount + 2], 's'),
  }
}

function decodeAccessList(item: RlpItem): AccessListItem[] {
  return expectList(item, 'accessList').map((entry, i) => {
    const pair = expectList(entry, `accessList[${i}]`)
    if (pair.length !== 2) {
      throw new DecodeError(
        `Invalid accessList[${i}]: expected [address, storageKeys]`,
      )
    }
    const address = optionalAddress(pair[0])
    if (address === undefined) {
      throw new DecodeError(`Invalid accessList[${i}]: empty address`)
    }
    const storageKeys = expectList(pair[1], `accessList[${i}].storageKeys`).map(
      (key, j) => bytesAt(key, `accessList[${i}].storageKeys[${j}]`),
    )
    return { address, storageKeys }
  })
}

function expectList(item: RlpItem, name: string): RlpItem[] {
  if (!Array.isArray(item)) {
    throw new DecodeError(`Invalid ${name}: expected an RLP list`)
  }
  return item
}

function bytesAt(item: RlpItem, name: string): Uint8Array {
  if (!(item instanceof Uint8Array)) {
    throw new DecodeError(`Invalid ${name}: expected a byte string`)
  }
  return item
}

function quantityAt(item: RlpItem, name: string): bigint {
  return decodeQuantity(bytesAt(item, name), name)
}

function optionalAddress(item: RlpItem): Address | undefined {
  const bytes = bytesAt(item, 'to')
  if (bytes.length === 0) return undefined
  if (bytes.length !== 20) {
    throw new DecodeError(`Invalid address: expected 20 bytes, got ${bytes.length}`)
  }
  return new Address(bytes)
}

function requireAddress(to: Address | undefined, name: string): Address {
  if (to === undefined) {
    throw new DecodeError(`Invalid ${name} transaction: to is required`)
  }
  return to
}
