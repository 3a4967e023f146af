import { InvalidTransactionError, MAX_UINT256 } from '@chainforge/utils'
import { paramsTx } from '../params'
import type { AccessList, SignedAuthorization } from '../types'
import type { TxSignature } from './helpers'

export function assertQuantity(
  name: string,
  value: bigint,
  max: bigint = MAX_UINT256,
): void {
  if (value < 0n || value > max) {
    throw new InvalidTransactionError(
      `${name} out of range: ${value} is not in [0, ${max}]`,
      { metadata: { field: name } },
    )
  }
}

export function assertNonce(nonce: bigint): void {
  assertQuantity('nonce', nonce, paramsTx[2681].maxNonce)
}

export function assertFeeCaps(
  maxPriorityFeePerGas: bigint,
  maxFeePerGas: bigint,
): void {
  assertQuantity('maxPriorityFeePerGas', maxPriorityFeePerGas)
  assertQuantity('maxFeePerGas', maxFeePerGas)
  if (maxPriorityFeePerGas > maxFeePerGas) {
    throw new InvalidTransactionError(
      `maxPriorityFeePerGas (${maxPriorityFeePerGas}) exceeds maxFeePerGas (${maxFeePerGas})`,
    )
  }
}

export function assertAccessList(list: AccessList): void {
  for (const [i, item] of list.entries()) {
    for (const [j, key] of item.storageKeys.entries()) {
      if (key.length !== 32) {
        throw new InvalidTransactionError(
          `accessList[${i}].storageKeys[${j}] must be 32 bytes, got ${key.length}`,
        )
      }
    }
  }
}

export function assertBlobVersionedHashes(hashes: readonly Uint8Array[]): void {
  const { blobCommitmentVersionKzg, maxBlobsPerTx } = paramsTx[4844]
  if (hashes.length === 0) {
    throw new InvalidTransactionError(
      'Blob transactions must carry at least one blob versioned hash',
    )
  }
  if (hashes.length > maxBlobsPerTx) {
    throw new InvalidTransactionError(
      `Too many blob versioned hashes: ${hashes.length} exceeds ${maxBlobsPerTx}`,
    )
  }
  for (const [i, hash] of hashes.entries()) {
    if (hash.length !== 32) {
      throw new InvalidTransactionError(
        `blobVersionedHashes[${i}] must be 32 bytes, got ${hash.length}`,
      )
    }
    if (hash[0] !== blobCommitmentVersionKzg) {
      throw new InvalidTransactionError(
        `blobVersionedHashes[${i}] has version ${hash[0]}, expected ${blobCommitmentVersionKzg}`,
      )
    }
  }
}

export function assertAuthorizationList(
  list: readonly SignedAuthorization[],
): void {
  if (list.length === 0) {
    throw new InvalidTransactionError(
      'Set-code transactions must carry at least one authorization',
    )
  }
  for (const [i, auth] of list.entries()) {
    assertQuantity(`authorizationList[${i}].chainId`, auth.chainId)
    assertQuantity(
      `authorizationList[${i}].nonce`,
      auth.nonce,
      paramsTx[2681].maxNonce,
    )
    assertQuantity(`authorizationList[${i}].r`, auth.r)
    assertQuantity(`authorizationList[${i}].s`, auth.s)
  }
}

/**
 * Typed transactions store yParity in `v`, so it must be 0 or 1.
 */
export function assertYParitySignature(sig: TxSignature | undefined): void {
  if (sig === undefined) return
  if (sig.v !== 0n && sig.v !== 1n) {
    throw new InvalidTransactionError(`yParity must be 0 or 1, got ${sig.v}`)
  }
  assertQuantity('r', sig.r)
  assertQuantity('s', sig.s)
}
