/**
 * Protocol constants the transaction formats depend on, keyed by EIP number
 */
export const paramsTx = {
  /**
   * Simple replay attack protection
   */
  155: {
    chainIdOffset: 35n, // v = chainId * 2 + chainIdOffset + recoveryId
    homesteadOffset: 27n, // v of a signature that commits to no chain
  },
  /**
   * Nonce cap
   */
  2681: {
    maxNonce: 2n ** 64n - 1n,
  },
  /**
   * Shard Blob Transactions
   */
  4844: {
    blobCommitmentVersionKzg: 1, // The number indicated a versioned hash is a KZG commitment
    maxBlobsPerTx: 6, // Upper bound on versioned hashes a single transaction carries
  },
  /**
   * Set EOA account code
   */
  7702: {
    authorizationMagic: 0x05, // Domain byte in front of every authorization preimage
  },
} as const
