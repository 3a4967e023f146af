import { SECP256K1_ORDER, SigningError } from '@chainforge/utils'
import { describe, expect, it, vi } from 'vitest'
import {
  createSignerConfig,
  PrivateKeySigner,
  resolveTx,
  type SignatureValues,
  type Signer,
  signTransaction,
  signTx,
} from '../../src'

const request = { chainId: 1, maxFeePerGas: 2, gasLimit: 21_000 }

const returning = (sig: SignatureValues): Signer => ({
  sign: async () => sig,
})

describe('signTx', () => {
  it('passes the signing hash to the signer', async () => {
    const tx = resolveTx(request)
    const sign = vi.fn(async (_hash: Uint8Array) => ({
      r: 1n,
      s: 2n,
      recoveryId: 0 as const,
    }))
    const signed = await signTx(tx, { sign })
    expect(sign).toHaveBeenCalledTimes(1)
    expect(sign.mock.calls[0]).toEqual([
      tx.getHashedMessageToSign(),
      { signal: undefined },
    ])
    expect(signed.r).toBe(1n)
    expect(signed.s).toBe(2n)
    expect(signed.v).toBe(0n)
  })

  it('hashes with the configured hash function', async () => {
    const hash = vi.fn((_data: Uint8Array) => new Uint8Array(32).fill(7))
    const sign = vi.fn(async (_hash: Uint8Array) => ({
      r: 1n,
      s: 1n,
      recoveryId: 1 as const,
    }))
    const config = createSignerConfig({ hash })
    await signTx(resolveTx(request), { sign }, { config })
    expect(hash).toHaveBeenCalledTimes(1)
    expect(sign.mock.calls[0]?.[0]).toEqual(new Uint8Array(32).fill(7))
  })

  it('takes the chain id from the config', async () => {
    const config = createSignerConfig({ defaultChainId: 5 })
    const { tx } = await signTransaction(
      { maxFeePerGas: 2 },
      returning({ r: 1n, s: 1n, recoveryId: 0 }),
      { config },
    )
    expect(tx.chainId).toBe(5n)
  })

  it('prefers the request chain id over the config', () => {
    const config = createSignerConfig({ defaultChainId: 5 })
    expect(resolveTx(request, config).chainId).toBe(1n)
  })
})

describe('signer failures', () => {
  it('passes signing errors through unchanged', async () => {
    const rejection = new SigningError('user rejected request')
    const signer: Signer = {
      sign: async () => {
        throw rejection
      },
    }
    await expect(signTx(resolveTx(request), signer)).rejects.toBe(rejection)
  })

  it('wraps other errors and keeps the cause', async () => {
    const cause = new Error('connection lost')
    const sign = vi.fn(async (): Promise<SignatureValues> => {
      throw cause
    })
    const err = await signTx(resolveTx(request), { sign }).then(
      () => undefined,
      (e: unknown) => e,
    )
    expect(err).toBeInstanceOf(SigningError)
    expect(err).toMatchObject({
      message: 'connection lost',
      code: 'SIGNER_FAILED',
      cause,
    })
    expect(sign).toHaveBeenCalledTimes(1)
  })

  it('keeps a string rejection as the message', async () => {
    const signer: Signer = { sign: () => Promise.reject('user rejected') }
    const err = await signTx(resolveTx(request), signer).then(
      () => undefined,
      (e: unknown) => e,
    )
    expect(err).toBeInstanceOf(SigningError)
    expect(err).toMatchObject({
      message: 'user rejected',
      code: 'SIGNER_FAILED',
      cause: 'user rejected',
    })
  })

  it('wraps a rejection without a reason', async () => {
    const signer: Signer = { sign: () => Promise.reject() }
    const err = await signTx(resolveTx(request), signer).then(
      () => undefined,
      (e: unknown) => e,
    )
    expect(err).toBeInstanceOf(SigningError)
    expect(err).toMatchObject({
      message: 'Signer rejected',
      code: 'SIGNER_FAILED',
    })
  })

  it('wraps a null rejection', async () => {
    const signer: Signer = { sign: () => Promise.reject(null) }
    await expect(signTx(resolveTx(request), signer)).rejects.toMatchObject({
      message: 'Signer rejected',
      code: 'SIGNER_FAILED',
    })
  })

  it('reports an abort while the signer is pending', async () => {
    const controller = new AbortController()
    const pendingSigner: Signer = {
      sign: () => new Promise<SignatureValues>(() => {}),
    }
    const pending = signTx(resolveTx(request), pendingSigner, {
      signal: controller.signal,
    })
    controller.abort()
    await expect(pending).rejects.toMatchObject({
      message: 'Signing aborted',
      code: 'SIGNER_ABORTED',
    })
  })

  it('reports an abort before signing starts', async () => {
    const controller = new AbortController()
    controller.abort()
    const signer = new PrivateKeySigner(`0x${'01'.repeat(32)}`)
    await expect(
      signTx(resolveTx(request), signer, { signal: controller.signal }),
    ).rejects.toMatchObject({ code: 'SIGNER_ABORTED' })
  })

  it.each<[SignatureValues, string]>([
    [{ r: 0n, s: 1n, recoveryId: 0 }, 'Invalid signature: r is out of range'],
    [
      { r: 1n, s: SECP256K1_ORDER, recoveryId: 0 },
      'Invalid signature: s is out of range',
    ],
    [
      { r: 1n, s: SECP256K1_ORDER - 1n, recoveryId: 0 },
      'Invalid signature: s is not in the lower half of the curve order',
    ],
  ])('rejects malformed signature %#', async (sig, message) => {
    await expect(
      signTx(resolveTx(request), returning(sig)),
    ).rejects.toMatchObject({ message, code: 'INVALID_SIGNATURE' })
  })
})

describe('PrivateKeySigner', () => {
  it('rejects keys outside the curve order', () => {
    expect(() => new PrivateKeySigner(new Uint8Array(32))).toThrow(
      'Invalid private key',
    )
    expect(() => new PrivateKeySigner('0x01')).toThrow('Invalid private key')
  })

  it('only signs 32-byte hashes', async () => {
    const signer = new PrivateKeySigner(`0x${'01'.repeat(32)}`)
    await expect(signer.sign(new Uint8Array(31))).rejects.toThrow(
      'Expected a 32-byte hash, got 31 bytes',
    )
  })

  it('produces low-s signatures', async () => {
    const signer = new PrivateKeySigner(`0x${'01'.repeat(32)}`)
    const sig = await signer.sign(new Uint8Array(32).fill(9))
    expect(sig.s <= SECP256K1_ORDER / 2n).toBe(true)
    expect([0, 1]).toContain(sig.recoveryId)
  })
})
