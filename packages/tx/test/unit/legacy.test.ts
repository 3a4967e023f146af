import { bytesToHex, hexToBytes, keccak256 } from '@chainforge/utils'
import { privateKeyToAccount } from 'viem/accounts'
import { describe, expect, it } from 'vitest'
import {
  decodeTx,
  LegacyTx,
  PrivateKeySigner,
  recoverSender,
  resolveTx,
  type Signer,
  signTransaction,
  signTx,
} from '../../src'

const PRIVATE_KEY = `0x${'46'.repeat(32)}` as const

// Example transaction from EIP-155
const request = {
  nonce: 9,
  gasPrice: 20_000_000_000n,
  gasLimit: 21_000,
  to: `0x${'35'.repeat(20)}`,
  value: 1_000_000_000_000_000_000n,
  chainId: 1,
}

const fixedSigner = (recoveryId: 0 | 1): Signer => ({
  sign: async () => ({ r: 1n, s: 1n, recoveryId }),
})

describe('LegacyTx', () => {
  it('builds the EIP-155 signing preimage', () => {
    const tx = resolveTx(request)
    expect(tx).toBeInstanceOf(LegacyTx)
    expect(bytesToHex(tx.getMessageToSign())).toBe(
      '0xec098504a817c800825208943535353535353535353535353535353535353535880de0b6b3a764000080018080',
    )
    expect(bytesToHex(tx.getHashedMessageToSign())).toBe(
      '0xdaf5a779ae972f972197303d7b574746c7ef83eadac0f2791ad23db92e4c8e53',
    )
  })

  it('serializes an unsigned transaction as its preimage', () => {
    const tx = resolveTx(request)
    expect(tx.isSigned()).toBe(false)
    expect(tx.serialize()).toEqual(tx.getMessageToSign())
    expect(() => tx.hash()).toThrow('unsigned transaction')
  })

  it('signs the EIP-155 example', async () => {
    const signer = new PrivateKeySigner(PRIVATE_KEY)
    const { tx, serialized, hash } = await signTransaction(request, signer)

    expect(tx.v).toBe(37n)
    expect(tx.r).toBe(
      18515461264373351373200002665853028612451056578545711640558177340181847433846n,
    )
    expect(tx.s).toBe(
      46948507304638947509940763649030358759909902576025900602547168820602576006531n,
    )
    expect(bytesToHex(serialized)).toBe(
      '0xf86c098504a817c800825208943535353535353535353535353535353535353535880de0b6b3a76400008025a028ef61340bd939bc2195fe537567866003e1a15d3c71ff63e1590620aa636276a067cbe9d8997f761aecb703304b3800ccf555c9f3dc64214b297fb1966a3b6d83',
    )
    expect(hash).toEqual(keccak256(serialized))
  })

  it('matches viem for the same key', async () => {
    const account = privateKeyToAccount(PRIVATE_KEY)
    const viemSerialized = await account.signTransaction({
      type: 'legacy',
      nonce: 9,
      gasPrice: 20_000_000_000n,
      gas: 21_000n,
      to: `0x${'35'.repeat(20)}`,
      value: 1_000_000_000_000_000_000n,
      chainId: 1,
    })
    const { serialized } = await signTransaction(
      request,
      new PrivateKeySigner(PRIVATE_KEY),
    )
    expect(bytesToHex(serialized)).toBe(viemSerialized)
  })

  it('computes v as chainId * 2 + 35 + recoveryId', async () => {
    const tx = resolveTx(request)
    const even = await signTx(tx, fixedSigner(0))
    const odd = await signTx(tx, fixedSigner(1))
    expect(even.v).toBe(37n)
    expect(odd.v).toBe(38n)
    expect(odd.recoveryId()).toBe(1)

    const onChain5 = await signTx(resolveTx({ ...request, chainId: 5 }), fixedSigner(1))
    expect(onChain5.v).toBe(46n)
  })

  it('leaves the unsigned transaction untouched', async () => {
    const tx = resolveTx(request)
    const signed = await signTx(tx, fixedSigner(0))
    expect(tx.isSigned()).toBe(false)
    expect(signed.isSigned()).toBe(true)
    expect(Object.isFrozen(signed)).toBe(true)
  })

  it('recovers the sender', async () => {
    const signer = new PrivateKeySigner(PRIVATE_KEY)
    const { tx } = await signTransaction(request, signer)
    expect(recoverSender(tx).equals(signer.address)).toBe(true)
    expect(signer.address.toChecksumString()).toBe(
      privateKeyToAccount(PRIVATE_KEY).address,
    )
  })

  it('decodes signed EIP-155 bytes', () => {
    const tx = decodeTx(
      '0xf86c098504a817c800825208943535353535353535353535353535353535353535880de0b6b3a76400008025a028ef61340bd939bc2195fe537567866003e1a15d3c71ff63e1590620aa636276a067cbe9d8997f761aecb703304b3800ccf555c9f3dc64214b297fb1966a3b6d83',
    )
    if (!(tx instanceof LegacyTx)) throw new Error('expected a legacy transaction')
    expect(tx.chainId).toBe(1n)
    expect(tx.nonce).toBe(9n)
    expect(tx.gasPrice).toBe(20_000_000_000n)
    expect(tx.to?.toString()).toBe(`0x${'35'.repeat(20)}`)
    expect(tx.v).toBe(37n)
    expect(tx.recoveryId()).toBe(0)
  })

  it('decodes unsigned EIP-155 bytes', () => {
    const tx = decodeTx(
      '0xec098504a817c800825208943535353535353535353535353535353535353535880de0b6b3a764000080018080',
    )
    expect(tx.isSigned()).toBe(false)
    expect(tx.chainId).toBe(1n)
    expect(bytesToHex(tx.getHashedMessageToSign())).toBe(
      '0xdaf5a779ae972f972197303d7b574746c7ef83eadac0f2791ad23db92e4c8e53',
    )
  })

  it('handles transactions without replay protection', async () => {
    const unprotected = new LegacyTx({
      nonce: 0n,
      gasPrice: 1n,
      gasLimit: 21_000n,
      to: undefined,
      value: 0n,
      data: hexToBytes('0x6000'),
    })
    const signer = new PrivateKeySigner(PRIVATE_KEY)
    const signed = await signTx(unprotected, signer)
    expect(signed.v === 27n || signed.v === 28n).toBe(true)

    const decoded = decodeTx(signed.serialize())
    expect(decoded.chainId).toBeUndefined()
    expect(decoded.v).toBe(signed.v)
    expect(decoded.to).toBeUndefined()
    expect(recoverSender(decoded).equals(signer.address)).toBe(true)
  })

  it('rejects a v that does not match the chain', () => {
    expect(
      () =>
        new LegacyTx(
          {
            chainId: 1n,
            nonce: 0n,
            gasPrice: 0n,
            gasLimit: 0n,
            value: 0n,
            data: new Uint8Array(0),
          },
          { v: 27n, r: 1n, s: 1n },
        ),
    ).toThrow('Invalid v 27: expected 37 or 38')
  })
})
