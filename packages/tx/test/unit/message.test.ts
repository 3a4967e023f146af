import { bytesToHex, hexToBytes, SigningError } from '@chainforge/utils'
import { hashMessage as viemHashMessage } from 'viem'
import { privateKeyToAccount } from 'viem/accounts'
import { describe, expect, it } from 'vitest'
import {
  hashMessage,
  PrivateKeySigner,
  recoverMessageAddress,
  recoverTypedDataAddress,
  type Signer,
  signatureFromBytes,
  signatureToBytes,
  signMessage,
  signTypedData,
} from '../../src'

const PRIVATE_KEY = `0x${'01'.repeat(32)}` as const

const signer = new PrivateKeySigner(PRIVATE_KEY)
const account = privateKeyToAccount(PRIVATE_KEY)

const permit = {
  domain: {
    name: 'Test Token',
    version: '1',
    chainId: 1,
    verifyingContract: `0x${'ab'.repeat(20)}`,
  },
  types: {
    Permit: [
      { name: 'owner', type: 'address' },
      { name: 'spender', type: 'address' },
      { name: 'value', type: 'uint256' },
      { name: 'nonce', type: 'uint256' },
      { name: 'deadline', type: 'uint256' },
    ],
  },
  primaryType: 'Permit',
  message: {
    owner: `0x${'11'.repeat(20)}`,
    spender: `0x${'22'.repeat(20)}`,
    value: 1000n,
    nonce: 0n,
    deadline: 1_900_000_000n,
  },
} as const

describe('hashMessage', () => {
  it('prefixes text with its UTF-8 byte length', () => {
    expect(bytesToHex(hashMessage('hello world'))).toBe(
      viemHashMessage('hello world'),
    )
    expect(bytesToHex(hashMessage('héllo'))).toBe(viemHashMessage('héllo'))
  })

  it('hashes raw bytes as given', () => {
    expect(bytesToHex(hashMessage({ raw: '0x68656c6c6f' }))).toBe(
      viemHashMessage({ raw: '0x68656c6c6f' }),
    )
    expect(hashMessage({ raw: '0x68656c6c6f' })).toEqual(hashMessage('hello'))
  })
})

describe('signMessage', () => {
  it('matches viem', async () => {
    const { serialized } = await signMessage('hello world', signer)
    expect(serialized).toBe(await account.signMessage({ message: 'hello world' }))
  })

  it('recovers the signer from the signature', async () => {
    const { serialized, signature } = await signMessage('gm', signer)
    expect(recoverMessageAddress('gm', serialized).toString()).toBe(
      signer.address.toString(),
    )
    expect(recoverMessageAddress('gm', signature).equals(signer.address)).toBe(
      true,
    )
  })

  it('wraps signer failures', async () => {
    const failing: Signer = { sign: () => Promise.reject('locked') }
    await expect(signMessage('gm', failing)).rejects.toBeInstanceOf(
      SigningError,
    )
  })
})

describe('signTypedData', () => {
  it('matches viem', async () => {
    const { serialized } = await signTypedData(permit, signer)
    expect(serialized).toBe(await account.signTypedData(permit))
  })

  it('recovers the signer from the signature', async () => {
    const { serialized } = await signTypedData(permit, signer)
    expect(
      recoverTypedDataAddress(permit, serialized).equals(signer.address),
    ).toBe(true)
  })
})

describe('signature bytes', () => {
  it('writes v as 27 or 28', () => {
    const bytes = signatureToBytes({ r: 1n, s: 2n, recoveryId: 1 })
    expect(bytes.length).toBe(65)
    expect(bytes[31]).toBe(1)
    expect(bytes[63]).toBe(2)
    expect(bytes[64]).toBe(28)
  })

  it('reads v as 0/1 or 27/28', () => {
    const body = `${'00'.repeat(31)}01${'00'.repeat(31)}02`
    expect(signatureFromBytes(`0x${body}1b`)).toEqual({
      r: 1n,
      s: 2n,
      recoveryId: 0,
    })
    expect(signatureFromBytes(hexToBytes(`0x${body}01`)).recoveryId).toBe(1)
  })

  it('rejects bad lengths and v values', () => {
    expect(() => signatureFromBytes(new Uint8Array(64))).toThrow(
      'Invalid signature: expected 65 bytes, got 64',
    )
    expect(() =>
      signatureFromBytes(`0x${'00'.repeat(64)}1d`),
    ).toThrow('Invalid signature: v 29')
  })
})
