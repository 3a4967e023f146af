import { bytesToHex, EncodeError } from '@chainforge/utils'
import { hashTypedData as viemHashTypedData } from 'viem'
import { describe, expect, it } from 'vitest'
import {
  domainFields,
  encodeType,
  hashDomain,
  hashStruct,
  hashTypedData,
} from '../../src'

const mail = {
  domain: {
    name: 'Ether Mail',
    version: '1',
    chainId: 1,
    verifyingContract: '0xcccccccccccccccccccccccccccccccccccccccc',
  },
  types: {
    Person: [
      { name: 'name', type: 'string' },
      { name: 'wallet', type: 'address' },
    ],
    Mail: [
      { name: 'from', type: 'Person' },
      { name: 'to', type: 'Person' },
      { name: 'contents', type: 'string' },
    ],
  },
  primaryType: 'Mail',
  message: {
    from: { name: 'Cow', wallet: '0xcd2a3d9f938e13cd947ec05abc7fe734df8dd826' },
    to: { name: 'Bob', wallet: '0xbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbb' },
    contents: 'Hello, Bob!',
  },
} as const

const order = {
  domain: {
    name: 'Exchange',
    chainId: 10,
    salt: `0x${'5a'.repeat(32)}`,
  },
  types: {
    Asset: [
      { name: 'token', type: 'address' },
      { name: 'amount', type: 'uint256' },
    ],
    Order: [
      { name: 'maker', type: 'address' },
      { name: 'assets', type: 'Asset[]' },
      { name: 'tags', type: 'string[2]' },
      { name: 'payload', type: 'bytes' },
      { name: 'nonce', type: 'uint64' },
      { name: 'delta', type: 'int256' },
      { name: 'open', type: 'bool' },
      { name: 'ref', type: 'bytes4' },
    ],
  },
  primaryType: 'Order',
  message: {
    maker: `0x${'11'.repeat(20)}`,
    assets: [
      { token: `0x${'22'.repeat(20)}`, amount: 5n },
      { token: `0x${'33'.repeat(20)}`, amount: 10n ** 18n },
    ],
    tags: ['spot', 'limit'],
    payload: '0xdeadbeef',
    nonce: 7n,
    delta: -42n,
    open: true,
    ref: '0x01020304',
  },
} as const

describe('encodeType', () => {
  it('appends referenced structs in name order', () => {
    expect(encodeType(mail.types, 'Mail')).toBe(
      'Mail(Person from,Person to,string contents)Person(string name,address wallet)',
    )
    expect(encodeType(order.types, 'Order')).toBe(
      'Order(address maker,Asset[] assets,string[2] tags,bytes payload,uint64 nonce,int256 delta,bool open,bytes4 ref)Asset(address token,uint256 amount)',
    )
  })

  it('rejects an unknown primary type', () => {
    expect(() => encodeType(mail.types, 'Letter')).toThrow(
      'Unknown typed-data type "Letter"',
    )
  })
})

describe('hashTypedData', () => {
  it('hashes the mail example', () => {
    expect(bytesToHex(hashTypedData(mail))).toBe(
      '0xbe609aee343fb3c4b28e1df9e632fca64fcfaede20f02e86244efddf30957bd2',
    )
  })

  it('matches viem for the mail example', () => {
    expect(bytesToHex(hashTypedData(mail))).toBe(viemHashTypedData(mail))
  })

  it('matches viem for arrays, bytes, signed integers and a salted domain', () => {
    expect(bytesToHex(hashTypedData(order))).toBe(viemHashTypedData(order))
  })

  it('hashes the domain alone for primaryType EIP712Domain', () => {
    const domainOnly = {
      domain: mail.domain,
      types: {},
      primaryType: 'EIP712Domain',
    } as const
    expect(bytesToHex(hashTypedData(domainOnly))).toBe(
      viemHashTypedData(domainOnly),
    )
  })

  it('derives the domain type from the keys that are set', () => {
    expect(domainFields({ chainId: 1, name: 'x' })).toEqual([
      { name: 'name', type: 'string' },
      { name: 'chainId', type: 'uint256' },
    ])
  })

  it('uses an explicit EIP712Domain definition', () => {
    const explicit = {
      ...mail,
      types: {
        ...mail.types,
        EIP712Domain: [{ name: 'name', type: 'string' }],
      },
    }
    expect(hashTypedData(explicit)).not.toEqual(hashTypedData(mail))
    expect(hashDomain(mail.domain, explicit.types)).toEqual(
      hashStruct(explicit.types, 'EIP712Domain', mail.domain),
    )
  })

  it('uses the injected hash function', () => {
    const calls: number[] = []
    const hash = (data: Uint8Array) => {
      calls.push(data.length)
      return new Uint8Array(32).fill(1)
    }
    expect(hashTypedData(mail, hash)).toEqual(new Uint8Array(32).fill(1))
    expect(calls.at(-1)).toBe(66)
  })

  it('names the missing field', () => {
    expect(() =>
      hashTypedData({
        ...mail,
        message: { from: mail.message.from, to: mail.message.to },
      }),
    ).toThrow('Missing typed-data value at Mail.contents')
  })

  it('checks fixed array lengths', () => {
    expect(() =>
      hashTypedData({
        ...order,
        message: { ...order.message, tags: ['spot'] },
      }),
    ).toThrow('Expected 2 elements for string[2] at Order.tags, got 1')
  })

  it('rejects field types that are neither structs nor elementary', () => {
    expect(() =>
      hashTypedData({
        types: { Note: [{ name: 'body', type: 'Text' }] },
        primaryType: 'Note',
        message: { body: 'x' },
      }),
    ).toThrow(EncodeError)
  })
})
