import { bytesToHex, keccak256, utf8ToBytes } from '@chainforge/utils'
import { toFunctionSelector } from 'viem'
import { describe, expect, it, vi } from 'vitest'
import {
  canonicalSignature,
  eventTopic,
  functionSelector,
  parseFunctionSignature,
} from '../../src'

describe('functionSelector', () => {
  it('hashes the canonical signature', () => {
    expect(bytesToHex(functionSelector('transfer(address,uint256)'))).toBe(
      '0xa9059cbb',
    )
    expect(bytesToHex(functionSelector('Error(string)'))).toBe('0x08c379a0')
    expect(bytesToHex(functionSelector('Panic(uint256)'))).toBe('0x4e487b71')
  })

  it('drops names, modifiers and returns before hashing', () => {
    const human =
      'function transfer(address to, uint amount) external returns (bool)'
    expect(canonicalSignature(human)).toBe('transfer(address,uint256)')
    expect(bytesToHex(functionSelector(human))).toBe('0xa9059cbb')
  })

  it('matches viem for tuple parameters', () => {
    const signature = 'submit((uint256,address[]),bytes32)'
    expect(bytesToHex(functionSelector(signature))).toBe(
      toFunctionSelector(signature),
    )
  })

  it('uses the injected hash', () => {
    const hash = vi.fn((data: Uint8Array) =>
      new Uint8Array(32).fill(data.length),
    )
    const fn = parseFunctionSignature('ping()')
    expect(functionSelector(fn, hash)).toEqual(new Uint8Array(4).fill(6))
    expect(hash).toHaveBeenCalledWith(utf8ToBytes('ping()'))
  })
})

describe('eventTopic', () => {
  it('hashes the full event signature', () => {
    expect(
      bytesToHex(
        eventTopic(
          'Transfer(address indexed from, address indexed to, uint256 value)',
        ),
      ),
    ).toBe('0xddf252ad1be2c89b69c2b068fc378daa952ba7f163c4a11628f55a4df523b3ef')
  })

  it('equals the keccak of the canonical string', () => {
    expect(eventTopic('event Approval(address,address,uint256)')).toEqual(
      keccak256(utf8ToBytes('Approval(address,address,uint256)')),
    )
  })
})
