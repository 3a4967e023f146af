import { AbiJsonError } from '@chainforge/utils'
import { describe, expect, it } from 'vitest'
import {
  formatAbi,
  formatAbiItem,
  formatSignature,
  parseAbi,
  parseSignature,
} from '../../src'

const erc20 = [
  {
    type: 'function',
    name: 'transfer',
    inputs: [
      { name: 'to', type: 'address' },
      { name: 'amount', type: 'uint256' },
    ],
    outputs: [{ name: '', type: 'bool' }],
    stateMutability: 'nonpayable',
  },
  {
    type: 'event',
    name: 'Transfer',
    inputs: [
      { name: 'from', type: 'address', indexed: true },
      { name: 'to', type: 'address', indexed: true },
      { name: 'value', type: 'uint256', indexed: false },
    ],
    anonymous: false,
  },
  {
    type: 'function',
    name: 'fill',
    inputs: [
      {
        name: 'orders',
        type: 'tuple[]',
        components: [
          { name: 'id', type: 'uint256' },
          { name: 'maker', type: 'address' },
        ],
      },
    ],
    outputs: [],
    stateMutability: 'payable',
  },
  { type: 'error', name: 'Unauthorized', inputs: [] },
]

function expectAbiJsonError(input: unknown, path: string): AbiJsonError {
  try {
    parseAbi(input)
  } catch (err) {
    expect(err).toBeInstanceOf(AbiJsonError)
    if (err instanceof AbiJsonError) {
      expect(err.path).toBe(path)
      return err
    }
  }
  throw new Error('expected parseAbi to fail')
}

describe('parseAbi', () => {
  it('reads functions, events, errors and tuple components', () => {
    const abi = parseAbi(erc20)
    expect(abi.map((item) => item.type)).toEqual([
      'function',
      'event',
      'function',
      'error',
    ])
    const fill = abi[2]
    if (fill.type !== 'function') throw new Error('expected function')
    expect(formatSignature(fill)).toBe('fill((uint256,address)[])')
  })

  it('accepts JSON text and round-trips through formatAbi', () => {
    expect(formatAbi(parseAbi(JSON.stringify(erc20)))).toEqual(erc20)
  })

  it('maps legacy constant and payable flags', () => {
    const abi = parseAbi([
      { name: 'total', inputs: [], outputs: [], constant: true },
      { type: 'fallback', payable: true },
    ])
    expect(abi).toEqual([
      {
        type: 'function',
        name: 'total',
        inputs: [],
        outputs: [],
        stateMutability: 'view',
      },
      { type: 'fallback', stateMutability: 'payable' },
    ])
  })

  it('accepts human-readable items', () => {
    const abi = parseAbi([
      'function balanceOf(address owner) view returns (uint256)',
      'receive() external payable',
    ])
    expect(abi[1]).toEqual({ type: 'receive', stateMutability: 'payable' })
  })

  it('names the offending field', () => {
    const err = expectAbiJsonError(
      [
        { type: 'function', name: 'a', inputs: [] },
        { type: 'function', name: 'b', inputs: [{ name: 'x', type: 'uint7' }] },
      ],
      '[1].inputs[0].type',
    )
    expect(err.message).toBe(
      'Invalid ABI JSON at [1].inputs[0].type: Invalid uint width 7: must be a multiple of 8 between 8 and 256',
    )
    expect(err.code).toBe('ABI_JSON')
  })

  it('reports schema violations with their path', () => {
    expectAbiJsonError([{ type: 'event', inputs: [] }], '[0].name')
    expectAbiJsonError(
      [{ type: 'function', name: 'f', inputs: [{ name: 'a' }] }],
      '[0].inputs[0].type',
    )
    expectAbiJsonError(
      [
        {
          type: 'function',
          name: 'f',
          inputs: [{ type: 'tuple', components: [{ type: 'bytes33' }] }],
        },
      ],
      '[0].inputs[0].components[0].type',
    )
    expectAbiJsonError(
      [{ type: 'function', name: 'f', inputs: [{ type: 'tuple' }] }],
      '[0].inputs[0].components',
    )
    expectAbiJsonError([{ type: 'modifier' }], '[0].type')
    expectAbiJsonError({ abi: [] }, '')
    expectAbiJsonError('not json', '')
  })
})

describe('formatAbiItem', () => {
  it('writes tuple parameters with their components', () => {
    const item = parseSignature(
      'function submit((uint256 id, address[] owners)[] orders, bytes32 salt) payable returns (bool)',
    )
    expect(formatAbiItem(item)).toEqual({
      type: 'function',
      name: 'submit',
      inputs: [
        {
          name: 'orders',
          type: 'tuple[]',
          components: [
            { name: 'id', type: 'uint256' },
            { name: 'owners', type: 'address[]' },
          ],
        },
        { name: 'salt', type: 'bytes32' },
      ],
      outputs: [{ name: '', type: 'bool' }],
      stateMutability: 'payable',
    })
  })

  it('marks event parameters as indexed or not', () => {
    const item = parseSignature('event Approval(address indexed owner, uint256 value)')
    expect(formatAbiItem(item)).toEqual({
      type: 'event',
      name: 'Approval',
      inputs: [
        { name: 'owner', type: 'address', indexed: true },
        { name: 'value', type: 'uint256', indexed: false },
      ],
      anonymous: false,
    })
  })
})
