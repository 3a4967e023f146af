import { isChainforgeError, TypeParseError } from '@chainforge/utils'
import { describe, expect, it } from 'vitest'
import {
  abiType,
  formatAbiType,
  formatSignature,
  isPayable,
  isReadOnly,
  parseAbiType,
  parseErrorSignature,
  parseEventSignature,
  parseFunctionSignature,
  parseParameter,
  parseSignature,
  splitTopLevel,
  toAbiType,
} from '../../src'

describe('parseAbiType', () => {
  it('defaults integer widths to 256', () => {
    expect(parseAbiType('uint').canonical).toBe('uint256')
    expect(parseAbiType('int').canonical).toBe('int256')
    expect(parseAbiType('uint8')).toMatchObject({ kind: 'uint', bits: 8 })
  })

  it('reads array brackets from the end', () => {
    const type = parseAbiType('uint256[][3]')
    expect(type.kind).toBe('array')
    if (type.kind !== 'array') return
    expect(type.length).toBe(3)
    expect(type.element.canonical).toBe('uint256[]')
    expect(type.dynamic).toBe(true)
    expect(type.staticSize).toBe(32)
  })

  it('splits tuple components by depth', () => {
    const type = parseAbiType('(uint256,(bool,bytes32)[2],string)[]')
    expect(type.canonical).toBe('(uint256,(bool,bytes32)[2],string)[]')
    if (type.kind !== 'array' || type.element.kind !== 'tuple') {
      throw new Error('expected array of tuples')
    }
    expect(type.element.components.map((c) => c.type.canonical)).toEqual([
      'uint256',
      '(bool,bytes32)[2]',
      'string',
    ])
  })

  it('computes static sizes recursively', () => {
    const pair = abiType.tuple([abiType.uint(), abiType.uint()])
    expect(pair.staticSize).toBe(64)
    expect(abiType.tuple([pair, abiType.uint()]).staticSize).toBe(96)
    expect(parseAbiType('(uint256,address)[3]').staticSize).toBe(192)
    expect(parseAbiType('((uint256,uint256),uint256)[2]').staticSize).toBe(192)
    expect(parseAbiType('(uint256,string)[2]')).toMatchObject({
      dynamic: true,
      staticSize: 32,
    })
  })

  it('returns frozen nodes', () => {
    expect(Object.isFrozen(parseAbiType('(uint8,bool)'))).toBe(true)
  })

  it.each([
    'uint7',
    'uint264',
    'int0',
    'bytes0',
    'bytes33',
    'foo',
    '(uint256',
    'uint256)',
    'uint256[0]',
    'uint256[-1]',
    '(uint256,,bool)',
    '()',
    '()[]',
    'uint256 amount',
    '',
  ])('rejects %j', (input) => {
    expect(() => parseAbiType(input)).toThrow(TypeParseError)
  })

  it('reports failures with the TYPE_PARSE code', () => {
    try {
      parseAbiType('uint7')
      expect.unreachable()
    } catch (err) {
      expect(isChainforgeError(err, 'TYPE_PARSE')).toBe(true)
    }
  })
})

describe('parseParameter', () => {
  it('keeps names of tuple components', () => {
    const param = parseParameter('(uint256 id, bool ok)[] memory items')
    expect(param.name).toBe('items')
    if (param.type.kind !== 'array' || param.type.element.kind !== 'tuple') {
      throw new Error('expected array of tuples')
    }
    expect(param.type.element.components.map((c) => c.name)).toEqual([
      'id',
      'ok',
    ])
  })

  it('parses indexed flags', () => {
    expect(parseParameter('address indexed from')).toMatchObject({
      name: 'from',
      indexed: true,
    })
  })
})

describe('parseSignature', () => {
  it('parses functions with modifiers and returns', () => {
    const fn = parseFunctionSignature(
      'function balanceOf(address owner) external view returns (uint256)',
    )
    expect(fn.name).toBe('balanceOf')
    expect(fn.inputs[0].name).toBe('owner')
    expect(fn.outputs.map((o) => o.type.canonical)).toEqual(['uint256'])
    expect(fn.stateMutability).toBe('view')
    expect(isReadOnly(fn)).toBe(true)
    expect(isPayable(fn)).toBe(false)
  })

  it('treats a bare signature as a function', () => {
    const fn = parseFunctionSignature('transfer(address to, uint amount)')
    expect(formatSignature(fn)).toBe('transfer(address,uint256)')
    expect(fn.stateMutability).toBe('nonpayable')
  })

  it('parses events with or without the keyword', () => {
    const event = parseEventSignature(
      'Transfer(address indexed from, address indexed to, uint256 value)',
    )
    expect(event.type).toBe('event')
    expect(event.anonymous).toBe(false)
    expect(event.inputs.map((i) => i.indexed ?? false)).toEqual([
      true,
      true,
      false,
    ])
    expect(parseEventSignature('event Ping() anonymous').anonymous).toBe(true)
  })

  it('parses errors, constructors and special functions', () => {
    expect(parseSignature('error Insufficient(uint256 needed)')).toMatchObject({
      type: 'error',
      name: 'Insufficient',
    })
    expect(parseSignature('constructor(uint256 supply) payable')).toMatchObject(
      { type: 'constructor', stateMutability: 'payable' },
    )
    expect(parseSignature('receive() external payable')).toEqual({
      type: 'receive',
      stateMutability: 'payable',
    })
    expect(parseSignature('fallback()')).toEqual({
      type: 'fallback',
      stateMutability: 'nonpayable',
    })
  })

  it('rejects malformed signatures', () => {
    expect(() => parseSignature('function 1bad()')).toThrow(TypeParseError)
    expect(() => parseSignature('event X(uint256) view')).toThrow(
      TypeParseError,
    )
    expect(() => parseSignature('transfer(address')).toThrow(TypeParseError)
    expect(() => parseSignature('error E() returns (bool)')).toThrow(
      TypeParseError,
    )
    expect(() => parseSignature('receive()')).toThrow(TypeParseError)
  })
})

describe('splitTopLevel', () => {
  it('keeps nested tuples and arrays together', () => {
    expect(splitTopLevel('uint256,(bool,bytes32)[2],address[]')).toEqual([
      'uint256',
      '(bool,bytes32)[2]',
      'address[]',
    ])
    expect(splitTopLevel('  ')).toEqual([])
  })

  it('rejects unbalanced or empty components', () => {
    expect(() => splitTopLevel('(uint256,bool')).toThrow(
      'Unbalanced brackets in "(uint256,bool"',
    )
    expect(() => splitTopLevel('uint256,,bool')).toThrow(
      'Empty component in "uint256,,bool"',
    )
  })
})

describe('formatAbiType', () => {
  it('renders the canonical form', () => {
    expect(formatAbiType(parseAbiType('tuple(uint, bool[])[3]'))).toBe(
      '(uint256,bool[])[3]',
    )
    expect(formatAbiType(abiType.array(abiType.fixedBytes(4)))).toBe('bytes4[]')
  })
})

describe('parseErrorSignature', () => {
  it('accepts signatures with or without the keyword', () => {
    const error = parseErrorSignature('Insufficient(uint256 available)')
    expect(error.type).toBe('error')
    expect(error.name).toBe('Insufficient')
    expect(error.inputs[0].name).toBe('available')
    expect(formatSignature(parseErrorSignature('error Paused()'))).toBe(
      'Paused()',
    )
  })

  it('rejects other item kinds', () => {
    expect(() => parseErrorSignature('event Paused()')).toThrow(TypeParseError)
  })
})

describe('toAbiType', () => {
  it('takes a type tree, a parameter or a type string', () => {
    const tree = abiType.uint(8)
    expect(toAbiType(tree)).toBe(tree)
    expect(toAbiType({ name: 'x', type: tree })).toBe(tree)
    expect(toAbiType('uint8').canonical).toBe('uint8')
  })
})
