import { TypeParseError } from '@chainforge/utils'
import {
  type AbiConstructor,
  type AbiError,
  type AbiEvent,
  type AbiFallback,
  type AbiFunction,
  type AbiItem,
  type AbiParameter,
  type AbiReceive,
  type AbiType,
  abiType,
  type StateMutability,
} from './types'

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/
const INTEGER = /^(u?int)(\d*)$/
const FIXED_BYTES = /^bytes(\d+)$/
const ARRAY_SUFFIX = /^(\[\d*\])*$/
const DATA_LOCATIONS = new Set(['memory', 'calldata', 'storage'])
const MUTABILITIES = new Set<string>(['pure', 'view', 'nonpayable', 'payable'])

function isStateMutability(value: string): value is StateMutability {
  return MUTABILITIES.has(value)
}

/**
 * Splits on top-level commas, tracking paren and bracket depth so nested
 * tuples and arrays stay intact.
 */
export function splitTopLevel(input: string): string[] {
  if (input.trim() === '') return []
  const parts: string[] = []
  let depth = 0
  let start = 0
  for (let i = 0; i < input.length; i++) {
    const ch = input[i]
    if (ch === '(' || ch === '[') depth++
    else if (ch === ')' || ch === ']') depth--
    if (depth < 0) {
      throw new TypeParseError(`Unbalanced brackets in "${input}"`)
    }
    if (ch === ',' && depth === 0) {
      parts.push(input.slice(start, i).trim())
      start = i + 1
    }
  }
  if (depth !== 0) {
    throw new TypeParseError(`Unbalanced brackets in "${input}"`)
  }
  parts.push(input.slice(start).trim())
  if (parts.some((p) => p === '')) {
    throw new TypeParseError(`Empty component in "${input}"`)
  }
  return parts
}

/** Index of the `)` matching the `(` at `open`. */
function matchingParen(input: string, open: number): number {
  let depth = 0
  for (let i = open; i < input.length; i++) {
    if (input[i] === '(') depth++
    else if (input[i] === ')') {
      depth--
      if (depth === 0) return i
    }
  }
  throw new TypeParseError(`Unbalanced parentheses in "${input}"`)
}

function parseElementary(input: string): AbiType {
  switch (input) {
    case 'address':
      return abiType.address()
    case 'bool':
      return abiType.bool()
    case 'string':
      return abiType.string()
    case 'bytes':
      return abiType.bytes()
  }
  const int = INTEGER.exec(input)
  if (int) {
    const [, kind, width] = int
    if (width.startsWith('0')) {
      throw new TypeParseError(`Invalid integer width in "${input}"`)
    }
    const bits = width === '' ? 256 : Number(width)
    return kind === 'uint' ? abiType.uint(bits) : abiType.int(bits)
  }
  const fixed = FIXED_BYTES.exec(input)
  if (fixed) {
    if (fixed[1].startsWith('0')) {
      throw new TypeParseError(`Invalid bytes size in "${input}"`)
    }
    return abiType.fixedBytes(Number(fixed[1]))
  }
  throw new TypeParseError(`Unknown ABI type: "${input}"`)
}

function parseTypeString(input: string): AbiType {
  const s = input.trim()
  if (s === '') throw new TypeParseError('Empty type string')

  if (s.endsWith(']')) {
    const open = s.lastIndexOf('[')
    if (open <= 0) throw new TypeParseError(`Malformed array type "${s}"`)
    const size = s.slice(open + 1, -1)
    if (size !== '' && !/^[1-9]\d*$/.test(size)) {
      throw new TypeParseError(`Invalid array length "${size}" in "${s}"`)
    }
    const element = parseTypeString(s.slice(0, open))
    return abiType.array(element, size === '' ? undefined : Number(size))
  }

  const body = s.startsWith('tuple(') ? s.slice(5) : s
  if (body.startsWith('(')) {
    if (matchingParen(body, 0) !== body.length - 1) {
      throw new TypeParseError(`Malformed tuple type "${s}"`)
    }
    return abiType.tuple(splitTopLevel(body.slice(1, -1)).map(parseParameter))
  }
  return parseElementary(s)
}

/**
 * Parses a type string such as `uint`, `address[]` or
 * `(uint256,(bool,bytes32)[2])[]` into a type tree.
 */
export function parseAbiType(input: string): AbiType {
  const param = parseParameter(input)
  if (param.name !== undefined || param.indexed) {
    throw new TypeParseError(`Expected a bare type, got "${input.trim()}"`)
  }
  return param.type
}

/**
 * Parses a human-readable parameter: `type [indexed] [location] [name]`.
 * Tuple types may carry component names, e.g. `(uint256 id, bool ok)[] items`.
 */
export function parseParameter(input: string): AbiParameter {
  const s = input.trim()
  let typePart: string
  let rest: string

  const tupleStart = s.startsWith('tuple(') ? 5 : s.startsWith('(') ? 0 : -1
  if (tupleStart >= 0) {
    const close = matchingParen(s, tupleStart)
    let end = close + 1
    while (end < s.length && /[[\]\d]/.test(s[end])) end++
    if (!ARRAY_SUFFIX.test(s.slice(close + 1, end))) {
      throw new TypeParseError(`Malformed array suffix in "${s}"`)
    }
    typePart = s.slice(0, end)
    rest = s.slice(end)
  } else {
    const space = s.search(/\s/)
    typePart = space < 0 ? s : s.slice(0, space)
    rest = space < 0 ? '' : s.slice(space)
  }

  const type = parseTypeString(typePart)
  let indexed = false
  let name: string | undefined
  for (const token of rest.split(/\s+/).filter((t) => t !== '')) {
    if (token === 'indexed' && !indexed && name === undefined) {
      indexed = true
    } else if (DATA_LOCATIONS.has(token) && name === undefined) {
      continue
    } else if (name === undefined && IDENTIFIER.test(token)) {
      name = token
    } else {
      throw new TypeParseError(`Unexpected "${token}" in parameter "${s}"`)
    }
  }

  const param: { name?: string; type: AbiType; indexed?: boolean } = { type }
  if (name !== undefined) param.name = name
  if (indexed) param.indexed = true
  return param
}

/** `name(type1,type2,...)` with names and `indexed` flags dropped. */
export function formatSignature(
  item: Pick<AbiFunction, 'name' | 'inputs'>,
): string {
  return `${item.name}(${item.inputs.map((p) => p.type.canonical).join(',')})`
}

/** Canonical type string; tuples render as `(T1,T2)`. */
export function formatAbiType(type: AbiType): string {
  return type.canonical
}

const KINDS = [
  'function',
  'event',
  'error',
  'constructor',
  'fallback',
  'receive',
] as const
type Kind = (typeof KINDS)[number]

function isKind(value: string): value is Kind {
  return KINDS.some((k) => k === value)
}

function parseParameterList(list: string): AbiParameter[] {
  return splitTopLevel(list).map(parseParameter)
}

/**
 * Parses a human-readable signature into an ABI item.
 *
 * `transfer(address,uint256)`, `function balanceOf(address owner) view
 * returns (uint256)`, `event Transfer(address indexed from, address indexed
 * to, uint256 value)`, `error Insufficient(uint256 needed)`,
 * `constructor(uint256 supply) payable`, `receive() external payable`.
 * Without a leading keyword the signature is a function.
 */
export function parseSignature(signature: string): AbiItem {
  let s = signature.trim()
  let kind: Kind = 'function'
  const keyword = /^([a-z]+)[\s(]/.exec(s)
  if (keyword && isKind(keyword[1])) {
    kind = keyword[1]
    s = s.slice(keyword[1].length).trim()
  }

  const open = s.indexOf('(')
  if (open < 0) {
    throw new TypeParseError(`Missing parameter list in "${signature}"`)
  }
  const name = s.slice(0, open).trim()
  const close = matchingParen(s, open)
  const inputs = parseParameterList(s.slice(open + 1, close))
  let tail = s.slice(close + 1).trim()

  let outputs: AbiParameter[] = []
  const returns = /(^|\s)returns\s*\(/.exec(tail)
  if (returns) {
    const start = tail.indexOf('(', returns.index)
    const end = matchingParen(tail, start)
    if (tail.slice(end + 1).trim() !== '') {
      throw new TypeParseError(
        `Unexpected input after returns in "${signature}"`,
      )
    }
    outputs = parseParameterList(tail.slice(start + 1, end))
    tail = tail.slice(0, returns.index)
  }
  const modifiers = tail.split(/\s+/).filter((t) => t !== '')

  const needsName = kind === 'function' || kind === 'event' || kind === 'error'
  if (needsName ? !IDENTIFIER.test(name) : name !== '') {
    throw new TypeParseError(`Invalid name "${name}" in "${signature}"`)
  }
  if (returns && kind !== 'function') {
    throw new TypeParseError(`Only functions declare returns: "${signature}"`)
  }

  let stateMutability: StateMutability = 'nonpayable'
  let anonymous = false
  for (const modifier of modifiers) {
    if (isStateMutability(modifier) && kind !== 'event' && kind !== 'error') {
      stateMutability = modifier
    } else if (modifier === 'anonymous' && kind === 'event') {
      anonymous = true
    } else if (modifier !== 'external' && modifier !== 'public') {
      throw new TypeParseError(
        `Unexpected modifier "${modifier}" in "${signature}"`,
      )
    }
  }

  switch (kind) {
    case 'function': {
      const fn: AbiFunction = {
        type: 'function',
        name,
        inputs,
        outputs,
        stateMutability,
      }
      return fn
    }
    case 'event': {
      const event: AbiEvent = { type: 'event', name, inputs, anonymous }
      return event
    }
    case 'error': {
      const error: AbiError = { type: 'error', name, inputs }
      return error
    }
    case 'constructor': {
      const ctor: AbiConstructor = {
        type: 'constructor',
        inputs,
        stateMutability,
      }
      return ctor
    }
    case 'fallback': {
      const fallback: AbiFallback = { type: 'fallback', stateMutability }
      return fallback
    }
    case 'receive': {
      if (stateMutability !== 'payable' || inputs.length > 0) {
        throw new TypeParseError(
          `receive must be payable with no inputs: "${signature}"`,
        )
      }
      const receive: AbiReceive = { type: 'receive', stateMutability }
      return receive
    }
  }
}

function withKeyword(signature: string, keyword: string): string {
  const s = signature.trim()
  return new RegExp(`^${keyword}\\s`).test(s) ? s : `${keyword} ${s}`
}

export function parseFunctionSignature(signature: string): AbiFunction {
  const item = parseSignature(signature)
  if (item.type !== 'function') {
    throw new TypeParseError(`Expected a function signature, got "${signature}"`)
  }
  return item
}

export function parseEventSignature(signature: string): AbiEvent {
  const item = parseSignature(withKeyword(signature, 'event'))
  if (item.type !== 'event') {
    throw new TypeParseError(`Expected an event signature, got "${signature}"`)
  }
  return item
}

export function parseErrorSignature(signature: string): AbiError {
  const item = parseSignature(withKeyword(signature, 'error'))
  if (item.type !== 'error') {
    throw new TypeParseError(`Expected an error signature, got "${signature}"`)
  }
  return item
}

export function isReadOnly(fn: Pick<AbiFunction, 'stateMutability'>): boolean {
  return fn.stateMutability === 'view' || fn.stateMutability === 'pure'
}

export function isPayable(fn: Pick<AbiFunction, 'stateMutability'>): boolean {
  return fn.stateMutability === 'payable'
}

/** Parameter type given as a tree, a parameter or a type string */
export type ParameterSource = AbiType | AbiParameter | string

export function toAbiType(source: ParameterSource): AbiType {
  if (typeof source === 'string') return parseAbiType(source)
  return 'kind' in source ? source : source.type
}

export function toAbiTypes(sources: readonly ParameterSource[]): AbiType[] {
  return sources.map(toAbiType)
}
