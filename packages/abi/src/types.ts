import { type Address, TypeParseError } from '@chainforge/utils'

interface TypeFacts {
  /** Whether the value lives in the tail and is referenced by an offset */
  readonly dynamic: boolean
  /** Bytes the type occupies in the head: 32 for dynamic types */
  readonly staticSize: number
  /** Canonical type string as hashed into selectors */
  readonly canonical: string
}

export type AddressType = TypeFacts & { readonly kind: 'address' }
export type BoolType = TypeFacts & { readonly kind: 'bool' }
export type UintType = TypeFacts & {
  readonly kind: 'uint'
  readonly bits: number
}
export type IntType = TypeFacts & { readonly kind: 'int'; readonly bits: number }
export type FixedBytesType = TypeFacts & {
  readonly kind: 'fixedBytes'
  readonly size: number
}
export type BytesType = TypeFacts & { readonly kind: 'bytes' }
export type StringType = TypeFacts & { readonly kind: 'string' }
export type ArrayType = TypeFacts & {
  readonly kind: 'array'
  readonly element: AbiType
  /** Fixed length, or undefined for `T[]` */
  readonly length: number | undefined
}
export type TupleType = TypeFacts & {
  readonly kind: 'tuple'
  readonly components: readonly AbiParameter[]
}

export type AbiType =
  | AddressType
  | BoolType
  | UintType
  | IntType
  | FixedBytesType
  | BytesType
  | StringType
  | ArrayType
  | TupleType

export type AbiTypeKind = AbiType['kind']

export interface AbiParameter {
  readonly name?: string
  readonly type: AbiType
  /** Event parameters only */
  readonly indexed?: boolean
}

/**
 * Values accepted by the encoder. Addresses may be hex strings, `Address`
 * instances or 20 raw bytes; integers bigint or safe numbers; byte strings
 * Uint8Arrays or 0x-prefixed hex; tuples positional arrays or objects keyed by
 * component name.
 */
export type AbiInputValue =
  | string
  | boolean
  | bigint
  | number
  | Uint8Array
  | Address
  | readonly AbiInputValue[]
  | { readonly [name: string]: AbiInputValue }

/**
 * Values produced by the decoder: checksummed address strings, booleans,
 * bigints, Uint8Arrays for byte strings, strings, and arrays for both arrays
 * and tuples.
 */
export type AbiDecodedValue =
  | string
  | boolean
  | bigint
  | Uint8Array
  | AbiDecodedValue[]

export type StateMutability = 'pure' | 'view' | 'nonpayable' | 'payable'

export interface AbiFunction {
  readonly type: 'function'
  readonly name: string
  readonly inputs: readonly AbiParameter[]
  readonly outputs: readonly AbiParameter[]
  readonly stateMutability: StateMutability
}

export interface AbiEvent {
  readonly type: 'event'
  readonly name: string
  readonly inputs: readonly AbiParameter[]
  readonly anonymous: boolean
}

export interface AbiError {
  readonly type: 'error'
  readonly name: string
  readonly inputs: readonly AbiParameter[]
}

export interface AbiConstructor {
  readonly type: 'constructor'
  readonly inputs: readonly AbiParameter[]
  readonly stateMutability: StateMutability
}

export interface AbiFallback {
  readonly type: 'fallback'
  readonly stateMutability: StateMutability
}

export interface AbiReceive {
  readonly type: 'receive'
  readonly stateMutability: 'payable'
}

export type AbiItem =
  | AbiFunction
  | AbiEvent
  | AbiError
  | AbiConstructor
  | AbiFallback
  | AbiReceive

export type Abi = readonly AbiItem[]

const word = 32

function elementary<K extends 'address' | 'bool' | 'bytes' | 'string'>(
  kind: K,
  dynamic: boolean,
): TypeFacts & { readonly kind: K } {
  return Object.freeze({ kind, dynamic, staticSize: word, canonical: kind })
}

const ADDRESS = elementary('address', false)
const BOOL = elementary('bool', false)
const BYTES = elementary('bytes', true)
const STRING = elementary('string', true)

function checkBits(kind: 'uint' | 'int', bits: number): void {
  if (!Number.isInteger(bits) || bits < 8 || bits > 256 || bits % 8 !== 0) {
    throw new TypeParseError(
      `Invalid ${kind} width ${bits}: must be a multiple of 8 between 8 and 256`,
    )
  }
}

function toParameter(component: AbiType | AbiParameter): AbiParameter {
  return 'kind' in component ? { type: component } : component
}

/**
 * Constructors for the type tree. Every node is frozen, with `dynamic`,
 * `staticSize` and `canonical` fixed at construction.
 */
export const abiType = {
  address: (): AddressType => ADDRESS,
  bool: (): BoolType => BOOL,
  bytes: (): BytesType => BYTES,
  string: (): StringType => STRING,

  uint(bits = 256): UintType {
    checkBits('uint', bits)
    return Object.freeze({
      kind: 'uint',
      bits,
      dynamic: false,
      staticSize: word,
      canonical: `uint${bits}`,
    })
  },

  int(bits = 256): IntType {
    checkBits('int', bits)
    return Object.freeze({
      kind: 'int',
      bits,
      dynamic: false,
      staticSize: word,
      canonical: `int${bits}`,
    })
  },

  fixedBytes(size: number): FixedBytesType {
    if (!Number.isInteger(size) || size < 1 || size > 32) {
      throw new TypeParseError(`Invalid bytes${size}: size must be 1 to 32`)
    }
    return Object.freeze({
      kind: 'fixedBytes',
      size,
      dynamic: false,
      staticSize: word,
      canonical: `bytes${size}`,
    })
  },

  array(element: AbiType, length?: number): ArrayType {
    if (length !== undefined && (!Number.isSafeInteger(length) || length < 1)) {
      throw new TypeParseError(
        `Invalid fixed array length ${length} for ${element.canonical}`,
      )
    }
    const dynamic = length === undefined || element.dynamic
    return Object.freeze({
      kind: 'array',
      element,
      length,
      dynamic,
      staticSize:
        dynamic || length === undefined ? word : element.staticSize * length,
      canonical: `${element.canonical}[${length ?? ''}]`,
    })
  },

  tuple(components: ReadonlyArray<AbiType | AbiParameter>): TupleType {
    if (components.length === 0) {
      throw new TypeParseError('Tuple types need at least one component')
    }
    const params = Object.freeze(components.map(toParameter))
    const dynamic = params.some((p) => p.type.dynamic)
    return Object.freeze({
      kind: 'tuple',
      components: params,
      dynamic,
      staticSize: dynamic
        ? word
        : params.reduce((sum, p) => sum + p.type.staticSize, 0),
      canonical: `(${params.map((p) => p.type.canonical).join(',')})`,
    })
  },
}
