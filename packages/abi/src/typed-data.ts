import {
  concatBytes,
  EncodeError,
  type HashFn,
  keccak256,
  utf8ToBytes,
} from '@chainforge/utils'
import {
  describeValue,
  encodeAbiParameters,
  isValueList,
  isValueRecord,
  toByteString,
} from './encoder'
import { parseAbiType } from './parser'
import type { AbiInputValue, AbiType } from './types'

export interface TypedDataField {
  readonly name: string
  readonly type: string
}

export type TypedDataTypes = {
  readonly [typeName: string]: readonly TypedDataField[]
}

export type TypedDataRecord = {
  readonly [name: string]: AbiInputValue | undefined
}

export type TypedDataDomain = {
  readonly name?: string
  readonly version?: string
  readonly chainId?: bigint | number
  readonly verifyingContract?: string
  readonly salt?: string | Uint8Array
}

/**
 * An EIP-712 payload. `types` lists the struct definitions; an
 * `EIP712Domain` entry is derived from the keys set on `domain` unless one
 * is given.
 */
export interface TypedDataDefinition {
  readonly domain?: TypedDataDomain
  readonly types: TypedDataTypes
  readonly primaryType: string
  readonly message?: TypedDataRecord
}

const DOMAIN_TYPE = 'EIP712Domain'

const DOMAIN_FIELDS: readonly TypedDataField[] = [
  { name: 'name', type: 'string' },
  { name: 'version', type: 'string' },
  { name: 'chainId', type: 'uint256' },
  { name: 'verifyingContract', type: 'address' },
  { name: 'salt', type: 'bytes32' },
]

const ARRAY_TYPE = /^(.+)\[(\d*)\]$/

/** `EIP712Domain` fields for the keys present on `domain`, in standard order. */
export function domainFields(domain: TypedDataDomain): TypedDataField[] {
  const values: TypedDataRecord = domain
  return DOMAIN_FIELDS.filter((field) => values[field.name] !== undefined)
}

function structFields(
  types: TypedDataTypes,
  name: string,
): readonly TypedDataField[] | undefined {
  return Object.hasOwn(types, name) ? types[name] : undefined
}

function collectStructs(
  types: TypedDataTypes,
  type: string,
  found: Set<string>,
): Set<string> {
  const name = /^\w+/.exec(type)?.[0] ?? type
  const fields = structFields(types, name)
  if (fields === undefined || found.has(name)) return found
  found.add(name)
  for (const field of fields) collectStructs(types, field.type, found)
  return found
}

/**
 * `Name(type1 field1,...)` for `primaryType` followed by every struct it
 * references, sorted by name.
 */
export function encodeType(types: TypedDataTypes, primaryType: string): string {
  const [primary, ...deps] = collectStructs(types, primaryType, new Set())
  if (primary === undefined) {
    throw new EncodeError(`Unknown typed-data type "${primaryType}"`)
  }
  return [primary, ...deps.sort()]
    .map((name) => {
      const fields = structFields(types, name) ?? []
      return `${name}(${fields.map((f) => `${f.type} ${f.name}`).join(',')})`
    })
    .join('')
}

function elementaryType(type: string, path: string): AbiType {
  let abi: AbiType
  try {
    abi = parseAbiType(type)
  } catch (err) {
    throw new EncodeError(`Unknown typed-data type "${type}" at ${path}`, {
      cause: err,
    })
  }
  if (abi.kind === 'tuple' || abi.kind === 'array') {
    throw new EncodeError(`Unknown typed-data type "${type}" at ${path}`)
  }
  return abi
}

/** The 32-byte word a field contributes to its struct encoding. */
function encodeField(
  types: TypedDataTypes,
  type: string,
  value: AbiInputValue | undefined,
  path: string,
  hash: HashFn,
): Uint8Array {
  if (value === undefined) {
    throw new EncodeError(`Missing typed-data value at ${path}`)
  }
  const array = ARRAY_TYPE.exec(type)
  if (array !== null) {
    const [, element, size] = array
    if (!isValueList(value)) {
      throw new EncodeError(
        `Expected an array for ${type} at ${path}, got ${describeValue(value)}`,
      )
    }
    if (size !== '' && value.length !== Number(size)) {
      throw new EncodeError(
        `Expected ${size} elements for ${type} at ${path}, got ${value.length}`,
      )
    }
    return hash(
      concatBytes(
        ...value.map((item, i) =>
          encodeField(types, element, item, `${path}[${i}]`, hash),
        ),
      ),
    )
  }
  if (structFields(types, type) !== undefined) {
    if (!isValueRecord(value)) {
      throw new EncodeError(
        `Expected an object for ${type} at ${path}, got ${describeValue(value)}`,
      )
    }
    return hashStruct(types, type, value, hash)
  }
  if (type === 'string') {
    if (typeof value !== 'string') {
      throw new EncodeError(
        `Expected string at ${path}, got ${describeValue(value)}`,
      )
    }
    return hash(utf8ToBytes(value))
  }
  const abi = elementaryType(type, path)
  if (abi.kind === 'bytes') return hash(toByteString(abi, value))
  return encodeAbiParameters([abi], [value])
}

/** `typeHash ‖ enc(field1) ‖ … ‖ enc(fieldN)` */
export function encodeData(
  types: TypedDataTypes,
  primaryType: string,
  data: TypedDataRecord,
  hash: HashFn = keccak256,
): Uint8Array {
  const fields = structFields(types, primaryType)
  if (fields === undefined) {
    throw new EncodeError(`Unknown typed-data type "${primaryType}"`)
  }
  return concatBytes(
    hash(utf8ToBytes(encodeType(types, primaryType))),
    ...fields.map((field) =>
      encodeField(
        types,
        field.type,
        data[field.name],
        `${primaryType}.${field.name}`,
        hash,
      ),
    ),
  )
}

export function hashStruct(
  types: TypedDataTypes,
  primaryType: string,
  data: TypedDataRecord,
  hash: HashFn = keccak256,
): Uint8Array {
  return hash(encodeData(types, primaryType, data, hash))
}

function withDomainType(
  types: TypedDataTypes,
  domain: TypedDataDomain,
): TypedDataTypes {
  return { [DOMAIN_TYPE]: domainFields(domain), ...types }
}

/** Domain separator: `hashStruct(EIP712Domain, domain)`. */
export function hashDomain(
  domain: TypedDataDomain,
  types: TypedDataTypes = {},
  hash: HashFn = keccak256,
): Uint8Array {
  return hashStruct(withDomainType(types, domain), DOMAIN_TYPE, domain, hash)
}

/**
 * EIP-712 signing hash, `hash(0x1901 ‖ domainSeparator ‖ hashStruct(message))`.
 * With `primaryType: 'EIP712Domain'` the struct hash is left out.
 *
 * @example
 * hashTypedData({
 *   domain: { name: 'Mail', chainId: 1 },
 *   types: { Mail: [{ name: 'contents', type: 'string' }] },
 *   primaryType: 'Mail',
 *   message: { contents: 'hello' },
 * })
 */
export function hashTypedData(
  typedData: TypedDataDefinition,
  hash: HashFn = keccak256,
): Uint8Array {
  const domain = typedData.domain ?? {}
  const types = withDomainType(typedData.types, domain)
  const parts = [
    new Uint8Array([0x19, 0x01]),
    hashStruct(types, DOMAIN_TYPE, domain, hash),
  ]
  if (typedData.primaryType !== DOMAIN_TYPE) {
    parts.push(
      hashStruct(types, typedData.primaryType, typedData.message ?? {}, hash),
    )
  }
  return hash(concatBytes(...parts))
}
