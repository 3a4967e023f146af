import { formatIssuePath, z } from '@chainforge/schema'
import { AbiJsonError, TypeParseError } from '@chainforge/utils'
import debug from 'debug'
import { parseAbiType, parseSignature } from './parser'
import {
  type Abi,
  type AbiItem,
  type AbiParameter,
  type AbiType,
  abiType,
  type StateMutability,
} from './types'

const log = debug('chainforge:abi:json')

export interface JsonAbiParameter {
  name?: string
  type: string
  indexed?: boolean
  components?: JsonAbiParameter[]
  internalType?: string
}

export interface JsonAbiItem {
  type: AbiItem['type']
  name?: string
  inputs?: JsonAbiParameter[]
  outputs?: JsonAbiParameter[]
  stateMutability?: StateMutability
  anonymous?: boolean
}

type Path = ReadonlyArray<string | number>

const zParameter: z.ZodType<JsonAbiParameter> = z.lazy(() =>
  z.object({
    name: z.string().optional(),
    type: z.string(),
    indexed: z.boolean().optional(),
    components: z.array(zParameter).optional(),
    internalType: z.string().optional(),
  }),
)

const zName = z.string().regex(/^[A-Za-z_$][A-Za-z0-9_$]*$/, 'invalid name')
const zMutability = z.enum(['pure', 'view', 'nonpayable', 'payable'])
const zParameters = z.array(zParameter).default([])

const zFunction = z.object({
  type: z.literal('function').default('function'),
  name: zName,
  inputs: zParameters,
  outputs: zParameters,
  stateMutability: zMutability.optional(),
  constant: z.boolean().optional(),
  payable: z.boolean().optional(),
})

const zEvent = z.object({
  type: z.literal('event'),
  name: zName,
  inputs: zParameters,
  anonymous: z.boolean().default(false),
})

const zError = z.object({
  type: z.literal('error'),
  name: zName,
  inputs: zParameters,
})

const zConstructor = z.object({
  type: z.literal('constructor'),
  inputs: zParameters,
  stateMutability: zMutability.optional(),
  payable: z.boolean().optional(),
})

const zFallback = z.object({
  type: z.literal('fallback'),
  stateMutability: zMutability.optional(),
  payable: z.boolean().optional(),
})

const zReceive = z.object({
  type: z.literal('receive'),
  stateMutability: z.literal('payable').default('payable'),
})

const zItemHeader = z.object({
  type: z
    .enum(['function', 'event', 'error', 'constructor', 'fallback', 'receive'])
    .optional(),
})

function fail(message: string, path: Path, cause?: unknown): never {
  const at = formatIssuePath(path)
  throw new AbiJsonError(
    `Invalid ABI JSON at ${at || '<root>'}: ${message}`,
    at,
    { cause },
  )
}

function parseOrFail<T extends z.ZodTypeAny>(
  schema: T,
  value: unknown,
  path: Path,
): z.output<T> {
  const result = schema.safeParse(value)
  if (!result.success) {
    const issue = result.error.issues[0]
    fail(issue?.message ?? result.error.message, [
      ...path,
      ...(issue?.path ?? []),
    ])
  }
  return result.data
}

/** Legacy `constant`/`payable` flags map onto a mutability. */
function mutabilityOf(item: {
  stateMutability?: StateMutability
  constant?: boolean
  payable?: boolean
}): StateMutability {
  if (item.stateMutability) return item.stateMutability
  if (item.payable) return 'payable'
  if (item.constant) return 'view'
  return 'nonpayable'
}

function toType(json: JsonAbiParameter, path: Path): AbiType {
  if (!json.type.startsWith('tuple')) return parseAbiType(json.type)
  const suffix = json.type.slice('tuple'.length)
  if (!/^(\[\d*\])*$/.test(suffix)) {
    fail(`invalid tuple type "${json.type}"`, [...path, 'type'])
  }
  if (json.components === undefined) {
    fail('tuple parameter requires components', [...path, 'components'])
  }
  let type: AbiType = abiType.tuple(
    json.components.map((c, i) => toParameter(c, [...path, 'components', i])),
  )
  for (const match of suffix.matchAll(/\[(\d*)\]/g)) {
    type = abiType.array(type, match[1] === '' ? undefined : Number(match[1]))
  }
  return type
}

function toParameter(json: JsonAbiParameter, path: Path): AbiParameter {
  let type: AbiType
  try {
    type = toType(json, path)
  } catch (err) {
    if (err instanceof TypeParseError) {
      fail(err.message, [...path, 'type'], err)
    }
    throw err
  }
  const param: { name?: string; type: AbiType; indexed?: boolean } = { type }
  if (json.name) param.name = json.name
  if (json.indexed) param.indexed = true
  return param
}

function toParameters(
  list: readonly JsonAbiParameter[],
  path: Path,
): AbiParameter[] {
  return list.map((p, i) => toParameter(p, [...path, i]))
}

function parseItem(raw: unknown, index: number): AbiItem {
  const path: Path = [index]
  if (typeof raw === 'string') {
    try {
      return parseSignature(raw)
    } catch (err) {
      if (err instanceof TypeParseError) fail(err.message, path, err)
      throw err
    }
  }
  const { type = 'function' } = parseOrFail(zItemHeader, raw, path)
  switch (type) {
    case 'function': {
      const item = parseOrFail(zFunction, raw, path)
      return {
        type: 'function',
        name: item.name,
        inputs: toParameters(item.inputs, [...path, 'inputs']),
        outputs: toParameters(item.outputs, [...path, 'outputs']),
        stateMutability: mutabilityOf(item),
      }
    }
    case 'event': {
      const item = parseOrFail(zEvent, raw, path)
      return {
        type: 'event',
        name: item.name,
        inputs: toParameters(item.inputs, [...path, 'inputs']),
        anonymous: item.anonymous,
      }
    }
    case 'error': {
      const item = parseOrFail(zError, raw, path)
      return {
        type: 'error',
        name: item.name,
        inputs: toParameters(item.inputs, [...path, 'inputs']),
      }
    }
    case 'constructor': {
      const item = parseOrFail(zConstructor, raw, path)
      return {
        type: 'constructor',
        inputs: toParameters(item.inputs, [...path, 'inputs']),
        stateMutability: mutabilityOf(item),
      }
    }
    case 'fallback': {
      const item = parseOrFail(zFallback, raw, path)
      return { type: 'fallback', stateMutability: mutabilityOf(item) }
    }
    case 'receive': {
      parseOrFail(zReceive, raw, path)
      return { type: 'receive', stateMutability: 'payable' }
    }
  }
}

/**
 * Parses an ABI given as JSON text, an array of JSON items, or an array of
 * human-readable signatures (the two may be mixed). Failures raise
 * `AbiJsonError` naming the offending field, e.g. `[1].inputs[0].type`.
 */
export function parseAbi(input: unknown): Abi {
  let json = input
  if (typeof input === 'string') {
    try {
      json = JSON.parse(input)
    } catch (err) {
      fail('not valid JSON', [], err)
    }
  }
  if (!Array.isArray(json)) fail('expected an array of ABI items', [])
  const items = json.map((raw: unknown, i: number) => parseItem(raw, i))
  log('parsed %d ABI items', items.length)
  return items
}

function formatParameter(
  param: AbiParameter,
  event: boolean,
): JsonAbiParameter {
  let base: AbiType = param.type
  let suffix = ''
  while (base.kind === 'array') {
    suffix = `[${base.length ?? ''}]${suffix}`
    base = base.element
  }
  const out: JsonAbiParameter = {
    name: param.name ?? '',
    type: base.kind === 'tuple' ? `tuple${suffix}` : param.type.canonical,
  }
  if (base.kind === 'tuple') {
    out.components = base.components.map((c) => formatParameter(c, false))
  }
  if (event) out.indexed = param.indexed ?? false
  return out
}

/** Standard JSON form of an item. */
export function formatAbiItem(item: AbiItem): JsonAbiItem {
  switch (item.type) {
    case 'function':
      return {
        type: 'function',
        name: item.name,
        inputs: item.inputs.map((p) => formatParameter(p, false)),
        outputs: item.outputs.map((p) => formatParameter(p, false)),
        stateMutability: item.stateMutability,
      }
    case 'event':
      return {
        type: 'event',
        name: item.name,
        inputs: item.inputs.map((p) => formatParameter(p, true)),
        anonymous: item.anonymous,
      }
    case 'error':
      return {
        type: 'error',
        name: item.name,
        inputs: item.inputs.map((p) => formatParameter(p, false)),
      }
    case 'constructor':
      return {
        type: 'constructor',
        inputs: item.inputs.map((p) => formatParameter(p, false)),
        stateMutability: item.stateMutability,
      }
    case 'fallback':
    case 'receive':
      return { type: item.type, stateMutability: item.stateMutability }
  }
}

export function formatAbi(abi: Abi): JsonAbiItem[] {
  return abi.map(formatAbiItem)
}
