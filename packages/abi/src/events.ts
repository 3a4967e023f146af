import {
  type BytesLike,
  concatBytes,
  DecodeError,
  EncodeError,
  equalsBytes,
  type HashFn,
  keccak256,
  setLengthRight,
  toBytes,
  utf8ToBytes,
} from '@chainforge/utils'
import { decodeAbiParameters } from './decoder'
import {
  describeValue,
  encodeAbiParameters,
  expectList,
  toByteString,
  tupleValues,
} from './encoder'
import { parseEventSignature } from './parser'
import { eventTopic } from './selector'
import type {
  AbiDecodedValue,
  AbiEvent,
  AbiInputValue,
  AbiParameter,
  AbiType,
} from './types'

export type EventSource = string | AbiEvent

export interface EventLog {
  readonly topics: readonly BytesLike[]
  readonly data: BytesLike
}

export interface DecodedEventLog {
  readonly eventName: string
  /** Every input in declaration order */
  readonly args: AbiDecodedValue[]
  /** Inputs that carry a name */
  readonly namedArgs: Record<string, AbiDecodedValue>
}

function toEvent(source: EventSource): AbiEvent {
  return typeof source === 'string' ? parseEventSignature(source) : source
}

/** Reference types are stored in topics as a hash of their value. */
function isHashedInTopic(type: AbiType): boolean {
  return (
    type.kind === 'bytes' ||
    type.kind === 'string' ||
    type.kind === 'array' ||
    type.kind === 'tuple'
  )
}

function padded(content: Uint8Array): Uint8Array {
  return setLengthRight(content, Math.ceil(content.length / 32) * 32)
}

/**
 * In-place encoding of indexed reference values: elements padded to 32
 * bytes, no offsets and no length words.
 */
function encodeInPlace(type: AbiType, value: AbiInputValue): Uint8Array {
  switch (type.kind) {
    case 'bytes':
      return padded(toByteString(type, value))
    case 'string':
      if (typeof value !== 'string') {
        throw new EncodeError(`Expected string, got ${describeValue(value)}`)
      }
      return padded(utf8ToBytes(value))
    case 'array': {
      const list = expectList(type, value)
      if (type.length !== undefined && list.length !== type.length) {
        throw new EncodeError(
          `Expected ${type.length} elements for ${type.canonical}, got ${list.length}`,
        )
      }
      return concatBytes(...list.map((v) => encodeInPlace(type.element, v)))
    }
    case 'tuple': {
      const values = tupleValues(type, value)
      return concatBytes(
        ...type.components.map((c, i) => encodeInPlace(c.type, values[i])),
      )
    }
    default:
      return encodeAbiParameters([type], [value])
  }
}

function encodeTopic(
  type: AbiType,
  value: AbiInputValue,
  hash: HashFn,
): Uint8Array {
  switch (type.kind) {
    case 'bytes':
      return hash(toByteString(type, value))
    case 'string':
      if (typeof value !== 'string') {
        throw new EncodeError(`Expected string, got ${describeValue(value)}`)
      }
      return hash(utf8ToBytes(value))
    case 'array':
    case 'tuple':
      return hash(encodeInPlace(type, value))
    default:
      return encodeAbiParameters([type], [value])
  }
}

/**
 * Topic filter for an event. `args` line up with the indexed inputs; null or
 * undefined leaves a position unconstrained.
 */
export function encodeEventTopics(
  source: EventSource,
  args: ReadonlyArray<AbiInputValue | null | undefined> = [],
  hash: HashFn = keccak256,
): Array<Uint8Array | null> {
  const event = toEvent(source)
  const indexed = event.inputs.filter((p) => p.indexed)
  if (args.length > indexed.length) {
    throw new EncodeError(
      `${event.name} has ${indexed.length} indexed inputs, got ${args.length} values`,
    )
  }
  const topics: Array<Uint8Array | null> = event.anonymous
    ? []
    : [eventTopic(event, hash)]
  indexed.forEach((param, i) => {
    const value = args[i]
    topics.push(
      value === null || value === undefined
        ? null
        : encodeTopic(param.type, value, hash),
    )
  })
  return topics
}

function decodeIndexed(
  param: AbiParameter,
  topic: Uint8Array,
): AbiDecodedValue {
  if (topic.length !== 32) {
    throw new DecodeError(`topic must be 32 bytes, got ${topic.length}`)
  }
  if (isHashedInTopic(param.type)) return topic.slice()
  return decodeAbiParameters([param.type], topic)[0]
}

/**
 * Decodes a log against an event. Topic0 must match unless the event is
 * anonymous. Indexed reference values come back as their 32-byte topic.
 */
export function decodeEventLog(
  source: EventSource,
  log: EventLog,
  hash: HashFn = keccak256,
): DecodedEventLog {
  const event = toEvent(source)
  const topics = log.topics.map(toBytes)
  let next = 0
  if (!event.anonymous) {
    const topic0 = topics.length > 0 ? topics[0] : undefined
    if (!topic0 || !equalsBytes(topic0, eventTopic(event, hash))) {
      throw new DecodeError(`log does not match event ${event.name}`)
    }
    next = 1
  }

  const indexed = event.inputs.filter((p) => p.indexed)
  if (topics.length - next !== indexed.length) {
    throw new DecodeError(
      `${event.name} expects ${indexed.length} indexed topics, got ${topics.length - next}`,
    )
  }
  const unindexed = decodeAbiParameters(
    event.inputs.filter((p) => !p.indexed),
    log.data,
  )

  const args: AbiDecodedValue[] = []
  const namedArgs: Record<string, AbiDecodedValue> = {}
  let dataIndex = 0
  for (const param of event.inputs) {
    const value = param.indexed
      ? decodeIndexed(param, topics[next++])
      : unindexed[dataIndex++]
    args.push(value)
    if (param.name) namedArgs[param.name] = value
  }
  return { eventName: event.name, args, namedArgs }
}
