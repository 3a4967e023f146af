export { decodeAbiParameters } from './decoder'
export { encodeAbiParameters } from './encoder'
export {
  type DecodedEventLog,
  decodeEventLog,
  type EventLog,
  type EventSource,
  encodeEventTopics,
} from './events'
export {
  decodeFunctionData,
  decodeFunctionResult,
  encodeFunctionData,
  type FunctionSource,
} from './function'
export {
  formatAbi,
  formatAbiItem,
  type JsonAbiItem,
  type JsonAbiParameter,
  parseAbi,
} from './json'
export { encodePacked } from './packed'
export {
  formatAbiType,
  formatSignature,
  isPayable,
  isReadOnly,
  type ParameterSource,
  parseAbiType,
  parseErrorSignature,
  parseEventSignature,
  parseFunctionSignature,
  parseParameter,
  parseSignature,
  splitTopLevel,
  toAbiType,
} from './parser'
export {
  type DecodedRevert,
  decodeRevert,
  ERROR_STRING_SELECTOR,
  PANIC_SELECTOR,
  panicMessage,
} from './revert'
export {
  canonicalSignature,
  eventTopic,
  functionSelector,
  type SelectorSource,
} from './selector'
export {
  domainFields,
  encodeData,
  encodeType,
  hashDomain,
  hashStruct,
  hashTypedData,
  type TypedDataDefinition,
  type TypedDataDomain,
  type TypedDataField,
  type TypedDataRecord,
  type TypedDataTypes,
} from './typed-data'
export * from './types'
