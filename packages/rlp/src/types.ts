export type Input =
  | string
  | number
  | bigint
  | Uint8Array
  | Array<Input>
  | null
  | undefined

export type NestedUint8Array = Array<Uint8Array | NestedUint8Array>

/**
 * A decoded RLP item: a byte string or a list of items
 */
export type RlpItem = Uint8Array | NestedUint8Array

export interface Decoded {
  data: RlpItem
  remainder: Uint8Array
}
