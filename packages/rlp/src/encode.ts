import { concatBytes, intToBytes } from '@chainforge/utils'
import type { Input } from './types'
import { toBytes } from './utils'

const STRING_OFFSET = 0x80
const LIST_OFFSET = 0xc0

/**
 * RLP-encodes a byte string, integer or (nested) list. Integers use their
 * minimal big-endian form, so zero encodes as the empty string (0x80).
 */
export function encode(input: Input): Uint8Array {
  if (Array.isArray(input)) {
    const output: Uint8Array[] = []
    let outputLength = 0
    for (let i = 0; i < input.length; i++) {
      const encoded = encode(input[i])
      output.push(encoded)
      outputLength += encoded.length
    }
    return concatBytes(encodeLength(outputLength, LIST_OFFSET), ...output)
  }
  const inputBuf = toBytes(input)
  if (inputBuf.length === 1 && inputBuf[0] < STRING_OFFSET) {
    return inputBuf
  }
  return concatBytes(encodeLength(inputBuf.length, STRING_OFFSET), inputBuf)
}

function encodeLength(len: number, offset: number): Uint8Array {
  if (len < 56) {
    return Uint8Array.from([len + offset])
  }
  const lengthBytes = intToBytes(len)
  return concatBytes(
    Uint8Array.from([offset + 55 + lengthBytes.length]),
    lengthBytes,
  )
}
