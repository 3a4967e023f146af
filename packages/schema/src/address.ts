import { Address, hexToBytes } from '@chainforge/utils'
import { isHex } from 'viem'
import { z } from 'zod'

export type AddressInput = Address | Uint8Array | string

/**
 * Zod schema for AddressLike inputs, producing Address instances.
 *
 * Accepts Address instances, 20-byte Uint8Arrays and 0x-prefixed 40 character
 * hex strings in any letter case.
 */
export const zAddress = (options: { errorMessage?: string } = {}) => {
  const message =
    options.errorMessage ??
    'Invalid address: must be Address, 20-byte Uint8Array, or 0x-prefixed 40 char hex'
  return z
    .custom<AddressInput>(
      (val) => {
        if (val instanceof Address) return true
        if (val instanceof Uint8Array) return val.length === 20
        return typeof val === 'string' && isHex(val, { strict: true }) && val.length === 42
      },
      { message },
    )
    .transform((val) => {
      if (val instanceof Address) return val
      if (val instanceof Uint8Array) return new Address(Uint8Array.from(val))
      return new Address(hexToBytes(val))
    })
}
