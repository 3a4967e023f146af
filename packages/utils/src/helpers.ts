/**
 * Throws if a string is not hex prefixed
 * @param input string to check hex prefix of
 */
export const assertIsHexString = (input: string): void => {
  if (!/^0x[0-9a-fA-F]*$/.test(input)) {
    const msg = `This method only supports 0x-prefixed hex strings but input was: ${input}`
    throw new Error(msg)
  }
}
