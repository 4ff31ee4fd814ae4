/**
 * Creates an Error without a code property
 * @param message Error message
 * @returns Error instance
 */
export const HeaderErrorWithoutCode = (message: string): Error => {
  return new Error(message)
}

/**
 * Throws if a string is not a hex string (0x prefix optional)
 * @param input string to check
 */
export const assertIsHexString = (input: string): void => {
  if (typeof input !== 'string' || !/^(0x)?[0-9a-fA-F]*$/.test(input)) {
    const msg = `This method only supports hex strings but input was: ${input}`
    throw HeaderErrorWithoutCode(msg)
  }
}

export const assertIsBytes = (input: Uint8Array): void => {
  if (!(input instanceof Uint8Array)) {
    const msg = `This method only supports Uint8Array but input was: ${input}`
    throw HeaderErrorWithoutCode(msg)
  }
}
