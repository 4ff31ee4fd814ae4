import {
  concatBytes,
  equalsBytes,
  bytesToHex as unprefixedHex,
  hexToBytes as unprefixedHexToBytes,
  utf8ToBytes,
} from 'ethereum-cryptography/utils.js'
import { assertIsBytes, assertIsHexString } from './helpers'

export type PrefixedHexString = `0x${string}`

export { concatBytes, equalsBytes, utf8ToBytes }

export const isHexString = (value: string): boolean =>
  /^(0x)?[0-9a-fA-F]*$/.test(value)

export const stripHexPrefix = (value: string): string =>
  value.startsWith('0x') ? value.slice(2) : value

export const padToEven = (value: string): string =>
  value.length % 2 === 0 ? value : `0${value}`

/**
 * Lowercase, 0x-prefixed hex of a byte array.
 */
export const bytesToHex = (bytes: Uint8Array): PrefixedHexString => {
  assertIsBytes(bytes)
  return `0x${unprefixedHex(bytes)}`
}

/**
 * Uppercase hex without prefix, the form used in verification diagnostics.
 */
export const bytesToUpperHex = (bytes: Uint8Array): string =>
  unprefixedHex(bytes).toUpperCase()

/**
 * Decodes a hex string, with or without 0x prefix. Odd-length input is
 * left-padded with a zero nibble.
 */
export const hexToBytes = (hex: string): Uint8Array => {
  assertIsHexString(hex)
  return unprefixedHexToBytes(padToEven(stripHexPrefix(hex)))
}

export const zeros = (length: number): Uint8Array => new Uint8Array(length)

/**
 * Copies a byte view into a plain Uint8Array, detaching it from any
 * Buffer pool it was sliced from.
 */
export const copyBytes = (bytes: Uint8Array): Uint8Array =>
  Uint8Array.from(bytes)
