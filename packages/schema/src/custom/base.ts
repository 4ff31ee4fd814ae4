import { copyBytes, isHexString } from '@rollkit-ts/utils'
import { type Hex, hexToBytes } from 'viem'
import { z } from 'zod'
import type { FlexibleBytesInput, FlexibleBytesOptions } from './types'

export function zFlexibleBytes(options: FlexibleBytesOptions = {}) {
  const { errorMessage, defaultValue, byteLength, emptyAsDefault = false } =
    options

  const baseSchema = z.custom<FlexibleBytesInput>(
    (val) => {
      if (val === null || val === undefined) {
        return defaultValue !== undefined
      }
      if (val instanceof Uint8Array) return true
      if (typeof val === 'string') return isHexString(val)
      return false
    },
    {
      message: errorMessage || 'Invalid input: must be Uint8Array or hex string',
    },
  )

  const toBytes = (val: FlexibleBytesInput): Uint8Array => {
    if (val === null || val === undefined) {
      return defaultValue !== undefined
        ? copyBytes(defaultValue)
        : new Uint8Array(0)
    }
    // copy so callers cannot mutate header fields through their own buffers
    if (val instanceof Uint8Array) return copyBytes(val)
    const hex: Hex = val.startsWith('0x') ? `0x${val.slice(2)}` : `0x${val}`
    return hexToBytes(hex)
  }

  return baseSchema.transform((val, ctx) => {
    let bytes = toBytes(val)

    if (emptyAsDefault && bytes.length === 0 && defaultValue !== undefined) {
      bytes = copyBytes(defaultValue)
    }

    if (byteLength !== undefined && bytes.length !== byteLength) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message:
          errorMessage || `Expected ${byteLength} bytes, got ${bytes.length}`,
      })
      return z.NEVER
    }

    return bytes
  })
}
