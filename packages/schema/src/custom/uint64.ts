import { BIGINT_0, MAX_UINT64 } from '@rollkit-ts/utils'
import { z } from 'zod'
import type { Uint64Input } from './types'

/**
 * Unsigned 64-bit integer, parsed from a bigint, a safe integer or a
 * decimal string and always output as bigint.
 */
export const zUint64 = (
  options: { defaultValue?: bigint; errorMessage?: string } = {},
) => {
  const { defaultValue = BIGINT_0, errorMessage } = options

  return z
    .custom<Uint64Input>(
      (val) => {
        if (val === null || val === undefined) return true
        if (typeof val === 'bigint') return true
        if (typeof val === 'number') return Number.isSafeInteger(val)
        if (typeof val === 'string') return /^[0-9]+$/.test(val)
        return false
      },
      {
        message:
          errorMessage ||
          'Invalid input: must be bigint, safe integer or decimal string',
      },
    )
    .transform((val, ctx) => {
      const value =
        val === null || val === undefined ? defaultValue : BigInt(val)
      if (value < BIGINT_0 || value > MAX_UINT64) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: errorMessage || `Value ${value} is outside the uint64 range`,
        })
        return z.NEVER
      }
      return value
    })
}
