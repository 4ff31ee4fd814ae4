import { zeros } from '@rollkit-ts/utils'
import { zFlexibleBytes } from './base'

/**
 * 32-byte hash field. Missing or zero-length input becomes the default
 * (32 zero bytes unless overridden).
 */
export const zBytes32 = (
  options: { defaultValue?: Uint8Array; errorMessage?: string } = {},
) =>
  zFlexibleBytes({
    byteLength: 32,
    defaultValue: options.defaultValue ?? zeros(32),
    errorMessage: options.errorMessage,
    emptyAsDefault: true,
  })

export const zBytesVar = (defaultValue: Uint8Array = zeros(0)) =>
  zFlexibleBytes({ defaultValue })
