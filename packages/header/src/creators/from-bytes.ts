import { HEADER_TYPE, lookupType } from '../codec/proto'
import { HeaderDecodeError, InvalidHeaderDataError } from '../errors'
import type { CreateHeaderOptions, FrozenHeader } from '../types'
import { validateHeaderData } from '../validation'
import { fromValidatedData } from './from-header-data'

function decode(serialized: Uint8Array): Record<string, unknown> {
  const HeaderType = lookupType(HEADER_TYPE)
  try {
    // uint64 fields come back as decimal strings, bytes as buffers
    return HeaderType.toObject(HeaderType.decode(serialized), { longs: String })
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err)
    throw new HeaderDecodeError(message, err)
  }
}

export function fromBytes(
  serialized: Uint8Array,
  opts: CreateHeaderOptions = {},
): FrozenHeader {
  const decoded = decode(serialized)
  try {
    return fromValidatedData(validateHeaderData(decoded), opts)
  } catch (err: unknown) {
    if (err instanceof InvalidHeaderDataError) {
      throw new HeaderDecodeError(err.issues.join('; '), err)
    }
    throw err
  }
}
