import {
  MAX_INT64,
  NANOS_PER_MILLISECOND,
  NANOS_PER_SECOND,
  copyBytes,
} from '@rollkit-ts/utils'
import { HeaderRangeError } from '../errors'
import type { BaseHeader, FrozenHeader, Hash, Timestamp } from '../types'

export function getHeight(header: FrozenHeader): bigint {
  return header.data.height
}

export function getChainId(header: FrozenHeader): string {
  return header.data.chainId
}

export function getLastHeader(header: FrozenHeader): Hash {
  return copyBytes(header.data.lastHeaderHash)
}

export function getBaseHeader(header: FrozenHeader): BaseHeader {
  const { height, time, chainId } = header.data
  return { height, time, chainId }
}

/**
 * Throws if a uint64 field cannot be carried as a signed 64-bit value.
 */
export function assertInt64(field: string, value: bigint): bigint {
  if (value > MAX_INT64) {
    throw new HeaderRangeError(field, value, MAX_INT64)
  }
  return value
}

/**
 * Epoch plus `nanos` nanoseconds, exact. Values past the signed 64-bit
 * nanosecond range are rejected.
 */
export function nanosToTimestamp(nanos: bigint): Timestamp {
  assertInt64('time', nanos)
  return {
    seconds: nanos / NANOS_PER_SECOND,
    nanos: Number(nanos % NANOS_PER_SECOND),
  }
}

export function timestampToNanos(ts: Timestamp): bigint {
  return ts.seconds * NANOS_PER_SECOND + BigInt(ts.nanos)
}

/**
 * JS dates only hold milliseconds; the sub-millisecond part is dropped.
 */
export function timestampToDate(ts: Timestamp): Date {
  return new Date(Number(timestampToNanos(ts) / NANOS_PER_MILLISECOND))
}

export function getTime(header: FrozenHeader): Timestamp {
  return nanosToTimestamp(header.data.time)
}
