export const BIGINT_0 = BigInt(0)
export const BIGINT_1 = BigInt(1)

export const MAX_UINT64 = BigInt('0xffffffffffffffff')
export const MAX_INT64 = BigInt('0x7fffffffffffffff')

export const NANOS_PER_SECOND = BigInt(1_000_000_000)
export const NANOS_PER_MILLISECOND = BigInt(1_000_000)
