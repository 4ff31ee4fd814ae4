export type FlexibleBytesInput = Uint8Array | string | null | undefined

export interface FlexibleBytesOptions {
  errorMessage?: string
  defaultValue?: Uint8Array
  byteLength?: number
  /** Treat a zero-length input as absent and substitute the default */
  emptyAsDefault?: boolean
}

export type Uint64Input = bigint | number | string | null | undefined
