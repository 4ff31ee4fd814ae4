import type { Hash, Timestamp } from '../types'

/**
 * The operations a generic verifiable header chain needs from a header
 * type. Header implementations declare conformance with `extends`, so a
 * missing or mistyped member fails the build.
 */
export interface SyncHeader<H extends SyncHeader<H>> {
  /** Fresh zero-value header of the same type */
  createEmpty(): H
  chainId(): string
  height(): bigint
  time(): Timestamp
  /** Hash of the previous header */
  lastHeader(): Hash
  hash(): Hash
  /** Structural validation; throws on malformed headers */
  validate(): void
  /** Trust continuity from this (trusted) header to `untrusted`; throws on failure */
  verify(untrusted: H): void
  marshalBinary(): Uint8Array
  /** Decodes into a new header; the receiver is left unchanged */
  unmarshalBinary(data: Uint8Array): H
}

/**
 * Absence check. Run it before calling anything on a header that may
 * not be there.
 */
export function isZero<H extends SyncHeader<H>>(
  header: H | null | undefined,
): header is null | undefined {
  return header === null || header === undefined
}
