import type { PrefixedHexString } from '@rollkit-ts/utils'
import type { HeaderInput } from './validation/schema'

/**
 * 32-byte digest, compared byte for byte.
 */
export type Hash = Uint8Array

/**
 * Block and app version pair.
 */
export interface Version {
  readonly block: bigint
  readonly app: bigint
}

/**
 * Chain identity and ordering attributes shared by every header.
 */
export interface BaseHeader {
  readonly height: bigint
  /** Unix time in nanoseconds */
  readonly time: bigint
  readonly chainId: string
}

/**
 * Loose header input; every field is optional and normalized on creation.
 */
export type HeaderData = HeaderInput

/**
 * Normalized header fields.
 */
export interface ValidatedHeaderData extends BaseHeader {
  readonly version: Version
  /** Hash of the immediately preceding header */
  readonly lastHeaderHash: Hash
  /** Commit from the aggregator(s) of the previous block */
  readonly lastCommitHash: Hash
  /** Root of the block data */
  readonly dataHash: Hash
  /** Consensus params for the current block */
  readonly consensusHash: Hash
  /** State after applying the block's transactions */
  readonly appHash: Hash
  /** Light client compatibility */
  readonly validatorHash: Hash
  /** Root of the results of the previous block's transactions */
  readonly lastResultsHash: Hash
  /** Signer of this header; variable length */
  readonly proposerAddress: Uint8Array
}

/**
 * Immutable header state containing validated data and computed caches.
 * Byte fields are the header's own buffers and must not be written to.
 */
export interface FrozenHeader {
  readonly data: ValidatedHeaderData
  readonly _cache: {
    readonly hash: Hash | undefined
  }
}

export interface CreateHeaderOptions {
  /** Freeze the header and precompute its hash (default true) */
  readonly freeze?: boolean
}

/**
 * Epoch-relative timestamp with nanosecond precision.
 */
export interface Timestamp {
  readonly seconds: bigint
  readonly nanos: number
}

export interface JSONHeader {
  height: string
  time: string
  chainId: string
  version: { block: string; app: string }
  lastHeaderHash: PrefixedHexString
  lastCommitHash: PrefixedHexString
  dataHash: PrefixedHexString
  consensusHash: PrefixedHexString
  appHash: PrefixedHexString
  validatorHash: PrefixedHexString
  lastResultsHash: PrefixedHexString
  proposerAddress: PrefixedHexString
}
