import { copyBytes } from '@rollkit-ts/utils'
import { fromBytes, fromHeaderData } from './creators'
import {
  getBaseHeader,
  getChainId,
  getHash,
  getHeight,
  getLastHeader,
  getTime,
  makeCometBFTVote,
  serialize,
  toJSON,
  validate,
  validateBasic,
  verify,
} from './helpers'
import type { SyncHeader } from './sync/interfaces'
import type {
  BaseHeader,
  CreateHeaderOptions,
  FrozenHeader,
  Hash,
  HeaderData,
  JSONHeader,
  Version,
} from './types'

/**
 * Rollup block header.
 *
 * Wraps a {@link FrozenHeader} with read-only field access and the
 * {@link SyncHeader} operations the header sync framework drives.
 */
export interface Header extends SyncHeader<Header> {
  readonly header: FrozenHeader
  readonly baseHeader: BaseHeader
  readonly version: Version
  readonly lastHeaderHash: Hash
  readonly lastCommitHash: Hash
  readonly dataHash: Hash
  readonly consensusHash: Hash
  readonly appHash: Hash
  readonly validatorHash: Hash
  readonly lastResultsHash: Hash
  readonly proposerAddress: Uint8Array

  validateBasic(): void
  makeCometBFTVote(): Uint8Array
  serialize(): Uint8Array
  toJSON(): JSONHeader
}

export function createHeader(
  headerData: HeaderData = {},
  opts: CreateHeaderOptions = {},
): Header {
  return createHeaderFromFrozen(fromHeaderData(headerData, opts))
}

export function createHeaderFromBytes(
  serialized: Uint8Array,
  opts: CreateHeaderOptions = {},
): Header {
  return createHeaderFromFrozen(fromBytes(serialized, opts))
}

/**
 * Zero-value header: height 0, epoch time, empty chain id, zero hashes
 * and no proposer.
 */
export function createEmptyHeader(): Header {
  return createHeader()
}

export function createHeaderFromFrozen(header: FrozenHeader): Header {
  const data = header.data

  return Object.freeze({
    header,
    baseHeader: getBaseHeader(header),
    version: data.version,
    // byte fields are handed out as copies; the frozen data keeps its own
    get lastHeaderHash() {
      return copyBytes(data.lastHeaderHash)
    },
    get lastCommitHash() {
      return copyBytes(data.lastCommitHash)
    },
    get dataHash() {
      return copyBytes(data.dataHash)
    },
    get consensusHash() {
      return copyBytes(data.consensusHash)
    },
    get appHash() {
      return copyBytes(data.appHash)
    },
    get validatorHash() {
      return copyBytes(data.validatorHash)
    },
    get lastResultsHash() {
      return copyBytes(data.lastResultsHash)
    },
    get proposerAddress() {
      return copyBytes(data.proposerAddress)
    },

    // SyncHeader
    createEmpty: () => createEmptyHeader(),
    chainId: () => getChainId(header),
    height: () => getHeight(header),
    time: () => getTime(header),
    lastHeader: () => getLastHeader(header),
    hash: () => getHash(header),
    validate: () => validate(header),
    verify: (untrusted: Header) => verify(header, untrusted.header),
    marshalBinary: () => serialize(header),
    unmarshalBinary: (bytes: Uint8Array) => createHeaderFromBytes(bytes),

    validateBasic: () => validateBasic(header),
    makeCometBFTVote: () => makeCometBFTVote(header),
    serialize: () => serialize(header),
    toJSON: () => toJSON(header),
  })
}
