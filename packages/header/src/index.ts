// Types
export type {
  BaseHeader,
  CreateHeaderOptions,
  FrozenHeader,
  Hash,
  HeaderData,
  JSONHeader,
  Timestamp,
  ValidatedHeaderData,
  Version,
} from './types'
export type { Header } from './header-manager'

// Factory functions (manager pattern)
export {
  createEmptyHeader,
  createHeader,
  createHeaderFromBytes,
  createHeaderFromFrozen,
} from './header-manager'

// Creator functions (lower-level, return FrozenHeader)
export { fromBytes, fromHeaderData, fromValidatedData } from './creators'

// Pure helper functions (for direct use with FrozenHeader)
export {
  // Accessors
  getBaseHeader,
  getChainId,
  getHeight,
  getLastHeader,
  getTime,
  nanosToTimestamp,
  timestampToDate,
  timestampToNanos,

  // Validation
  validate,
  validateBasic,
  verify,

  // Serialization
  computeHash,
  getHash,
  serialize,
  toJSON,
  toProtoObject,

  // Consensus vote
  makeCometBFTVote,
  makeVote,
} from './helpers'

export {
  SignedMsgType,
  canonicalizeVote,
  voteSignBytes,
} from './codec/vote'
export type {
  BlockId,
  CometVote,
  PartSetHeader,
  SignedMsgTypeEnum,
} from './codec/vote'

export { validateHeaderData, zHeaderSchema } from './validation'

export * from './config'
export * from './errors'
export * from './sync'
