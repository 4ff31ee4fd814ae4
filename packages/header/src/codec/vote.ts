import { BIGINT_0, MAX_INT64, copyBytes } from '@rollkit-ts/utils'
import debug from 'debug'
import Long from 'long'
import { HeaderRangeError } from '../errors'
import type { Hash, Timestamp } from '../types'
import { CANONICAL_VOTE_TYPE, lookupType } from './proto'

const log = debug('rollkit:header:vote')

/**
 * CometBFT signed message types.
 */
export const SignedMsgType = {
  Unknown: 0,
  Prevote: 1,
  Precommit: 2,
  Proposal: 32,
} as const

export type SignedMsgTypeEnum =
  (typeof SignedMsgType)[keyof typeof SignedMsgType]

export interface PartSetHeader {
  readonly total: number
  readonly hash: Uint8Array
}

export interface BlockId {
  readonly hash: Hash
  readonly partSetHeader: PartSetHeader
}

/**
 * Vote record in CometBFT's shape. The validator fields identify the
 * signer but are not part of the sign bytes.
 */
export interface CometVote {
  readonly type: SignedMsgTypeEnum
  readonly height: bigint
  readonly round: number
  readonly blockId: BlockId
  readonly timestamp: Timestamp
  readonly validatorAddress: Uint8Array
  readonly validatorIndex: number
}

type ProtoMessage = Record<string, unknown>

const toInt64 = (field: string, value: bigint): Long => {
  if (value > MAX_INT64) {
    throw new HeaderRangeError(field, value, MAX_INT64)
  }
  return Long.fromString(value.toString())
}

const isZeroBlockId = (blockId: BlockId): boolean =>
  blockId.hash.length === 0 &&
  blockId.partSetHeader.total === 0 &&
  blockId.partSetHeader.hash.length === 0

function canonicalPartSetHeader(psh: PartSetHeader): ProtoMessage {
  const message: ProtoMessage = {}
  if (psh.total !== 0) message.total = psh.total
  if (psh.hash.length > 0) message.hash = psh.hash
  return message
}

function canonicalBlockId(blockId: BlockId): ProtoMessage | undefined {
  // a zero block id (nil vote) is dropped entirely
  if (isZeroBlockId(blockId)) return undefined
  const message: ProtoMessage = {
    // non-nullable: written even when empty
    partSetHeader: canonicalPartSetHeader(blockId.partSetHeader),
  }
  if (blockId.hash.length > 0) message.hash = blockId.hash
  return message
}

function canonicalTimestamp(ts: Timestamp): ProtoMessage {
  const message: ProtoMessage = {}
  if (ts.seconds !== BIGINT_0) message.seconds = toInt64('time', ts.seconds)
  if (ts.nanos !== 0) message.nanos = ts.nanos
  return message
}

/**
 * Builds the `CanonicalVote` message CometBFT signs.
 */
export function canonicalizeVote(chainId: string, vote: CometVote): ProtoMessage {
  const message: ProtoMessage = {}
  if (vote.type !== SignedMsgType.Unknown) message.type = vote.type
  if (vote.height !== BIGINT_0) message.height = toInt64('height', vote.height)
  if (vote.round !== 0) message.round = Long.fromNumber(vote.round)
  const blockId = canonicalBlockId(vote.blockId)
  if (blockId !== undefined) message.blockId = blockId
  // non-nullable: written even for the epoch
  message.timestamp = canonicalTimestamp(vote.timestamp)
  if (chainId !== '') message.chainId = chainId
  return message
}

/**
 * Length-delimited protobuf encoding of the canonical vote, byte-identical
 * to CometBFT's `VoteSignBytes`.
 */
export function voteSignBytes(chainId: string, vote: CometVote): Uint8Array {
  const CanonicalVote = lookupType(CANONICAL_VOTE_TYPE)
  const bytes = copyBytes(
    CanonicalVote.encodeDelimited(canonicalizeVote(chainId, vote)).finish(),
  )
  log(
    'vote sign bytes: chainId=%s height=%s round=%d len=%d',
    chainId,
    vote.height.toString(),
    vote.round,
    bytes.length,
  )
  return bytes
}
