import { type CometVote, SignedMsgType, voteSignBytes } from '../codec/vote'
import type { FrozenHeader } from '../types'
import { getChainId, getTime } from './getters'
import { getHash } from './serialize-helpers'

/**
 * Precommit vote for the header as signed by the sequencer.
 *
 * A single sequencer signs each height once, so the round and validator
 * index are always 0.
 */
export function makeVote(header: FrozenHeader): CometVote {
  return {
    type: SignedMsgType.Precommit,
    height: header.data.height,
    round: 0,
    // header hash is the block hash
    blockId: {
      hash: getHash(header),
      partSetHeader: { total: 0, hash: new Uint8Array(0) },
    },
    timestamp: getTime(header),
    // proposer = sequencer = validator
    validatorAddress: header.data.proposerAddress,
    validatorIndex: 0,
  }
}

export function makeCometBFTVote(header: FrozenHeader): Uint8Array {
  return voteSignBytes(getChainId(header), makeVote(header))
}
