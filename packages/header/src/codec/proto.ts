import { fileURLToPath } from 'node:url'
import debug from 'debug'
import protobuf from 'protobufjs'
import type { Root, Type } from 'protobufjs'

const log = debug('rollkit:header:codec')

const PROTO_FILES = [
  'rollkit/types/header.proto',
  'tendermint/types/canonical.proto',
].map((file) => fileURLToPath(new URL(`../../proto/${file}`, import.meta.url)))

let root: Root | undefined

/**
 * Loads the header and canonical vote definitions once, on first use.
 */
export function getProtoRoot(): Root {
  if (root === undefined) {
    log('loading proto definitions: %o', PROTO_FILES)
    root = protobuf.loadSync(PROTO_FILES)
  }
  return root
}

export function lookupType(name: string): Type {
  return getProtoRoot().lookupType(name)
}

export const HEADER_TYPE = 'rollkit.types.Header'
export const CANONICAL_VOTE_TYPE = 'tendermint.types.CanonicalVote'
