import {
  BIGINT_0,
  bytesToHex,
  copyBytes,
} from '@rollkit-ts/utils'
import { sha256 } from 'ethereum-cryptography/sha256.js'
import Long from 'long'
import { HEADER_TYPE, lookupType } from '../codec/proto'
import type { FrozenHeader, Hash, JSONHeader } from '../types'

type ProtoMessage = Record<string, unknown>

const toUint64 = (value: bigint): Long => Long.fromString(value.toString(), true)

// proto3 leaves zero scalars and empty bytes off the wire
const setUint64 = (message: ProtoMessage, key: string, value: bigint) => {
  if (value !== BIGINT_0) message[key] = toUint64(value)
}

const setBytes = (message: ProtoMessage, key: string, value: Uint8Array) => {
  if (value.length > 0) message[key] = value
}

/**
 * Plain object in the shape of `rollkit.types.Header`, ready for encoding.
 */
export function toProtoObject(header: FrozenHeader): ProtoMessage {
  const data = header.data
  const message: ProtoMessage = {}

  const version: ProtoMessage = {}
  setUint64(version, 'block', data.version.block)
  setUint64(version, 'app', data.version.app)
  if (Object.keys(version).length > 0) message.version = version

  setUint64(message, 'height', data.height)
  setUint64(message, 'time', data.time)
  setBytes(message, 'lastHeaderHash', data.lastHeaderHash)
  setBytes(message, 'lastCommitHash', data.lastCommitHash)
  setBytes(message, 'dataHash', data.dataHash)
  setBytes(message, 'consensusHash', data.consensusHash)
  setBytes(message, 'appHash', data.appHash)
  setBytes(message, 'lastResultsHash', data.lastResultsHash)
  setBytes(message, 'proposerAddress', data.proposerAddress)
  setBytes(message, 'validatorHash', data.validatorHash)
  if (data.chainId !== '') message.chainId = data.chainId

  return message
}

export function serialize(header: FrozenHeader): Uint8Array {
  const HeaderType = lookupType(HEADER_TYPE)
  return copyBytes(HeaderType.encode(toProtoObject(header)).finish())
}

export function computeHash(header: FrozenHeader): Hash {
  return sha256(serialize(header))
}

export function getHash(header: FrozenHeader): Hash {
  if (header._cache.hash !== undefined) {
    return copyBytes(header._cache.hash)
  }
  return computeHash(header)
}

export function toJSON(header: FrozenHeader): JSONHeader {
  const data = header.data
  return {
    height: data.height.toString(),
    time: data.time.toString(),
    chainId: data.chainId,
    version: {
      block: data.version.block.toString(),
      app: data.version.app.toString(),
    },
    lastHeaderHash: bytesToHex(data.lastHeaderHash),
    lastCommitHash: bytesToHex(data.lastCommitHash),
    dataHash: bytesToHex(data.dataHash),
    consensusHash: bytesToHex(data.consensusHash),
    appHash: bytesToHex(data.appHash),
    validatorHash: bytesToHex(data.validatorHash),
    lastResultsHash: bytesToHex(data.lastResultsHash),
    proposerAddress: bytesToHex(data.proposerAddress),
  }
}
