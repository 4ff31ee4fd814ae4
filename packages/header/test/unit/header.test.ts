import {
  bytesToHex,
  concatBytes,
  hexToBytes,
  MAX_INT64,
  utf8ToBytes,
} from '@rollkit-ts/utils'
import { sha256 } from 'ethereum-cryptography/sha256.js'
import { assert, describe, expect, it } from 'vitest'
import {
  createEmptyHeader,
  createHeader,
  createHeaderFromBytes,
  ErrorCode,
  getHash,
  type Header,
  HeaderDecodeError,
  HeaderRangeError,
  InvalidHeaderDataError,
  isZero,
  nanosToTimestamp,
  type SyncHeader,
  timestampToDate,
  timestampToNanos,
  validateHeaderData,
} from '../../src'

const ZERO_HASH = new Uint8Array(32)
const hashField = (tag: number) =>
  concatBytes(new Uint8Array([tag, 0x20]), ZERO_HASH)

function fullHeader(): Header {
  return createHeader({
    height: 42n,
    time: 1_700_000_000_123_456_789n,
    chainId: 'rollkit-test',
    version: { block: 11n, app: 3n },
    lastHeaderHash: new Uint8Array(32).fill(0x01),
    lastCommitHash: new Uint8Array(32).fill(0x02),
    dataHash: new Uint8Array(32).fill(0x03),
    consensusHash: new Uint8Array(32).fill(0x04),
    appHash: new Uint8Array(32).fill(0x05),
    validatorHash: new Uint8Array(32).fill(0x06),
    lastResultsHash: new Uint8Array(32).fill(0x07),
    proposerAddress: new Uint8Array(20).fill(0xaa),
  })
}

describe('[Header]: construction', () => {
  it('should create with default constructor', () => {
    function compareDefaultHeader(header: Header) {
      assert.strictEqual(header.height(), 0n)
      assert.strictEqual(header.baseHeader.time, 0n)
      assert.strictEqual(header.chainId(), '')
      assert.deepEqual(header.version, { block: 0n, app: 0n })
      expect(header.lastHeaderHash).toEqualBytes(ZERO_HASH)
      expect(header.lastCommitHash).toEqualBytes(ZERO_HASH)
      expect(header.dataHash).toEqualBytes(ZERO_HASH)
      expect(header.consensusHash).toEqualBytes(ZERO_HASH)
      expect(header.appHash).toEqualBytes(ZERO_HASH)
      expect(header.validatorHash).toEqualBytes(ZERO_HASH)
      expect(header.lastResultsHash).toEqualBytes(ZERO_HASH)
      expect(header.proposerAddress).toEqualBytes(new Uint8Array(0))
    }

    compareDefaultHeader(createHeader())
    compareDefaultHeader(createEmptyHeader())
    compareDefaultHeader(fullHeader().createEmpty())
  })

  it('should accept hex strings and decimal strings', () => {
    const header = createHeader({
      height: '7',
      time: 9,
      dataHash: `0x${'ab'.repeat(32)}`,
      proposerAddress: 'aabb',
    })
    assert.strictEqual(header.height(), 7n)
    assert.strictEqual(header.baseHeader.time, 9n)
    expect(header.dataHash).toEqualBytes(new Uint8Array(32).fill(0xab))
    expect(header.proposerAddress).toEqualBytes(new Uint8Array([0xaa, 0xbb]))
  })

  it('should normalize empty hashes to the zero hash', () => {
    const header = createHeader({ appHash: new Uint8Array(0) })
    expect(header.appHash).toEqualBytes(ZERO_HASH)
  })

  it('should not build a header from malformed data', () => {
    expect(() => createHeader({ dataHash: new Uint8Array(31) })).toThrow(
      'invalid header data: dataHash: dataHash must be 32 bytes',
    )
    expect(() => createHeader({ height: -1n })).toThrow(
      'invalid header data: height: height must be a uint64',
    )
    try {
      validateHeaderData({ chainId: 5 })
      assert.fail('should have thrown')
    } catch (err) {
      assert.instanceOf(err, InvalidHeaderDataError)
      if (err instanceof InvalidHeaderDataError) {
        assert.strictEqual(err.code, ErrorCode.INVALID_HEADER_DATA)
        assert.deepEqual(err.issues, ['chainId: chainId must be a string'])
      }
    }
  })

  it('should build headers without a proposer', () => {
    const header = createHeader({ height: 1n })
    assert.strictEqual(header.hash().length, 32)
  })

  it('should freeze by default and cache the hash', () => {
    const header = createHeader({ height: 3n })
    assert.isFrozen(header, 'header should be frozen by default')
    assert.isFrozen(header.header.data)
    assert.isFrozen(header.header.data.version)
    assert.isDefined(header.header._cache.hash)

    const unfrozen = createHeader({ height: 3n }, { freeze: false })
    assert.isNotFrozen(unfrozen.header.data)
    assert.isUndefined(unfrozen.header._cache.hash)
    expect(getHash(unfrozen.header)).toEqualBytes(header.hash())
  })

  it('should not share byte buffers with its input', () => {
    const proposer = new Uint8Array(20).fill(0xaa)
    const header = createHeader({ proposerAddress: proposer })
    proposer[0] = 0
    assert.strictEqual(header.proposerAddress[0], 0xaa)
  })
})

describe('[Header]: immutability', () => {
  it('should hand out copies of its byte fields and hash', () => {
    const header = fullHeader()
    const twin = fullHeader()
    const hashHex = bytesToHex(header.hash())
    const voteHex = bytesToHex(header.makeCometBFTVote())

    header.hash()[0] ^= 0xff
    header.lastHeader()[0] ^= 0xff
    header.proposerAddress[0] = 0
    header.dataHash[0] = 0
    header.lastHeaderHash[0] = 0

    assert.strictEqual(bytesToHex(header.hash()), hashHex)
    expect(header.hash()).toEqualBytes(sha256(header.serialize()))
    assert.strictEqual(bytesToHex(header.makeCometBFTVote()), voteHex)
    expect(header.proposerAddress).toEqualBytes(new Uint8Array(20).fill(0xaa))
    expect(header.dataHash).toEqualBytes(new Uint8Array(32).fill(0x03))
    expect(header.lastHeader()).toEqualBytes(new Uint8Array(32).fill(0x01))
    assert.doesNotThrow(() => twin.verify(header))
  })
})

describe('[Header]: accessors', () => {
  it('should expose base header fields', () => {
    const header = fullHeader()
    assert.strictEqual(header.height(), 42n)
    assert.strictEqual(header.chainId(), 'rollkit-test')
    assert.deepEqual(header.baseHeader, {
      height: 42n,
      time: 1_700_000_000_123_456_789n,
      chainId: 'rollkit-test',
    })
    expect(header.lastHeader()).toEqualBytes(new Uint8Array(32).fill(0x01))
  })

  it('should convert time to an exact timestamp', () => {
    const ts = fullHeader().time()
    assert.deepEqual(ts, { seconds: 1_700_000_000n, nanos: 123_456_789 })
    assert.strictEqual(timestampToNanos(ts), 1_700_000_000_123_456_789n)
    assert.strictEqual(
      timestampToDate(ts).toISOString(),
      '2023-11-14T22:13:20.123Z',
    )
  })

  it('should map time zero to the epoch', () => {
    assert.deepEqual(createEmptyHeader().time(), { seconds: 0n, nanos: 0 })
  })

  it('should reject times past the signed 64-bit range', () => {
    assert.deepEqual(nanosToTimestamp(MAX_INT64), {
      seconds: 9_223_372_036n,
      nanos: 854_775_807,
    })

    const header = createHeader({ time: MAX_INT64 + 1n })
    assert.throws(() => header.time(), HeaderRangeError)
    expect(() => header.time()).toThrow(
      'time 9223372036854775808 exceeds the signed 64-bit maximum 9223372036854775807',
    )
  })

  it('should render JSON', () => {
    const header = createHeader({
      height: 5n,
      time: 10n,
      chainId: 'c',
      version: { block: 1n, app: 2n },
      proposerAddress: '0xaabb',
    })
    const zeroHex = `0x${'00'.repeat(32)}`
    assert.deepEqual(header.toJSON(), {
      height: '5',
      time: '10',
      chainId: 'c',
      version: { block: '1', app: '2' },
      lastHeaderHash: zeroHex,
      lastCommitHash: zeroHex,
      dataHash: zeroHex,
      consensusHash: zeroHex,
      appHash: zeroHex,
      validatorHash: zeroHex,
      lastResultsHash: zeroHex,
      proposerAddress: '0xaabb',
    })
  })
})

describe('[Header]: sync capability', () => {
  it('should conform to SyncHeader', () => {
    const header: SyncHeader<Header> = fullHeader()
    assert.strictEqual(header.height(), 42n)
  })

  it('should detect absent headers', () => {
    assert.isTrue(isZero<Header>(undefined))
    assert.isTrue(isZero<Header>(null))
    assert.isFalse(isZero(createEmptyHeader()))
  })

  it('should validate through the capability alias', () => {
    assert.throws(() => createEmptyHeader().validate(), 'no proposer address')
    assert.doesNotThrow(() => fullHeader().validate())
  })
})

describe('[Header]: serialization', () => {
  it('should encode fields in field-number order and omit zero values', () => {
    const header = createHeader({
      height: 1n,
      chainId: 'a',
      proposerAddress: new Uint8Array([0xaa]),
    })
    const expected = concatBytes(
      hexToBytes('0x1001'),
      hashField(0x22),
      hashField(0x2a),
      hashField(0x32),
      hashField(0x3a),
      hashField(0x42),
      hashField(0x4a),
      hexToBytes('0x5201aa'),
      hashField(0x5a),
      hexToBytes('0x6201'),
      utf8ToBytes('a'),
    )
    expect(header.serialize()).toEqualBytes(expected)
    expect(header.marshalBinary()).toEqualBytes(expected)
  })

  it('should round-trip every field', () => {
    const header = fullHeader()
    const decoded = createHeaderFromBytes(header.serialize())
    assert.deepEqual(decoded.toJSON(), header.toJSON())
    expect(decoded.header.data).toEqual(header.header.data)
    expect(decoded.hash()).toEqualBytes(header.hash())
  })

  it('should round-trip the zero header', () => {
    const header = createEmptyHeader()
    const decoded = header.unmarshalBinary(header.marshalBinary())
    assert.deepEqual(decoded.toJSON(), header.toJSON())
  })

  it('should round-trip uint64 extremes', () => {
    const header = createHeader({
      height: 18_446_744_073_709_551_615n,
      time: 18_446_744_073_709_551_615n,
      version: { block: 18_446_744_073_709_551_615n, app: 1n },
    })
    const decoded = createHeaderFromBytes(header.serialize())
    assert.strictEqual(decoded.height(), 18_446_744_073_709_551_615n)
    assert.strictEqual(decoded.baseHeader.time, 18_446_744_073_709_551_615n)
    assert.deepEqual(decoded.version, {
      block: 18_446_744_073_709_551_615n,
      app: 1n,
    })
  })

  it('should fail on truncated input', () => {
    try {
      createHeaderFromBytes(new Uint8Array([0x22, 0x05, 0x01]))
      assert.fail('should have thrown')
    } catch (err) {
      assert.instanceOf(err, HeaderDecodeError)
      if (err instanceof HeaderDecodeError) {
        assert.strictEqual(err.code, ErrorCode.HEADER_DECODE_ERROR)
      }
    }
  })

  it('should fail on hashes of the wrong length', () => {
    expect(() =>
      createHeaderFromBytes(new Uint8Array([0x22, 0x03, 0x01, 0x02, 0x03])),
    ).toThrow(
      'cannot decode header: lastHeaderHash: lastHeaderHash must be 32 bytes',
    )
  })
})

describe('[Header]: hash', () => {
  it('should be sha256 of the serialized header', () => {
    const header = fullHeader()
    expect(header.hash()).toEqualBytes(sha256(header.serialize()))
    assert.strictEqual(header.hash().length, 32)
  })

  it('should be deterministic across instances', () => {
    assert.strictEqual(
      bytesToHex(fullHeader().hash()),
      bytesToHex(fullHeader().hash()),
    )
  })

  it('should change with any field', () => {
    const base = fullHeader()
    const changed = createHeader({
      ...base.toJSON(),
      dataHash: new Uint8Array(32).fill(0x09),
    })
    assert.notStrictEqual(bytesToHex(changed.hash()), bytesToHex(base.hash()))
  })
})
