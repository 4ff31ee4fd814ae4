import {
  BIGINT_1,
  NANOS_PER_MILLISECOND,
  type Safe,
  equalsBytes,
  safeError,
  safeResult,
} from '@rollkit-ts/utils'
import debug from 'debug'
import * as _ from 'radash'
import { DEFAULT_VERIFY_CONFIG, type VerifyConfig } from '../config'
import {
  ErrorCode,
  FromFutureError,
  HeightFromFutureError,
  KnownHeaderError,
  NonAdjacentLinkError,
  UnorderedTimeError,
  VerifyError,
  WrongChainIdError,
  ZeroHeaderError,
} from '../errors'
import { timestampToNanos } from '../helpers/getters'
import { type SyncHeader, isZero } from './interfaces'

const log = debug('rollkit:header:verify')

export interface VerifyHeaderOptions {
  readonly config?: VerifyConfig
  /** Current time in Unix nanoseconds */
  readonly now?: () => bigint
}

const systemNow = (): bigint => BigInt(Date.now()) * NANOS_PER_MILLISECOND

/**
 * Header time in Unix nanoseconds. A time the header type cannot represent
 * fails verification instead of escaping as a range error.
 */
function timeOf<H extends SyncHeader<H>>(
  header: H,
  which: 'trusted' | 'untrusted',
): bigint {
  try {
    return timestampToNanos(header.time())
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err)
    throw new VerifyError(`invalid ${which} time: ${message}`, {
      code: ErrorCode.VALUE_OUT_OF_RANGE,
      cause: err,
    })
  }
}

/**
 * Checks every header type must pass regardless of its own rules:
 * same chain, strictly later time, not from the future, strictly higher
 * and within the height threshold.
 */
function verifyGeneric<H extends SyncHeader<H>>(
  trusted: H,
  untrusted: H,
  config: VerifyConfig,
  now: bigint,
): void {
  if (untrusted.chainId() !== trusted.chainId()) {
    throw new WrongChainIdError(trusted.chainId(), untrusted.chainId())
  }

  const trustedTime = timeOf(trusted, 'trusted')
  const untrustedTime = timeOf(untrusted, 'untrusted')
  if (untrustedTime <= trustedTime) {
    throw new UnorderedTimeError(trustedTime, untrustedTime)
  }

  const drift = BigInt(config.maxClockDriftMs) * NANOS_PER_MILLISECOND
  if (untrustedTime > now + drift) {
    throw new FromFutureError(untrustedTime, now, config.maxClockDriftMs)
  }

  if (untrusted.height() <= trusted.height()) {
    throw new KnownHeaderError(trusted.height(), untrusted.height())
  }

  if (untrusted.height() - trusted.height() > config.heightThreshold) {
    throw new HeightFromFutureError(
      trusted.height(),
      untrusted.height(),
      config.heightThreshold,
    )
  }
}

/**
 * Verifies an untrusted header against a trusted one before the sync
 * framework advances its head.
 *
 * Adjacent candidates must link to the trusted hash. The header type's own
 * `verify` runs last; its failure on a non-adjacent candidate is marked as
 * a soft failure since the candidate is not provably wrong.
 */
export function verifyHeader<H extends SyncHeader<H>>(
  trusted: H | null | undefined,
  untrusted: H | null | undefined,
  opts: VerifyHeaderOptions = {},
): void {
  if (isZero(trusted)) throw new ZeroHeaderError('trusted')
  if (isZero(untrusted)) throw new ZeroHeaderError('untrusted')

  const config = opts.config ?? DEFAULT_VERIFY_CONFIG
  const now = (opts.now ?? systemNow)()

  untrusted.validate()
  verifyGeneric(trusted, untrusted, config, now)

  const adjacent = untrusted.height() === trusted.height() + BIGINT_1
  if (adjacent && !equalsBytes(untrusted.lastHeader(), trusted.hash())) {
    throw new NonAdjacentLinkError(trusted.hash(), untrusted.lastHeader())
  }

  try {
    trusted.verify(untrusted)
  } catch (err: unknown) {
    const verifyErr =
      err instanceof VerifyError
        ? err
        : new VerifyError(err instanceof Error ? err.message : String(err), {
            cause: err,
          })
    if (!adjacent) {
      verifyErr.softFailure = true
    }
    log(
      'header %s rejected against trusted %s: %s (soft=%s)',
      untrusted.height().toString(),
      trusted.height().toString(),
      verifyErr.reason,
      verifyErr.softFailure,
    )
    throw verifyErr
  }

  log(
    'header %s verified against trusted %s',
    untrusted.height().toString(),
    trusted.height().toString(),
  )
}

export function safeVerifyHeader<H extends SyncHeader<H>>(
  trusted: H | null | undefined,
  untrusted: H | null | undefined,
  opts: VerifyHeaderOptions = {},
): Safe<void> {
  const result = _.try(() => verifyHeader(trusted, untrusted, opts))()
  if (result[0] !== undefined) {
    return safeError(result[0])
  }
  return safeResult(undefined)
}
