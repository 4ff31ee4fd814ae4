/**
 * Header error classes
 *
 * Every error here is a deterministic verdict over immutable input: the
 * caller decides whether to drop the candidate, penalize its source or stop.
 */

import { bytesToHex, bytesToUpperHex } from '@rollkit-ts/utils'
import { type ErrorContext, ErrorCode } from './types'

/**
 * Base error class for all header errors
 */
export class HeaderError extends Error {
  public readonly code: ErrorCode
  public readonly context?: ErrorContext

  constructor(
    message: string,
    options: {
      code: ErrorCode
      context?: ErrorContext
      cause?: unknown
    },
  ) {
    super(message, { cause: options.cause })
    this.name = this.constructor.name
    this.code = options.code
    this.context = options.context

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  /**
   * Serialize error for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
    }
  }
}

/**
 * Structural validation: the header names no proposer
 */
export class MissingProposerAddressError extends HeaderError {
  constructor() {
    super('no proposer address', {
      code: ErrorCode.MISSING_PROPOSER_ADDRESS,
    })
  }
}

/**
 * Verification failure of an untrusted header against a trusted one.
 *
 * `softFailure` marks failures that do not prove the candidate wrong,
 * i.e. failures against a non-adjacent trusted header.
 */
export class VerifyError extends HeaderError {
  public readonly reason: string
  public softFailure: boolean

  constructor(
    reason: string,
    options: {
      code?: ErrorCode
      context?: ErrorContext
      cause?: unknown
      softFailure?: boolean
    } = {},
  ) {
    super(`header verification failed: ${reason}`, {
      code: options.code ?? ErrorCode.VERIFICATION_FAILED,
      context: options.context,
      cause: options.cause,
    })
    this.reason = reason
    this.softFailure = options.softFailure ?? false
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      reason: this.reason,
      softFailure: this.softFailure,
    }
  }
}

export class ProposerMismatchError extends VerifyError {
  public readonly trustedProposer: string
  public readonly candidateProposer: string

  constructor(trusted: Uint8Array, candidate: Uint8Array) {
    const trustedProposer = bytesToUpperHex(trusted)
    const candidateProposer = bytesToUpperHex(candidate)
    super(
      `expected proposer (${trustedProposer}) got (${candidateProposer})`,
      {
        code: ErrorCode.PROPOSER_MISMATCH,
        context: { trustedProposer, candidateProposer },
      },
    )
    this.trustedProposer = trustedProposer
    this.candidateProposer = candidateProposer
  }
}

export class ZeroHeaderError extends VerifyError {
  constructor(which: 'trusted' | 'untrusted') {
    super(`zero header: ${which} header is absent`, {
      code: ErrorCode.ZERO_HEADER,
      context: { which },
    })
  }
}

export class WrongChainIdError extends VerifyError {
  constructor(trusted: string, untrusted: string) {
    super(`wrong chain id: '${untrusted}' != '${trusted}'`, {
      code: ErrorCode.WRONG_CHAIN_ID,
      context: { trusted, untrusted },
    })
  }
}

export class UnorderedTimeError extends VerifyError {
  constructor(trusted: bigint, untrusted: bigint) {
    super(
      `unordered headers: timestamp ${untrusted}ns is not after current ${trusted}ns`,
      {
        code: ErrorCode.UNORDERED_TIME,
        context: { trusted: trusted.toString(), untrusted: untrusted.toString() },
      },
    )
  }
}

export class FromFutureError extends VerifyError {
  constructor(untrusted: bigint, now: bigint, maxClockDriftMs: number) {
    super(
      `header from the future: timestamp ${untrusted}ns, now ${now}ns, allowed drift ${maxClockDriftMs}ms`,
      {
        code: ErrorCode.FROM_FUTURE,
        context: {
          untrusted: untrusted.toString(),
          now: now.toString(),
          maxClockDriftMs,
        },
      },
    )
  }
}

export class KnownHeaderError extends VerifyError {
  constructor(trusted: bigint, untrusted: bigint) {
    super(
      `known header: height ${untrusted} is not above trusted height ${trusted}`,
      {
        code: ErrorCode.KNOWN_HEADER,
        context: { trusted: trusted.toString(), untrusted: untrusted.toString() },
      },
    )
  }
}

export class HeightFromFutureError extends VerifyError {
  constructor(trusted: bigint, untrusted: bigint, threshold: bigint) {
    super(
      `height from the future: height ${untrusted} is more than ${threshold} above trusted height ${trusted}`,
      {
        code: ErrorCode.HEIGHT_FROM_FUTURE,
        context: {
          trusted: trusted.toString(),
          untrusted: untrusted.toString(),
          threshold: threshold.toString(),
        },
      },
    )
  }
}

export class NonAdjacentLinkError extends VerifyError {
  constructor(trustedHash: Uint8Array, lastHeaderHash: Uint8Array) {
    const expected = bytesToHex(trustedHash)
    const got = bytesToHex(lastHeaderHash)
    super(
      `last header hash ${got} does not link to trusted header ${expected}`,
      {
        code: ErrorCode.NON_ADJACENT_LINK,
        context: { expected, got },
      },
    )
  }
}

export class InvalidHeaderDataError extends HeaderError {
  public readonly issues: string[]

  constructor(issues: string[], cause?: unknown) {
    super(`invalid header data: ${issues.join('; ')}`, {
      code: ErrorCode.INVALID_HEADER_DATA,
      context: { issues },
      cause,
    })
    this.issues = issues
  }
}

export class HeaderDecodeError extends HeaderError {
  constructor(message: string, cause?: unknown) {
    super(`cannot decode header: ${message}`, {
      code: ErrorCode.HEADER_DECODE_ERROR,
      cause,
    })
  }
}

/**
 * A uint64 value that does not fit the signed 64-bit form a consumer needs
 */
export class HeaderRangeError extends HeaderError {
  constructor(field: string, value: bigint, max: bigint) {
    super(`${field} ${value} exceeds the signed 64-bit maximum ${max}`, {
      code: ErrorCode.VALUE_OUT_OF_RANGE,
      context: { field, value: value.toString(), max: max.toString() },
    })
  }
}

export class InvalidConfigError extends HeaderError {
  constructor(issues: string[], cause?: unknown) {
    super(`invalid verify config: ${issues.join('; ')}`, {
      code: ErrorCode.INVALID_CONFIG,
      context: { issues },
      cause,
    })
  }
}
