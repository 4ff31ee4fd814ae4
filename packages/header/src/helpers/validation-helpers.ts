import { equalsBytes } from '@rollkit-ts/utils'
import { MissingProposerAddressError, ProposerMismatchError } from '../errors'
import type { FrozenHeader } from '../types'

/**
 * Structural check. The proposer address is the only required field.
 */
export function validateBasic(header: FrozenHeader): void {
  if (header.data.proposerAddress.length === 0) {
    throw new MissingProposerAddressError()
  }
}

export function validate(header: FrozenHeader): void {
  validateBasic(header)
}

/**
 * Trust continuity between a trusted header and a candidate: both must
 * name the same proposer. Height, time and hash linkage are not checked
 * here (see `verifyHeader`).
 */
export function verify(trusted: FrozenHeader, untrusted: FrozenHeader): void {
  if (!equalsBytes(untrusted.data.proposerAddress, trusted.data.proposerAddress)) {
    throw new ProposerMismatchError(
      trusted.data.proposerAddress,
      untrusted.data.proposerAddress,
    )
  }
}
