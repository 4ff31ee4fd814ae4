import { computeHash } from '../helpers'
import type {
  CreateHeaderOptions,
  FrozenHeader,
  HeaderData,
  ValidatedHeaderData,
} from '../types'
import { validateHeaderData } from '../validation'

/**
 * Freezes the record and its version. Byte fields cannot be frozen and
 * are treated as read-only by convention.
 */
function freezeData(data: ValidatedHeaderData): ValidatedHeaderData {
  return Object.freeze({ ...data, version: Object.freeze({ ...data.version }) })
}

export function fromValidatedData(
  data: ValidatedHeaderData,
  opts: CreateHeaderOptions = {},
): FrozenHeader {
  const shouldFreeze = opts.freeze !== false
  if (!shouldFreeze) {
    return { data, _cache: { hash: undefined } }
  }

  const frozenData = freezeData(data)
  const hash = computeHash({ data: frozenData, _cache: { hash: undefined } })
  return Object.freeze({
    data: frozenData,
    _cache: Object.freeze({ hash }),
  })
}

export function fromHeaderData(
  headerData: HeaderData = {},
  opts: CreateHeaderOptions = {},
): FrozenHeader {
  return fromValidatedData(validateHeaderData(headerData), opts)
}
