import { InvalidHeaderDataError } from '../errors'
import { type ValidatedHeader, zHeaderSchema } from './schema'

export { zHeaderSchema, zVersionSchema } from './schema'
export type { HeaderInput, ValidatedHeader } from './schema'

/**
 * Parses loose header input into normalized fields.
 *
 * This is a shape check only; it does not require a proposer address.
 */
export function validateHeaderData(header: unknown): ValidatedHeader {
  const result = zHeaderSchema.safeParse(header ?? {})

  if (!result.success) {
    throw new InvalidHeaderDataError(
      result.error.issues.map((issue) =>
        issue.path.length > 0
          ? `${issue.path.join('.')}: ${issue.message}`
          : issue.message,
      ),
      result.error,
    )
  }
  return result.data
}
