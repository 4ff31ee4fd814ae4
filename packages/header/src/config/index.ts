import { z, zUint64 } from '@rollkit-ts/schema'
import { BIGINT_0 } from '@rollkit-ts/utils'
import { InvalidConfigError } from '../errors'
import {
  DEFAULT_HEIGHT_THRESHOLD,
  DEFAULT_MAX_CLOCK_DRIFT_MS,
  ENV_HEIGHT_THRESHOLD,
  ENV_MAX_CLOCK_DRIFT_MS,
} from './constants'

export * from './constants'

export const zVerifyConfigSchema = z.object({
  heightThreshold: zUint64({
    defaultValue: DEFAULT_HEIGHT_THRESHOLD,
    errorMessage: 'heightThreshold must be a uint64',
  }).refine((value) => value > BIGINT_0, {
    message: 'heightThreshold must be positive',
  }),
  maxClockDriftMs: z
    .number({ invalid_type_error: 'maxClockDriftMs must be a number' })
    .int('maxClockDriftMs must be an integer')
    .nonnegative('maxClockDriftMs must not be negative')
    .default(DEFAULT_MAX_CLOCK_DRIFT_MS),
})

export type VerifyConfig = z.output<typeof zVerifyConfigSchema>
export type VerifyConfigInput = z.input<typeof zVerifyConfigSchema>

export function createVerifyConfig(input: VerifyConfigInput = {}): VerifyConfig {
  const result = zVerifyConfigSchema.safeParse(input)
  if (!result.success) {
    throw new InvalidConfigError(
      result.error.issues.map((issue) => issue.message),
      result.error,
    )
  }
  return result.data
}

/**
 * Reads overrides from the environment; unset or empty variables keep
 * their defaults.
 */
export function verifyConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): VerifyConfig {
  const input: VerifyConfigInput = {}

  const heightThreshold = env[ENV_HEIGHT_THRESHOLD]
  if (heightThreshold !== undefined && heightThreshold !== '') {
    input.heightThreshold = heightThreshold
  }

  const maxClockDriftMs = env[ENV_MAX_CLOCK_DRIFT_MS]
  if (maxClockDriftMs !== undefined && maxClockDriftMs !== '') {
    input.maxClockDriftMs = Number(maxClockDriftMs)
  }

  return createVerifyConfig(input)
}

export const DEFAULT_VERIFY_CONFIG: VerifyConfig = createVerifyConfig()
