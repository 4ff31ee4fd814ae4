import { assert, describe, expect, it } from 'vitest'
import {
  createVerifyConfig,
  DEFAULT_HEIGHT_THRESHOLD,
  DEFAULT_MAX_CLOCK_DRIFT_MS,
  DEFAULT_VERIFY_CONFIG,
  ENV_HEIGHT_THRESHOLD,
  ENV_MAX_CLOCK_DRIFT_MS,
  ErrorCode,
  InvalidConfigError,
  verifyConfigFromEnv,
} from '../../src'

describe('[Config]: createVerifyConfig', () => {
  it('should fill in defaults', () => {
    assert.deepEqual(createVerifyConfig(), {
      heightThreshold: 80_000n,
      maxClockDriftMs: 10_000,
    })
    assert.deepEqual(DEFAULT_VERIFY_CONFIG, {
      heightThreshold: DEFAULT_HEIGHT_THRESHOLD,
      maxClockDriftMs: DEFAULT_MAX_CLOCK_DRIFT_MS,
    })
  })

  it('should accept overrides', () => {
    assert.deepEqual(
      createVerifyConfig({ heightThreshold: '250', maxClockDriftMs: 0 }),
      { heightThreshold: 250n, maxClockDriftMs: 0 },
    )
  })

  it('should reject a zero height threshold', () => {
    try {
      createVerifyConfig({ heightThreshold: 0n })
      assert.fail('should have thrown')
    } catch (err) {
      assert.instanceOf(err, InvalidConfigError)
      if (err instanceof InvalidConfigError) {
        assert.strictEqual(err.code, ErrorCode.INVALID_CONFIG)
        assert.strictEqual(
          err.message,
          'invalid verify config: heightThreshold must be positive',
        )
      }
    }
  })

  it('should reject invalid clock drift', () => {
    expect(() => createVerifyConfig({ maxClockDriftMs: -1 })).toThrow(
      'invalid verify config: maxClockDriftMs must not be negative',
    )
    expect(() => createVerifyConfig({ maxClockDriftMs: 1.5 })).toThrow(
      'invalid verify config: maxClockDriftMs must be an integer',
    )
  })
})

describe('[Config]: verifyConfigFromEnv', () => {
  it('should read overrides from the environment', () => {
    const config = verifyConfigFromEnv({
      [ENV_HEIGHT_THRESHOLD]: '100',
      [ENV_MAX_CLOCK_DRIFT_MS]: '250',
    })
    assert.deepEqual(config, { heightThreshold: 100n, maxClockDriftMs: 250 })
  })

  it('should keep defaults for unset or empty variables', () => {
    assert.deepEqual(
      verifyConfigFromEnv({ [ENV_HEIGHT_THRESHOLD]: '' }),
      DEFAULT_VERIFY_CONFIG,
    )
    assert.deepEqual(verifyConfigFromEnv({}), DEFAULT_VERIFY_CONFIG)
  })

  it('should reject malformed values', () => {
    expect(() =>
      verifyConfigFromEnv({ [ENV_MAX_CLOCK_DRIFT_MS]: 'soon' }),
    ).toThrow('invalid verify config: maxClockDriftMs must be a number')
    expect(() =>
      verifyConfigFromEnv({ [ENV_HEIGHT_THRESHOLD]: '-5' }),
    ).toThrow(InvalidConfigError)
    expect(() =>
      verifyConfigFromEnv({ [ENV_HEIGHT_THRESHOLD]: '-5' }),
    ).toThrow('heightThreshold must be a uint64')
  })
})
