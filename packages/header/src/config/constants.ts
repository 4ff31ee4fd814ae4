/** Maximum height gap accepted between a trusted header and a candidate */
export const DEFAULT_HEIGHT_THRESHOLD = BigInt(80_000)
/** Tolerated clock skew when rejecting headers from the future */
export const DEFAULT_MAX_CLOCK_DRIFT_MS = 10_000

export const ENV_HEIGHT_THRESHOLD = 'ROLLKIT_HEADER_HEIGHT_THRESHOLD'
export const ENV_MAX_CLOCK_DRIFT_MS = 'ROLLKIT_HEADER_MAX_CLOCK_DRIFT_MS'
