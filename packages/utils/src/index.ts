/**
 * Utilities for manipulating bytes and hex strings
 */
export * from './bytes'
/**
 * Integer bounds and time units
 */
export * from './constants'
/**
 * Assertions and error helpers
 */
export * from './helpers'
export * from './safe'
