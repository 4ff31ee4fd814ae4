/**
 * Error codes raised by header construction, validation and verification
 */
export enum ErrorCode {
  // Structural validation
  MISSING_PROPOSER_ADDRESS = 'MISSING_PROPOSER_ADDRESS',

  // Trust-continuity verification
  PROPOSER_MISMATCH = 'PROPOSER_MISMATCH',
  VERIFICATION_FAILED = 'VERIFICATION_FAILED',
  ZERO_HEADER = 'ZERO_HEADER',
  WRONG_CHAIN_ID = 'WRONG_CHAIN_ID',
  UNORDERED_TIME = 'UNORDERED_TIME',
  FROM_FUTURE = 'FROM_FUTURE',
  KNOWN_HEADER = 'KNOWN_HEADER',
  HEIGHT_FROM_FUTURE = 'HEIGHT_FROM_FUTURE',
  NON_ADJACENT_LINK = 'NON_ADJACENT_LINK',

  // Construction and codec
  INVALID_HEADER_DATA = 'INVALID_HEADER_DATA',
  HEADER_DECODE_ERROR = 'HEADER_DECODE_ERROR',
  VALUE_OUT_OF_RANGE = 'VALUE_OUT_OF_RANGE',

  // Configuration
  INVALID_CONFIG = 'INVALID_CONFIG',
}

export type ErrorContext = Record<string, unknown>
