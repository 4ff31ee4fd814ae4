export { isZero } from './interfaces'
export type { SyncHeader } from './interfaces'
export { safeVerifyHeader, verifyHeader } from './verify'
export type { VerifyHeaderOptions } from './verify'
