export * from './base'
export * from './types'
