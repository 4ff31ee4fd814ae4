export * from './getters'
export * from './serialize-helpers'
export * from './validation-helpers'
export * from './vote-helpers'
