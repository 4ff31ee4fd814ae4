export { fromBytes } from './from-bytes'
export { fromHeaderData, fromValidatedData } from './from-header-data'
