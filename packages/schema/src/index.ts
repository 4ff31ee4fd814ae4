export { z } from 'zod'
export { zFlexibleBytes } from './custom/base'
export { zBytes32, zBytesVar } from './custom/bytes32'
export type {
  FlexibleBytesInput,
  FlexibleBytesOptions,
  Uint64Input,
} from './custom/types'
export { zUint64 } from './custom/uint64'
