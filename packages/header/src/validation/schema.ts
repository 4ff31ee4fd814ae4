import { z, zBytes32, zBytesVar, zUint64 } from '@rollkit-ts/schema'

export const zVersionSchema = z.object({
  block: zUint64({ errorMessage: 'version.block must be a uint64' }),
  app: zUint64({ errorMessage: 'version.app must be a uint64' }),
})

const zHash = (name: string) =>
  zBytes32({ errorMessage: `${name} must be 32 bytes` })

export const zHeaderSchema = z.object({
  height: zUint64({ errorMessage: 'height must be a uint64' }),
  time: zUint64({ errorMessage: 'time must be a uint64 of nanoseconds' }),
  chainId: z
    .string({ invalid_type_error: 'chainId must be a string' })
    .default(''),
  version: zVersionSchema.default({}),
  lastHeaderHash: zHash('lastHeaderHash'),
  lastCommitHash: zHash('lastCommitHash'),
  dataHash: zHash('dataHash'),
  consensusHash: zHash('consensusHash'),
  appHash: zHash('appHash'),
  validatorHash: zHash('validatorHash'),
  lastResultsHash: zHash('lastResultsHash'),
  proposerAddress: zBytesVar(),
})

export type HeaderInput = z.input<typeof zHeaderSchema>
export type ValidatedHeader = z.output<typeof zHeaderSchema>
