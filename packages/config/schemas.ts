import { NetworkIdSchema, SolidityVersionSchema } from '@mintkit/types'
import { z } from 'zod'

export const NetworkPresetSchema = z.object({
  displayName: z.string().min(1),
  chainId: z.number().int().positive(),
  rpcUrl: z.string().url(),
  /** Block explorer base URL without a trailing slash */
  explorerUrl: z
    .string()
    .url()
    .transform((url) => url.replace(/\/+$/, '')),
  solidityVersion: SolidityVersionSchema,
})
export type NetworkPresetConfig = z.infer<typeof NetworkPresetSchema>

export const NetworksFileSchema = z
  .object({
    defaultNetwork: NetworkIdSchema,
    networks: z.record(NetworkIdSchema, NetworkPresetSchema),
  })
  .refine((file) => file.defaultNetwork in file.networks, {
    message: 'defaultNetwork must name one of the configured networks',
    path: ['defaultNetwork'],
  })
export type NetworksFile = z.infer<typeof NetworksFileSchema>

/** A preset resolved for one run, keyed by its network name. */
export interface NetworkPreset extends NetworkPresetConfig {
  name: string
}

export interface NetworkOverrides {
  network?: string
  rpcUrl?: string
  explorerUrl?: string
  solidityVersion?: string
}
