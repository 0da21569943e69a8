import { createEnvSchema, loadEnvVariables, z } from '@gf2m/core'

export const cliEnvSchema = createEnvSchema({
  GF2M_DEFAULT_FIELD: z.string().default('16'),
})

export type CliEnv = z.infer<typeof cliEnvSchema>

export function loadCliEnv(envPath?: string): CliEnv {
  return loadEnvVariables(cliEnvSchema, envPath)
}
