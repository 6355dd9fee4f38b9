import { createEnvSchema, loadEnvVariables } from '@wordvm/core'
import { z } from 'zod'

export const cliEnvSchema = createEnvSchema({
  VM_PROGRAM: z.string().min(1).default('challenge.bin'),
  VM_SNAPSHOT_DIR: z.string().min(1).default('snapshots'),
  // Driver-side guard; the engine never detects non-termination itself
  VM_STEP_LIMIT: z.coerce.number().int().positive().optional(),
})

export type CliEnv = z.infer<typeof cliEnvSchema>

export function loadCliEnv(envPath?: string): CliEnv {
  return loadEnvVariables(cliEnvSchema, envPath)
}
