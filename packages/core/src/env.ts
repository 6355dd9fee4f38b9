/**
 * Environment configuration
 *
 * Every entry point validates `process.env` against a zod schema after
 * loading `.env`. The base schema carries `NODE_ENV` and `LOG_LEVEL`, which
 * the logger reads; each package extends it with its own variables, such as
 * the command line's `VM_PROGRAM`, `VM_SNAPSHOT_DIR` and `VM_STEP_LIMIT`.
 */

import { config as dotenvConfig } from 'dotenv'
import { z } from 'zod'

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'silent'] as const

export const baseEnvSchema = z.object({
  NODE_ENV: z
    .enum(['development', 'production', 'test'])
    .default('development'),
  // `silent` turns logging off
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
})

export type BaseEnv = z.infer<typeof baseEnvSchema>

/**
 * Load `.env` (variables already set win) and parse `process.env`.
 * Throws a ZodError naming every invalid variable.
 */
export function loadEnvVariables<T extends z.ZodTypeAny>(
  schema: T,
  envPath?: string,
): z.infer<T> {
  dotenvConfig({ path: envPath })
  return schema.parse(process.env)
}

/**
 * Base schema plus a package's own variables
 */
export function createEnvSchema<T extends z.ZodRawShape>(additionalSchema: T) {
  return baseEnvSchema.extend(additionalSchema)
}
