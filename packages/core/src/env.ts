import { config as dotenvConfig } from 'dotenv'
import { z } from 'zod'
import { parseNativeAddress } from './address'

// Base environment schema with common variables
export const baseEnvSchema = z.object({
  NODE_ENV: z
    .enum(['development', 'production', 'test'])
    .default('development'),
  LOG_LEVEL: z
    .enum(['trace', 'debug', 'info', 'warn', 'error', 'silent'])
    .default('info'),
})

export type BaseEnv = z.infer<typeof baseEnvSchema>

/** Native address given as 0x-hex or decimal, below 2^251 - 256 */
export const envNativeAddressSchema = z.string().transform((val, ctx) => {
  const [error, address] = parseNativeAddress(val)
  if (error) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: error.message })
    return z.NEVER
  }
  return address
})

/**
 * Variables read by the registry node.
 * Values given here override the matching fields of the registry spec file.
 */
export const registryEnvSchema = baseEnvSchema.extend({
  REGISTRY_SPEC_PATH: z.string().min(1).optional(),
  REGISTRY_ADDRESS: envNativeAddressSchema.optional(),
  REGISTRY_OWNER: envNativeAddressSchema.optional(),
})

export type RegistryEnv = z.infer<typeof registryEnvSchema>

/**
 * Load and validate environment variables
 * @param schema - Zod schema to validate against
 * @param envPath - Optional path to .env file
 */
export function loadEnvVariables<T extends z.ZodType>(
  schema: T,
  envPath?: string,
  source: NodeJS.ProcessEnv = process.env,
): z.infer<T> {
  dotenvConfig({ path: envPath })

  return schema.parse(source)
}

export function loadRegistryEnv(
  envPath?: string,
  source: NodeJS.ProcessEnv = process.env,
): RegistryEnv {
  return loadEnvVariables(registryEnvSchema, envPath, source)
}

/**
 * Create a complete environment schema by extending the base schema
 */
export function createEnvSchema<T extends z.ZodRawShape>(additionalSchema: T) {
  return baseEnvSchema.extend(additionalSchema)
}
