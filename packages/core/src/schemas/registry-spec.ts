/**
 * Registry Spec Schema
 *
 * Zod schema for registry-spec.json, the genesis configuration of a registry
 * node: who owns it, where it is deployed, and the initial values of its
 * configuration slots.
 */

import {
  type ClassKind,
  REGISTRY_ERRORS,
  registryError,
  type Safe,
  safeError,
  safeResult,
  safeTrySync,
} from '@evm-registry/types'
import { z } from 'zod'
import { isClassReference, isNativeAddress } from '../address'

// ============================================================================
// Base Validators
// ============================================================================

/** Integer given as 0x-hex string, decimal string or safe JS number */
const bigintSchema = z
  .union([
    z.string().regex(/^(0x[0-9a-fA-F]+|\d+)$/, 'Must be a 0x-hex or decimal integer'),
    z.number().int().nonnegative().safe(),
  ])
  .transform((val) => BigInt(val))

const CHAIN_ID_UPPER_BOUND = 1n << 64n

const nativeAddressSchema = bigintSchema.refine(isNativeAddress, {
  message: 'Must be below 2^251 - 256',
})

const classReferenceSchema = bigintSchema.refine(isClassReference, {
  message: 'Must be a non-zero field element',
})

// ============================================================================
// Registry Spec
// ============================================================================

export const classReferencesSchema = z
  .object({
    precompile: classReferenceSchema.optional(),
    contract_account: classReferenceSchema.optional(),
    eoa: classReferenceSchema.optional(),
    proxy: classReferenceSchema.optional(),
  })
  .strict()

export const chainContextSpecSchema = z.object({
  coinbase: nativeAddressSchema,
  base_fee: bigintSchema,
})

export const registrySpecSchema = z.object({
  /** Human readable network identifier */
  id: z.string().min(1, 'Registry id is required'),
  /** EVM chain id reported to EVM callers */
  chain_id: bigintSchema.refine((val) => val < CHAIN_ID_UPPER_BOUND, {
    message: 'Chain id must fit in 64 bits',
  }),
  /** Native address of the registry itself, used as the deployer identity */
  deployer: nativeAddressSchema,
  /** Native address allowed to perform administrative writes */
  owner: nativeAddressSchema,
  native_token: nativeAddressSchema.optional(),
  class_references: classReferencesSchema.default({}),
  chain_context: chainContextSpecSchema.optional(),
})

// ============================================================================
// Type Exports
// ============================================================================

export type RegistrySpecJson = z.input<typeof registrySpecSchema>
export type RegistrySpec = z.output<typeof registrySpecSchema>

/** Spec file keys of each class kind */
export const CLASS_KIND_SPEC_KEYS: Record<
  ClassKind,
  keyof z.output<typeof classReferencesSchema>
> = {
  precompile: 'precompile',
  'contract-account': 'contract_account',
  eoa: 'eoa',
  proxy: 'proxy',
}

// ============================================================================
// Validation Functions
// ============================================================================

export function validateRegistrySpec(data: unknown): Safe<RegistrySpec> {
  const result = registrySpecSchema.safeParse(data)

  if (result.success) {
    return safeResult(result.data)
  }

  return safeError(
    registryError(
      REGISTRY_ERRORS.INVALID_REGISTRY_SPEC,
      { issues: result.error.issues.map((issue) => issue.path.join('.')) },
      result.error.message,
    ),
  )
}

export function parseRegistrySpec(jsonString: string): Safe<RegistrySpec> {
  const [parseError, parsed] = safeTrySync((): unknown => JSON.parse(jsonString))
  if (parseError) {
    return safeError(
      registryError(
        REGISTRY_ERRORS.INVALID_REGISTRY_SPEC,
        undefined,
        `Failed to parse JSON: ${parseError.message}`,
      ),
    )
  }
  return validateRegistrySpec(parsed)
}
