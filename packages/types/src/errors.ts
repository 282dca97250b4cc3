/**
 * Registry Error Codes
 *
 * Centralized definitions of every error code the registry surfaces.
 * Codes are stable strings so collaborators can branch on them; messages are
 * for humans only.
 */

export const REGISTRY_ERRORS = {
  /** Read before the required write happened */
  NOT_CONFIGURED: 'not_configured',
  /** Privileged write from a caller without the privilege */
  UNAUTHORIZED: 'unauthorized',
  /** Second write to a set-once slot */
  ALREADY_CONFIGURED: 'already_configured',
  /** Host ledger already holds an account at the derived address */
  ALREADY_DEPLOYED: 'already_deployed',
  /** Derived native address is already bound to another EVM address */
  DERIVATION_COLLISION: 'derivation_collision',
  /** Proxy class reference not set */
  CLASS_REFERENCE_MISSING: 'class_reference_missing',
  /** Host ledger rejected the deployment */
  DEPLOYMENT_FAILED: 'deployment_failed',
  /** Mapping already exists for the EVM address */
  ALREADY_REGISTERED: 'already_registered',
  INVALID_EVM_ADDRESS: 'invalid_evm_address',
  INVALID_NATIVE_ADDRESS: 'invalid_native_address',
  INVALID_CLASS_KIND: 'invalid_class_kind',
  INVALID_CLASS_REFERENCE: 'invalid_class_reference',
  INVALID_BASE_FEE: 'invalid_base_fee',
  INVALID_BYTECODE: 'invalid_bytecode',
  INVALID_REGISTRY_SPEC: 'invalid_registry_spec',
} as const

export type RegistryErrorCode =
  (typeof REGISTRY_ERRORS)[keyof typeof REGISTRY_ERRORS]

export const ERROR_MESSAGES: Record<RegistryErrorCode, string> = {
  [REGISTRY_ERRORS.NOT_CONFIGURED]: 'Value has not been configured yet',
  [REGISTRY_ERRORS.UNAUTHORIZED]: 'Caller is not authorized',
  [REGISTRY_ERRORS.ALREADY_CONFIGURED]: 'Value can only be configured once',
  [REGISTRY_ERRORS.ALREADY_DEPLOYED]:
    'An account is already deployed at this address',
  [REGISTRY_ERRORS.DERIVATION_COLLISION]:
    'Derived native address is bound to another EVM address',
  [REGISTRY_ERRORS.CLASS_REFERENCE_MISSING]:
    'Account proxy class reference is not configured',
  [REGISTRY_ERRORS.DEPLOYMENT_FAILED]: 'Host ledger rejected the deployment',
  [REGISTRY_ERRORS.ALREADY_REGISTERED]: 'Account already registered',
  [REGISTRY_ERRORS.INVALID_EVM_ADDRESS]: 'Not a 160-bit EVM address',
  [REGISTRY_ERRORS.INVALID_NATIVE_ADDRESS]:
    'Not a valid host-ledger native address',
  [REGISTRY_ERRORS.INVALID_CLASS_KIND]: 'Unknown class kind',
  [REGISTRY_ERRORS.INVALID_CLASS_REFERENCE]:
    'Class reference must be a non-zero field element',
  [REGISTRY_ERRORS.INVALID_BASE_FEE]: 'Base fee must be a non-negative integer',
  [REGISTRY_ERRORS.INVALID_BYTECODE]: 'Bytecode must be a 0x-prefixed hex string',
  [REGISTRY_ERRORS.INVALID_REGISTRY_SPEC]: 'Registry spec file is invalid',
}

export class RegistryError extends Error {
  constructor(
    public readonly code: RegistryErrorCode,
    message?: string,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message ?? ERROR_MESSAGES[code])
    this.name = 'RegistryError'
  }
}

export function registryError(
  code: RegistryErrorCode,
  context?: Record<string, unknown>,
  message?: string,
): RegistryError {
  return new RegistryError(code, message, context)
}

export function isRegistryError(
  error: unknown,
  code?: RegistryErrorCode,
): error is RegistryError {
  return (
    error instanceof RegistryError && (code === undefined || error.code === code)
  )
}
