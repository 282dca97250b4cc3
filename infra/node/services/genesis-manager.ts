/**
 * Registry Genesis Manager
 *
 * Loads registry-spec.json and writes its initial configuration (class
 * references, native token, first chain context) through the same privileged
 * operations an administrator would use, acting as the configured owner.
 */

import { existsSync, readFileSync } from 'node:fs'
import {
  CLASS_KIND_SPEC_KEYS,
  logger,
  parseRegistrySpec,
  type RegistrySpec,
} from '@evm-registry/core'
import {
  BaseService,
  CLASS_KINDS,
  type IChainContextService,
  type IClassReferenceService,
  type INativeTokenService,
  REGISTRY_ERRORS,
  registryError,
  type Safe,
  safeError,
  safeResult,
  safeTrySync,
} from '@evm-registry/types'
import type { OwnershipService } from './ownership-service'

/**
 * Load and parse registry-spec.json
 */
export function loadRegistrySpec(filePath: string): Safe<RegistrySpec> {
  if (!existsSync(filePath)) {
    return safeError(
      registryError(
        REGISTRY_ERRORS.INVALID_REGISTRY_SPEC,
        { filePath },
        `Registry spec file not found: ${filePath}`,
      ),
    )
  }
  const [readError, content] = safeTrySync(() => readFileSync(filePath, 'utf8'))
  if (readError) return safeError(readError)
  return parseRegistrySpec(content)
}

export class RegistryGenesisManager extends BaseService {
  private readonly spec: RegistrySpec
  private readonly ownershipService: OwnershipService
  private readonly classReferenceService: IClassReferenceService
  private readonly nativeTokenService: INativeTokenService
  private readonly chainContextService: IChainContextService

  constructor(options: {
    spec: RegistrySpec
    ownershipService: OwnershipService
    classReferenceService: IClassReferenceService
    nativeTokenService: INativeTokenService
    chainContextService: IChainContextService
  }) {
    super('genesis-manager')
    this.spec = options.spec
    this.ownershipService = options.ownershipService
    this.classReferenceService = options.classReferenceService
    this.nativeTokenService = options.nativeTokenService
    this.chainContextService = options.chainContextService
  }

  getSpec(): RegistrySpec {
    return this.spec
  }

  override init(): Safe<boolean> {
    if (this.initialized) return safeResult(true)

    const [applyError] = this.applyGenesis()
    if (applyError) return safeError(applyError)

    this.initialized = true
    return safeResult(true)
  }

  /**
   * Write every configuration slot present in the registry spec
   */
  private applyGenesis(): Safe<void> {
    const owner = this.ownershipService.getOwner()

    for (const kind of CLASS_KINDS) {
      const reference = this.spec.class_references[CLASS_KIND_SPEC_KEYS[kind]]
      if (reference === undefined) continue
      const [error] = this.classReferenceService.setClassReference(
        owner,
        kind,
        reference,
      )
      if (error) return safeError(error)
    }

    if (this.spec.native_token !== undefined) {
      const [error] = this.nativeTokenService.setNativeToken(
        owner,
        this.spec.native_token,
      )
      if (error) return safeError(error)
    }

    if (this.spec.chain_context !== undefined) {
      const [error] = this.chainContextService.setContext(
        owner,
        this.spec.chain_context.coinbase,
        this.spec.chain_context.base_fee,
      )
      if (error) return safeError(error)
    }

    logger.info('Registry genesis applied', {
      id: this.spec.id,
      classReferences: Object.keys(this.spec.class_references).length,
      nativeToken: this.spec.native_token !== undefined,
      chainContext: this.spec.chain_context !== undefined,
    })
    return safeResult(undefined)
  }
}
