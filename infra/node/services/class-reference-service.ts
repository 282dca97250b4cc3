/**
 * Class Reference Service
 *
 * Holds the current deployable template of each account kind:
 * - precompile: precompile dispatcher
 * - contract-account: implementation behind accounts that carry code
 * - eoa: implementation behind externally-owned accounts
 * - proxy: account proxy every EVM address is deployed as
 *
 * Each kind is an independent slot. Overwriting the proxy reference only
 * changes future provisioning; deployed accounts keep the class they were
 * derived from.
 */

import { isClassReference, logger } from '@evm-registry/core'
import {
  type Authorizer,
  BaseService,
  CLASS_KINDS,
  type ClassKind,
  type ClassReference,
  type IClassReferenceService,
  type NativeAddress,
  REGISTRY_ERRORS,
  registryError,
  type Safe,
  safeError,
  safeResult,
  type VersionedClassReference,
} from '@evm-registry/types'

export function isClassKind(value: string): value is ClassKind {
  return CLASS_KINDS.some((kind) => kind === value)
}

export class ClassReferenceService
  extends BaseService
  implements IClassReferenceService
{
  private readonly references = new Map<ClassKind, VersionedClassReference>()
  private readonly authorizer: Authorizer

  constructor(options: { authorizer: Authorizer }) {
    super('class-reference-service')
    this.authorizer = options.authorizer
  }

  getClassReference(kind: ClassKind): Safe<ClassReference> {
    const [error, versioned] = this.getVersionedClassReference(kind)
    if (error) return safeError(error)
    return safeResult(versioned.reference)
  }

  getVersionedClassReference(kind: ClassKind): Safe<VersionedClassReference> {
    if (!isClassKind(kind)) {
      return safeError(registryError(REGISTRY_ERRORS.INVALID_CLASS_KIND, { kind }))
    }
    const versioned = this.references.get(kind)
    if (!versioned) {
      return safeError(
        registryError(
          REGISTRY_ERRORS.NOT_CONFIGURED,
          { kind },
          `Class reference for '${kind}' is not configured`,
        ),
      )
    }
    return safeResult({ ...versioned })
  }

  /**
   * Overwrite the current reference of `kind`. Privileged.
   */
  setClassReference(
    caller: NativeAddress,
    kind: ClassKind,
    reference: ClassReference,
  ): Safe<VersionedClassReference> {
    if (!this.authorizer.isAuthorized(caller)) {
      return safeError(
        registryError(REGISTRY_ERRORS.UNAUTHORIZED, {
          operation: 'setClassReference',
          caller: caller.toString(),
        }),
      )
    }
    if (!isClassKind(kind)) {
      return safeError(registryError(REGISTRY_ERRORS.INVALID_CLASS_KIND, { kind }))
    }
    if (!isClassReference(reference)) {
      return safeError(
        registryError(REGISTRY_ERRORS.INVALID_CLASS_REFERENCE, {
          kind,
          reference: reference.toString(),
        }),
      )
    }

    const previous = this.references.get(kind)
    const next: VersionedClassReference = {
      kind,
      reference,
      version: (previous?.version ?? 0) + 1,
    }
    this.references.set(kind, next)

    logger.debug('Class reference updated', {
      kind,
      reference,
      version: next.version,
    })
    return safeResult({ ...next })
  }
}
