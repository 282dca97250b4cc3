/**
 * Ownership Service
 *
 * Single-owner access control for every administrative write of the registry
 * (class reference upgrades, native token configuration, chain context
 * updates). Implements the `Authorizer` predicate the other services consume.
 */

import { formatNativeAddress, isNativeAddress, logger } from '@evm-registry/core'
import {
  type Authorizer,
  BaseService,
  type NativeAddress,
  REGISTRY_ERRORS,
  registryError,
  type Safe,
  safeError,
  safeResult,
} from '@evm-registry/types'

export class OwnershipService extends BaseService implements Authorizer {
  private owner: NativeAddress

  constructor(options: { owner: NativeAddress }) {
    super('ownership-service')
    this.owner = options.owner
  }

  getOwner(): NativeAddress {
    return this.owner
  }

  isAuthorized(caller: NativeAddress): boolean {
    return caller === this.owner
  }

  /**
   * Hand ownership to `newOwner`. Only the current owner may call this.
   */
  transferOwnership(
    caller: NativeAddress,
    newOwner: NativeAddress,
  ): Safe<NativeAddress> {
    if (!this.isAuthorized(caller)) {
      return safeError(
        registryError(REGISTRY_ERRORS.UNAUTHORIZED, {
          operation: 'transferOwnership',
          caller: caller.toString(),
        }),
      )
    }
    if (!isNativeAddress(newOwner)) {
      return safeError(
        registryError(REGISTRY_ERRORS.INVALID_NATIVE_ADDRESS, {
          value: newOwner.toString(),
        }),
      )
    }

    const previousOwner = this.owner
    this.owner = newOwner
    logger.info('Ownership transferred', {
      previousOwner: formatNativeAddress(previousOwner),
      newOwner: formatNativeAddress(newOwner),
    })
    return safeResult(newOwner)
  }
}
