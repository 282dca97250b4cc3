/**
 * Native Token Service
 *
 * Address of the fungible token used for value transfer and gas.
 * Set once at initialization; the slot is immutable afterwards.
 */

import { formatNativeAddress, isNativeAddress, logger } from '@evm-registry/core'
import {
  type Authorizer,
  BaseService,
  type INativeTokenService,
  type NativeAddress,
  REGISTRY_ERRORS,
  registryError,
  type Safe,
  safeError,
  safeResult,
} from '@evm-registry/types'

export class NativeTokenService
  extends BaseService
  implements INativeTokenService
{
  private nativeToken: NativeAddress | null = null
  private readonly authorizer: Authorizer

  constructor(options: { authorizer: Authorizer }) {
    super('native-token-service')
    this.authorizer = options.authorizer
  }

  getNativeToken(): Safe<NativeAddress> {
    if (this.nativeToken === null) {
      return safeError(
        registryError(
          REGISTRY_ERRORS.NOT_CONFIGURED,
          { slot: 'nativeToken' },
          'Native token is not configured',
        ),
      )
    }
    return safeResult(this.nativeToken)
  }

  setNativeToken(
    caller: NativeAddress,
    address: NativeAddress,
  ): Safe<NativeAddress> {
    if (!this.authorizer.isAuthorized(caller)) {
      return safeError(
        registryError(REGISTRY_ERRORS.UNAUTHORIZED, {
          operation: 'setNativeToken',
          caller: caller.toString(),
        }),
      )
    }
    if (this.nativeToken !== null) {
      return safeError(
        registryError(REGISTRY_ERRORS.ALREADY_CONFIGURED, {
          slot: 'nativeToken',
          current: formatNativeAddress(this.nativeToken),
        }),
      )
    }
    if (!isNativeAddress(address)) {
      return safeError(
        registryError(REGISTRY_ERRORS.INVALID_NATIVE_ADDRESS, {
          value: address.toString(),
        }),
      )
    }

    this.nativeToken = address
    logger.info('Native token configured', {
      nativeToken: formatNativeAddress(address),
    })
    return safeResult(address)
  }
}
