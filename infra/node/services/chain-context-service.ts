/**
 * Chain Context Service
 *
 * Block context the EVM interpreter reads: coinbase beneficiary and base fee.
 * Written once per block by the block producer; each write replaces the whole
 * context, and only the current block's values are kept.
 */

import { isNativeAddress, logger } from '@evm-registry/core'
import {
  type Authorizer,
  BaseService,
  type ChainContext,
  type IChainContextService,
  type NativeAddress,
  REGISTRY_ERRORS,
  registryError,
  type Safe,
  safeError,
  safeResult,
} from '@evm-registry/types'

export class ChainContextService
  extends BaseService
  implements IChainContextService
{
  // Replaced wholesale; never mutated in place
  private context: ChainContext | null = null
  private readonly authorizer: Authorizer

  constructor(options: { authorizer: Authorizer }) {
    super('chain-context-service')
    this.authorizer = options.authorizer
  }

  getContext(): Safe<ChainContext> {
    if (this.context === null) {
      return safeError(
        registryError(
          REGISTRY_ERRORS.NOT_CONFIGURED,
          { slot: 'chainContext' },
          'Chain context is not configured',
        ),
      )
    }
    return safeResult(this.context)
  }

  getCoinbase(): Safe<NativeAddress> {
    const [error, context] = this.getContext()
    if (error) return safeError(error)
    return safeResult(context.coinbase)
  }

  getBaseFee(): Safe<bigint> {
    const [error, context] = this.getContext()
    if (error) return safeError(error)
    return safeResult(context.baseFee)
  }

  setContext(
    caller: NativeAddress,
    coinbase: NativeAddress,
    baseFee: bigint,
  ): Safe<ChainContext> {
    if (!this.authorizer.isAuthorized(caller)) {
      return safeError(
        registryError(REGISTRY_ERRORS.UNAUTHORIZED, {
          operation: 'setContext',
          caller: caller.toString(),
        }),
      )
    }
    if (!isNativeAddress(coinbase)) {
      return safeError(
        registryError(REGISTRY_ERRORS.INVALID_NATIVE_ADDRESS, {
          value: coinbase.toString(),
        }),
      )
    }
    if (baseFee < 0n) {
      return safeError(
        registryError(REGISTRY_ERRORS.INVALID_BASE_FEE, {
          baseFee: baseFee.toString(),
        }),
      )
    }

    const next: ChainContext = Object.freeze({
      coinbase,
      baseFee,
      version: (this.context?.version ?? 0) + 1,
    })
    this.context = next

    logger.debug('Chain context updated', {
      coinbase,
      baseFee,
      version: next.version,
    })
    return safeResult(next)
  }
}
