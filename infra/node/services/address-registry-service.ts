/**
 * Address Registry Service
 *
 * Append-only table from EVM address to the native account it is deployed
 * as. Entries are created lazily, on the first resolution of an address, and
 * are never changed or removed afterwards: once an address resolved to a
 * native account, every later resolution returns the same one.
 *
 * Operations:
 * - resolve: read the mapping, provisioning the account when there is none
 * - lookupOnly / getMapping: side-effect-free reads
 * - provisionEoa / provisionContractAccount: kind-specific provisioning
 * - registerAccount: record an account that was deployed directly on the ledger
 * - computeNativeAddress: predicted address for an unmapped EVM address
 */

import {
  formatEvmAddress,
  formatNativeAddress,
  isEvmAddress,
  logger,
} from '@evm-registry/core'
import {
  type AccountKind,
  type AddressMapping,
  BaseService,
  type CodePresenceOracle,
  type EvmAddress,
  type HostLedger,
  type IAccountProvisioningService,
  type IAddressRegistryService,
  type NativeAddress,
  REGISTRY_ERRORS,
  registryError,
  type Safe,
  safeError,
  safeResult,
} from '@evm-registry/types'
import type { Hex } from 'viem'

export class AddressRegistryService
  extends BaseService
  implements IAddressRegistryService
{
  private readonly mappings = new Map<EvmAddress, AddressMapping>()
  // native -> evm, used to reject derivation collisions
  private readonly reverseMappings = new Map<NativeAddress, EvmAddress>()

  private readonly provisioningService: IAccountProvisioningService
  private readonly codeOracle: CodePresenceOracle
  private readonly hostLedger: HostLedger

  constructor(options: {
    provisioningService: IAccountProvisioningService
    codeOracle: CodePresenceOracle
    hostLedger: HostLedger
  }) {
    super('address-registry-service')
    this.provisioningService = options.provisioningService
    this.codeOracle = options.codeOracle
    this.hostLedger = options.hostLedger
  }

  /**
   * Native account of `evmAddress`. An existing mapping is returned as is;
   * otherwise the code-presence oracle decides between EOA and contract
   * account provisioning.
   */
  resolve(evmAddress: EvmAddress): Safe<NativeAddress> {
    const existing = this.lookupOnly(evmAddress)
    if (existing !== null) return safeResult(existing)

    if (!isEvmAddress(evmAddress)) {
      return safeError(
        registryError(REGISTRY_ERRORS.INVALID_EVM_ADDRESS, {
          value: evmAddress.toString(),
        }),
      )
    }

    const code = this.codeOracle.getCode(evmAddress)
    return code === '0x'
      ? this.provision(evmAddress, 'eoa', '0x')
      : this.provision(evmAddress, 'contract-account', code)
  }

  lookupOnly(evmAddress: EvmAddress): NativeAddress | null {
    return this.mappings.get(evmAddress)?.nativeAddress ?? null
  }

  getMapping(evmAddress: EvmAddress): AddressMapping | null {
    return this.mappings.get(evmAddress) ?? null
  }

  getEvmAddress(nativeAddress: NativeAddress): EvmAddress | null {
    return this.reverseMappings.get(nativeAddress) ?? null
  }

  get size(): number {
    return this.mappings.size
  }

  provisionEoa(evmAddress: EvmAddress): Safe<NativeAddress> {
    return this.provision(evmAddress, 'eoa', '0x')
  }

  provisionContractAccount(
    evmAddress: EvmAddress,
    code: Hex,
  ): Safe<NativeAddress> {
    return this.provision(evmAddress, 'contract-account', code)
  }

  /**
   * Mapped native address, or the address `evmAddress` would be provisioned
   * at under the current proxy class reference
   */
  computeNativeAddress(evmAddress: EvmAddress): Safe<NativeAddress> {
    const existing = this.lookupOnly(evmAddress)
    if (existing !== null) return safeResult(existing)
    return this.provisioningService.derive(evmAddress)
  }

  /**
   * Record the mapping of an account proxy that was deployed on the ledger
   * without going through the registry. The caller must be that account.
   */
  registerAccount(
    caller: NativeAddress,
    evmAddress: EvmAddress,
  ): Safe<NativeAddress> {
    if (this.mappings.has(evmAddress)) {
      return safeError(
        registryError(REGISTRY_ERRORS.ALREADY_REGISTERED, {
          evmAddress: formatEvmAddress(evmAddress),
        }),
      )
    }

    const [deriveError, expected] = this.provisioningService.derive(evmAddress)
    if (deriveError) return safeError(deriveError)

    if (caller !== expected) {
      return safeError(
        registryError(
          REGISTRY_ERRORS.UNAUTHORIZED,
          {
            operation: 'registerAccount',
            caller: caller.toString(),
            expected: formatNativeAddress(expected),
          },
          'Caller should be the account being registered',
        ),
      )
    }

    const deployment = this.hostLedger.getDeployment(caller)
    if (!deployment) {
      return safeError(
        registryError(
          REGISTRY_ERRORS.DEPLOYMENT_FAILED,
          { nativeAddress: formatNativeAddress(caller) },
          'Account is not deployed on the host ledger',
        ),
      )
    }

    const [recordError, mapping] = this.recordMapping({
      evmAddress,
      nativeAddress: caller,
      kind: deployment.initialization.kind,
      classReference: deployment.classReference,
    })
    if (recordError) return safeError(recordError)

    logger.info('Account registered', {
      evmAddress: formatEvmAddress(evmAddress),
      nativeAddress: formatNativeAddress(mapping.nativeAddress),
    })
    return safeResult(mapping.nativeAddress)
  }

  /**
   * Provisioning protocol: plan, reject collisions, deploy if absent, then
   * write the mapping. Nothing is written unless the deployment succeeded.
   */
  private provision(
    evmAddress: EvmAddress,
    kind: AccountKind,
    code: Hex,
  ): Safe<NativeAddress> {
    const existing = this.mappings.get(evmAddress)
    if (existing) {
      // A competing provisioning was ordered first; converge on its result
      if (existing.kind !== kind) {
        logger.warn('Address already provisioned with another account kind', {
          evmAddress: formatEvmAddress(evmAddress),
          existingKind: existing.kind,
          requestedKind: kind,
        })
      }
      return safeResult(existing.nativeAddress)
    }

    const [planError, plan] = this.provisioningService.planDeployment(
      evmAddress,
      kind,
      code,
    )
    if (planError) return safeError(planError)

    const [collisionError] = this.checkCollision(evmAddress, plan.nativeAddress)
    if (collisionError) return safeError(collisionError)

    const [deployError, outcome] =
      this.provisioningService.deployIfAbsent(plan)
    if (deployError) {
      logger.warn('Account provisioning failed', {
        evmAddress: formatEvmAddress(evmAddress),
        reason: deployError.message,
      })
      return safeError(deployError)
    }

    const [recordError, mapping] = this.recordMapping({
      evmAddress,
      nativeAddress: outcome.nativeAddress,
      kind,
      classReference: plan.request.classReference,
    })
    if (recordError) return safeError(recordError)

    return safeResult(mapping.nativeAddress)
  }

  private checkCollision(
    evmAddress: EvmAddress,
    nativeAddress: NativeAddress,
  ): Safe<void> {
    const owner = this.reverseMappings.get(nativeAddress)
    if (owner !== undefined && owner !== evmAddress) {
      logger.error('Native address derivation collision', {
        evmAddress: formatEvmAddress(evmAddress),
        existingEvmAddress: formatEvmAddress(owner),
        nativeAddress: formatNativeAddress(nativeAddress),
      })
      return safeError(
        registryError(REGISTRY_ERRORS.DERIVATION_COLLISION, {
          evmAddress: formatEvmAddress(evmAddress),
          existingEvmAddress: formatEvmAddress(owner),
          nativeAddress: formatNativeAddress(nativeAddress),
        }),
      )
    }
    return safeResult(undefined)
  }

  private recordMapping(mapping: AddressMapping): Safe<AddressMapping> {
    const existing = this.mappings.get(mapping.evmAddress)
    if (existing) {
      if (existing.nativeAddress === mapping.nativeAddress) {
        return safeResult(existing)
      }
      return safeError(
        registryError(REGISTRY_ERRORS.ALREADY_REGISTERED, {
          evmAddress: formatEvmAddress(mapping.evmAddress),
        }),
      )
    }

    const [collisionError] = this.checkCollision(
      mapping.evmAddress,
      mapping.nativeAddress,
    )
    if (collisionError) return safeError(collisionError)

    const frozen = Object.freeze({ ...mapping })
    this.mappings.set(frozen.evmAddress, frozen)
    this.reverseMappings.set(frozen.nativeAddress, frozen.evmAddress)

    logger.debug('Address mapping recorded', {
      evmAddress: formatEvmAddress(frozen.evmAddress),
      nativeAddress: formatNativeAddress(frozen.nativeAddress),
      kind: frozen.kind,
    })
    return safeResult(frozen)
  }
}
