/**
 * Account Provisioning Service
 *
 * Materializes the native account behind an EVM address in two separable
 * steps:
 * - planDeployment: pure derivation of the target address from the current
 *   proxy class reference, the EVM address and the registry's own address
 * - deployIfAbsent: deploys the account proxy there, treating an account
 *   that already exists at the address as success
 *
 * Recording the mapping is left to the address registry, which only does so
 * after deployIfAbsent succeeded.
 */

import {
  accountConstructorArgs,
  deriveNativeAddress,
  formatEvmAddress,
  formatNativeAddress,
  isEvmAddress,
  isValidHex,
  logger,
} from '@evm-registry/core'
import {
  type AccountKind,
  BaseService,
  type ClassReference,
  type DeploymentOutcome,
  type DeploymentPlan,
  type EvmAddress,
  type HostLedger,
  type IAccountProvisioningService,
  type IClassReferenceService,
  isRegistryError,
  type NativeAddress,
  REGISTRY_ERRORS,
  registryError,
  type Safe,
  safeError,
  safeResult,
} from '@evm-registry/types'
import type { Hex } from 'viem'
import type { ConfigService } from './config-service'

export class AccountProvisioningService
  extends BaseService
  implements IAccountProvisioningService
{
  private readonly classReferenceService: IClassReferenceService
  private readonly configService: ConfigService
  private readonly hostLedger: HostLedger

  constructor(options: {
    classReferenceService: IClassReferenceService
    configService: ConfigService
    hostLedger: HostLedger
  }) {
    super('account-provisioning-service')
    this.classReferenceService = options.classReferenceService
    this.configService = options.configService
    this.hostLedger = options.hostLedger
  }

  /**
   * Native address `evmAddress` is (or would be) provisioned at under the
   * current proxy class reference
   */
  derive(evmAddress: EvmAddress): Safe<NativeAddress> {
    if (!isEvmAddress(evmAddress)) {
      return safeError(
        registryError(REGISTRY_ERRORS.INVALID_EVM_ADDRESS, {
          value: evmAddress.toString(),
        }),
      )
    }
    const [proxyError, proxyReference] = this.getProxyReference()
    if (proxyError) return safeError(proxyError)

    return safeResult(
      deriveNativeAddress({
        classReference: proxyReference,
        evmAddress,
        deployer: this.configService.deployer,
      }),
    )
  }

  planDeployment(
    evmAddress: EvmAddress,
    kind: AccountKind,
    bytecode: Hex,
  ): Safe<DeploymentPlan> {
    if (!isValidHex(bytecode)) {
      return safeError(
        registryError(REGISTRY_ERRORS.INVALID_BYTECODE, {
          evmAddress: evmAddress.toString(),
        }),
      )
    }
    if (!isEvmAddress(evmAddress)) {
      return safeError(
        registryError(REGISTRY_ERRORS.INVALID_EVM_ADDRESS, {
          value: evmAddress.toString(),
        }),
      )
    }
    const [proxyError, proxyReference] = this.getProxyReference()
    if (proxyError) return safeError(proxyError)

    const deployer = this.configService.deployer
    return safeResult({
      evmAddress,
      nativeAddress: deriveNativeAddress({
        classReference: proxyReference,
        evmAddress,
        deployer,
      }),
      request: {
        classReference: proxyReference,
        constructorArgs: accountConstructorArgs(deployer, evmAddress),
        salt: evmAddress,
        deployer,
        initialization: {
          kind,
          implementation: this.getImplementation(kind),
          bytecode,
        },
      },
    })
  }

  /**
   * Deploy the planned account proxy. An account already living at the
   * planned address counts as deployed.
   */
  deployIfAbsent(plan: DeploymentPlan): Safe<DeploymentOutcome> {
    const [deployError, deployedAddress] = this.hostLedger.deploy(plan.request)

    if (deployError) {
      if (isRegistryError(deployError, REGISTRY_ERRORS.ALREADY_DEPLOYED)) {
        logger.debug('Account proxy already deployed', {
          evmAddress: formatEvmAddress(plan.evmAddress),
          nativeAddress: formatNativeAddress(plan.nativeAddress),
        })
        return safeResult({
          nativeAddress: plan.nativeAddress,
          alreadyDeployed: true,
        })
      }
      if (isRegistryError(deployError, REGISTRY_ERRORS.DEPLOYMENT_FAILED)) {
        return safeError(deployError)
      }
      return safeError(
        registryError(
          REGISTRY_ERRORS.DEPLOYMENT_FAILED,
          { evmAddress: formatEvmAddress(plan.evmAddress) },
          deployError.message,
        ),
      )
    }

    if (deployedAddress !== plan.nativeAddress) {
      logger.error('Host ledger deployed at an unexpected address', {
        evmAddress: formatEvmAddress(plan.evmAddress),
        expected: formatNativeAddress(plan.nativeAddress),
        actual: deployedAddress,
      })
      return safeError(
        registryError(REGISTRY_ERRORS.DERIVATION_COLLISION, {
          evmAddress: formatEvmAddress(plan.evmAddress),
          expected: plan.nativeAddress.toString(),
          actual: deployedAddress.toString(),
        }),
      )
    }

    logger.info('Account proxy deployed', {
      evmAddress: formatEvmAddress(plan.evmAddress),
      nativeAddress: formatNativeAddress(deployedAddress),
      kind: plan.request.initialization.kind,
    })
    return safeResult({ nativeAddress: deployedAddress, alreadyDeployed: false })
  }

  private getProxyReference(): Safe<ClassReference> {
    const [error, reference] =
      this.classReferenceService.getClassReference('proxy')
    if (error) {
      if (isRegistryError(error, REGISTRY_ERRORS.NOT_CONFIGURED)) {
        return safeError(
          registryError(REGISTRY_ERRORS.CLASS_REFERENCE_MISSING, {
            kind: 'proxy',
          }),
        )
      }
      return safeError(error)
    }
    return safeResult(reference)
  }

  private getImplementation(kind: AccountKind): ClassReference | null {
    const [error, reference] = this.classReferenceService.getClassReference(kind)
    return error ? null : reference
  }
}
