/**
 * In-Memory Host Ledger
 *
 * In-process stand-in for the host ledger's deployment primitive. Addresses
 * are computed with the same contract-address function the registry predicts
 * with, a second deployment at an occupied address fails with
 * `already_deployed`, and deployments can be made to fail on demand.
 */

import { computeContractAddress, formatNativeAddress } from '@evm-registry/core'
import {
  type DeployedAccount,
  type DeployRequest,
  type HostLedger,
  type NativeAddress,
  REGISTRY_ERRORS,
  registryError,
  type Safe,
  safeError,
  safeResult,
} from '@evm-registry/types'

export type DeploymentRejection = (request: DeployRequest) => string | null

export class InMemoryHostLedger implements HostLedger {
  private readonly deployments = new Map<NativeAddress, DeployedAccount>()
  private rejection: DeploymentRejection | null = null
  private deployCallCount = 0

  deploy(request: DeployRequest): Safe<NativeAddress> {
    this.deployCallCount++

    const reason = this.rejection?.(request) ?? null
    if (reason !== null) {
      return safeError(
        registryError(
          REGISTRY_ERRORS.DEPLOYMENT_FAILED,
          { salt: request.salt.toString() },
          reason,
        ),
      )
    }

    const address = computeContractAddress({
      deployer: request.deployer,
      salt: request.salt,
      classReference: request.classReference,
      constructorArgs: request.constructorArgs,
    })

    if (this.deployments.has(address)) {
      return safeError(
        registryError(REGISTRY_ERRORS.ALREADY_DEPLOYED, {
          address: formatNativeAddress(address),
        }),
      )
    }

    this.deployments.set(address, {
      address,
      classReference: request.classReference,
      initialization: { ...request.initialization },
    })
    return safeResult(address)
  }

  isDeployed(address: NativeAddress): boolean {
    return this.deployments.has(address)
  }

  getDeployment(address: NativeAddress): DeployedAccount | undefined {
    return this.deployments.get(address)
  }

  /**
   * Reject every deployment for which `rejection` returns a reason.
   * Pass null to accept deployments again.
   */
  setRejection(rejection: DeploymentRejection | null): void {
    this.rejection = rejection
  }

  /** Number of deploy calls, accepted or not */
  get deployCalls(): number {
    return this.deployCallCount
  }

  get deploymentCount(): number {
    return this.deployments.size
  }
}
