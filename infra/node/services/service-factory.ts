/**
 * Service Factory
 *
 * Wires every registry service from a registry spec. Used by the node entry
 * point and by tests. The host ledger and code-presence oracle are
 * collaborators: callers may pass their own, otherwise in-process ones are
 * created.
 */

import type { RegistryEnv, RegistrySpec } from '@evm-registry/core'
import {
  type CodePresenceOracle,
  type HostLedger,
  type SafePromise,
  safeError,
  safeResult,
  safeTrySync,
} from '@evm-registry/types'
import { AccountProvisioningService } from './account-provisioning-service'
import { AddressRegistryService } from './address-registry-service'
import { ChainContextService } from './chain-context-service'
import { ClassReferenceService } from './class-reference-service'
import { ConfigService } from './config-service'
import { RegistryGenesisManager } from './genesis-manager'
import { InMemoryHostLedger } from './in-memory-host-ledger'
import { NativeTokenService } from './native-token-service'
import { OwnershipService } from './ownership-service'
import { ServiceRegistry } from './registry'
import { StaticCodeOracle } from './static-code-oracle'

export interface ServiceFactoryOptions {
  spec: RegistrySpec
  /** Environment overrides for the deployer and owner */
  env?: Pick<RegistryEnv, 'REGISTRY_ADDRESS' | 'REGISTRY_OWNER'>
  hostLedger?: HostLedger
  codeOracle?: CodePresenceOracle
  /** Skip applying the registry spec's configuration slots */
  skipGenesis?: boolean
}

export interface RegistryServices {
  serviceRegistry: ServiceRegistry
  configService: ConfigService
  ownershipService: OwnershipService
  classReferenceService: ClassReferenceService
  nativeTokenService: NativeTokenService
  chainContextService: ChainContextService
  provisioningService: AccountProvisioningService
  addressRegistryService: AddressRegistryService
  genesisManager: RegistryGenesisManager
  hostLedger: HostLedger
  codeOracle: CodePresenceOracle
}

/**
 * Wire every service. Throws when the spec and environment do not describe
 * a valid registry identity; `startRegistryServices` reports it as an error.
 */
export function createRegistryServices(
  options: ServiceFactoryOptions,
): RegistryServices {
  const [configError, configService] = ConfigService.fromSpec(
    options.spec,
    options.env,
  )
  if (configError) throw configError
  const hostLedger = options.hostLedger ?? new InMemoryHostLedger()
  const codeOracle = options.codeOracle ?? new StaticCodeOracle()

  const ownershipService = new OwnershipService({
    owner: configService.initialOwner,
  })
  const classReferenceService = new ClassReferenceService({
    authorizer: ownershipService,
  })
  const nativeTokenService = new NativeTokenService({
    authorizer: ownershipService,
  })
  const chainContextService = new ChainContextService({
    authorizer: ownershipService,
  })
  const provisioningService = new AccountProvisioningService({
    classReferenceService,
    configService,
    hostLedger,
  })
  const addressRegistryService = new AddressRegistryService({
    provisioningService,
    codeOracle,
    hostLedger,
  })
  const genesisManager = new RegistryGenesisManager({
    spec: options.spec,
    ownershipService,
    classReferenceService,
    nativeTokenService,
    chainContextService,
  })

  const serviceRegistry = new ServiceRegistry()
  const services = [
    configService,
    ownershipService,
    classReferenceService,
    nativeTokenService,
    chainContextService,
    provisioningService,
    addressRegistryService,
    ...(options.skipGenesis ? [] : [genesisManager]),
  ]
  for (const service of services) {
    const [registerError] = serviceRegistry.register(service)
    if (registerError) throw registerError
  }

  return {
    serviceRegistry,
    configService,
    ownershipService,
    classReferenceService,
    nativeTokenService,
    chainContextService,
    provisioningService,
    addressRegistryService,
    genesisManager,
    hostLedger,
    codeOracle,
  }
}

/**
 * Create, initialize and start every service
 */
export async function startRegistryServices(
  options: ServiceFactoryOptions,
): SafePromise<RegistryServices> {
  const [createError, services] = safeTrySync(() =>
    createRegistryServices(options),
  )
  if (createError) return safeError(createError)

  const [initError] = await services.serviceRegistry.initAll()
  if (initError) return safeError(initError)

  const [startError] = await services.serviceRegistry.startAll()
  if (startError) return safeError(startError)

  return safeResult(services)
}
