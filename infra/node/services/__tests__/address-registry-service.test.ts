/**
 * Address Registry Tests
 *
 * Lazy provisioning, idempotence, convergence with accounts deployed out of
 * band, failure handling and collision rejection
 */

import { deriveNativeAddress } from '@evm-registry/core'
import {
  type AccountKind,
  type DeploymentOutcome,
  type DeploymentPlan,
  EVM_ADDRESS_UPPER_BOUND,
  type EvmAddress,
  REGISTRY_ERRORS,
  type Safe,
  isRegistryError,
  safeError,
  safeResult,
} from '@evm-registry/types'
import type { Hex } from 'viem'
import { describe, expect, it } from 'vitest'
import { AccountProvisioningService } from '../account-provisioning-service'
import { AddressRegistryService } from '../address-registry-service'
import {
  CONTRACT_CLASS,
  DEPLOYER,
  EVM_A,
  EVM_B,
  EVM_C,
  OWNER,
  PROXY_CLASS,
  STRANGER,
  createConfiguredServices,
  createTestServices,
} from './test-utils'

const COLLIDING_ADDRESS = 0x1234n

/** Provisioning that sends every EVM address to the same native address */
class CollidingProvisioningService extends AccountProvisioningService {
  override planDeployment(
    evmAddress: EvmAddress,
    kind: AccountKind,
    bytecode: Hex,
  ): Safe<DeploymentPlan> {
    const [error, plan] = super.planDeployment(evmAddress, kind, bytecode)
    if (error) return safeError(error)
    return safeResult({ ...plan, nativeAddress: COLLIDING_ADDRESS })
  }

  override deployIfAbsent(plan: DeploymentPlan): Safe<DeploymentOutcome> {
    return safeResult({ nativeAddress: plan.nativeAddress, alreadyDeployed: false })
  }
}

function derived(evmAddress: EvmAddress, classReference = PROXY_CLASS) {
  return deriveNativeAddress({ classReference, evmAddress, deployer: DEPLOYER })
}

describe('AddressRegistryService', () => {
  describe('provisionEoa', () => {
    it('should provision at the derived address and record the mapping', () => {
      const { addressRegistryService, hostLedger } = createConfiguredServices()

      const [error, nativeAddress] = addressRegistryService.provisionEoa(EVM_A)
      expect(error).toBeUndefined()
      expect(nativeAddress).toBe(derived(EVM_A))
      expect(hostLedger.isDeployed(derived(EVM_A))).toBe(true)
      expect(addressRegistryService.lookupOnly(EVM_A)).toBe(derived(EVM_A))
    })

    it('should be idempotent without deploying twice', () => {
      const { addressRegistryService, hostLedger } = createConfiguredServices()

      const [, first] = addressRegistryService.provisionEoa(EVM_A)
      const [error, second] = addressRegistryService.provisionEoa(EVM_A)
      expect(error).toBeUndefined()
      expect(second).toBe(first)
      expect(hostLedger.deployCalls).toBe(1)
    })

    it('should work with only the proxy class reference configured', () => {
      const { addressRegistryService, classReferenceService, hostLedger } =
        createTestServices()
      classReferenceService.setClassReference(OWNER, 'proxy', PROXY_CLASS)

      const [error, nativeAddress] = addressRegistryService.provisionEoa(EVM_A)
      expect(error).toBeUndefined()
      expect(nativeAddress).toBe(derived(EVM_A))
      expect(hostLedger.getDeployment(derived(EVM_A))?.initialization).toEqual({
        kind: 'eoa',
        implementation: null,
        bytecode: '0x',
      })
    })
  })

  describe('provisionContractAccount', () => {
    it('should initialize the account with the contract bytecode', () => {
      const { addressRegistryService, hostLedger } = createConfiguredServices()

      const [error, nativeAddress] =
        addressRegistryService.provisionContractAccount(EVM_A, '0x6001')
      expect(error).toBeUndefined()
      expect(nativeAddress).toBe(derived(EVM_A))
      expect(hostLedger.getDeployment(derived(EVM_A))?.initialization).toEqual({
        kind: 'contract-account',
        implementation: CONTRACT_CLASS,
        bytecode: '0x6001',
      })
      expect(addressRegistryService.getMapping(EVM_A)?.kind).toBe(
        'contract-account',
      )
    })

    it('should keep the first kind of an already provisioned address', () => {
      const { addressRegistryService, hostLedger } = createConfiguredServices()
      addressRegistryService.provisionEoa(EVM_A)

      const [error, nativeAddress] =
        addressRegistryService.provisionContractAccount(EVM_A, '0x6001')
      expect(error).toBeUndefined()
      expect(nativeAddress).toBe(derived(EVM_A))
      expect(addressRegistryService.getMapping(EVM_A)?.kind).toBe('eoa')
      expect(hostLedger.deployCalls).toBe(1)
    })
  })

  describe('resolve', () => {
    it('should provision unknown addresses lazily', () => {
      const { addressRegistryService } = createConfiguredServices()
      expect(addressRegistryService.lookupOnly(EVM_A)).toBeNull()

      const [error, nativeAddress] = addressRegistryService.resolve(EVM_A)
      expect(error).toBeUndefined()
      expect(nativeAddress).toBe(derived(EVM_A))
      expect(addressRegistryService.lookupOnly(EVM_A)).toBe(derived(EVM_A))
    })

    it('should return the same address on every call', () => {
      const { addressRegistryService, hostLedger } = createConfiguredServices()

      const [, first] = addressRegistryService.resolve(EVM_A)
      const [, second] = addressRegistryService.resolve(EVM_A)
      expect(second).toBe(first)
      expect(hostLedger.deploymentCount).toBe(1)
    })

    it('should map distinct EVM addresses to distinct native addresses', () => {
      const { addressRegistryService } = createConfiguredServices()

      const resolved = [EVM_A, EVM_B, EVM_C].map(
        (evmAddress) => addressRegistryService.resolve(evmAddress)[1],
      )
      expect(new Set(resolved).size).toBe(3)
      expect(addressRegistryService.size).toBe(3)
    })

    it('should pick the account kind from the code-presence oracle', () => {
      const { addressRegistryService, codeOracle } = createConfiguredServices()
      codeOracle.setCode(EVM_B, '0x6001')

      addressRegistryService.resolve(EVM_A)
      addressRegistryService.resolve(EVM_B)

      expect(addressRegistryService.getMapping(EVM_A)?.kind).toBe('eoa')
      expect(addressRegistryService.getMapping(EVM_B)?.kind).toBe(
        'contract-account',
      )
    })

    it('should fail without recording while the proxy reference is unset', () => {
      const { addressRegistryService, hostLedger } = createTestServices()

      const [error] = addressRegistryService.resolve(EVM_A)
      expect(isRegistryError(error, REGISTRY_ERRORS.CLASS_REFERENCE_MISSING)).toBe(
        true,
      )
      expect(addressRegistryService.lookupOnly(EVM_A)).toBeNull()
      expect(hostLedger.deployCalls).toBe(0)
    })

    it('should reject addresses above 160 bits', () => {
      const { addressRegistryService } = createConfiguredServices()

      const [error] = addressRegistryService.resolve(EVM_ADDRESS_UPPER_BOUND)
      expect(isRegistryError(error, REGISTRY_ERRORS.INVALID_EVM_ADDRESS)).toBe(
        true,
      )
    })

    it('should leave no mapping behind a failed deployment and allow a retry', () => {
      const { addressRegistryService, hostLedger } = createConfiguredServices()
      hostLedger.setRejection(() => 'out of resources')

      const [error] = addressRegistryService.resolve(EVM_A)
      expect(isRegistryError(error, REGISTRY_ERRORS.DEPLOYMENT_FAILED)).toBe(true)
      expect(error?.message).toBe('out of resources')
      expect(addressRegistryService.lookupOnly(EVM_A)).toBeNull()

      hostLedger.setRejection(null)
      const [retryError, nativeAddress] = addressRegistryService.resolve(EVM_A)
      expect(retryError).toBeUndefined()
      expect(nativeAddress).toBe(derived(EVM_A))
    })

    it('should converge on an account deployed out of band', () => {
      const { addressRegistryService, provisioningService, hostLedger } =
        createConfiguredServices()
      const [, plan] = provisioningService.planDeployment(EVM_A, 'eoa', '0x')
      if (!plan) throw new Error('plan expected')
      hostLedger.deploy(plan.request)

      const [error, nativeAddress] = addressRegistryService.resolve(EVM_A)
      expect(error).toBeUndefined()
      expect(nativeAddress).toBe(plan.nativeAddress)
      expect(hostLedger.deploymentCount).toBe(1)
    })
  })

  describe('class reference upgrades', () => {
    it('should keep existing mappings and derive new ones from the new reference', () => {
      const { addressRegistryService, classReferenceService } =
        createConfiguredServices()
      addressRegistryService.resolve(EVM_A)

      classReferenceService.setClassReference(OWNER, 'proxy', 0x5555n)

      expect(addressRegistryService.resolve(EVM_A)[1]).toBe(derived(EVM_A))
      expect(addressRegistryService.computeNativeAddress(EVM_A)[1]).toBe(
        derived(EVM_A),
      )

      const [error, nativeAddress] = addressRegistryService.resolve(EVM_B)
      expect(error).toBeUndefined()
      expect(nativeAddress).toBe(derived(EVM_B, 0x5555n))
      expect(addressRegistryService.getMapping(EVM_B)?.classReference).toBe(
        0x5555n,
      )
      expect(addressRegistryService.getMapping(EVM_A)?.classReference).toBe(
        PROXY_CLASS,
      )
    })
  })

  describe('reads', () => {
    it('should expose the full mapping as a frozen record', () => {
      const { addressRegistryService } = createConfiguredServices()
      addressRegistryService.resolve(EVM_A)

      const mapping = addressRegistryService.getMapping(EVM_A)
      expect(mapping).toEqual({
        evmAddress: EVM_A,
        nativeAddress: derived(EVM_A),
        kind: 'eoa',
        classReference: PROXY_CLASS,
      })
      expect(Object.isFrozen(mapping)).toBe(true)
      expect(addressRegistryService.getMapping(EVM_B)).toBeNull()
    })

    it('should resolve native addresses back to their EVM address', () => {
      const { addressRegistryService } = createConfiguredServices()
      addressRegistryService.resolve(EVM_A)

      expect(addressRegistryService.getEvmAddress(derived(EVM_A))).toBe(EVM_A)
      expect(addressRegistryService.getEvmAddress(derived(EVM_B))).toBeNull()
    })

    it('should predict addresses without provisioning', () => {
      const { addressRegistryService, hostLedger } = createConfiguredServices()

      const [error, predicted] = addressRegistryService.computeNativeAddress(EVM_A)
      expect(error).toBeUndefined()
      expect(predicted).toBe(derived(EVM_A))
      expect(addressRegistryService.lookupOnly(EVM_A)).toBeNull()
      expect(hostLedger.deployCalls).toBe(0)
    })
  })

  describe('derivation collisions', () => {
    it('should refuse to map a second EVM address to a taken native address', () => {
      const { classReferenceService, configService, hostLedger, codeOracle } =
        createConfiguredServices()
      const registry = new AddressRegistryService({
        provisioningService: new CollidingProvisioningService({
          classReferenceService,
          configService,
          hostLedger,
        }),
        codeOracle,
        hostLedger,
      })

      expect(registry.provisionEoa(EVM_A)).toEqual([undefined, COLLIDING_ADDRESS])

      const [error] = registry.provisionEoa(EVM_B)
      expect(isRegistryError(error, REGISTRY_ERRORS.DERIVATION_COLLISION)).toBe(
        true,
      )
      expect(registry.lookupOnly(EVM_B)).toBeNull()
      expect(registry.getEvmAddress(COLLIDING_ADDRESS)).toBe(EVM_A)
    })
  })

  describe('registerAccount', () => {
    function deployOutOfBand(services: ReturnType<typeof createConfiguredServices>) {
      const [, plan] = services.provisioningService.planDeployment(
        EVM_A,
        'eoa',
        '0x',
      )
      if (!plan) throw new Error('plan expected')
      services.hostLedger.deploy(plan.request)
      return plan.nativeAddress
    }

    it('should record an account deployed directly on the ledger', () => {
      const services = createConfiguredServices()
      const nativeAddress = deployOutOfBand(services)

      const [error, registered] =
        services.addressRegistryService.registerAccount(nativeAddress, EVM_A)
      expect(error).toBeUndefined()
      expect(registered).toBe(nativeAddress)
      expect(services.addressRegistryService.getMapping(EVM_A)).toEqual({
        evmAddress: EVM_A,
        nativeAddress,
        kind: 'eoa',
        classReference: PROXY_CLASS,
      })
    })

    it('should only accept the account itself as caller', () => {
      const services = createConfiguredServices()
      deployOutOfBand(services)

      const [error] = services.addressRegistryService.registerAccount(
        STRANGER,
        EVM_A,
      )
      expect(isRegistryError(error, REGISTRY_ERRORS.UNAUTHORIZED)).toBe(true)
      expect(error?.message).toBe('Caller should be the account being registered')
      expect(services.addressRegistryService.lookupOnly(EVM_A)).toBeNull()
    })

    it('should reject registering twice', () => {
      const services = createConfiguredServices()
      const nativeAddress = deployOutOfBand(services)
      services.addressRegistryService.registerAccount(nativeAddress, EVM_A)

      const [error] = services.addressRegistryService.registerAccount(
        nativeAddress,
        EVM_A,
      )
      expect(isRegistryError(error, REGISTRY_ERRORS.ALREADY_REGISTERED)).toBe(
        true,
      )
    })

    it('should reject accounts missing from the ledger', () => {
      const { addressRegistryService } = createConfiguredServices()

      const [error] = addressRegistryService.registerAccount(
        derived(EVM_B),
        EVM_B,
      )
      expect(isRegistryError(error, REGISTRY_ERRORS.DEPLOYMENT_FAILED)).toBe(true)
      expect(error?.message).toBe('Account is not deployed on the host ledger')
    })
  })
})
