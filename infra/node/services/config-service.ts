/**
 * Registry Configuration Service
 *
 * Static identity of a registry node: chain id, its own native address
 * (the deployer identity used in address derivation) and the initial owner.
 * Values come from the registry spec, with environment overrides on top.
 */

import {
  isNativeAddress,
  type RegistryEnv,
  type RegistrySpec,
} from '@evm-registry/core'
import {
  BaseService,
  type NativeAddress,
  REGISTRY_ERRORS,
  registryError,
  type Safe,
  safeError,
  safeResult,
} from '@evm-registry/types'

export interface RegistryConfig {
  id: string
  chainId: bigint
  deployer: NativeAddress
  owner: NativeAddress
}

export class ConfigService extends BaseService {
  private readonly config: RegistryConfig

  constructor(config: RegistryConfig) {
    super('registry-config')
    this.config = { ...config }
  }

  /**
   * Build the configuration from a parsed spec, letting REGISTRY_ADDRESS and
   * REGISTRY_OWNER take precedence when set
   */
  static fromSpec(
    spec: RegistrySpec,
    env?: Pick<RegistryEnv, 'REGISTRY_ADDRESS' | 'REGISTRY_OWNER'>,
  ): Safe<ConfigService> {
    const deployer = env?.REGISTRY_ADDRESS ?? spec.deployer
    const owner = env?.REGISTRY_OWNER ?? spec.owner
    for (const [field, value] of [
      ['deployer', deployer],
      ['owner', owner],
    ] as const) {
      if (!isNativeAddress(value)) {
        return safeError(
          registryError(REGISTRY_ERRORS.INVALID_NATIVE_ADDRESS, {
            field,
            value: value.toString(),
          }),
        )
      }
    }

    return safeResult(
      new ConfigService({
        id: spec.id,
        chainId: spec.chain_id,
        deployer,
        owner,
      }),
    )
  }

  get id(): string {
    return this.config.id
  }

  /** EVM chain id */
  get chainId(): bigint {
    return this.config.chainId
  }

  /** Native address of the registry, salt-independent input of every derivation */
  get deployer(): NativeAddress {
    return this.config.deployer
  }

  /** Owner at genesis; ownership may move later through OwnershipService */
  get initialOwner(): NativeAddress {
    return this.config.owner
  }
}
