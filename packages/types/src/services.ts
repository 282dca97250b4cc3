import type { Hex } from 'viem'
import type {
  AccountKind,
  AddressMapping,
  ChainContext,
  ClassKind,
  ClassReference,
  DeployedAccount,
  DeployRequest,
  EvmAddress,
  NativeAddress,
  VersionedClassReference,
} from './registry'
import type { Safe } from './safe'
import type { BaseService } from './service'

// ============================================================================
// Collaborators consumed by the registry
// ============================================================================

/**
 * Deployment primitive of the host ledger.
 *
 * `deploy` fails with an `already_deployed` RegistryError when an account
 * already lives at the target address, or `deployment_failed` when the
 * ledger rejects it.
 */
export interface HostLedger {
  deploy(request: DeployRequest): Safe<NativeAddress>
  isDeployed(address: NativeAddress): boolean
  getDeployment(address: NativeAddress): DeployedAccount | undefined
}

/** Privilege check for administrative writes */
export interface Authorizer {
  isAuthorized(caller: NativeAddress): boolean
}

/**
 * Code-presence oracle. `'0x'` means the address carries no code and is
 * provisioned as an externally-owned account.
 */
export interface CodePresenceOracle {
  getCode(evmAddress: EvmAddress): Hex
}

// ============================================================================
// Services exposed by the registry
// ============================================================================

export interface IClassReferenceService extends BaseService {
  getClassReference(kind: ClassKind): Safe<ClassReference>
  getVersionedClassReference(kind: ClassKind): Safe<VersionedClassReference>
  setClassReference(
    caller: NativeAddress,
    kind: ClassKind,
    reference: ClassReference,
  ): Safe<VersionedClassReference>
}

export interface INativeTokenService extends BaseService {
  getNativeToken(): Safe<NativeAddress>
  setNativeToken(
    caller: NativeAddress,
    address: NativeAddress,
  ): Safe<NativeAddress>
}

export interface IChainContextService extends BaseService {
  getContext(): Safe<ChainContext>
  getCoinbase(): Safe<NativeAddress>
  getBaseFee(): Safe<bigint>
  setContext(
    caller: NativeAddress,
    coinbase: NativeAddress,
    baseFee: bigint,
  ): Safe<ChainContext>
}

/**
 * Everything needed to deploy one account, computed before touching the ledger
 */
export interface DeploymentPlan {
  evmAddress: EvmAddress
  nativeAddress: NativeAddress
  request: DeployRequest
}

export interface DeploymentOutcome {
  nativeAddress: NativeAddress
  /** True when the ledger reported an existing account at the address */
  alreadyDeployed: boolean
}

export interface IAccountProvisioningService extends BaseService {
  derive(evmAddress: EvmAddress): Safe<NativeAddress>
  planDeployment(
    evmAddress: EvmAddress,
    kind: AccountKind,
    bytecode: Hex,
  ): Safe<DeploymentPlan>
  deployIfAbsent(plan: DeploymentPlan): Safe<DeploymentOutcome>
}

export interface IAddressRegistryService extends BaseService {
  resolve(evmAddress: EvmAddress): Safe<NativeAddress>
  lookupOnly(evmAddress: EvmAddress): NativeAddress | null
  getMapping(evmAddress: EvmAddress): AddressMapping | null
  getEvmAddress(nativeAddress: NativeAddress): EvmAddress | null
  computeNativeAddress(evmAddress: EvmAddress): Safe<NativeAddress>
  registerAccount(
    caller: NativeAddress,
    evmAddress: EvmAddress,
  ): Safe<NativeAddress>
  provisionEoa(evmAddress: EvmAddress): Safe<NativeAddress>
  provisionContractAccount(
    evmAddress: EvmAddress,
    code: Hex,
  ): Safe<NativeAddress>
}
