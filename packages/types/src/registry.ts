/**
 * Registry Domain Types
 *
 * Addresses on both sides of the bridge are plain bigints:
 * - EVM addresses are 160-bit unsigned integers
 * - Native addresses are host-ledger field elements below NATIVE_ADDRESS_UPPER_BOUND
 */

import type { Hex } from 'viem'

export type EvmAddress = bigint
export type NativeAddress = bigint
export type ClassReference = bigint

/** Exclusive upper bound of a 160-bit EVM address */
export const EVM_ADDRESS_UPPER_BOUND = 1n << 160n

/** Exclusive upper bound of a host-ledger contract address (2^251 - 256) */
export const NATIVE_ADDRESS_UPPER_BOUND = (1n << 251n) - 256n

/** Prime of the host ledger's field; class references are elements of it */
export const FIELD_PRIME = (1n << 251n) + 17n * (1n << 192n) + 1n

export const CLASS_KINDS = [
  'precompile',
  'contract-account',
  'eoa',
  'proxy',
] as const

export type ClassKind = (typeof CLASS_KINDS)[number]

/** Kinds of account the provisioning protocol can materialize */
export type AccountKind = Extract<ClassKind, 'eoa' | 'contract-account'>

export interface VersionedClassReference {
  kind: ClassKind
  reference: ClassReference
  /** Starts at 1 on the first set and increments on every overwrite */
  version: number
}

/**
 * Immutable record linking an EVM address to its deployed native account
 */
export interface AddressMapping {
  readonly evmAddress: EvmAddress
  readonly nativeAddress: NativeAddress
  readonly kind: AccountKind
  /** Proxy class reference the account was derived from */
  readonly classReference: ClassReference
}

export interface ChainContext {
  readonly coinbase: NativeAddress
  readonly baseFee: bigint
  /** Incremented on every replacement */
  readonly version: number
}

/**
 * Payload handed to the account proxy after deployment.
 * Not part of the address derivation.
 */
export interface AccountInitialization {
  kind: AccountKind
  /**
   * Implementation class of the kind at provisioning time, or null when none
   * is configured and the proxy resolves it on first use
   */
  implementation: ClassReference | null
  bytecode: Hex
}

export interface DeployRequest {
  classReference: ClassReference
  constructorArgs: readonly bigint[]
  salt: bigint
  deployer: NativeAddress
  initialization: AccountInitialization
}

export interface DeployedAccount {
  address: NativeAddress
  classReference: ClassReference
  initialization: AccountInitialization
}
