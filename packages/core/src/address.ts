/**
 * Address utilities
 *
 * Parsing and formatting for both address spaces, and the pure derivation of
 * the native account address an EVM address is provisioned at.
 *
 * Derivation:
 *   args    = [deployer, evmAddress]
 *   digest  = keccak256(PREFIX ‖ deployer ‖ salt ‖ classReference ‖ keccak256(args))
 *   address = digest mod (2^251 - 256)
 *
 * with salt = evmAddress and every element a 32-byte big-endian word, so any
 * observer who knows the proxy class reference and the deployer can predict
 * the address before deployment.
 */

import {
  type ClassReference,
  EVM_ADDRESS_UPPER_BOUND,
  type EvmAddress,
  FIELD_PRIME,
  NATIVE_ADDRESS_UPPER_BOUND,
  type NativeAddress,
  REGISTRY_ERRORS,
  registryError,
  type Safe,
  safeError,
  safeResult,
} from '@evm-registry/types'
import {
  concat,
  getAddress,
  type Hex,
  hexToBigInt,
  keccak256,
  numberToHex,
  stringToHex,
} from 'viem'

/** Domain separator of the native address derivation */
export const NATIVE_ADDRESS_PREFIX: Hex = stringToHex(
  'EVM_REGISTRY_NATIVE_ADDRESS',
  { size: 32 },
)

const WORD_UPPER_BOUND = 1n << 256n

/**
 * Encode a value as a 32-byte big-endian word
 */
export function toWord(value: bigint): Hex {
  if (value < 0n || value >= WORD_UPPER_BOUND) {
    throw new RangeError(`Value does not fit in a 32-byte word: ${value}`)
  }
  return numberToHex(value, { size: 32 })
}

/**
 * keccak256 over the concatenation of 32-byte words
 */
export function hashWords(words: readonly bigint[]): Hex {
  return keccak256(words.length === 0 ? '0x' : concat(words.map(toWord)))
}

export function isValidHex(value: string): value is Hex {
  return /^0x[0-9a-fA-F]*$/.test(value)
}

export function isEvmAddress(value: bigint): boolean {
  return value >= 0n && value < EVM_ADDRESS_UPPER_BOUND
}

export function isNativeAddress(value: bigint): boolean {
  return value >= 0n && value < NATIVE_ADDRESS_UPPER_BOUND
}

export function isClassReference(value: bigint): boolean {
  return value > 0n && value < FIELD_PRIME
}

/**
 * Parse a native address from a 0x-hex or decimal string, or a bigint
 */
export function parseNativeAddress(value: string | bigint): Safe<NativeAddress> {
  let parsed: bigint
  if (typeof value === 'bigint') {
    parsed = value
  } else if (/^(0x[0-9a-fA-F]+|\d+)$/.test(value)) {
    parsed = BigInt(value)
  } else {
    return safeError(
      registryError(REGISTRY_ERRORS.INVALID_NATIVE_ADDRESS, { value }),
    )
  }

  if (!isNativeAddress(parsed)) {
    return safeError(
      registryError(REGISTRY_ERRORS.INVALID_NATIVE_ADDRESS, {
        value: parsed.toString(),
      }),
    )
  }
  return safeResult(parsed)
}

/**
 * EIP-55 checksummed form of an EVM address
 */
export function formatEvmAddress(address: EvmAddress): Hex {
  return getAddress(numberToHex(address, { size: 20 }))
}

export function formatNativeAddress(address: NativeAddress): Hex {
  return numberToHex(address, { size: 32 })
}

/**
 * Host-ledger contract address for a deployment.
 * Shared by the registry's prediction and the in-process ledger.
 */
export function computeContractAddress(params: {
  deployer: NativeAddress
  salt: bigint
  classReference: ClassReference
  constructorArgs: readonly bigint[]
}): NativeAddress {
  const digest = keccak256(
    concat([
      NATIVE_ADDRESS_PREFIX,
      toWord(params.deployer),
      toWord(params.salt),
      toWord(params.classReference),
      hashWords(params.constructorArgs),
    ]),
  )
  return hexToBigInt(digest) % NATIVE_ADDRESS_UPPER_BOUND
}

/**
 * Constructor arguments of an account proxy: the deploying registry and the
 * EVM address the account stands for
 */
export function accountConstructorArgs(
  deployer: NativeAddress,
  evmAddress: EvmAddress,
): bigint[] {
  return [deployer, evmAddress]
}

/**
 * Native address of the account proxy for `evmAddress`.
 * Pure function of (proxy class reference, EVM address, deployer).
 */
export function deriveNativeAddress(params: {
  classReference: ClassReference
  evmAddress: EvmAddress
  deployer: NativeAddress
}): NativeAddress {
  return computeContractAddress({
    deployer: params.deployer,
    salt: params.evmAddress,
    classReference: params.classReference,
    constructorArgs: accountConstructorArgs(params.deployer, params.evmAddress),
  })
}
