import type { CodePresenceOracle, EvmAddress } from '@evm-registry/types'
import type { Hex } from 'viem'

/**
 * Code-presence oracle backed by a fixed table.
 * Addresses missing from the table carry no code.
 */
export class StaticCodeOracle implements CodePresenceOracle {
  private readonly code: Map<EvmAddress, Hex>

  constructor(entries: Iterable<readonly [EvmAddress, Hex]> = []) {
    this.code = new Map(entries)
  }

  getCode(evmAddress: EvmAddress): Hex {
    return this.code.get(evmAddress) ?? '0x'
  }

  setCode(evmAddress: EvmAddress, code: Hex): void {
    this.code.set(evmAddress, code)
  }
}
