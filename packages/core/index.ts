// Re-export viem hex functions for convenience
export {
  bytesToHex,
  type Hex,
  hexToBigInt,
  hexToBytes,
} from 'viem'
export * from './src/address'
export * from './src/env'
export * from './src/logger'
export * from './src/schemas/registry-spec'
export * as z from 'zod'
