/**
 * Registry Node - Main Entry Point
 *
 * Loads the environment and the registry spec, then starts every registry
 * service through the service registry.
 */

import { formatNativeAddress, loadRegistryEnv, logger } from '@evm-registry/core'
import { loadRegistrySpec } from './services/genesis-manager'
import { startRegistryServices } from './services/service-factory'

const DEFAULT_SPEC_PATH = './registry-spec.json'

async function main(): Promise<void> {
  const env = loadRegistryEnv()
  logger.init()

  const specPath = env.REGISTRY_SPEC_PATH ?? DEFAULT_SPEC_PATH
  const [specError, spec] = loadRegistrySpec(specPath)
  if (specError) {
    logger.error('Failed to load registry spec', specError, { specPath })
    process.exit(1)
  }

  const [startError, services] = await startRegistryServices({ spec, env })
  if (startError) {
    logger.error('Failed to start registry services', startError)
    process.exit(1)
  }

  logger.info('Registry node started', {
    id: services.configService.id,
    chainId: services.configService.chainId,
    deployer: formatNativeAddress(services.configService.deployer),
    owner: formatNativeAddress(services.ownershipService.getOwner()),
    services: services.serviceRegistry.getAllStatus(),
  })

  const { serviceRegistry } = services
  const shutdown = async (): Promise<void> => {
    logger.info('Shutting down registry node')
    const [stopError] = await serviceRegistry.stopAll()
    process.exit(stopError ? 1 : 0)
  }
  process.once('SIGINT', () => {
    shutdown().catch((error: unknown) => {
      logger.error('Error during shutdown', error)
      process.exit(1)
    })
  })
  process.once('SIGTERM', () => {
    shutdown().catch((error: unknown) => {
      logger.error('Error during shutdown', error)
      process.exit(1)
    })
  })
}

// Start the node if this file is run directly
if (require.main === module) {
  main().catch((error: unknown) => {
    logger.error('Fatal error in main function', error)
    process.exit(1)
  })
}

export * from './services'
