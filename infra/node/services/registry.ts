import { logger } from '@evm-registry/core'
import {
  type Safe,
  type SafePromise,
  type Service,
  type ServiceStatus,
  safeError,
  safeResult,
} from '@evm-registry/types'

/**
 * Service registry for managing the lifecycle of every node service.
 * Services are initialized and started in registration order and stopped in
 * reverse order.
 */
export class ServiceRegistry {
  private services: Map<string, Service> = new Map()

  /**
   * Register a service with the registry
   */
  register(service: Service): Safe<void> {
    if (this.services.has(service.name)) {
      return safeError(
        new Error(`Service with name '${service.name}' is already registered`),
      )
    }

    this.services.set(service.name, service)
    logger.debug('Service registered', { name: service.name })
    return safeResult(undefined)
  }

  get(name: string): Service | undefined {
    return this.services.get(name)
  }

  getAll(): Service[] {
    return Array.from(this.services.values())
  }

  /**
   * Initialize all services. Stops at the first failure, since later
   * services depend on the configuration earlier ones hold.
   */
  async initAll(): SafePromise<boolean> {
    for (const service of this.services.values()) {
      const [initError] = await service.init()
      if (initError) {
        logger.error('Error initializing service', initError, {
          name: service.name,
        })
        return safeError(initError)
      }
    }
    return safeResult(true)
  }

  async startAll(): SafePromise<boolean> {
    for (const service of this.services.values()) {
      const [startError] = await service.start()
      if (startError) {
        logger.error('Error starting service', startError, {
          name: service.name,
        })
        return safeError(startError)
      }
    }
    return safeResult(true)
  }

  /**
   * Stop all services, continuing past failures so every service gets the
   * chance to shut down
   */
  async stopAll(): SafePromise<boolean> {
    const errors: Error[] = []

    for (const service of this.getAll().reverse()) {
      const [stopError] = await service.stop()
      if (stopError) {
        errors.push(stopError)
      }
    }

    for (const error of errors) {
      logger.error('Error stopping service', error)
    }

    const [firstError] = errors
    return firstError ? safeError(firstError) : safeResult(true)
  }

  getAllStatus(): ServiceStatus[] {
    return this.getAll().map((service) => ({
      name: service.name,
      initialized: service.initialized,
      running: service.running,
    }))
  }

  areAllRunning(): boolean {
    return this.getAll().every((service) => service.running)
  }
}
