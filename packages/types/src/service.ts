/**
 * Service Interface
 *
 * Every stateful component of the registry node is a service with the same
 * init/start/stop lifecycle, so the service registry can drive them uniformly
 */

import { type Safe, type SafePromise, safeResult } from './safe'

export interface Service {
  /** Service name for identification */
  readonly name: string
  initialized: boolean
  running: boolean

  init(): Safe<boolean> | SafePromise<boolean>
  start(): Safe<boolean> | SafePromise<boolean>
  stop(): Safe<boolean> | SafePromise<boolean>
}

export interface ServiceStatus {
  name: string
  initialized: boolean
  running: boolean
}

/**
 * Base service class that provides common functionality
 */
export abstract class BaseService implements Service {
  initialized = false
  running = false
  constructor(public readonly name: string) {}

  init(): Safe<boolean> | SafePromise<boolean> {
    this.initialized = true
    return safeResult(true)
  }
  start(): Safe<boolean> | SafePromise<boolean> {
    this.running = true
    return safeResult(true)
  }
  stop(): Safe<boolean> | SafePromise<boolean> {
    this.running = false
    return safeResult(true)
  }

  getStatus(): ServiceStatus {
    return {
      name: this.name,
      initialized: this.initialized,
      running: this.running,
    }
  }
}
