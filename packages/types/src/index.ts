/**
 * Centralized Type Definitions for the EVM account registry
 *
 * Single source of truth for the domain types, the error taxonomy, the
 * service contracts and the collaborator interfaces the registry consumes.
 */

// Error codes and RegistryError
export * from './errors'
// Addresses, class references, mappings, chain context
export * from './registry'
// Safe types
export * from './safe'
// Service base class
export * from './service'
// Service and collaborator interfaces
export * from './services'
