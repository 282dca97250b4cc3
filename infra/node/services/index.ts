export * from './account-provisioning-service'
export * from './address-registry-service'
export * from './chain-context-service'
export * from './class-reference-service'
export * from './config-service'
export * from './genesis-manager'
export * from './in-memory-host-ledger'
export * from './native-token-service'
export * from './ownership-service'
export * from './registry'
export * from './service-factory'
export * from './static-code-oracle'
