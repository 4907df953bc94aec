export { default as createRegistryLookupService, RegistryLookupService } from './lookup-services/RegistryLookupServiceFactory.js'
export { HoldingStorageManager } from './lookup-services/HoldingStorageManager.js'
export { default as registryLookupDocs } from './docs/RegistryLookupDocs.js'
export type * from './types.js'
