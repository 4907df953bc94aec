/**
 * @extensible-nft/core - Extensible NFT Registry
 *
 * An enumerable non-fungible-token registry whose collection is
 * partitioned into supply extensions, each with its own target supply,
 * while still presenting one global token index.
 *
 * This library provides:
 * - O(1) enumerable ownership maps per extension
 * - A holder index with per-owner enumeration
 * - Global index resolution across extension boundaries
 * - All-or-nothing mint, burn and transfer with a pre-mutation hook
 * - Supply finalization per extension
 *
 * @example
 * ```typescript
 * import { ExtensibleCollection } from '@extensible-nft/core'
 *
 * const collection = new ExtensibleCollection({
 *   extensions: [{ targetSupply: 5, tokenIds: [1, 2, 3, 4, 5] }]
 * })
 *
 * collection.mint(alice, 1)
 * collection.balanceOf(alice) // 1
 * collection.totalSupply() // 1
 * ```
 *
 * @packageDocumentation
 */

// Main class
export { ExtensibleCollection } from './ExtensibleCollection.js'

// Building blocks
export { ExtensionRegistry } from './ExtensionRegistry.js'
export { TokenLifecycle } from './TokenLifecycle.js'
export { EventLog } from './EventLog.js'
export { Approvals } from './Approvals.js'
export { TokenMetadata } from './TokenMetadata.js'
export { Journal } from './Journal.js'
export type { Inverse } from './Journal.js'
export { EnumerableMap } from './structures/EnumerableMap.js'
export { EnumerableSet } from './structures/EnumerableSet.js'
export { HolderIndex } from './structures/HolderIndex.js'

// Errors
export { RegistryError, isRegistryError } from './errors.js'
export type { RegistryErrorCode } from './errors.js'

// Logging
export { createLogger, noopLogger } from './logging.js'
export type { Logger, LoggingConfig, LogLevel } from './logging.js'

// Types
export type {
  TokenId,
  ExtensionId,
  ExtensionInfo,
  ExtensionProvision,
  LifecycleAction,
  TransferHook,
  TokenReceiver,
  TransferEvent,
  ApprovalEvent,
  ApprovalForAllEvent,
  DistributionFinalizedEvent,
  RegistryEvent,
  RegistryEventPayload,
  RegistryEventListener,
  RegistryEventSource,
  CollectionConfig,
  ResolvedCollectionConfig
} from './types.js'

// Constants
export {
  NULL_IDENTITY,
  IDENTITY_PATTERN,
  TOKEN_RECEIVED_ACK,
  MAX_TOKEN_ID,
  MAX_TARGET_SUPPLY,
  DEFAULT_COLLECTION_NAME,
  DEFAULT_COLLECTION_SYMBOL,
  DEFAULT_BASE_URI,
  DEFAULT_LOGGING_CONFIG
} from './constants.js'

// Utilities
export { isValidIdentity, isNullIdentity } from './utils.js'
