/**
 * Extensible NFT Registry Type Definitions
 *
 * Types shared by the registry core, the collection facade and the
 * lookup backend.
 */

import type { PubKeyHex } from '@bsv/sdk'
import type { LoggingConfig } from './logging.js'

// ---------------------------------------------------------------------------
// Identifiers
// ---------------------------------------------------------------------------

/** Global token identifier (non-negative safe integer), unique while the token exists */
export type TokenId = number

/** Ordinal index of a supply extension */
export type ExtensionId = number

// ---------------------------------------------------------------------------
// Extension Types
// ---------------------------------------------------------------------------

/**
 * Read-only snapshot of a supply extension
 */
export interface ExtensionInfo {
  /** Ordinal index of the extension */
  id: ExtensionId
  /** Pledged target supply, or the realized count once finalized */
  targetSupply: number
  /** Number of live tokens currently in the extension */
  realizedSupply: number
  /** Whether finalizeDistribution has sealed the extension */
  finalized: boolean
}

/**
 * Provisioning request for a new extension
 */
export interface ExtensionProvision {
  /** Upper bound on live tokens in the extension */
  targetSupply: number
  /** Token identifiers assigned to the extension up front */
  tokenIds?: TokenId[]
}

// ---------------------------------------------------------------------------
// Lifecycle Hooks
// ---------------------------------------------------------------------------

/** Mutation being applied when the pre-mutation hook runs */
export type LifecycleAction = 'mint' | 'burn' | 'transfer' | 'finalize'

/**
 * Capability invoked synchronously before every mutating lifecycle
 * operation. Throwing vetoes the operation.
 *
 * For mint `from` is the null identity, for burn `to` is. For finalize
 * both are, and `tokenId` carries the extension id.
 */
export interface TransferHook {
  beforeTokenTransfer(
    from: PubKeyHex,
    to: PubKeyHex,
    tokenId: TokenId,
    action: LifecycleAction
  ): void
}

/**
 * A programmable recipient. Identities with a registered receiver are
 * notified by safe transfers and safe mints, and must answer with
 * TOKEN_RECEIVED_ACK.
 */
export interface TokenReceiver {
  onTokenReceived(
    operator: PubKeyHex,
    from: PubKeyHex,
    tokenId: TokenId,
    data: number[]
  ): string
}

// ---------------------------------------------------------------------------
// Event Types
// ---------------------------------------------------------------------------

export interface TransferEvent {
  readonly type: 'Transfer'
  readonly sequence: number
  readonly from: PubKeyHex
  readonly to: PubKeyHex
  readonly tokenId: TokenId
  /** Extension the token belongs to */
  readonly extensionId: ExtensionId
}

export interface ApprovalEvent {
  readonly type: 'Approval'
  readonly sequence: number
  readonly owner: PubKeyHex
  readonly approved: PubKeyHex
  readonly tokenId: TokenId
}

export interface ApprovalForAllEvent {
  readonly type: 'ApprovalForAll'
  readonly sequence: number
  readonly owner: PubKeyHex
  readonly operator: PubKeyHex
  readonly approved: boolean
}

export interface DistributionFinalizedEvent {
  readonly type: 'DistributionFinalized'
  readonly sequence: number
  readonly extensionId: ExtensionId
  readonly realizedSupply: number
}

/**
 * Entry of the append-only event log
 */
export type RegistryEvent =
  | TransferEvent
  | ApprovalEvent
  | ApprovalForAllEvent
  | DistributionFinalizedEvent

/** An event before the log has assigned its sequence number */
export type RegistryEventPayload = WithoutSequence<RegistryEvent>

type WithoutSequence<E> = E extends unknown ? Omit<E, 'sequence'> : never

export type RegistryEventListener = (event: RegistryEvent) => void

/**
 * Anything that exposes committed registry events by sequence number
 */
export interface RegistryEventSource {
  events(sinceSequence?: number): readonly RegistryEvent[]
}

// ---------------------------------------------------------------------------
// Configuration Types
// ---------------------------------------------------------------------------

/**
 * Collection configuration options
 */
export interface CollectionConfig {
  /** Collection name (default: DEFAULT_COLLECTION_NAME) */
  name?: string
  /** Collection symbol (default: DEFAULT_COLLECTION_SYMBOL) */
  symbol?: string
  /** Prefix for token URIs (default: '') */
  baseURI?: string
  /** Pre-mutation policy hook (default: no-op) */
  hook?: TransferHook
  /** Extensions to provision at construction, in order */
  extensions?: ExtensionProvision[]
  /** Logging options, merged over DEFAULT_LOGGING_CONFIG */
  logging?: Partial<LoggingConfig>
}

/**
 * Configuration with every default applied
 */
export interface ResolvedCollectionConfig {
  name: string
  symbol: string
  baseURI: string
  hook: TransferHook
  extensions: ExtensionProvision[]
  logging: LoggingConfig
}
