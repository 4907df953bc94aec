/**
 * ExtensibleCollection - an enumerable non-fungible-token collection
 * partitioned into supply extensions.
 *
 * Main entry point of the library. Provides:
 * - Extension provisioning and finalization
 * - Minting, burning and (safe) transfers
 * - Approvals and operators
 * - Global, per-extension and per-holder enumeration
 * - Token URIs
 * - An append-only event log with post-commit subscriptions
 *
 * Every write is all-or-nothing: if any step throws, including the
 * pre-mutation hook or a recipient's acknowledgement, the collection is
 * restored to its state before the call.
 */

import type { PubKeyHex } from '@bsv/sdk'
import { Approvals } from './Approvals.js'
import {
  DEFAULT_BASE_URI,
  DEFAULT_COLLECTION_NAME,
  DEFAULT_COLLECTION_SYMBOL,
  DEFAULT_LOGGING_CONFIG,
  NULL_IDENTITY,
  TOKEN_RECEIVED_ACK
} from './constants.js'
import { isRegistryError, RegistryError } from './errors.js'
import { EventLog } from './EventLog.js'
import { ExtensionRegistry } from './ExtensionRegistry.js'
import { Journal } from './Journal.js'
import { createLogger, type Logger } from './logging.js'
import { HolderIndex } from './structures/HolderIndex.js'
import { TokenLifecycle } from './TokenLifecycle.js'
import { TokenMetadata } from './TokenMetadata.js'
import type {
  CollectionConfig,
  ExtensionId,
  ExtensionInfo,
  RegistryEvent,
  RegistryEventListener,
  RegistryEventSource,
  ResolvedCollectionConfig,
  TokenId,
  TokenReceiver,
  TransferHook
} from './types.js'
import { assertIdentity, assertTokenId, isNullIdentity, shortIdentity } from './utils.js'

const noopHook: TransferHook = {
  beforeTokenTransfer: () => {}
}

/**
 * @example
 * ```typescript
 * const collection = new ExtensibleCollection({
 *   name: 'Seasons',
 *   symbol: 'SZN',
 *   extensions: [
 *     { targetSupply: 3, tokenIds: [1, 2, 3] },
 *     { targetSupply: 2, tokenIds: [4, 5] }
 *   ]
 * })
 *
 * collection.mint(alice, 1)
 * collection.transferFrom(alice, alice, bob, 1)
 * collection.ownerOf(1) // bob
 * collection.tokenByIndex(0) // 1
 * ```
 */
export class ExtensibleCollection implements RegistryEventSource {
  private readonly config: ResolvedCollectionConfig
  private readonly log: Logger
  private readonly registry: ExtensionRegistry
  private readonly holders = new HolderIndex()
  private readonly approvals = new Approvals()
  private readonly metadata: TokenMetadata
  private readonly eventLog: EventLog
  private readonly lifecycle: TokenLifecycle
  private readonly receivers = new Map<PubKeyHex, TokenReceiver>()
  private activeOperation?: string

  constructor(config: CollectionConfig = {}) {
    this.config = this.resolveConfig(config)
    this.log = createLogger('ExtensibleCollection', this.config.logging)
    this.registry = new ExtensionRegistry(createLogger('ExtensionRegistry', this.config.logging))
    this.metadata = new TokenMetadata(this.config.baseURI)
    this.eventLog = new EventLog(createLogger('EventLog', this.config.logging))
    this.lifecycle = new TokenLifecycle(
      this.registry,
      this.holders,
      this.approvals,
      this.metadata,
      this.eventLog,
      this.config.hook
    )

    for (const provision of this.config.extensions) {
      this.createExtension(provision.targetSupply, provision.tokenIds ?? [])
    }
  }

  // ---------------------------------------------------------------------------
  // Collection Info
  // ---------------------------------------------------------------------------

  name(): string {
    return this.config.name
  }

  symbol(): string {
    return this.config.symbol
  }

  // ---------------------------------------------------------------------------
  // Ownership Reads
  // ---------------------------------------------------------------------------

  /**
   * Number of tokens held by an identity.
   *
   * @throws RegistryError INVALID_ARGUMENT for the null identity or a malformed identity
   */
  balanceOf(owner: PubKeyHex): number {
    if (isNullIdentity(owner)) {
      throw new RegistryError('INVALID_ARGUMENT', 'Balance query for the null identity')
    }
    assertIdentity(owner, 'owner')
    return this.holders.balanceOf(owner)
  }

  /**
   * @throws RegistryError NOT_FOUND if the token does not exist
   */
  ownerOf(tokenId: TokenId): PubKeyHex {
    assertTokenId(tokenId)
    return this.registry.ownerOf(tokenId)
  }

  exists(tokenId: TokenId): boolean {
    return this.registry.exists(tokenId)
  }

  /**
   * @throws RegistryError OUT_OF_RANGE unless 0 <= index < balanceOf(owner)
   */
  tokenOfOwnerByIndex(owner: PubKeyHex, index: number): TokenId {
    assertIdentity(owner, 'owner')
    return this.holders.tokenOfOwnerByIndex(owner, index)
  }

  // ---------------------------------------------------------------------------
  // Enumeration Reads
  // ---------------------------------------------------------------------------

  totalSupply(): number {
    return this.registry.totalSupply()
  }

  /** Sum of the realized supplies of all finalized extensions */
  finalizedSupply(): number {
    return this.registry.finalizedSupply()
  }

  /**
   * @throws RegistryError OUT_OF_RANGE if globalIndex >= totalSupply()
   */
  tokenByIndex(globalIndex: number): TokenId {
    return this.registry.tokenByIndex(globalIndex)
  }

  extensionCount(): number {
    return this.registry.extensionCount()
  }

  /**
   * @throws RegistryError OUT_OF_RANGE if the extension does not exist
   */
  supplyOfExtension(extensionId: ExtensionId): number {
    return this.registry.supplyOfExtension(extensionId)
  }

  getExtension(extensionId: ExtensionId): ExtensionInfo {
    return this.registry.getExtension(extensionId)
  }

  /**
   * The extension a token id is assigned to, or undefined if it was never
   * provisioned. Use exists() to check whether the token is live.
   */
  extensionByToken(tokenId: TokenId): ExtensionId | undefined {
    return this.registry.extensionByToken(tokenId)
  }

  tokenByExtensionAndIndex(extensionId: ExtensionId, index: number): TokenId {
    return this.registry.tokenByExtensionAndIndex(extensionId, index)
  }

  /**
   * Position of a live token inside its extension, such that
   * tokenByExtensionAndIndex(extensionByToken(t), positionOf(t)) === t.
   */
  positionOf(tokenId: TokenId): number {
    return this.registry.positionOf(tokenId)
  }

  // ---------------------------------------------------------------------------
  // Approval and Metadata Reads
  // ---------------------------------------------------------------------------

  /**
   * @throws RegistryError NOT_FOUND if the token does not exist
   */
  getApproved(tokenId: TokenId): PubKeyHex | undefined {
    this.ownerOf(tokenId)
    return this.approvals.getApproved(tokenId)
  }

  isApprovedForAll(owner: PubKeyHex, operator: PubKeyHex): boolean {
    return this.approvals.isApprovedForAll(owner, operator)
  }

  /**
   * @throws RegistryError NOT_FOUND if the token does not exist
   */
  tokenURI(tokenId: TokenId): string {
    this.ownerOf(tokenId)
    return this.metadata.tokenURI(tokenId)
  }

  // ---------------------------------------------------------------------------
  // Events
  // ---------------------------------------------------------------------------

  events(sinceSequence = 0): readonly RegistryEvent[] {
    return this.eventLog.events(sinceSequence)
  }

  /**
   * Be notified of each event after the write that produced it commits.
   *
   * @returns A function that removes the listener
   */
  subscribe(listener: RegistryEventListener): () => void {
    return this.eventLog.subscribe(listener)
  }

  // ---------------------------------------------------------------------------
  // Provisioning
  // ---------------------------------------------------------------------------

  /**
   * Append a supply extension and assign token ids to it.
   *
   * @returns The new extension's id
   */
  createExtension(targetSupply: number, tokenIds: TokenId[] = []): ExtensionId {
    return this.atomically('createExtension', journal =>
      this.registry.createExtension(targetSupply, tokenIds, journal)
    )
  }

  assignTokens(extensionId: ExtensionId, tokenIds: TokenId[]): void {
    this.atomically('assignTokens', journal => {
      this.registry.assignTokens(extensionId, tokenIds, journal)
    })
  }

  /**
   * Seal an extension: its target supply becomes its realized supply and
   * no further tokens can be minted into it.
   *
   * @returns The realized supply
   */
  finalizeDistribution(extensionId: ExtensionId): number {
    return this.atomically('finalizeDistribution', journal =>
      this.lifecycle.finalizeDistribution(extensionId, journal)
    )
  }

  // ---------------------------------------------------------------------------
  // Minting and Burning
  // ---------------------------------------------------------------------------

  /**
   * Mint a token into its assigned extension.
   *
   * @returns The extension the token was minted into
   */
  mint(to: PubKeyHex, tokenId: TokenId): ExtensionId {
    return this.atomically('mint', journal => this.lifecycle.mint(to, tokenId, journal))
  }

  /**
   * Mint a token and, if `to` is a programmable recipient, require its
   * acknowledgement. The recipient is told `caller` minted it.
   *
   * @throws RegistryError TRANSFER_REJECTED if the recipient declines
   */
  safeMint(caller: PubKeyHex, to: PubKeyHex, tokenId: TokenId, data: number[] = []): ExtensionId {
    return this.atomically('safeMint', journal => {
      assertIdentity(caller, 'caller')
      const extensionId = this.lifecycle.mint(to, tokenId, journal)
      this.notifyRecipient(caller, NULL_IDENTITY, to, tokenId, data)
      return extensionId
    })
  }

  /**
   * Burn a token. The caller must be its owner, its approved identity or
   * an operator for the owner.
   *
   * @throws RegistryError NOT_AUTHORIZED otherwise
   */
  burn(caller: PubKeyHex, tokenId: TokenId): void {
    this.atomically('burn', journal => {
      this.assertApprovedOrOwner(caller, tokenId)
      const owner = this.lifecycle.burn(tokenId, journal)
      this.log.debug(`Burned token ${tokenId} from ${shortIdentity(owner)}`)
    })
  }

  // ---------------------------------------------------------------------------
  // Transfers
  // ---------------------------------------------------------------------------

  /**
   * Transfer a token. The caller must be the owner, the token's approved
   * identity or an operator for the owner.
   *
   * @throws RegistryError NOT_FOUND, OWNER_MISMATCH, INVALID_RECIPIENT or NOT_AUTHORIZED
   */
  transferFrom(caller: PubKeyHex, from: PubKeyHex, to: PubKeyHex, tokenId: TokenId): void {
    this.atomically('transferFrom', journal => {
      this.assertApprovedOrOwner(caller, tokenId)
      this.lifecycle.transfer(from, to, tokenId, journal)
    })
  }

  /**
   * Transfer a token and, if `to` is a programmable recipient, require its
   * acknowledgement. The recipient is called after every effect of the
   * transfer is applied; if it declines, the transfer is rolled back.
   *
   * @throws RegistryError TRANSFER_REJECTED if the recipient declines
   */
  safeTransferFrom(
    caller: PubKeyHex,
    from: PubKeyHex,
    to: PubKeyHex,
    tokenId: TokenId,
    data: number[] = []
  ): void {
    this.atomically('safeTransferFrom', journal => {
      this.assertApprovedOrOwner(caller, tokenId)
      this.lifecycle.transfer(from, to, tokenId, journal)
      this.notifyRecipient(caller, from, to, tokenId, data)
    })
  }

  // ---------------------------------------------------------------------------
  // Approvals
  // ---------------------------------------------------------------------------

  /**
   * Approve an identity to transfer one token. Approving the null identity
   * clears the approval.
   *
   * @throws RegistryError NOT_AUTHORIZED unless the caller is the owner or an operator
   * @throws RegistryError INVALID_ARGUMENT when approving the owner itself
   */
  approve(caller: PubKeyHex, to: PubKeyHex, tokenId: TokenId): void {
    this.atomically('approve', journal => {
      const owner = this.ownerOf(tokenId)
      assertIdentity(to, 'approved', true)
      if (to === owner) {
        throw new RegistryError('INVALID_ARGUMENT', 'Approval to the current owner')
      }
      if (caller !== owner && !this.approvals.isApprovedForAll(owner, caller)) {
        throw new RegistryError('NOT_AUTHORIZED', `${caller} may not approve token ${tokenId}`)
      }

      if (isNullIdentity(to)) {
        this.approvals.clear(tokenId, journal)
      } else {
        this.approvals.approve(tokenId, to, journal)
      }
      this.eventLog.append({ type: 'Approval', owner, approved: to, tokenId }, journal)
    })
  }

  /**
   * Grant or revoke an operator for all of the caller's tokens.
   *
   * @throws RegistryError INVALID_ARGUMENT if the operator is the caller
   */
  setApprovalForAll(caller: PubKeyHex, operator: PubKeyHex, approved: boolean): void {
    this.atomically('setApprovalForAll', journal => {
      assertIdentity(caller, 'owner')
      assertIdentity(operator, 'operator')
      if (operator === caller) {
        throw new RegistryError('INVALID_ARGUMENT', 'Cannot approve oneself as operator')
      }
      this.approvals.setApprovalForAll(caller, operator, approved, journal)
      this.eventLog.append({ type: 'ApprovalForAll', owner: caller, operator, approved }, journal)
    })
  }

  // ---------------------------------------------------------------------------
  // Metadata
  // ---------------------------------------------------------------------------

  setBaseURI(baseURI: string): void {
    this.metadata.setBaseURI(baseURI)
  }

  /**
   * Set the URI suffix of a live token.
   *
   * @throws RegistryError NOT_FOUND if the token does not exist
   */
  setTokenURI(tokenId: TokenId, suffix: string): void {
    this.atomically('setTokenURI', journal => {
      this.ownerOf(tokenId)
      this.metadata.setSuffix(tokenId, suffix, journal)
    })
  }

  // ---------------------------------------------------------------------------
  // Programmable Recipients
  // ---------------------------------------------------------------------------

  /**
   * Mark an identity as a programmable recipient.
   */
  registerReceiver(identity: PubKeyHex, receiver: TokenReceiver): void {
    assertIdentity(identity, 'receiver')
    this.receivers.set(identity, receiver)
  }

  unregisterReceiver(identity: PubKeyHex): boolean {
    return this.receivers.delete(identity)
  }

  // ---------------------------------------------------------------------------
  // Private Methods
  // ---------------------------------------------------------------------------

  /**
   * Run a write inside a fresh journal. On failure every recorded change
   * is undone and the error rethrown; on success listeners are notified.
   * A write started while another is in flight fails with REENTRANT_CALL.
   */
  private atomically<T>(operation: string, write: (journal: Journal) => T): T {
    if (this.activeOperation !== undefined) {
      throw new RegistryError(
        'REENTRANT_CALL',
        `${operation} called while ${this.activeOperation} is in progress`
      )
    }

    const journal = new Journal()
    this.activeOperation = operation
    let committed = false
    try {
      const result = write(journal)
      committed = true
      return result
    } catch (error) {
      const undone = journal.size
      journal.rollback()
      this.log.debug(`${operation} rolled back ${undone} changes:`, error instanceof Error ? error.message : error)
      throw error
    } finally {
      this.activeOperation = undefined
      if (committed) {
        this.eventLog.publish()
      }
    }
  }

  private assertApprovedOrOwner(caller: PubKeyHex, tokenId: TokenId): void {
    const owner = this.ownerOf(tokenId)
    if (
      caller === owner ||
      this.approvals.getApproved(tokenId) === caller ||
      this.approvals.isApprovedForAll(owner, caller)
    ) {
      return
    }
    throw new RegistryError('NOT_AUTHORIZED', `${caller} is not owner nor approved for token ${tokenId}`)
  }

  private notifyRecipient(
    operator: PubKeyHex,
    from: PubKeyHex,
    to: PubKeyHex,
    tokenId: TokenId,
    data: number[]
  ): void {
    const receiver = this.receivers.get(to)
    if (receiver === undefined) return

    let acknowledgement: string
    try {
      acknowledgement = receiver.onTokenReceived(operator, from, tokenId, data)
    } catch (error) {
      if (isRegistryError(error)) throw error
      throw new RegistryError(
        'TRANSFER_REJECTED',
        `Recipient ${shortIdentity(to)} failed on token ${tokenId}: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      )
    }

    if (acknowledgement !== TOKEN_RECEIVED_ACK) {
      throw new RegistryError('TRANSFER_REJECTED', `Recipient ${shortIdentity(to)} declined token ${tokenId}`)
    }
  }

  private resolveConfig(config: CollectionConfig): ResolvedCollectionConfig {
    return {
      name: config.name ?? DEFAULT_COLLECTION_NAME,
      symbol: config.symbol ?? DEFAULT_COLLECTION_SYMBOL,
      baseURI: config.baseURI ?? DEFAULT_BASE_URI,
      hook: config.hook ?? noopHook,
      extensions: config.extensions ?? [],
      logging: { ...DEFAULT_LOGGING_CONFIG, ...config.logging }
    }
  }
}
